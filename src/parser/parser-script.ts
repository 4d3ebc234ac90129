/**
 * Parser Extension: Program and Statement Parsing
 * Program structure, blocks, declarations and jump statements
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  BreakNode,
  ContinueNode,
  ExportNode,
  ExpressionStatementNode,
  FunctionDeclNode,
  ImportNode,
  ProgramNode,
  ReturnNode,
  SourceLocation,
  StatementNode,
  ThrowNode,
  TokenType,
  VariableDeclNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  parseError,
  peek,
  skipNewlines,
  spanFrom,
  unexpected,
} from './state.js';

/** Tokens that close a block; `retorna` without a value stops before them */
const BLOCK_TERMINATORS: TokenType[] = [
  TOKEN_TYPES.NEWLINE,
  TOKEN_TYPES.EOF,
  TOKEN_TYPES.END,
  TOKEN_TYPES.ELSE,
  TOKEN_TYPES.CATCH,
];

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode;
    parseBlockUntil(...terminators: TokenType[]): BlockNode;
    parseLet(): VariableDeclNode | FunctionDeclNode;
    parseFunctionStatement(): FunctionDeclNode;
    parseReturn(): ReturnNode;
    parseLoopJump(): BreakNode | ContinueNode;
    parseThrow(): ThrowNode;
    parseImport(): ImportNode;
    parseExport(): ExportNode;
    parseExpressionStatement(): ExpressionStatementNode;
    requireTopLevel(statement: string, location: SourceLocation): void;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  skipNewlines(this.state);
  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
    skipNewlines(this.state);
  }

  return { type: 'Program', statements, span: spanFrom(this.state, start) };
};

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.LET:
      return this.parseLet();
    case TOKEN_TYPES.FUNCTION:
      // função(...) without a name is an anonymous function expression
      if (peek(this.state, 1).type === TOKEN_TYPES.IDENTIFIER) {
        return this.parseFunctionStatement();
      }
      return this.parseExpressionStatement();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseForEach();
    case TOKEN_TYPES.TRY:
      return this.parseTry();
    case TOKEN_TYPES.RETURN:
      return this.parseReturn();
    case TOKEN_TYPES.BREAK:
    case TOKEN_TYPES.CONTINUE:
      return this.parseLoopJump();
    case TOKEN_TYPES.THROW:
      return this.parseThrow();
    case TOKEN_TYPES.IMPORT:
      return this.parseImport();
    case TOKEN_TYPES.EXPORT:
      return this.parseExport();
    default:
      return this.parseExpressionStatement();
  }
};

/**
 * Parse statements until one of `terminators` is the current token.
 * The terminator itself is left for the caller to consume.
 */
Parser.prototype.parseBlockUntil = function (
  this: Parser,
  ...terminators: TokenType[]
): BlockNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  this.state.blockDepth++;
  skipNewlines(this.state);
  while (!check(this.state, ...terminators)) {
    if (isAtEnd(this.state)) {
      throw unexpected(this.state);
    }
    statements.push(this.parseStatement());
    skipNewlines(this.state);
  }
  this.state.blockDepth--;

  return { type: 'Block', statements, span: spanFrom(this.state, start) };
};

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * seja nome = expr
 * seja nome(params) = expr
 * seja nome(params) = faça ... fim
 */
Parser.prototype.parseLet = function (
  this: Parser
): VariableDeclNode | FunctionDeclNode {
  const start = advance(this.state).span.start; // consume seja
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'um nome').value;

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const params = this.parseParams();
    expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
    const body = this.parseDeclaredBody();
    return {
      type: 'FunctionDecl',
      name,
      params,
      body,
      captured: false,
      selfCaptured: false,
      span: spanFrom(this.state, start),
    };
  }

  expect(this.state, TOKEN_TYPES.ASSIGN, "'='");
  const value = this.parseExpression();
  return {
    type: 'VariableDecl',
    name,
    value,
    captured: false,
    span: spanFrom(this.state, start),
  };
};

/** função nome(params) ... fim */
Parser.prototype.parseFunctionStatement = function (
  this: Parser
): FunctionDeclNode {
  const start = advance(this.state).span.start; // consume função
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'um nome').value;
  const params = this.parseParams();
  const body = this.parseFunctionBlock();

  return {
    type: 'FunctionDecl',
    name,
    params,
    body,
    captured: false,
    selfCaptured: false,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// JUMPS
// ============================================================

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const token = advance(this.state); // consume retorna
  if (this.state.functionDepth === 0) {
    throw parseError('TENDA-P004', token.span.start, {
      statement: 'retorna',
      context: 'dentro de uma função',
    });
  }

  const value = check(this.state, ...BLOCK_TERMINATORS)
    ? null
    : this.parseExpression();

  return {
    type: 'Return',
    value,
    span: spanFrom(this.state, token.span.start),
  };
};

Parser.prototype.parseLoopJump = function (
  this: Parser
): BreakNode | ContinueNode {
  const token = advance(this.state);
  if (this.state.loopDepth === 0) {
    throw parseError('TENDA-P004', token.span.start, {
      statement: token.value,
      context: 'dentro de um laço',
    });
  }

  return token.type === TOKEN_TYPES.BREAK
    ? { type: 'Break', span: token.span }
    : { type: 'Continue', span: token.span };
};

Parser.prototype.parseThrow = function (this: Parser): ThrowNode {
  const start = advance(this.state).span.start; // consume lance
  const value = this.parseExpression();
  return { type: 'Throw', value, span: spanFrom(this.state, start) };
};

// ============================================================
// MODULES
// ============================================================

Parser.prototype.requireTopLevel = function (
  this: Parser,
  statement: string,
  location: SourceLocation
): void {
  if (this.state.blockDepth > 0 || this.state.functionDepth > 0) {
    throw parseError('TENDA-P004', location, {
      statement,
      context: 'no nível principal do programa',
    });
  }
};

/** importe "caminho" */
Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const start = advance(this.state).span.start; // consume importe
  this.requireTopLevel('importe', start);
  const specifier = expect(
    this.state,
    TOKEN_TYPES.STRING,
    'o caminho do módulo'
  ).value;
  return { type: 'Import', specifier, span: spanFrom(this.state, start) };
};

/** exporte seja ... / exporte função nome ... */
Parser.prototype.parseExport = function (this: Parser): ExportNode {
  const start = advance(this.state).span.start; // consume exporte
  this.requireTopLevel('exporte', start);

  let declaration: VariableDeclNode | FunctionDeclNode;
  if (check(this.state, TOKEN_TYPES.LET)) {
    declaration = this.parseLet();
  } else if (
    check(this.state, TOKEN_TYPES.FUNCTION) &&
    peek(this.state, 1).type === TOKEN_TYPES.IDENTIFIER
  ) {
    declaration = this.parseFunctionStatement();
  } else {
    throw unexpected(this.state, "'seja' ou 'função'");
  }

  return { type: 'Export', declaration, span: spanFrom(this.state, start) };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const expression = this.parseExpression();
  return {
    type: 'ExpressionStatement',
    expression,
    span: expression.span,
  };
};
