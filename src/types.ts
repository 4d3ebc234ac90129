/**
 * Tenda AST Types
 * Source locations, error hierarchy, tokens and syntax tree nodes
 */

import { ERROR_REGISTRY } from './error-registry.js';

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Structured error data for host applications */
export interface TendaErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for lexer and parser failures.
 * Runtime failures are Diagnostic records, never thrown.
 */
export class TendaError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TendaErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TendaError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TendaErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TendaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Parse-time errors */
export class ParseError extends TendaError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (definition?.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }
    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NIL: 'NIL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  LET: 'LET', // seja
  IF: 'IF', // se
  THEN: 'THEN', // então
  ELSE: 'ELSE', // senão
  END: 'END', // fim
  WHILE: 'WHILE', // enquanto
  DO: 'DO', // faça
  FOR: 'FOR', // para
  EACH: 'EACH', // cada
  IN: 'IN', // em
  HAS: 'HAS', // tem
  NOT: 'NOT', // não
  IS: 'IS', // é
  AND: 'AND', // e
  OR: 'OR', // ou
  UNTIL: 'UNTIL', // até
  RETURN: 'RETURN', // retorna
  BREAK: 'BREAK', // pare
  CONTINUE: 'CONTINUE', // continue
  FUNCTION: 'FUNCTION', // função
  TRY: 'TRY', // tente
  CATCH: 'CATCH', // capture
  THROW: 'THROW', // lance
  IMPORT: 'IMPORT', // importe
  EXPORT: 'EXPORT', // exporte

  // Arithmetic
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',
  PERCENT: 'PERCENT',
  CARET: 'CARET',

  // Comparison
  LT: 'LT',
  GT: 'GT',
  LE: 'LE',
  GE: 'GE',

  // Punctuation
  ASSIGN: 'ASSIGN', // =
  DOT: 'DOT',
  ELLIPSIS: 'ELLIPSIS', // ...
  COMMA: 'COMMA',
  COLON: 'COLON',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',

  // Structure
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'Block'
  | 'VariableDecl'
  | 'FunctionDecl'
  | 'Param'
  | 'If'
  | 'While'
  | 'ForEach'
  | 'Return'
  | 'Break'
  | 'Continue'
  | 'Try'
  | 'Throw'
  | 'Import'
  | 'Export'
  | 'ExpressionStatement'
  | 'NumberLiteral'
  | 'TextLiteral'
  | 'BoolLiteral'
  | 'NilLiteral'
  | 'ListLiteral'
  | 'DictLiteral'
  | 'DictEntry'
  | 'Variable'
  | 'Binary'
  | 'Logical'
  | 'Unary'
  | 'Call'
  | 'Index'
  | 'Field'
  | 'Assign'
  | 'Grouped'
  | 'FunctionExpr';

interface BaseNode {
  readonly type: NodeType;
  readonly span: SourceSpan;
}

/**
 * Binding sites carry a `captured` flag set by capture analysis.
 * A captured binding is stored in a Shared cell from its declaration on.
 */
interface BindingSite {
  captured: boolean;
}

// ============================================================
// PROGRAM AND STATEMENTS
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

export type StatementNode =
  | BlockNode
  | VariableDeclNode
  | FunctionDeclNode
  | IfNode
  | WhileNode
  | ForEachNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | TryNode
  | ThrowNode
  | ImportNode
  | ExportNode
  | ExpressionStatementNode;

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

/** seja nome = valor */
export interface VariableDeclNode extends BaseNode, BindingSite {
  readonly type: 'VariableDecl';
  readonly name: string;
  readonly value: ExpressionNode;
}

/**
 * seja nome(params) = corpo, or função nome(params) ... fim.
 * `captured` marks the outer binding; `selfCaptured` marks the name as
 * seen from inside the body.
 */
export interface FunctionDeclNode extends BaseNode, BindingSite {
  readonly type: 'FunctionDecl';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: BlockNode;
  selfCaptured: boolean;
}

export interface ParamNode extends BaseNode, BindingSite {
  readonly type: 'Param';
  readonly name: string;
  readonly defaultValue: ExpressionNode | null;
  readonly variadic: boolean;
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: BlockNode;
  readonly elseBranch: BlockNode | IfNode | null;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/** para cada item em iterável faça ... fim */
export interface ForEachNode extends BaseNode, BindingSite {
  readonly type: 'ForEach';
  readonly item: string;
  readonly iterable: ExpressionNode;
  readonly body: BlockNode;
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

/** tente ... capture [nome] ... fim */
export interface TryNode extends BaseNode, BindingSite {
  readonly type: 'Try';
  readonly body: BlockNode;
  readonly errorName: string | null;
  readonly handler: BlockNode;
}

export interface ThrowNode extends BaseNode {
  readonly type: 'Throw';
  readonly value: ExpressionNode;
}

export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly specifier: string;
}

export interface ExportNode extends BaseNode {
  readonly type: 'Export';
  readonly declaration: VariableDeclNode | FunctionDeclNode;
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | NumberLiteralNode
  | TextLiteralNode
  | BoolLiteralNode
  | NilLiteralNode
  | ListLiteralNode
  | DictLiteralNode
  | VariableNode
  | BinaryExprNode
  | LogicalExprNode
  | UnaryExprNode
  | CallNode
  | IndexNode
  | FieldNode
  | AssignNode
  | GroupedExprNode
  | FunctionExprNode;

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface TextLiteralNode extends BaseNode {
  readonly type: 'TextLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode[];
}

export interface DictLiteralNode extends BaseNode {
  readonly type: 'DictLiteral';
  readonly entries: DictEntryNode[];
}

export interface DictEntryNode extends BaseNode {
  readonly type: 'DictEntry';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '^'
  | '<'
  | '<='
  | '>'
  | '>='
  | 'é'
  | 'não é'
  | 'tem'
  | 'não tem'
  | 'até';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'Binary';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface LogicalExprNode extends BaseNode {
  readonly type: 'Logical';
  readonly op: 'e' | 'ou';
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: '-' | 'não';
  readonly operand: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface FieldNode extends BaseNode {
  readonly type: 'Field';
  readonly object: ExpressionNode;
  readonly name: string;
}

export type AssignTarget = VariableNode | IndexNode | FieldNode;

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly target: AssignTarget;
  readonly value: ExpressionNode;
}

export interface GroupedExprNode extends BaseNode {
  readonly type: 'Grouped';
  readonly expression: ExpressionNode;
}

/** função(params) ... fim, or the zero-parameter faça ... fim */
/**
 * função(params) ... fim, or faça ... fim. Bound by `seja nome = ...`,
 * the function sees `nome` in its own call frame; `selfCaptured` marks
 * that name as referenced by a nested closure.
 */
export interface FunctionExprNode extends BaseNode {
  readonly type: 'FunctionExpr';
  readonly params: ParamNode[];
  readonly body: BlockNode;
  selfCaptured: boolean;
}

export type ASTNode =
  | ProgramNode
  | StatementNode
  | ExpressionNode
  | ParamNode
  | DictEntryNode;
