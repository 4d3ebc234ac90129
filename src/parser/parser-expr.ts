/**
 * Parser Extension: Expression Parsing
 * Assignment, precedence chain and postfix operations
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  SourceLocation,
  Token,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  parseError,
  peek,
  skipNewlines,
  spanFrom,
} from './state.js';
import { isFieldName } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseLogicalOr(): ExpressionNode;
    parseLogicalAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseRange(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseExponent(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parseArguments(): ExpressionNode[];
    binary(
      op: BinaryOp,
      left: ExpressionNode,
      right: ExpressionNode,
      start: SourceLocation
    ): ExpressionNode;
  }
}

const COMPARISON_OPS: Partial<Record<string, BinaryOp>> = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
};

const TERM_OPS: Partial<Record<string, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const FACTOR_OPS: Partial<Record<string, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

Parser.prototype.binary = function (
  this: Parser,
  op: BinaryOp,
  left: ExpressionNode,
  right: ExpressionNode,
  start: SourceLocation
): ExpressionNode {
  return { type: 'Binary', op, left, right, span: spanFrom(this.state, start) };
};

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

/** alvo = valor, right associative */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const target = this.parseLogicalOr();

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) {
    return target;
  }

  const assignToken = advance(this.state);
  if (
    target.type !== 'Variable' &&
    target.type !== 'Index' &&
    target.type !== 'Field'
  ) {
    throw parseError('TENDA-P003', assignToken.span.start);
  }

  const value = this.parseAssignment();
  return { type: 'Assign', target, value, span: spanFrom(this.state, start) };
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseLogicalAnd();

  while (check(this.state, TOKEN_TYPES.OR)) {
    advance(this.state);
    skipNewlines(this.state);
    const right = this.parseLogicalAnd();
    left = {
      type: 'Logical',
      op: 'ou',
      left,
      right,
      span: spanFrom(this.state, start),
    };
  }

  return left;
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseEquality();

  while (check(this.state, TOKEN_TYPES.AND)) {
    advance(this.state);
    skipNewlines(this.state);
    const right = this.parseEquality();
    left = {
      type: 'Logical',
      op: 'e',
      left,
      right,
      span: spanFrom(this.state, start),
    };
  }

  return left;
};

/** é, não é, tem, não tem */
Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseComparison();

  for (;;) {
    let op: BinaryOp;
    if (check(this.state, TOKEN_TYPES.IS)) {
      op = 'é';
    } else if (check(this.state, TOKEN_TYPES.HAS)) {
      op = 'tem';
    } else if (
      check(this.state, TOKEN_TYPES.NOT) &&
      peek(this.state, 1).type === TOKEN_TYPES.IS
    ) {
      advance(this.state);
      op = 'não é';
    } else if (
      check(this.state, TOKEN_TYPES.NOT) &&
      peek(this.state, 1).type === TOKEN_TYPES.HAS
    ) {
      advance(this.state);
      op = 'não tem';
    } else {
      return left;
    }

    advance(this.state);
    const right = this.parseComparison();
    left = this.binary(op, left, right, start);
  }
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseRange();

  let op = COMPARISON_OPS[current(this.state).type];
  while (op !== undefined) {
    advance(this.state);
    const right = this.parseRange();
    left = this.binary(op, left, right, start);
    op = COMPARISON_OPS[current(this.state).type];
  }

  return left;
};

/** a até b, not chainable */
Parser.prototype.parseRange = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const left = this.parseTerm();

  if (!check(this.state, TOKEN_TYPES.UNTIL)) {
    return left;
  }

  advance(this.state);
  const right = this.parseTerm();
  return this.binary('até', left, right, start);
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseFactor();

  let op = TERM_OPS[current(this.state).type];
  while (op !== undefined) {
    advance(this.state);
    const right = this.parseFactor();
    left = this.binary(op, left, right, start);
    op = TERM_OPS[current(this.state).type];
  }

  return left;
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseExponent();

  let op = FACTOR_OPS[current(this.state).type];
  while (op !== undefined) {
    advance(this.state);
    const right = this.parseExponent();
    left = this.binary(op, left, right, start);
    op = FACTOR_OPS[current(this.state).type];
  }

  return left;
};

/** a ^ b, right associative; operands are unary so -2 ^ 2 is 4 */
Parser.prototype.parseExponent = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const base = this.parseUnary();

  if (!check(this.state, TOKEN_TYPES.CARET)) {
    return base;
  }

  advance(this.state);
  const exponent = this.parseExponent();
  return this.binary('^', base, exponent, start);
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.MINUS || token.type === TOKEN_TYPES.NOT) {
    advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'Unary',
      op: token.type === TOKEN_TYPES.MINUS ? '-' : 'não',
      operand,
      span: spanFrom(this.state, token.span.start),
    };
  }

  return this.parsePostfix();
};

/** Calls, indexing and field access: f(x)[0].nome */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      const args = this.parseArguments();
      expr = { type: 'Call', callee: expr, args, span: spanFrom(this.state, start) };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      skipNewlines(this.state);
      const index = this.parseExpression();
      skipNewlines(this.state);
      expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      expr = { type: 'Index', object: expr, index, span: spanFrom(this.state, start) };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const nameToken: Token = current(this.state);
      if (!isFieldName(nameToken)) {
        throw parseError('TENDA-P005', nameToken.span.start, {
          expected: 'o nome de um campo',
        });
      }
      advance(this.state);
      expr = {
        type: 'Field',
        object: expr,
        name: nameToken.value,
        span: spanFrom(this.state, start),
      };
    } else {
      return expr;
    }
  }
};

/** ( arg, arg, ... ) with newlines allowed between arguments */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const args: ExpressionNode[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.RPAREN)) {
      expect(this.state, TOKEN_TYPES.COMMA, "',' ou ')'");
      skipNewlines(this.state);
    }
  }
  advance(this.state); // consume )

  return args;
};
