/**
 * Parser Extension: Literal Parsing
 * Primary expressions, lists, dictionaries and grouping
 */

import { Parser } from './parser.js';
import type {
  DictEntryNode,
  DictLiteralNode,
  ExpressionNode,
  GroupedExprNode,
  ListLiteralNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  peek,
  skipNewlines,
  spanFrom,
  unexpected,
} from './state.js';
import { isFieldName } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseGrouped(): GroupedExprNode;
    parseList(): ListLiteralNode;
    parseDict(): DictLiteralNode;
    parseDictEntry(): DictEntryNode;
  }
}

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'NumberLiteral', value: Number(token.value), span: token.span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'TextLiteral', value: token.value, span: token.span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', span: token.span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token.value, span: token.span };
    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
    case TOKEN_TYPES.LBRACKET:
      return this.parseList();
    case TOKEN_TYPES.LBRACE:
      return this.parseDict();
    case TOKEN_TYPES.FUNCTION:
      return this.parseFunctionExpr();
    case TOKEN_TYPES.DO:
      return this.parseDoFunction();
    default:
      throw unexpected(this.state);
  }
};

Parser.prototype.parseGrouped = function (this: Parser): GroupedExprNode {
  const start = advance(this.state).span.start; // consume (
  skipNewlines(this.state);
  const expression = this.parseExpression();
  skipNewlines(this.state);
  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return { type: 'Grouped', expression, span: spanFrom(this.state, start) };
};

/** [a, b, c] */
Parser.prototype.parseList = function (this: Parser): ListLiteralNode {
  const start = advance(this.state).span.start; // consume [
  const elements: ExpressionNode[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    elements.push(this.parseExpression());
    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      expect(this.state, TOKEN_TYPES.COMMA, "',' ou ']'");
      skipNewlines(this.state);
    }
  }
  advance(this.state); // consume ]

  return { type: 'ListLiteral', elements, span: spanFrom(this.state, start) };
};

/** { nome: valor, "texto": valor, 1: valor } */
Parser.prototype.parseDict = function (this: Parser): DictLiteralNode {
  const start = advance(this.state).span.start; // consume {
  const entries: DictEntryNode[] = [];

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    entries.push(this.parseDictEntry());
    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.RBRACE)) {
      expect(this.state, TOKEN_TYPES.COMMA, "',' ou '}'");
      skipNewlines(this.state);
    }
  }
  advance(this.state); // consume }

  return { type: 'DictLiteral', entries, span: spanFrom(this.state, start) };
};

/** A bare name before ':' is a text key; anything else is evaluated */
Parser.prototype.parseDictEntry = function (this: Parser): DictEntryNode {
  const token = current(this.state);
  let key: ExpressionNode;

  if (isFieldName(token) && peek(this.state, 1).type === TOKEN_TYPES.COLON) {
    advance(this.state);
    key = { type: 'TextLiteral', value: token.value, span: token.span };
  } else {
    key = this.parseLogicalOr();
  }

  expect(this.state, TOKEN_TYPES.COLON, "':'");
  skipNewlines(this.state);
  const value = this.parseExpression();

  return {
    type: 'DictEntry',
    key,
    value,
    span: spanFrom(this.state, token.span.start),
  };
};
