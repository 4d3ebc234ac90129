/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, loops and error handling blocks
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ForEachNode,
  IfNode,
  TryNode,
  WhileNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, expect, peek, spanFrom } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseForEach(): ForEachNode;
    parseTry(): TryNode;
    parseLoopBody(): BlockNode;
  }
}

/**
 * se cond então ... [senão ...] fim
 *
 * `senão se` on one line chains into a nested IfNode that shares the
 * closing fim.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start; // consume se
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.THEN, "'então'");

  const thenBranch = this.parseBlockUntil(TOKEN_TYPES.ELSE, TOKEN_TYPES.END);

  let elseBranch: BlockNode | IfNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state); // consume senão
    if (check(this.state, TOKEN_TYPES.IF)) {
      elseBranch = this.parseIf();
      return {
        type: 'If',
        condition,
        thenBranch,
        elseBranch,
        span: spanFrom(this.state, start),
      };
    }
    elseBranch = this.parseBlockUntil(TOKEN_TYPES.END);
  }

  expect(this.state, TOKEN_TYPES.END, "'fim'");
  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

/** Loop body between faça and fim, with pare/continue allowed inside */
Parser.prototype.parseLoopBody = function (this: Parser): BlockNode {
  expect(this.state, TOKEN_TYPES.DO, "'faça'");
  this.state.loopDepth++;
  const body = this.parseBlockUntil(TOKEN_TYPES.END);
  this.state.loopDepth--;
  expect(this.state, TOKEN_TYPES.END, "'fim'");
  return body;
};

/** enquanto cond faça ... fim */
Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = advance(this.state).span.start; // consume enquanto
  const condition = this.parseExpression();
  const body = this.parseLoopBody();
  return { type: 'While', condition, body, span: spanFrom(this.state, start) };
};

/** para cada item em iterável faça ... fim */
Parser.prototype.parseForEach = function (this: Parser): ForEachNode {
  const start = advance(this.state).span.start; // consume para
  expect(this.state, TOKEN_TYPES.EACH, "'cada'");
  const item = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'um nome').value;
  expect(this.state, TOKEN_TYPES.IN, "'em'");
  const iterable = this.parseExpression();
  const body = this.parseLoopBody();

  return {
    type: 'ForEach',
    item,
    iterable,
    body,
    captured: false,
    span: spanFrom(this.state, start),
  };
};

/**
 * tente ... capture [nome] ... fim
 * The error name must be alone on the capture line.
 */
Parser.prototype.parseTry = function (this: Parser): TryNode {
  const start = advance(this.state).span.start; // consume tente
  const body = this.parseBlockUntil(TOKEN_TYPES.CATCH);
  advance(this.state); // consume capture

  let errorName: string | null = null;
  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    (peek(this.state, 1).type === TOKEN_TYPES.NEWLINE ||
      peek(this.state, 1).type === TOKEN_TYPES.END)
  ) {
    errorName = advance(this.state).value;
  }

  const handler = this.parseBlockUntil(TOKEN_TYPES.END);
  expect(this.state, TOKEN_TYPES.END, "'fim'");

  return {
    type: 'Try',
    body,
    errorName,
    handler,
    captured: false,
    span: spanFrom(this.state, start),
  };
};
