/**
 * Parser Extension: Function Parsing
 * Parameter lists, function bodies and anonymous functions
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ExpressionNode,
  FunctionExprNode,
  ParamNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  parseError,
  skipNewlines,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseParams(): ParamNode[];
    parseParam(): ParamNode;
    parseFunctionBlock(): BlockNode;
    parseDeclaredBody(): BlockNode;
    parseFunctionExpr(): FunctionExprNode;
    parseDoFunction(): FunctionExprNode;
    inFunctionScope<T>(parse: () => T): T;
  }
}

/**
 * Run `parse` as the inside of a function body: retorna becomes legal and
 * loops of the enclosing function no longer accept pare/continue.
 */
Parser.prototype.inFunctionScope = function <T>(
  this: Parser,
  parse: () => T
): T {
  const savedLoopDepth = this.state.loopDepth;
  this.state.functionDepth++;
  this.state.loopDepth = 0;
  const result = parse();
  this.state.functionDepth--;
  this.state.loopDepth = savedLoopDepth;
  return result;
};

/**
 * (a, b = 2, ...resto)
 *
 * Names are unique and a variadic parameter comes last. Default values
 * are parsed as function-level expressions since they are evaluated in
 * the call frame.
 */
Parser.prototype.parseParams = function (this: Parser): ParamNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const params: ParamNode[] = [];
  const names = new Set<string>();

  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    const previous = params[params.length - 1];
    if (previous?.variadic) {
      throw parseError('TENDA-P006', current(this.state).span.start, {
        reason: `'...${previous.name}' deve ser o último parâmetro`,
      });
    }

    const param = this.parseParam();
    if (names.has(param.name)) {
      throw parseError('TENDA-P006', param.span.start, {
        reason: `parâmetro '${param.name}' repetido`,
      });
    }
    names.add(param.name);
    params.push(param);

    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.RPAREN)) {
      expect(this.state, TOKEN_TYPES.COMMA, "',' ou ')'");
      skipNewlines(this.state);
    }
  }
  advance(this.state); // consume )

  return params;
};

Parser.prototype.parseParam = function (this: Parser): ParamNode {
  const start = current(this.state).span.start;
  const variadic = match(this.state, TOKEN_TYPES.ELLIPSIS);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    'o nome de um parâmetro'
  ).value;

  let defaultValue: ExpressionNode | null = null;
  if (!variadic && match(this.state, TOKEN_TYPES.ASSIGN)) {
    defaultValue = this.inFunctionScope(() => this.parseLogicalOr());
  }

  return {
    type: 'Param',
    name,
    defaultValue,
    variadic,
    captured: false,
    span: spanFrom(this.state, start),
  };
};

/** Statements up to and including the closing fim */
Parser.prototype.parseFunctionBlock = function (this: Parser): BlockNode {
  return this.inFunctionScope(() => {
    const body = this.parseBlockUntil(TOKEN_TYPES.END);
    expect(this.state, TOKEN_TYPES.END, "'fim'");
    return body;
  });
};

/**
 * Body after `seja nome(params) =`: a faça ... fim block, or a single
 * expression whose value is returned.
 */
Parser.prototype.parseDeclaredBody = function (this: Parser): BlockNode {
  if (match(this.state, TOKEN_TYPES.DO)) {
    return this.parseFunctionBlock();
  }

  return this.inFunctionScope(() => {
    const value = this.parseExpression();
    return {
      type: 'Block',
      statements: [{ type: 'Return', value, span: value.span }],
      span: value.span,
    };
  });
};

/** função(params) ... fim */
Parser.prototype.parseFunctionExpr = function (
  this: Parser
): FunctionExprNode {
  const start = advance(this.state).span.start; // consume função
  const params = this.parseParams();
  const body = this.parseFunctionBlock();
  return {
    type: 'FunctionExpr',
    params,
    body,
    selfCaptured: false,
    span: spanFrom(this.state, start),
  };
};

/** faça ... fim in expression position: a function without parameters */
Parser.prototype.parseDoFunction = function (this: Parser): FunctionExprNode {
  const start = advance(this.state).span.start; // consume faça
  const body = this.parseFunctionBlock();
  return {
    type: 'FunctionExpr',
    params: [],
    body,
    selfCaptured: false,
    span: spanFrom(this.state, start),
  };
};
