/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Number of enclosing function bodies */
  functionDepth: number;
  /** Number of enclosing loops inside the current function body */
  loopDepth: number;
  /** Number of enclosing blocks; zero at the top level of a program */
  blockDepth: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return {
    tokens,
    pos: 0,
    functionDepth: 0,
    loopDepth: 0,
    blockDepth: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Token consumed most recently, used to close spans */
export function previous(state: ParserState): Token {
  return state.tokens[state.pos - 1] ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token when it has the given type */
export function match(state: ParserState, type: TokenType): boolean {
  if (!check(state, type)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  throw unexpected(state, expected);
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

// ============================================================
// ERRORS
// ============================================================

/** Create a ParseError from the registry template for `errorId` */
export function parseError(
  errorId: string,
  location: SourceLocation,
  context: Record<string, unknown> = {}
): ParseError {
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? errorId;
  return new ParseError(
    errorId,
    renderMessage(template, context),
    location,
    context
  );
}

/**
 * Error for the current token: end of input, or a mismatch against what
 * the grammar expected here.
 */
export function unexpected(state: ParserState, expected?: string): ParseError {
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) {
    return parseError('TENDA-P002', token.span.start);
  }
  if (expected !== undefined) {
    return parseError('TENDA-P005', token.span.start, {
      expected: `${expected}, encontrado ${describeToken(token)}`,
    });
  }
  return parseError('TENDA-P001', token.span.start, {
    token: describeToken(token),
  });
}

function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.NEWLINE) return 'quebra de linha';
  if (token.type === TOKEN_TYPES.STRING) return `"${token.value}"`;
  return `'${token.value}'`;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previous(state).span.end);
}
