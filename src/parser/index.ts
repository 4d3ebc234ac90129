/**
 * Tenda Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ProgramNode } from '../types.js';
import { analyzeCaptures } from './captures.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-functions.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Tenda source code into an AST with capture flags annotated.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('seja x = 1\nexiba(x)');
 * ```
 */
export function parse(source: string): ProgramNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens);
  return analyzeCaptures(parser.parse());
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { analyzeCaptures } from './captures.js';
export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
