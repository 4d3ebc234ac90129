/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statements, blocks, declarations
 * - parser-control.ts: Conditionals, loops, error handling
 * - parser-expr.ts: Precedence chain and postfix operations
 * - parser-literals.ts: Literals, lists, dictionaries
 * - parser-functions.ts: Parameters and function bodies
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  parse(): ProgramNode {
    return this.parseProgram();
  }
}
