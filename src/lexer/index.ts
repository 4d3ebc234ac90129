/**
 * Tenda Lexer
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { tokenize } from './tokenizer.js';
