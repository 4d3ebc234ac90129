/**
 * Tenda Module
 * Exports lexer, parser, runtime, reporting and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export { analyzeCaptures, parse } from './parser/index.js';
export * from './runtime/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';

// ============================================================
// REPORTING
// ============================================================
export {
  extractSnippet,
  formatDiagnostic,
  formatSyntaxError,
  suggestSimilarNames,
  type ReportOptions,
  type SourceSnippet,
  type SnippetLine,
} from './reporting.js';

export * from './types.js';
