/**
 * Parser Helpers
 * Lookahead predicates shared by parser extensions
 * @internal This module contains internal parser utilities
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { KEYWORDS } from '../lexer/operators.js';

/**
 * Field and dictionary key names accept keywords too, so `Matemática.e`
 * and `{ fim: 1 }` read naturally.
 * @internal
 */
export function isFieldName(token: Token): boolean {
  return token.type === TOKEN_TYPES.IDENTIFIER || KEYWORDS.has(token.value);
}
