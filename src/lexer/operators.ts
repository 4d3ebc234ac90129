/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '.': TOKEN_TYPES.DOT,
  ':': TOKEN_TYPES.COLON,
  ',': TOKEN_TYPES.COMMA,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '^': TOKEN_TYPES.CARET,
};

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<
  string,
  TokenType
>([
  ['verdadeiro', TOKEN_TYPES.TRUE],
  ['falso', TOKEN_TYPES.FALSE],
  ['Nada', TOKEN_TYPES.NIL],
  ['seja', TOKEN_TYPES.LET],
  ['se', TOKEN_TYPES.IF],
  ['então', TOKEN_TYPES.THEN],
  ['senão', TOKEN_TYPES.ELSE],
  ['fim', TOKEN_TYPES.END],
  ['enquanto', TOKEN_TYPES.WHILE],
  ['faça', TOKEN_TYPES.DO],
  ['para', TOKEN_TYPES.FOR],
  ['cada', TOKEN_TYPES.EACH],
  ['em', TOKEN_TYPES.IN],
  ['tem', TOKEN_TYPES.HAS],
  ['não', TOKEN_TYPES.NOT],
  ['é', TOKEN_TYPES.IS],
  ['e', TOKEN_TYPES.AND],
  ['ou', TOKEN_TYPES.OR],
  ['até', TOKEN_TYPES.UNTIL],
  ['retorna', TOKEN_TYPES.RETURN],
  ['pare', TOKEN_TYPES.BREAK],
  ['continue', TOKEN_TYPES.CONTINUE],
  ['função', TOKEN_TYPES.FUNCTION],
  ['tente', TOKEN_TYPES.TRY],
  ['capture', TOKEN_TYPES.CATCH],
  ['lance', TOKEN_TYPES.THROW],
  ['importe', TOKEN_TYPES.IMPORT],
  ['exporte', TOKEN_TYPES.EXPORT],
]);
