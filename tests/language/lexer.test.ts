/**
 * Tenda Lexer Tests
 */

import { describe, expect, it } from 'vitest';

import { LexerError, tokenize, TOKEN_TYPES } from '../../src/index.js';

function types(source: string): string[] {
  return tokenize(source).map((token) => token.type);
}

function lexError(source: string): LexerError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error('Expected a lexer error');
}

describe('Tenda Lexer', () => {
  describe('tokens', () => {
    it('tokenizes a declaration', () => {
      expect(types('seja x = 1')).toEqual([
        TOKEN_TYPES.LET,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.ASSIGN,
        TOKEN_TYPES.NUMBER,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('gives 1-based spans with an exclusive end', () => {
      const name = tokenize('seja x = 1')[1];
      expect(name?.value).toBe('x');
      expect(name?.span).toEqual({
        start: { line: 1, column: 6, offset: 5 },
        end: { line: 1, column: 7, offset: 6 },
      });
    });

    it('recognizes accented keywords', () => {
      expect(types('então senão não é até função')).toEqual([
        TOKEN_TYPES.THEN,
        TOKEN_TYPES.ELSE,
        TOKEN_TYPES.NOT,
        TOKEN_TYPES.IS,
        TOKEN_TYPES.UNTIL,
        TOKEN_TYPES.FUNCTION,
        TOKEN_TYPES.EOF,
      ]);
    });

    it('normalizes combining accents before matching keywords', () => {
      const [token] = tokenize('enta\u0303o');
      expect(token?.type).toBe(TOKEN_TYPES.THEN);
    });

    it('accepts accented identifiers', () => {
      const [token] = tokenize('raiz_quadrada2');
      expect(token).toMatchObject({
        type: TOKEN_TYPES.IDENTIFIER,
        value: 'raiz_quadrada2',
      });
    });

    it('emits newlines as tokens', () => {
      const tokens = tokenize('a\nb');
      expect(tokens.map((token) => token.type)).toEqual([
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.IDENTIFIER,
        TOKEN_TYPES.EOF,
      ]);
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 1, offset: 2 });
    });

    it('skips line and block comments', () => {
      const tokens = tokenize('a // nota\nb /* várias\nlinhas */ c');
      expect(tokens.map((token) => token.value)).toEqual([
        'a',
        '\n',
        'b',
        'c',
        '',
      ]);
    });

    it('tokenizes operators', () => {
      expect(types('<= >= < > ... + - * / % ^')).toEqual([
        TOKEN_TYPES.LE,
        TOKEN_TYPES.GE,
        TOKEN_TYPES.LT,
        TOKEN_TYPES.GT,
        TOKEN_TYPES.ELLIPSIS,
        TOKEN_TYPES.PLUS,
        TOKEN_TYPES.MINUS,
        TOKEN_TYPES.STAR,
        TOKEN_TYPES.SLASH,
        TOKEN_TYPES.PERCENT,
        TOKEN_TYPES.CARET,
        TOKEN_TYPES.EOF,
      ]);
    });
  });

  describe('numbers', () => {
    it('reads decimals', () => {
      expect(tokenize('3.14')[0]).toMatchObject({
        type: TOKEN_TYPES.NUMBER,
        value: '3.14',
      });
    });

    it('leaves a dot followed by a name to field access', () => {
      expect(tokenize('1.campo').map((token) => token.value)).toEqual([
        '1',
        '.',
        'campo',
        '',
      ]);
    });

    it('rejects a second decimal point', () => {
      const err = lexError('1.2.3');
      expect(err.errorId).toBe('TENDA-L003');
      expect(err.toData().message).toBe('Número mal formado: 1.2.');
    });
  });

  describe('text', () => {
    it('processes escape sequences', () => {
      expect(tokenize('"a\\tb\\"c\\\\"')[0]?.value).toBe('a\tb"c\\');
    });

    it('rejects unterminated text', () => {
      const err = lexError('"abc');
      expect(err.errorId).toBe('TENDA-L001');
      expect(err.location).toEqual({ line: 1, column: 1, offset: 0 });
      expect(err.message).toBe('Texto não terminado at 1:1');
    });

    it('rejects text broken across lines', () => {
      expect(lexError('"a\nb"').errorId).toBe('TENDA-L001');
    });

    it('rejects unknown escapes', () => {
      const err = lexError('"\\q"');
      expect(err.errorId).toBe('TENDA-L005');
      expect(err.toData().message).toBe('Sequência de escape inválida: \\q');
      expect(err.location.column).toBe(3);
    });
  });

  describe('errors', () => {
    it('rejects invalid characters', () => {
      const err = lexError('seja x = #');
      expect(err.errorId).toBe('TENDA-L002');
      expect(err.toData().message).toBe('Caractere inválido: #');
      expect(err.location.column).toBe(10);
    });

    it('rejects unterminated block comments', () => {
      const err = lexError('a /* sem fim');
      expect(err.errorId).toBe('TENDA-L004');
      expect(err.location.column).toBe(3);
    });
  });
});
