/**
 * Tenda CLI Tests: shared helpers
 */

import { describe, expect, it } from 'vitest';
import { formatError, readVersion } from '../../src/cli-shared.js';
import { ParseError, parse } from '../../src/index.js';

describe('cli-shared', () => {
  describe('formatError', () => {
    it('formats syntax errors without a source', () => {
      const error = new ParseError('TENDA-P005', 'Esperado um nome', {
        line: 2,
        column: 4,
        offset: 9,
      });
      expect(formatError(error)).toBe(
        ['erro[TENDA-P005]: Esperado um nome', '  --> <fonte>:2:4'].join('\n')
      );
    });

    it('formats lexer errors thrown by parse', () => {
      let caught: unknown;
      try {
        parse('"aberto');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(Error);
      if (!(caught instanceof Error)) return;
      expect(formatError(caught)).toMatch(/^erro\[TENDA-L001\]: Texto não terminado/);
    });

    it('formats missing files', () => {
      const error = Object.assign(new Error('ENOENT'), {
        code: 'ENOENT',
        path: '/tmp/sumido.tenda',
      });
      expect(formatError(error)).toBe('File not found: /tmp/sumido.tenda');
    });

    it('passes other messages through', () => {
      expect(formatError(new Error('Missing file argument'))).toBe(
        'Missing file argument'
      );
    });
  });

  describe('readVersion', () => {
    it('reads the package version', async () => {
      await expect(readVersion()).resolves.toBe('0.1.0');
    });
  });
});
