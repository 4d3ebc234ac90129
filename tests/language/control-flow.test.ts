/**
 * Tenda Runtime Tests: Control Flow
 * Conditionals, loops, pare/continue and retorna
 */

import { describe, expect, it } from 'vitest';

import { formatValue } from '../../src/index.js';
import { run, runDiagnostic } from '../helpers/runtime.js';

function display(source: string): string {
  return formatValue(run(source), true);
}

describe('Tenda Runtime: Control Flow', () => {
  describe('se', () => {
    it('yields the value of the branch taken', () => {
      expect(run('se 1 > 2 então\n"a"\nsenão\n"b"\nfim')).toBe('b');
    });

    it('yields Nada when no branch runs', () => {
      expect(run('se falso então\n1\nfim')).toBeNull();
    });

    it('follows a senão se chain', () => {
      const source = `
        seja n = 0
        seja r = ""
        se n > 0 então
          r = "positivo"
        senão se n < 0 então
          r = "negativo"
        senão
          r = "zero"
        fim
        r
      `;
      expect(run(source)).toBe('zero');
    });

    it('uses truthiness for conditions', () => {
      expect(run('se "" então\n1\nsenão\n2\nfim')).toBe(1);
      expect(run('se 0 então\n1\nsenão\n2\nfim')).toBe(2);
    });
  });

  describe('enquanto', () => {
    it('repeats while the condition holds', () => {
      const source = `
        seja i = 0
        seja s = 0
        enquanto i < 5 faça
          i = i + 1
          s = s + i
        fim
        s
      `;
      expect(run(source)).toBe(15);
    });

    it('completes with Nada', () => {
      expect(run('enquanto falso faça\nfim')).toBeNull();
    });

    it('propagates condition errors', () => {
      expect(runDiagnostic('enquanto x faça\nfim')).toMatchObject({
        kind: 'UndefinedVariable',
        name: 'x',
      });
    });
  });

  describe('para cada', () => {
    it('honors pare and continue', () => {
      const source = `
        seja soma = 0
        para cada i em 1 até 10 faça
          se i % 2 é 0 então
            continue
          fim
          se i > 7 então
            pare
          fim
          soma = soma + i
        fim
        soma
      `;
      expect(run(source)).toBe(16);
    });

    it('visits characters of text and keys of dictionaries', () => {
      expect(
        display('seja r = []\npara cada c em "ab" faça\nLista.insira(r, c)\nfim\nr')
      ).toBe('["a", "b"]');
      expect(
        display(
          'seja r = []\npara cada k em { b: 1, a: 2 } faça\nLista.insira(r, k)\nfim\nr'
        )
      ).toBe('["b", "a"]');
    });

    it('treats a descending range as empty', () => {
      expect(
        run('seja n = 0\npara cada i em 3 até 1 faça\nn = n + 1\nfim\nn')
      ).toBe(0);
    });

    it('iterates over a snapshot of the list', () => {
      expect(
        display('seja l = [1, 2]\npara cada x em l faça\nLista.insira(l, x)\nfim\nl')
      ).toBe('[1, 2, 1, 2]');
    });

    it('rejects values that cannot be iterated', () => {
      const diagnostic = runDiagnostic('para cada x em 5 faça\nfim');
      expect(diagnostic).toMatchObject({
        kind: 'NotIterable',
        valueType: 'número',
      });
      expect(diagnostic.span?.start.column).toBe(16);
    });

    it('binds a fresh item for every iteration', () => {
      expect(
        run('para cada i em [1, 2] faça\nseja dobro = i * 2\nfim')
      ).toBeNull();
    });

    it('keeps the item inside the loop', () => {
      expect(runDiagnostic('para cada i em [1] faça\nfim\ni')).toMatchObject({
        kind: 'UndefinedVariable',
        name: 'i',
      });
    });

    it('gives each iteration its own captured item', () => {
      const source = `
        seja fs = []
        para cada i em 1 até 3 faça
          Lista.insira(fs, função()
            retorna i
          fim)
        fim
        Lista.mapeie(fs, função(f)
          retorna f()
        fim)
      `;
      expect(display(source)).toBe('[1, 2, 3]');
    });
  });

  describe('retorna', () => {
    it('leaves loops inside a function', () => {
      const source = `
        função primeiro_par(l)
          para cada x em l faça
            se x % 2 é 0 então
              retorna x
            fim
          fim
          retorna Nada
        fim
        primeiro_par([1, 3, 4, 6])
      `;
      expect(run(source)).toBe(4);
    });

    it('yields Nada without a value or at the end of the body', () => {
      expect(run('função f()\nretorna\nfim\nf()')).toBeNull();
      expect(run('função g()\n1\nfim\ng()')).toBeNull();
    });
  });
});
