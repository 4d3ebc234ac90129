/**
 * Prelude Tests
 * exiba, conversions, Lista, Texto, Matemática and host functions
 */

import { describe, expect, it } from 'vitest';

import {
  createRuntimeContext,
  diagnosticMessage,
  execute,
  formatValue,
  ok,
  parse,
} from '../../src/index.js';
import { run, runDiagnostic, runLogged } from '../helpers/runtime.js';

function display(source: string): string {
  return formatValue(run(source), true);
}

describe('Prelude', () => {
  describe('top-level functions', () => {
    it('exiba writes the display form and yields Nada', () => {
      expect(runLogged('exiba("olá")\nexiba([1, "a"])\nexiba(Nada)')).toEqual([
        'olá',
        '[1, "a"]',
        'Nada',
      ]);
      expect(run('exiba(1)')).toBeNull();
    });

    it.each([
      ['1', 'número'],
      ['"a"', 'texto'],
      ['verdadeiro', 'lógico'],
      ['Nada', 'Nada'],
      ['[]', 'lista'],
      ['{}', 'dicionário'],
      ['1 até 2', 'intervalo'],
      ['exiba', 'função'],
      ['função()\nfim', 'função'],
    ])('tipo(%s) is %s', (value, expected) => {
      expect(run(`tipo(${value})`)).toBe(expected);
    });

    it('texto gives the display form', () => {
      expect(run('texto(1.5)')).toBe('1.5');
      expect(run('texto([1, "a"])')).toBe('[1, "a"]');
      expect(run('texto(infinito)')).toBe('infinito');
      expect(run('texto(-infinito)')).toBe('-infinito');
      expect(run('texto(exiba)')).toBe('<função nativa exiba>');
      expect(run('função dobro(x)\nretorna x * 2\nfim\ntexto(dobro)')).toBe(
        '<função dobro>'
      );
    });

    it('número parses decimal text', () => {
      expect(run('número("42")')).toBe(42);
      expect(run('número(" 3.5 ")')).toBe(3.5);
      expect(run('número(7)')).toBe(7);
    });

    it('número rejects text that is not a number', () => {
      const diagnostic = runDiagnostic('número("abc")');
      expect(diagnostic).toMatchObject({
        kind: 'InvalidArgument',
        callee: 'número',
        reason: '"abc" não é um número',
      });
      expect(diagnosticMessage(diagnostic)).toBe(
        'Argumento inválido para número: "abc" não é um número'
      );
      expect(runDiagnostic('número([1])')).toMatchObject({
        kind: 'TypeMismatch',
        operation: 'número',
        operands: ['lista'],
      });
    });

    it('tamanho counts items, characters, entries and range members', () => {
      expect(run('tamanho([1, 2])')).toBe(2);
      expect(run('tamanho("olá")')).toBe(3);
      expect(run('tamanho({ a: 1 })')).toBe(1);
      expect(run('tamanho(1 até 4)')).toBe(4);
      expect(runDiagnostic('tamanho(5)').kind).toBe('TypeMismatch');
    });

    it('exposes infinito and NaN', () => {
      expect(run('infinito > 1000')).toBe(true);
      expect(run('NaN')).toBeNaN();
    });
  });

  describe('Lista', () => {
    it('reports size and emptiness', () => {
      expect(run('Lista.tamanho([1, 2, 3])')).toBe(3);
      expect(run('Lista.vazio([])')).toBe(true);
    });

    it('mutates in place', () => {
      expect(display('seja l = [1]\nLista.insira(l, 2)\nl')).toBe('[1, 2]');
      expect(display('seja l = [1, 2, 3, 2]\nLista.remova(l, 2)\nl')).toBe(
        '[1, 3, 2]'
      );
      expect(run('Lista.remova([1, 2], 2)')).toBe(2);
      expect(run('Lista.remova([1], 5)')).toBeNull();
      expect(display('seja l = [1, 2, 3]\nLista.remova_por_índice(l, 0)\nl')).toBe(
        '[2, 3]'
      );
      expect(display('seja l = [1, 2]\nLista.limpa(l)\nl')).toBe('[]');
    });

    it('accepts a list inserted into itself', () => {
      expect(run('seja l = [1]\nLista.insira(l, l)\ntexto(l)')).toBe('[1, [...]]');
      const source = [
        'seja a = [1]',
        'Lista.insira(a, a)',
        'seja b = [1]',
        'Lista.insira(b, b)',
        'a é b',
      ].join('\n');
      expect(run(source)).toBe(true);
    });

    it('rejects removing past the end', () => {
      expect(runDiagnostic('Lista.remova_por_índice([1, 2], 5)')).toMatchObject({
        kind: 'IndexOutOfBounds',
        index: 5,
        length: 2,
      });
    });

    it('searches by structural equality', () => {
      expect(run('Lista.contém([[1], [2]], [2])')).toBe(true);
      expect(run('Lista.índice_de(["a", "b"], "b")')).toBe(1);
      expect(run('Lista.índice_de(["a"], "z")')).toBeNull();
    });

    it('builds new lists', () => {
      expect(display('Lista.inverta([1, 2, 3])')).toBe('[3, 2, 1]');
      expect(display('Lista.fatia([1, 2, 3, 4], 1, 2)')).toBe('[2, 3]');
      expect(run('Lista.junte([1, "a", verdadeiro], "-")')).toBe(
        '1-a-verdadeiro'
      );
    });

    it('validates fatia bounds', () => {
      expect(runDiagnostic('Lista.fatia([1, 2, 3], 2, 1)')).toMatchObject({
        kind: 'InvalidRangeBounds',
        start: '2',
        end: '1',
      });
      expect(runDiagnostic('Lista.fatia([1, 2], 0, 2)')).toMatchObject({
        kind: 'IndexOutOfBounds',
        index: 2,
        length: 2,
      });
      expect(runDiagnostic('Lista.fatia([1, 2], -1, 1)')).toMatchObject({
        kind: 'InvalidIndex',
        index: '-1',
      });
    });

    it('maps, filters and reduces with any callable', () => {
      expect(
        display('Lista.mapeie([1, 2, 3], função(x)\nretorna x * 2\nfim)')
      ).toBe('[2, 4, 6]');
      expect(display('seja dobro(x) = x * 2\nLista.mapeie([1, 2], dobro)')).toBe(
        '[2, 4]'
      );
      expect(display('Lista.mapeie([1, "a"], tipo)')).toBe('["número", "texto"]');
      expect(
        display('Lista.filtre([1, 2, 3, 4], função(x)\nretorna x % 2 é 0\nfim)')
      ).toBe('[2, 4]');
      expect(
        run('Lista.reduza([1, 2, 3], função(acc, x)\nretorna acc + x\nfim, 10)')
      ).toBe(16);
    });

    it('propagates callback errors', () => {
      expect(
        runDiagnostic('Lista.mapeie([1], função(x)\nretorna x / 0\nfim)').kind
      ).toBe('DivisionByZero');
    });

    it('applies the call contract to callbacks', () => {
      const diagnostic = runDiagnostic(
        'Lista.mapeie([1], função(a, b)\nretorna a\nfim)'
      );
      expect(diagnostic).toMatchObject({ kind: 'ArityMismatch', callee: null });
      expect(diagnosticMessage(diagnostic)).toBe(
        'A função esperava 2 argumento(s), mas recebeu 1'
      );
    });

    it('sorts numbers or texts into a new list', () => {
      expect(display('Lista.ordene([3, 1, 2])')).toBe('[1, 2, 3]');
      expect(display('Lista.ordene(["b", "a"])')).toBe('["a", "b"]');
      expect(display('seja l = [2, 1]\nLista.ordene(l)\nl')).toBe('[2, 1]');
      expect(runDiagnostic('Lista.ordene([1, "a"])')).toMatchObject({
        kind: 'TypeMismatch',
        expected: 'lista de números ou de textos',
      });
    });

    it('names every argument type on mismatch', () => {
      const diagnostic = runDiagnostic('Lista.tamanho(5)');
      expect(diagnostic).toMatchObject({
        kind: 'TypeMismatch',
        operation: 'Lista.tamanho',
        operands: ['número'],
        expected: 'lista',
      });
      expect(diagnostic.span?.start.column).toBe(1);
      expect(diagnosticMessage(diagnostic)).toBe(
        "Operação 'Lista.tamanho' não suportada para número"
      );
    });
  });

  describe('Texto', () => {
    it('transforms text', () => {
      expect(run('Texto.para_maiúsculas("olá")')).toBe('OLÁ');
      expect(run('Texto.para_minúsculas("ABC")')).toBe('abc');
      expect(run('Texto.apare("  x  ")')).toBe('x');
      expect(run('Texto.substitua("a-b-c", "-", "+")')).toBe('a+b+c');
    });

    it('splits text', () => {
      expect(display('Texto.divida("a,b", ",")')).toBe('["a", "b"]');
      expect(display('Texto.divida("ab", "")')).toBe('["a", "b"]');
      expect(display('Texto.para_lista("oi")')).toBe('["o", "i"]');
    });

    it('answers questions about text', () => {
      expect(run('Texto.tamanho("ação")')).toBe(4);
      expect(run('Texto.vazio("")')).toBe(true);
      expect(run('Texto.contém("banana", "nan")')).toBe(true);
      expect(run('Texto.começa_com("banana", "ba")')).toBe(true);
      expect(run('Texto.termina_com("banana", "ba")')).toBe(false);
    });

    it('rejects an empty search text', () => {
      expect(runDiagnostic('Texto.substitua("abc", "", "x")')).toMatchObject({
        kind: 'InvalidArgument',
        callee: 'Texto.substitua',
      });
    });

    it('rejects arguments that are not text', () => {
      expect(runDiagnostic('Texto.tamanho(1)')).toMatchObject({
        kind: 'TypeMismatch',
        operation: 'Texto.tamanho',
        expected: 'texto',
      });
    });
  });

  describe('Matemática', () => {
    it('exposes constants', () => {
      expect(run('Matemática.pi')).toBe(Math.PI);
      expect(run('Matemática.e')).toBe(Math.E);
    });

    it('rounds halves away from zero', () => {
      expect(run('Matemática.arredonda(2.5)')).toBe(3);
      expect(run('Matemática.arredonda(-2.5)')).toBe(-3);
      expect(run('Matemática.piso(-1.5)')).toBe(-2);
      expect(run('Matemática.teto(1.2)')).toBe(2);
      expect(run('Matemática.trunca(-1.7)')).toBe(-1);
    });

    it('computes numeric functions', () => {
      expect(run('Matemática.raiz_quadrada(9)')).toBe(3);
      expect(run('Matemática.potência(2, 8)')).toBe(256);
      expect(run('Matemática.mínimo(3, 1)')).toBe(1);
      expect(run('Matemática.máximo(3, 1)')).toBe(3);
      expect(run('Matemática.absoluto(-4)')).toBe(4);
      expect(run('Matemática.sinal(-3)')).toBe(-1);
    });

    it('draws from the configured random source', () => {
      expect(run('Matemática.aleatório(10, 20)', { random: () => 0.5 })).toBe(15);
    });

    it('rejects arguments that are not numbers', () => {
      expect(runDiagnostic('Matemática.piso("1")')).toMatchObject({
        kind: 'TypeMismatch',
        operation: 'Matemática.piso',
        expected: 'número',
      });
    });
  });

  describe('isolation', () => {
    it('builds the prelude dictionaries per context', () => {
      expect(run('Lista.tamanho = 99\nLista.tamanho')).toBe(99);
      expect(run('Lista.tamanho([1, 2])')).toBe(2);
    });

    it('keeps the prelude names themselves read-only', () => {
      expect(runDiagnostic('Lista = 1')).toMatchObject({
        kind: 'ImmutableBinding',
        name: 'Lista',
      });
    });
  });

  describe('host functions', () => {
    it('joins the prelude with the call contract', () => {
      const functions = {
        dobro: {
          arity: 1,
          fn: ([value = null]: unknown[]) =>
            ok(typeof value === 'number' ? value * 2 : null),
        },
      };
      expect(run('dobro(4)', { functions })).toBe(8);
      expect(runDiagnostic('dobro()', { functions })).toMatchObject({
        kind: 'ArityMismatch',
        callee: 'dobro',
      });
    });

    it('can call back into the program', () => {
      const source = 'aplique(função(x)\nretorna x + 1\nfim, 1)';
      const ctx = createRuntimeContext({
        functions: {
          aplique: {
            arity: 2,
            fn: (args, host) => host.invoke(args[0] ?? null, [args[1] ?? null]),
          },
        },
      });
      expect(execute(parse(source), ctx)).toMatchObject({ ok: true, value: 2 });
    });

    it('can log through the runtime', () => {
      const logs: string[] = [];
      const ctx = createRuntimeContext({
        callbacks: { onLog: (text) => logs.push(text) },
        functions: {
          avise: {
            arity: { min: 0, max: null },
            fn: (args, host) => {
              host.log(`avisos: ${args.length}`);
              return ok(null);
            },
          },
        },
      });
      execute(parse('avise(1, 2, 3)'), ctx);
      expect(logs).toEqual(['avisos: 3']);
    });
  });
});
