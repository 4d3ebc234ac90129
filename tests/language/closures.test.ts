/**
 * Tenda Runtime Tests: Functions and Closures
 *
 * Redeclaration and shadowing, capture visibility, parameter shadowing,
 * frame balance, arity checks, recursion and fatal diagnostics.
 */

import { describe, expect, it } from 'vitest';

import {
  createRuntimeContext,
  diagnosticMessage,
  execute,
  formatValue,
  ok,
  parse,
  type RuntimeContext,
} from '../../src/index.js';
import {
  run,
  runDiagnostic,
  runWithContext,
} from '../helpers/runtime.js';

function display(source: string): string {
  return formatValue(run(source), true);
}

describe('Tenda Runtime: Closures', () => {
  describe('capture visibility', () => {
    it('sees assignments made after the closure was created', () => {
      const source = `
        seja x = 1
        seja f = função()
          retorna x
        fim
        x = 2
        f()
      `;
      expect(run(source)).toBe(2);
    });

    it('writes through to the defining scope', () => {
      const source = `
        seja total = 0
        seja some = função(n)
          total = total + n
        fim
        some(2)
        some(3)
        total
      `;
      expect(run(source)).toBe(5);
    });

    it('does not change values copied before the assignment', () => {
      const source = `
        seja x = 1
        seja y = x
        seja f = função()
          retorna x
        fim
        x = 2
        y
      `;
      expect(run(source)).toBe(1);
    });

    it('keeps independent state per closure instance', () => {
      const source = `
        seja contador() = faça
          seja n = 0
          retorna faça
            n = n + 1
            retorna n
          fim
        fim
        seja c1 = contador()
        seja a = c1()
        seja b = c1()
        seja c2 = contador()
        seja c = c2()
        [a, b, c]
      `;
      expect(display(source)).toBe('[1, 2, 1]');
    });

    it('resolves free names in the defining module, not the caller', () => {
      const source = `
        função leia()
          retorna segredo
        fim
        função chame()
          seja segredo = 1
          retorna leia()
        fim
        chame()
      `;
      expect(runDiagnostic(source)).toMatchObject({
        kind: 'UndefinedVariable',
        name: 'segredo',
      });
    });
  });

  describe('parameters', () => {
    it('shadow captured names of the same spelling', () => {
      const source = `
        seja x = "fora"
        seja f = função(x)
          retorna x
        fim
        x = "mudou"
        f("dentro")
      `;
      expect(run(source)).toBe('dentro');
    });

    it('take defaults evaluated in the call frame', () => {
      const source = `
        função soma(a, b = a * 10)
          retorna a + b
        fim
        [soma(1), soma(1, 2)]
      `;
      expect(display(source)).toBe('[11, 3]');
    });

    it('collect remaining arguments in a variadic list', () => {
      const source = `
        função junte(primeiro, ...resto)
          retorna [primeiro, resto]
        fim
        [junte(1), junte(1, 2, 3)]
      `;
      expect(display(source)).toBe('[[1, []], [1, [2, 3]]]');
    });

    it('are captured per call', () => {
      const source = `
        função soma_com(n)
          retorna função(x)
            retorna x + n
          fim
        fim
        seja mais1 = soma_com(1)
        seja mais10 = soma_com(10)
        [mais1(5), mais10(5)]
      `;
      expect(display(source)).toBe('[6, 15]');
    });
  });

  describe('arity', () => {
    it('rejects a wrong argument count', () => {
      const diagnostic = runDiagnostic('função f(a, b)\nfim\nf(1)');
      expect(diagnostic).toMatchObject({
        kind: 'ArityMismatch',
        callee: 'f',
        expected: { min: 2, max: 2 },
        found: 1,
      });
      expect(diagnosticMessage(diagnostic)).toBe(
        'f esperava 2 argumento(s), mas recebeu 1'
      );
    });

    it('describes ranges and variadic minimums', () => {
      expect(
        diagnosticMessage(runDiagnostic('função f(a, b = 1)\nfim\nf()'))
      ).toBe('f esperava de 1 a 2 argumento(s), mas recebeu 0');
      expect(
        diagnosticMessage(runDiagnostic('função f(a, ...b)\nfim\nf()'))
      ).toBe('f esperava pelo menos 1 argumento(s), mas recebeu 0');
    });

    it('runs no part of the body on mismatch', () => {
      const source = `
        seja chamadas = 0
        função f(a, b)
          chamadas = chamadas + 1
        fim
        tente
          f(1)
        capture erro
        fim
        chamadas
      `;
      expect(run(source)).toBe(0);
    });

    it('rejects calling values that are not functions', () => {
      expect(runDiagnostic('seja x = 1\nx()')).toMatchObject({
        kind: 'NotCallable',
        valueType: 'número',
      });
    });
  });

  describe('recursion', () => {
    it('lets a declared function call itself', () => {
      const source = `
        função fat(n)
          se n <= 1 então
            retorna 1
          fim
          retorna n * fat(n - 1)
        fim
        fat(5)
      `;
      expect(run(source)).toBe(120);
    });

    it('works for the expression form', () => {
      const source = `
        seja fib(n) = faça
          se n < 2 então
            retorna n
          fim
          retorna fib(n - 1) + fib(n - 2)
        fim
        fib(10)
      `;
      expect(run(source)).toBe(55);
    });

    it('works for functions declared inside other functions', () => {
      const source = `
        seja r = faça
          função conta(n)
            se n é 0 então
              retorna 0
            fim
            retorna 1 + conta(n - 1)
          fim
          retorna conta(3)
        fim
        r()
      `;
      expect(run(source)).toBe(3);
    });

    it('works for a function value bound with seja inside a function', () => {
      const source = `
        seja g() = faça
          seja f = função(n)
            se n é 0 então
              retorna 0
            fim
            retorna 1 + f(n - 1)
          fim
          retorna f(3)
        fim
        g()
      `;
      expect(run(source)).toBe(3);
    });

    it('lets nested closures reach the seja-bound function', () => {
      const source = `
        seja g() = faça
          seja conta = função(n)
            seja passo = função()
              retorna conta(n - 1)
            fim
            se n é 0 então
              retorna "pronto"
            fim
            retorna passo()
          fim
          retorna conta(2)
        fim
        g()
      `;
      expect(run(source)).toBe('pronto');
    });
  });

  describe('frame balance', () => {
    it('restores the stack after every kind of exit', () => {
      const source = `
        seja antes = profundidade()
        função f(n)
          se n é 0 então
            retorna profundidade()
          fim
          para cada i em 1 até 3 faça
            se i é 1 então
              continue
            fim
            se i é 2 então
              pare
            fim
          fim
          seja k = 0
          enquanto k < 2 faça
            k = k + 1
            continue
          fim
          tente
            lance "x"
          capture
          fim
          retorna f(n - 1)
        fim
        seja dentro = f(2)
        seja depois = profundidade()
      `;
      let measured: RuntimeContext | undefined;
      const ctx = createRuntimeContext({
        functions: {
          profundidade: { arity: 0, fn: () => ok(measured?.stack.depth ?? -1) },
        },
      });
      measured = ctx;

      const result = execute(parse(source), ctx);
      // three calls of f, each with its body frame, the se branch and the native call
      expect(result).toMatchObject({
        ok: true,
        variables: { antes: 1, dentro: 8, depois: 1 },
      });
      expect(ctx.stack.depth).toBe(0);
      expect(ctx.stack.callDepth).toBe(0);
    });

    it('restores the stack after a failed execution', () => {
      const source = `
        função g()
          se verdadeiro então
            lance "erro"
          fim
        fim
        g()
      `;
      const { result, ctx } = runWithContext(source);
      expect(result.ok).toBe(false);
      expect(ctx.stack.depth).toBe(0);
      expect(ctx.stack.callDepth).toBe(0);
    });
  });

  describe('fatal diagnostics', () => {
    it('lets handlers catch errors raised inside loops', () => {
      const source = `
        seja erros = 0
        para cada i em [1, 2, 3] faça
          tente
            se i é 2 então
              lance "falhou"
            fim
          capture erro
            erros = erros + 1
          fim
        fim
        erros
      `;
      expect(run(source)).toBe(1);
    });

    it('continues after a handler outside the loop', () => {
      const source = `
        seja capturado = Nada
        tente
          para cada i em [1, 2] faça
            lance i
          fim
        capture erro
          capturado = erro
        fim
        capturado
      `;
      expect(run(source)).toBe(1);
    });

    it('stops runaway recursion with a diagnostic no handler catches', () => {
      const source = `
        função infinita(n)
          retorna infinita(n + 1)
        fim
        tente
          infinita(0)
        capture erro
          "capturado"
        fim
      `;
      const { result, ctx } = runWithContext(source, { maxCallStackDepth: 50 });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.diagnostic).toMatchObject({
        kind: 'StackOverflow',
        limit: 50,
      });
      expect(result.diagnostic.stack).toHaveLength(51);
      expect(result.diagnostic.stack[0]?.functionName).toBe('infinita');
      expect(diagnosticMessage(result.diagnostic)).toBe(
        'Limite de 50 chamadas aninhadas excedido'
      );
      expect(ctx.stack.callDepth).toBe(0);
    });

    it('turns host stack exhaustion into the same diagnostic', () => {
      const diagnostic = runDiagnostic('estoura()', {
        functions: {
          estoura: {
            arity: 0,
            fn: () => {
              throw new RangeError('Maximum call stack size exceeded');
            },
          },
        },
      });
      expect(diagnostic).toMatchObject({ kind: 'StackOverflow', limit: 256 });
    });
  });
});
