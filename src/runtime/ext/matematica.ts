/**
 * Matemática: numeric constants and functions
 * @internal
 */

import { createNative, type NativeCallable } from '../core/callable.js';
import { ok } from '../core/signals.js';
import type { TendaValue } from '../core/values.js';
import { numberArg } from './arguments.js';

/** Native over number arguments only */
function numeric(
  name: string,
  arity: number,
  fn: (...numbers: number[]) => number
): [string, NativeCallable] {
  const callee = `Matemática.${name}`;
  return [
    name,
    createNative(callee, arity, (args) => {
      const numbers: number[] = [];
      for (let i = 0; i < arity; i++) {
        const value = numberArg(args, i, callee);
        if (!value.ok) return value;
        numbers.push(value.value);
      }
      return ok(fn(...numbers));
    }),
  ];
}

/** Halves round away from zero */
function roundHalfAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

export function createMatematicaEntries(
  random: () => number = Math.random
): [string, TendaValue][] {
  return [
    ['pi', Math.PI],
    ['e', Math.E],
    numeric('absoluto', 1, (n = 0) => Math.abs(n)),
    numeric('arredonda', 1, (n = 0) => roundHalfAway(n)),
    numeric('piso', 1, (n = 0) => Math.floor(n)),
    numeric('teto', 1, (n = 0) => Math.ceil(n)),
    numeric('trunca', 1, (n = 0) => Math.trunc(n)),
    numeric('raiz_quadrada', 1, (n = 0) => Math.sqrt(n)),
    numeric('potência', 2, (base = 0, exponent = 0) => base ** exponent),
    numeric('mínimo', 2, (a = 0, b = 0) => Math.min(a, b)),
    numeric('máximo', 2, (a = 0, b = 0) => Math.max(a, b)),
    numeric('sinal', 1, (n = 0) => Math.sign(n)),
    /** Uniform in [mínimo, máximo) */
    numeric('aleatório', 2, (min = 0, max = 0) => random() * (max - min) + min),
  ];
}
