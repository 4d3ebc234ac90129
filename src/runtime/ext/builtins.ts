/**
 * Built-in Functions
 *
 * The prelude: top-level functions, number constants and the Lista,
 * Texto and Matemática dictionaries. Built fresh for every runtime
 * context, so a program that mutates a prelude dictionary affects only
 * its own execution.
 *
 * Host applications add domain-specific functions via RuntimeOptions.
 *
 * @internal - Not part of public API
 */

import { createNative, type NativeCallable } from '../core/callable.js';
import { ok } from '../core/signals.js';
import {
  createDict,
  formatValue,
  isDict,
  isList,
  isRange,
  rangeLength,
  typeName,
  type TendaValue,
} from '../core/values.js';
import { invalidArgument, wrongType } from './arguments.js';
import { createListaFunctions } from './lista.js';
import { createMatematicaEntries } from './matematica.js';
import { createTextoFunctions } from './texto.js';

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: readonly NativeCallable[] = [
  /** Write the display form through the log callback */
  createNative('exiba', 1, (args, host) => {
    host.log(formatValue(args[0] ?? null));
    return ok(null);
  }),

  createNative('tipo', 1, (args) => ok(typeName(args[0] ?? null))),

  createNative('texto', 1, (args) => ok(formatValue(args[0] ?? null))),

  /** Parse decimal text; numbers pass through */
  createNative('número', 1, (args) => {
    const value = args[0] ?? null;
    if (typeof value === 'number') return ok(value);
    if (typeof value !== 'string') return wrongType('número', args, 'texto');

    const trimmed = value.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || Number.isNaN(parsed)) {
      return invalidArgument('número', `"${value}" não é um número`);
    }
    return ok(parsed);
  }),

  createNative('tamanho', 1, (args) => {
    const value = args[0] ?? null;
    if (isList(value)) return ok(value.items.length);
    if (typeof value === 'string') return ok([...value].length);
    if (isDict(value)) return ok(value.entries.size);
    if (isRange(value)) return ok(rangeLength(value));
    return wrongType('tamanho', args, 'lista, texto, dicionário ou intervalo');
  }),
];

/**
 * Every prelude binding by name.
 *
 * @param random - source for Matemática.aleatório
 */
export function createBuiltins(
  random?: () => number
): Record<string, TendaValue> {
  const builtins: Record<string, TendaValue> = {
    infinito: Infinity,
    NaN: NaN,
    Lista: createDict(createListaFunctions()),
    Texto: createDict(createTextoFunctions()),
    Matemática: createDict(createMatematicaEntries(random)),
  };
  for (const fn of BUILTIN_FUNCTIONS) {
    builtins[fn.name] = fn;
  }
  return builtins;
}
