/**
 * Lista: list built-ins
 *
 * Mutating functions (insira, remova, remova_por_índice, limpa) change
 * the list in place and every alias sees the change. The others build a
 * new list.
 *
 * @internal
 */

import { createNative, type NativeCallable } from '../core/callable.js';
import { valuesEqual } from '../core/equals.js';
import { ok } from '../core/signals.js';
import {
  createList,
  formatValue,
  isTruthy,
  type TendaValue,
} from '../core/values.js';
import {
  callableArg,
  failWith,
  listArg,
  positionArg,
  textArg,
  wrongType,
} from './arguments.js';

function native(
  name: string,
  arity: number,
  fn: NativeCallable['fn']
): [string, NativeCallable] {
  return [name, createNative(`Lista.${name}`, arity, fn)];
}

function isNumber(value: TendaValue): value is number {
  return typeof value === 'number';
}

function isText(value: TendaValue): value is string {
  return typeof value === 'string';
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function createListaFunctions(): [string, NativeCallable][] {
  return [
    native('tamanho', 1, (args) => {
      const list = listArg(args, 0, 'Lista.tamanho');
      return list.ok ? ok(list.value.items.length) : list;
    }),

    native('vazio', 1, (args) => {
      const list = listArg(args, 0, 'Lista.vazio');
      return list.ok ? ok(list.value.items.length === 0) : list;
    }),

    native('insira', 2, (args) => {
      const list = listArg(args, 0, 'Lista.insira');
      if (!list.ok) return list;
      list.value.items.push(args[1] ?? null);
      return ok(null);
    }),

    /** Removes the first equal item and returns it, or Nada */
    native('remova', 2, (args) => {
      const list = listArg(args, 0, 'Lista.remova');
      if (!list.ok) return list;
      const { items } = list.value;
      const index = items.findIndex((item) => valuesEqual(item, args[1] ?? null));
      if (index === -1) return ok(null);
      const [removed] = items.splice(index, 1);
      return ok(removed ?? null);
    }),

    native('remova_por_índice', 2, (args) => {
      const list = listArg(args, 0, 'Lista.remova_por_índice');
      if (!list.ok) return list;
      const index = positionArg(args, 1, 'Lista.remova_por_índice');
      if (!index.ok) return index;
      const { items } = list.value;
      if (index.value >= items.length) {
        return failWith({
          kind: 'IndexOutOfBounds',
          index: index.value,
          length: items.length,
        });
      }
      const [removed] = items.splice(index.value, 1);
      return ok(removed ?? null);
    }),

    native('limpa', 1, (args) => {
      const list = listArg(args, 0, 'Lista.limpa');
      if (!list.ok) return list;
      list.value.items.length = 0;
      return ok(null);
    }),

    native('contém', 2, (args) => {
      const list = listArg(args, 0, 'Lista.contém');
      if (!list.ok) return list;
      return ok(list.value.items.some((item) => valuesEqual(item, args[1] ?? null)));
    }),

    /** Position of the first equal item, or Nada */
    native('índice_de', 2, (args) => {
      const list = listArg(args, 0, 'Lista.índice_de');
      if (!list.ok) return list;
      const index = list.value.items.findIndex((item) =>
        valuesEqual(item, args[1] ?? null)
      );
      return ok(index === -1 ? null : index);
    }),

    native('inverta', 1, (args) => {
      const list = listArg(args, 0, 'Lista.inverta');
      return list.ok ? ok(createList([...list.value.items].reverse())) : list;
    }),

    /** Items from `início` to `fim`, both inclusive */
    native('fatia', 3, (args) => {
      const list = listArg(args, 0, 'Lista.fatia');
      if (!list.ok) return list;
      const start = positionArg(args, 1, 'Lista.fatia');
      if (!start.ok) return start;
      const end = positionArg(args, 2, 'Lista.fatia');
      if (!end.ok) return end;

      const { items } = list.value;
      if (start.value > end.value) {
        return failWith({
          kind: 'InvalidRangeBounds',
          start: String(start.value),
          end: String(end.value),
        });
      }
      if (end.value >= items.length) {
        return failWith({
          kind: 'IndexOutOfBounds',
          index: end.value,
          length: items.length,
        });
      }
      return ok(createList(items.slice(start.value, end.value + 1)));
    }),

    native('junte', 2, (args) => {
      const list = listArg(args, 0, 'Lista.junte');
      if (!list.ok) return list;
      const separator = textArg(args, 1, 'Lista.junte');
      if (!separator.ok) return separator;
      return ok(
        list.value.items.map((item) => formatValue(item)).join(separator.value)
      );
    }),

    native('mapeie', 2, (args, host) => {
      const list = listArg(args, 0, 'Lista.mapeie');
      if (!list.ok) return list;
      const fn = callableArg(args, 1, 'Lista.mapeie');
      if (!fn.ok) return fn;

      const mapped: TendaValue[] = [];
      for (const item of [...list.value.items]) {
        const result = host.invoke(fn.value, [item]);
        if (!result.ok) return result;
        mapped.push(result.value);
      }
      return ok(createList(mapped));
    }),

    native('filtre', 2, (args, host) => {
      const list = listArg(args, 0, 'Lista.filtre');
      if (!list.ok) return list;
      const fn = callableArg(args, 1, 'Lista.filtre');
      if (!fn.ok) return fn;

      const kept: TendaValue[] = [];
      for (const item of [...list.value.items]) {
        const result = host.invoke(fn.value, [item]);
        if (!result.ok) return result;
        if (isTruthy(result.value)) kept.push(item);
      }
      return ok(createList(kept));
    }),

    native('reduza', 3, (args, host) => {
      const list = listArg(args, 0, 'Lista.reduza');
      if (!list.ok) return list;
      const fn = callableArg(args, 1, 'Lista.reduza');
      if (!fn.ok) return fn;

      let accumulator: TendaValue = args[2] ?? null;
      for (const item of [...list.value.items]) {
        const result = host.invoke(fn.value, [accumulator, item]);
        if (!result.ok) return result;
        accumulator = result.value;
      }
      return ok(accumulator);
    }),

    /** Ascending copy; all numbers or all texts */
    native('ordene', 1, (args) => {
      const list = listArg(args, 0, 'Lista.ordene');
      if (!list.ok) return list;

      const items = list.value.items;
      if (items.every((item) => typeof item === 'number')) {
        return ok(createList(items.filter(isNumber).sort((a, b) => a - b)));
      }
      if (items.every((item) => typeof item === 'string')) {
        return ok(createList(items.filter(isText).sort(compareText)));
      }
      return wrongType('Lista.ordene', args, 'lista de números ou de textos');
    }),
  ];
}
