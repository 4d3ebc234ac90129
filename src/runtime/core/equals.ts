/**
 * Value Equality
 * Structural comparison behind the `é` operator
 */

import type { TendaDict, TendaList, TendaValue } from './values.js';

/**
 * Structural equality: lists, dictionaries and ranges compare by content,
 * functions by identity. NaN equals nothing. A pair of collections met
 * again while it is still being compared counts as equal.
 */
export function valuesEqual(a: TendaValue, b: TendaValue): boolean {
  return equalWithin(a, b, new Map());
}

/** `open` maps each collection under comparison to its counterparts */
function equalWithin(
  a: TendaValue,
  b: TendaValue,
  open: Map<TendaList | TendaDict, Set<TendaList | TendaDict>>
): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a === null || b === null) return false;

  if (a.kind === 'list' && b.kind === 'list') {
    if (a.items.length !== b.items.length) return false;
    return comparing(a, b, open, () =>
      a.items.every((item, i) => equalWithin(item, b.items[i] ?? null, open))
    );
  }

  if (a.kind === 'dict' && b.kind === 'dict') {
    if (a.entries.size !== b.entries.size) return false;
    return comparing(a, b, open, () => {
      for (const [key, value] of a.entries) {
        if (!b.entries.has(key)) return false;
        if (!equalWithin(value, b.entries.get(key) ?? null, open)) return false;
      }
      return true;
    });
  }

  if (a.kind === 'range' && b.kind === 'range') {
    return a.start === b.start && a.end === b.end;
  }

  return false;
}

function comparing(
  a: TendaList | TendaDict,
  b: TendaList | TendaDict,
  open: Map<TendaList | TendaDict, Set<TendaList | TendaDict>>,
  compare: () => boolean
): boolean {
  let counterparts = open.get(a);
  if (counterparts?.has(b)) return true;
  if (counterparts === undefined) {
    counterparts = new Set();
    open.set(a, counterparts);
  }
  counterparts.add(b);
  try {
    return compare();
  } finally {
    counterparts.delete(b);
  }
}
