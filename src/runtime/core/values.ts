/**
 * Value Types and Utilities
 *
 * The closed union of runtime values plus type names, truthiness and the
 * display form used by exiba, text concatenation and error messages.
 */

import type { NativeCallable, TendaFunction } from './callable.js';

/** Dictionary keys: text or integral numbers */
export type DictKey = string | number;

/** Ordered list; shared by reference between every binding that holds it */
export interface TendaList {
  readonly kind: 'list';
  readonly items: TendaValue[];
}

/** Insertion-ordered dictionary; shared by reference like lists */
export interface TendaDict {
  readonly kind: 'dict';
  readonly entries: Map<DictKey, TendaValue>;
}

/** Inclusive integral range `start até end` */
export interface TendaRange {
  readonly kind: 'range';
  readonly start: number;
  readonly end: number;
}

/** Any runtime value. `null` is Nada. */
export type TendaValue =
  | number
  | string
  | boolean
  | null
  | TendaList
  | TendaDict
  | TendaRange
  | TendaFunction
  | NativeCallable;

/** Type names as the language spells them */
export type TendaTypeName =
  | 'número'
  | 'texto'
  | 'lógico'
  | 'Nada'
  | 'lista'
  | 'dicionário'
  | 'intervalo'
  | 'função';

// ============================================================
// CONSTRUCTORS AND GUARDS
// ============================================================

export function createList(items: TendaValue[] = []): TendaList {
  return { kind: 'list', items };
}

export function createDict(
  entries: Iterable<[DictKey, TendaValue]> = []
): TendaDict {
  return { kind: 'dict', entries: new Map(entries) };
}

export function createRange(start: number, end: number): TendaRange {
  return { kind: 'range', start, end };
}

export function isList(value: TendaValue): value is TendaList {
  return typeof value === 'object' && value !== null && value.kind === 'list';
}

export function isDict(value: TendaValue): value is TendaDict {
  return typeof value === 'object' && value !== null && value.kind === 'dict';
}

export function isRange(value: TendaValue): value is TendaRange {
  return typeof value === 'object' && value !== null && value.kind === 'range';
}

export function isCallable(
  value: TendaValue
): value is TendaFunction | NativeCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    (value.kind === 'function' || value.kind === 'native')
  );
}

/** Integral finite number, usable as an index or a range bound */
export function isInteger(value: TendaValue): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/** Convert a value to a dictionary key, or null when it cannot be one */
export function toDictKey(value: TendaValue): DictKey | null {
  if (typeof value === 'string') return value;
  if (isInteger(value)) return value;
  return null;
}

/** Number of integers in a range; descending ranges are empty */
export function rangeLength(range: TendaRange): number {
  return Math.max(0, range.end - range.start + 1);
}

// ============================================================
// TYPE NAMES AND TRUTHINESS
// ============================================================

export function typeName(value: TendaValue): TendaTypeName {
  if (value === null) return 'Nada';
  switch (typeof value) {
    case 'number':
      return 'número';
    case 'string':
      return 'texto';
    case 'boolean':
      return 'lógico';
  }
  switch (value.kind) {
    case 'list':
      return 'lista';
    case 'dict':
      return 'dicionário';
    case 'range':
      return 'intervalo';
    case 'function':
    case 'native':
      return 'função';
  }
}

/** `falso`, `Nada` and zero are false; everything else is true */
export function isTruthy(value: TendaValue): boolean {
  return value !== false && value !== null && value !== 0;
}

// ============================================================
// DISPLAY
// ============================================================

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'infinito';
  if (value === -Infinity) return '-infinito';
  return String(value);
}

function formatKey(key: DictKey): string {
  return typeof key === 'string' ? JSON.stringify(key) : formatNumber(key);
}

/**
 * Display form of a value. Text is raw at the top level and quoted inside
 * collections. A list or dictionary met again inside itself prints as
 * `[...]` or `{...}`.
 */
export function formatValue(value: TendaValue, nested = false): string {
  return formatWithin(value, nested, new Set());
}

/** `open`: the collections being printed around `value` */
function formatWithin(
  value: TendaValue,
  nested: boolean,
  open: Set<TendaList | TendaDict>
): string {
  if (value === null) return 'Nada';
  switch (typeof value) {
    case 'number':
      return formatNumber(value);
    case 'string':
      return nested ? JSON.stringify(value) : value;
    case 'boolean':
      return value ? 'verdadeiro' : 'falso';
  }
  switch (value.kind) {
    case 'list': {
      if (open.has(value)) return '[...]';
      open.add(value);
      const items = value.items.map((item) => formatWithin(item, true, open));
      open.delete(value);
      return `[${items.join(', ')}]`;
    }
    case 'dict': {
      if (value.entries.size === 0) return '{}';
      if (open.has(value)) return '{...}';
      open.add(value);
      const parts = [...value.entries].map(
        ([key, item]) => `${formatKey(key)}: ${formatWithin(item, true, open)}`
      );
      open.delete(value);
      return `{ ${parts.join(', ')} }`;
    }
    case 'range':
      return `${formatNumber(value.start)} até ${formatNumber(value.end)}`;
    case 'function': {
      const name = value.metadata.name;
      return name === undefined ? '<função>' : `<função ${name}>`;
    }
    case 'native':
      return `<função nativa ${value.name}>`;
  }
}
