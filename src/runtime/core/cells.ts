/**
 * Value Cells
 *
 * Storage slot of a binding. An Owned cell holds a private value and is
 * replaced wholesale on assignment. A Shared cell points at a mutable
 * reference that every holder (the defining scope and each capturing
 * closure snapshot) sees, so writes through it are visible to all.
 */

import type { TendaValue } from './values.js';

export interface SharedRef {
  value: TendaValue;
}

export interface OwnedCell {
  readonly kind: 'owned';
  readonly value: TendaValue;
}

export interface SharedCell {
  readonly kind: 'shared';
  readonly ref: SharedRef;
}

export type ValueCell = OwnedCell | SharedCell;

export function owned(value: TendaValue): OwnedCell {
  return { kind: 'owned', value };
}

export function shared(value: TendaValue): SharedCell {
  return { kind: 'shared', ref: { value } };
}

/** Cell for a new binding: Shared exactly when a closure captures it */
export function cellFor(value: TendaValue, captured: boolean): ValueCell {
  return captured ? shared(value) : owned(value);
}

export function read(cell: ValueCell): TendaValue {
  return cell.kind === 'owned' ? cell.value : cell.ref.value;
}

/**
 * Write `value` into `cell` and return the cell the binding should hold
 * afterwards: the same cell for Shared, a fresh Owned cell otherwise.
 */
export function write(cell: ValueCell, value: TendaValue): ValueCell {
  if (cell.kind === 'shared') {
    cell.ref.value = value;
    return cell;
  }
  return owned(value);
}

/** Promote to Shared; a Shared cell is returned unchanged */
export function share(cell: ValueCell): SharedCell {
  return cell.kind === 'shared' ? cell : shared(cell.value);
}
