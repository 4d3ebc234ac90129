/**
 * Environment
 *
 * One lexical scope: a name to cell mapping. Lookups here never walk
 * outward; the scope chain belongs to the Stack.
 */

import { read, write, type ValueCell } from './cells.js';
import { createDiagnostic } from './diagnostics.js';
import { fail, ok, type Result } from './signals.js';
import type { TendaValue } from './values.js';

export class Environment implements Iterable<[string, ValueCell]> {
  private readonly cells = new Map<string, ValueCell>();

  /** Insert `cell` under `name`; fails when this scope already has it */
  declare(name: string, cell: ValueCell): Result<void> {
    if (this.cells.has(name)) {
      return fail(createDiagnostic({ kind: 'AlreadyDeclared', name }));
    }
    this.upsert(name, cell);
    return ok(undefined);
  }

  lookup(name: string): ValueCell | undefined {
    return this.cells.get(name);
  }

  /** Read the value bound to `name` in this scope only */
  get(name: string): TendaValue | undefined {
    const cell = this.cells.get(name);
    return cell === undefined ? undefined : read(cell);
  }

  has(name: string): boolean {
    return this.cells.has(name);
  }

  /**
   * Assign through the existing cell: Shared cells are written in place,
   * Owned cells are replaced.
   */
  assign(name: string, value: TendaValue): Result<void> {
    const cell = this.cells.get(name);
    if (cell === undefined) {
      return fail(createDiagnostic({ kind: 'UndefinedVariable', name }));
    }
    this.cells.set(name, write(cell, value));
    return ok(undefined);
  }

  /** Insert or overwrite unconditionally */
  upsert(name: string, cell: ValueCell): void {
    this.cells.set(name, cell);
  }

  get size(): number {
    return this.cells.size;
  }

  [Symbol.iterator](): Iterator<[string, ValueCell]> {
    return this.cells.entries();
  }
}
