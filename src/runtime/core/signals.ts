/**
 * Control Flow Signals
 *
 * Every statement returns a ControlSignal and every expression a Result.
 * Callers check and propagate them; the runtime never unwinds through
 * host exceptions.
 */

import type { Diagnostic } from './diagnostics.js';
import type { TendaValue } from './values.js';

export type ControlSignal =
  | { readonly type: 'normal'; readonly value: TendaValue }
  | { readonly type: 'return'; readonly value: TendaValue }
  | { readonly type: 'break' }
  | { readonly type: 'continue' }
  | { readonly type: 'raised'; readonly diagnostic: Diagnostic };

/** Outcome of evaluating an expression */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly diagnostic: Diagnostic };

export type Failure = Extract<Result<never>, { ok: false }>;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(diagnostic: Diagnostic): Failure {
  return { ok: false, diagnostic };
}

export function normal(value: TendaValue = null): ControlSignal {
  return { type: 'normal', value };
}

export function raised(diagnostic: Diagnostic): ControlSignal {
  return { type: 'raised', diagnostic };
}

export const BREAK: ControlSignal = { type: 'break' };
export const CONTINUE: ControlSignal = { type: 'continue' };
