/**
 * Argument checks shared by the prelude natives.
 * Arity is enforced by the call contract before a native runs, so the
 * helpers only check variants and values.
 *
 * @internal
 */

import type { NativeCallable, TendaFunction } from '../core/callable.js';
import { createDiagnostic, type DiagnosticPayload } from '../core/diagnostics.js';
import { fail, ok, type Failure, type Result } from '../core/signals.js';
import {
  formatNumber,
  isCallable,
  isList,
  typeName,
  type TendaList,
  type TendaValue,
} from '../core/values.js';

export function failWith(payload: DiagnosticPayload): Failure {
  return fail(createDiagnostic(payload));
}

/** TypeMismatch naming every argument's type */
export function wrongType(
  callee: string,
  args: TendaValue[],
  expected: string
): Failure {
  return failWith({
    kind: 'TypeMismatch',
    operation: callee,
    operands: args.map(typeName),
    expected,
  });
}

export function invalidArgument(callee: string, reason: string): Failure {
  return failWith({ kind: 'InvalidArgument', callee, reason });
}

function argument(args: TendaValue[], index: number): TendaValue {
  return args[index] ?? null;
}

export function numberArg(
  args: TendaValue[],
  index: number,
  callee: string
): Result<number> {
  const value = argument(args, index);
  return typeof value === 'number'
    ? ok(value)
    : wrongType(callee, args, 'número');
}

export function textArg(
  args: TendaValue[],
  index: number,
  callee: string
): Result<string> {
  const value = argument(args, index);
  return typeof value === 'string'
    ? ok(value)
    : wrongType(callee, args, 'texto');
}

export function listArg(
  args: TendaValue[],
  index: number,
  callee: string
): Result<TendaList> {
  const value = argument(args, index);
  return isList(value) ? ok(value) : wrongType(callee, args, 'lista');
}

export function callableArg(
  args: TendaValue[],
  index: number,
  callee: string
): Result<TendaFunction | NativeCallable> {
  const value = argument(args, index);
  return isCallable(value) ? ok(value) : wrongType(callee, args, 'função');
}

/** Non-negative integer position into a list or text */
export function positionArg(
  args: TendaValue[],
  index: number,
  callee: string
): Result<number> {
  const value = numberArg(args, index, callee);
  if (!value.ok) return value;
  if (!Number.isInteger(value.value) || value.value < 0) {
    return failWith({ kind: 'InvalidIndex', index: formatNumber(value.value) });
  }
  return value;
}
