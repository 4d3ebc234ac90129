/**
 * Callable Types
 *
 * Two kinds of callable value share one call contract (arity check,
 * arguments evaluated left to right, one result or a diagnostic):
 * - TendaFunction: closures built from source
 * - NativeCallable: prelude and host functions
 *
 * Public API for host applications.
 */

import type { BlockNode, ExpressionNode, SourceSpan } from '../../types.js';
import type { Arity } from './diagnostics.js';
import { Environment } from './environment.js';
import type { Result } from './signals.js';
import type { Stack } from './stack.js';
import type { TendaValue } from './values.js';

// ============================================================
// SCRIPT FUNCTIONS
// ============================================================

export interface ParamDescriptor {
  readonly name: string;
  /** Parameter is referenced by a nested closure: bind it Shared */
  readonly captured: boolean;
  /** Evaluated in the call frame when the argument is missing */
  readonly defaultValue: ExpressionNode | null;
  /** Collects the remaining arguments in a list */
  readonly variadic: boolean;
}

/** Post-construction metadata patched onto a function value */
export interface FunctionMetadata {
  /** Display and stack-trace name */
  readonly name?: string | undefined;
  /** Name bound to the function itself inside its call frame */
  readonly selfName?: string | undefined;
  /** The self name is referenced by a nested closure */
  readonly selfCaptured?: boolean | undefined;
  /** Definition site */
  readonly span?: SourceSpan | undefined;
  /** Global scope of the defining module */
  readonly globals?: Environment | undefined;
  /** Id of the defining module */
  readonly moduleId?: string | undefined;
}

export interface TendaFunction {
  readonly kind: 'function';
  readonly params: readonly ParamDescriptor[];
  readonly body: BlockNode;
  /** Snapshot of the Shared bindings reachable at creation */
  readonly captured: Environment;
  readonly metadata: FunctionMetadata;
}

/**
 * Build a closure. The captured environment holds every Shared binding
 * reachable on `stack`, except names that a parameter shadows. Owned
 * bindings are never captured: no closure refers to them.
 */
export function makeFunction(
  stack: Stack,
  params: readonly ParamDescriptor[],
  body: BlockNode,
  metadata: FunctionMetadata = {}
): TendaFunction {
  const exclude = new Set(params.map((param) => param.name));
  return {
    kind: 'function',
    params,
    body,
    captured: stack.collectShared(exclude),
    metadata,
  };
}

// ============================================================
// NATIVE CALLABLES
// ============================================================

/** Services a native implementation may use while it runs */
export interface NativeHost {
  /** Call any callable value with the full call contract */
  invoke(callee: TendaValue, args: TendaValue[]): Result<TendaValue>;
  /** Write a line through the runtime's log callback */
  log(text: string): void;
}

export type NativeImplementation = (
  args: TendaValue[],
  host: NativeHost
) => Result<TendaValue>;

export interface NativeCallable {
  readonly kind: 'native';
  readonly name: string;
  readonly arity: Arity;
  readonly fn: NativeImplementation;
}

/** Host function as passed in RuntimeOptions.functions */
export interface HostFunctionDefinition {
  /** Exact parameter count, or a range */
  readonly arity: number | Arity;
  readonly fn: NativeImplementation;
}

export function createNative(
  name: string,
  arity: number | Arity,
  fn: NativeImplementation
): NativeCallable {
  return {
    kind: 'native',
    name,
    arity: typeof arity === 'number' ? { min: arity, max: arity } : arity,
    fn,
  };
}

// ============================================================
// ARITY
// ============================================================

/** Accepted argument counts; defaulted parameters lower the minimum */
export function arityOf(callable: TendaFunction | NativeCallable): Arity {
  if (callable.kind === 'native') return callable.arity;

  let min = 0;
  let count = 0;
  let variadic = false;
  for (const param of callable.params) {
    if (param.variadic) {
      variadic = true;
      continue;
    }
    count++;
    if (param.defaultValue === null) min = count;
  }
  return { min, max: variadic ? null : count };
}

export function acceptsArgs(arity: Arity, count: number): boolean {
  return count >= arity.min && (arity.max === null || count <= arity.max);
}

/** Name for stack traces and arity messages */
export function callableName(
  callable: TendaFunction | NativeCallable
): string | null {
  return callable.kind === 'native'
    ? callable.name
    : (callable.metadata.name ?? null);
}
