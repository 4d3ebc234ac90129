/**
 * Diagnostics
 *
 * Structured runtime failures. A diagnostic carries its kind, the
 * kind-specific payload, the span of the node that failed and the call
 * frames it unwound through. It is never a formatted string; rendering
 * belongs to the reporting layer.
 */

import { ERROR_REGISTRY, renderMessage } from '../../error-registry.js';
import type { SourceSpan } from '../../types.js';
import { formatValue, type TendaValue } from './values.js';

/** Call frame recorded while a diagnostic unwinds, innermost first */
export interface CallFrame {
  readonly functionName: string | null;
  readonly span: SourceSpan | undefined;
  /** Module holding the call site */
  readonly moduleId?: string | undefined;
}

/** Expected argument count; `max` is null for variadic callables */
export interface Arity {
  readonly min: number;
  readonly max: number | null;
}

export type DiagnosticPayload =
  | { readonly kind: 'AlreadyDeclared'; readonly name: string }
  | { readonly kind: 'UndefinedVariable'; readonly name: string }
  | { readonly kind: 'ImmutableBinding'; readonly name: string }
  | {
      readonly kind: 'TypeMismatch';
      readonly operation: string;
      readonly operands: readonly string[];
      readonly expected?: string | undefined;
    }
  | {
      readonly kind: 'ArityMismatch';
      readonly callee: string | null;
      readonly expected: Arity;
      readonly found: number;
    }
  | { readonly kind: 'DivisionByZero' }
  | { readonly kind: 'UserRaised'; readonly value: TendaValue }
  | { readonly kind: 'StackOverflow'; readonly limit: number }
  | {
      readonly kind: 'IndexOutOfBounds';
      readonly index: number;
      readonly length: number;
    }
  | { readonly kind: 'InvalidIndex'; readonly index: string }
  | { readonly kind: 'KeyNotFound'; readonly key: string }
  | { readonly kind: 'InvalidKey'; readonly key: string }
  | { readonly kind: 'NotIterable'; readonly valueType: string }
  | { readonly kind: 'NotCallable'; readonly valueType: string }
  | { readonly kind: 'ImmutableText' }
  | {
      readonly kind: 'InvalidRangeBounds';
      readonly start: string;
      readonly end: string;
    }
  | {
      readonly kind: 'InvalidArgument';
      readonly callee: string;
      readonly reason: string;
    }
  | { readonly kind: 'ModuleNotFound'; readonly specifier: string }
  | { readonly kind: 'CircularImport'; readonly module: string };

export type DiagnosticKind = DiagnosticPayload['kind'];

export type Diagnostic = DiagnosticPayload & {
  readonly span?: SourceSpan | undefined;
  /** Module whose source `span` points into */
  readonly moduleId?: string | undefined;
  readonly stack: readonly CallFrame[];
};

/** Kinds no language-level handler may catch */
const FATAL_KINDS: ReadonlySet<DiagnosticKind> = new Set(['StackOverflow']);

export function createDiagnostic(payload: DiagnosticPayload): Diagnostic {
  return { ...payload, stack: [] };
}

export function isFatal(diagnostic: Diagnostic): boolean {
  return FATAL_KINDS.has(diagnostic.kind);
}

/** Attach `span` unless the diagnostic already points somewhere */
export function withSpan(diagnostic: Diagnostic, span: SourceSpan): Diagnostic {
  return diagnostic.span ? diagnostic : { ...diagnostic, span };
}

/** Attach `moduleId` unless the diagnostic already names a module */
export function inModule(diagnostic: Diagnostic, moduleId: string): Diagnostic {
  return diagnostic.moduleId === undefined
    ? { ...diagnostic, moduleId }
    : diagnostic;
}

/** Record one more call frame on the way out */
export function withCallFrame(
  diagnostic: Diagnostic,
  frame: CallFrame
): Diagnostic {
  return { ...diagnostic, stack: [...diagnostic.stack, frame] };
}

/** Plain-text payload fields, used for message templates and catch values */
export function diagnosticFields(
  diagnostic: Diagnostic
): Record<string, TendaValue> {
  switch (diagnostic.kind) {
    case 'AlreadyDeclared':
    case 'UndefinedVariable':
    case 'ImmutableBinding':
      return { name: diagnostic.name };
    case 'TypeMismatch':
      return {
        operation: diagnostic.operation,
        operands: diagnostic.operands.join(' e '),
        ...(diagnostic.expected === undefined
          ? {}
          : { expected: diagnostic.expected }),
      };
    case 'ArityMismatch': {
      const { min, max } = diagnostic.expected;
      let expected: string;
      if (max === null) expected = `pelo menos ${min}`;
      else if (min === max) expected = String(min);
      else expected = `de ${min} a ${max}`;
      return {
        callee: diagnostic.callee ?? 'A função',
        expected,
        found: diagnostic.found,
      };
    }
    case 'DivisionByZero':
    case 'ImmutableText':
      return {};
    case 'UserRaised':
      return { value: diagnostic.value };
    case 'StackOverflow':
      return { limit: diagnostic.limit };
    case 'IndexOutOfBounds':
      return { index: diagnostic.index, length: diagnostic.length };
    case 'InvalidIndex':
      return { index: diagnostic.index };
    case 'KeyNotFound':
    case 'InvalidKey':
      return { key: diagnostic.key };
    case 'NotIterable':
    case 'NotCallable':
      return { valueType: diagnostic.valueType };
    case 'InvalidRangeBounds':
      return { start: diagnostic.start, end: diagnostic.end };
    case 'InvalidArgument':
      return { callee: diagnostic.callee, reason: diagnostic.reason };
    case 'ModuleNotFound':
      return { specifier: diagnostic.specifier };
    case 'CircularImport':
      return { module: diagnostic.module };
  }
}

/** Portuguese message for a diagnostic, from its registry template */
export function diagnosticMessage(diagnostic: Diagnostic): string {
  const definition = ERROR_REGISTRY.getByKind(diagnostic.kind);
  if (definition === undefined) return diagnostic.kind;

  const context: Record<string, string> = {};
  for (const [key, value] of Object.entries(diagnosticFields(diagnostic))) {
    context[key] = formatValue(value);
  }
  return renderMessage(definition.messageTemplate, context);
}
