/**
 * Tenda Runtime
 *
 * Public API for executing Tenda programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: TendaValue and value utilities
 *   - cells.ts: Owned and Shared value cells
 *   - environment.ts: One lexical scope
 *   - stack.ts: Frames and name resolution
 *   - callable.ts: Closures, native callables and arity
 *   - diagnostics.ts: Structured runtime failures
 *   - signals.ts: Control signals and results
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution
 *   - eval/: Evaluator mixins (internal)
 * - ext/: Prelude (exiba, Lista, Texto, Matemática)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallEvent,
  ErrorEvent,
  ExecutionResult,
  ModuleInstance,
  ModuleUnit,
  ObservabilityCallbacks,
  ProgramGraph,
  ReturnEvent,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export type {
  DictKey,
  TendaDict,
  TendaList,
  TendaRange,
  TendaTypeName,
  TendaValue,
} from './core/values.js';

export {
  createDict,
  createList,
  createRange,
  formatValue,
  isCallable,
  isDict,
  isList,
  isRange,
  isTruthy,
  typeName,
} from './core/values.js';

export { valuesEqual } from './core/equals.js';

// ============================================================
// CELLS, SCOPES AND FRAMES
// ============================================================

export {
  cellFor,
  owned,
  read,
  share,
  shared,
  write,
  type OwnedCell,
  type SharedCell,
  type ValueCell,
} from './core/cells.js';

export { Environment } from './core/environment.js';

export {
  Stack,
  type FrameKind,
  type FrameMetadata,
  type StackFrame,
} from './core/stack.js';

// ============================================================
// CALLABLES
// ============================================================

export {
  acceptsArgs,
  arityOf,
  createNative,
  makeFunction,
  type FunctionMetadata,
  type HostFunctionDefinition,
  type NativeCallable,
  type NativeHost,
  type NativeImplementation,
  type ParamDescriptor,
  type TendaFunction,
} from './core/callable.js';

// ============================================================
// DIAGNOSTICS AND SIGNALS
// ============================================================

export {
  diagnosticMessage,
  isFatal,
  type Arity,
  type CallFrame,
  type Diagnostic,
  type DiagnosticKind,
  type DiagnosticPayload,
} from './core/diagnostics.js';

export {
  fail,
  ok,
  type ControlSignal,
  type Failure,
  type Result,
} from './core/signals.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export {
  createRuntimeContext,
  DEFAULT_MAX_CALL_STACK_DEPTH,
  DEFAULT_MODULE_ID,
} from './core/context.js';

export { execute } from './core/execute.js';
