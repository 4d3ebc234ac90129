/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { ProgramNode } from '../../types.js';
import type { HostFunctionDefinition } from './callable.js';
import type { Diagnostic } from './diagnostics.js';
import type { Environment } from './environment.js';
import type { Stack } from './stack.js';
import type { TendaValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with the display form written by exiba */
  onLog: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a function is invoked */
  onCall?: (event: CallEvent) => void;
  /** Called after a function returns */
  onReturn?: (event: ReturnEvent) => void;
  /** Called when a diagnostic reaches the top level */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: TendaValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a function call */
export interface CallEvent {
  /** Function name, or `<anônima>` */
  name: string;
  args: TendaValue[];
}

/** Event emitted after a function returns */
export interface ReturnEvent {
  name: string;
  value: TendaValue;
  durationMs: number;
}

/** Event emitted on an uncaught diagnostic */
export interface ErrorEvent {
  diagnostic: Diagnostic;
}

// ============================================================
// MODULES
// ============================================================

/** One parsed source file with its resolved imports */
export interface ModuleUnit {
  readonly id: string;
  readonly program: ProgramNode;
  /** `importe` specifier -> module id */
  readonly imports: Readonly<Record<string, string>>;
}

/** Every module reachable from the entry program, by id */
export type ProgramGraph = ReadonlyMap<string, ModuleUnit>;

export type ModuleStatus = 'running' | 'done';

/** Runtime state of a module within one execution */
export interface ModuleInstance {
  readonly id: string;
  readonly globals: Environment;
  readonly exports: Set<string>;
  status: ModuleStatus;
  /** Import specifiers of the module, resolved to module ids */
  readonly imports: Readonly<Record<string, string>>;
}

// ============================================================
// CONTEXT
// ============================================================

/** Mutable state of one execution */
export interface RuntimeContext {
  readonly maxCallStackDepth: number;
  /** Prelude and host functions; read-only to programs */
  readonly base: Environment;
  /** Stack of the module currently executing */
  stack: Stack;
  /** Module currently executing */
  currentModule: ModuleInstance;
  readonly modules: ProgramGraph;
  /** Modules started during this execution */
  readonly instances: Map<string, ModuleInstance>;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Ceiling on nested calls before StackOverflow (default 256) */
  maxCallStackDepth?: number;
  /** Extra globals visible to the entry module */
  variables?: Record<string, TendaValue>;
  /** Host functions added to the prelude */
  functions?: Record<string, HostFunctionDefinition>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Modules reachable through importe */
  modules?: ProgramGraph;
  /** Id of the entry module within `modules` */
  moduleId?: string;
  /** Source for Matemática.aleatório, in [0, 1) (default Math.random) */
  random?: () => number;
}

/** Result of script execution */
export type ExecutionResult =
  | {
      readonly ok: true;
      /** Value of the last top-level statement */
      readonly value: TendaValue;
      /** Top-level bindings of the entry module */
      readonly variables: Record<string, TendaValue>;
    }
  | { readonly ok: false; readonly diagnostic: Diagnostic };
