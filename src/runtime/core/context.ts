/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { createBuiltins } from '../ext/builtins.js';
import { createNative } from './callable.js';
import { owned } from './cells.js';
import { Environment } from './environment.js';
import { Stack } from './stack.js';
import type {
  ModuleInstance,
  ModuleUnit,
  ProgramGraph,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

/** Nested calls allowed before StackOverflow */
export const DEFAULT_MAX_CALL_STACK_DEPTH = 256;

/** Module id used when the host names none */
export const DEFAULT_MODULE_ID = 'principal';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (text) => {
    console.log(text);
  },
};

/**
 * Create a runtime context for script execution.
 * Host functions join the prelude and cannot be reassigned; host
 * variables become ordinary globals of the entry module.
 *
 * @throws {Error} when maxCallStackDepth is not a positive integer
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const maxCallStackDepth =
    options.maxCallStackDepth ?? DEFAULT_MAX_CALL_STACK_DEPTH;
  if (!Number.isInteger(maxCallStackDepth) || maxCallStackDepth < 1) {
    throw new Error(
      `maxCallStackDepth must be a positive integer, got ${maxCallStackDepth}`
    );
  }

  const base = new Environment();
  for (const [name, value] of Object.entries(createBuiltins(options.random))) {
    base.upsert(name, owned(value));
  }
  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      base.upsert(
        name,
        owned(createNative(name, definition.arity, definition.fn))
      );
    }
  }

  const globals = new Environment();
  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      globals.upsert(name, owned(value));
    }
  }

  const modules: ProgramGraph =
    options.modules ?? new Map<string, ModuleUnit>();
  const moduleId = options.moduleId ?? DEFAULT_MODULE_ID;
  const entry: ModuleInstance = {
    id: moduleId,
    globals,
    exports: new Set(),
    status: 'running',
    imports: modules.get(moduleId)?.imports ?? {},
  };

  return {
    maxCallStackDepth,
    base,
    stack: new Stack(globals, base, maxCallStackDepth),
    currentModule: entry,
    modules,
    instances: new Map([[moduleId, entry]]),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
  };
}
