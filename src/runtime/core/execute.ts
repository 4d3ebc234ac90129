/**
 * Script Execution
 *
 * Runs a parsed program against a runtime context and turns the final
 * control signal into an ExecutionResult. Runtime failures never throw;
 * they come back as `{ ok: false, diagnostic }`.
 *
 * Public API for host applications.
 */

import type { ProgramNode } from '../../types.js';
import { read } from './cells.js';
import { createDiagnostic } from './diagnostics.js';
import { getEvaluator } from './eval/evaluator.js';
import { raised, type ControlSignal } from './signals.js';
import type { ExecutionResult, RuntimeContext } from './types.js';
import type { TendaValue } from './values.js';

/** Native stack exhaustion surfaces as a RangeError from the engine */
function isHostStackExhaustion(error: unknown): boolean {
  return (
    error instanceof RangeError && /call stack/i.test(error.message)
  );
}

/**
 * Execute a program.
 *
 * @example
 * const ctx = createRuntimeContext();
 * const result = execute(parse('seja x = 1 + 2\nx'), ctx);
 * // result: { ok: true, value: 3, variables: { x: 3 } }
 */
export function execute(
  program: ProgramNode,
  ctx: RuntimeContext
): ExecutionResult {
  const evaluator = getEvaluator(ctx);

  let signal: ControlSignal;
  try {
    signal = evaluator.executeProgram(program);
  } catch (error) {
    if (!isHostStackExhaustion(error)) throw error;
    signal = raised(
      createDiagnostic({
        kind: 'StackOverflow',
        limit: ctx.maxCallStackDepth,
      })
    );
  }
  ctx.currentModule.status = 'done';

  if (signal.type === 'raised') {
    ctx.observability.onError?.({ diagnostic: signal.diagnostic });
    return { ok: false, diagnostic: signal.diagnostic };
  }

  const variables: Record<string, TendaValue> = {};
  for (const [name, cell] of ctx.currentModule.globals) {
    variables[name] = read(cell);
  }

  return {
    ok: true,
    value: signal.type === 'normal' ? signal.value : null,
    variables,
  };
}
