/**
 * ControlFlowMixin: Conditionals, Loops and Return
 *
 * Handles se/senão, enquanto, para cada and retorna. Every branch and
 * every loop iteration runs in its own block frame; `para cada` binds
 * the item inside the iteration frame, so a closure created in the body
 * captures that iteration's item.
 *
 * Loop signals:
 * - break: leaves the loop, which then completes normally
 * - continue: moves on to the next iteration
 * - return and raised: propagate out of the loop unchanged
 *
 * @internal
 */

import type {
  ForEachNode,
  IfNode,
  ReturnNode,
  WhileNode,
} from '../../../../types.js';
import { cellFor } from '../../cells.js';
import { Environment } from '../../environment.js';
import { normal, raised, type ControlSignal } from '../../signals.js';
import {
  isDict,
  isList,
  isRange,
  isTruthy,
  typeName,
  type TendaValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Items `para cada` visits; null when the value cannot be iterated */
function iterationItems(value: TendaValue): Iterable<TendaValue> | null {
  if (isList(value)) return [...value.items];
  if (typeof value === 'string') return [...value];
  if (isDict(value)) return [...value.entries.keys()];
  if (isRange(value)) return rangeItems(value.start, value.end);
  return null;
}

function* rangeItems(start: number, end: number): Generator<number> {
  for (let i = start; i <= end; i++) yield i;
}

/** Whether a loop body signal ends the loop, and with what */
function loopExit(signal: ControlSignal): ControlSignal | undefined {
  switch (signal.type) {
    case 'break':
      return normal();
    case 'return':
    case 'raised':
      return signal;
    default:
      return undefined;
  }
}

function createControlFlowMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ControlFlowEvaluator extends Base {
    protected override executeIf(node: IfNode): ControlSignal {
      const condition = this.evaluateExpression(node.condition);
      if (!condition.ok) return raised(condition.diagnostic);

      if (isTruthy(condition.value)) {
        return this.executeBlock(node.thenBranch);
      }
      if (node.elseBranch === null) return normal();
      return node.elseBranch.type === 'If'
        ? this.executeIf(node.elseBranch)
        : this.executeBlock(node.elseBranch);
    }

    protected override executeWhile(node: WhileNode): ControlSignal {
      for (;;) {
        const condition = this.evaluateExpression(node.condition);
        if (!condition.ok) return raised(condition.diagnostic);
        if (!isTruthy(condition.value)) return normal();

        const exit = loopExit(this.executeBlock(node.body));
        if (exit !== undefined) return exit;
      }
    }

    /**
     * Lists are iterated over a snapshot taken before the first
     * iteration; changes made by the body are not visited.
     */
    protected override executeForEach(node: ForEachNode): ControlSignal {
      const iterable = this.evaluateExpression(node.iterable);
      if (!iterable.ok) return raised(iterable.diagnostic);

      const items = iterationItems(iterable.value);
      if (items === null) {
        const failure = this.failAt(
          { kind: 'NotIterable', valueType: typeName(iterable.value) },
          node.iterable
        );
        return raised(failure.diagnostic);
      }

      for (const item of items) {
        const env = new Environment();
        env.upsert(node.item, cellFor(item, node.captured));
        const exit = loopExit(
          this.inBlockFrame(() => this.executeStatements(node.body.statements), env)
        );
        if (exit !== undefined) return exit;
      }
      return normal();
    }

    protected override executeReturn(node: ReturnNode): ControlSignal {
      if (node.value === null) return { type: 'return', value: null };
      const value = this.evaluateExpression(node.value);
      return value.ok
        ? { type: 'return', value: value.value }
        : raised(value.diagnostic);
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;
