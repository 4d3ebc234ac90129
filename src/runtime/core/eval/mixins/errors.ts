/**
 * ErrorsMixin: tente/capture and lance
 *
 * `lance valor` raises UserRaised carrying the value. `tente` catches any
 * recoverable diagnostic from its body and runs the handler with the
 * error bound in the handler frame. Fatal diagnostics pass through.
 *
 * @internal
 */

import type { ThrowNode, TryNode } from '../../../../types.js';
import { cellFor } from '../../cells.js';
import {
  createDiagnostic,
  diagnosticFields,
  diagnosticMessage,
  isFatal,
  type Diagnostic,
} from '../../diagnostics.js';
import { Environment } from '../../environment.js';
import { raised, type ControlSignal } from '../../signals.js';
import { createDict, type DictKey, type TendaValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * Value bound by `capture`: the thrown value for UserRaised, otherwise
 * a dictionary with `tipo`, `mensagem` and the payload fields.
 */
export function caughtValue(diagnostic: Diagnostic): TendaValue {
  if (diagnostic.kind === 'UserRaised') return diagnostic.value;

  const entries: [DictKey, TendaValue][] = [
    ['tipo', diagnostic.kind],
    ['mensagem', diagnosticMessage(diagnostic)],
    ...Object.entries(diagnosticFields(diagnostic)),
  ];
  return createDict(entries);
}

function createErrorsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ErrorsEvaluator extends Base {
    protected override executeTry(node: TryNode): ControlSignal {
      const signal = this.executeBlock(node.body);
      if (signal.type !== 'raised' || isFatal(signal.diagnostic)) {
        return signal;
      }

      if (node.errorName === null) {
        return this.executeBlock(node.handler);
      }

      const env = new Environment();
      env.upsert(
        node.errorName,
        cellFor(caughtValue(signal.diagnostic), node.captured)
      );
      return this.inBlockFrame(
        () => this.executeStatements(node.handler.statements),
        env
      );
    }

    protected override executeThrow(node: ThrowNode): ControlSignal {
      const value = this.evaluateExpression(node.value);
      if (!value.ok) return raised(value.diagnostic);
      return raised({
        ...createDiagnostic({ kind: 'UserRaised', value: value.value }),
        span: node.span,
      });
    }
  };
}

export const ErrorsMixin = createErrorsMixin;
