/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Shared helpers and cross-mixin stubs
 * 2. CoreMixin - Statement and expression dispatch
 * 3. LiteralsMixin - List and dictionary literals
 * 4. VariablesMixin - Declarations, lookup, assignment, element access
 * 5. ExpressionsMixin - Binary, logical and unary operators
 * 6. ControlFlowMixin - se, enquanto, para cada, retorna
 * 7. ClosuresMixin - Function values and the call contract
 * 8. ErrorsMixin - tente/capture and lance
 * 9. ModulesMixin - Entry program, importe, exporte (outermost)
 *
 * Every cross-mixin call goes through a stub on EvaluatorBase, so the
 * order only decides which class overrides which.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';
import { EvaluatorBase } from './base.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { ErrorsMixin } from './mixins/errors.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { ModulesMixin } from './mixins/modules.js';
import { VariablesMixin } from './mixins/variables.js';

export const Evaluator = ModulesMixin(
  ErrorsMixin(
    ClosuresMixin(
      ControlFlowMixin(
        ExpressionsMixin(
          VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase)))
        )
      )
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 * Entries go away with their RuntimeContext.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
