/**
 * LiteralsMixin: List and Dictionary Literals
 *
 * Scalar literals are answered directly by CoreMixin; this mixin builds
 * the compound ones. Elements and entries evaluate left to right.
 *
 * Error Handling:
 * - Element errors propagate unchanged
 * - Dictionary keys other than text or integers fail InvalidKey
 *
 * @internal
 */

import type {
  DictLiteralNode,
  ListLiteralNode,
} from '../../../../types.js';
import { ok, type Result } from '../../signals.js';
import {
  createDict,
  createList,
  formatValue,
  toDictKey,
  type TendaValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createLiteralsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class LiteralsEvaluator extends Base {
    protected override evaluateList(
      node: ListLiteralNode
    ): Result<TendaValue> {
      const items = this.evaluateAll(node.elements);
      return items.ok ? ok(createList(items.value)) : items;
    }

    /** Later duplicates of a key overwrite earlier ones, keeping position */
    protected override evaluateDict(
      node: DictLiteralNode
    ): Result<TendaValue> {
      const dict = createDict();
      for (const entry of node.entries) {
        const key = this.evaluateExpression(entry.key);
        if (!key.ok) return key;

        const dictKey = toDictKey(key.value);
        if (dictKey === null) {
          return this.failAt(
            { kind: 'InvalidKey', key: formatValue(key.value, true) },
            entry.key
          );
        }

        const value = this.evaluateExpression(entry.value);
        if (!value.ok) return value;
        dict.entries.set(dictKey, value.value);
      }
      return ok(dict);
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;
