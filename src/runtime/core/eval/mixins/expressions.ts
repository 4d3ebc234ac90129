/**
 * ExpressionsMixin: Operators
 *
 * Binary, logical and unary operators. Operands evaluate left to right;
 * `e` and `ou` short-circuit and yield one of their operands.
 *
 * Error Handling:
 * - Operands of the wrong variant fail TypeMismatch [operation, operands]
 * - `/` by zero fails DivisionByZero; `%` by zero yields NaN
 * - `até` with fractional or non-finite bounds fails InvalidRangeBounds
 *
 * @internal
 */

import type {
  BinaryExprNode,
  LogicalExprNode,
  UnaryExprNode,
} from '../../../../types.js';
import { valuesEqual } from '../../equals.js';
import { ok, type Result } from '../../signals.js';
import {
  createList,
  createRange,
  formatValue,
  isDict,
  isInteger,
  isList,
  isRange,
  isTruthy,
  toDictKey,
  type TendaValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function ordered<T extends number | string>(
  op: '<' | '<=' | '>' | '>=',
  a: T,
  b: T
): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

function createExpressionsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ExpressionsEvaluator extends Base {
    protected override evaluateBinary(
      node: BinaryExprNode
    ): Result<TendaValue> {
      const left = this.evaluateExpression(node.left);
      if (!left.ok) return left;
      const right = this.evaluateExpression(node.right);
      if (!right.ok) return right;

      const a = left.value;
      const b = right.value;

      switch (node.op) {
        case '+':
          return this.add(a, b, node);
        case '-':
        case '*':
        case '/':
        case '%':
        case '^':
          return this.arithmetic(node.op, a, b, node);
        case '<':
        case '<=':
        case '>':
        case '>=':
          return this.compare(node.op, a, b, node);
        case 'é':
          return ok(valuesEqual(a, b));
        case 'não é':
          return ok(!valuesEqual(a, b));
        case 'tem':
        case 'não tem': {
          const found = this.contains(a, b, node);
          if (!found.ok) return found;
          return ok(node.op === 'tem' ? found.value : !found.value);
        }
        case 'até':
          if (!isInteger(a) || !isInteger(b)) {
            return this.failAt(
              {
                kind: 'InvalidRangeBounds',
                start: formatValue(a, true),
                end: formatValue(b, true),
              },
              node
            );
          }
          return ok(createRange(a, b));
      }
    }

    protected override evaluateLogical(
      node: LogicalExprNode
    ): Result<TendaValue> {
      const left = this.evaluateExpression(node.left);
      if (!left.ok) return left;

      const truthy = isTruthy(left.value);
      if (node.op === 'e' ? !truthy : truthy) return left;
      return this.evaluateExpression(node.right);
    }

    protected override evaluateUnary(
      node: UnaryExprNode
    ): Result<TendaValue> {
      const operand = this.evaluateExpression(node.operand);
      if (!operand.ok) return operand;

      if (node.op === 'não') return ok(!isTruthy(operand.value));
      if (typeof operand.value !== 'number') {
        return this.typeMismatch('-', [operand.value], node, 'número');
      }
      return ok(-operand.value);
    }

    // ============================================================
    // OPERATOR HELPERS
    // ============================================================

    /** Numbers add, lists concatenate, text joins any display form */
    private add(
      a: TendaValue,
      b: TendaValue,
      node: BinaryExprNode
    ): Result<TendaValue> {
      if (typeof a === 'number' && typeof b === 'number') return ok(a + b);
      if (isList(a) && isList(b)) return ok(createList([...a.items, ...b.items]));
      if (typeof a === 'string' || typeof b === 'string') {
        return ok(formatValue(a) + formatValue(b));
      }
      return this.typeMismatch('+', [a, b], node);
    }

    private arithmetic(
      op: '-' | '*' | '/' | '%' | '^',
      a: TendaValue,
      b: TendaValue,
      node: BinaryExprNode
    ): Result<TendaValue> {
      if (typeof a !== 'number' || typeof b !== 'number') {
        return this.typeMismatch(op, [a, b], node, 'número');
      }
      switch (op) {
        case '-':
          return ok(a - b);
        case '*':
          return ok(a * b);
        case '/':
          if (b === 0) return this.failAt({ kind: 'DivisionByZero' }, node);
          return ok(a / b);
        case '%':
          return ok(a % b);
        case '^':
          return ok(a ** b);
      }
    }

    private compare(
      op: '<' | '<=' | '>' | '>=',
      a: TendaValue,
      b: TendaValue,
      node: BinaryExprNode
    ): Result<TendaValue> {
      if (typeof a === 'number' && typeof b === 'number') {
        return ok(ordered(op, a, b));
      }
      if (typeof a === 'string' && typeof b === 'string') {
        return ok(ordered(op, a, b));
      }
      return this.typeMismatch(op, [a, b], node);
    }

    private contains(
      container: TendaValue,
      item: TendaValue,
      node: BinaryExprNode
    ): Result<boolean> {
      if (isList(container)) {
        return ok(container.items.some((entry) => valuesEqual(entry, item)));
      }
      if (isDict(container)) {
        const key = toDictKey(item);
        return ok(key !== null && container.entries.has(key));
      }
      if (isRange(container)) {
        return ok(
          isInteger(item) && item >= container.start && item <= container.end
        );
      }
      if (typeof container === 'string') {
        if (typeof item !== 'string') {
          return this.typeMismatch('tem', [container, item], node, 'texto');
        }
        return ok(container.includes(item));
      }
      return this.typeMismatch('tem', [container, item], node);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
