/**
 * VariablesMixin: Bindings and Element Access
 *
 * Handles name declaration, lookup and assignment through the Stack,
 * plus indexed and field access on lists, texts, dictionaries and ranges.
 *
 * Error Handling:
 * - Unknown names fail UndefinedVariable [Stack.resolve]
 * - Prelude names fail ImmutableBinding on assignment
 * - Index errors: TypeMismatch (not a number), InvalidIndex (negative
 *   or fractional), IndexOutOfBounds
 * - Dictionary errors: InvalidKey, KeyNotFound
 *
 * @internal
 */

import type {
  ASTNode,
  AssignNode,
  FieldNode,
  IndexNode,
  VariableDeclNode,
  VariableNode,
} from '../../../../types.js';
import { read } from '../../cells.js';
import { withSpan } from '../../diagnostics.js';
import {
  fail,
  normal,
  ok,
  raised,
  type ControlSignal,
  type Result,
} from '../../signals.js';
import {
  formatNumber,
  formatValue,
  isDict,
  isList,
  isRange,
  rangeLength,
  toDictKey,
  type DictKey,
  type TendaDict,
  type TendaValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createVariablesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class VariablesEvaluator extends Base {
    protected override executeVariableDecl(
      node: VariableDeclNode
    ): ControlSignal {
      const value =
        node.value.type === 'FunctionExpr'
          ? this.evaluateFunctionExpr(node.value, node.name)
          : this.evaluateExpression(node.value);
      if (!value.ok) return raised(value.diagnostic);

      const declared = this.declareBinding(
        node.name,
        value.value,
        node.captured,
        node
      );
      return declared.ok ? normal() : raised(declared.diagnostic);
    }

    protected override evaluateVariable(
      node: VariableNode
    ): Result<TendaValue> {
      const cell = this.stack.resolve(node.name);
      if (cell === undefined) {
        return this.failAt({ kind: 'UndefinedVariable', name: node.name }, node);
      }
      return ok(read(cell));
    }

    protected override evaluateIndex(node: IndexNode): Result<TendaValue> {
      const object = this.evaluateExpression(node.object);
      if (!object.ok) return object;
      const index = this.evaluateExpression(node.index);
      if (!index.ok) return index;
      return this.readElement(object.value, index.value, node);
    }

    protected override evaluateField(node: FieldNode): Result<TendaValue> {
      const object = this.evaluateExpression(node.object);
      if (!object.ok) return object;
      if (!isDict(object.value)) {
        return this.typeMismatch('.', [object.value], node, 'dicionário');
      }
      return this.readKey(object.value, node.name, node);
    }

    /** Evaluates the target object, then the value, then the index */
    protected override evaluateAssign(node: AssignNode): Result<TendaValue> {
      const { target } = node;

      if (target.type === 'Variable') {
        const value = this.evaluateExpression(node.value);
        if (!value.ok) return value;
        const assigned = this.stack.assign(target.name, value.value);
        if (!assigned.ok) {
          return fail(withSpan(assigned.diagnostic, target.span));
        }
        return value;
      }

      const object = this.evaluateExpression(target.object);
      if (!object.ok) return object;
      const value = this.evaluateExpression(node.value);
      if (!value.ok) return value;

      if (target.type === 'Field') {
        if (!isDict(object.value)) {
          return this.typeMismatch('.', [object.value], target, 'dicionário');
        }
        object.value.entries.set(target.name, value.value);
        return value;
      }

      const index = this.evaluateExpression(target.index);
      if (!index.ok) return index;
      const written = this.writeElement(
        object.value,
        index.value,
        value.value,
        target
      );
      return written.ok ? value : written;
    }

    // ============================================================
    // ELEMENT ACCESS
    // ============================================================

    protected readElement(
      object: TendaValue,
      index: TendaValue,
      node: ASTNode
    ): Result<TendaValue> {
      if (isDict(object)) {
        const key = this.toKey(index, node);
        return key.ok ? this.readKey(object, key.value, node) : key;
      }

      if (isList(object) || typeof object === 'string' || isRange(object)) {
        const position = this.toPosition(index, node);
        if (!position.ok) return position;
        const at = position.value;

        if (isList(object)) {
          const item = object.items[at];
          return item === undefined
            ? this.outOfBounds(at, object.items.length, node)
            : ok(item);
        }
        if (typeof object === 'string') {
          const chars = [...object];
          const char = chars[at];
          return char === undefined
            ? this.outOfBounds(at, chars.length, node)
            : ok(char);
        }
        const length = rangeLength(object);
        return at < length
          ? ok(object.start + at)
          : this.outOfBounds(at, length, node);
      }

      return this.typeMismatch('[]', [object], node);
    }

    protected writeElement(
      object: TendaValue,
      index: TendaValue,
      value: TendaValue,
      node: ASTNode
    ): Result<void> {
      if (isDict(object)) {
        const key = this.toKey(index, node);
        if (!key.ok) return key;
        object.entries.set(key.value, value);
        return ok(undefined);
      }

      if (isList(object)) {
        const position = this.toPosition(index, node);
        if (!position.ok) return position;
        if (position.value >= object.items.length) {
          return this.outOfBounds(position.value, object.items.length, node);
        }
        object.items[position.value] = value;
        return ok(undefined);
      }

      if (typeof object === 'string') {
        return this.failAt({ kind: 'ImmutableText' }, node);
      }

      return this.typeMismatch('[]=', [object], node);
    }

    private readKey(
      dict: TendaDict,
      key: DictKey,
      node: ASTNode
    ): Result<TendaValue> {
      const value = dict.entries.get(key);
      if (value === undefined) {
        return this.failAt(
          { kind: 'KeyNotFound', key: formatValue(key, true) },
          node
        );
      }
      return ok(value);
    }

    private toKey(index: TendaValue, node: ASTNode): Result<DictKey> {
      const key = toDictKey(index);
      return key === null
        ? this.failAt({ kind: 'InvalidKey', key: formatValue(index, true) }, node)
        : ok(key);
    }

    private toPosition(index: TendaValue, node: ASTNode): Result<number> {
      if (typeof index !== 'number') {
        return this.typeMismatch('[]', [index], node, 'número');
      }
      if (!Number.isInteger(index) || index < 0) {
        return this.failAt(
          { kind: 'InvalidIndex', index: formatNumber(index) },
          node
        );
      }
      return ok(index);
    }

    private outOfBounds(
      index: number,
      length: number,
      node: ASTNode
    ): Result<never> {
      return this.failAt({ kind: 'IndexOutOfBounds', index, length }, node);
    }
  };
}

export const VariablesMixin = createVariablesMixin;
