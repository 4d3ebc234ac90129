/**
 * CoreMixin: Statement and Expression Dispatch
 *
 * Routes each AST node to the mixin that evaluates it and threads
 * control signals through statement sequences.
 *
 * Depends on:
 * - EvaluatorBase: inBlockFrame()
 * - every other mixin, through the stubs declared on EvaluatorBase
 *
 * Methods added:
 * - executeStatement(node) -> ControlSignal
 * - executeStatements(statements) -> ControlSignal
 * - executeBlock(node) -> ControlSignal
 * - evaluateExpression(node) -> Result<TendaValue>
 * - evaluateAll(nodes) -> Result<TendaValue[]>
 *
 * @internal
 */

import type {
  BlockNode,
  ExpressionNode,
  StatementNode,
} from '../../../../types.js';
import {
  BREAK,
  CONTINUE,
  normal,
  ok,
  raised,
  type ControlSignal,
  type Result,
} from '../../signals.js';
import type { TendaValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createCoreMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class CoreEvaluator extends Base {
    /**
     * Raised signals leave with a span, the statement's when none is set,
     * and the id of the module that span belongs to.
     */
    protected override executeStatement(node: StatementNode): ControlSignal {
      const signal = this.dispatchStatement(node);
      return signal.type === 'raised'
        ? raised(this.locate(signal.diagnostic, node.span))
        : signal;
    }

    private dispatchStatement(node: StatementNode): ControlSignal {
      switch (node.type) {
        case 'Block':
          return this.executeBlock(node);
        case 'VariableDecl':
          return this.executeVariableDecl(node);
        case 'FunctionDecl':
          return this.executeFunctionDecl(node);
        case 'If':
          return this.executeIf(node);
        case 'While':
          return this.executeWhile(node);
        case 'ForEach':
          return this.executeForEach(node);
        case 'Return':
          return this.executeReturn(node);
        case 'Break':
          return BREAK;
        case 'Continue':
          return CONTINUE;
        case 'Try':
          return this.executeTry(node);
        case 'Throw':
          return this.executeThrow(node);
        case 'Import':
          return this.executeImport(node);
        case 'Export':
          return this.executeExport(node);
        case 'ExpressionStatement': {
          const result = this.evaluateExpression(node.expression);
          return result.ok ? normal(result.value) : raised(result.diagnostic);
        }
      }
    }

    /**
     * Run statements in order. The first non-normal signal stops the
     * sequence and is returned as is; otherwise the last statement's
     * signal carries the sequence value.
     */
    protected override executeStatements(
      statements: StatementNode[]
    ): ControlSignal {
      let last: ControlSignal = normal();
      for (const statement of statements) {
        last = this.executeStatement(statement);
        if (last.type !== 'normal') return last;
      }
      return last;
    }

    protected override executeBlock(node: BlockNode): ControlSignal {
      return this.inBlockFrame(() => this.executeStatements(node.statements));
    }

    protected override evaluateExpression(
      node: ExpressionNode
    ): Result<TendaValue> {
      switch (node.type) {
        case 'NumberLiteral':
        case 'TextLiteral':
        case 'BoolLiteral':
          return ok(node.value);
        case 'NilLiteral':
          return ok(null);
        case 'ListLiteral':
          return this.evaluateList(node);
        case 'DictLiteral':
          return this.evaluateDict(node);
        case 'Variable':
          return this.evaluateVariable(node);
        case 'Binary':
          return this.evaluateBinary(node);
        case 'Logical':
          return this.evaluateLogical(node);
        case 'Unary':
          return this.evaluateUnary(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'Index':
          return this.evaluateIndex(node);
        case 'Field':
          return this.evaluateField(node);
        case 'Assign':
          return this.evaluateAssign(node);
        case 'Grouped':
          return this.evaluateExpression(node.expression);
        case 'FunctionExpr':
          return this.evaluateFunctionExpr(node);
      }
    }

    /** Evaluate left to right, stopping at the first failure */
    protected override evaluateAll(
      nodes: ExpressionNode[]
    ): Result<TendaValue[]> {
      const values: TendaValue[] = [];
      for (const node of nodes) {
        const result = this.evaluateExpression(node);
        if (!result.ok) return result;
        values.push(result.value);
      }
      return ok(values);
    }
  };
}

export const CoreMixin = createCoreMixin;
