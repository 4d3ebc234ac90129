/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins, plus
 * stubs for the methods mixins provide to each other.
 *
 * @internal
 */

import type {
  ASTNode,
  SourceSpan,
  AssignNode,
  BinaryExprNode,
  BlockNode,
  CallNode,
  DictLiteralNode,
  ExportNode,
  ExpressionNode,
  FieldNode,
  ForEachNode,
  FunctionDeclNode,
  FunctionExprNode,
  IfNode,
  ImportNode,
  IndexNode,
  ListLiteralNode,
  LogicalExprNode,
  ProgramNode,
  ReturnNode,
  StatementNode,
  ThrowNode,
  TryNode,
  UnaryExprNode,
  VariableDeclNode,
  VariableNode,
  WhileNode,
} from '../../../types.js';
import { cellFor } from '../cells.js';
import {
  createDiagnostic,
  inModule,
  withSpan,
  type Diagnostic,
  type DiagnosticPayload,
} from '../diagnostics.js';
import { Environment } from '../environment.js';
import { fail, type ControlSignal, type Failure, type Result } from '../signals.js';
import type { Stack } from '../stack.js';
import type { RuntimeContext } from '../types.js';
import { typeName, type TendaValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 * All internal methods are protected to enable mixin access.
 */
export class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /** Stack of the module currently executing */
  protected get stack(): Stack {
    return this.ctx.stack;
  }

  /**
   * Module whose code is running: the defining module of the innermost
   * script function, else the module being executed.
   */
  protected get moduleId(): string {
    return this.stack.scriptCall()?.moduleId ?? this.ctx.currentModule.id;
  }

  /** Attach `span` and the running module where the diagnostic has none */
  protected locate(diagnostic: Diagnostic, span: SourceSpan): Diagnostic {
    return inModule(withSpan(diagnostic, span), this.moduleId);
  }

  /** Failure carrying `payload`, located at `node` */
  protected failAt(payload: DiagnosticPayload, node: ASTNode): Failure {
    return fail({ ...createDiagnostic(payload), span: node.span });
  }

  /** TypeMismatch naming the operand types */
  protected typeMismatch(
    operation: string,
    operands: TendaValue[],
    node: ASTNode,
    expected?: string
  ): Failure {
    return this.failAt(
      {
        kind: 'TypeMismatch',
        operation,
        operands: operands.map(typeName),
        expected,
      },
      node
    );
  }

  /**
   * Declare `name` in the innermost scope, Shared when a closure
   * captures it.
   */
  protected declareBinding(
    name: string,
    value: TendaValue,
    captured: boolean,
    node: ASTNode
  ): Result<void> {
    const declared = this.stack.declare(name, cellFor(value, captured));
    return declared.ok ? declared : fail(withSpan(declared.diagnostic, node.span));
  }

  /** Run `body` inside a fresh block frame */
  protected inBlockFrame(
    body: () => ControlSignal,
    env: Environment = new Environment()
  ): ControlSignal {
    const result = this.stack.withFrame(env, { kind: 'block' }, body);
    return result.ok ? result.value : { type: 'raised', diagnostic: result.diagnostic };
  }

  // ============================================================
  // MIXIN STUBS
  // Overridden by the mixin named in each message.
  // ============================================================

  executeProgram(_program: ProgramNode): ControlSignal {
    return unimplemented('executeProgram', 'ModulesMixin');
  }

  protected executeStatement(_node: StatementNode): ControlSignal {
    return unimplemented('executeStatement', 'CoreMixin');
  }

  protected executeStatements(_statements: StatementNode[]): ControlSignal {
    return unimplemented('executeStatements', 'CoreMixin');
  }

  protected executeBlock(_node: BlockNode): ControlSignal {
    return unimplemented('executeBlock', 'CoreMixin');
  }

  protected evaluateExpression(_node: ExpressionNode): Result<TendaValue> {
    return unimplemented('evaluateExpression', 'CoreMixin');
  }

  protected evaluateAll(_nodes: ExpressionNode[]): Result<TendaValue[]> {
    return unimplemented('evaluateAll', 'CoreMixin');
  }

  protected evaluateList(_node: ListLiteralNode): Result<TendaValue> {
    return unimplemented('evaluateList', 'LiteralsMixin');
  }

  protected evaluateDict(_node: DictLiteralNode): Result<TendaValue> {
    return unimplemented('evaluateDict', 'LiteralsMixin');
  }

  protected evaluateVariable(_node: VariableNode): Result<TendaValue> {
    return unimplemented('evaluateVariable', 'VariablesMixin');
  }

  protected evaluateIndex(_node: IndexNode): Result<TendaValue> {
    return unimplemented('evaluateIndex', 'VariablesMixin');
  }

  protected evaluateField(_node: FieldNode): Result<TendaValue> {
    return unimplemented('evaluateField', 'VariablesMixin');
  }

  protected evaluateAssign(_node: AssignNode): Result<TendaValue> {
    return unimplemented('evaluateAssign', 'VariablesMixin');
  }

  protected executeVariableDecl(_node: VariableDeclNode): ControlSignal {
    return unimplemented('executeVariableDecl', 'VariablesMixin');
  }

  protected evaluateBinary(_node: BinaryExprNode): Result<TendaValue> {
    return unimplemented('evaluateBinary', 'ExpressionsMixin');
  }

  protected evaluateLogical(_node: LogicalExprNode): Result<TendaValue> {
    return unimplemented('evaluateLogical', 'ExpressionsMixin');
  }

  protected evaluateUnary(_node: UnaryExprNode): Result<TendaValue> {
    return unimplemented('evaluateUnary', 'ExpressionsMixin');
  }

  protected executeIf(_node: IfNode): ControlSignal {
    return unimplemented('executeIf', 'ControlFlowMixin');
  }

  protected executeWhile(_node: WhileNode): ControlSignal {
    return unimplemented('executeWhile', 'ControlFlowMixin');
  }

  protected executeForEach(_node: ForEachNode): ControlSignal {
    return unimplemented('executeForEach', 'ControlFlowMixin');
  }

  protected executeReturn(_node: ReturnNode): ControlSignal {
    return unimplemented('executeReturn', 'ControlFlowMixin');
  }

  protected executeFunctionDecl(_node: FunctionDeclNode): ControlSignal {
    return unimplemented('executeFunctionDecl', 'ClosuresMixin');
  }

  protected evaluateFunctionExpr(
    _node: FunctionExprNode,
    _selfName?: string
  ): Result<TendaValue> {
    return unimplemented('evaluateFunctionExpr', 'ClosuresMixin');
  }

  protected evaluateCall(_node: CallNode): Result<TendaValue> {
    return unimplemented('evaluateCall', 'ClosuresMixin');
  }

  protected executeTry(_node: TryNode): ControlSignal {
    return unimplemented('executeTry', 'ErrorsMixin');
  }

  protected executeThrow(_node: ThrowNode): ControlSignal {
    return unimplemented('executeThrow', 'ErrorsMixin');
  }

  protected executeImport(_node: ImportNode): ControlSignal {
    return unimplemented('executeImport', 'ModulesMixin');
  }

  protected executeExport(_node: ExportNode): ControlSignal {
    return unimplemented('executeExport', 'ModulesMixin');
  }

  /** Call any callable value; public so native callables can reach it */
  invoke(
    _callee: TendaValue,
    _args: TendaValue[],
    _callSite?: ASTNode
  ): Result<TendaValue> {
    return unimplemented('invoke', 'ClosuresMixin');
  }
}

function unimplemented(method: string, mixin: string): never {
  throw new Error(
    `${method} requires full Evaluator composition with ${mixin}`
  );
}
