/**
 * Capture Analysis
 *
 * Marks every binding site that a nested function refers to, so the
 * runtime stores it in a Shared cell from its declaration on. Bindings no
 * closure refers to stay Owned.
 *
 * The pass only ever sets flags to true, so running it again over an
 * annotated tree changes nothing.
 */

import type {
  BlockNode,
  ExpressionNode,
  FunctionDeclNode,
  FunctionExprNode,
  ParamNode,
  ProgramNode,
  StatementNode,
} from '../types.js';

interface Binding {
  /** Function nesting level the binding was declared at */
  readonly level: number;
  readonly markCaptured: () => void;
}

interface Scope {
  readonly bindings: Map<string, Binding>;
  readonly parent: Scope | null;
  readonly level: number;
}

class CaptureAnalyzer {
  private scope: Scope = { bindings: new Map(), parent: null, level: 0 };

  analyzeProgram(program: ProgramNode): void {
    this.statements(program.statements);
  }

  private declare(name: string, markCaptured: () => void): void {
    this.scope.bindings.set(name, { level: this.scope.level, markCaptured });
  }

  private reference(name: string): void {
    for (let scope: Scope | null = this.scope; scope; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding) {
        if (binding.level < this.scope.level) {
          binding.markCaptured();
        }
        return;
      }
    }
  }

  private withScope(level: number, body: () => void): void {
    const saved = this.scope;
    this.scope = { bindings: new Map(), parent: saved, level };
    body();
    this.scope = saved;
  }

  private block(node: BlockNode): void {
    this.withScope(this.scope.level, () => this.statements(node.statements));
  }

  private statements(statements: StatementNode[]): void {
    for (const statement of statements) {
      this.statement(statement);
    }
  }

  private statement(node: StatementNode): void {
    switch (node.type) {
      case 'Block':
        this.block(node);
        return;
      case 'VariableDecl':
        if (node.value.type === 'FunctionExpr') {
          this.functionExpr(node.value, node.name);
        } else {
          this.expression(node.value);
        }
        this.declare(node.name, () => {
          node.captured = true;
        });
        return;
      case 'FunctionDecl':
        this.functionDecl(node);
        return;
      case 'If':
        this.expression(node.condition);
        this.block(node.thenBranch);
        if (node.elseBranch?.type === 'Block') {
          this.block(node.elseBranch);
        } else if (node.elseBranch) {
          this.statement(node.elseBranch);
        }
        return;
      case 'While':
        this.expression(node.condition);
        this.block(node.body);
        return;
      case 'ForEach':
        this.expression(node.iterable);
        // The item and the body's declarations share the iteration frame
        this.withScope(this.scope.level, () => {
          this.declare(node.item, () => {
            node.captured = true;
          });
          this.statements(node.body.statements);
        });
        return;
      case 'Try':
        this.block(node.body);
        this.withScope(this.scope.level, () => {
          if (node.errorName !== null) {
            this.declare(node.errorName, () => {
              node.captured = true;
            });
          }
          this.statements(node.handler.statements);
        });
        return;
      case 'Return':
        if (node.value) this.expression(node.value);
        return;
      case 'Throw':
        this.expression(node.value);
        return;
      case 'Export':
        this.statement(node.declaration);
        return;
      case 'ExpressionStatement':
        this.expression(node.expression);
        return;
      case 'Break':
      case 'Continue':
      case 'Import':
        return;
    }
  }

  private functionDecl(node: FunctionDeclNode): void {
    this.functionBody(node.params, node.body, () => {
      this.declare(node.name, () => {
        node.selfCaptured = true;
      });
    });
    this.declare(node.name, () => {
      node.captured = true;
    });
  }

  /**
   * Parameters, defaults and body statements all live in the call frame,
   * one level deeper than the definition site.
   */
  private functionBody(
    params: ParamNode[],
    body: BlockNode,
    declareSelf?: () => void
  ): void {
    this.withScope(this.scope.level + 1, () => {
      declareSelf?.();
      for (const param of params) {
        if (param.defaultValue) this.expression(param.defaultValue);
        this.declare(param.name, () => {
          param.captured = true;
        });
      }
      this.statements(body.statements);
    });
  }

  /** `selfName`: the `seja` binding, visible inside the body */
  private functionExpr(node: FunctionExprNode, selfName?: string): void {
    this.functionBody(
      node.params,
      node.body,
      selfName === undefined
        ? undefined
        : () => {
            this.declare(selfName, () => {
              node.selfCaptured = true;
            });
          }
    );
  }

  private expression(node: ExpressionNode): void {
    switch (node.type) {
      case 'NumberLiteral':
      case 'TextLiteral':
      case 'BoolLiteral':
      case 'NilLiteral':
        return;
      case 'ListLiteral':
        node.elements.forEach((element) => this.expression(element));
        return;
      case 'DictLiteral':
        for (const entry of node.entries) {
          this.expression(entry.key);
          this.expression(entry.value);
        }
        return;
      case 'Variable':
        this.reference(node.name);
        return;
      case 'Binary':
      case 'Logical':
        this.expression(node.left);
        this.expression(node.right);
        return;
      case 'Unary':
        this.expression(node.operand);
        return;
      case 'Call':
        this.expression(node.callee);
        node.args.forEach((arg) => this.expression(arg));
        return;
      case 'Index':
        this.expression(node.object);
        this.expression(node.index);
        return;
      case 'Field':
        this.expression(node.object);
        return;
      case 'Assign':
        this.expression(node.target);
        this.expression(node.value);
        return;
      case 'Grouped':
        this.expression(node.expression);
        return;
      case 'FunctionExpr':
        this.functionExpr(node);
        return;
    }
  }
}

/**
 * Annotate `captured` flags on every binding site of `program`.
 * Returns the same (mutated) tree.
 */
export function analyzeCaptures(program: ProgramNode): ProgramNode {
  new CaptureAnalyzer().analyzeProgram(program);
  return program;
}
