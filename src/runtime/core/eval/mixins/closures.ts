/**
 * ClosuresMixin: Function Definition and Invocation
 *
 * Builds closures from declarations and function expressions, and runs
 * the call contract shared by closures and native callables:
 *
 * 1. Callee must be callable (NotCallable)
 * 2. Argument count must fit the arity (ArityMismatch), checked before
 *    any frame is pushed
 * 3. A call frame is pushed (StackOverflow past the ceiling) holding the
 *    captured snapshot, the function's own name and the parameters
 * 4. The body runs in a block frame above it
 * 5. `retorna v` yields v; falling off the end yields Nada
 *
 * A diagnostic leaving a call records the callee name and call site.
 *
 * @internal
 */

import type {
  ASTNode,
  CallNode,
  FunctionDeclNode,
  FunctionExprNode,
  ParamNode,
} from '../../../../types.js';
import {
  acceptsArgs,
  arityOf,
  callableName,
  makeFunction,
  type FunctionMetadata,
  type NativeCallable,
  type NativeHost,
  type ParamDescriptor,
  type TendaFunction,
} from '../../callable.js';
import { cellFor } from '../../cells.js';
import {
  createDiagnostic,
  withCallFrame,
  withSpan,
  type Diagnostic,
  type DiagnosticPayload,
} from '../../diagnostics.js';
import { Environment } from '../../environment.js';
import {
  fail,
  normal,
  ok,
  raised,
  type ControlSignal,
  type Result,
} from '../../signals.js';
import {
  createList,
  isCallable,
  typeName,
  type TendaValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

const ANONYMOUS = '<anônima>';

function toDescriptors(params: ParamNode[]): ParamDescriptor[] {
  return params.map((param) => ({
    name: param.name,
    captured: param.captured,
    defaultValue: param.defaultValue,
    variadic: param.variadic,
  }));
}

function createClosuresMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ClosuresEvaluator extends Base {
    /**
     * The function value is bound under its own name inside each call
     * frame, so the body may recurse before this declaration completes.
     */
    protected override executeFunctionDecl(
      node: FunctionDeclNode
    ): ControlSignal {
      const fn = this.createClosure(node.params, node, {
        name: node.name,
        selfName: node.name,
        selfCaptured: node.selfCaptured,
      });
      const declared = this.declareBinding(node.name, fn, node.captured, node);
      return declared.ok ? normal() : raised(declared.diagnostic);
    }

    /** `selfName` is the `seja` binding the expression initializes, if any */
    protected override evaluateFunctionExpr(
      node: FunctionExprNode,
      selfName?: string
    ): Result<TendaValue> {
      const metadata: FunctionMetadata =
        selfName === undefined
          ? {}
          : { name: selfName, selfName, selfCaptured: node.selfCaptured };
      return ok(this.createClosure(node.params, node, metadata));
    }

    protected override evaluateCall(node: CallNode): Result<TendaValue> {
      const callee = this.evaluateExpression(node.callee);
      if (!callee.ok) return callee;
      const args = this.evaluateAll(node.args);
      if (!args.ok) return args;
      return this.invoke(callee.value, args.value, node);
    }

    override invoke(
      callee: TendaValue,
      args: TendaValue[],
      callSite?: ASTNode
    ): Result<TendaValue> {
      if (!isCallable(callee)) {
        return this.callFailure(
          { kind: 'NotCallable', valueType: typeName(callee) },
          callSite
        );
      }

      const name = callableName(callee);
      const arity = arityOf(callee);
      if (!acceptsArgs(arity, args.length)) {
        return this.callFailure(
          {
            kind: 'ArityMismatch',
            callee: name,
            expected: arity,
            found: args.length,
          },
          callSite
        );
      }

      const eventName = name ?? ANONYMOUS;
      this.ctx.observability.onCall?.({ name: eventName, args });
      const startTime = performance.now();

      const result =
        callee.kind === 'native'
          ? this.callNative(callee, args, callSite)
          : this.callFunction(callee, args, callSite);

      if (!result.ok) {
        return fail(
          withCallFrame(result.diagnostic, {
            functionName: name,
            span: callSite?.span,
            moduleId: this.moduleId,
          })
        );
      }

      this.ctx.observability.onReturn?.({
        name: eventName,
        value: result.value,
        durationMs: performance.now() - startTime,
      });
      return result;
    }

    // ============================================================
    // CALL MECHANICS
    // ============================================================

    /** The closure belongs to the module whose code defines it */
    private createClosure(
      params: ParamNode[],
      node: FunctionDeclNode | FunctionExprNode,
      metadata: FunctionMetadata
    ): TendaFunction {
      const definer = this.stack.scriptCall();
      return makeFunction(this.stack, toDescriptors(params), node.body, {
        ...metadata,
        span: node.span,
        globals: definer?.globals ?? this.ctx.currentModule.globals,
        moduleId: this.moduleId,
      });
    }

    private callFunction(
      fn: TendaFunction,
      args: TendaValue[],
      callSite: ASTNode | undefined
    ): Result<TendaValue> {
      const env = new Environment();
      for (const [name, cell] of fn.captured) {
        env.upsert(name, cell);
      }
      const { selfName, selfCaptured } = fn.metadata;
      if (selfName !== undefined) {
        env.upsert(selfName, cellFor(fn, selfCaptured ?? false));
      }

      const frame = this.stack.withFrame(
        env,
        {
          kind: 'call',
          functionName: fn.metadata.name,
          callSite: callSite?.span,
          globals: fn.metadata.globals,
          moduleId: fn.metadata.moduleId,
        },
        () => {
          const bound = this.bindParams(fn, args, env);
          return bound.ok ? this.executeBlock(fn.body) : raised(bound.diagnostic);
        }
      );

      if (!frame.ok) return this.atCallSite(frame.diagnostic, callSite);
      const signal = frame.value;
      switch (signal.type) {
        case 'return':
        case 'normal':
          return ok(signal.type === 'return' ? signal.value : null);
        case 'raised':
          return fail(signal.diagnostic);
        default:
          return ok(null);
      }
    }

    /**
     * Bind arguments in order. A missing argument takes its default,
     * evaluated in the call frame after the earlier parameters are bound;
     * a variadic parameter collects the rest in a list.
     */
    private bindParams(
      fn: TendaFunction,
      args: TendaValue[],
      env: Environment
    ): Result<void> {
      for (const [i, param] of fn.params.entries()) {
        let value: TendaValue = null;
        if (param.variadic) {
          value = createList(args.slice(i));
        } else if (i < args.length) {
          value = args[i] ?? null;
        } else if (param.defaultValue !== null) {
          const evaluated = this.evaluateExpression(param.defaultValue);
          if (!evaluated.ok) {
            return fail(
              this.locate(evaluated.diagnostic, param.defaultValue.span)
            );
          }
          value = evaluated.value;
        }
        env.upsert(param.name, cellFor(value, param.captured));
      }
      return ok(undefined);
    }

    private callNative(
      native: NativeCallable,
      args: TendaValue[],
      callSite: ASTNode | undefined
    ): Result<TendaValue> {
      const host: NativeHost = {
        invoke: (callee, callArgs) => this.invoke(callee, callArgs, callSite),
        log: (text) => this.ctx.callbacks.onLog(text),
      };

      const frame = this.stack.withFrame(
        new Environment(),
        { kind: 'call', functionName: native.name, callSite: callSite?.span },
        () => native.fn(args, host)
      );

      if (!frame.ok) return this.atCallSite(frame.diagnostic, callSite);
      const result = frame.value;
      return result.ok ? result : this.atCallSite(result.diagnostic, callSite);
    }

    private callFailure(
      payload: DiagnosticPayload,
      callSite: ASTNode | undefined
    ): Result<never> {
      return callSite === undefined
        ? fail(createDiagnostic(payload))
        : this.failAt(payload, callSite);
    }

    private atCallSite(
      diagnostic: Diagnostic,
      callSite: ASTNode | undefined
    ): Result<never> {
      return fail(
        callSite === undefined ? diagnostic : withSpan(diagnostic, callSite.span)
      );
    }
  };
}

export const ClosuresMixin = createClosuresMixin;
