/**
 * Stack and Frame Lifecycle
 *
 * The live scope chain of one execution. Call frames cut name resolution:
 * a function body sees its own frames, then the globals of the module it
 * was defined in, then the prelude. Caller frames are never visited.
 */

import type { SourceSpan } from '../../types.js';
import type { ValueCell } from './cells.js';
import { createDiagnostic } from './diagnostics.js';
import { Environment } from './environment.js';
import { fail, ok, type Result } from './signals.js';
import type { TendaValue } from './values.js';

export type FrameKind = 'block' | 'call';

export interface FrameMetadata {
  readonly kind: FrameKind;
  /** Callee name, for stack traces */
  readonly functionName?: string | undefined;
  /** Span of the call expression that pushed this frame */
  readonly callSite?: SourceSpan | undefined;
  /** Global scope of the module the callee was defined in */
  readonly globals?: Environment | undefined;
  /** Id of the module the callee was defined in; unset for natives */
  readonly moduleId?: string | undefined;
}

export interface StackFrame extends FrameMetadata {
  readonly env: Environment;
}

export class Stack {
  private readonly frames: StackFrame[] = [];
  private calls = 0;

  /**
   * @param global - top-level scope of the module being executed
   * @param base - prelude scope; read-only to programs
   * @param maxCallDepth - ceiling on nested call frames
   */
  constructor(
    readonly global: Environment,
    readonly base: Environment,
    readonly maxCallDepth: number
  ) {}

  /** Number of frames above the global scope */
  get depth(): number {
    return this.frames.length;
  }

  /** Number of call frames on the stack */
  get callDepth(): number {
    return this.calls;
  }

  /** Innermost scope receiving declarations */
  current(): Environment {
    return this.frames[this.frames.length - 1]?.env ?? this.global;
  }

  /** Innermost call frame of a script function */
  scriptCall(): StackFrame | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame?.kind === 'call' && frame.moduleId !== undefined) return frame;
    }
    return undefined;
  }

  push(env: Environment, metadata: FrameMetadata): Result<StackFrame> {
    if (metadata.kind === 'call') {
      if (this.calls >= this.maxCallDepth) {
        return fail(
          createDiagnostic({ kind: 'StackOverflow', limit: this.maxCallDepth })
        );
      }
      this.calls++;
    }
    const frame: StackFrame = { ...metadata, env };
    this.frames.push(frame);
    return ok(frame);
  }

  pop(): void {
    const frame = this.frames.pop();
    if (frame?.kind === 'call') {
      this.calls--;
    }
  }

  /**
   * Push a frame, run `body` and pop the frame on every exit path,
   * host exceptions included.
   */
  withFrame<T>(
    env: Environment,
    metadata: FrameMetadata,
    body: (frame: StackFrame) => T
  ): Result<T> {
    const pushed = this.push(env, metadata);
    if (!pushed.ok) return pushed;
    try {
      return ok(body(pushed.value));
    } finally {
      this.pop();
    }
  }

  /** Scopes visible from the top of the stack, innermost first */
  *scopes(): Generator<Environment> {
    let globals = this.global;
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame === undefined) continue;
      yield frame.env;
      if (frame.kind === 'call') {
        globals = frame.globals ?? this.global;
        break;
      }
    }
    yield globals;
    yield this.base;
  }

  /** Scope holding `name`, or undefined when it is not reachable */
  resolveScope(name: string): Environment | undefined {
    for (const scope of this.scopes()) {
      if (scope.has(name)) return scope;
    }
    return undefined;
  }

  resolve(name: string): ValueCell | undefined {
    return this.resolveScope(name)?.lookup(name);
  }

  declare(name: string, cell: ValueCell): Result<void> {
    return this.current().declare(name, cell);
  }

  assign(name: string, value: TendaValue): Result<void> {
    const scope = this.resolveScope(name);
    if (scope === undefined) {
      return fail(createDiagnostic({ kind: 'UndefinedVariable', name }));
    }
    if (scope === this.base) {
      return fail(createDiagnostic({ kind: 'ImmutableBinding', name }));
    }
    return scope.assign(name, value);
  }

  /**
   * Every reachable Shared binding, innermost binding of a name first,
   * skipping `exclude` and the prelude.
   */
  collectShared(exclude: ReadonlySet<string>): Environment {
    const snapshot = new Environment();
    for (const scope of this.scopes()) {
      if (scope === this.base) break;
      for (const [name, cell] of scope) {
        if (cell.kind !== 'shared' || exclude.has(name) || snapshot.has(name)) {
          continue;
        }
        snapshot.upsert(name, cell);
      }
    }
    return snapshot;
  }
}
