/**
 * ModulesMixin: Programs, importe and exporte
 *
 * Runs the entry program statement by statement, emitting step events,
 * and loads imported modules from the program graph. Each module runs
 * at most once per execution, in its own Stack and global scope over
 * the shared prelude. Importing copies the module's exported cells into
 * the importer's scope, so Shared exports stay shared.
 *
 * Error Handling:
 * - Specifier missing from the graph fails ModuleNotFound
 * - Importing a module that is still running fails CircularImport
 * - Exported names already bound in the importer fail AlreadyDeclared
 *
 * @internal
 */

import type {
  ExportNode,
  ImportNode,
  ProgramNode,
} from '../../../../types.js';
import { withSpan } from '../../diagnostics.js';
import { Environment } from '../../environment.js';
import {
  fail,
  normal,
  ok,
  raised,
  type ControlSignal,
  type Result,
} from '../../signals.js';
import { Stack } from '../../stack.js';
import type { ModuleInstance, ModuleUnit } from '../../types.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

function createModulesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class ModulesEvaluator extends Base {
    /** Run the entry program; its last statement's value is the result */
    override executeProgram(program: ProgramNode): ControlSignal {
      const { observability } = this.ctx;
      const total = program.statements.length;
      let last: ControlSignal = normal();

      for (const [index, statement] of program.statements.entries()) {
        observability.onStepStart?.({ index, total });
        const startTime = performance.now();

        last = this.executeStatement(statement);
        if (last.type !== 'normal') return last;

        observability.onStepEnd?.({
          index,
          total,
          value: last.value,
          durationMs: performance.now() - startTime,
        });
      }
      return last;
    }

    protected override executeImport(node: ImportNode): ControlSignal {
      const targetId = this.ctx.currentModule.imports[node.specifier];
      const unit =
        targetId === undefined ? undefined : this.ctx.modules.get(targetId);
      if (unit === undefined) {
        return raised(
          this.failAt(
            { kind: 'ModuleNotFound', specifier: node.specifier },
            node
          ).diagnostic
        );
      }

      let instance = this.ctx.instances.get(unit.id);
      if (instance?.status === 'running') {
        return raised(
          this.failAt({ kind: 'CircularImport', module: unit.id }, node)
            .diagnostic
        );
      }
      if (instance === undefined) {
        const loaded = this.runModule(unit);
        if (!loaded.ok) return raised(loaded.diagnostic);
        instance = loaded.value;
      }

      for (const name of instance.exports) {
        const cell = instance.globals.lookup(name);
        if (cell === undefined) continue;
        const declared = this.stack.declare(name, cell);
        if (!declared.ok) {
          return raised(withSpan(declared.diagnostic, node.span));
        }
      }
      return normal();
    }

    protected override executeExport(node: ExportNode): ControlSignal {
      const signal = this.executeStatement(node.declaration);
      if (signal.type === 'normal') {
        this.ctx.currentModule.exports.add(node.declaration.name);
      }
      return signal;
    }

    /** Run `unit` in a fresh Stack, restoring the importer's afterwards */
    private runModule(unit: ModuleUnit): Result<ModuleInstance> {
      const instance: ModuleInstance = {
        id: unit.id,
        globals: new Environment(),
        exports: new Set(),
        status: 'running',
        imports: unit.imports,
      };
      this.ctx.instances.set(unit.id, instance);

      const importerStack = this.ctx.stack;
      const importer = this.ctx.currentModule;
      this.ctx.stack = new Stack(
        instance.globals,
        this.ctx.base,
        this.ctx.maxCallStackDepth
      );
      this.ctx.currentModule = instance;

      let signal: ControlSignal;
      try {
        signal = this.executeStatements(unit.program.statements);
      } finally {
        this.ctx.stack = importerStack;
        this.ctx.currentModule = importer;
        instance.status = 'done';
      }

      return signal.type === 'raised' ? fail(signal.diagnostic) : ok(instance);
    }
  };
}

export const ModulesMixin = createModulesMixin;
