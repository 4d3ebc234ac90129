#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the tenda-exec
 * binary. Handles configuration, module loading and diagnostic output.
 */

import * as path from 'path';
import { loadConfig } from './cli-config.js';
import { loadProgramGraph, type LoadedProgram } from './cli-module-loader.js';
import { formatError, readVersion } from './cli-shared.js';
import { createRuntimeContext, execute } from './runtime/index.js';
import type {
  Diagnostic,
  ExecutionResult,
  RuntimeCallbacks,
  RuntimeContext,
} from './runtime/index.js';
import { formatDiagnostic } from './reporting.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'exec';
      file: string;
      maxDepth?: number | undefined;
      configPath?: string | undefined;
    }
  | { mode: 'help' | 'version' };

const USAGE = `Uso:
  tenda-exec <arquivo.tenda>            Executa um programa Tenda
  tenda-exec --max-depth <n> <arquivo>  Limita a profundidade de chamadas
  tenda-exec --config <caminho> <arq.>  Lê a configuração de outro arquivo
  tenda-exec --help                     Mostra esta ajuda
  tenda-exec --version                  Mostra a versão

Configuração:
  Um arquivo .tenda.yaml ao lado do programa pode definir maxCallStackDepth.`;

function parseDepth(value: string | undefined): number {
  const depth = Number(value);
  if (value === undefined || !Number.isInteger(depth) || depth < 1) {
    throw new Error(`Invalid value for --max-depth: ${value ?? '(missing)'}`);
  }
  return depth;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let maxDepth: number | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--max-depth') {
      maxDepth = parseDepth(argv[++i]);
    } else if (arg === '--config') {
      configPath = argv[++i];
      if (configPath === undefined) {
        throw new Error('Missing path after --config');
      }
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  return { mode: 'exec', file, maxDepth, configPath };
}

export interface ScriptRun {
  readonly result: ExecutionResult;
  readonly program: LoadedProgram;
  readonly ctx: RuntimeContext;
}

/**
 * Execute a Tenda file with its imports.
 * A --max-depth flag wins over the configuration file.
 *
 * @throws Error if a file is missing, a module fails to parse or imports form a cycle
 */
export async function executeScript(
  file: string,
  options: {
    maxDepth?: number | undefined;
    configPath?: string | undefined;
    callbacks?: Partial<RuntimeCallbacks>;
  } = {}
): Promise<ScriptRun> {
  const program = await loadProgramGraph(file);
  const config = loadConfig(
    path.dirname(path.resolve(file)),
    options.configPath
  );

  const entry = program.graph.get(program.entryId);
  if (entry === undefined) {
    throw new Error(`Module not found: ${file}`);
  }

  const ctx = createRuntimeContext({
    maxCallStackDepth: options.maxDepth ?? config.maxCallStackDepth,
    modules: program.graph,
    moduleId: program.entryId,
    callbacks: options.callbacks ?? {},
  });

  return { result: execute(entry.program, ctx), program, ctx };
}

/** Names visible at the top level of `moduleId`, for "did you mean" hints */
function visibleNames(ctx: RuntimeContext, moduleId: string): string[] {
  const globals =
    ctx.instances.get(moduleId)?.globals ?? ctx.currentModule.globals;
  return [...ctx.base, ...globals].map(([name]) => name);
}

/**
 * Diagnostic text for a failed run. The excerpt comes from the module
 * the failing span points into; the entry keeps the path as given on the
 * command line and other modules show their resolved path.
 */
export function renderFailure(
  diagnostic: Diagnostic,
  run: Pick<ScriptRun, 'program' | 'ctx'>,
  file: string
): string {
  const { program, ctx } = run;
  const displayPath = (moduleId: string): string =>
    moduleId === program.entryId ? file : moduleId;
  const moduleId = diagnostic.moduleId ?? program.entryId;

  return formatDiagnostic(diagnostic, {
    source: program.sources.get(moduleId),
    path: displayPath(moduleId),
    modulePath: displayPath,
    names: visibleNames(ctx, moduleId),
  });
}

/**
 * Entry point for the tenda-exec binary
 *
 * Program output goes to stdout through exiba; diagnostics go to stderr.
 * Exits 1 on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'exec': {
        const run = await executeScript(parsed.file, {
          maxDepth: parsed.maxDepth,
          configPath: parsed.configPath,
        });
        if (!run.result.ok) {
          console.error(renderFailure(run.result.diagnostic, run, parsed.file));
          process.exit(1);
        }
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
