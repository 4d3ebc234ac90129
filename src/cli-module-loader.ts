/**
 * CLI Module Loader
 *
 * Reads a .tenda entry file and every file it reaches through `importe`,
 * producing the program graph the runtime executes. Cycles are rejected
 * before anything runs.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from './parser/index.js';
import type { ModuleUnit, ProgramGraph } from './runtime/index.js';
import { TendaError, type ProgramNode } from './types.js';

/** Extension added to specifiers that have none */
export const SOURCE_EXTENSION = '.tenda';

/** A lexer or parse error, tied to the file it came from */
export class SourceFileError extends Error {
  constructor(
    readonly filePath: string,
    readonly source: string,
    readonly error: TendaError
  ) {
    super(error.message);
    this.name = 'SourceFileError';
  }
}

export interface LoadedProgram {
  /** Module id of the entry file (its absolute path) */
  readonly entryId: string;
  readonly graph: ProgramGraph;
  /** Source text by module id */
  readonly sources: ReadonlyMap<string, string>;
}

interface LoaderState {
  readonly graph: Map<string, ModuleUnit>;
  readonly sources: Map<string, string>;
}

/** Absolute path of `specifier`, relative to the importing file */
export function resolveSpecifier(specifier: string, fromPath: string): string {
  const withExtension =
    path.extname(specifier) === '' ? specifier + SOURCE_EXTENSION : specifier;
  return path.resolve(path.dirname(fromPath), withExtension);
}

/**
 * Load a module and its dependencies recursively.
 *
 * @param absolutePath - Resolved path of the module
 * @param specifier - Path as written, for error messages
 * @param chain - Paths in the current import chain, for cycle detection
 * @returns Module id of the loaded file
 * @throws Error if module not found or circular dependency detected
 */
async function loadModule(
  absolutePath: string,
  specifier: string,
  state: LoaderState,
  chain: Set<string>
): Promise<string> {
  if (chain.has(absolutePath)) {
    const cycle = [...chain, absolutePath].join(' -> ');
    throw new Error(`Circular dependency detected: ${cycle}`);
  }

  if (state.graph.has(absolutePath)) {
    return absolutePath;
  }

  let source: string;
  try {
    source = await fs.readFile(absolutePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new Error(`Module not found: ${specifier}`);
    }
    throw err;
  }

  let program: ProgramNode;
  try {
    program = parse(source);
  } catch (err) {
    if (err instanceof TendaError) {
      throw new SourceFileError(absolutePath, source, err);
    }
    throw err;
  }

  chain.add(absolutePath);
  try {
    const imports: Record<string, string> = {};
    for (const statement of program.statements) {
      if (statement.type === 'Import' && !(statement.specifier in imports)) {
        imports[statement.specifier] = await loadModule(
          resolveSpecifier(statement.specifier, absolutePath),
          statement.specifier,
          state,
          chain
        );
      }
    }

    state.graph.set(absolutePath, { id: absolutePath, program, imports });
    state.sources.set(absolutePath, source);
    return absolutePath;
  } finally {
    chain.delete(absolutePath);
  }
}

/**
 * Load the entry file and everything it imports.
 *
 * @throws Error with "File not found: {path}" when the entry file is missing
 */
export async function loadProgramGraph(
  entryPath: string
): Promise<LoadedProgram> {
  const absolutePath = path.resolve(entryPath);
  try {
    await fs.access(absolutePath);
  } catch {
    throw new Error(`File not found: ${entryPath}`);
  }

  const state: LoaderState = { graph: new Map(), sources: new Map() };
  const entryId = await loadModule(
    absolutePath,
    entryPath,
    state,
    new Set()
  );
  return { entryId, graph: state.graph, sources: state.sources };
}
