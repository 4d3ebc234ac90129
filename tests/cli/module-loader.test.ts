/**
 * Tenda CLI Tests: module loading
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  loadProgramGraph,
  resolveSpecifier,
  SourceFileError,
} from '../../src/cli-module-loader.js';
import { formatError } from '../../src/cli-shared.js';

describe('cli-module-loader', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tenda-loader-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeModule(name: string, content: string): Promise<string> {
    const modulePath = path.join(tempDir, name);
    await fs.mkdir(path.dirname(modulePath), { recursive: true });
    await fs.writeFile(modulePath, content);
    return modulePath;
  }

  describe('resolveSpecifier', () => {
    it('adds the source extension and resolves beside the importer', () => {
      expect(resolveSpecifier('util', '/projeto/principal.tenda')).toBe(
        path.resolve('/projeto/util.tenda')
      );
      expect(resolveSpecifier('../lib/mat', '/projeto/src/a.tenda')).toBe(
        path.resolve('/projeto/lib/mat.tenda')
      );
    });

    it('keeps an explicit extension', () => {
      expect(resolveSpecifier('dados.txt', '/p/a.tenda')).toBe(
        path.resolve('/p/dados.txt')
      );
    });
  });

  describe('loadProgramGraph', () => {
    it('loads every reachable module once', async () => {
      const comum = await writeModule('grafo/comum.tenda', 'exporte seja x = 1');
      const a = await writeModule('grafo/a.tenda', 'importe "comum"');
      const entry = await writeModule(
        'grafo/principal.tenda',
        'importe "a"\nimporte "comum"'
      );

      const program = await loadProgramGraph(entry);
      expect(program.entryId).toBe(entry);
      expect([...program.graph.keys()].sort()).toEqual([a, comum, entry].sort());
      expect(program.graph.get(entry)?.imports).toEqual({ a, comum });
      expect(program.sources.get(comum)).toBe('exporte seja x = 1');
    });

    it('rejects import cycles before running anything', async () => {
      const a = await writeModule('ciclo/a.tenda', 'importe "b"');
      const b = await writeModule('ciclo/b.tenda', 'importe "a"');
      await expect(loadProgramGraph(a)).rejects.toThrow(
        `Circular dependency detected: ${a} -> ${b} -> ${a}`
      );
    });

    it('reports missing imports by specifier', async () => {
      const entry = await writeModule('falta/p.tenda', 'importe "sumido"');
      await expect(loadProgramGraph(entry)).rejects.toThrow(
        'Module not found: sumido'
      );
    });

    it('reports a missing entry file', async () => {
      await expect(loadProgramGraph('nao/existe.tenda')).rejects.toThrow(
        'File not found: nao/existe.tenda'
      );
    });

    it('ties syntax errors to their file', async () => {
      const broken = await writeModule('sintaxe/quebrado.tenda', 'seja = 1');
      const entry = await writeModule('sintaxe/p.tenda', 'importe "quebrado"');

      const error: unknown = await loadProgramGraph(entry).catch(
        (err: unknown) => err
      );
      expect(error).toBeInstanceOf(SourceFileError);
      if (!(error instanceof SourceFileError)) return;
      expect(error.filePath).toBe(broken);
      expect(error.source).toBe('seja = 1');
      expect(formatError(error).split('\n').slice(1)).toEqual([
        `  --> ${broken}:1:6`,
        '  |',
        '1 | seja = 1',
        '  |      ^',
      ]);
    });
  });
});
