/**
 * Tenda Runtime Tests: importe and exporte
 */

import { describe, expect, it } from 'vitest';

import { diagnosticMessage, type ModuleUnit } from '../../src/index.js';
import {
  moduleUnit,
  programGraph,
  run,
  runDiagnostic,
  runLogged,
} from '../helpers/runtime.js';

/** Entry module 'principal' importing every other unit by its id */
function withModules(entry: string, ...units: ModuleUnit[]) {
  const imports: Record<string, string> = {};
  for (const unit of units) imports[unit.id] = unit.id;
  return {
    source: entry,
    options: {
      modules: programGraph(moduleUnit('principal', entry, imports), ...units),
    },
  };
}

describe('Tenda Runtime: Modules', () => {
  it('binds exported names in the importer', () => {
    const { source, options } = withModules(
      'importe "util"\ndobro(público)',
      moduleUnit(
        'util',
        'exporte seja público = 21\nexporte função dobro(n)\nretorna n * 2\nfim'
      )
    );
    expect(run(source, options)).toBe(42);
  });

  it('keeps names without exporte private', () => {
    const { source, options } = withModules(
      'importe "util"\nprivado',
      moduleUnit('util', 'seja privado = 1\nexporte seja público = 2')
    );
    expect(runDiagnostic(source, options)).toMatchObject({
      kind: 'UndefinedVariable',
      name: 'privado',
    });
  });

  it('runs each module once per execution', () => {
    const comum = moduleUnit('comum', 'exiba("carregado")');
    const a = moduleUnit('a', 'importe "comum"', { comum: 'comum' });
    const b = moduleUnit('b', 'importe "comum"', { comum: 'comum' });
    const entry = 'importe "a"\nimporte "b"\nexiba("fim")';
    const modules = programGraph(
      moduleUnit('principal', entry, { a: 'a', b: 'b' }),
      a,
      b,
      comum
    );
    expect(runLogged(entry, { modules })).toEqual(['carregado', 'fim']);
  });

  it('shares exported state with the importer', () => {
    const { source, options } = withModules(
      'importe "contador"\nincremente()\nincremente()',
      moduleUnit(
        'contador',
        [
          'seja contagem = 0',
          'exporte função incremente()',
          '  contagem = contagem + 1',
          '  retorna contagem',
          'fim',
        ].join('\n')
      )
    );
    expect(run(source, options)).toBe(2);
  });

  it('resolves free names in the defining module', () => {
    const { source, options } = withModules(
      'importe "util"\nleia()',
      moduleUnit(
        'util',
        'seja segredo = "de util"\nexporte função leia()\nretorna segredo\nfim'
      )
    );
    expect(run(source, options)).toBe('de util');
  });

  it('hides the importer globals from module functions', () => {
    const { source, options } = withModules(
      'seja x = 5\nimporte "util"\nleia()',
      moduleUnit('util', 'exporte função leia()\nretorna x\nfim')
    );
    expect(runDiagnostic(source, options)).toMatchObject({
      kind: 'UndefinedVariable',
      name: 'x',
    });
  });

  it('rejects an export that collides with an existing binding', () => {
    const { source, options } = withModules(
      'seja x = 1\nimporte "util"',
      moduleUnit('util', 'exporte seja x = 2')
    );
    expect(runDiagnostic(source, options)).toMatchObject({
      kind: 'AlreadyDeclared',
      name: 'x',
    });
  });

  it('fails on a specifier missing from the graph', () => {
    const diagnostic = runDiagnostic('importe "nada"');
    expect(diagnostic).toMatchObject({
      kind: 'ModuleNotFound',
      specifier: 'nada',
      span: { start: { line: 1, column: 1 } },
    });
    expect(diagnosticMessage(diagnostic)).toBe("Módulo 'nada' não encontrado");
  });

  it('fails on a circular import', () => {
    const a = moduleUnit('a', 'importe "b"', { b: 'b' });
    const b = moduleUnit('b', 'importe "a"', { a: 'a' });
    const diagnostic = runDiagnostic('importe "b"', {
      modules: programGraph(a, b),
      moduleId: 'a',
    });
    expect(diagnostic).toMatchObject({ kind: 'CircularImport', module: 'a' });
    expect(diagnosticMessage(diagnostic)).toBe(
      "Importação circular do módulo 'a'"
    );
  });

  it('propagates errors raised while a module loads', () => {
    const { source, options } = withModules(
      'importe "quebrado"',
      moduleUnit('quebrado', '1 / 0')
    );
    expect(runDiagnostic(source, options)).toMatchObject({
      kind: 'DivisionByZero',
      moduleId: 'quebrado',
    });
  });

  describe('failure location', () => {
    it('names the module of a function called from the importer', () => {
      const { source, options } = withModules(
        'importe "util"\nseja x = 1\nquebra()',
        moduleUnit('util', 'exporte função quebra()\nretorna 1 / 0\nfim')
      );
      expect(runDiagnostic(source, options)).toMatchObject({
        kind: 'DivisionByZero',
        moduleId: 'util',
        span: { start: { line: 2, column: 9 } },
        stack: [
          {
            functionName: 'quebra',
            moduleId: 'principal',
            span: { start: { line: 3, column: 1 } },
          },
        ],
      });
    });

    it('names the importer for failures in its own code', () => {
      const { source, options } = withModules(
        'importe "util"\nsumido',
        moduleUnit('util', 'exporte seja x = 1')
      );
      expect(runDiagnostic(source, options)).toMatchObject({
        kind: 'UndefinedVariable',
        moduleId: 'principal',
        span: { start: { line: 2, column: 1 } },
      });
    });

    it('names the module of a default parameter value', () => {
      const { source, options } = withModules(
        'importe "util"\nf()',
        moduleUnit('util', 'exporte função f(a = 1 / 0)\nretorna a\nfim')
      );
      expect(runDiagnostic(source, options)).toMatchObject({
        kind: 'DivisionByZero',
        moduleId: 'util',
        span: { start: { line: 1, column: 22 } },
      });
    });
  });

  it('resolves names in closures against the defining module', () => {
    const util = [
      'exporte função fábrica()',
      'retorna função()',
      'retorna ausente',
      'fim',
      'fim',
    ].join('\n');
    const { source, options } = withModules(
      'importe "util"\nseja ausente = 1\nfábrica()()',
      moduleUnit('util', util)
    );
    expect(runDiagnostic(source, options)).toMatchObject({
      kind: 'UndefinedVariable',
      name: 'ausente',
      moduleId: 'util',
      span: { start: { line: 3, column: 9 } },
    });
  });
});
