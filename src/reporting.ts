/**
 * Error Reporting
 * Renders runtime diagnostics and syntax errors with a source excerpt,
 * a caret under the failing span and the call stack.
 */

import { ERROR_REGISTRY, type ErrorDefinition } from './error-registry.js';
import {
  diagnosticMessage,
  type Diagnostic,
} from './runtime/core/diagnostics.js';
import type { SourceLocation, SourceSpan, TendaError } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface ReportOptions {
  /** Source text the spans point into */
  readonly source?: string | undefined;
  /** File name shown in the location line */
  readonly path?: string | undefined;
  /** File name of a module, for call sites outside `path` */
  readonly modulePath?: ((moduleId: string) => string) | undefined;
  /** Names in scope, for "did you mean" hints on UndefinedVariable */
  readonly names?: readonly string[] | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around a span.
 * Line numbers are 1-based; an empty source gives an empty snippet.
 *
 * @throws {RangeError} When span exceeds source bounds
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 0
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;

  if (span.start.line < 1 || span.start.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }
  if (span.end.line < 1 || span.end.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }

  const firstLine = Math.max(1, span.start.line - contextLines);
  const lastLine = Math.min(totalLines, span.end.line + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum >= span.start.line && lineNum <= span.end.line,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

// ============================================================
// NAME SUGGESTION
// ============================================================

/**
 * Up to 3 names within edit distance 2 of `target`, closest first,
 * ties broken alphabetically.
 */
export function suggestSimilarNames(
  target: string,
  candidates: readonly string[]
): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  return candidates
    .filter((candidate) => candidate !== target)
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2)
    .sort((a, b) =>
      a.distance !== b.distance
        ? a.distance - b.distance
        : a.name.localeCompare(b.name)
    )
    .slice(0, 3)
    .map((item) => item.name);
}

/** Edit distance with a single rolling row */
function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;
  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;
    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1,
        (currRow[i - 1] ?? 0) + 1,
        (prevRow[i - 1] ?? 0) + cost
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}

// ============================================================
// RENDERING
// ============================================================

function formatLocation(location: SourceLocation, path?: string): string {
  return `${path ?? '<fonte>'}:${location.line}:${location.column}`;
}

/** Source line with a caret row under the span's first line */
function renderExcerpt(source: string, span: SourceSpan): string[] {
  let snippet: SourceSnippet;
  try {
    snippet = extractSnippet(source, span);
  } catch (error) {
    if (error instanceof RangeError) return [];
    throw error;
  }

  const line = snippet.lines[0];
  if (line === undefined) return [];

  const gutter = ' '.repeat(String(line.lineNumber).length);
  const width =
    span.end.line === span.start.line
      ? Math.max(1, span.end.column - span.start.column)
      : Math.max(1, line.content.length - span.start.column + 1);

  return [
    `${gutter} |`,
    `${line.lineNumber} | ${line.content}`,
    `${gutter} | ${' '.repeat(span.start.column - 1)}${'^'.repeat(width)}`,
  ];
}

function renderResolution(definition: ErrorDefinition | undefined): string[] {
  const resolution = definition?.resolution;
  return resolution === undefined ? [] : [`  = ajuda: ${resolution}`];
}

/**
 * Render a runtime diagnostic:
 *
 * ```text
 * erro[TENDA-R002]: A variável 'y' não está definida
 *   --> main.tenda:1:7
 *   |
 * 1 | exiba(y)
 *   |       ^
 *   = ajuda: você quis dizer 'x'?
 *   = ajuda: declare o nome com seja antes de usá-lo
 *   em f (main.tenda:4:1)
 * ```
 */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  options: ReportOptions = {}
): string {
  const definition = ERROR_REGISTRY.getByKind(diagnostic.kind);
  const errorId = definition?.errorId;
  const header = errorId === undefined ? 'erro' : `erro[${errorId}]`;
  const lines = [`${header}: ${diagnosticMessage(diagnostic)}`];

  const { span } = diagnostic;
  if (span !== undefined) {
    lines.push(`  --> ${formatLocation(span.start, options.path)}`);
    if (options.source !== undefined) {
      lines.push(...renderExcerpt(options.source, span));
    }
  }

  if (diagnostic.kind === 'UndefinedVariable' && options.names) {
    const similar = suggestSimilarNames(diagnostic.name, options.names);
    if (similar.length > 0) {
      const quoted = similar.map((name) => `'${name}'`).join(', ');
      lines.push(`  = ajuda: você quis dizer ${quoted}?`);
    }
  }
  lines.push(...renderResolution(definition));

  for (const frame of diagnostic.stack) {
    const name = frame.functionName ?? '<anônima>';
    const framePath =
      frame.moduleId === undefined || options.modulePath === undefined
        ? options.path
        : options.modulePath(frame.moduleId);
    lines.push(
      frame.span === undefined
        ? `  em ${name}`
        : `  em ${name} (${formatLocation(frame.span.start, framePath)})`
    );
  }

  return lines.join('\n');
}

/** Render a lexer or parser error with the same layout */
export function formatSyntaxError(
  error: TendaError,
  options: ReportOptions = {}
): string {
  const data = error.toData();
  const lines = [`erro[${data.errorId}]: ${data.message}`];
  if (data.location !== undefined) {
    lines.push(`  --> ${formatLocation(data.location, options.path)}`);
    if (options.source !== undefined) {
      const span = { start: data.location, end: data.location };
      lines.push(...renderExcerpt(options.source, span));
    }
  }
  lines.push(...renderResolution(ERROR_REGISTRY.get(data.errorId)));
  return lines.join('\n');
}
