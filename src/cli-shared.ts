/**
 * CLI Shared Utilities
 * Error formatting and version lookup for tenda-exec
 */

import * as fs from 'fs/promises';
import { SourceFileError } from './cli-module-loader.js';
import { formatSyntaxError } from './reporting.js';
import { TendaError } from './types.js';

/**
 * Format a thrown error for stderr output.
 * Runtime diagnostics never reach here; see formatDiagnostic.
 */
export function formatError(err: Error): string {
  if (err instanceof SourceFileError) {
    return formatSyntaxError(err.error, {
      source: err.source,
      path: err.filePath,
    });
  }

  if (err instanceof TendaError) {
    return formatSyntaxError(err);
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Package version from package.json beside the sources (or dist/) */
export async function readVersion(): Promise<string> {
  const packageJsonUrl = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(await fs.readFile(packageJsonUrl, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  throw new Error('package.json has no version');
}
