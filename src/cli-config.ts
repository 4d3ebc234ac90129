/**
 * Configuration Loader for tenda-exec
 * Loads and validates .tenda.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name, looked up beside the entry file */
export const CONFIG_FILE_NAME = '.tenda.yaml';

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** Ceiling on nested calls before StackOverflow */
  readonly maxCallStackDepth?: number;
}

// ============================================================
// VALIDATION
// ============================================================

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate parsed YAML. An empty document is an empty configuration.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): CliConfig {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (key !== 'maxCallStackDepth') {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  if (!('maxCallStackDepth' in data)) {
    return {};
  }
  const depth = data.maxCallStackDepth;
  if (!isPositiveInteger(depth)) {
    throw new Error(
      `Invalid configuration: maxCallStackDepth must be a positive integer, got ${String(depth)}`
    );
  }
  return { maxCallStackDepth: depth };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration text.
 *
 * @throws Error with "Invalid configuration: {reason}" on bad YAML or values
 */
export function parseConfig(text: string): CliConfig {
  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsed);
}

/**
 * Load configuration from an explicit path, or from .tenda.yaml in `dir`.
 * A missing explicit file is an error; a missing implicit one is not.
 */
export function loadConfig(dir: string, explicitPath?: string): CliConfig {
  const configPath = explicitPath ?? join(dir, CONFIG_FILE_NAME);

  if (explicitPath === undefined && !existsSync(configPath)) {
    return {};
  }

  return parseConfig(readFileSync(configPath, 'utf-8'));
}
