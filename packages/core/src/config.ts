/**
 * Configuration Loader
 * Loads and validates .newickrc.json reader configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from './error-classes.js';
import {
  DEFAULT_READER_OPTIONS,
  parseReaderConfig,
  resolveReaderOptions,
  type ReaderConfig,
} from './parser/options.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.newickrc.json';

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/** Every JSON-representable reader option at its default value */
export function createDefaultReaderOptions(): ReaderConfig {
  const { finishNode: _finishNode, observability: _observability, ...config } =
    DEFAULT_READER_OPTIONS;
  return { ...config };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load reader options from .newickrc.json in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns Options merged over the defaults, or null if no file exists
 * @throws ConfigError if the file cannot be read, is not JSON, or holds
 * unknown, mistyped or conflicting options
 */
export function loadReaderConfig(cwd: string): ReaderConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const config = parseReaderConfig(parsedData);
  // option combinations
  resolveReaderOptions(config);
  return { ...createDefaultReaderOptions(), ...config };
}
