/**
 * Configuration
 *
 * Compile options with their defaults, and the optional project file
 * `<input>/.scopeconf.json`.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DOCUMENT_FORMATS, type DocumentFormat } from './document.js';
import type { CompileCallbacks } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Project configuration file name, looked up in the input root */
export const CONFIG_FILE_NAME = '.scopeconf.json';

const CONFIG_KEYS = new Set(['format']);

// ============================================================
// PROJECT CONFIGURATION
// ============================================================

export interface ProjectConfig {
  readonly format: DocumentFormat;
}

export function createDefaultConfig(): ProjectConfig {
  return { format: 'yaml' };
}

function isDocumentFormat(value: unknown): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(
  data: unknown
): asserts data is { format?: DocumentFormat } {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown option ${key}`);
    }
    if (key === 'format' && !isDocumentFormat(value)) {
      throw new Error(
        `Invalid configuration: format has invalid value "${String(value)}" (must be ${DOCUMENT_FORMATS.map((f) => `'${f}'`).join(' or ')})`
      );
    }
  }
}

/**
 * Load configuration from .scopeconf.json in the input directory.
 *
 * @param inputDir - Input root to look in
 * @returns Configuration merged over defaults; defaults when the file is absent
 * @throws Error if the file is not valid JSON or fails validation
 */
export function loadProjectConfig(inputDir: string): ProjectConfig {
  const configPath = join(inputDir, CONFIG_FILE_NAME);
  const defaults = createDefaultConfig();

  if (!existsSync(configPath)) {
    return defaults;
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  validateConfig(data);

  return { format: data.format ?? defaults.format };
}

// ============================================================
// COMPILE OPTIONS
// ============================================================

export interface CompileOptions {
  /** Input root holding environments/, apps/ and vars/ */
  readonly inputDir: string;
  /** Directory documents are written to; created when missing */
  readonly outputDir: string;
  /** Output format (default: 'yaml') */
  readonly format?: DocumentFormat | undefined;
  /** Fragment directory (default: <inputDir>/vars) */
  readonly varsDir?: string | undefined;
  /** Observability callbacks */
  readonly callbacks?: CompileCallbacks | undefined;
}

export interface ResolvedCompileOptions {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly format: DocumentFormat;
  readonly varsDir: string | undefined;
  readonly callbacks: CompileCallbacks;
}

/** Fill in defaults for omitted options */
export function resolveCompileOptions(
  options: CompileOptions
): ResolvedCompileOptions {
  return {
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    format: options.format ?? createDefaultConfig().format,
    varsDir: options.varsDir,
    callbacks: options.callbacks ?? {},
  };
}
