#!/usr/bin/env node
/**
 * scopeconf CLI
 *
 * Usage:
 *   scopeconf <input> <output>
 */

import { compile, loadProjectConfig } from '@scopeconf/core';
import {
  detectHelpVersionFlag,
  formatError,
  USAGE,
  VERSION,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'compile'; inputDir: string; outputDir: string }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown options or a wrong number of positional arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) {
    return flag;
  }

  const positionalArgs: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }
    positionalArgs.push(arg);
  }

  const [inputDir, outputDir, ...extra] = positionalArgs;
  if (inputDir === undefined) {
    throw new Error('Missing input directory');
  }
  if (outputDir === undefined) {
    throw new Error('Missing output directory');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra[0]}`);
  }

  return { mode: 'compile', inputDir, outputDir };
}

/**
 * Run the CLI and return its exit code.
 * Writes progress to stdout and errors to stderr.
 */
export async function run(argv: string[]): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }

  switch (parsed.mode) {
    case 'help':
      console.log(USAGE);
      return 0;

    case 'version':
      console.log(VERSION);
      return 0;

    case 'compile':
      try {
        const config = loadProjectConfig(parsed.inputDir);
        await compile({
          inputDir: parsed.inputDir,
          outputDir: parsed.outputDir,
          format: config.format,
          callbacks: {
            onDocumentWritten: (event) => console.log(`Wrote ${event.file}`),
          },
        });
        return 0;
      } catch (err) {
        console.error(
          formatError(err instanceof Error ? err : new Error(String(err)))
        );
        return 1;
      }
  }
}

/**
 * Entry point for the scopeconf binary
 */
export async function main(): Promise<void> {
  process.exit(await run(process.argv.slice(2)));
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  await main();
}
