/**
 * CLI Shared Utilities
 * Usage text, flag detection and error formatting
 */

import { ConfError, VERSION, type ErrorCategory } from '@scopeconf/core';

export const USAGE = `Usage:
  scopeconf <input> <output>   Compile every application/environment pair
  scopeconf --help             Show this help message
  scopeconf --version          Show version information

Arguments:
  input    Root holding environments/, apps/ and vars/
  output   Directory receiving <app>_<env>.yaml documents

Configuration:
  <input>/.scopeconf.json may set {"format": "yaml" | "json"}`;

const CATEGORY_LABELS: Readonly<Record<ErrorCategory, string>> = {
  load: 'Load error',
  runtime: 'Runtime error',
  conversion: 'Conversion error',
  io: 'I/O error',
};

/**
 * Format error for stderr output
 *
 * @returns `<Kind> error [<ID>]: <message>` for compiler errors, the bare
 *   message otherwise
 */
export function formatError(err: Error): string {
  if (err instanceof ConfError) {
    return `${CATEGORY_LABELS[err.category]} [${err.errorId}]: ${err.message}`;
  }
  return err.message;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

export { VERSION };
