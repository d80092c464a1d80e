/**
 * Scope Loader
 *
 * Evaluates one script file in a brand-new scope and hands back the
 * resulting binding table.
 */

import { readFileSync } from 'node:fs';
import { describeCause, IOError } from './error-classes.js';
import type { HostFunction, ScriptStack } from './runtime/types.js';
import { Scope, type BindingTable } from './scope.js';
import type { CompileCallbacks } from './types.js';

/** Name under which every scope sees the import resolver */
export const IMPORT_FUNCTION_NAME = 'vars';

/** Shared state of one batch: where fragments live and who is listening */
export interface LoadContext {
  readonly varsDir: string;
  readonly callbacks: CompileCallbacks;
  /** The import resolver registered into every scope */
  readonly importer: HostFunction;
}

/**
 * Read a script file as raw bytes; string literals keep their exact bytes.
 *
 * @throws IOError (CONF-I001) if the file cannot be read
 */
export function readScript(file: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(file));
  } catch (err) {
    throw new IOError('CONF-I001', { file, detail: describeCause(err) });
  }
}

/** Create a scope with the standard library and the import resolver installed */
export function openScope(stack: ScriptStack, context: LoadContext): Scope {
  const scope = Scope.open(stack);
  scope.define(IMPORT_FUNCTION_NAME, context.importer);
  return scope;
}

/**
 * Run file in scope and capture its binding table.
 * The scope is discarded when reading, loading or running fails.
 */
export function runInScope(scope: Scope, file: string): BindingTable {
  try {
    scope.run(readScript(file), file);
  } catch (err) {
    scope.discard();
    throw err;
  }
  return scope.capture();
}

/**
 * Evaluate file in a fresh, otherwise-empty scope.
 *
 * @returns The binding table the script left behind; the caller releases it
 * @throws IOError, LoadError or RuntimeError
 */
export function loadScope(
  stack: ScriptStack,
  file: string,
  context: LoadContext
): BindingTable {
  return runInScope(openScope(stack, context), file);
}
