/**
 * Import Resolver
 *
 * The `vars(name)` callable every scope carries. It evaluates the shared
 * fragment `<varsDir>/<name>.conf` in its own fresh scope and returns the
 * fragment's binding table to the calling script. Nothing is cached: each
 * call evaluates the fragment again.
 */

import * as path from 'node:path';
import {
  IMPORT_FUNCTION_NAME,
  loadScope,
  type LoadContext,
} from './loader.js';
import type { ScriptStack } from './runtime/types.js';
import type { BindingTable } from './scope.js';
import type { CompileCallbacks } from './types.js';

/** File extension of fragments */
export const FRAGMENT_EXTENSION = '.conf';

/** Raised inside the script when vars() gets anything but one string */
export const IMPORT_ARGUMENT_ERROR = `'${IMPORT_FUNCTION_NAME}' takes exactly one argument`;

/**
 * Nesting limit for vars() calls. A fragment importing itself fails here
 * instead of exhausting the host stack.
 */
export const MAX_IMPORT_DEPTH = 64;

/** Path of the fragment a logical name resolves to */
export function fragmentPath(varsDir: string, name: string): string {
  return path.join(varsDir, `${name}${FRAGMENT_EXTENSION}`);
}

/**
 * Create the load context of a batch, with the import resolver bound to it.
 */
export function createLoadContext(options: {
  varsDir: string;
  callbacks?: CompileCallbacks | undefined;
}): LoadContext {
  const depth = { current: 0 };
  const context: LoadContext = {
    varsDir: options.varsDir,
    callbacks: options.callbacks ?? {},
    importer: (stack) => resolveImport(stack, context, depth),
  };
  return context;
}

function resolveImport(
  stack: ScriptStack,
  context: LoadContext,
  depth: { current: number }
): number {
  if (stack.top() !== 1 || stack.typeAt(1) !== 'string') {
    stack.raise(IMPORT_ARGUMENT_ERROR);
  }
  if (depth.current >= MAX_IMPORT_DEPTH) {
    stack.raise(
      `'${IMPORT_FUNCTION_NAME}' nesting exceeds ${MAX_IMPORT_DEPTH} levels`
    );
  }

  const name = stack.toText(1);
  const file = fragmentPath(context.varsDir, name);
  context.callbacks.onImport?.({ name, file });

  // Failures become script errors so the caller may intercept them with pcall
  let table: BindingTable;
  depth.current++;
  try {
    table = loadScope(stack, file, context);
  } catch (err) {
    if (err instanceof Error) {
      stack.raiseHostError(err);
    }
    throw err;
  } finally {
    depth.current--;
  }

  table.push(stack);
  table.release();
  return 1;
}
