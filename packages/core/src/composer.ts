/**
 * Scope Composer
 *
 * Builds the two-level composition of one (application, environment) pair:
 * the environment script runs in its own scope, its table is tagged with the
 * environment name and injected as `env` into a fresh application scope,
 * where the application overlay then runs.
 */

import { loadScope, openScope, runInScope, type LoadContext } from './loader.js';
import type { ScriptStack } from './runtime/types.js';
import type { BindingTable } from './scope.js';

/** Variable through which an overlay sees its environment */
export const ENVIRONMENT_BINDING = 'env';

/** Field set on the environment table after its script has run */
export const ENVIRONMENT_NAME_FIELD = 'name';

/** Everything needed to compose one pair */
export interface Composition {
  readonly app: string;
  readonly env: string;
  readonly environmentFile: string;
  readonly overlayFile: string;
}

/**
 * Evaluate the environment and the application overlay of a pair.
 *
 * @returns The application scope's binding table; the caller releases it
 * @throws IOError, LoadError or RuntimeError from either script
 */
export function composeApplication(
  stack: ScriptStack,
  composition: Composition,
  context: LoadContext
): BindingTable {
  const environment = loadScope(stack, composition.environmentFile, context);

  try {
    environment.setString(ENVIRONMENT_NAME_FIELD, composition.env);

    const scope = openScope(stack, context);
    scope.bind(ENVIRONMENT_BINDING, environment);
    return runInScope(scope, composition.overlayFile);
  } finally {
    // The application scope holds its own reference through `env`
    environment.release();
  }
}
