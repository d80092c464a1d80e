/**
 * Batch Compiler
 *
 * Enumerates environments × applications and, for every pair with an
 * overlay, composes, converts and writes one document. Pairs run one after
 * another; the first error aborts the batch. Documents written before the
 * failure stay on disk.
 */

import { composeApplication, type Composition } from './composer.js';
import {
  resolveCompileOptions,
  type CompileOptions,
} from './config.js';
import { convertValue } from './converter.js';
import { ensureOutputDir, writeDocument } from './document.js';
import { createLoadContext } from './importer.js';
import {
  environmentFile,
  fileExists,
  listApplications,
  listEnvironments,
  overlayFile,
  resolveLayout,
} from './layout.js';
import type { LoadContext } from './loader.js';
import { LuaRuntime } from './runtime/lua-runtime.js';
import type { CompositionEvent, DocumentEvent } from './types.js';
import type { ConfValue } from './values.js';

export interface CompileResult {
  /** Documents written, in processing order */
  readonly documents: readonly DocumentEvent[];
  /** Pairs without an overlay */
  readonly skipped: readonly CompositionEvent[];
}

/**
 * Compose and convert one pair in its own interpreter state.
 * Top-level bindings are filtered to upper-case names.
 */
export function compileComposition(
  composition: Composition,
  context: LoadContext
): ConfValue {
  const runtime = new LuaRuntime();
  try {
    const table = composeApplication(runtime.stack, composition, context);
    table.push();
    table.release();
    return convertValue(
      runtime.stack,
      `${composition.app}.${composition.env}`,
      { upperCaseKeysOnly: true }
    );
  } finally {
    runtime.close();
  }
}

/**
 * Compile every (application, environment) pair of an input tree.
 *
 * @throws IOError, LoadError, RuntimeError or ConversionError on the first failure
 */
export async function compile(options: CompileOptions): Promise<CompileResult> {
  const resolved = resolveCompileOptions(options);
  const { callbacks } = resolved;
  const layout = resolveLayout(resolved.inputDir, resolved.varsDir);

  const environments = await listEnvironments(layout);
  const applications = await listApplications(layout);
  await ensureOutputDir(resolved.outputDir);

  const context = createLoadContext({ varsDir: layout.varsDir, callbacks });
  const documents: DocumentEvent[] = [];
  const skipped: CompositionEvent[] = [];

  for (const env of environments) {
    for (const app of applications) {
      const overlay = overlayFile(layout, app, env);
      if (!(await fileExists(overlay))) {
        callbacks.onCompositionSkip?.({
          app,
          env,
          reason: `no overlay at ${overlay}`,
        });
        skipped.push({ app, env });
        continue;
      }

      callbacks.onCompositionStart?.({ app, env });
      const value = compileComposition(
        {
          app,
          env,
          environmentFile: environmentFile(layout, env),
          overlayFile: overlay,
        },
        context
      );

      const file = await writeDocument(
        resolved.outputDir,
        { app, env },
        value,
        resolved.format
      );
      const written: DocumentEvent = { app, env, file };
      callbacks.onDocumentWritten?.(written);
      documents.push(written);
    }
  }

  return { documents, skipped };
}
