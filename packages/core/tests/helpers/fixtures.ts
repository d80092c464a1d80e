/**
 * Test helpers: temporary input trees and in-memory script evaluation
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  convertValue,
  LuaRuntime,
  Scope,
  toPlain,
  type ConvertOptions,
  type PlainValue,
} from '../../src/index.js';

/** Create a temporary directory; remove it with removeTempDir */
export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'scopeconf-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write files relative to root, creating parent directories.
 * Keys use forward slashes: `{ 'apps/web/prod.conf': 'A = 1' }`.
 */
export async function writeTree(
  root: string,
  files: Record<string, string>
): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(root, ...relative.split('/'));
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }
}

/**
 * Run source in a fresh scope and convert its binding table.
 * Top-level filtering is on unless options say otherwise.
 */
export function evaluate(
  source: string,
  options: ConvertOptions = { upperCaseKeysOnly: true }
): PlainValue {
  const runtime = new LuaRuntime();
  try {
    const scope = Scope.open(runtime.stack);
    scope.run(source, 'test.conf');
    const table = scope.capture();
    table.push();
    table.release();
    return toPlain(convertValue(runtime.stack, 'test', options));
  } finally {
    runtime.close();
  }
}
