/**
 * Input Layout
 *
 * <input>/environments/<env>.conf   one file per environment
 * <input>/apps/<app>/<env>.conf     optional overlay per pair
 * <input>/vars/<name>.conf          fragments, reached only through vars()
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describeCause, IOError } from './error-classes.js';

/** Extension shared by environment, overlay and fragment scripts */
export const SCRIPT_EXTENSION = '.conf';

export interface InputLayout {
  readonly root: string;
  readonly environmentsDir: string;
  readonly appsDir: string;
  readonly varsDir: string;
}

export function resolveLayout(inputDir: string, varsDir?: string): InputLayout {
  const root = path.resolve(inputDir);
  return {
    root,
    environmentsDir: path.join(root, 'environments'),
    appsDir: path.join(root, 'apps'),
    varsDir: varsDir !== undefined ? path.resolve(varsDir) : path.join(root, 'vars'),
  };
}

export function environmentFile(layout: InputLayout, env: string): string {
  return path.join(layout.environmentsDir, `${env}${SCRIPT_EXTENSION}`);
}

export function overlayFile(
  layout: InputLayout,
  app: string,
  env: string
): string {
  return path.join(layout.appsDir, app, `${env}${SCRIPT_EXTENSION}`);
}

async function listDirectory(dir: string) {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new IOError('CONF-I003', { dir, detail: describeCause(err) });
  }
}

/**
 * Environment names, sorted.
 *
 * @throws IOError (CONF-I003) if the environments directory cannot be listed
 */
export async function listEnvironments(layout: InputLayout): Promise<string[]> {
  const entries = await listDirectory(layout.environmentsDir);
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(SCRIPT_EXTENSION))
    .map((entry) => entry.name.slice(0, -SCRIPT_EXTENSION.length))
    .sort();
}

/**
 * Application names (subdirectories of apps/), sorted.
 *
 * @throws IOError (CONF-I003) if the apps directory cannot be listed
 */
export async function listApplications(layout: InputLayout): Promise<string[]> {
  const entries = await listDirectory(layout.appsDir);
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/** True when file exists */
export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
