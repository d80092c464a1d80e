/**
 * Document Writer
 *
 * Serializes canonical values with sorted keys so that documents diff cleanly.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { stringify } from 'yaml';
import { ConversionError, describeCause, IOError } from './error-classes.js';
import type { CompositionEvent } from './types.js';
import { toPlain, type ConfValue, type PlainValue } from './values.js';

export type DocumentFormat = 'yaml' | 'json';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['yaml', 'json'];

export const DOCUMENT_EXTENSIONS: Readonly<Record<DocumentFormat, string>> = {
  yaml: '.yaml',
  json: '.json',
};

function sortKeys(value: PlainValue): PlainValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key): [string, PlainValue] => [key, sortKeys(value[key] ?? null)])
    );
  }
  return value;
}

/**
 * Reject numbers JSON cannot hold; JSON.stringify would write them as null.
 *
 * @throws ConversionError (CONF-C006)
 */
function assertJsonNumbers(value: ConfValue, path: string): void {
  switch (value.kind) {
    case 'number':
      if (!Number.isFinite(value.value)) {
        throw new ConversionError('CONF-C006', { path, value: value.value });
      }
      return;
    case 'array':
      value.items.forEach((item, index) =>
        assertJsonNumbers(item, `${path}[${index}]`)
      );
      return;
    case 'object':
      for (const [key, entry] of value.entries) {
        assertJsonNumbers(entry, `${path}.${key}`);
      }
      return;
    default:
      return;
  }
}

/**
 * @param path - Label of the document in error messages, such as `app1.prod`
 * @throws ConversionError if a JSON document would hold a non-finite number
 */
export function serializeDocument(
  value: ConfValue,
  format: DocumentFormat,
  path = 'document'
): string {
  switch (format) {
    case 'yaml':
      return stringify(toPlain(value), { sortMapEntries: true });
    case 'json':
      assertJsonNumbers(value, path);
      return `${JSON.stringify(sortKeys(toPlain(value)), null, 2)}\n`;
  }
}

/** `<outputDir>/<app>_<env>.<ext>` */
export function documentPath(
  outputDir: string,
  composition: CompositionEvent,
  format: DocumentFormat
): string {
  return path.join(
    outputDir,
    `${composition.app}_${composition.env}${DOCUMENT_EXTENSIONS[format]}`
  );
}

/**
 * Create the output directory if it is missing.
 *
 * @throws IOError (CONF-I002)
 */
export async function ensureOutputDir(outputDir: string): Promise<void> {
  try {
    await fs.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new IOError('CONF-I002', {
      file: outputDir,
      detail: describeCause(err),
    });
  }
}

/**
 * Serialize and write one document.
 *
 * @returns The written file path
 * @throws IOError (CONF-I002) if the file cannot be written, ConversionError
 *   (CONF-C006) if a JSON document would hold a non-finite number
 */
export async function writeDocument(
  outputDir: string,
  composition: CompositionEvent,
  value: ConfValue,
  format: DocumentFormat
): Promise<string> {
  const file = documentPath(outputDir, composition, format);
  const content = serializeDocument(
    value,
    format,
    `${composition.app}.${composition.env}`
  );
  try {
    await fs.writeFile(file, content, 'utf-8');
  } catch (err) {
    throw new IOError('CONF-I002', { file, detail: describeCause(err) });
  }
  return file;
}
