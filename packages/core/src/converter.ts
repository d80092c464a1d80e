/**
 * Value Converter
 *
 * Walks a script value through the stack API and produces its canonical
 * document value.
 *
 * Tables become arrays when no string key survives filtering and objects
 * otherwise. In an object, integer-keyed entries appear under their decimal
 * index. In an array, a table indexed from 1 is shifted to start at 0 unless
 * index 0 was populated.
 */

import { ConversionError } from './error-classes.js';
import type { ScriptStack } from './runtime/types.js';
import {
  array,
  bool,
  nil,
  num,
  object,
  str,
  type ConfArray,
  type ConfValue,
} from './values.js';

export interface ConvertOptions {
  /**
   * Drop string keys that start with "_" or contain lowercase letters.
   * Applies to the outermost table only; nested tables keep every key.
   */
  readonly upperCaseKeysOnly?: boolean;
}

/**
 * Largest index an array may hold. Gaps up to it are filled with nil, so a
 * single huge index would otherwise allocate that many entries.
 */
export const MAX_ARRAY_INDEX = 1_000_000;

/** True when a top-level binding belongs in the emitted document */
export function isEmittedKey(key: string): boolean {
  return !key.startsWith('_') && key === key.toUpperCase();
}

/**
 * Convert the value at the top of the stack and pop it.
 *
 * @param path - Diagnostic label such as `app1.prod.SERVERS[2]`
 * @throws ConversionError for unsupported key or value types, strings that
 *   are not UTF-8, and tables that contain themselves
 */
export function convertValue(
  stack: ScriptStack,
  path: string,
  options: ConvertOptions = {}
): ConfValue {
  return convertAt(stack, path, options.upperCaseKeysOnly === true, new Set());
}

function convertAt(
  stack: ScriptStack,
  path: string,
  upperCaseKeysOnly: boolean,
  ancestors: Set<unknown>
): ConfValue {
  const type = stack.typeAt(-1);

  switch (type) {
    case 'string': {
      const value = stack.toUtf8(-1);
      stack.pop();
      if (value === undefined) {
        throw new ConversionError('CONF-C004', { path });
      }
      return str(value);
    }
    case 'number': {
      const value = stack.toNumber(-1);
      stack.pop();
      return num(value);
    }
    case 'boolean': {
      const value = stack.toBoolean(-1);
      stack.pop();
      return bool(value);
    }
    case 'nil':
      stack.pop();
      return nil();
    case 'table': {
      const identity = stack.tableIdentity(-1);
      if (ancestors.has(identity)) {
        stack.pop();
        throw new ConversionError('CONF-C005', { path });
      }
      ancestors.add(identity);
      try {
        return convertTable(stack, path, upperCaseKeysOnly, ancestors);
      } finally {
        ancestors.delete(identity);
      }
    }
    default:
      stack.pop();
      throw new ConversionError('CONF-C002', { path, type });
  }
}

function convertTable(
  stack: ScriptStack,
  path: string,
  upperCaseKeysOnly: boolean,
  ancestors: Set<unknown>
): ConfValue {
  const named = new Map<string, ConfValue>();
  const indexed = new Map<number, ConfValue>();

  stack.pushNil();
  while (stack.next(-2)) {
    // Stack: table, key, value
    const keyType = stack.typeAt(-2);

    if (keyType === 'string') {
      const key = stack.toUtf8(-2);
      if (key === undefined) {
        throw new ConversionError('CONF-C004', { path });
      }
      if (upperCaseKeysOnly && !isEmittedKey(key)) {
        stack.pop();
        continue;
      }
      named.set(key, convertAt(stack, `${path}.${key}`, false, ancestors));
    } else if (keyType === 'number') {
      const index = Math.trunc(stack.toNumber(-2));
      if (!Number.isFinite(index)) {
        throw new ConversionError('CONF-C003', { path, index });
      }
      indexed.set(index, convertAt(stack, `${path}[${index}]`, false, ancestors));
    } else {
      throw new ConversionError('CONF-C001', { path, type: keyType });
    }
  }
  stack.pop();

  if (named.size > 0) {
    for (const [index, value] of indexed) {
      named.set(String(index), value);
    }
    return object(named);
  }

  return toArray(indexed, path);
}

function toArray(indexed: Map<number, ConfValue>, path: string): ConfArray {
  let last = -1;
  for (const index of indexed.keys()) {
    if (index < 0 || index > MAX_ARRAY_INDEX) {
      throw new ConversionError('CONF-C003', { path, index });
    }
    last = Math.max(last, index);
  }

  const items: ConfValue[] = [];
  for (let i = indexed.has(0) ? 0 : 1; i <= last; i++) {
    items.push(indexed.get(i) ?? nil());
  }
  return array(items);
}
