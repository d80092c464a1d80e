/**
 * Canonical Values
 *
 * Structurally-typed document model produced by the value converter.
 * Public API for host applications.
 */

/** Discriminant of a canonical value */
export type ConfValueKind =
  | 'nil'
  | 'boolean'
  | 'number'
  | 'string'
  | 'array'
  | 'object';

export interface ConfNil {
  readonly kind: 'nil';
}

/**
 * Boolean value. Kept apart from numbers so that `true` and `1`
 * stay distinguishable in every output format.
 */
export interface ConfBoolean {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface ConfNumber {
  readonly kind: 'number';
  readonly value: number;
}

export interface ConfString {
  readonly kind: 'string';
  readonly value: string;
}

/** Ordered sequence, indexed from 0 */
export interface ConfArray {
  readonly kind: 'array';
  readonly items: readonly ConfValue[];
}

/** String-keyed mapping; keys are unique */
export interface ConfObject {
  readonly kind: 'object';
  readonly entries: ReadonlyMap<string, ConfValue>;
}

/** Any value a converted document can hold */
export type ConfValue =
  | ConfNil
  | ConfBoolean
  | ConfNumber
  | ConfString
  | ConfArray
  | ConfObject;

/** JSON-compatible projection of a ConfValue */
export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

// ============================================================
// CONSTRUCTORS
// ============================================================

const NIL: ConfNil = { kind: 'nil' };

export function nil(): ConfNil {
  return NIL;
}

export function bool(value: boolean): ConfBoolean {
  return { kind: 'boolean', value };
}

export function num(value: number): ConfNumber {
  return { kind: 'number', value };
}

export function str(value: string): ConfString {
  return { kind: 'string', value };
}

export function array(items: readonly ConfValue[]): ConfArray {
  return { kind: 'array', items };
}

export function object(
  entries: ReadonlyMap<string, ConfValue> | Iterable<[string, ConfValue]>
): ConfObject {
  return {
    kind: 'object',
    entries: entries instanceof Map ? entries : new Map(entries),
  };
}

// ============================================================
// PROJECTION
// ============================================================

/**
 * Project a canonical value onto plain data for serialization.
 * Object entries keep their insertion order; serializers sort keys themselves.
 */
export function toPlain(value: ConfValue): PlainValue {
  switch (value.kind) {
    case 'nil':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(toPlain);
    case 'object': {
      const result: { [key: string]: PlainValue } = {};
      for (const [key, entry] of value.entries) {
        Object.defineProperty(result, key, {
          value: toPlain(entry),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    }
  }
}
