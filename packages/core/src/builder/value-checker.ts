/**
 * Runtime check of a value against a declared field type. Used for override
 * values and for every value a rule produces.
 */

import {
  assertNever,
  describeFieldType,
  type FieldType,
} from '../types/field-types';
import { isPlainObject } from '../introspect/record-type';
import { renderValue } from '../types/errors';

export interface Mismatch {
  /** Declared type at the position that failed */
  expected: string;
  value: unknown;
  /** Position inside the checked value ('' for the value itself) */
  valuePath: string;
}

function mismatch(type: FieldType, value: unknown, at: string): Mismatch {
  return { expected: describeFieldType(type), value, valuePath: at };
}

function firstMismatch(
  type: FieldType,
  entries: Iterable<[string, unknown]>
): Mismatch | undefined {
  for (const [at, item] of entries) {
    const found = findMismatch(type, item, at);
    if (found) return found;
  }
  return undefined;
}

function* indexed(
  values: Iterable<unknown>,
  at: string
): IterableIterator<[string, unknown]> {
  let index = 0;
  for (const value of values) {
    yield [`${at}[${index}]`, value];
    index++;
  }
}

/**
 * First position where `value` does not conform to `type`, or undefined
 */
export function findMismatch(
  type: FieldType,
  value: unknown,
  at = ''
): Mismatch | undefined {
  switch (type.kind) {
    case 'string':
      return typeof value === 'string' ? undefined : mismatch(type, value, at);
    case 'boolean':
      return typeof value === 'boolean'
        ? undefined
        : mismatch(type, value, at);
    case 'integer':
      return Number.isSafeInteger(value)
        ? undefined
        : mismatch(type, value, at);
    case 'bigint':
      return typeof value === 'bigint' ? undefined : mismatch(type, value, at);
    case 'date':
      return value instanceof Date && !Number.isNaN(value.getTime())
        ? undefined
        : mismatch(type, value, at);
    case 'enum':
      return type.values.some((variant) => variant === value)
        ? undefined
        : mismatch(type, value, at);
    case 'optional':
      return value === type.absent
        ? undefined
        : findMismatch(type.inner, value, at);
    case 'array':
      if (!Array.isArray(value)) return mismatch(type, value, at);
      return firstMismatch(type.element, indexed(value, at));
    case 'set':
      if (!(value instanceof Set)) return mismatch(type, value, at);
      return firstMismatch(type.element, indexed(value, at));
    case 'map': {
      if (!(value instanceof Map)) return mismatch(type, value, at);
      for (const [key, item] of value) {
        const where = `${at}[${renderValue(key)}]`;
        const found =
          findMismatch(type.key, key, `${where}<key>`) ??
          findMismatch(type.value, item, where);
        if (found) return found;
      }
      return undefined;
    }
    case 'dict':
      if (!isPlainObject(value)) return mismatch(type, value, at);
      return firstMismatch(
        type.value,
        Object.entries(value).map(([key, item]): [string, unknown] => [
          `${at}[${JSON.stringify(key)}]`,
          item,
        ])
      );
    case 'record': {
      const target = type.target();
      if (!target.isInstance(value)) return mismatch(type, value, at);
      // Class constructors own their invariants; plain records are checked
      // field by field.
      if (target.ctor) return undefined;
      const values = target.read(value);
      for (const name of target.fieldNames) {
        const fieldType = target.fields[name];
        if (!fieldType) continue;
        const found = findMismatch(fieldType, values[name], `${at}.${name}`);
        if (found) return found;
      }
      return undefined;
    }
    case 'opaque':
      if (!type.guard) return undefined;
      return type.guard(value) ? undefined : mismatch(type, value, at);
    default:
      return assertNever(type);
  }
}
