/**
 * Override merger
 * Produces a new instance with some fields replaced. The input instance is
 * never mutated and nothing is constructed until every entry has been
 * checked.
 */

import type { RecordType } from '../introspect/record-type';
import type { RecordTypeDescriptor } from '../introspect/type-introspector';
import { didYouMean } from '../errors/suggestions';
import {
  FixtureError,
  TypeMismatchError,
  UnknownFieldError,
} from '../types/errors';
import { type Result, ok, err } from '../types/result';
import { findMismatch } from './value-checker';

/** Replacement values keyed by field name */
export type Overrides<T> = { readonly [K in keyof T]?: T[K] };

export class OverrideMerger {
  merge<T>(
    type: RecordType<T>,
    descriptor: RecordTypeDescriptor,
    instance: T,
    overrides: Readonly<Record<string, unknown>>
  ): Result<T, FixtureError> {
    const checked = checkOverrides(descriptor, overrides);
    if (checked) {
      return err(checked);
    }

    const values = { ...type.read(instance) };
    for (const [name, value] of Object.entries(overrides)) {
      values[name] = value;
    }

    try {
      return ok(type.construct(values));
    } catch (error) {
      if (error instanceof FixtureError) {
        return err(error);
      }
      throw error;
    }
  }
}

function checkOverrides(
  descriptor: RecordTypeDescriptor,
  overrides: Readonly<Record<string, unknown>>
): FixtureError | undefined {
  const names = descriptor.fields.map((field) => field.name);

  for (const [name, value] of Object.entries(overrides)) {
    const field = descriptor.field(name);
    if (!field) {
      return new UnknownFieldError(
        descriptor.name,
        name,
        didYouMean(name, names)
      );
    }

    const found = findMismatch(field.type, value);
    if (found) {
      return new TypeMismatchError({
        fieldPath: `${descriptor.name}.${name}`,
        expected: found.expected,
        value: found.value,
        valuePath: found.valuePath || undefined,
        typeName: descriptor.name,
      });
    }
  }
  return undefined;
}
