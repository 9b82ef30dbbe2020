/**
 * Type introspection
 * Turns a declared record type into the ordered field list the builder walks.
 * Descriptors are pure functions of the type and are memoised per type.
 */

import {
  describeFieldType,
  isFieldType,
  type FieldType,
} from '../types/field-types';
import {
  CircularRecordTypeError,
  FixtureError,
  NotARecordTypeError,
} from '../types/errors';
import { type Result, ok, err } from '../types/result';
import { lookupRecordType, RecordType } from './record-type';

export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  /** True when the declared type is optional or nullable */
  readonly optional: boolean;
  /** Position in declared order, which is also the constructor position */
  readonly index: number;
}

export interface RecordTypeDescriptor<T = unknown> {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  readonly recordType: RecordType<T>;
  field(name: string): FieldDescriptor | undefined;
}

export class TypeIntrospector {
  private readonly cache = new WeakMap<
    RecordType<unknown>,
    RecordTypeDescriptor
  >();

  /**
   * Describe a record type, or fail with NotARecordTypeError /
   * CircularRecordTypeError
   */
  describe(source: unknown): Result<RecordTypeDescriptor, FixtureError> {
    const type = lookupRecordType(source);
    if (!type) {
      return err(notARecordType(source));
    }

    const cached = this.cache.get(type);
    if (cached) {
      return ok(cached);
    }

    try {
      checkArity(type);
      rejectRequiredCycles(type, [], []);
    } catch (error) {
      if (error instanceof FixtureError) {
        return err(error);
      }
      throw error;
    }

    const descriptor = buildDescriptor(type);
    this.cache.set(type, descriptor);
    return ok(descriptor);
  }
}

function buildDescriptor(type: RecordType<unknown>): RecordTypeDescriptor {
  const fields = type.fieldNames.map((name, index): FieldDescriptor => {
    const fieldType = fieldTypeOf(type, name);
    return Object.freeze({
      name,
      type: fieldType,
      optional: fieldType.kind === 'optional',
      index,
    });
  });
  const byName = new Map(fields.map((field) => [field.name, field]));

  return Object.freeze({
    name: type.name,
    fields: Object.freeze(fields),
    recordType: type,
    field: (name: string) => byName.get(name),
  });
}

function fieldTypeOf(type: RecordType<unknown>, name: string): FieldType {
  const fieldType = type.fields[name];
  if (!isFieldType(fieldType)) {
    throw new NotARecordTypeError(
      `Field ${type.name}.${name} is not declared with a field type`,
      { typeName: type.name, fieldPath: `${type.name}.${name}` }
    );
  }
  return fieldType;
}

function notARecordType(source: unknown): NotARecordTypeError {
  if (typeof source === 'function') {
    const name = source.name || '<anonymous>';
    return new NotARecordTypeError(
      `${name} is not a registered record type; declare it with recordClass(${name}, fields)`,
      { typeName: name }
    );
  }
  if (isFieldType(source)) {
    return new NotARecordTypeError(
      `Field type ${describeFieldType(source)} is not a record type`
    );
  }
  return new NotARecordTypeError(
    `Value of type ${source === null ? 'null' : typeof source} is not a record type`
  );
}

/**
 * The canonical constructor of a class record takes exactly one parameter
 * per declared field.
 */
function checkArity(type: RecordType<unknown>): void {
  for (const name of type.fieldNames) {
    fieldTypeOf(type, name);
  }
  if (
    type.ctor &&
    type.arity !== undefined &&
    type.arity !== type.fieldNames.length
  ) {
    throw new NotARecordTypeError(
      `Constructor of ${type.name} takes ${type.arity} parameter(s) but ${type.fieldNames.length} field(s) are declared`,
      { typeName: type.name }
    );
  }
}

/**
 * Walk required nested-record edges depth first. Optional and collection
 * fields never recurse during generation, so cycles through them are fine.
 */
function rejectRequiredCycles(
  type: RecordType<unknown>,
  stack: RecordType<unknown>[],
  path: string[]
): void {
  const seenAt = stack.indexOf(type);
  if (seenAt !== -1) {
    throw new CircularRecordTypeError(type.name, path.slice(seenAt));
  }

  stack.push(type);
  for (const name of type.fieldNames) {
    const fieldType = fieldTypeOf(type, name);
    if (fieldType.kind !== 'record') continue;

    const target = resolveTarget(type, name, fieldType.target);
    path.push(`${type.name}.${name}`);
    rejectRequiredCycles(target, stack, path);
    path.pop();
  }
  stack.pop();
}

function resolveTarget(
  owner: RecordType<unknown>,
  field: string,
  target: () => unknown
): RecordType<unknown> {
  const resolved = target();
  if (!(resolved instanceof RecordType)) {
    throw new NotARecordTypeError(
      `Field ${owner.name}.${field} references a value that is not a record type`,
      { typeName: owner.name, fieldPath: `${owner.name}.${field}` }
    );
  }
  return resolved;
}
