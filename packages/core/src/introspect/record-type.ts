/**
 * Record type declarations
 *
 * A record type is declared once, beside the type it describes, as an
 * ordered field map plus its canonical constructor. Field order is the key
 * order of the map and is also the constructor's parameter order.
 */

import type { FieldMap, FieldValues } from '../types/field-types';
import { NotARecordTypeError } from '../types/errors';

// eslint-disable-next-line @typescript-eslint/no-explicit-any -- positional field values of any declared type
export type RecordConstructor<T = unknown> = new (...args: any[]) => T;

interface RecordHooks<T, F extends FieldMap> {
  construct(values: FieldValues<F>): T;
  read(instance: T): Record<string, unknown>;
  isInstance(value: unknown): value is T;
}

export class RecordType<T, F extends FieldMap = FieldMap> {
  readonly fieldNames: readonly string[];

  constructor(
    readonly name: string,
    readonly fields: F,
    private readonly hooks: RecordHooks<T, F>,
    /** Present for classes registered with recordClass() */
    readonly ctor?: RecordConstructor<T>,
    /** Parameters the constructor declares; defaults to `ctor.length` */
    readonly arity: number | undefined = ctor?.length
  ) {
    this.fieldNames = Object.freeze(Object.keys(fields));
  }

  /** Invoke the canonical constructor with one value per declared field */
  construct(values: FieldValues<F>): T {
    return this.hooks.construct(values);
  }

  /** Current field values of an instance, keyed by field name */
  read(instance: T): Record<string, unknown> {
    return this.hooks.read(instance);
  }

  isInstance(value: unknown): value is T {
    return this.hooks.isInstance(value);
  }
}

export type RecordSource<T> = RecordType<T> | RecordConstructor<T>;

const classRegistry = new WeakMap<Function, RecordType<unknown>>();

const CANONICAL_INDEX = /^(0|[1-9]\d*)$/;

function checkFieldNames(typeName: string, fields: FieldMap): void {
  if (!typeName) {
    throw new NotARecordTypeError('Record types need a non-empty name');
  }
  for (const field of Object.keys(fields)) {
    // Integer-like keys are enumerated before all others, which would
    // silently reorder the constructor parameters.
    if (CANONICAL_INDEX.test(field)) {
      throw new NotARecordTypeError(
        `Field "${field}" of ${typeName} is an integer-like name; field order could not be preserved`,
        { typeName, fieldPath: `${typeName}.${field}` }
      );
    }
  }
}

function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (!isObjectLike(value) || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function readFields(
  instance: object,
  names: readonly string[]
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const name of names) {
    values[name] = Reflect.get(instance, name);
  }
  return values;
}

/**
 * Plain immutable object record. Instances are frozen objects whose keys are
 * exactly the declared fields.
 */
export function defineRecord<F extends FieldMap>(
  name: string,
  fields: F
): RecordType<Readonly<FieldValues<F>>, F> {
  checkFieldNames(name, fields);
  const names = Object.keys(fields);
  return new RecordType<Readonly<FieldValues<F>>, F>(name, fields, {
    construct: (values) => Object.freeze({ ...values }),
    read: (instance) => readFields(instance, names),
    isInstance: (value): value is Readonly<FieldValues<F>> =>
      isPlainObject(value) &&
      Object.keys(value).length === names.length &&
      names.every((field) => field in value),
  });
}

/**
 * Record built by a caller-supplied factory, for types that are neither plain
 * frozen objects nor classes with a positional constructor.
 */
export function defineRecordWith<T extends object, F extends FieldMap>(
  name: string,
  fields: F,
  construct: (values: FieldValues<F>) => T,
  options: {
    read?: (instance: T) => Record<string, unknown>;
    is?: (value: unknown) => value is T;
  } = {}
): RecordType<T, F> {
  checkFieldNames(name, fields);
  const names = Object.keys(fields);
  return new RecordType<T, F>(name, fields, {
    construct,
    read: options.read ?? ((instance) => readFields(instance, names)),
    isInstance:
      options.is ??
      ((value): value is T =>
        isObjectLike(value) && names.every((field) => field in value)),
  });
}

/**
 * Register a class whose constructor takes exactly the declared fields, in
 * order, and exposes each of them as a property of the same name.
 *
 * ```ts
 * class Customer {
 *   constructor(readonly name: string, readonly email: string) {}
 * }
 * const CustomerType = recordClass(Customer, {
 *   name: t.string(),
 *   email: t.string(),
 * });
 * ```
 *
 * The parameter count is read from `ctor.length`, which stops at the first
 * parameter with a default value. Pass `arity` for such constructors.
 */
export function recordClass<T extends object, F extends FieldMap>(
  ctor: RecordConstructor<T>,
  fields: F,
  options: { name?: string; arity?: number } = {}
): RecordType<T, F> {
  const name = options.name ?? ctor.name;
  checkFieldNames(name, fields);
  if (classRegistry.has(ctor)) {
    throw new NotARecordTypeError(
      `Class ${name} is already registered as a record type; a record type has exactly one canonical constructor`,
      { typeName: name }
    );
  }

  const names = Object.keys(fields);
  const type = new RecordType<T, F>(
    name,
    fields,
    {
      construct: (values) =>
        new ctor(...names.map((field) => Reflect.get(values, field))),
      read: (instance) => readFields(instance, names),
      isInstance: (value): value is T => value instanceof ctor,
    },
    ctor,
    options.arity ?? ctor.length
  );
  classRegistry.set(ctor, type);
  return type;
}

/**
 * Record type registered for a value, if any: the value itself when it is a
 * RecordType, or the registration of a class passed to recordClass().
 */
export function lookupRecordType(
  source: unknown
): RecordType<unknown> | undefined {
  if (source instanceof RecordType) {
    return source;
  }
  if (typeof source === 'function') {
    return classRegistry.get(source);
  }
  return undefined;
}
