/**
 * Declared field types
 *
 * A closed tagged union with one variant per declared-type category. Record
 * descriptors are built from these nodes through the `t` namespace, so the
 * generator never needs runtime reflection to find out what a field holds.
 */

import type { RecordType } from '../introspect/record-type';
import { ConfigError } from './errors';

export type EnumValue = string | number;

export interface StringType {
  readonly kind: 'string';
}

export interface BooleanType {
  readonly kind: 'boolean';
}

/** Safe integer carried as a `number` */
export interface IntegerType {
  readonly kind: 'integer';
}

/** 64-bit integral value carried as a `bigint` */
export interface BigIntType {
  readonly kind: 'bigint';
}

export interface DateType {
  readonly kind: 'date';
}

export interface EnumType<V extends EnumValue = EnumValue> {
  readonly kind: 'enum';
  readonly name: string;
  /** Variants in declared order */
  readonly values: readonly V[];
}

export interface OptionalType<
  I extends FieldType = FieldType,
  A extends undefined | null = undefined | null,
> {
  readonly kind: 'optional';
  readonly inner: I;
  readonly absent: A;
}

export interface ArrayType<E extends FieldType = FieldType> {
  readonly kind: 'array';
  readonly element: E;
}

export interface SetType<E extends FieldType = FieldType> {
  readonly kind: 'set';
  readonly element: E;
}

export interface MapType<
  K extends FieldType = FieldType,
  V extends FieldType = FieldType,
> {
  readonly kind: 'map';
  readonly key: K;
  readonly value: V;
}

/** String-keyed plain object used as a dictionary */
export interface DictType<V extends FieldType = FieldType> {
  readonly kind: 'dict';
  readonly value: V;
}

export interface RecordRefType<R = unknown> {
  readonly kind: 'record';
  /** Resolved lazily so records can reference types declared later */
  readonly target: () => RecordType<R>;
}

/**
 * A type the built-in rules know nothing about (Buffer, URL, a branded id…).
 * Only a registered rule can produce it.
 */
export interface OpaqueType<O = unknown> {
  readonly kind: 'opaque';
  readonly name: string;
  readonly guard?: (value: unknown) => value is O;
}

export type FieldType =
  | StringType
  | BooleanType
  | IntegerType
  | BigIntType
  | DateType
  | EnumType
  | OptionalType
  | ArrayType
  | SetType
  | MapType
  | DictType
  | RecordRefType
  | OpaqueType;

export type FieldKind = FieldType['kind'];

/**
 * Static value type of a field type node. The unnarrowed FieldType union maps
 * to unknown.
 */
export type ValueOf<T extends FieldType> = [FieldType] extends [T]
  ? unknown
  : NodeValue<T>;

type NodeValue<T extends FieldType> = T extends StringType
  ? string
  : T extends BooleanType
    ? boolean
    : T extends IntegerType
      ? number
      : T extends BigIntType
        ? bigint
        : T extends DateType
          ? Date
          : T extends EnumType<infer V>
            ? V
            : T extends OptionalType<infer I extends FieldType, infer A>
              ? ValueOf<I> | A
              : T extends ArrayType<infer E extends FieldType>
                ? ValueOf<E>[]
                : T extends SetType<infer E extends FieldType>
                  ? Set<ValueOf<E>>
                  : T extends MapType<
                        infer K extends FieldType,
                        infer V extends FieldType
                      >
                    ? Map<ValueOf<K>, ValueOf<V>>
                    : T extends DictType<infer V extends FieldType>
                      ? Record<string, ValueOf<V>>
                      : T extends RecordRefType<infer R>
                        ? R
                        : T extends OpaqueType<infer O>
                          ? O
                          : never;

export type FieldMap = Readonly<Record<string, FieldType>>;

export type FieldValues<F extends FieldMap> = {
  -readonly [K in keyof F]: ValueOf<F[K]>;
};

const STRING: StringType = Object.freeze({ kind: 'string' });
const BOOLEAN: BooleanType = Object.freeze({ kind: 'boolean' });
const INTEGER: IntegerType = Object.freeze({ kind: 'integer' });
const BIGINT: BigIntType = Object.freeze({ kind: 'bigint' });
const DATE: DateType = Object.freeze({ kind: 'date' });

/**
 * Variants of a TypeScript enum object in declaration order. Numeric enums
 * carry reverse mappings (value -> name), which are skipped.
 */
function enumObjectValues(
  source: Readonly<Record<string, EnumValue>>
): EnumValue[] {
  return Object.keys(source)
    .filter((key) => Number.isNaN(Number(key)))
    .map((key) => source[key])
    .filter((value): value is EnumValue => value !== undefined);
}

function isVariantList(
  source: readonly EnumValue[] | Readonly<Record<string, EnumValue>>
): source is readonly EnumValue[] {
  return Array.isArray(source);
}

function enumOf<const V extends EnumValue>(
  variants: readonly V[],
  name?: string
): EnumType<V>;
function enumOf<E extends Readonly<Record<string, EnumValue>>>(
  enumObject: E,
  name?: string
): EnumType<E[Extract<keyof E, string>]>;
function enumOf(
  source: readonly EnumValue[] | Readonly<Record<string, EnumValue>>,
  name = 'enum'
): EnumType {
  const values = isVariantList(source)
    ? [...source]
    : enumObjectValues(source);
  if (values.length === 0) {
    throw new ConfigError(`Enumerated type ${name} declares no variants`);
  }
  return Object.freeze({ kind: 'enum', name, values: Object.freeze(values) });
}

/**
 * Builders for field type nodes
 */
export const t = {
  string: (): StringType => STRING,
  boolean: (): BooleanType => BOOLEAN,
  integer: (): IntegerType => INTEGER,
  bigint: (): BigIntType => BIGINT,
  date: (): DateType => DATE,
  enumOf,
  optional: <I extends FieldType>(inner: I): OptionalType<I, undefined> =>
    Object.freeze({ kind: 'optional', inner, absent: undefined }),
  nullable: <I extends FieldType>(inner: I): OptionalType<I, null> =>
    Object.freeze({ kind: 'optional', inner, absent: null }),
  array: <E extends FieldType>(element: E): ArrayType<E> =>
    Object.freeze({ kind: 'array', element }),
  set: <E extends FieldType>(element: E): SetType<E> =>
    Object.freeze({ kind: 'set', element }),
  map: <K extends FieldType, V extends FieldType>(
    key: K,
    value: V
  ): MapType<K, V> => Object.freeze({ kind: 'map', key, value }),
  dict: <V extends FieldType>(value: V): DictType<V> =>
    Object.freeze({ kind: 'dict', value }),
  record: <R>(type: RecordType<R>): RecordRefType<R> =>
    Object.freeze({ kind: 'record', target: () => type }),
  lazy: <R>(thunk: () => RecordType<R>): RecordRefType<R> =>
    Object.freeze({ kind: 'record', target: thunk }),
  opaque: <O = unknown>(
    name: string,
    guard?: (value: unknown) => value is O
  ): OpaqueType<O> => Object.freeze({ kind: 'opaque', name, guard }),
} as const;

/**
 * Human-readable rendering of a declared type, used in error messages
 */
export function describeFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'string':
    case 'boolean':
    case 'integer':
    case 'bigint':
    case 'date':
      return type.kind;
    case 'enum':
      return `enum ${type.name}`;
    case 'optional':
      return type.absent === null
        ? `nullable<${describeFieldType(type.inner)}>`
        : `optional<${describeFieldType(type.inner)}>`;
    case 'array':
    case 'set':
      return `${type.kind}<${describeFieldType(type.element)}>`;
    case 'map':
      return `map<${describeFieldType(type.key)}, ${describeFieldType(type.value)}>`;
    case 'dict':
      return `dict<${describeFieldType(type.value)}>`;
    case 'record':
      return `record ${type.target().name}`;
    case 'opaque':
      return `opaque ${type.name}`;
    default:
      return assertNever(type);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled field type: ${JSON.stringify(value)}`);
}

export function isFieldType(value: unknown): value is FieldType {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  return typeof value.kind === 'string' && FIELD_KINDS.has(value.kind);
}

const FIELD_KINDS: ReadonlySet<string> = new Set<FieldKind>([
  'string',
  'boolean',
  'integer',
  'bigint',
  'date',
  'enum',
  'optional',
  'array',
  'set',
  'map',
  'dict',
  'record',
  'opaque',
]);
