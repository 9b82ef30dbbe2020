/**
 * Fast-check arbitraries for record type declarations: random field names,
 * every built-in field kind and one level of nested records.
 */

import fc from 'fast-check';
import {
  defineRecord,
  t,
  type FieldType,
  type RecordType,
} from '../../packages/core/src/index';

export const NUM_RUNS = Number(process.env.FC_NUM_RUNS ?? '100');

const FIELD_NAMES = [
  'title',
  'label',
  'email',
  'contactEmail',
  'count',
  'total',
  'active',
  'createdAt',
  'rank',
  'notes',
  'tags',
  'scores',
  'owner',
  'balance',
] as const;

export const RANK = t.enumOf(['first', 'second', 'third'], 'Rank');

export const scalarType: fc.Arbitrary<FieldType> = fc.constantFrom<FieldType>(
  t.string(),
  t.boolean(),
  t.integer(),
  t.bigint(),
  t.date(),
  RANK
);

function fieldsOf(
  types: fc.Arbitrary<FieldType>,
  maxLength: number
): fc.Arbitrary<Record<string, FieldType>> {
  return fc
    .uniqueArray(fc.tuple(fc.constantFrom(...FIELD_NAMES), types), {
      minLength: 1,
      maxLength,
      selector: ([name]) => name,
    })
    .map((pairs) => Object.fromEntries(pairs));
}

export type AnyRecordType = RecordType<Readonly<Record<string, unknown>>>;

export const nestedRecordType: fc.Arbitrary<AnyRecordType> = fieldsOf(
  scalarType,
  4
).map((fields) => defineRecord('Inner', fields));

export const fieldType: fc.Arbitrary<FieldType> = fc.oneof(
  scalarType,
  scalarType.map((inner) => t.optional(inner)),
  scalarType.map((inner) => t.nullable(inner)),
  scalarType.map((element) => t.array(element)),
  scalarType.map((element) => t.set(element)),
  scalarType.map((value) => t.map(t.string(), value)),
  scalarType.map((value) => t.dict(value)),
  nestedRecordType.map((type) => t.record(type))
);

export const recordType: fc.Arbitrary<AnyRecordType> = fieldsOf(
  fieldType,
  8
).map((fields) => defineRecord('Outer', fields));
