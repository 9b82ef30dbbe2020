import { describe, it, expect } from 'vitest';
import { defineRecord } from '../../introspect/record-type';
import { ConfigError } from '../errors';
import { describeFieldType, isFieldType, t } from '../field-types';

enum Color {
  Red = 'red',
  Green = 'green',
}

enum Level {
  Low = 1,
  High = 5,
}

describe('field type builders', () => {
  it('returns shared frozen nodes for scalars', () => {
    expect(t.string()).toBe(t.string());
    expect(Object.isFrozen(t.integer())).toBe(true);
    expect(t.date()).toEqual({ kind: 'date' });
  });

  it('builds enums from a variant list in declared order', () => {
    const size = t.enumOf(['small', 'medium', 'large'], 'Size');

    expect(size).toEqual({
      kind: 'enum',
      name: 'Size',
      values: ['small', 'medium', 'large'],
    });
  });

  it('builds enums from a string enum object', () => {
    expect(t.enumOf(Color, 'Color').values).toEqual(['red', 'green']);
  });

  it('skips reverse mappings of numeric enums', () => {
    expect(t.enumOf(Level, 'Level').values).toEqual([1, 5]);
  });

  it('rejects enums without variants', () => {
    expect(() => t.enumOf([], 'Empty')).toThrow(ConfigError);
    expect(() => t.enumOf([], 'Empty')).toThrow(
      'Enumerated type Empty declares no variants'
    );
  });

  it('distinguishes optional from nullable by the absent value', () => {
    expect(t.optional(t.string()).absent).toBeUndefined();
    expect(t.nullable(t.string()).absent).toBeNull();
  });

  it('resolves lazy record references on demand', () => {
    const Leaf = defineRecord('Leaf', { label: t.string() });
    const ref = t.lazy(() => Leaf);

    expect(ref.kind).toBe('record');
    expect(ref.target()).toBe(Leaf);
  });
});

describe('describeFieldType', () => {
  const Customer = defineRecord('Customer', { name: t.string() });

  it.each([
    [t.string(), 'string'],
    [t.bigint(), 'bigint'],
    [t.enumOf(Color, 'Color'), 'enum Color'],
    [t.optional(t.integer()), 'optional<integer>'],
    [t.nullable(t.date()), 'nullable<date>'],
    [t.array(t.string()), 'array<string>'],
    [t.set(t.integer()), 'set<integer>'],
    [t.map(t.string(), t.array(t.boolean())), 'map<string, array<boolean>>'],
    [t.dict(t.integer()), 'dict<integer>'],
    [t.record(Customer), 'record Customer'],
    [t.opaque('Buffer'), 'opaque Buffer'],
  ])('renders %j', (type, expected) => {
    expect(describeFieldType(type)).toBe(expected);
  });
});

describe('isFieldType', () => {
  it('accepts field type nodes', () => {
    expect(isFieldType(t.array(t.string()))).toBe(true);
  });

  it('rejects other values', () => {
    expect(isFieldType({ kind: 'tuple' })).toBe(false);
    expect(isFieldType('string')).toBe(false);
    expect(isFieldType(null)).toBe(false);
  });
});
