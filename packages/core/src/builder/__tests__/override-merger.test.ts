import { describe, it, expect } from 'vitest';
import { defineRecord, recordClass } from '../../introspect/record-type';
import { TypeIntrospector } from '../../introspect/type-introspector';
import { TypeMismatchError, UnknownFieldError } from '../../types/errors';
import { t } from '../../types/field-types';
import { isErr } from '../../types/result';
import { OverrideMerger } from '../override-merger';

const Address = defineRecord('Address', {
  street: t.string(),
  city: t.string(),
});

const Customer = defineRecord('Customer', {
  name: t.string(),
  age: t.integer(),
  nickname: t.optional(t.string()),
  addresses: t.array(t.record(Address)),
});

const descriptor = new TypeIntrospector().describe(Customer).unwrap();

const original = Customer.construct({
  name: 'arbitrary-1',
  age: 2,
  nickname: undefined,
  addresses: [],
});

describe('OverrideMerger', () => {
  const merger = new OverrideMerger();

  it('replaces the named fields and keeps the rest', () => {
    const merged = merger
      .merge(Customer, descriptor, original, { name: 'Ada', nickname: 'ada' })
      .unwrap();

    expect(merged).toEqual({
      name: 'Ada',
      age: 2,
      nickname: 'ada',
      addresses: [],
    });
  });

  it('returns a new frozen instance and leaves the input untouched', () => {
    const merged = merger
      .merge(Customer, descriptor, original, { age: 40 })
      .unwrap();

    expect(merged).not.toBe(original);
    expect(Object.isFrozen(merged)).toBe(true);
    expect(original.age).toBe(2);
  });

  it('accepts an empty override set', () => {
    expect(merger.merge(Customer, descriptor, original, {}).unwrap()).toEqual(
      original
    );
  });

  it('allows setting an optional field back to absent', () => {
    const withNickname = Customer.construct({ ...original, nickname: 'x' });

    const merged = merger
      .merge(Customer, descriptor, withNickname, { nickname: undefined })
      .unwrap();

    expect(merged.nickname).toBeUndefined();
  });

  it('rejects unknown fields with a suggestion', () => {
    const result = merger.merge(Customer, descriptor, original, { nmae: 'x' });

    expect(isErr(result)).toBe(true);
    if (!isErr(result)) return;
    expect(result.error).toBeInstanceOf(UnknownFieldError);
    expect(result.error.message).toBe(
      'Record type Customer has no field "nmae"; did you mean "name"?'
    );
  });

  it('rejects values of the wrong type', () => {
    const result = merger.merge(Customer, descriptor, original, { age: '40' });

    expect(isErr(result) && result.error).toBeInstanceOf(TypeMismatchError);
    expect(isErr(result) && result.error.message).toBe(
      'Value "40" does not match integer for Customer.age'
    );
  });

  it('reports the nested position of a bad value', () => {
    const result = merger.merge(Customer, descriptor, original, {
      addresses: [
        { street: 'Main', city: 'Oslo' },
        { street: 'Side', city: 3 },
      ],
    });

    expect(isErr(result) && result.error.message).toBe(
      'Value 3 does not match string for Customer.addresses[1].city'
    );
  });

  it('checks every entry before constructing anything', () => {
    let constructed = 0;
    class Tag {
      constructor(
        readonly label: string,
        readonly weight: number
      ) {
        constructed++;
      }
    }
    const TagType = recordClass(Tag, { label: t.string(), weight: t.integer() });
    const tagDescriptor = new TypeIntrospector().describe(TagType).unwrap();
    const tag = new Tag('a', 1);

    const result = merger.merge(TagType, tagDescriptor, tag, {
      label: 'b',
      weight: 1.5,
    });

    expect(isErr(result)).toBe(true);
    expect(constructed).toBe(1);
  });

  it('rebuilds class instances through the constructor', () => {
    class Tag {
      constructor(
        readonly label: string,
        readonly weight: number
      ) {}
    }
    const TagType = recordClass(Tag, { label: t.string(), weight: t.integer() });
    const tagDescriptor = new TypeIntrospector().describe(TagType).unwrap();

    const merged = merger
      .merge(TagType, tagDescriptor, new Tag('a', 1), { weight: 5 })
      .unwrap();

    expect(merged).toBeInstanceOf(Tag);
    expect(merged).toEqual(new Tag('a', 5));
  });
});
