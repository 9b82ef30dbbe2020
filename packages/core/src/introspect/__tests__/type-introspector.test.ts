import { describe, it, expect } from 'vitest';
import {
  CircularRecordTypeError,
  NotARecordTypeError,
} from '../../types/errors';
import { t } from '../../types/field-types';
import { isErr, isOk } from '../../types/result';
import { defineRecord, recordClass, type RecordType } from '../record-type';
import { TypeIntrospector } from '../type-introspector';

describe('TypeIntrospector', () => {
  const Address = defineRecord('Address', {
    street: t.string(),
    city: t.string(),
  });
  const Customer = defineRecord('Customer', {
    name: t.string(),
    nickname: t.optional(t.string()),
    address: t.record(Address),
  });

  it('lists fields in declared order with optionality', () => {
    const result = new TypeIntrospector().describe(Customer);

    expect(isOk(result)).toBe(true);
    if (!isOk(result)) return;
    const descriptor = result.value;
    expect(descriptor.name).toBe('Customer');
    expect(descriptor.recordType).toBe(Customer);
    expect(
      descriptor.fields.map(({ name, optional, index }) => ({
        name,
        optional,
        index,
      }))
    ).toEqual([
      { name: 'name', optional: false, index: 0 },
      { name: 'nickname', optional: true, index: 1 },
      { name: 'address', optional: false, index: 2 },
    ]);
    expect(descriptor.field('address')?.type.kind).toBe('record');
    expect(descriptor.field('missing')).toBeUndefined();
  });

  it('memoises descriptors per type', () => {
    const introspector = new TypeIntrospector();
    const first = introspector.describe(Customer);
    const second = introspector.describe(Customer);

    expect(isOk(first) && isOk(second) && first.value === second.value).toBe(
      true
    );
  });

  it('describes registered classes', () => {
    class Point {
      constructor(
        readonly x: number,
        readonly y: number
      ) {}
    }
    recordClass(Point, { x: t.integer(), y: t.integer() });

    const result = new TypeIntrospector().describe(Point);

    expect(isOk(result) && result.value.name).toBe('Point');
  });

  describe('rejections', () => {
    function describeError(source: unknown): unknown {
      const result = new TypeIntrospector().describe(source);
      return isErr(result) ? result.error : undefined;
    }

    it('rejects primitives', () => {
      const error = describeError(42);

      expect(error).toBeInstanceOf(NotARecordTypeError);
      expect(error).toHaveProperty(
        'message',
        'Value of type number is not a record type'
      );
    });

    it('rejects null', () => {
      expect(describeError(null)).toHaveProperty(
        'message',
        'Value of type null is not a record type'
      );
    });

    it('rejects field types', () => {
      expect(describeError(t.array(t.string()))).toHaveProperty(
        'message',
        'Field type array<string> is not a record type'
      );
    });

    it('rejects unregistered classes', () => {
      class Invoice {}

      expect(describeError(Invoice)).toHaveProperty(
        'message',
        'Invoice is not a registered record type; declare it with recordClass(Invoice, fields)'
      );
    });

    it('rejects constructors whose arity differs from the field list', () => {
      class Pair {
        constructor(readonly left: string) {}
      }
      recordClass(Pair, { left: t.string(), right: t.string() });

      expect(describeError(Pair)).toHaveProperty(
        'message',
        'Constructor of Pair takes 1 parameter(s) but 2 field(s) are declared'
      );
    });

    it('takes an explicit arity for trailing default parameters', () => {
      class Tagged {
        constructor(
          readonly label: string,
          readonly tags: string[] = []
        ) {}
      }
      const TaggedType = recordClass(
        Tagged,
        { label: t.string(), tags: t.array(t.string()) },
        { arity: 2 }
      );

      expect(Tagged.length).toBe(1);
      expect(new TypeIntrospector().describe(TaggedType).unwrap().name).toBe(
        'Tagged'
      );
    });

    it('checks an explicit arity against the field list', () => {
      class Sized {
        constructor(readonly width: number) {}
      }
      recordClass(Sized, { width: t.integer() }, { arity: 3 });

      expect(describeError(Sized)).toHaveProperty(
        'message',
        'Constructor of Sized takes 3 parameter(s) but 1 field(s) are declared'
      );
    });

    it('rejects lazy references that do not yield a record type', () => {
      const Broken = defineRecord('Broken', {
        // Simulates a reference resolved before its target was initialised.
        child: t.lazy((): RecordType<unknown> => Reflect.get({}, 'missing')),
      });

      expect(describeError(Broken)).toHaveProperty(
        'message',
        'Field Broken.child references a value that is not a record type'
      );
    });
  });

  describe('cycles', () => {
    interface TreeNode {
      readonly label: string;
      readonly parent: TreeNode | undefined;
      readonly children: readonly TreeNode[];
    }

    it('allows cycles through optional and collection fields', () => {
      const Tree: RecordType<TreeNode> = defineRecord('Tree', {
        label: t.string(),
        parent: t.optional(t.lazy(() => Tree)),
        children: t.array(t.lazy(() => Tree)),
      });

      expect(isOk(new TypeIntrospector().describe(Tree))).toBe(true);
    });

    it('rejects a record that requires itself', () => {
      interface LinkedNode {
        readonly next: LinkedNode;
      }
      const Node: RecordType<LinkedNode> = defineRecord('Node', {
        next: t.lazy(() => Node),
      });

      const result = new TypeIntrospector().describe(Node);

      expect(isErr(result)).toBe(true);
      if (!isErr(result)) return;
      expect(result.error).toBeInstanceOf(CircularRecordTypeError);
      expect(result.error.message).toBe(
        'Record type Node requires itself through Node.next; make one of these fields optional or a collection'
      );
    });

    it('reports the whole cycle across several types', () => {
      interface Husband {
        readonly wife: Wife;
      }
      interface Wife {
        readonly husband: Husband;
      }
      const HusbandType: RecordType<Husband> = defineRecord('Husband', {
        wife: t.lazy(() => WifeType),
      });
      const WifeType: RecordType<Wife> = defineRecord('Wife', {
        husband: t.lazy(() => HusbandType),
      });

      const result = new TypeIntrospector().describe(HusbandType);

      expect(isErr(result) && result.error).toMatchObject({
        cycle: ['Husband.wife', 'Wife.husband'],
      });
    });
  });
});
