/**
 * Generation rules
 * A rule pairs a matcher over (field, enclosing record) with a producer.
 */

import type {
  FieldDescriptor,
  RecordTypeDescriptor,
} from '../introspect/type-introspector';
import type { RecordType } from '../introspect/record-type';

/**
 * Where a custom rule sits relative to the built-in rules:
 * - 'first': consulted before the built-ins
 * - 'fallback': consulted only when no built-in rule matches
 */
export type RulePlacement = 'first' | 'fallback';

export interface RuleContext {
  /** Dotted path of the field being generated, e.g. 'Order.customer.email' */
  readonly path: string;
  /** Nesting depth of the enclosing record (0 for the requested type) */
  readonly depth: number;
  /** Draw one fresh value from the generator's sequence counter */
  next(): number;
  /** Current time from the generator's clock */
  now(): Date;
  /** Build a nested record with the same generator */
  build<T>(type: RecordType<T>): T;
}

export type RuleMatcher = (
  field: FieldDescriptor,
  record: RecordTypeDescriptor
) => boolean;

export type ValueProducer = (
  field: FieldDescriptor,
  context: RuleContext
) => unknown;

export interface GenerationRule {
  readonly name: string;
  readonly placement: RulePlacement;
  readonly matches: RuleMatcher;
  readonly produce: ValueProducer;
}

export interface RuleOptions {
  name?: string;
  placement?: RulePlacement;
}

let anonymousRules = 0;

export function defineRule(
  matches: RuleMatcher,
  produce: ValueProducer,
  options: RuleOptions = {}
): GenerationRule {
  anonymousRules += options.name ? 0 : 1;
  return Object.freeze({
    name: options.name ?? `custom-${anonymousRules}`,
    placement: options.placement ?? 'first',
    matches,
    produce,
  });
}
