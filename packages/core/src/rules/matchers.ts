/**
 * Matcher combinators for registerRule()
 *
 * ```ts
 * registerRule(
 *   matchers.all(matchers.inRecord('Customer'), matchers.named('phone')),
 *   () => '+1-555-0100'
 * );
 * ```
 */

import type { FieldKind } from '../types/field-types';
import type { RuleMatcher } from './rule';

/** Field name equals one of `names` exactly */
export function named(...names: string[]): RuleMatcher {
  const wanted = new Set(names);
  return (field) => wanted.has(field.name);
}

/** Field name contains `fragment`, ignoring case */
export function nameContains(fragment: string): RuleMatcher {
  const lower = fragment.toLowerCase();
  return (field) => field.name.toLowerCase().includes(lower);
}

/** Field name matches `pattern` */
export function nameMatches(pattern: RegExp): RuleMatcher {
  return (field) => {
    pattern.lastIndex = 0;
    return pattern.test(field.name);
  };
}

/** Declared type is of one of `kinds` (an optional string is 'optional') */
export function ofKind(...kinds: FieldKind[]): RuleMatcher {
  const wanted = new Set<FieldKind>(kinds);
  return (field) => wanted.has(field.type.kind);
}

/** Enclosing record type has one of `typeNames` */
export function inRecord(...typeNames: string[]): RuleMatcher {
  const wanted = new Set(typeNames);
  return (_field, record) => wanted.has(record.name);
}

export function all(...matchers: RuleMatcher[]): RuleMatcher {
  return (field, record) => matchers.every((match) => match(field, record));
}

export function any(...matchers: RuleMatcher[]): RuleMatcher {
  return (field, record) => matchers.some((match) => match(field, record));
}

export function not(matcher: RuleMatcher): RuleMatcher {
  return (field, record) => !matcher(field, record);
}
