/**
 * Rule engine
 *
 * Picks the value of one field. Custom 'first' rules win over the built-in
 * rules, latest registration first; custom 'fallback' rules are consulted
 * only for fields no built-in rule covers.
 */

import type {
  FieldDescriptor,
  RecordTypeDescriptor,
} from '../introspect/type-introspector';
import { findMismatch } from '../builder/value-checker';
import {
  FixtureError,
  RuleFailedError,
  TypeMismatchError,
  UnsupportedFieldTypeError,
} from '../types/errors';
import type { RecordType } from '../introspect/record-type';
import { assertNever, describeFieldType } from '../types/field-types';
import type { ResolvedOptions } from '../types/options';
import { type Result, ok, err } from '../types/result';
import type { GenerationRule, RuleContext, RulePlacement } from './rule';

type EngineOptions = Pick<
  ResolvedOptions,
  'emailDomain' | 'emailPrefix' | 'stringPrefix' | 'debug'
>;

interface Resolved {
  rule: string;
  value: unknown;
}

const EMAIL_FIELD = /email/i;

/** Builds the value of a nested-record field for the built-in rule */
export type NestedBuilder = <T>(type: RecordType<T>) => T;

export class RuleEngine {
  private readonly rules: GenerationRule[] = [];

  constructor(
    private readonly options: EngineOptions,
    rules: readonly GenerationRule[] = []
  ) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  register(rule: GenerationRule): GenerationRule {
    this.rules.push(rule);
    return rule;
  }

  /** Returns false when the rule was not registered */
  remove(rule: GenerationRule): boolean {
    const index = this.rules.lastIndexOf(rule);
    if (index === -1) return false;
    this.rules.splice(index, 1);
    return true;
  }

  /** Custom rules in registration order */
  list(): readonly GenerationRule[] {
    return [...this.rules];
  }

  /**
   * Every produced value, built-in or custom, is checked against the declared
   * type. `nest` builds nested records for the built-in rule; it defaults to
   * `context.build`.
   */
  resolve(
    field: FieldDescriptor,
    record: RecordTypeDescriptor,
    context: RuleContext,
    nest: NestedBuilder = context.build
  ): Result<unknown, FixtureError> {
    try {
      const resolved =
        this.custom('first', field, record, context) ??
        builtin(field, context, this.options, nest) ??
        this.custom('fallback', field, record, context);

      if (!resolved) {
        return err(
          new UnsupportedFieldTypeError(
            context.path,
            describeFieldType(field.type),
            record.name
          )
        );
      }
      checkValue(field, record, context.path, resolved);
      this.trace(context.path, resolved.rule);
      return ok(resolved.value);
    } catch (error) {
      if (error instanceof FixtureError) {
        return err(error);
      }
      throw error;
    }
  }

  private custom(
    placement: RulePlacement,
    field: FieldDescriptor,
    record: RecordTypeDescriptor,
    context: RuleContext
  ): Resolved | undefined {
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i];
      if (!rule || rule.placement !== placement) continue;
      if (!guard(rule, context.path, () => rule.matches(field, record))) {
        continue;
      }

      const value = guard(rule, context.path, () =>
        rule.produce(field, context)
      );
      return { rule: rule.name, value };
    }
    return undefined;
  }

  private trace(path: string, rule: string): void {
    this.options.debug?.(`[fixturewright] ${path} <- ${rule}`);
  }
}

function checkValue(
  field: FieldDescriptor,
  record: RecordTypeDescriptor,
  path: string,
  resolved: Resolved
): void {
  const found = findMismatch(field.type, resolved.value);
  if (found) {
    throw new TypeMismatchError({
      fieldPath: path,
      expected: found.expected,
      value: found.value,
      valuePath: found.valuePath || undefined,
      typeName: record.name,
      rule: resolved.rule,
    });
  }
}

/**
 * Run user code of a rule; library errors pass through, anything else is
 * wrapped with the rule name and field path.
 */
function guard<R>(rule: GenerationRule, path: string, run: () => R): R {
  try {
    return run();
  } catch (error) {
    if (error instanceof FixtureError) throw error;
    throw new RuleFailedError(
      rule.name,
      path,
      error instanceof Error ? error : new Error(String(error))
    );
  }
}

function builtin(
  field: FieldDescriptor,
  context: RuleContext,
  options: EngineOptions,
  nest: NestedBuilder
): Resolved | undefined {
  const type = field.type;
  switch (type.kind) {
    case 'enum':
      return { rule: 'first-variant', value: type.values[0] };
    case 'optional':
      return { rule: 'absent', value: type.absent };
    case 'array':
      return { rule: 'empty-collection', value: [] };
    case 'set':
      return { rule: 'empty-collection', value: new Set() };
    case 'map':
      return { rule: 'empty-collection', value: new Map() };
    case 'dict':
      return { rule: 'empty-collection', value: {} };
    case 'record':
      return { rule: 'nested-record', value: nest(type.target()) };
    case 'string':
      if (EMAIL_FIELD.test(field.name)) {
        return {
          rule: 'sequential-email',
          value: `${options.emailPrefix}-${context.next()}@${options.emailDomain}`,
        };
      }
      return {
        rule: 'sequential-string',
        value: `${options.stringPrefix}-${context.next()}`,
      };
    case 'boolean':
      return { rule: 'false', value: false };
    case 'integer':
      return { rule: 'sequential-integer', value: context.next() };
    case 'bigint':
      return { rule: 'sequential-bigint', value: BigInt(context.next()) };
    case 'date':
      return { rule: 'current-time', value: new Date(context.now().getTime()) };
    case 'opaque':
      return undefined;
    default:
      return assertNever(type);
  }
}
