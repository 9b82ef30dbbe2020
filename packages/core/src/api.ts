/**
 * High-level API
 *
 * A Generator owns one sequence counter, one rule list and the options it
 * was created with. The module-level functions delegate to a lazily created
 * default generator.
 */

import { OverrideMerger, type Overrides } from './builder/override-merger';
import { RecordBuilder } from './builder/record-builder';
import { RecordType, type RecordSource } from './introspect/record-type';
import {
  TypeIntrospector,
  type RecordTypeDescriptor,
} from './introspect/type-introspector';
import {
  defineRule,
  type GenerationRule,
  type RuleMatcher,
  type RuleOptions,
  type ValueProducer,
} from './rules/rule';
import { RuleEngine } from './rules/rule-engine';
import { SequenceCounter } from './sequence/sequence-counter';
import {
  ConfigError,
  NotARecordTypeError,
  TypeMismatchError,
} from './types/errors';
import { resolveOptions, type GeneratorOptions } from './types/options';

export type OverridesFactory<T> = (index: number) => Overrides<T> | undefined;

export type OverridesFor<T> = Overrides<T> | OverridesFactory<T>;

function isFactory<T>(
  overrides: OverridesFor<T> | undefined
): overrides is OverridesFactory<T> {
  return typeof overrides === 'function';
}

export class Generator {
  readonly counter: SequenceCounter;
  private readonly introspector = new TypeIntrospector();
  private readonly engine: RuleEngine;
  private readonly builder: RecordBuilder;
  private readonly merger = new OverrideMerger();

  /**
   * @throws {ConfigError} When an option is out of range
   */
  constructor(options: GeneratorOptions = {}) {
    const resolved = resolveOptions(options);
    this.counter =
      resolved.counter ?? new SequenceCounter({ start: resolved.startAt });
    this.engine = new RuleEngine(resolved, resolved.rules);
    this.builder = new RecordBuilder(
      this.introspector,
      this.engine,
      this.counter,
      resolved
    );
  }

  /**
   * Build a fully populated instance of a record type, then apply overrides
   *
   * ```ts
   * const order = generator.generate(OrderType, { status: 'shipped' });
   * ```
   */
  generate<T>(source: RecordSource<T>, overrides?: Overrides<T>): T {
    const descriptor = this.describe(source);
    const built = this.builder.build(descriptor).unwrap();
    const instance = overrides
      ? this.merger
          .merge(descriptor.recordType, descriptor, built, overrides)
          .unwrap()
      : built;
    return ensureInstance(source, descriptor, instance);
  }

  /**
   * Build `count` instances. Overrides are either shared by every instance or
   * computed from the instance index.
   */
  generateMany<T>(
    source: RecordSource<T>,
    count: number,
    overrides?: OverridesFor<T>
  ): T[] {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new ConfigError(
        `count must be a non-negative integer, got ${count}`,
        'count'
      );
    }

    const instances: T[] = [];
    for (let index = 0; index < count; index++) {
      const current = isFactory(overrides) ? overrides(index) : overrides;
      instances.push(this.generate(source, current));
    }
    return instances;
  }

  /**
   * Copy of `instance` with the given fields replaced; `instance` is left
   * untouched.
   */
  merge<T>(source: RecordSource<T>, instance: T, overrides: Overrides<T>): T {
    const descriptor = this.describe(source);
    if (!descriptor.recordType.isInstance(instance)) {
      throw new TypeMismatchError({
        fieldPath: descriptor.name,
        expected: `record ${descriptor.name}`,
        value: instance,
        typeName: descriptor.name,
      });
    }
    const merged = this.merger
      .merge(descriptor.recordType, descriptor, instance, overrides)
      .unwrap();
    return ensureInstance(source, descriptor, merged);
  }

  describe(source: unknown): RecordTypeDescriptor {
    return this.introspector.describe(source).unwrap();
  }

  /**
   * Register a custom rule. Rules registered later are consulted first.
   */
  registerRule(rule: GenerationRule): GenerationRule;
  registerRule(
    matcher: RuleMatcher,
    producer: ValueProducer,
    options?: RuleOptions
  ): GenerationRule;
  registerRule(
    ruleOrMatcher: GenerationRule | RuleMatcher,
    producer?: ValueProducer,
    options?: RuleOptions
  ): GenerationRule {
    if (typeof ruleOrMatcher !== 'function') {
      return this.engine.register(ruleOrMatcher);
    }
    if (!producer) {
      throw new ConfigError(
        'registerRule(matcher, producer) needs a producer',
        'producer'
      );
    }
    return this.engine.register(defineRule(ruleOrMatcher, producer, options));
  }

  removeRule(rule: GenerationRule): boolean {
    return this.engine.remove(rule);
  }

  /** Custom rules in registration order */
  get rules(): readonly GenerationRule[] {
    return this.engine.list();
  }
}

function ensureInstance<T>(
  source: RecordSource<T>,
  descriptor: RecordTypeDescriptor,
  value: unknown
): T {
  if (source instanceof RecordType) {
    if (source.isInstance(value)) return value;
  } else if (value instanceof source) {
    return value;
  }
  throw new NotARecordTypeError(
    `Constructor of ${descriptor.name} returned a value its own instance check rejects`,
    { typeName: descriptor.name }
  );
}

export function createGenerator(options?: GeneratorOptions): Generator {
  return new Generator(options);
}

let defaultGenerator: Generator | undefined;

export function getDefaultGenerator(): Generator {
  defaultGenerator ??= new Generator();
  return defaultGenerator;
}

/**
 * Replace the default generator, e.g. to change its options or to start its
 * counter over between test files
 */
export function resetDefaultGenerator(options?: GeneratorOptions): Generator {
  defaultGenerator = new Generator(options);
  return defaultGenerator;
}

/**
 * Convenience function to generate an instance with the default generator
 */
export function generate<T>(
  source: RecordSource<T>,
  overrides?: Overrides<T>
): T {
  return getDefaultGenerator().generate(source, overrides);
}

export function generateMany<T>(
  source: RecordSource<T>,
  count: number,
  overrides?: OverridesFor<T>
): T[] {
  return getDefaultGenerator().generateMany(source, count, overrides);
}

export function merge<T>(
  source: RecordSource<T>,
  instance: T,
  overrides: Overrides<T>
): T {
  return getDefaultGenerator().merge(source, instance, overrides);
}

/**
 * Convenience function to register a rule with the default generator
 */
export function registerRule(rule: GenerationRule): GenerationRule;
export function registerRule(
  matcher: RuleMatcher,
  producer: ValueProducer,
  options?: RuleOptions
): GenerationRule;
export function registerRule(
  ruleOrMatcher: GenerationRule | RuleMatcher,
  producer?: ValueProducer,
  options?: RuleOptions
): GenerationRule {
  const generator = getDefaultGenerator();
  if (typeof ruleOrMatcher !== 'function') {
    return generator.registerRule(ruleOrMatcher);
  }
  if (!producer) {
    throw new ConfigError(
      'registerRule(matcher, producer) needs a producer',
      'producer'
    );
  }
  return generator.registerRule(ruleOrMatcher, producer, options);
}

export function removeRule(rule: GenerationRule): boolean {
  return getDefaultGenerator().removeRule(rule);
}
