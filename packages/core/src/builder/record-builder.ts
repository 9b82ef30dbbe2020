/**
 * Record builder
 * Resolves every field of a record type in declared order and hands the
 * values to the type's canonical constructor.
 *
 * Nested records reached through the built-in rule are bounded by the
 * acyclic type graph. `maxDepth` limits only records that custom rules build
 * through `context.build`, which can recurse without end.
 */

import type { RecordType } from '../introspect/record-type';
import type {
  RecordTypeDescriptor,
  TypeIntrospector,
} from '../introspect/type-introspector';
import type { RuleContext } from '../rules/rule';
import type { RuleEngine } from '../rules/rule-engine';
import type { SequenceCounter } from '../sequence/sequence-counter';
import {
  DepthLimitExceededError,
  FixtureError,
  RuleFailedError,
} from '../types/errors';
import { type Result, ok, err, isErr } from '../types/result';

export interface BuilderOptions {
  /** Nesting limit for records built by custom rules */
  maxDepth: number;
  now: () => Date;
}

export class RecordBuilder {
  constructor(
    private readonly introspector: TypeIntrospector,
    private readonly engine: RuleEngine,
    private readonly counter: SequenceCounter,
    private readonly options: BuilderOptions
  ) {}

  build<T>(descriptor: RecordTypeDescriptor<T>): Result<T, FixtureError> {
    return this.buildAt(
      descriptor.recordType,
      descriptor,
      descriptor.name,
      0,
      0
    );
  }

  /**
   * `depth` counts every enclosing record; `ruleDepth` counts only those
   * built by custom rules.
   */
  private buildAt<T>(
    type: RecordType<T>,
    descriptor: RecordTypeDescriptor,
    path: string,
    depth: number,
    ruleDepth: number
  ): Result<T, FixtureError> {
    if (ruleDepth > this.options.maxDepth) {
      return err(new DepthLimitExceededError(path, this.options.maxDepth));
    }

    const values: Record<string, unknown> = {};
    for (const field of descriptor.fields) {
      const fieldPath = `${path}.${field.name}`;
      const result = this.engine.resolve(
        field,
        descriptor,
        this.context(fieldPath, depth, ruleDepth),
        (nested) => this.nested(nested, fieldPath, depth + 1, ruleDepth)
      );
      if (isErr(result)) {
        return result;
      }
      values[field.name] = result.value;
    }

    try {
      return ok(type.construct(values));
    } catch (error) {
      if (error instanceof FixtureError) {
        return err(error);
      }
      return err(
        new RuleFailedError(
          `${descriptor.name} constructor`,
          path,
          error instanceof Error ? error : new Error(String(error))
        )
      );
    }
  }

  private context(path: string, depth: number, ruleDepth: number): RuleContext {
    return {
      path,
      depth,
      next: () => this.counter.next(),
      now: () => this.options.now(),
      build: <N>(type: RecordType<N>): N =>
        this.nested(type, path, depth + 1, ruleDepth + 1),
    };
  }

  /** Nested builds throw so rule producers can call them directly */
  private nested<N>(
    type: RecordType<N>,
    path: string,
    depth: number,
    ruleDepth: number
  ): N {
    const described = this.introspector.describe(type);
    if (isErr(described)) {
      return described.unwrap();
    }
    const built = this.buildAt(type, described.value, path, depth, ruleDepth);
    if (isErr(built)) {
      return built.unwrap();
    }
    return built.value;
  }
}
