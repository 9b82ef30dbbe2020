/**
 * Error hierarchy for fixturewright
 * Every failure carries a stable code plus the record type and dotted field
 * path it was raised for.
 */

import { ErrorCode, getErrorStage, type ErrorStage } from '../errors/codes';

export interface ErrorContext {
  typeName?: string; // Enclosing record type (e.g. 'Order')
  fieldPath?: string; // Dotted path from the root type (e.g. 'Order.customer.email')
  fieldType?: string; // Declared type, rendered by describeFieldType()
  value?: unknown; // Offending value (override or rule output)
  valuePath?: string; // Position inside the field value (e.g. '[2]', '.street')
  rule?: string; // Rule that produced the value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  stage: ErrorStage;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

interface FixtureErrorParams {
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all fixturewright errors
 */
export abstract class FixtureError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor({ message, errorCode, context, cause }: FixtureErrorParams) {
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get stage(): ErrorStage {
    return getErrorStage(this.errorCode);
  }

  get fieldPath(): string | undefined {
    return this.context?.fieldPath;
  }

  get typeName(): string | undefined {
    return this.context?.typeName;
  }

  /**
   * Serialize error to JSON for logging and debugging
   */
  toJSON(includeStack = true): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      stage: this.stage,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
    if (includeStack) {
      base.stack = this.stack;
    }
    return base;
  }
}

/** The value handed to describe() has no single canonical constructor */
export class NotARecordTypeError extends FixtureError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.NOT_A_RECORD_TYPE, context });
  }
}

export class CircularRecordTypeError extends FixtureError {
  /** Required record fields forming the cycle, e.g. ['Node.next'] */
  public readonly cycle: readonly string[];

  constructor(typeName: string, cycle: readonly string[]) {
    super({
      message: `Record type ${typeName} requires itself through ${cycle.join(' -> ')}; make one of these fields optional or a collection`,
      errorCode: ErrorCode.CIRCULAR_RECORD_TYPE,
      context: { typeName, fieldPath: cycle[0] },
    });
    this.cycle = cycle;
  }
}

export class UnsupportedFieldTypeError extends FixtureError {
  constructor(fieldPath: string, fieldType: string, typeName?: string) {
    super({
      message: `No rule matches field ${fieldPath} of type ${fieldType}`,
      errorCode: ErrorCode.UNSUPPORTED_FIELD_TYPE,
      context: {
        typeName,
        fieldPath,
        fieldType,
        suggestion:
          'Register a rule for this field with registerRule(matcher, producer)',
      },
    });
  }
}

/** A custom rule producer threw something that is not a FixtureError */
export class RuleFailedError extends FixtureError {
  constructor(rule: string, fieldPath: string, cause: Error) {
    super({
      message: `Rule "${rule}" failed for field ${fieldPath}: ${cause.message}`,
      errorCode: ErrorCode.RULE_FAILED,
      context: { rule, fieldPath },
      cause,
    });
  }
}

export class DepthLimitExceededError extends FixtureError {
  constructor(fieldPath: string, maxDepth: number) {
    super({
      message: `Nested record depth exceeded ${maxDepth} at ${fieldPath}`,
      errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
      context: { fieldPath, maxDepth },
    });
  }
}

export class SequenceExhaustedError extends FixtureError {
  constructor(last: bigint) {
    super({
      message: `Sequence counter passed Number.MAX_SAFE_INTEGER (last value ${last.toString()})`,
      errorCode: ErrorCode.SEQUENCE_EXHAUSTED,
    });
  }
}

export class UnknownFieldError extends FixtureError {
  constructor(typeName: string, field: string, suggestion?: string) {
    super({
      message:
        `Record type ${typeName} has no field "${field}"` +
        (suggestion ? `; did you mean "${suggestion}"?` : ''),
      errorCode: ErrorCode.UNKNOWN_FIELD,
      context: { typeName, fieldPath: `${typeName}.${field}`, suggestion },
    });
  }
}

export class TypeMismatchError extends FixtureError {
  constructor(params: {
    fieldPath: string;
    expected: string;
    value: unknown;
    valuePath?: string;
    typeName?: string;
    rule?: string;
  }) {
    const where = params.fieldPath + (params.valuePath ?? '');
    const source = params.rule ? ` produced by rule "${params.rule}"` : '';
    super({
      message: `Value ${renderValue(params.value)}${source} does not match ${params.expected} for ${where}`,
      errorCode: ErrorCode.TYPE_MISMATCH,
      context: {
        typeName: params.typeName,
        fieldPath: params.fieldPath,
        fieldType: params.expected,
        value: params.value,
        valuePath: params.valuePath,
        rule: params.rule,
      },
    });
  }
}

export class ConfigError extends FixtureError {
  constructor(message: string, setting?: string) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting },
    });
  }

  get setting(): string | undefined {
    return typeof this.context?.setting === 'string'
      ? this.context.setting
      : undefined;
  }
}

export function isFixtureError(error: unknown): error is FixtureError {
  return error instanceof FixtureError;
}

/**
 * Short, single-line rendering of an arbitrary value for error messages
 */
export function renderValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value.toString()}n`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? 'Date(invalid)'
      : `Date(${value.toISOString()})`;
  }
  if (value === null || value === undefined) return String(value);
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Map) return `Map(${value.size})`;
  if (value instanceof Set) return `Set(${value.size})`;
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name && ctor.name !== 'Object'
      ? `${ctor.name} instance`
      : 'object';
  }
  return String(value);
}
