// @fixturewright/core entry point
//
// Public API:
// - Generator / createGenerator and the default-generator convenience
//   functions (generate, generateMany, merge, registerRule, removeRule).
// - Record type declarations (defineRecord, defineRecordWith, recordClass)
//   and the `t` field type builders.
// - Rule helpers (defineRule, matchers, fakerRules), SequenceCounter, the
//   error hierarchy and the Result type used by the lower-level components.

export * from './api';

export {
  t,
  describeFieldType,
  isFieldType,
  type FieldType,
  type FieldKind,
  type FieldMap,
  type FieldValues,
  type ValueOf,
  type EnumValue,
  type StringType,
  type BooleanType,
  type IntegerType,
  type BigIntType,
  type DateType,
  type EnumType,
  type OptionalType,
  type ArrayType,
  type SetType,
  type MapType,
  type DictType,
  type RecordRefType,
  type OpaqueType,
} from './types/field-types';

export {
  RecordType,
  defineRecord,
  defineRecordWith,
  recordClass,
  type RecordConstructor,
  type RecordSource,
} from './introspect/record-type';
export {
  TypeIntrospector,
  type FieldDescriptor,
  type RecordTypeDescriptor,
} from './introspect/type-introspector';

export {
  defineRule,
  type GenerationRule,
  type RuleContext,
  type RuleMatcher,
  type RuleOptions,
  type RulePlacement,
  type ValueProducer,
} from './rules/rule';
export { RuleEngine } from './rules/rule-engine';
export * as matchers from './rules/matchers';
export { fakerRules, type FakerRulesOptions } from './rules/faker-rules';

export {
  SequenceCounter,
  type SequenceCounterOptions,
} from './sequence/sequence-counter';

export { RecordBuilder } from './builder/record-builder';
export { OverrideMerger, type Overrides } from './builder/override-merger';
export { findMismatch, type Mismatch } from './builder/value-checker';

// Errors
export { ErrorCode, getErrorStage, type ErrorStage } from './errors/codes';
export {
  FixtureError,
  NotARecordTypeError,
  CircularRecordTypeError,
  UnsupportedFieldTypeError,
  RuleFailedError,
  DepthLimitExceededError,
  SequenceExhaustedError,
  UnknownFieldError,
  TypeMismatchError,
  ConfigError,
  isFixtureError,
  type ErrorContext,
  type SerializedError,
} from './types/errors';

// Options
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type GeneratorOptions,
  type ResolvedOptions,
  type DebugSink,
} from './types/options';

export {
  type Result,
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
} from './types/result';
