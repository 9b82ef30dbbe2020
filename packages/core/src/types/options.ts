/**
 * Configuration options for a generator
 *
 * All options are optional with conservative defaults. Scalar settings are
 * validated against a JSON Schema with Ajv; violations raise ConfigError.
 */

import Ajv, { type JSONSchemaType } from 'ajv';
import type { GenerationRule } from '../rules/rule';
import type { SequenceCounter } from '../sequence/sequence-counter';
import { ConfigError } from './errors';

export type DebugSink = (line: string) => void;

export interface GeneratorOptions {
  /** Last value of a fresh counter; the first draw returns startAt + 1 (default: 0) */
  startAt?: number;
  /** Domain of synthesized email addresses (default: 'example.com') */
  emailDomain?: string;
  /** Local-part prefix of synthesized email addresses (default: 'random') */
  emailPrefix?: string;
  /** Prefix of synthesized plain strings (default: 'arbitrary') */
  stringPrefix?: string;
  /** Maximum depth of records built by custom rules through context.build (default: 32) */
  maxDepth?: number;
  /** Clock used for date fields (default: () => new Date()) */
  now?: () => Date;
  /** Share an existing counter instead of creating one from startAt */
  counter?: SequenceCounter;
  /** Custom rules registered at construction, in registration order */
  rules?: readonly GenerationRule[];
  /**
   * Trace every field resolution. `true` writes to stderr; a function
   * receives each line. Defaults to the FIXTUREWRIGHT_DEBUG environment
   * variable.
   */
  debug?: boolean | DebugSink;
}

export interface ResolvedOptions {
  startAt: number;
  emailDomain: string;
  emailPrefix: string;
  stringPrefix: string;
  maxDepth: number;
  now: () => Date;
  counter?: SequenceCounter;
  rules: readonly GenerationRule[];
  debug: DebugSink | undefined;
}

type ScalarOptions = Pick<
  ResolvedOptions,
  'startAt' | 'emailDomain' | 'emailPrefix' | 'stringPrefix' | 'maxDepth'
>;

export const DEFAULT_OPTIONS: Readonly<ScalarOptions> = Object.freeze({
  startAt: 0,
  emailDomain: 'example.com',
  emailPrefix: 'random',
  stringPrefix: 'arbitrary',
  maxDepth: 32,
});

const SCALAR_OPTIONS_SCHEMA: JSONSchemaType<ScalarOptions> = {
  type: 'object',
  properties: {
    startAt: {
      type: 'integer',
      minimum: 0,
      maximum: Number.MAX_SAFE_INTEGER,
    },
    emailDomain: {
      type: 'string',
      pattern: '^[A-Za-z0-9-]+(\\.[A-Za-z0-9-]+)+$',
    },
    emailPrefix: {
      type: 'string',
      minLength: 1,
      pattern: '^[A-Za-z0-9._+-]+$',
    },
    stringPrefix: { type: 'string', minLength: 1 },
    maxDepth: { type: 'integer', minimum: 1 },
  },
  required: [
    'startAt',
    'emailDomain',
    'emailPrefix',
    'stringPrefix',
    'maxDepth',
  ],
};

const ajv = new Ajv({ allErrors: true });
const validateScalars = ajv.compile(SCALAR_OPTIONS_SCHEMA);

function defaultDebugSink(): DebugSink | undefined {
  const flag = process.env.FIXTUREWRIGHT_DEBUG;
  if (!flag || flag === '0' || flag === 'false') {
    return undefined;
  }
  return writeToStderr;
}

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

function resolveDebug(
  debug: GeneratorOptions['debug']
): DebugSink | undefined {
  if (typeof debug === 'function') return debug;
  if (debug === true) return writeToStderr;
  if (debug === false) return undefined;
  return defaultDebugSink();
}

/**
 * Merge user options with defaults and validate the result
 *
 * @throws {ConfigError} When a setting is out of range
 */
export function resolveOptions(
  userOptions: GeneratorOptions = {}
): ResolvedOptions {
  const scalars: ScalarOptions = {
    startAt: userOptions.startAt ?? DEFAULT_OPTIONS.startAt,
    emailDomain: userOptions.emailDomain ?? DEFAULT_OPTIONS.emailDomain,
    emailPrefix: userOptions.emailPrefix ?? DEFAULT_OPTIONS.emailPrefix,
    stringPrefix: userOptions.stringPrefix ?? DEFAULT_OPTIONS.stringPrefix,
    maxDepth: userOptions.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
  };

  if (!validateScalars(scalars)) {
    const first = validateScalars.errors?.[0];
    throw new ConfigError(
      `Invalid generator options: ${ajv.errorsText(validateScalars.errors, {
        dataVar: 'options',
      })}`,
      first?.instancePath.replace(/^\//, '') || undefined
    );
  }

  if (userOptions.counter && userOptions.startAt !== undefined) {
    throw new ConfigError(
      'startAt cannot be combined with a shared counter',
      'startAt'
    );
  }
  if (userOptions.now !== undefined && typeof userOptions.now !== 'function') {
    throw new ConfigError('now must be a function returning a Date', 'now');
  }

  return {
    ...scalars,
    now: userOptions.now ?? (() => new Date()),
    counter: userOptions.counter,
    rules: userOptions.rules ?? [],
    debug: resolveDebug(userOptions.debug),
  };
}
