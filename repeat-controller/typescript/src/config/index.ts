/**
 * Configuration for repeated runs.
 *
 * A run is configured once, before its first attempt, from a plain options
 * record. Options are validated with zod and frozen into a
 * {@link RepetitionPolicy}; anything invalid is a precondition violation.
 *
 * @module config
 */

import { z } from 'zod';
import { type FailureKind, withImplicitKinds } from '../classifier/index.js';
import { SHORT_DISPLAY_NAME } from '../display/index.js';
import { PreconditionViolationError } from '../errors/index.js';
import type { LogFormat, LogLevel } from '../observability/logging.js';

/** Default minimum number of successful attempts */
export const DEFAULT_MIN_SUCCESSES = 1;

/** Default per-attempt display name pattern */
export const DEFAULT_NAME_PATTERN = SHORT_DISPLAY_NAME;

/** Display name used when the caller gives none */
export const DEFAULT_BASE_DISPLAY_NAME = 'operation';

/**
 * Options for one repeated run.
 */
export interface RepetitionPolicyOptions {
  /** Hard upper bound on attempts. Must be a positive integer. */
  totalAttempts: number;

  /**
   * Successful attempts required for the run to pass.
   * @default 1
   */
  minSuccesses?: number;

  /** Failure kinds that allow another attempt. */
  tolerableFailures?: readonly FailureKind[];

  /**
   * Template for per-attempt display names. A blank pattern means "use the
   * base display name unchanged".
   * @default 'Repetition {currentRepetition} of {totalRepetitions}'
   */
  namePattern?: string;

  /** @default 'operation' */
  baseDisplayName?: string;
}

/**
 * Immutable configuration of a run. `tolerableFailures` already contains the
 * implicit kinds.
 */
export interface RepetitionPolicy {
  readonly totalAttempts: number;
  readonly minSuccesses: number;
  readonly tolerableFailures: readonly FailureKind[];
  readonly namePattern: string;
  readonly baseDisplayName: string;
}

const FailureKindSchema = z.custom<FailureKind>(
  (value) =>
    typeof value === 'function' ||
    (typeof value === 'object' && value !== null && 'matches' in value && typeof value.matches === 'function'),
  { message: 'Tolerable failure kinds must be error classes or failure matchers' }
);

/**
 * Zod schema for {@link RepetitionPolicyOptions}.
 */
export const RepetitionPolicyOptionsSchema = z.object({
  totalAttempts: z
    .number({ required_error: 'totalAttempts is required' })
    .int('totalAttempts must be an integer')
    .positive('Total attempts must be higher than 0'),
  minSuccesses: z
    .number()
    .int('minSuccesses must be an integer')
    .min(1, 'Minimum successes must be higher than or equal to 1')
    .optional(),
  tolerableFailures: z.array(FailureKindSchema).optional(),
  namePattern: z.string().optional(),
  baseDisplayName: z.string().optional(),
});

/**
 * Validate options and build the frozen policy for a run.
 *
 * `minSuccesses` greater than `totalAttempts` is accepted; such a run can
 * only end in a fatal failure or an incomplete verdict.
 *
 * @throws {PreconditionViolationError} If the options are invalid
 *
 * @example
 * ```typescript
 * const policy = createRepetitionPolicy({
 *   totalAttempts: 5,
 *   minSuccesses: 2,
 *   tolerableFailures: [TimeoutError],
 * });
 * ```
 */
export function createRepetitionPolicy(options: RepetitionPolicyOptions): RepetitionPolicy {
  const result = RepetitionPolicyOptionsSchema.safeParse(options);

  if (!result.success) {
    const first = result.error.issues[0];
    throw new PreconditionViolationError(
      first ? `Invalid repetition policy: ${first.message}` : 'Invalid repetition policy',
      result.error
    );
  }

  const parsed = result.data;

  return Object.freeze({
    totalAttempts: parsed.totalAttempts,
    minSuccesses: parsed.minSuccesses ?? DEFAULT_MIN_SUCCESSES,
    tolerableFailures: withImplicitKinds(parsed.tolerableFailures ?? []),
    namePattern: parsed.namePattern ?? DEFAULT_NAME_PATTERN,
    baseDisplayName: parsed.baseDisplayName ?? DEFAULT_BASE_DISPLAY_NAME,
  });
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new PreconditionViolationError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read policy options from environment variables:
 * `REPEAT_TOTAL_ATTEMPTS` (required), `REPEAT_MIN_SUCCESSES`,
 * `REPEAT_NAME_PATTERN`.
 *
 * Whitelists cannot be expressed in the environment and are left empty.
 */
export function createPolicyOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RepetitionPolicyOptions {
  const totalAttempts = parseIntegerEnv(env, 'REPEAT_TOTAL_ATTEMPTS');

  if (totalAttempts === undefined) {
    throw new PreconditionViolationError('Missing attempt budget. Set REPEAT_TOTAL_ATTEMPTS environment variable.');
  }

  const options: RepetitionPolicyOptions = { totalAttempts };

  const minSuccesses = parseIntegerEnv(env, 'REPEAT_MIN_SUCCESSES');
  if (minSuccesses !== undefined) options.minSuccesses = minSuccesses;
  if (env.REPEAT_NAME_PATTERN !== undefined) options.namePattern = env.REPEAT_NAME_PATTERN;

  return options;
}

// ============================================================================
// Runner configuration
// ============================================================================

/**
 * Ambient settings for a {@link RepeatRunner}.
 */
export interface RunnerConfig {
  /** @default 'info' */
  logLevel?: LogLevel;
  /** @default 'pretty' */
  logFormat?: LogFormat;
  /** @default true */
  enableMetrics?: boolean;
  /** Send run events through the shared telemetry emitter. @default false */
  enableTelemetry?: boolean;
}

export type ResolvedRunnerConfig = Required<RunnerConfig>;

export const DEFAULT_RUNNER_CONFIG: ResolvedRunnerConfig = {
  logLevel: 'info',
  logFormat: 'pretty',
  enableMetrics: true,
  enableTelemetry: false,
};

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['pretty', 'json', 'compact']);

const RunnerConfigSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  logFormat: LogFormatSchema.optional(),
  enableMetrics: z.boolean().optional(),
  enableTelemetry: z.boolean().optional(),
});

/**
 * Resolve runner configuration with defaults.
 *
 * @throws {PreconditionViolationError} If a value is out of range
 */
export function resolveRunnerConfig(config: RunnerConfig = {}): ResolvedRunnerConfig {
  const result = RunnerConfigSchema.safeParse(config);

  if (!result.success) {
    throw new PreconditionViolationError('Invalid runner configuration', result.error);
  }

  return {
    logLevel: result.data.logLevel ?? DEFAULT_RUNNER_CONFIG.logLevel,
    logFormat: result.data.logFormat ?? DEFAULT_RUNNER_CONFIG.logFormat,
    enableMetrics: result.data.enableMetrics ?? DEFAULT_RUNNER_CONFIG.enableMetrics,
    enableTelemetry: result.data.enableTelemetry ?? DEFAULT_RUNNER_CONFIG.enableTelemetry,
  };
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

/**
 * Create runner configuration from environment variables:
 * `REPEAT_LOG_LEVEL`, `REPEAT_LOG_FORMAT`, `REPEAT_ENABLE_METRICS`,
 * `REPEAT_ENABLE_TELEMETRY`.
 */
export function createRunnerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const config: RunnerConfig = {};

  if (env.REPEAT_LOG_LEVEL !== undefined) {
    const level = LogLevelSchema.safeParse(env.REPEAT_LOG_LEVEL);
    if (!level.success) {
      throw new PreconditionViolationError(`Invalid REPEAT_LOG_LEVEL: ${env.REPEAT_LOG_LEVEL}`, level.error);
    }
    config.logLevel = level.data;
  }

  if (env.REPEAT_LOG_FORMAT !== undefined) {
    const format = LogFormatSchema.safeParse(env.REPEAT_LOG_FORMAT);
    if (!format.success) {
      throw new PreconditionViolationError(`Invalid REPEAT_LOG_FORMAT: ${env.REPEAT_LOG_FORMAT}`, format.error);
    }
    config.logFormat = format.data;
  }

  const enableMetrics = parseBooleanEnv(env.REPEAT_ENABLE_METRICS);
  if (enableMetrics !== undefined) config.enableMetrics = enableMetrics;

  const enableTelemetry = parseBooleanEnv(env.REPEAT_ENABLE_TELEMETRY);
  if (enableTelemetry !== undefined) config.enableTelemetry = enableTelemetry;

  return config;
}
