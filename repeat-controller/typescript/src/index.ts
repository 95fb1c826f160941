/**
 * Conditional repetition controller.
 *
 * Re-runs a fallible operation a bounded number of times, tolerating a
 * whitelist of failure kinds, and decides pass/fail from how many attempts
 * succeeded against a required minimum.
 *
 * @example
 * ```typescript
 * import { RepeatRunner, failureWithCode } from 'repeat-controller';
 *
 * const runner = new RepeatRunner();
 * const report = await runner.run(
 *   async () => client.ping(),
 *   { totalAttempts: 4, minSuccesses: 2, tolerableFailures: [failureWithCode('ECONNRESET')] }
 * );
 *
 * console.log(report.verdict, report.summary.successes);
 * ```
 *
 * @packageDocumentation
 */

// Engine
export {
  RepeatDecisionEngine,
  type AttemptContext,
  type EnginePhase,
  type FatalReason,
  type FailureDecision,
  type NonFatalDecision,
  type RunVerdict,
  type RunSummary,
} from './engine/index.js';

// Runner
export {
  RepeatRunner,
  repeated,
  type RepeatableOperation,
  type AttemptStatus,
  type AttemptRecord,
  type RunReport,
  type RunnerOptions,
  type RunOptions,
} from './runner/index.js';

// Classification
export {
  classifyFailure,
  matchesFailureKind,
  isEngineAbortSignal,
  withImplicitKinds,
  describeFailureKind,
  failureWhen,
  failureWithCode,
  IMPLICIT_TOLERABLE_KINDS,
  type FailureClass,
  type FailureMatcher,
  type FailureKind,
  type FailureClassification,
} from './classifier/index.js';

// History
export {
  ExecutionHistory,
  type AttemptOutcome,
  type AttemptOutcomeKind,
} from './history/index.js';

// Display names
export {
  formatDisplayName,
  DisplayNameFormatter,
  DISPLAY_NAME_PLACEHOLDER,
  CURRENT_REPETITION_PLACEHOLDER,
  TOTAL_REPETITIONS_PLACEHOLDER,
  MIN_SUCCESS_PLACEHOLDER,
  SUCCESS_COUNT_PLACEHOLDER,
  SHORT_DISPLAY_NAME,
  LONG_DISPLAY_NAME,
  type DisplayNameExtras,
} from './display/index.js';

// Configuration
export {
  createRepetitionPolicy,
  createPolicyOptionsFromEnv,
  resolveRunnerConfig,
  createRunnerConfigFromEnv,
  RepetitionPolicyOptionsSchema,
  DEFAULT_MIN_SUCCESSES,
  DEFAULT_NAME_PATTERN,
  DEFAULT_BASE_DISPLAY_NAME,
  DEFAULT_RUNNER_CONFIG,
  type RepetitionPolicyOptions,
  type RepetitionPolicy,
  type RunnerConfig,
  type ResolvedRunnerConfig,
} from './config/index.js';

// Errors
export {
  RepeatControllerError,
  isRepeatControllerError,
  PreconditionViolationError,
  AttemptAbortedError,
  ProtocolViolationError,
  SequenceExhaustedError,
  type AbortOrigin,
} from './errors/index.js';

// Observability
export * from './observability/index.js';
