/**
 * In-process host for the decision engine.
 *
 * Runs an operation under a repetition policy: pulls attempts, awaits each
 * one, reports the outcome, and resolves with a report once the sequence is
 * exhausted. A fatal failure rejects with the original failure object.
 *
 * @example
 * ```typescript
 * const runner = new RepeatRunner({ config: { logLevel: 'warn' } });
 *
 * const report = await runner.run(
 *   async (attempt) => fetchProfile(attempt.attemptIndex),
 *   { totalAttempts: 5, minSuccesses: 2, tolerableFailures: [TimeoutError] }
 * );
 * ```
 */

import { type RepetitionPolicyOptions, type ResolvedRunnerConfig, type RunnerConfig, resolveRunnerConfig } from '../config/index.js';
import { RepeatDecisionEngine, type AttemptContext, type RunSummary } from '../engine/index.js';
import {
  ConsoleLogger,
  InMemoryMetricsCollector,
  MetricNames,
  NoopMetricsCollector,
  describeFailure,
  emitAttempt,
  emitRunComplete,
  emitRunError,
  logAttemptStart,
  logFatalFailure,
  startTelemetryContext,
  type Logger,
  type MetricsCollector,
  type TelemetryContext,
} from '../observability/index.js';

export type RepeatableOperation<T> = (context: AttemptContext) => T | Promise<T>;

export type AttemptStatus = 'succeeded' | 'retried' | 'absorbed';

export interface AttemptRecord {
  readonly attemptIndex: number;
  readonly displayName: string;
  readonly status: AttemptStatus;
  /** The original failure, for retried and absorbed attempts */
  readonly failure?: unknown;
  readonly durationMs: number;
}

export interface RunReport<T> {
  readonly verdict: 'passed' | 'incomplete';
  readonly attempts: readonly AttemptRecord[];
  /** Values returned by successful attempts, in order */
  readonly results: readonly T[];
  readonly summary: RunSummary;
}

export interface RunnerOptions {
  config?: RunnerConfig;
  /** Overrides the console logger built from `config` */
  logger?: Logger;
  /** Overrides the collector chosen by `config.enableMetrics` */
  metrics?: MetricsCollector;
}

export interface RunOptions {
  /** Aborting stops the runner from pulling further attempts */
  signal?: AbortSignal;
}

export class RepeatRunner {
  private readonly config: ResolvedRunnerConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: RunnerOptions = {}) {
    this.config = resolveRunnerConfig(options.config);
    this.logger = options.logger ?? new ConsoleLogger({
      level: this.config.logLevel,
      format: this.config.logFormat,
    });
    this.metrics = options.metrics
      ?? (this.config.enableMetrics ? new InMemoryMetricsCollector() : new NoopMetricsCollector());
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  getConfig(): Readonly<ResolvedRunnerConfig> {
    return this.config;
  }

  /**
   * Run `operation` under the given policy.
   *
   * @throws {PreconditionViolationError} Before any attempt, if the policy is invalid
   * @throws The original failure of the attempt that ended the run
   */
  async run<T>(
    operation: RepeatableOperation<T>,
    policyOptions: RepetitionPolicyOptions,
    runOptions: RunOptions = {}
  ): Promise<RunReport<T>> {
    const engine = RepeatDecisionEngine.fromOptions(policyOptions);
    const { policy } = engine;
    const labels = { operation: policy.baseDisplayName };

    const telemetry = this.config.enableTelemetry
      ? startTelemetryContext({
        operation: policy.baseDisplayName,
        metadata: { totalAttempts: policy.totalAttempts, minSuccesses: policy.minSuccesses },
      })
      : undefined;

    this.metrics.incrementCounter(MetricNames.RUNS_TOTAL, 1, labels);

    const attempts: AttemptRecord[] = [];
    const results: T[] = [];

    for (;;) {
      if (runOptions.signal?.aborted) {
        engine.abandon();
        this.logger.info('Run abandoned by caller', {
          operation: policy.baseDisplayName,
          attemptsProduced: engine.getAttemptsProduced(),
        });
        break;
      }

      const context = engine.tryProduceNext();
      if (context === undefined) {
        break;
      }

      logAttemptStart(this.logger, context.displayName, context.attemptIndex, context.totalAttempts);
      this.metrics.incrementCounter(MetricNames.ATTEMPTS_TOTAL, 1, labels);
      const startedAt = Date.now();

      try {
        const value = await operation(context);
        engine.recordSuccess();
        results.push(value);
        this.recordAttempt(attempts, telemetry, labels, {
          attemptIndex: context.attemptIndex,
          displayName: context.displayName,
          status: 'succeeded',
          durationMs: Date.now() - startedAt,
        });
      } catch (failure) {
        const durationMs = Date.now() - startedAt;
        const decision = engine.decideFailure(failure);

        if (decision.action === 'fail') {
          this.metrics.incrementCounter(MetricNames.RUNS_FAILED, 1, { ...labels, reason: decision.reason });
          this.metrics.recordHistogram(MetricNames.ATTEMPT_DURATION_MS, durationMs, labels);
          logFatalFailure(this.logger, failure, decision.attemptIndex, decision.reason);
          if (telemetry) {
            emitRunError(telemetry, failure, { attemptIndex: decision.attemptIndex, reason: decision.reason });
          }
          throw failure;
        }

        if (decision.action === 'retry') {
          this.logger.info('Tolerable failure, repeating', {
            displayName: context.displayName,
            attemptIndex: decision.attemptIndex,
            ...describeFailure(failure),
          });
        } else {
          this.logger.warn('Tolerable failure after minimum successes, absorbing', {
            displayName: context.displayName,
            attemptIndex: decision.attemptIndex,
            ...describeFailure(failure),
          });
        }

        this.recordAttempt(attempts, telemetry, labels, {
          attemptIndex: context.attemptIndex,
          displayName: context.displayName,
          status: decision.action === 'retry' ? 'retried' : 'absorbed',
          failure,
          durationMs,
        });
      }
    }

    const summary = engine.summary();
    const verdict = summary.verdict === 'incomplete' ? 'incomplete' : 'passed';

    this.logger.debug('Run finished', { operation: policy.baseDisplayName, ...summary });
    if (telemetry) {
      emitRunComplete(telemetry, { ...summary });
    }

    return { verdict, attempts, results, summary };
  }

  private recordAttempt(
    attempts: AttemptRecord[],
    telemetry: TelemetryContext | undefined,
    labels: Record<string, string>,
    record: AttemptRecord
  ): void {
    attempts.push(record);
    this.metrics.recordHistogram(MetricNames.ATTEMPT_DURATION_MS, record.durationMs, labels);

    const counter = record.status === 'succeeded'
      ? MetricNames.ATTEMPTS_SUCCEEDED
      : record.status === 'retried'
        ? MetricNames.ATTEMPTS_RETRIED
        : MetricNames.ATTEMPTS_ABSORBED;
    this.metrics.incrementCounter(counter, 1, labels);

    if (telemetry) {
      emitAttempt(telemetry, {
        attemptIndex: record.attemptIndex,
        status: record.status,
        durationMs: record.durationMs,
        ...(record.failure === undefined ? {} : describeFailure(record.failure)),
      });
    }
  }
}

/**
 * Wrap an operation so every call runs it under repetition.
 *
 * The wrapped operation receives the attempt context first, then the
 * caller's arguments.
 *
 * @example
 * ```typescript
 * const syncAccount = repeated(
 *   async (_attempt, accountId: string) => client.sync(accountId),
 *   { totalAttempts: 3, tolerableFailures: [failureWithCode('ECONNRESET')] }
 * );
 *
 * const report = await syncAccount('acct-1');
 * ```
 */
export function repeated<Args extends unknown[], T>(
  operation: (context: AttemptContext, ...args: Args) => T | Promise<T>,
  policyOptions: RepetitionPolicyOptions,
  runnerOptions?: RunnerOptions | RepeatRunner
): (...args: Args) => Promise<RunReport<T>> {
  const runner = runnerOptions instanceof RepeatRunner ? runnerOptions : new RepeatRunner(runnerOptions);
  return (...args: Args) => runner.run((context) => operation(context, ...args), policyOptions);
}
