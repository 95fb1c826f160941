import { describe, it, expect, vi, beforeEach } from 'vitest';

const emitter = vi.hoisted(() => ({
  emitRunStart: vi.fn(),
  emitAttempt: vi.fn(),
  emitRunComplete: vi.fn(),
  emitError: vi.fn(),
}));

vi.mock('@repeat-controller/telemetry-emitter', () => ({
  TelemetryEmitter: { getInstance: () => emitter },
}));

import { RepeatRunner, repeated } from '../index.js';
import type { AttemptContext } from '../../engine/index.js';
import { AttemptAbortedError, PreconditionViolationError } from '../../errors/index.js';
import {
  InMemoryMetricsCollector,
  MetricNames,
  NoopLogger,
  NoopMetricsCollector,
  type Logger,
} from '../../observability/index.js';

class UpstreamUnavailableError extends Error {
  constructor(message = 'upstream unavailable') {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

class CorruptPayloadError extends Error {}

const labels = { operation: 'operation' };

function mockLogger(): Logger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Operation that throws the scripted failures in order and returns `ok`
 * for `undefined` entries. Records every context it receives.
 */
function scripted(steps: readonly unknown[]) {
  const contexts: AttemptContext[] = [];
  const operation = vi.fn(async (context: AttemptContext) => {
    contexts.push(context);
    const step = steps[context.attemptIndex - 1];
    if (step !== undefined) {
      throw step;
    }
    return `ok-${context.attemptIndex}`;
  });
  return { operation, contexts };
}

describe('RepeatRunner', () => {
  let logger: Logger;
  let metrics: InMemoryMetricsCollector;
  let runner: RepeatRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = mockLogger();
    metrics = new InMemoryMetricsCollector();
    runner = new RepeatRunner({ logger, metrics });
  });

  describe('tolerable failures', () => {
    it('keeps going to the end of the budget once a failure appeared', async () => {
      const { operation, contexts } = scripted([new UpstreamUnavailableError(), new UpstreamUnavailableError()]);

      const report = await runner.run(operation, {
        totalAttempts: 3,
        minSuccesses: 1,
        tolerableFailures: [UpstreamUnavailableError],
      });

      expect(report.verdict).toBe('passed');
      expect(report.results).toEqual(['ok-3']);
      expect(report.attempts.map((a) => a.status)).toEqual(['retried', 'retried', 'succeeded']);
      expect(report.attempts.map((a) => a.displayName)).toEqual([
        'Repetition 1 of 3',
        'Repetition 2 of 3',
        'Repetition 3 of 3',
      ]);
      expect(report.summary).toEqual({
        attemptsProduced: 3,
        totalAttempts: 3,
        minSuccesses: 1,
        successes: 1,
        failures: 2,
        failureAppeared: true,
        minSuccessesMet: true,
        verdict: 'passed',
      });
      expect(contexts.map((c) => c.failureAppeared)).toEqual([false, true, true]);
    });

    it('keeps the original failure on retried attempts', async () => {
      const failure = new UpstreamUnavailableError();
      const { operation } = scripted([failure]);

      const report = await runner.run(operation, { totalAttempts: 2, tolerableFailures: [UpstreamUnavailableError] });

      expect(report.attempts[0]?.failure).toBe(failure);
      expect(logger.info).toHaveBeenCalledWith('Tolerable failure, repeating', {
        displayName: 'Repetition 1 of 2',
        attemptIndex: 1,
        errorName: 'UpstreamUnavailableError',
        errorMessage: 'upstream unavailable',
      });
    });

    it('absorbs failures once the minimum is met', async () => {
      const { operation } = scripted([new UpstreamUnavailableError(), undefined, new UpstreamUnavailableError()]);

      const report = await runner.run(operation, { totalAttempts: 3, tolerableFailures: [UpstreamUnavailableError] });

      expect(report.verdict).toBe('passed');
      expect(report.attempts.map((a) => a.status)).toEqual(['retried', 'succeeded', 'absorbed']);
      expect(report.results).toEqual(['ok-2']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Tolerable failure after minimum successes, absorbing',
        expect.objectContaining({ attemptIndex: 3 })
      );
      expect(metrics.getCounter(MetricNames.ATTEMPTS_ABSORBED, labels)).toBe(1);
    });

    it('repeats when the operation asks for it without a whitelist', async () => {
      const { operation } = scripted([new AttemptAbortedError()]);

      const report = await runner.run(operation, { totalAttempts: 2 });

      expect(report.attempts.map((a) => a.status)).toEqual(['retried', 'succeeded']);
    });

    it('passes the success count to each attempt', async () => {
      const { operation, contexts } = scripted([new UpstreamUnavailableError(), undefined, undefined]);

      await runner.run(operation, {
        totalAttempts: 3,
        minSuccesses: 2,
        tolerableFailures: [UpstreamUnavailableError],
      });

      expect(contexts.map((c) => c.successCount)).toEqual([0, 0, 1]);
    });
  });

  describe('fatal failures', () => {
    it('rethrows the failure that makes the minimum unreachable', async () => {
      const second = new UpstreamUnavailableError('still unavailable');
      const { operation } = scripted([new UpstreamUnavailableError(), second]);

      await expect(
        runner.run(operation, { totalAttempts: 3, minSuccesses: 2, tolerableFailures: [UpstreamUnavailableError] })
      ).rejects.toBe(second);

      expect(operation).toHaveBeenCalledTimes(2);
      expect(metrics.getCounter(MetricNames.RUNS_FAILED, { ...labels, reason: 'target_unreachable' })).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        'Run failed',
        expect.objectContaining({ attemptIndex: 2, reason: 'target_unreachable' })
      );
    });

    it('rethrows a failure outside the whitelist without retrying', async () => {
      const failure = new CorruptPayloadError('bad checksum');
      const { operation } = scripted([failure]);

      await expect(
        runner.run(operation, { totalAttempts: 5, tolerableFailures: [UpstreamUnavailableError] })
      ).rejects.toBe(failure);

      expect(operation).toHaveBeenCalledTimes(1);
      expect(metrics.getCounter(MetricNames.ATTEMPTS_TOTAL, labels)).toBe(1);
      expect(metrics.getCounter(MetricNames.RUNS_FAILED, { ...labels, reason: 'not_tolerable' })).toBe(1);
    });

    it('rejects an invalid policy before running anything', async () => {
      const { operation } = scripted([]);

      await expect(runner.run(operation, { totalAttempts: 0 })).rejects.toBeInstanceOf(PreconditionViolationError);

      expect(operation).not.toHaveBeenCalled();
      expect(metrics.getCounter(MetricNames.RUNS_TOTAL, labels)).toBe(0);
    });
  });

  describe('success', () => {
    it('stops after a first successful attempt', async () => {
      const { operation } = scripted([]);

      const report = await runner.run(operation, { totalAttempts: 5 });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(report.verdict).toBe('passed');
      expect(report.results).toEqual(['ok-1']);
      expect(report.attempts).toHaveLength(1);
    });

    it('accepts synchronous operations', async () => {
      const report = await runner.run(() => 42, { totalAttempts: 2 });

      expect(report.results).toEqual([42]);
    });

    it('counts attempts in metrics', async () => {
      const { operation } = scripted([new UpstreamUnavailableError(), new UpstreamUnavailableError()]);

      await runner.run(operation, { totalAttempts: 3, tolerableFailures: [UpstreamUnavailableError] });

      expect(metrics.getCounter(MetricNames.RUNS_TOTAL, labels)).toBe(1);
      expect(metrics.getCounter(MetricNames.ATTEMPTS_TOTAL, labels)).toBe(3);
      expect(metrics.getCounter(MetricNames.ATTEMPTS_RETRIED, labels)).toBe(2);
      expect(metrics.getCounter(MetricNames.ATTEMPTS_SUCCEEDED, labels)).toBe(1);
      expect(metrics.getHistogram(MetricNames.ATTEMPT_DURATION_MS, labels)).toHaveLength(3);
    });

    it('labels metrics with the base display name', async () => {
      await runner.run(() => 'done', { totalAttempts: 1, baseDisplayName: 'refreshes token' });

      expect(metrics.getCounter(MetricNames.RUNS_TOTAL, { operation: 'refreshes token' })).toBe(1);
    });
  });

  describe('abort signal', () => {
    it('stops pulling attempts and reports an incomplete run', async () => {
      const controller = new AbortController();
      const operation = vi.fn(async () => {
        controller.abort();
        throw new UpstreamUnavailableError();
      });

      const report = await runner.run(
        operation,
        { totalAttempts: 3, tolerableFailures: [UpstreamUnavailableError] },
        { signal: controller.signal }
      );

      expect(operation).toHaveBeenCalledTimes(1);
      expect(report.verdict).toBe('incomplete');
      expect(report.summary.minSuccessesMet).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Run abandoned by caller', {
        operation: 'operation',
        attemptsProduced: 1,
      });
    });

    it('reports a pass when the minimum was already met', async () => {
      const controller = new AbortController();
      const { operation } = scripted([new UpstreamUnavailableError(), undefined]);
      const wrapped = vi.fn(async (context: AttemptContext) => {
        const value = await operation(context);
        controller.abort();
        return value;
      });

      const report = await runner.run(
        wrapped,
        { totalAttempts: 4, tolerableFailures: [UpstreamUnavailableError] },
        { signal: controller.signal }
      );

      expect(wrapped).toHaveBeenCalledTimes(2);
      expect(report.verdict).toBe('passed');
    });

    it('runs nothing when already aborted', async () => {
      const { operation } = scripted([]);

      const report = await runner.run(operation, { totalAttempts: 3 }, { signal: AbortSignal.abort() });

      expect(operation).not.toHaveBeenCalled();
      expect(report.verdict).toBe('incomplete');
      expect(report.attempts).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('collects metrics in memory by default', () => {
      expect(new RepeatRunner({ logger }).getMetrics()).toBeInstanceOf(InMemoryMetricsCollector);
    });

    it('uses a no-op collector when metrics are disabled', () => {
      const quiet = new RepeatRunner({ logger, config: { enableMetrics: false } });

      expect(quiet.getMetrics()).toBeInstanceOf(NoopMetricsCollector);
      expect(quiet.getConfig()).toEqual({
        logLevel: 'info',
        logFormat: 'pretty',
        enableMetrics: false,
        enableTelemetry: false,
      });
    });

    it('emits no telemetry unless enabled', async () => {
      await runner.run(() => 'done', { totalAttempts: 1 });

      expect(emitter.emitRunStart).not.toHaveBeenCalled();
      expect(emitter.emitAttempt).not.toHaveBeenCalled();
    });

    it('emits run events when telemetry is enabled', async () => {
      const traced = new RepeatRunner({ logger: new NoopLogger(), metrics, config: { enableTelemetry: true } });

      await traced.run(() => 'done', { totalAttempts: 5 });

      expect(emitter.emitRunStart).toHaveBeenCalledWith(
        'repeat-controller',
        expect.any(String),
        { totalAttempts: 5, minSuccesses: 1 },
        { operation: 'operation' }
      );
      expect(emitter.emitAttempt).toHaveBeenCalledWith(
        'repeat-controller',
        expect.any(String),
        expect.objectContaining({ attemptIndex: 1, status: 'succeeded' }),
        { operation: 'operation' }
      );
      expect(emitter.emitRunComplete).toHaveBeenCalledTimes(1);
      expect(emitter.emitError).not.toHaveBeenCalled();
    });

    it('emits an error event for a fatal failure', async () => {
      const traced = new RepeatRunner({ logger: new NoopLogger(), metrics, config: { enableTelemetry: true } });
      const failure = new CorruptPayloadError('bad checksum');

      await expect(traced.run(() => Promise.reject(failure), { totalAttempts: 2 })).rejects.toBe(failure);

      expect(emitter.emitError).toHaveBeenCalledWith(
        'repeat-controller',
        expect.any(String),
        failure,
        expect.objectContaining({ attemptIndex: 1, reason: 'not_tolerable' }),
        { operation: 'operation' }
      );
      expect(emitter.emitRunComplete).not.toHaveBeenCalled();
    });
  });
});

describe('repeated', () => {
  it('forwards caller arguments after the attempt context', async () => {
    const syncAccount = repeated(
      async (context: AttemptContext, accountId: string, page: number) => `${accountId}:${page}:${context.attemptIndex}`,
      { totalAttempts: 3 },
      { logger: new NoopLogger() }
    );

    const report = await syncAccount('acct-1', 2);

    expect(report.results).toEqual(['acct-1:2:1']);
  });

  it('reuses a given runner', async () => {
    const metrics = new InMemoryMetricsCollector();
    const runner = new RepeatRunner({ logger: new NoopLogger(), metrics });
    const ping = repeated(() => 'pong', { totalAttempts: 1, baseDisplayName: 'ping' }, runner);

    await ping();
    await ping();

    expect(metrics.getCounter(MetricNames.RUNS_TOTAL, { operation: 'ping' })).toBe(2);
  });
});
