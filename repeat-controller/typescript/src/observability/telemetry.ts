/**
 * Telemetry for repeated runs.
 *
 * Emits run events through the shared telemetry emitter. Every call is
 * fail-open: telemetry problems are logged at debug level and never reach
 * the run.
 */

import { TelemetryEmitter } from '@repeat-controller/telemetry-emitter';
import { randomUUID } from 'crypto';
import { describeFailure } from './logging.js';

const SOURCE = 'repeat-controller';

export interface TelemetryOptions {
  /** Display name of the repeated operation */
  operation: string;
  metadata?: Record<string, unknown>;
}

/**
 * Tracks one run from start to verdict
 */
export interface TelemetryContext {
  correlationId: string;
  startTime: number;
  operation: string;
  metadata?: Record<string, unknown>;
}

function getEmitter(): TelemetryEmitter {
  return TelemetryEmitter.getInstance();
}

/**
 * Start a telemetry context and emit `run_start`.
 */
export function startTelemetryContext(options: TelemetryOptions): TelemetryContext {
  const context: TelemetryContext = {
    correlationId: randomUUID(),
    startTime: Date.now(),
    operation: options.operation,
  };
  if (options.metadata !== undefined) context.metadata = options.metadata;

  try {
    getEmitter().emitRunStart(SOURCE, context.correlationId, { ...options.metadata }, {
      operation: options.operation,
    });
  } catch (error) {
    console.debug('[repeat-controller telemetry] Failed to emit run_start:', error);
  }

  return context;
}

/**
 * Emit an `attempt` event for a finished attempt.
 */
export function emitAttempt(
  context: TelemetryContext,
  metadata: Record<string, unknown>
): void {
  try {
    getEmitter().emitAttempt(SOURCE, context.correlationId, {
      ...context.metadata,
      ...metadata,
    }, { operation: context.operation });
  } catch (error) {
    console.debug('[repeat-controller telemetry] Failed to emit attempt:', error);
  }
}

/**
 * Emit `run_complete` with the run's duration.
 */
export function emitRunComplete(
  context: TelemetryContext,
  metadata?: Record<string, unknown>
): void {
  try {
    getEmitter().emitRunComplete(SOURCE, context.correlationId, {
      durationMs: Date.now() - context.startTime,
      ...context.metadata,
      ...metadata,
    }, { operation: context.operation });
  } catch (error) {
    console.debug('[repeat-controller telemetry] Failed to emit run_complete:', error);
  }
}

/**
 * Emit `error` for a run that ended in a fatal failure.
 */
export function emitRunError(
  context: TelemetryContext,
  failure: unknown,
  metadata?: Record<string, unknown>
): void {
  try {
    getEmitter().emitError(SOURCE, context.correlationId, failure, {
      durationMs: Date.now() - context.startTime,
      ...describeFailure(failure),
      ...context.metadata,
      ...metadata,
    }, { operation: context.operation });
  } catch (error) {
    console.debug('[repeat-controller telemetry] Failed to emit error:', error);
  }
}
