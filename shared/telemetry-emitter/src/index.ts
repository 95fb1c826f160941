/**
 * Telemetry Emitter Module
 *
 * Fire-and-forget event sink used by the repetition controller to report
 * runs, attempts and fatal failures to an HTTP ingest endpoint.
 *
 * @example
 * ```typescript
 * import { TelemetryEmitter } from '@repeat-controller/telemetry-emitter';
 *
 * const emitter = TelemetryEmitter.getInstance();
 *
 * emitter.emitRunStart('repeat-controller', 'run-123', { totalAttempts: 3 });
 * emitter.emitRunComplete('repeat-controller', 'run-123', { verdict: 'passed' });
 * ```
 *
 * @module @repeat-controller/telemetry-emitter
 */

export { TelemetryEmitter } from './emitter.js';
export type {
  TelemetryEvent,
  TelemetryEmitterConfig,
  EventType,
} from './types.js';
