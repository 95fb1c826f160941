/**
 * Telemetry event shapes shared by every package that reports runs.
 */

/**
 * Event type enumeration for telemetry events
 */
export type EventType = 'run_start' | 'attempt' | 'run_complete' | 'error';

/**
 * Normalized telemetry event.
 */
export interface TelemetryEvent {
  /**
   * Correlates all events emitted for one run
   */
  correlationId: string;

  /**
   * Package or component that produced the event (e.g. "repeat-controller")
   */
  source: string;

  /**
   * Name of the operation being repeated
   */
  operation?: string;

  eventType: EventType;

  /**
   * Unix timestamp in milliseconds
   */
  timestamp: number;

  metadata: Record<string, unknown>;
}

/**
 * Configuration options for the TelemetryEmitter
 */
export interface TelemetryEmitterConfig {
  /**
   * Ingest endpoint. Falls back to TELEMETRY_INGEST_URL, then
   * http://localhost:3100/ingest
   */
  ingestUrl?: string;

  /**
   * Maximum number of retry attempts (default: 2)
   */
  maxRetries?: number;

  /**
   * Initial retry delay in milliseconds (default: 100)
   */
  initialRetryDelay?: number;

  /**
   * Request timeout in milliseconds (default: 5000)
   */
  timeout?: number;
}
