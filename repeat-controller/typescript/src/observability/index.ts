/**
 * Observability layer exports for logging, metrics, and telemetry
 */

// Logging exports
export {
  type LogLevel,
  type LogFormat,
  type LoggingConfig,
  type Logger,
  createDefaultLoggingConfig,
  ConsoleLogger,
  NoopLogger,
  describeFailure,
  logAttemptStart,
  logFatalFailure,
} from './logging.js';

// Metrics exports
export {
  type MetricsCollector,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
} from './metrics.js';

// Telemetry exports
export {
  type TelemetryOptions,
  type TelemetryContext,
  startTelemetryContext,
  emitAttempt,
  emitRunComplete,
  emitRunError,
} from './telemetry.js';
