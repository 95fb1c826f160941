/**
 * Structured logging utilities
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
  includeTarget: boolean;
  /** Component name printed with each line when `includeTarget` is set */
  target: string;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Creates a default logging configuration
 */
export function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'pretty',
    includeTimestamps: true,
    includeTarget: true,
    target: 'repeat-controller',
  };
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private config: LoggingConfig;

  constructor(config?: Partial<LoggingConfig>) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;
    const target = this.config.includeTarget ? this.config.target : undefined;

    if (this.config.format === 'json') {
      console.log(JSON.stringify({ timestamp, level, target, message, ...context }));
    } else if (this.config.format === 'compact') {
      const contextStr = context ? ` ${JSON.stringify(context)}` : '';
      const targetStr = target ? ` ${target}:` : '';
      console.log(`[${level.toUpperCase()}]${targetStr} ${message}${contextStr}`);
    } else {
      const parts: string[] = [];
      if (timestamp) parts.push(`[${timestamp}]`);
      parts.push(`[${level.toUpperCase()}]`);
      if (target) parts.push(`${target}:`);
      parts.push(message);
      if (context) {
        parts.push('\n  ' + Object.entries(context)
          .map(([k, v]) => `${k}: ${JSON.stringify(v)}`)
          .join('\n  '));
      }
      console.log(parts.join(' '));
    }
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Flattens a thrown value for log context. Non-errors are stringified.
 */
export function describeFailure(failure: unknown): Record<string, unknown> {
  if (failure instanceof Error) {
    return { errorName: failure.name, errorMessage: failure.message };
  }
  return { errorMessage: String(failure) };
}

/**
 * Logs the start of an attempt
 */
export function logAttemptStart(
  logger: Logger,
  displayName: string,
  attemptIndex: number,
  totalAttempts: number
): void {
  logger.debug('Starting attempt', { displayName, attemptIndex, totalAttempts });
}

/**
 * Logs a fatal failure that ends a run
 */
export function logFatalFailure(
  logger: Logger,
  failure: unknown,
  attemptIndex: number,
  reason: string
): void {
  logger.error('Run failed', {
    attemptIndex,
    reason,
    ...describeFailure(failure),
    stack: failure instanceof Error ? failure.stack : undefined,
  });
}
