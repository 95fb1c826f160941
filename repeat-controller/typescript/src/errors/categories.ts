/**
 * Error categories raised by the repetition controller.
 */

import type { ZodError } from 'zod';
import { RepeatControllerError } from './error.js';

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Bad run configuration: non-positive attempt budget, minimum below one,
 * malformed whitelist. Raised before any attempt runs and never retried.
 */
export class PreconditionViolationError extends RepeatControllerError {
  public readonly issues: ZodError['issues'];

  constructor(message: string, zodError?: ZodError) {
    const issues = zodError?.issues ?? [];
    super({
      type: 'precondition_violation',
      message,
      details: {
        issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    });
    this.name = 'PreconditionViolationError';
    this.issues = issues;
  }
}

// ============================================================================
// Retry Signal
// ============================================================================

/** Who raised an {@link AttemptAbortedError}. */
export type AbortOrigin = 'engine' | 'operation';

/**
 * Signals "abort this attempt and try again" without counting as a terminal
 * failure. The engine raises it with origin `engine` when a tolerable failure
 * still leaves the success target reachable; an operation may raise it itself
 * (origin `operation`) to ask for another attempt.
 */
export class AttemptAbortedError extends RepeatControllerError {
  public readonly origin: AbortOrigin;
  public readonly attemptIndex?: number;

  constructor(
    message = 'Attempt aborted, repeating',
    options: { origin?: AbortOrigin; cause?: unknown; attemptIndex?: number } = {}
  ) {
    super({
      type: 'attempt_aborted',
      message,
      cause: options.cause,
      details: options.attemptIndex === undefined ? undefined : { attemptIndex: options.attemptIndex },
    });
    this.name = 'AttemptAbortedError';
    this.origin = options.origin ?? 'operation';
    this.attemptIndex = options.attemptIndex;
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Caller misuse of the pull/report protocol.
 */
export class ProtocolViolationError extends RepeatControllerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'protocol_violation',
      message,
      details,
    });
    this.name = 'ProtocolViolationError';
  }
}

/**
 * An attempt was pulled after the sequence was exhausted.
 */
export class SequenceExhaustedError extends ProtocolViolationError {
  public readonly attemptsProduced: number;

  constructor(attemptsProduced: number) {
    super(`No more attempts: sequence exhausted after ${attemptsProduced} attempt(s)`, { attemptsProduced });
    this.name = 'SequenceExhaustedError';
    this.attemptsProduced = attemptsProduced;
  }
}
