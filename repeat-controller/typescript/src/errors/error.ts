/**
 * Base error class for everything the repetition controller raises itself.
 *
 * Failures thrown by the repeated operation are never wrapped in this type;
 * they reach the caller unchanged.
 */
export class RepeatControllerError extends Error {
  /** The type/category of error */
  public readonly type: string;

  /** Additional error details */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    type: string;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RepeatControllerError';
    this.type = options.type;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Returns JSON representation of the error */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard for errors raised by the controller itself.
 */
export function isRepeatControllerError(error: unknown): error is RepeatControllerError {
  return error instanceof RepeatControllerError;
}
