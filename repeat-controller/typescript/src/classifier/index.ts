/**
 * Failure classification.
 *
 * Decides whether a failure raised by an attempt may be tolerated (and so
 * possibly retried) or must end the run.
 */

import { AttemptAbortedError } from '../errors/index.js';

/** Constructor of an error class, matched by type or subtype. */
export type FailureClass = abstract new (...args: never[]) => unknown;

/**
 * Explicit membership test, for failures that are not class instances or
 * that are told apart by a code rather than a type.
 */
export interface FailureMatcher {
  readonly name: string;
  matches(failure: unknown): boolean;
}

/**
 * One entry of the tolerable-failure whitelist.
 */
export type FailureKind = FailureClass | FailureMatcher;

export type FailureClassification = 'tolerable' | 'fatal';

/**
 * Kinds every whitelist contains whether or not the caller lists them.
 */
export const IMPLICIT_TOLERABLE_KINDS: readonly FailureKind[] = Object.freeze([AttemptAbortedError]);

/**
 * Build a {@link FailureMatcher} from a predicate.
 *
 * @example
 * ```typescript
 * const timeouts = failureWhen('timeout', (e) => e instanceof Error && e.message.includes('ETIMEDOUT'));
 * ```
 */
export function failureWhen(name: string, predicate: (failure: unknown) => boolean): FailureMatcher {
  return Object.freeze({ name, matches: predicate });
}

/**
 * Matches errors whose `code` property equals one of the given codes
 * (Node system errors, driver errors).
 */
export function failureWithCode(...codes: string[]): FailureMatcher {
  return failureWhen(`code:${codes.join('|')}`, (failure) => {
    if (typeof failure !== 'object' || failure === null || !('code' in failure)) {
      return false;
    }
    return typeof failure.code === 'string' && codes.includes(failure.code);
  });
}

/**
 * Whether `failure` belongs to `kind`. A matcher that throws is a miss.
 */
export function matchesFailureKind(failure: unknown, kind: FailureKind): boolean {
  if (typeof kind === 'function') {
    return failure instanceof kind;
  }

  try {
    return kind.matches(failure);
  } catch {
    return false;
  }
}

/**
 * Whether the failure is the engine's own retry signal coming back around.
 */
export function isEngineAbortSignal(failure: unknown): boolean {
  return failure instanceof AttemptAbortedError && failure.origin === 'engine';
}

/**
 * Merge the caller's whitelist with the implicit kinds, dropping duplicates.
 */
export function withImplicitKinds(whitelist: readonly FailureKind[]): readonly FailureKind[] {
  const merged = [...whitelist];
  for (const kind of IMPLICIT_TOLERABLE_KINDS) {
    if (!merged.includes(kind)) merged.push(kind);
  }
  return Object.freeze(merged);
}

/**
 * Classify a failure against a whitelist.
 *
 * Tolerable iff some entry matches and the failure is not an engine-raised
 * {@link AttemptAbortedError}. Everything else is fatal.
 */
export function classifyFailure(failure: unknown, whitelist: readonly FailureKind[]): FailureClassification {
  if (isEngineAbortSignal(failure)) {
    return 'fatal';
  }

  return whitelist.some((kind) => matchesFailureKind(failure, kind)) ? 'tolerable' : 'fatal';
}

/**
 * Human-readable name of a whitelist entry, for logs.
 */
export function describeFailureKind(kind: FailureKind): string {
  if (typeof kind === 'function') {
    return kind.name || '<anonymous class>';
  }
  return `matcher:${kind.name}`;
}
