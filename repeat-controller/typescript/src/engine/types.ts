import type { AttemptAbortedError } from '../errors/index.js';

/**
 * Everything the host needs to run one attempt.
 */
export interface AttemptContext {
  /** 1-based index of this attempt */
  readonly attemptIndex: number;
  readonly totalAttempts: number;
  /** Successful attempts recorded before this one */
  readonly successCount: number;
  readonly minSuccesses: number;
  /** Whether a tolerable failure had appeared before this attempt */
  readonly failureAppeared: boolean;
  readonly displayName: string;
}

export type EnginePhase =
  | 'idle'
  | 'awaiting_outcome'
  | 'between_attempts'
  | 'abandoned'
  | 'terminal_success'
  | 'terminal_fatal';

/** Why a failure ended the run */
export type FatalReason = 'not_tolerable' | 'target_unreachable';

/**
 * What the engine decided about a failed attempt.
 *
 * - `retry`: tolerable, target still reachable; `signal` is the abort marker
 *   the host may raise in place of the original failure.
 * - `absorb`: tolerable and the minimum is already met; the attempt counts
 *   as a failure in history but does not fail the run.
 * - `fail`: the run is over; `failure` is the original, unchanged.
 */
export type FailureDecision =
  | { readonly action: 'retry'; readonly attemptIndex: number; readonly signal: AttemptAbortedError }
  | { readonly action: 'absorb'; readonly attemptIndex: number }
  | { readonly action: 'fail'; readonly attemptIndex: number; readonly reason: FatalReason; readonly failure: unknown };

export type NonFatalDecision = Exclude<FailureDecision, { action: 'fail' }>;

/**
 * Overall outcome of a run.
 *
 * `passed` once the sequence is exhausted without a fatal failure.
 * `incomplete` when the host abandoned the run before the minimum was met.
 */
export type RunVerdict = 'pending' | 'passed' | 'incomplete' | 'failed';

export interface RunSummary {
  readonly attemptsProduced: number;
  readonly totalAttempts: number;
  readonly minSuccesses: number;
  readonly successes: number;
  readonly failures: number;
  readonly failureAppeared: boolean;
  readonly minSuccessesMet: boolean;
  readonly verdict: RunVerdict;
}
