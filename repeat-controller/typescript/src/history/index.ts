/**
 * Append-only log of attempt outcomes for a single run.
 */

import { ProtocolViolationError } from '../errors/index.js';

export type AttemptOutcomeKind = 'success' | 'tolerable_failure';

/**
 * Outcome of one completed attempt. Fatal failures never become outcomes.
 */
export interface AttemptOutcome {
  readonly kind: AttemptOutcomeKind;
  /** 1-based index of the attempt this outcome belongs to */
  readonly attemptIndex: number;
}

/**
 * Ordered record of per-attempt outcomes, consulted by the engine for its
 * success and failure counts.
 *
 * Every method runs synchronously to completion, so a reader always observes
 * a consistent prefix of the log no matter which async continuation reports
 * an outcome. The backing array never leaves this class; `snapshot()` hands
 * out frozen copies.
 */
export class ExecutionHistory {
  private readonly outcomes: AttemptOutcome[] = [];
  private readonly recordedIndices = new Set<number>();

  /**
   * Append an outcome.
   *
   * @throws {ProtocolViolationError} if the attempt already has an outcome
   */
  append(outcome: AttemptOutcome): void {
    if (this.recordedIndices.has(outcome.attemptIndex)) {
      throw new ProtocolViolationError(
        `Attempt ${outcome.attemptIndex} already has a recorded outcome`,
        { attemptIndex: outcome.attemptIndex }
      );
    }

    this.recordedIndices.add(outcome.attemptIndex);
    this.outcomes.push(Object.freeze({ kind: outcome.kind, attemptIndex: outcome.attemptIndex }));
  }

  recordSuccess(attemptIndex: number): void {
    this.append({ kind: 'success', attemptIndex });
  }

  recordTolerableFailure(attemptIndex: number): void {
    this.append({ kind: 'tolerable_failure', attemptIndex });
  }

  countSuccesses(): number {
    return this.count('success');
  }

  countFailures(): number {
    return this.count('tolerable_failure');
  }

  anyFailureRecorded(): boolean {
    return this.outcomes.some((outcome) => outcome.kind === 'tolerable_failure');
  }

  has(attemptIndex: number): boolean {
    return this.recordedIndices.has(attemptIndex);
  }

  get size(): number {
    return this.outcomes.length;
  }

  snapshot(): readonly AttemptOutcome[] {
    return Object.freeze([...this.outcomes]);
  }

  private count(kind: AttemptOutcomeKind): number {
    let total = 0;
    for (const outcome of this.outcomes) {
      if (outcome.kind === kind) total++;
    }
    return total;
  }
}
