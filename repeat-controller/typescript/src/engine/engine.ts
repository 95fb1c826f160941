/**
 * Repetition decision engine.
 *
 * A pull-based state machine. The host asks for attempts one at a time,
 * runs each, and reports how it ended; the engine records the outcome and,
 * for failures, decides between retry, absorb and fail.
 *
 * ```
 * idle -> awaiting_outcome(i) -> between_attempts -> awaiting_outcome(i+1) ...
 *                             \-> terminal_fatal
 * between_attempts -> terminal_success | abandoned
 * ```
 */

import { classifyFailure } from '../classifier/index.js';
import { createRepetitionPolicy, type RepetitionPolicy, type RepetitionPolicyOptions } from '../config/index.js';
import { DisplayNameFormatter } from '../display/index.js';
import { AttemptAbortedError, ProtocolViolationError, SequenceExhaustedError } from '../errors/index.js';
import { ExecutionHistory, type AttemptOutcome } from '../history/index.js';
import type {
  AttemptContext,
  EnginePhase,
  FailureDecision,
  NonFatalDecision,
  RunSummary,
  RunVerdict,
} from './types.js';

export class RepeatDecisionEngine implements Iterable<AttemptContext> {
  readonly policy: RepetitionPolicy;

  private readonly history = new ExecutionHistory();
  private readonly formatter: DisplayNameFormatter;
  private currentIndex = 0;
  private everFailed = false;
  private phase: EnginePhase = 'idle';

  constructor(policy: RepetitionPolicy) {
    this.policy = policy;
    this.formatter = new DisplayNameFormatter(policy.namePattern, policy.baseDisplayName);
  }

  /**
   * Validate options and build an engine for a fresh run.
   *
   * @throws {PreconditionViolationError} If the options are invalid
   */
  static fromOptions(options: RepetitionPolicyOptions): RepeatDecisionEngine {
    return new RepeatDecisionEngine(createRepetitionPolicy(options));
  }

  /**
   * Whether another attempt would be produced.
   *
   * The first attempt is always produced. After that, attempts continue only
   * once a tolerable failure has been recorded, and then until the budget is
   * spent, even if the minimum has since been met.
   */
  hasNext(): boolean {
    if (this.phase === 'terminal_fatal' || this.phase === 'abandoned') {
      return false;
    }
    if (this.currentIndex === 0) {
      return true;
    }
    return this.history.anyFailureRecorded() && this.currentIndex < this.policy.totalAttempts;
  }

  /**
   * Produce the next attempt, or `undefined` once the sequence is exhausted.
   *
   * @throws {ProtocolViolationError} If the previous attempt has no reported outcome
   */
  tryProduceNext(): AttemptContext | undefined {
    if (this.phase === 'awaiting_outcome') {
      throw new ProtocolViolationError(
        `Attempt ${this.currentIndex} has not reported an outcome yet`,
        { attemptIndex: this.currentIndex }
      );
    }

    if (!this.hasNext()) {
      if (this.phase === 'between_attempts') {
        this.phase = 'terminal_success';
      }
      return undefined;
    }

    const successCount = this.history.countSuccesses();
    this.currentIndex++;
    this.phase = 'awaiting_outcome';

    return Object.freeze({
      attemptIndex: this.currentIndex,
      totalAttempts: this.policy.totalAttempts,
      successCount,
      minSuccesses: this.policy.minSuccesses,
      failureAppeared: this.everFailed,
      displayName: this.formatter.format(this.currentIndex, this.policy.totalAttempts, {
        minSuccesses: this.policy.minSuccesses,
        successCount,
      }),
    });
  }

  /**
   * Produce the next attempt.
   *
   * @throws {SequenceExhaustedError} If no attempt remains
   * @throws {ProtocolViolationError} If the previous attempt has no reported outcome
   */
  nextAttempt(): AttemptContext {
    const context = this.tryProduceNext();
    if (context === undefined) {
      throw new SequenceExhaustedError(this.currentIndex);
    }
    return context;
  }

  /**
   * One-shot iterator over the remaining attempts. The sequence cannot be
   * restarted; a second iterator continues where the first stopped.
   */
  [Symbol.iterator](): Iterator<AttemptContext> {
    return {
      next: (): IteratorResult<AttemptContext> => {
        const context = this.tryProduceNext();
        return context === undefined ? { done: true, value: undefined } : { done: false, value: context };
      },
    };
  }

  /**
   * Report that the in-flight attempt succeeded.
   */
  recordSuccess(): void {
    const attemptIndex = this.requireInFlight();
    this.history.recordSuccess(attemptIndex);
    this.phase = 'between_attempts';
  }

  /**
   * Decide what a failure of the in-flight attempt means, without throwing it.
   */
  decideFailure(failure: unknown): FailureDecision {
    const attemptIndex = this.requireInFlight();

    if (classifyFailure(failure, this.policy.tolerableFailures) === 'fatal') {
      this.phase = 'terminal_fatal';
      return { action: 'fail', attemptIndex, reason: 'not_tolerable', failure };
    }

    this.everFailed = true;

    if (this.history.countSuccesses() >= this.policy.minSuccesses) {
      this.history.recordTolerableFailure(attemptIndex);
      this.phase = 'between_attempts';
      return { action: 'absorb', attemptIndex };
    }

    if (!this.isMinSuccessTargetStillReachable()) {
      this.phase = 'terminal_fatal';
      return { action: 'fail', attemptIndex, reason: 'target_unreachable', failure };
    }

    this.history.recordTolerableFailure(attemptIndex);
    this.phase = 'between_attempts';
    return {
      action: 'retry',
      attemptIndex,
      signal: new AttemptAbortedError('Do not fail completely but repeat the attempt', {
        origin: 'engine',
        cause: failure,
        attemptIndex,
      }),
    };
  }

  /**
   * Report that the in-flight attempt failed.
   *
   * @returns The retry or absorb decision
   * @throws The original failure, unchanged, when it ends the run
   */
  handleFailure(failure: unknown): NonFatalDecision {
    const decision = this.decideFailure(failure);
    if (decision.action === 'fail') {
      throw decision.failure;
    }
    return decision;
  }

  /**
   * Stop producing attempts. Only valid between attempts.
   */
  abandon(): void {
    if (this.phase === 'awaiting_outcome') {
      throw new ProtocolViolationError(
        `Cannot abandon while attempt ${this.currentIndex} is in flight`,
        { attemptIndex: this.currentIndex }
      );
    }
    if (this.phase === 'idle' || this.phase === 'between_attempts') {
      this.phase = 'abandoned';
    }
  }

  verdict(): RunVerdict {
    switch (this.phase) {
      case 'terminal_fatal':
        return 'failed';
      case 'abandoned':
        return this.history.countSuccesses() >= this.policy.minSuccesses ? 'passed' : 'incomplete';
      case 'awaiting_outcome':
        return 'pending';
      default:
        return this.hasNext() ? 'pending' : 'passed';
    }
  }

  summary(): RunSummary {
    const successes = this.history.countSuccesses();
    return {
      attemptsProduced: this.currentIndex,
      totalAttempts: this.policy.totalAttempts,
      minSuccesses: this.policy.minSuccesses,
      successes,
      failures: this.history.countFailures(),
      failureAppeared: this.everFailed,
      minSuccessesMet: successes >= this.policy.minSuccesses,
      verdict: this.verdict(),
    };
  }

  getPhase(): EnginePhase {
    return this.phase;
  }

  getAttemptsProduced(): number {
    return this.currentIndex;
  }

  getHistory(): readonly AttemptOutcome[] {
    return this.history.snapshot();
  }

  /**
   * The target is reachable while failures recorded before this attempt stay
   * below `totalAttempts - minSuccesses`.
   */
  private isMinSuccessTargetStillReachable(): boolean {
    return this.history.countFailures() < this.policy.totalAttempts - this.policy.minSuccesses;
  }

  private requireInFlight(): number {
    if (this.phase !== 'awaiting_outcome') {
      throw new ProtocolViolationError('No attempt is awaiting an outcome', { phase: this.phase });
    }
    return this.currentIndex;
  }
}
