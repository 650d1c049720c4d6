import { DocqaError, TimeoutError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { Judge, JudgeInput } from './types';

/**
 * Circuit breaker around a relevance judge.
 *
 * - CLOSED: normal operation, calls go through
 * - OPEN: judge is failing, calls fail fast with `JudgeCircuitOpenError`
 * - HALF_OPEN: reset window elapsed, a single trial call tests recovery
 *   while concurrent calls keep failing fast
 *
 * Fail-fast calls count as judge failures, so a rerank stage whose calls
 * all hit an open circuit reports itself unavailable and the pipeline
 * degrades to fused order.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
  now?: () => number;
}

export class JudgeCircuitOpenError extends DocqaError {
  readonly code = 'JUDGE_CIRCUIT_OPEN';
  readonly retryable = true;

  constructor() {
    super('Judge circuit is open');
    this.name = 'JudgeCircuitOpenError';
  }
}

export class CircuitBreakerJudge implements Judge {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureTime = 0;
  private trialInFlight = false;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  /** Present only when the wrapped judge scores batches itself. */
  readonly scoreBatch?: (inputs: JudgeInput[], signal?: AbortSignal) => Promise<string[]>;

  constructor(
    private readonly inner: Judge,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30000;
    this.now = options.now ?? Date.now;

    const batch = inner.scoreBatch?.bind(inner);
    if (batch) {
      this.scoreBatch = (inputs, signal) => this.guard(() => batch(inputs, signal), signal);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  async score(input: JudgeInput, signal?: AbortSignal): Promise<string> {
    return this.guard(() => this.inner.score(input, signal), signal);
  }

  private async guard<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.attemptReset();
    if (this.state === 'OPEN' || (this.state === 'HALF_OPEN' && this.trialInFlight)) {
      throw new JudgeCircuitOpenError();
    }

    const isTrial = this.state === 'HALF_OPEN';
    if (isTrial) this.trialInFlight = true;

    try {
      const result = await call();
      this.recordSuccess();
      return result;
    } catch (error) {
      // A caller giving up is not the judge's fault; a deadline is
      const callerGaveUp = signal?.aborted === true && !(signal.reason instanceof TimeoutError);
      if (!callerGaveUp) {
        this.recordFailure(error instanceof Error ? error.message : String(error));
      }
      throw error;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  private attemptReset(): void {
    if (this.state === 'OPEN' && this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
      this.state = 'HALF_OPEN';
      logger.info('Circuit breaker: HALF_OPEN, testing judge recovery');
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      logger.info('Circuit breaker: CLOSED, judge recovered');
    }
    this.state = 'CLOSED';
    this.failureCount = 0;
  }

  private recordFailure(reason: string): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.failureThreshold) {
      if (this.state !== 'OPEN') {
        logger.warn({ reason, failureCount: this.failureCount }, 'Circuit breaker: OPEN, judge calls fail fast');
      }
      this.state = 'OPEN';
    } else {
      logger.warn({ reason, failureCount: this.failureCount }, 'Judge failure recorded');
    }
  }
}
