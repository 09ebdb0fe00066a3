import { InterruptedError } from '../../domain/errors/InterruptedError.js';
import { HttpStatusError, HttpTimeoutError, HttpTransportError } from './HttpErrors.js';

export type FailureKind = 'timeout' | 'transport' | 'unexpected' | 'interrupted';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give-up' }
  | { action: 'abort' };

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseTimeoutMs: number;
  timeoutIncrementMs: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 5,
  baseTimeoutMs: 20_000,
  timeoutIncrementMs: 10_000,
  baseDelayMs: 2_000,
};

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof InterruptedError) return 'interrupted';
  if (error instanceof HttpTimeoutError) return 'timeout';
  if (error instanceof HttpTransportError || error instanceof HttpStatusError) return 'transport';
  return 'unexpected';
}

/**
 * Retry schedule for a single page. Attempt indexes start at 0; each attempt
 * gets a longer timeout and each failure a doubled backoff.
 */
export class PageRetryPolicy {
  constructor(readonly options: RetryPolicyOptions = DEFAULT_RETRY_POLICY) {}

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  timeoutFor(attempt: number): number {
    return this.options.baseTimeoutMs + attempt * this.options.timeoutIncrementMs;
  }

  backoffFor(attempt: number): number {
    return this.options.baseDelayMs * 2 ** attempt;
  }

  decide(attempt: number, failure: FailureKind): RetryDecision {
    if (failure === 'unexpected' || failure === 'interrupted') {
      return { action: 'abort' };
    }
    if (attempt >= this.options.maxAttempts - 1) {
      return { action: 'give-up' };
    }
    return { action: 'retry', delayMs: this.backoffFor(attempt) };
  }
}
