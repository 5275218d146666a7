/**
 * Retry Planning with Exponential Backoff
 *
 * Retries are driven by a small bounded state machine: callers keep a `RetryState`,
 * report each failure to `planRetry`, and either wait the returned delay or give up.
 * Nothing here sleeps or performs I/O, so bounds can be tested with fake clocks.
 */

import { ScrapeCancelledError } from '../types/errors.js';

/**
 * Configuration for retry behavior
 */
export interface RetryPolicy {
  /** Maximum attempts per failure class, including the first call (default: 3) */
  maxAttempts: number;
  /** Initial backoff delay in milliseconds (default: 1000) */
  initialDelay: number;
  /** Maximum backoff delay in milliseconds (default: 30000) */
  maxDelay: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier: number;
  /** Longest quota wait accepted before giving up instead */
  maxRateLimitWait: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
  maxRateLimitWait: 15 * 60 * 1000,
};

/**
 * Attempts consumed so far, counted separately per failure class
 */
export interface RetryState {
  rateLimitAttempts: number;
  transientAttempts: number;
}

export type RetryFailure =
  | { kind: 'rate-limit'; waitMs: number }
  | { kind: 'transient' };

export type RetryPlan =
  | { action: 'retry'; delayMs: number; state: RetryState }
  | { action: 'fail'; reason: 'attempts-exhausted' | 'wait-too-long'; state: RetryState };

export function initialRetryState(): RetryState {
  return { rateLimitAttempts: 0, transientAttempts: 0 };
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Decide what happens after a failed attempt.
 *
 * Rate-limit failures wait the delay derived from the upstream reset time; transient
 * failures back off exponentially. Each class gives up once `maxAttempts` calls have
 * failed for it.
 */
export function planRetry(state: RetryState, failure: RetryFailure, policy: RetryPolicy): RetryPlan {
  if (failure.kind === 'rate-limit') {
    const next: RetryState = { ...state, rateLimitAttempts: state.rateLimitAttempts + 1 };
    if (next.rateLimitAttempts >= policy.maxAttempts) {
      return { action: 'fail', reason: 'attempts-exhausted', state: next };
    }
    if (failure.waitMs > policy.maxRateLimitWait) {
      return { action: 'fail', reason: 'wait-too-long', state: next };
    }
    return { action: 'retry', delayMs: failure.waitMs, state: next };
  }

  const next: RetryState = { ...state, transientAttempts: state.transientAttempts + 1 };
  if (next.transientAttempts >= policy.maxAttempts) {
    return { action: 'fail', reason: 'attempts-exhausted', state: next };
  }
  const delayMs = calculateExponentialBackoff(
    next.transientAttempts - 1,
    policy.initialDelay,
    policy.multiplier,
    policy.maxDelay
  );
  return { action: 'retry', delayMs, state: next };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout-backed sleep that rejects with ScrapeCancelledError when `signal` aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScrapeCancelledError());
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScrapeCancelledError());
    };
    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
