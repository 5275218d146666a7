/**
 * Rate Limit Guard - shared quota state for every call to the GitHub API
 *
 * One instance is created per process configuration and passed to every component
 * that performs HTTP calls. It remembers the last quota headers seen and the time
 * until which all callers must hold off, so concurrent callers never race a reset.
 */

import { RateLimitExceededError } from '../../types/errors.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/retry.js';
import { logger } from '../../utils/logger.js';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export type ResponseHeaders = Record<string, string>;

export interface RateLimitGuardOptions {
  clock?: Clock;
  sleep?: Sleep;
  /** Lower bound for any quota wait (ms) */
  minWaitMs?: number;
  /** Waits longer than this fail with RateLimitExceededError instead (ms) */
  maxWaitMs?: number;
}

export interface RateLimitSnapshot {
  remaining?: number;
  resetAt?: Date;
  blockedUntil?: Date;
}

function parseIntegerHeader(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

export class RateLimitGuard {
  private readonly clock: Clock;
  private readonly sleepFn: Sleep;
  private readonly minWaitMs: number;
  private readonly maxWaitMs: number;

  private remaining: number | undefined;
  private resetAtMs: number | undefined;
  private blockedUntilMs = 0;

  constructor(options: RateLimitGuardOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.sleepFn = options.sleep ?? defaultSleep;
    this.minWaitMs = options.minWaitMs ?? 1000;
    this.maxWaitMs = options.maxWaitMs ?? 15 * 60 * 1000;
  }

  /**
   * Resolve once no quota block is pending. Loops because another caller may
   * extend the block while this one sleeps.
   */
  async waitForCapacity(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const waitMs = this.blockedUntilMs - this.clock.now();
      if (waitMs <= 0) {
        return;
      }
      if (waitMs > this.maxWaitMs) {
        throw new RateLimitExceededError(
          `Rate limit resets in ${Math.ceil(waitMs / 1000)}s, beyond the ${Math.ceil(this.maxWaitMs / 1000)}s wait limit`,
          new Date(this.blockedUntilMs)
        );
      }
      logger.info({ waitMs, blockedUntil: new Date(this.blockedUntilMs).toISOString() }, 'Waiting for GitHub rate limit reset');
      await this.sleepFn(waitMs, signal);
    }
  }

  /**
   * Record quota headers from any response. A response that reports zero remaining
   * calls blocks everyone until the advertised reset.
   */
  recordResponse(headers: ResponseHeaders): void {
    const remaining = parseIntegerHeader(headers['x-ratelimit-remaining']);
    const reset = parseIntegerHeader(headers['x-ratelimit-reset']);
    if (remaining !== undefined) {
      this.remaining = remaining;
    }
    if (reset !== undefined) {
      this.resetAtMs = reset * 1000;
    }
    if (remaining !== undefined && remaining <= 0 && reset !== undefined) {
      this.blockedUntilMs = Math.max(this.blockedUntilMs, reset * 1000);
    }
  }

  /**
   * Whether a 403/429 response is a quota signal rather than a credential problem
   */
  isQuotaExhausted(status: number, headers: ResponseHeaders, body: string): boolean {
    if (status === 429) {
      return true;
    }
    if (status !== 403) {
      return false;
    }
    const remaining = parseIntegerHeader(headers['x-ratelimit-remaining']);
    if (remaining !== undefined && remaining <= 0) {
      return true;
    }
    if (headers['retry-after'] !== undefined) {
      return true;
    }
    return body.toLowerCase().includes('rate limit');
  }

  /**
   * Wait implied by a quota response: `retry-after` seconds, else the reset epoch.
   * Never negative and never below the floor.
   */
  computeWait(headers: ResponseHeaders): number {
    const now = this.clock.now();
    const retryAfter = parseIntegerHeader(headers['retry-after']);
    const reset = parseIntegerHeader(headers['x-ratelimit-reset']);

    let waitMs = 0;
    if (retryAfter !== undefined) {
      waitMs = retryAfter * 1000;
    } else if (reset !== undefined) {
      waitMs = reset * 1000 - now;
    }
    return Math.max(this.minWaitMs, Math.max(0, waitMs));
  }

  /**
   * Hold off every caller for at least `waitMs`
   */
  block(waitMs: number): Date {
    this.blockedUntilMs = Math.max(this.blockedUntilMs, this.clock.now() + waitMs);
    return new Date(this.blockedUntilMs);
  }

  snapshot(): RateLimitSnapshot {
    return {
      remaining: this.remaining,
      resetAt: this.resetAtMs !== undefined ? new Date(this.resetAtMs) : undefined,
      blockedUntil: this.blockedUntilMs > 0 ? new Date(this.blockedUntilMs) : undefined,
    };
  }
}
