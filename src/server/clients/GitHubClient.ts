/**
 * GitHubClient - rate-limit guarded GET client for the GitHub REST API
 *
 * Every request waits on the shared RateLimitGuard, records quota headers, and
 * retries according to `planRetry`: quota responses wait for the reset, transport
 * failures back off exponentially, credential failures fail immediately.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { createHttpClient } from '../config/httpClient.js';
import { scraperConfig } from '../config/scraperConfig.js';
import {
  AuthenticationError,
  NetworkError,
  RateLimitExceededError,
  ScrapeCancelledError,
  errorMessage,
} from '../types/errors.js';
import { RateLimitGuard, type ResponseHeaders } from '../services/infrastructure/RateLimitGuard.js';
import {
  DEFAULT_RETRY_POLICY,
  initialRetryState,
  planRetry,
  sleep as defaultSleep,
  type RetryPolicy,
  type RetryState,
  type Sleep,
} from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export interface GitHubResponse {
  status: number;
  headers: ResponseHeaders;
  body: string;
}

export interface GitHubRequestOptions {
  signal?: AbortSignal;
  /** Accept header override (e.g. raw blob media type) */
  accept?: string;
}

export interface GitHubClientConfig {
  guard: RateLimitGuard;
  token?: string;
  baseUrl?: string;
  http?: AxiosInstance;
  retryPolicy?: Partial<RetryPolicy>;
  /** Backoff sleep; tests pass one that advances a fake clock */
  sleep?: Sleep;
}

// Gateway errors GitHub returns while a backend is briefly unavailable
const TRANSIENT_STATUSES = new Set([502, 503, 504]);

function normalizeHeaders(headers: AxiosResponse['headers']): ResponseHeaders {
  const normalized: ResponseHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return normalized;
}

function bodyAsText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

export class GitHubClient {
  readonly baseUrl: string;
  readonly hasCredential: boolean;
  private readonly guard: RateLimitGuard;
  private readonly http: AxiosInstance;
  private readonly token?: string;
  private readonly policy: RetryPolicy;
  private readonly sleepFn: Sleep;

  constructor(config: GitHubClientConfig) {
    this.guard = config.guard;
    this.token = config.token;
    this.hasCredential = Boolean(config.token);
    this.baseUrl = (config.baseUrl || 'https://api.github.com').replace(/\/+$/, '');
    this.http = config.http ?? createHttpClient({ timeout: scraperConfig.request.timeout });
    this.policy = { ...DEFAULT_RETRY_POLICY, ...config.retryPolicy };
    this.sleepFn = config.sleep ?? defaultSleep;
  }

  /**
   * Build an absolute API URL from a path such as `/repos/o/r/contents/x`
   */
  apiUrl(path: string): string {
    return `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
  }

  /**
   * GET `url`, returning status, lowercased headers and the body as text.
   * Non-quota, non-auth statuses (e.g. 404) are returned to the caller unchanged.
   *
   * @throws AuthenticationError, RateLimitExceededError, NetworkError, ScrapeCancelledError
   */
  async get(url: string, options: GitHubRequestOptions = {}): Promise<GitHubResponse> {
    const { signal } = options;
    let state: RetryState = initialRetryState();

    for (;;) {
      if (signal?.aborted) {
        throw new ScrapeCancelledError();
      }
      await this.guard.waitForCapacity(signal);

      let response: GitHubResponse;
      try {
        response = await this.send(url, options);
      } catch (error) {
        if (signal?.aborted || axios.isCancel(error)) {
          throw new ScrapeCancelledError();
        }
        const plan = planRetry(state, { kind: 'transient' }, this.policy);
        state = plan.state;
        if (plan.action === 'fail') {
          throw new NetworkError(`GET ${url} failed after ${state.transientAttempts} attempts: ${errorMessage(error)}`, {
            url,
          });
        }
        logger.warn(
          { url, attempt: state.transientAttempts, delay: plan.delayMs, error: errorMessage(error) },
          'GitHub request failed, retrying with backoff'
        );
        await this.sleepFn(plan.delayMs, signal);
        continue;
      }

      this.guard.recordResponse(response.headers);

      if (this.guard.isQuotaExhausted(response.status, response.headers, response.body)) {
        const waitMs = this.guard.computeWait(response.headers);
        const plan = planRetry(state, { kind: 'rate-limit', waitMs }, this.policy);
        state = plan.state;
        if (plan.action === 'fail') {
          const resetAt = this.guard.snapshot().resetAt;
          throw new RateLimitExceededError(
            plan.reason === 'wait-too-long'
              ? `GitHub rate limit resets in ${Math.ceil(waitMs / 1000)}s, beyond the configured wait limit`
              : `GitHub rate limit still exhausted after ${state.rateLimitAttempts} attempts`,
            resetAt,
            { url, status: response.status }
          );
        }
        const blockedUntil = this.guard.block(plan.delayMs);
        logger.warn(
          { url, status: response.status, attempt: state.rateLimitAttempts, waitMs, blockedUntil: blockedUntil.toISOString() },
          'GitHub rate limit hit, waiting for reset'
        );
        continue;
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthenticationError(`GitHub rejected the request (HTTP ${response.status})`, {
          url,
          status: response.status,
          body: response.body.slice(0, 500),
        });
      }

      if (TRANSIENT_STATUSES.has(response.status)) {
        const plan = planRetry(state, { kind: 'transient' }, this.policy);
        state = plan.state;
        if (plan.action === 'fail') {
          throw new NetworkError(`GET ${url} kept returning HTTP ${response.status}`, { url, status: response.status });
        }
        logger.warn({ url, status: response.status, delay: plan.delayMs }, 'GitHub gateway error, retrying with backoff');
        await this.sleepFn(plan.delayMs, signal);
        continue;
      }

      return response;
    }
  }

  /**
   * GET and parse a JSON body. `data` is undefined for any non-2xx status so
   * callers can treat a missing path as empty.
   */
  async getJson(url: string, options: GitHubRequestOptions = {}): Promise<{ status: number; data: unknown }> {
    const response = await this.get(url, options);
    if (response.status < 200 || response.status >= 300) {
      return { status: response.status, data: undefined };
    }
    try {
      const data: unknown = JSON.parse(response.body);
      return { status: response.status, data };
    } catch (error) {
      throw new NetworkError(`GET ${url} returned a body that is not JSON: ${errorMessage(error)}`, { url });
    }
  }

  private async send(url: string, options: GitHubRequestOptions): Promise<GitHubResponse> {
    const headers: Record<string, string> = {
      Accept: options.accept ?? 'application/vnd.github+json',
      'X-GitHub-Api-Version': scraperConfig.request.apiVersion,
      'User-Agent': scraperConfig.request.userAgent,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await this.http.get<unknown>(url, {
      headers,
      responseType: 'text',
      // Status handling happens above, against quota headers
      validateStatus: () => true,
      signal: options.signal,
    });

    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      body: bodyAsText(response.data),
    };
  }
}
