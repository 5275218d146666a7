/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances. Retry and quota handling
 * are not done here: GitHubClient owns them so that every call shares one guard.
 */

import axios, { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// Applied to every request that does not set its own timeout
const DEFAULT_TIMEOUT_MS = 30000;

// Create HTTP agents with connection pooling
// These are shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000, // Keep connections alive for 30 seconds
  maxSockets: 50,        // Maximum number of sockets per host
  maxFreeSockets: 10,    // Maximum number of free sockets per host
  timeout: 60000,        // Socket timeout in milliseconds
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

// Request start times, for slow-request logging
const requestStartTimes = new WeakMap<InternalAxiosRequestConfig, number>();

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults (tests pass an `adapter`)
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: DEFAULT_TIMEOUT_MS,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Enforce a timeout on all requests, even when a caller overrides it with 0
  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = DEFAULT_TIMEOUT_MS;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }
    requestStartTimes.set(requestConfig, Date.now());
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startTime = requestStartTimes.get(response.config);
      const timeout = response.config.timeout || DEFAULT_TIMEOUT_MS;
      if (startTime !== undefined) {
        const duration = Date.now() - startTime;
        if (duration > timeout * 0.5) {
          logger.debug(
            { url: response.config.url, method: response.config.method, duration, timeout },
            'Slow HTTP request completed'
          );
        }
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        logger.warn(
          { url: error.config?.url, method: error.config?.method, timeout: error.config?.timeout },
          'HTTP request timed out'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Close HTTP agents and free up connections
 * This should be called during graceful shutdown to ensure all connections are properly closed
 */
export function closeHttpAgents(): void {
  try {
    httpAgent.destroy();
    logger.debug('HTTP agent destroyed');
  } catch (error) {
    logger.warn({ error }, 'Error destroying HTTP agent');
  }

  try {
    httpsAgent.destroy();
    logger.debug('HTTPS agent destroyed');
  } catch (error) {
    logger.warn({ error }, 'Error destroying HTTPS agent');
  }
}
