import type { AxiosInstance } from 'axios';
import { GitHubClient } from '../../clients/GitHubClient.js';
import type { Env } from '../../config/env.js';
import { scraperConfig } from '../../config/scraperConfig.js';
import type { ArchitectureSink } from '../../types/architecture.js';
import { logger } from '../../utils/logger.js';
import type { Sleep } from '../../utils/retry.js';
import { RateLimitGuard, type Clock } from '../infrastructure/RateLimitGuard.js';
import { TemplateFetcher } from '../templates/TemplateFetcher.js';
import type { TraversalKind } from '../traversal/TreeTraversalStrategy.js';
import { createTraversalStrategy, selectTraversalStrategy } from '../traversal/strategySelection.js';
import { ArchitectureScrapeService } from './ArchitectureScrapeService.js';

export type PipelineEnv = Pick<
  Env,
  | 'GITHUB_TOKEN'
  | 'GITHUB_API_URL'
  | 'GITHUB_REF'
  | 'FORCE_CONTENTS_WALK'
  | 'SCRAPE_CONCURRENCY'
  | 'SCRAPE_TIMEOUT_MS'
  | 'SCRAPE_MAX_ATTEMPTS'
  | 'SCRAPE_RATE_LIMIT_MAX_WAIT_MS'
  | 'TEMPLATE_EXTRA_PATTERNS'
>;

export interface ScrapePipeline {
  readonly strategy: TraversalKind;
  readonly guard: RateLimitGuard;
  readonly client: GitHubClient;
  createService(sink: ArchitectureSink | undefined): ArchitectureScrapeService;
}

export interface ScrapePipelineOverrides {
  http?: AxiosInstance;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Wire guard, client, traversal strategy and fetcher from configuration.
 * One guard is shared by every service the pipeline creates, so a quota block
 * seen by one pass holds for all of them.
 */
export function createScrapePipeline(env: PipelineEnv, overrides: ScrapePipelineOverrides = {}): ScrapePipeline {
  const guard = new RateLimitGuard({
    clock: overrides.clock,
    sleep: overrides.sleep,
    minWaitMs: scraperConfig.retry.minRateLimitWait,
    maxWaitMs: env.SCRAPE_RATE_LIMIT_MAX_WAIT_MS,
  });
  const client = new GitHubClient({
    guard,
    token: env.GITHUB_TOKEN,
    baseUrl: env.GITHUB_API_URL,
    http: overrides.http,
    sleep: overrides.sleep,
    retryPolicy: {
      maxAttempts: env.SCRAPE_MAX_ATTEMPTS,
      initialDelay: scraperConfig.retry.initialDelay,
      maxDelay: scraperConfig.retry.maxDelay,
      multiplier: scraperConfig.retry.backoffMultiplier,
      maxRateLimitWait: env.SCRAPE_RATE_LIMIT_MAX_WAIT_MS,
    },
  });

  const kind = selectTraversalStrategy({ hasCredential: client.hasCredential, forceWalker: env.FORCE_CONTENTS_WALK });
  const strategy = createTraversalStrategy(kind, client, { ref: env.GITHUB_REF });
  const fetcher = new TemplateFetcher(client);
  logger.info({ strategy: kind, authenticated: client.hasCredential, apiUrl: client.baseUrl }, 'Scrape pipeline configured');

  return {
    strategy: kind,
    guard,
    client,
    createService: (sink) =>
      new ArchitectureScrapeService({
        strategy,
        fetcher,
        sink,
        clock: overrides.clock,
        concurrency: env.SCRAPE_CONCURRENCY,
        ref: env.GITHUB_REF,
        timeoutMs: env.SCRAPE_TIMEOUT_MS,
        filter: {
          templateFilenames: scraperConfig.templateFilenames,
          extraPatterns: env.TEMPLATE_EXTRA_PATTERNS,
          onePerDirectory: scraperConfig.onePerDirectory,
        },
      }),
  };
}
