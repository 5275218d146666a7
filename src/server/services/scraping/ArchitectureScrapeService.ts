/**
 * ArchitectureScrapeService - one scrape pass over the configured sources
 *
 * resolve source -> list files -> group candidates -> fetch -> parse -> normalize -> upsert
 *
 * Sources run one after another; candidate groups of a source share a bounded worker pool.
 * Within a group the next-ranked file is tried when a template cannot be fetched or parsed.
 * Every failure is attributed in the summary and the pass moves on, except a credential
 * rejected under the bulk listing, which stops the pass (`aborted`).
 */

import type { Logger } from 'pino';
import { scraperConfig } from '../../config/scraperConfig.js';
import type {
  ArchitectureDocument,
  ArchitectureSink,
  CandidateFile,
  FileEntry,
  ParsedTemplate,
  ScrapeErrorKind,
  ScrapeSummary,
  SourceSpec,
  TemplateMetadata,
} from '../../types/architecture.js';
import {
  AuthenticationError,
  ConfigurationError,
  NetworkError,
  RateLimitExceededError,
  ScrapeCancelledError,
  StorageError,
  TemplateFetchError,
  TemplateParseError,
  errorMessage,
} from '../../types/errors.js';
import { createChildLogger, runWithContext } from '../../utils/logger.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { systemClock, type Clock } from '../infrastructure/RateLimitGuard.js';
import type { SourceListing, TreeTraversalStrategy } from '../traversal/TreeTraversalStrategy.js';
import { basename, dirname, groupCandidates, type CandidateFilterOptions, type CandidateGroup } from '../templates/candidateFilter.js';
import { formatSourceSpec, parseSourceSpec } from '../templates/sourceSpec.js';
import { parseTemplate, parseTemplateMetadata } from '../templates/templateParser.js';
import { normalizeTemplate } from '../templates/architectureNormalizer.js';

/**
 * Content retrieval boundary (TemplateFetcher in production)
 */
export interface ContentFetcher {
  fetchContent(file: CandidateFile, signal?: AbortSignal): Promise<string>;
}

export interface ArchitectureScrapeServiceConfig {
  strategy: TreeTraversalStrategy;
  fetcher: ContentFetcher;
  /** Omit for a dry run: documents are normalized and returned but not stored */
  sink?: ArchitectureSink;
  clock?: Clock;
  /** Candidate groups processed at once within a source (default 1) */
  concurrency?: number;
  filter?: CandidateFilterOptions;
  /** Git ref used in browse URLs */
  ref?: string;
  /** Upper bound for one pass; elapsed time cancels it like an aborted signal */
  timeoutMs?: number;
}

export interface ScrapeRunOptions {
  /** Raw `Owner/Repo[:subdir]` strings; invalid ones are reported per source */
  sources: readonly string[];
  /** Maximum documents produced by this pass */
  limit?: number;
  signal?: AbortSignal;
}

/**
 * Map a pipeline failure to its summary kind
 */
export function classifyScrapeError(error: unknown): ScrapeErrorKind {
  if (error instanceof ConfigurationError) return 'configuration';
  if (error instanceof AuthenticationError) return 'authentication';
  if (error instanceof RateLimitExceededError) return 'rate-limit';
  if (error instanceof NetworkError) return 'network';
  if (error instanceof TemplateFetchError) return 'fetch';
  if (error instanceof TemplateParseError) return 'parse';
  if (error instanceof StorageError) return 'storage';
  return 'unexpected';
}

/**
 * Mutable state of one pass
 */
interface PassState {
  summary: ScrapeSummary;
  signal: AbortSignal;
  /** Aborts the pass from inside (fatal authentication failure) */
  controller: AbortController;
  limit: number;
}

export class ArchitectureScrapeService {
  private readonly strategy: TreeTraversalStrategy;
  private readonly fetcher: ContentFetcher;
  private readonly sink?: ArchitectureSink;
  private readonly clock: Clock;
  private readonly concurrency: number;
  private readonly filterOptions: CandidateFilterOptions;
  private readonly ref: string;
  private readonly timeoutMs?: number;

  constructor(config: ArchitectureScrapeServiceConfig) {
    if (config.concurrency !== undefined && (!Number.isInteger(config.concurrency) || config.concurrency < 1)) {
      throw new ConfigurationError(`Scrape concurrency must be a positive integer, got ${config.concurrency}`);
    }
    this.strategy = config.strategy;
    this.fetcher = config.fetcher;
    this.sink = config.sink;
    this.clock = config.clock ?? systemClock;
    this.concurrency = config.concurrency ?? 1;
    this.filterOptions = config.filter ?? {};
    this.ref = config.ref ?? 'HEAD';
    this.timeoutMs = config.timeoutMs;
  }

  async run(options: ScrapeRunOptions): Promise<ScrapeSummary> {
    const controller = new AbortController();
    const signals = [controller.signal];
    if (options.signal) signals.push(options.signal);
    if (this.timeoutMs !== undefined && this.timeoutMs > 0) signals.push(AbortSignal.timeout(this.timeoutMs));

    const state: PassState = {
      summary: {
        documentsWritten: 0,
        documentsFailed: 0,
        filesSkipped: 0,
        errors: [],
        documents: [],
        cancelled: false,
        aborted: false,
      },
      signal: AbortSignal.any(signals),
      controller,
      limit: options.limit ?? Number.POSITIVE_INFINITY,
    };
    const log = createChildLogger({ strategy: this.strategy.kind, dryRun: !this.sink });
    log.info({ sources: options.sources.length, limit: options.limit }, 'Scrape pass started');

    for (const rawSource of options.sources) {
      if (this.shouldStop(state)) break;

      let spec: SourceSpec;
      try {
        spec = parseSourceSpec(rawSource);
      } catch (error) {
        this.recordError(state, log, error, rawSource);
        continue;
      }

      const source = formatSourceSpec(spec);
      await runWithContext({ source }, () => this.scrapeSource(state, spec, source));
    }

    const { summary } = state;
    // An internal abort is reported as `aborted`, not as cancellation
    summary.cancelled = !summary.aborted && state.signal.aborted;
    log.info(
      {
        documentsWritten: summary.documentsWritten,
        documentsFailed: summary.documentsFailed,
        filesSkipped: summary.filesSkipped,
        errors: summary.errors.length,
        cancelled: summary.cancelled,
        aborted: summary.aborted,
      },
      'Scrape pass finished'
    );
    return summary;
  }

  private shouldStop(state: PassState): boolean {
    return state.signal.aborted || state.summary.documents.length >= state.limit;
  }

  private async scrapeSource(state: PassState, spec: SourceSpec, source: string): Promise<void> {
    const log = createChildLogger({ strategy: this.strategy.kind });

    let listing: SourceListing;
    try {
      listing = await this.strategy.listFiles(spec, state.signal);
    } catch (error) {
      this.handleFailure(state, log, error, source);
      return;
    }
    for (const failure of listing.failures) {
      this.recordError(state, log, failure.error, source, failure.directory || undefined);
    }

    const { entries } = listing;
    const groups = groupCandidates(entries, spec, this.filterOptions);
    const metadataByDirectory = new Map<string, FileEntry>();
    for (const entry of entries) {
      if (!entry.isDirectory && basename(entry.path).toLowerCase() === scraperConfig.metadataFilename) {
        metadataByDirectory.set(dirname(entry.path), entry);
      }
    }
    log.info({ files: entries.length, candidates: groups.length, listingFailures: listing.failures.length }, 'Listed source');

    await mapWithConcurrency(groups, this.concurrency, async (group) => {
      if (this.shouldStop(state)) return;
      await this.processGroup(state, log, spec, source, group, metadataByDirectory.get(group.directory));
    });
  }

  /**
   * Take the first alternative that fetches and parses. The group is skipped, with each
   * alternative's failure recorded, only when none does.
   */
  private async processGroup(
    state: PassState,
    log: Logger,
    spec: SourceSpec,
    source: string,
    group: CandidateGroup,
    metadataFile: FileEntry | undefined
  ): Promise<void> {
    const unusable: Array<{ path: string; error: TemplateFetchError | TemplateParseError }> = [];

    for (const candidate of group.alternatives) {
      if (this.shouldStop(state)) return;

      let template: ParsedTemplate;
      try {
        const content = await this.fetcher.fetchContent(candidate, state.signal);
        template = parseTemplate(candidate.path, content);
      } catch (error) {
        if (error instanceof TemplateFetchError || error instanceof TemplateParseError) {
          unusable.push({ path: candidate.path, error });
          log.debug({ path: candidate.path, error: error.message }, 'Template unusable, trying next alternative');
          continue;
        }
        this.handleFailure(state, log, error, source, candidate.path);
        return;
      }

      if (unusable.length > 0) {
        log.info({ path: candidate.path, passedOver: unusable.map(({ path }) => path) }, 'Using fallback template');
      }
      try {
        await this.produceDocument(state, log, spec, source, candidate, template, metadataFile);
      } catch (error) {
        this.handleFailure(state, log, error, source, candidate.path);
      }
      return;
    }

    state.summary.filesSkipped++;
    for (const { path, error } of unusable) {
      this.recordError(state, log, error, source, path);
    }
  }

  private async produceDocument(
    state: PassState,
    log: Logger,
    spec: SourceSpec,
    source: string,
    candidate: CandidateFile,
    template: ParsedTemplate,
    metadataFile: FileEntry | undefined
  ): Promise<void> {
    const metadata = metadataFile ? await this.loadMetadata(state, log, metadataFile) : undefined;

    // Another worker may have reached the limit while this one was fetching
    if (this.shouldStop(state)) return;

    const document = normalizeTemplate({
      source: spec,
      candidate,
      template,
      metadata,
      scrapedAt: new Date(this.clock.now()),
      ref: this.ref,
    });
    state.summary.documents.push(document);

    await this.store(state, log, source, document);
  }

  /**
   * metadata.json is optional decoration: failures are logged, never recorded
   */
  private async loadMetadata(state: PassState, log: Logger, file: FileEntry): Promise<TemplateMetadata | undefined> {
    try {
      const content = await this.fetcher.fetchContent(file, state.signal);
      return parseTemplateMetadata(file.path, content);
    } catch (error) {
      if (error instanceof ScrapeCancelledError || error instanceof AuthenticationError) throw error;
      log.warn({ path: file.path, error: errorMessage(error) }, 'Ignoring unreadable metadata file');
      return undefined;
    }
  }

  private async store(state: PassState, log: Logger, source: string, document: ArchitectureDocument): Promise<void> {
    if (!this.sink) return;
    try {
      await this.sink.upsert(document);
      state.summary.documentsWritten++;
    } catch (error) {
      state.summary.documentsFailed++;
      this.recordError(state, log, error, source, document.sourcePath);
    }
  }

  private handleFailure(state: PassState, log: Logger, error: unknown, source: string, path?: string): void {
    if (error instanceof ScrapeCancelledError || state.signal.aborted) {
      log.debug({ path }, 'Stopped by cancellation');
      return;
    }
    this.recordError(state, log, error, source, path);
    if (error instanceof AuthenticationError && this.strategy.kind === 'bulk') {
      // The credential was declared present and rejected: nothing else can succeed
      state.summary.aborted = true;
      state.controller.abort();
      log.error({ error: errorMessage(error) }, 'Credential rejected, aborting scrape pass');
    }
  }

  private recordError(state: PassState, log: Logger, error: unknown, source: string, path?: string): void {
    const kind = classifyScrapeError(error);
    const message = errorMessage(error);
    state.summary.errors.push(path === undefined ? { kind, source, message } : { kind, source, path, message });
    if (kind === 'parse') {
      log.warn({ source, path, error: message }, 'Skipping unparseable template');
    } else {
      log.error({ source, path, kind, error: message }, 'Scrape step failed');
    }
  }
}
