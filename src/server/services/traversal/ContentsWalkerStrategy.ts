import type { GitHubClient } from '../../clients/GitHubClient.js';
import type { FileEntry, SourceSpec } from '../../types/architecture.js';
import { NetworkError, RateLimitExceededError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { formatSourceSpec, isWithinSubdir } from '../templates/sourceSpec.js';
import { ContentsResponseSchema, type ContentsItem } from './githubSchemas.js';
import { encodePath, type ListingFailure, type SourceListing, type TreeTraversalStrategy } from './TreeTraversalStrategy.js';

/**
 * Walks a repository one Contents API call per directory, breadth-first.
 * Entries are visited in the order GitHub returns them and directories are
 * queued FIFO, so the same tree always yields the same sequence.
 *
 * A directory that fails to list is reported and its subtree skipped. A quota failure
 * ends the walk, since every further call would hit the same block. Either way the
 * entries gathered so far are returned.
 */
export class ContentsWalkerStrategy implements TreeTraversalStrategy {
  readonly kind = 'walker' as const;

  constructor(
    private readonly client: GitHubClient,
    private readonly ref: string
  ) {}

  async listFiles(spec: SourceSpec, signal?: AbortSignal): Promise<SourceListing> {
    const queue: string[] = [spec.subdir ?? ''];
    const visited = new Set<string>();
    const entries: FileEntry[] = [];
    const failures: ListingFailure[] = [];

    while (queue.length > 0) {
      const dir = queue.shift() ?? '';
      if (visited.has(dir)) continue;
      visited.add(dir);

      let items: ContentsItem[];
      try {
        items = await this.listDirectory(spec, dir, signal);
      } catch (error) {
        if (error instanceof RateLimitExceededError) {
          failures.push({ directory: dir, error });
          logger.warn({ source: formatSourceSpec(spec), dir, pending: queue.length }, 'Quota exhausted, ending walk early');
          break;
        }
        if (error instanceof NetworkError) {
          failures.push({ directory: dir, error });
          logger.warn({ source: formatSourceSpec(spec), dir, error: error.message }, 'Directory listing failed, skipping subtree');
          continue;
        }
        throw error;
      }
      for (const item of items) {
        if (item.type === 'dir') {
          entries.push({ path: item.path, rawRef: '', isDirectory: true });
          queue.push(item.path);
        } else if (item.type === 'file') {
          entries.push({ path: item.path, rawRef: item.download_url ?? item.url ?? '', isDirectory: false });
        }
      }
    }

    logger.debug(
      { source: formatSourceSpec(spec), directories: visited.size, entries: entries.length, failures: failures.length },
      'Contents walk completed'
    );

    return { entries: entries.filter((entry) => isWithinSubdir(entry.path, spec)), failures };
  }

  private async listDirectory(spec: SourceSpec, dir: string, signal?: AbortSignal): Promise<ContentsItem[]> {
    const path = dir ? `/${encodePath(dir)}` : '';
    const url = this.client.apiUrl(
      `/repos/${encodeURIComponent(spec.owner)}/${encodeURIComponent(spec.repo)}/contents${path}?ref=${encodeURIComponent(this.ref)}`
    );
    const { status, data } = await this.client.getJson(url, { signal });

    if (status === 404) {
      logger.warn({ source: formatSourceSpec(spec), dir }, 'Directory not found, skipping');
      return [];
    }
    if (data === undefined) {
      throw new NetworkError(`Listing ${dir || '/'} of ${formatSourceSpec(spec)} failed with HTTP ${status}`, { url, status });
    }

    const parsed = ContentsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new NetworkError(`Unexpected contents payload for ${dir || '/'} of ${formatSourceSpec(spec)}`, {
        url,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  }
}
