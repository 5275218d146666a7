import type { GitHubClient } from '../../clients/GitHubClient.js';
import type { FileEntry, SourceSpec } from '../../types/architecture.js';
import { NetworkError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { formatSourceSpec, isWithinSubdir } from '../templates/sourceSpec.js';
import { GitTreeResponseSchema } from './githubSchemas.js';
import { encodePath, type SourceListing, type TreeTraversalStrategy } from './TreeTraversalStrategy.js';

/**
 * Lists a whole repository with one recursive Git Trees call.
 * Requires a credential; selected by `selectTraversalStrategy`.
 * The listing is all or nothing, so it never reports partial failures.
 */
export class BulkTreeStrategy implements TreeTraversalStrategy {
  readonly kind = 'bulk' as const;

  constructor(
    private readonly client: GitHubClient,
    private readonly ref: string
  ) {}

  async listFiles(spec: SourceSpec, signal?: AbortSignal): Promise<SourceListing> {
    const url = this.client.apiUrl(
      `/repos/${encodeURIComponent(spec.owner)}/${encodeURIComponent(spec.repo)}/git/trees/${encodePath(this.ref)}?recursive=1`
    );
    const { status, data } = await this.client.getJson(url, { signal });

    // Missing repository or ref (404) and empty repository (409) list nothing
    if (status === 404 || status === 409) {
      logger.warn({ source: formatSourceSpec(spec), status, ref: this.ref }, 'Repository tree not found, nothing to list');
      return { entries: [], failures: [] };
    }
    if (data === undefined) {
      throw new NetworkError(`Tree listing for ${formatSourceSpec(spec)} failed with HTTP ${status}`, { url, status });
    }

    const parsed = GitTreeResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new NetworkError(`Unexpected tree listing payload for ${formatSourceSpec(spec)}`, {
        url,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    if (parsed.data.truncated) {
      logger.warn(
        { source: formatSourceSpec(spec), entries: parsed.data.tree.length },
        'Tree listing was truncated by GitHub; some templates may be missed'
      );
    }

    const entries: FileEntry[] = parsed.data.tree
      .filter((item) => item.type !== 'commit')
      .filter((item) => isWithinSubdir(item.path, spec))
      .map((item) => ({
        path: item.path,
        rawRef: item.type === 'blob' ? item.url ?? '' : '',
        isDirectory: item.type === 'tree',
      }));
    return { entries, failures: [] };
  }
}
