import { z } from 'zod';
import type { GitHubClient } from '../../clients/GitHubClient.js';
import type { CandidateFile } from '../../types/architecture.js';
import { TemplateFetchError } from '../../types/errors.js';

/**
 * `GET /repos/{owner}/{repo}/git/blobs/{sha}` payload
 */
const BlobResponseSchema = z.object({
  content: z.string(),
  encoding: z.enum(['base64', 'utf-8']),
});

function isBlobApiUrl(url: string): boolean {
  return /\/git\/blobs\/[0-9a-f]+$/i.test(url);
}

/**
 * Retrieves raw template text through the guarded client
 */
export class TemplateFetcher {
  constructor(private readonly client: GitHubClient) {}

  /**
   * @throws TemplateFetchError for a missing locator, a non-2xx status or an unreadable blob payload;
   *         client errors (rate limit, network, authentication, cancellation) propagate unchanged
   */
  async fetchContent(file: CandidateFile, signal?: AbortSignal): Promise<string> {
    if (!file.rawRef) {
      throw new TemplateFetchError(file.path, 0, { reason: 'no download locator' });
    }

    const response = await this.client.get(file.rawRef, { signal });
    if (response.status < 200 || response.status >= 300) {
      throw new TemplateFetchError(file.path, response.status, { url: file.rawRef });
    }

    if (!isBlobApiUrl(file.rawRef)) {
      return response.body;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      throw new TemplateFetchError(file.path, response.status, { url: file.rawRef, reason: 'blob payload is not JSON' });
    }
    const blob = BlobResponseSchema.safeParse(payload);
    if (!blob.success) {
      throw new TemplateFetchError(file.path, response.status, { url: file.rawRef, reason: 'unexpected blob payload' });
    }
    return blob.data.encoding === 'base64'
      ? Buffer.from(blob.data.content, 'base64').toString('utf8')
      : blob.data.content;
  }
}
