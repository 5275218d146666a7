import crypto from 'crypto';

/**
 * Stable identity of an architecture document: SHA-256 of owner/repo/path.
 *
 * Owner and repository are lowercased because GitHub treats them case-insensitively;
 * the path is kept as-is because file paths are case-sensitive.
 */
export function computeArchitectureId(owner: string, repo: string, path: string): string {
  const identity = `${owner.trim().toLowerCase()}/${repo.trim().toLowerCase()}/${path}`;
  return crypto.createHash('sha256').update(identity, 'utf8').digest('hex');
}
