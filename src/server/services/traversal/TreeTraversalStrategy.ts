import type { FileEntry, SourceSpec } from '../../types/architecture.js';
import type { NetworkError, RateLimitExceededError } from '../../types/errors.js';

export type TraversalKind = 'bulk' | 'walker';

/**
 * A directory that could not be listed; its subtree is missing from the listing
 */
export interface ListingFailure {
  /** Empty for the repository root */
  directory: string;
  error: NetworkError | RateLimitExceededError;
}

export interface SourceListing {
  entries: FileEntry[];
  failures: ListingFailure[];
}

/**
 * Lists every file and directory of a repository source.
 * Implementations return only entries inside `spec.subdir` when one is set.
 */
export interface TreeTraversalStrategy {
  readonly kind: TraversalKind;
  listFiles(spec: SourceSpec, signal?: AbortSignal): Promise<SourceListing>;
}

/**
 * Encode each path segment, keeping the separators
 */
export function encodePath(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}
