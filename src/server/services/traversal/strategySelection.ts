import type { GitHubClient } from '../../clients/GitHubClient.js';
import type { TraversalKind, TreeTraversalStrategy } from './TreeTraversalStrategy.js';
import { BulkTreeStrategy } from './BulkTreeStrategy.js';
import { ContentsWalkerStrategy } from './ContentsWalkerStrategy.js';

export interface StrategySelectionInput {
  hasCredential: boolean;
  forceWalker: boolean;
}

/**
 * The walker is used without a credential or when explicitly forced; otherwise the
 * single-call bulk listing. Evaluated once per process configuration.
 */
export function selectTraversalStrategy({ hasCredential, forceWalker }: StrategySelectionInput): TraversalKind {
  return !hasCredential || forceWalker ? 'walker' : 'bulk';
}

export interface TraversalOptions {
  /** Git ref to list (branch, tag or commit); defaults to HEAD */
  ref?: string;
}

export function createTraversalStrategy(
  kind: TraversalKind,
  client: GitHubClient,
  options: TraversalOptions = {}
): TreeTraversalStrategy {
  const ref = options.ref ?? 'HEAD';
  switch (kind) {
    case 'bulk':
      return new BulkTreeStrategy(client, ref);
    case 'walker':
      return new ContentsWalkerStrategy(client, ref);
  }
}
