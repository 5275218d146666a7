import picomatch from 'picomatch';
import { scraperConfig } from '../../config/scraperConfig.js';
import type { CandidateFile, FileEntry, SourceSpec } from '../../types/architecture.js';
import { isWithinSubdir } from './sourceSpec.js';

export interface CandidateFilterOptions {
  /** Exact template filenames in precedence order (case-insensitive) */
  templateFilenames?: readonly string[];
  /**
   * Opt-in glob patterns for templates with other names, e.g. `**\/*.json`.
   * Patterns without a slash match the basename. Exact names always rank first.
   */
  extraPatterns?: readonly string[];
  /** Keep only the highest-precedence candidate of each directory */
  onePerDirectory?: boolean;
}

// Files that sit beside templates but never are one, even under a broad pattern
const NEVER_TEMPLATES = [/^metadata\.json$/i, /\.parameters\.json$/i];

export function basename(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? path : path.slice(index + 1);
}

export function dirname(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

/**
 * Template files of one directory in precedence order. The scrape takes the first
 * alternative that fetches and parses.
 */
export interface CandidateGroup {
  directory: string;
  alternatives: CandidateFile[];
}

/**
 * Narrow a listing to template candidates. With `onePerDirectory` the candidates of a
 * directory form one group, best-ranked first (ties keep listing order); otherwise every
 * candidate is its own group. Groups follow the listing order of their first candidate.
 */
export function groupCandidates(
  entries: readonly FileEntry[],
  spec: SourceSpec,
  options: CandidateFilterOptions = {}
): CandidateGroup[] {
  const filenames = (options.templateFilenames ?? scraperConfig.templateFilenames).map((name) => name.toLowerCase());
  const matchers = (options.extraPatterns ?? []).map((pattern) =>
    picomatch(pattern, { dot: true, nocase: true, basename: !pattern.includes('/') })
  );
  const onePerDirectory = options.onePerDirectory ?? scraperConfig.onePerDirectory;

  const rankOf = (path: string): number | undefined => {
    const name = basename(path);
    const exact = filenames.indexOf(name.toLowerCase());
    if (exact !== -1) {
      return exact;
    }
    if (NEVER_TEMPLATES.some((pattern) => pattern.test(name))) {
      return undefined;
    }
    return matchers.some((isMatch) => isMatch(path)) ? filenames.length : undefined;
  };

  const ranked: Array<{ entry: FileEntry; rank: number }> = [];
  for (const entry of entries) {
    if (entry.isDirectory || !isWithinSubdir(entry.path, spec)) continue;
    const rank = rankOf(entry.path);
    if (rank !== undefined) {
      ranked.push({ entry, rank });
    }
  }

  if (!onePerDirectory) {
    return ranked.map(({ entry }) => ({ directory: dirname(entry.path), alternatives: [entry] }));
  }

  const byDirectory = new Map<string, Array<{ entry: FileEntry; rank: number }>>();
  for (const candidate of ranked) {
    const dir = dirname(candidate.entry.path);
    const group = byDirectory.get(dir);
    if (group) {
      group.push(candidate);
    } else {
      byDirectory.set(dir, [candidate]);
    }
  }
  // Stable sort: equal ranks keep listing order
  return Array.from(byDirectory, ([directory, group]) => ({
    directory,
    alternatives: group.sort((a, b) => a.rank - b.rank).map(({ entry }) => entry),
  }));
}
