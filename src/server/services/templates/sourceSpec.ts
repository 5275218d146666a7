import { ConfigurationError } from '../../types/errors.js';
import type { SourceSpec } from '../../types/architecture.js';

// GitHub owner and repository names: letters, digits, '-', '_' and '.'
const NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse one `Owner/Repo[:subdir]` source string.
 *
 * @throws ConfigurationError when the owner/repo segment is missing or malformed
 */
export function parseSourceSpec(value: string): SourceSpec {
  const trimmed = value.trim();
  const separator = trimmed.indexOf(':');
  const repoPart = separator === -1 ? trimmed : trimmed.slice(0, separator);
  const subdirPart = separator === -1 ? '' : trimmed.slice(separator + 1);

  const segments = repoPart.split('/');
  if (segments.length !== 2) {
    throw new ConfigurationError(`Invalid source "${value}": expected Owner/Repo[:subdir]`, { source: value });
  }
  const [owner, repo] = segments;
  if (!NAME_PATTERN.test(owner) || !NAME_PATTERN.test(repo) || repo === '.' || repo === '..') {
    throw new ConfigurationError(`Invalid source "${value}": owner and repository must be non-empty GitHub names`, {
      source: value,
    });
  }

  const subdir = subdirPart
    .split('/')
    .filter((segment) => segment.length > 0)
    .join('/');
  if (subdir.split('/').some((segment) => segment === '..')) {
    throw new ConfigurationError(`Invalid source "${value}": subdirectory may not contain '..'`, { source: value });
  }

  return Object.freeze(subdir ? { owner, repo, subdir } : { owner, repo });
}

/**
 * Split a comma-separated source list, dropping blanks. Entries are not resolved here.
 */
export function parseSourceList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Canonical string form, used to attribute errors and logs
 */
export function formatSourceSpec(spec: SourceSpec): string {
  return spec.subdir ? `${spec.owner}/${spec.repo}:${spec.subdir}` : `${spec.owner}/${spec.repo}`;
}

/**
 * Whether `path` lies inside the source's subdirectory (always true without one)
 */
export function isWithinSubdir(path: string, spec: SourceSpec): boolean {
  if (!spec.subdir) {
    return true;
  }
  return path === spec.subdir || path.startsWith(`${spec.subdir}/`);
}
