/**
 * Zod validation schemas for GitHub REST API listing payloads
 *
 * Only the fields the traversal strategies read are declared; unknown
 * fields pass through untouched.
 */

import { z } from 'zod';

/**
 * Entry of `GET /repos/{owner}/{repo}/git/trees/{ref}?recursive=1`
 */
export const GitTreeItemSchema = z.object({
    path: z.string(),
    /** blob = file, tree = directory, commit = submodule */
    type: z.enum(['blob', 'tree', 'commit']),
    sha: z.string(),
    /** Blob API URL; absent for submodules */
    url: z.string().optional(),
});

export const GitTreeResponseSchema = z.object({
    sha: z.string(),
    tree: z.array(GitTreeItemSchema),
    /** Set when the listing exceeded GitHub's size limit */
    truncated: z.boolean().optional(),
});

/**
 * Entry of `GET /repos/{owner}/{repo}/contents/{path}`
 */
export const ContentsItemSchema = z.object({
    name: z.string(),
    path: z.string(),
    type: z.enum(['file', 'dir', 'symlink', 'submodule']),
    download_url: z.string().nullable().optional(),
    url: z.string().optional(),
});

/**
 * A directory path lists an array; a file path returns a single object
 */
export const ContentsResponseSchema = z.union([z.array(ContentsItemSchema), ContentsItemSchema]);

export type ContentsItem = z.infer<typeof ContentsItemSchema>;
