/**
 * Domain types for template discovery and architecture documents
 */

/**
 * One configured repository source (`Owner/Repo[:subdir]`)
 */
export interface SourceSpec {
  readonly owner: string;
  readonly repo: string;
  /** Subdirectory without leading/trailing slashes; absent means the whole repository */
  readonly subdir?: string;
}

/**
 * One entry of a repository listing
 */
export interface FileEntry {
  path: string;
  /** Blob API URL (bulk listing) or raw download URL (contents walk); empty for directories */
  rawRef: string;
  isDirectory: boolean;
}

/**
 * A FileEntry that passed the candidate filter
 */
export type CandidateFile = FileEntry;

export type TemplateFormat = 'arm' | 'bicep';

export interface TemplateResource {
  type: string;
  name: string;
  apiVersion?: string;
}

export interface TemplateParameter {
  type: string;
  defaultValue?: unknown;
}

export interface TemplateOutput {
  type: string;
}

/**
 * Parsed template. Sections missing from the source are empty, never undefined.
 * Records keep the insertion order of the source document.
 */
export interface ParsedTemplate {
  format: TemplateFormat;
  resources: TemplateResource[];
  parameters: Record<string, TemplateParameter>;
  outputs: Record<string, TemplateOutput>;
}

/**
 * Display fields read from a sibling metadata.json
 */
export interface TemplateMetadata {
  displayName?: string;
  description?: string;
}

/**
 * Normalized, persisted architecture record
 */
export interface ArchitectureDocument {
  id: string;
  name: string;
  displayName?: string;
  description?: string;
  sourceOwner: string;
  sourceRepo: string;
  sourcePath: string;
  sourceUrl: string;
  directoryUrl: string;
  templateFormat: TemplateFormat;
  resourceTypes: string[];
  resourceCount: number;
  parameterNames: string[];
  outputNames: string[];
  scrapedAt: Date;
}

/**
 * Storage boundary. Upserts are keyed by `document.id` and replace the whole document.
 * Implementations reject with StorageError.
 */
export interface ArchitectureSink {
  upsert(document: ArchitectureDocument): Promise<void>;
}

export type ScrapeErrorKind =
  | 'configuration'
  | 'authentication'
  | 'rate-limit'
  | 'network'
  | 'fetch'
  | 'parse'
  | 'storage'
  | 'unexpected';

export interface ScrapeErrorRecord {
  kind: ScrapeErrorKind;
  source: string;
  path?: string;
  message: string;
}

export interface ScrapeSummary {
  documentsWritten: number;
  documentsFailed: number;
  /** Candidate groups for which no alternative could be fetched and parsed */
  filesSkipped: number;
  errors: ScrapeErrorRecord[];
  /** Every document normalized during the pass, written or not */
  documents: ArchitectureDocument[];
  /** The pass stopped early because its signal aborted or its timeout elapsed */
  cancelled: boolean;
  /** The pass stopped early on a fatal error (bulk listing rejected the credential) */
  aborted: boolean;
}
