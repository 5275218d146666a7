import { scraperConfig } from '../../config/scraperConfig.js';
import type {
  ArchitectureDocument,
  CandidateFile,
  ParsedTemplate,
  SourceSpec,
  TemplateMetadata,
} from '../../types/architecture.js';
import { computeArchitectureId } from '../../utils/contentHash.js';
import { basename, dirname } from './candidateFilter.js';

export interface NormalizeInput {
  source: SourceSpec;
  candidate: CandidateFile;
  template: ParsedTemplate;
  metadata?: TemplateMetadata;
  scrapedAt: Date;
  /** Git ref used to build browse URLs */
  ref?: string;
}

const GENERIC_TEMPLATE_NAMES = new Set(scraperConfig.templateFilenames.map((name) => name.toLowerCase()));

function stripExtension(filename: string): string {
  const index = filename.lastIndexOf('.');
  return index > 0 ? filename.slice(0, index) : filename;
}

/**
 * Name of the architecture: the filename, or for generic template filenames the
 * folder holding it (the repository name at the root).
 */
export function deriveArchitectureName(path: string, repo: string): string {
  const filename = basename(path);
  if (!GENERIC_TEMPLATE_NAMES.has(filename.toLowerCase())) {
    return stripExtension(filename);
  }
  const dir = dirname(path);
  return dir ? basename(dir) : repo;
}

function githubUrl(source: SourceSpec, kind: 'blob' | 'tree', ref: string, path: string): string {
  const base = `https://github.com/${source.owner}/${source.repo}/${kind}/${ref}`;
  return path ? `${base}/${path}` : base;
}

/**
 * Map one parsed template to its canonical document. Pure: the same input always
 * yields the same document.
 */
export function normalizeTemplate(input: NormalizeInput): ArchitectureDocument {
  const { source, candidate, template, metadata, scrapedAt } = input;
  const ref = input.ref ?? 'HEAD';
  const resourceTypes = Array.from(new Set(template.resources.map((resource) => resource.type))).sort();

  const document: ArchitectureDocument = {
    id: computeArchitectureId(source.owner, source.repo, candidate.path),
    name: deriveArchitectureName(candidate.path, source.repo),
    sourceOwner: source.owner,
    sourceRepo: source.repo,
    sourcePath: candidate.path,
    sourceUrl: githubUrl(source, 'blob', ref, candidate.path),
    directoryUrl: githubUrl(source, 'tree', ref, dirname(candidate.path)),
    templateFormat: template.format,
    resourceTypes,
    resourceCount: resourceTypes.length,
    parameterNames: Object.keys(template.parameters),
    outputNames: Object.keys(template.outputs),
    scrapedAt,
  };
  if (metadata?.displayName) document.displayName = metadata.displayName;
  if (metadata?.description) document.description = metadata.description;
  return document;
}
