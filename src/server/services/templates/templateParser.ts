/**
 * Tolerant template parsing
 *
 * Turns raw ARM JSON or Bicep text into a ParsedTemplate. Missing or malformed
 * sections become empty values; only a document with no usable section at all
 * (or unreadable syntax) is rejected with TemplateParseError.
 */

import { z } from 'zod';
import { TemplateParseError } from '../../types/errors.js';
import type {
  ParsedTemplate,
  TemplateMetadata,
  TemplateOutput,
  TemplateParameter,
  TemplateResource,
} from '../../types/architecture.js';
import { parseBicep } from './bicepParser.js';

const ArmResourceSchema = z.object({
  type: z.string().min(1),
  name: z.unknown().optional(),
  apiVersion: z.string().optional(),
});

const ArmParameterSchema = z.object({
  type: z.string().optional(),
  defaultValue: z.unknown().optional(),
});

const ArmOutputSchema = z.object({
  type: z.string().optional(),
});

const MetadataSchema = z.object({
  itemDisplayName: z.string().optional(),
  title: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  summary: z.string().optional(),
});

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ARM names are usually template expressions; keep them as text
 */
function nameToString(name: unknown): string {
  if (typeof name === 'string') return name;
  if (name === undefined || name === null) return '';
  return JSON.stringify(name);
}

function parseArmResources(section: unknown[] | JsonObject): TemplateResource[] {
  // languageVersion 2.0 templates key resources by symbolic name
  const entries: Array<[string | undefined, unknown]> = Array.isArray(section)
    ? section.map((resource): [string | undefined, unknown] => [undefined, resource])
    : Object.entries(section);

  const resources: TemplateResource[] = [];
  for (const [symbolicName, raw] of entries) {
    const parsed = ArmResourceSchema.safeParse(raw);
    // A resource without a type cannot be normalized
    if (!parsed.success) continue;
    const resource: TemplateResource = {
      type: parsed.data.type,
      name: parsed.data.name !== undefined ? nameToString(parsed.data.name) : symbolicName ?? '',
    };
    if (parsed.data.apiVersion) {
      resource.apiVersion = parsed.data.apiVersion;
    }
    resources.push(resource);
  }
  return resources;
}

// Object.fromEntries defines own properties, so a key such as `__proto__` is kept
function parseArmParameters(section: JsonObject): Record<string, TemplateParameter> {
  return Object.fromEntries(
    Object.entries(section).map(([name, raw]): [string, TemplateParameter] => {
      const parsed = ArmParameterSchema.safeParse(raw);
      const parameter: TemplateParameter = { type: parsed.success && parsed.data.type ? parsed.data.type : 'unknown' };
      if (parsed.success && parsed.data.defaultValue !== undefined) {
        parameter.defaultValue = parsed.data.defaultValue;
      }
      return [name, parameter];
    })
  );
}

function parseArmOutputs(section: JsonObject): Record<string, TemplateOutput> {
  return Object.fromEntries(
    Object.entries(section).map(([name, raw]): [string, TemplateOutput] => {
      const parsed = ArmOutputSchema.safeParse(raw);
      return [name, { type: parsed.success && parsed.data.type ? parsed.data.type : 'unknown' }];
    })
  );
}

/**
 * Parse an ARM (JSON) template.
 *
 * @throws TemplateParseError for invalid JSON, a non-object root, or no usable section
 */
export function parseArmTemplate(path: string, content: string): ParsedTemplate {
  let document: unknown;
  try {
    // Some templates are saved with a byte order mark
    document = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new TemplateParseError(path, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  if (!isJsonObject(document)) {
    throw new TemplateParseError(path, 'template root is not an object');
  }

  const { resources, parameters, outputs } = document;
  const hasResources = Array.isArray(resources) || isJsonObject(resources);
  const hasParameters = isJsonObject(parameters);
  const hasOutputs = isJsonObject(outputs);

  if (!hasResources && !hasParameters && !hasOutputs) {
    throw new TemplateParseError(path, 'no resources, parameters or outputs section');
  }

  return {
    format: 'arm',
    resources: Array.isArray(resources) || isJsonObject(resources) ? parseArmResources(resources) : [],
    parameters: isJsonObject(parameters) ? parseArmParameters(parameters) : {},
    outputs: isJsonObject(outputs) ? parseArmOutputs(outputs) : {},
  };
}

/**
 * Parse a template, choosing the format from the file extension
 */
export function parseTemplate(path: string, content: string): ParsedTemplate {
  if (path.toLowerCase().endsWith('.bicep')) {
    return parseBicep(path, content);
  }
  return parseArmTemplate(path, content);
}

/**
 * Read display fields from a metadata.json body
 *
 * @throws TemplateParseError for invalid JSON or fields of the wrong type
 */
export function parseTemplateMetadata(path: string, content: string): TemplateMetadata {
  let document: unknown;
  try {
    document = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new TemplateParseError(path, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  const parsed = MetadataSchema.safeParse(document);
  if (!parsed.success) {
    throw new TemplateParseError(path, 'unexpected metadata shape');
  }
  const metadata: TemplateMetadata = {};
  const displayName = parsed.data.itemDisplayName || parsed.data.title || parsed.data.name;
  const description = parsed.data.description || parsed.data.summary;
  if (displayName) metadata.displayName = displayName;
  if (description) metadata.description = description;
  return metadata;
}
