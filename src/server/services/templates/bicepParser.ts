import { TemplateParseError } from '../../types/errors.js';
import type { ParsedTemplate, TemplateOutput, TemplateParameter, TemplateResource } from '../../types/architecture.js';

// resource storage 'Microsoft.Storage/storageAccounts@2023-01-01' = {
// resource kv 'Microsoft.KeyVault/vaults@2023-02-01' existing = {
const RESOURCE_DECLARATION = /^\s*resource\s+([A-Za-z_][\w]*)\s+'([^'@]+)(?:@([^']+))?'/;
// param location string = resourceGroup().location
const PARAM_DECLARATION = /^\s*param\s+([A-Za-z_][\w]*)\s+([A-Za-z_][\w.]*(?:\[\])?)(?:\s*=\s*(.+?))?\s*$/;
// output endpoint string = storage.properties.primaryEndpoints.blob
const OUTPUT_DECLARATION = /^\s*output\s+([A-Za-z_][\w]*)\s+([A-Za-z_][\w.]*(?:\[\])?)\s*=/;

/**
 * Cut a trailing `//` comment that sits outside a single-quoted string
 */
function stripLineComment(line: string): string {
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inString) {
      if (char === '\\') {
        i++;
      } else if (char === "'") {
        inString = false;
      }
    } else if (char === "'") {
      inString = true;
    } else if (char === '/' && line[i + 1] === '/') {
      return line.slice(0, i).trimEnd();
    }
  }
  return line;
}

/**
 * Literal default values become JSON values; expressions stay as source text
 */
function parseDefaultValue(raw: string): unknown {
  const text = raw.trim();
  const quoted = /^'((?:[^'\\]|\\.)*)'$/.exec(text);
  if (quoted) {
    return quoted[1].replace(/\\'/g, "'");
  }
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (/^-?\d+$/.test(text)) return parseInt(text, 10);
  return text;
}

/**
 * Extract resource, parameter and output declarations from Bicep source.
 * Declarations are matched line by line; the body of a declaration is not read.
 *
 * @throws TemplateParseError when the file declares none of the three
 */
export function parseBicep(path: string, content: string): ParsedTemplate {
  const resources: TemplateResource[] = [];
  // Maps keep names such as `__proto__` that a plain object would swallow
  const parameters = new Map<string, TemplateParameter>();
  const outputs = new Map<string, TemplateOutput>();
  let inBlockComment = false;

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine;
    if (inBlockComment) {
      const end = line.indexOf('*/');
      if (end === -1) continue;
      line = line.slice(end + 2);
      inBlockComment = false;
    }
    if (/^\s*\/\*/.test(line) && !line.includes('*/')) {
      inBlockComment = true;
      continue;
    }
    line = stripLineComment(line);
    if (!line.trim()) continue;

    const resource = RESOURCE_DECLARATION.exec(line);
    if (resource) {
      const entry: TemplateResource = { type: resource[2], name: resource[1] };
      if (resource[3]) entry.apiVersion = resource[3];
      resources.push(entry);
      continue;
    }

    const param = PARAM_DECLARATION.exec(line);
    if (param) {
      const parameter: TemplateParameter = { type: param[2] };
      // A trailing '{' or '[' opens a multi-line object/array default; keep it out
      if (param[3] !== undefined && !/^[[{]$/.test(param[3].trim())) {
        parameter.defaultValue = parseDefaultValue(param[3]);
      }
      parameters.set(param[1], parameter);
      continue;
    }

    const output = OUTPUT_DECLARATION.exec(line);
    if (output) {
      outputs.set(output[1], { type: output[2] });
    }
  }

  if (resources.length === 0 && parameters.size === 0 && outputs.size === 0) {
    throw new TemplateParseError(path, 'no resource, param or output declarations');
  }

  return {
    format: 'bicep',
    resources,
    parameters: Object.fromEntries(parameters),
    outputs: Object.fromEntries(outputs),
  };
}
