import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import type { NameMapping } from '../model/alignment.js';
import { MalformedMappingError, MissingInputError } from '../errors.js';
import { getExtension } from '../utils/path.js';

/**
 * Load a pass mapping document: a JSON object (`.json`) or YAML mapping
 * (`.yml`/`.yaml`) from pipeline A names to pipeline B names.
 */
export async function loadMapping(filePath: string): Promise<NameMapping> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new MissingInputError('Mapping', filePath, err);
  }
  return parseMapping(content, filePath);
}

export function parseMapping(content: string, source: string): NameMapping {
  const ext = getExtension(source);
  let parsed: unknown;
  try {
    parsed = ext === '.yml' || ext === '.yaml' ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedMappingError(source, reason, err);
  }
  return toNameMapping(parsed, source);
}

export function toNameMapping(value: unknown, source: string): NameMapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedMappingError(source, 'expected an object of pass name pairs');
  }

  const mapping = new Map<string, string>();
  for (const [from, to] of Object.entries(value)) {
    if (typeof to !== 'string') {
      throw new MalformedMappingError(source, `value for "${from}" must be a string`);
    }
    mapping.set(from, to);
  }
  return mapping;
}
