import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { errorCode, errToMessage } from '../errors';
import type { RawSettings } from './pipeline-options';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function parseOptionsYaml(yamlText: string): RawSettings {
  const doc: unknown = YAML.parse(yamlText);
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new Error('Options file must contain a YAML mapping at the top level');
  }
  // Allow the settings to live under a `pipeline:` key.
  const nested = doc['pipeline'];
  return isPlainObject(nested) ? nested : doc;
}

export type OptionsFileResult =
  | { status: 'loaded'; settings: RawSettings }
  | { status: 'missing' }
  | { status: 'invalid'; error: string };

/**
 * Reads the optional YAML options file. Read and parse failures come back as
 * `invalid` so the caller can fall back to env and defaults.
 */
export async function readOptionsFile(path: string): Promise<OptionsFileResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return { status: 'missing' };
    return { status: 'invalid', error: errToMessage(err) };
  }

  try {
    return { status: 'loaded', settings: parseOptionsYaml(text) };
  } catch (err) {
    return { status: 'invalid', error: errToMessage(err) };
  }
}
