import { join } from 'node:path';
import {
  DEFAULT_AUDIENCE_WEIGHT,
  DEFAULT_COMMITMENT_COST_SCALE,
  DEFAULT_CRITIC_WEIGHT,
  DEFAULT_DISCOVER_PAGES,
  DEFAULT_IMDB_PUBLIC_MAX_PAGES,
  DEFAULT_LANGUAGE,
  DEFAULT_MIN_MATCH_CUT,
  DEFAULT_ORIGINAL_LANGS,
  DEFAULT_PIPELINE_CRON,
  DEFAULT_REGION,
  DEFAULT_SUBS_INCLUDE,
  DEFAULT_TOP_N,
  MAX_DISCOVER_PAGES,
} from '../app.constants';

export type PipelineOptions = {
  region: string;
  language: string;
  originalLangs: string[];
  subsInclude: string[];
  discoverPages: number;
  tmdbApiKey: string;
  ratingsCsvPath: string;
  imdbUserId: string;
  imdbPublicMaxPages: number;
  outDir: string;
  minMatchCut: number;
  topN: number;
  criticWeight: number;
  audienceWeight: number;
  commitmentCostScale: number;
  disableSymlink: boolean;
  cron: string;
  timezone: string | null;
};

/** Raw setting values; env strings, or whatever the YAML file held. */
export type RawSettings = Record<string, unknown>;

const UNSET_LITERALS = new Set(['', 'none', 'null']);

function normalizeString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

function isUnset(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (Array.isArray(value)) return false;
  return UNSET_LITERALS.has(normalizeString(value).toLowerCase());
}

function cleanList(values: unknown[]): string[] {
  return values.map((v) => normalizeString(v)).filter(Boolean);
}

/**
 * List settings accept:
 * - a JSON array string: '["en","fr"]'
 * - a comma-separated string: 'en,fr'
 * - a real array (YAML)
 *
 * A string that looks like a JSON array but does not parse yields `fallback`.
 */
export function parseListSetting(
  raw: unknown,
  fallback: readonly string[],
): string[] {
  if (isUnset(raw)) return [...fallback];
  if (Array.isArray(raw)) return cleanList(raw);

  const s = normalizeString(raw);
  if (!s) return [...fallback];

  if (s.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(s);
      if (Array.isArray(parsed)) return cleanList(parsed);
    } catch {
      // malformed JSON-looking input
    }
    return [...fallback];
  }

  return s
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
}

export function parseIntSetting(
  raw: unknown,
  fallback: number,
  bounds?: { min?: number; max?: number },
): number {
  if (isUnset(raw)) return fallback;
  const s = normalizeString(raw);
  if (!/^[+-]?\d+$/.test(s)) return fallback;
  const n = Number.parseInt(s, 10);
  if (!Number.isFinite(n)) return fallback;
  const min = bounds?.min ?? Number.MIN_SAFE_INTEGER;
  const max = bounds?.max ?? Number.MAX_SAFE_INTEGER;
  return Math.max(min, Math.min(max, n));
}

export function parseFloatSetting(raw: unknown, fallback: number): number {
  if (isUnset(raw)) return fallback;
  const n = Number.parseFloat(normalizeString(raw));
  return Number.isFinite(n) ? n : fallback;
}

export function parseBoolSetting(raw: unknown, fallback: boolean): boolean {
  if (typeof raw === 'boolean') return raw;
  if (isUnset(raw)) return fallback;
  const s = normalizeString(raw).toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return fallback;
}

export function parseStringSetting(raw: unknown, fallback: string): string {
  if (isUnset(raw)) return fallback;
  return normalizeString(raw) || fallback;
}

/**
 * Setting key -> env var name. The YAML file uses the camelCase keys.
 */
export const SETTING_ENV_KEYS: ReadonlyArray<
  readonly [keyof PipelineOptions, string]
> = [
  ['region', 'REGION'],
  ['language', 'LANGUAGE'],
  ['originalLangs', 'ORIGINAL_LANGS'],
  ['subsInclude', 'SUBS_INCLUDE'],
  ['discoverPages', 'DISCOVER_PAGES'],
  ['tmdbApiKey', 'TMDB_API_KEY'],
  ['ratingsCsvPath', 'IMDB_RATINGS_CSV_PATH'],
  ['imdbUserId', 'IMDB_USER_ID'],
  ['imdbPublicMaxPages', 'IMDB_PUBLIC_MAX_PAGES'],
  ['outDir', 'PIPELINE_OUT_DIR'],
  ['minMatchCut', 'MIN_MATCH_CUT'],
  ['topN', 'TOP_N'],
  ['criticWeight', 'CRITIC_WEIGHT'],
  ['audienceWeight', 'AUDIENCE_WEIGHT'],
  ['commitmentCostScale', 'COMMITMENT_COST_SCALE'],
  ['disableSymlink', 'PIPELINE_DISABLE_SYMLINK'],
  ['cron', 'PIPELINE_CRON'],
  ['timezone', 'PIPELINE_TIMEZONE'],
];

/**
 * Env wins over the file; an env var that is present but blank counts as unset.
 */
export function mergeRawSettings(
  env: NodeJS.ProcessEnv,
  file: RawSettings,
): RawSettings {
  const out: RawSettings = {};
  for (const [key, envKey] of SETTING_ENV_KEYS) {
    const fromEnv = env[envKey];
    out[key] = isUnset(fromEnv) ? file[key] : fromEnv;
  }
  return out;
}

export function resolvePipelineOptions(params: {
  env: NodeJS.ProcessEnv;
  file?: RawSettings;
  dataDir: string;
}): PipelineOptions {
  const raw = mergeRawSettings(params.env, params.file ?? {});
  const timezone = parseStringSetting(raw.timezone, '');

  return {
    region: parseStringSetting(raw.region, DEFAULT_REGION).toUpperCase(),
    language: parseStringSetting(raw.language, DEFAULT_LANGUAGE),
    originalLangs: parseListSetting(raw.originalLangs, DEFAULT_ORIGINAL_LANGS),
    subsInclude: parseListSetting(raw.subsInclude, DEFAULT_SUBS_INCLUDE),
    discoverPages: parseIntSetting(raw.discoverPages, DEFAULT_DISCOVER_PAGES, {
      min: 1,
      max: MAX_DISCOVER_PAGES,
    }),
    tmdbApiKey: parseStringSetting(raw.tmdbApiKey, ''),
    ratingsCsvPath: parseStringSetting(
      raw.ratingsCsvPath,
      join(params.dataDir, 'ratings.csv'),
    ),
    imdbUserId: parseStringSetting(raw.imdbUserId, ''),
    imdbPublicMaxPages: parseIntSetting(
      raw.imdbPublicMaxPages,
      DEFAULT_IMDB_PUBLIC_MAX_PAGES,
      { min: 1, max: 100 },
    ),
    outDir: parseStringSetting(raw.outDir, join(params.dataDir, 'out')),
    minMatchCut: parseFloatSetting(raw.minMatchCut, DEFAULT_MIN_MATCH_CUT),
    topN: parseIntSetting(raw.topN, DEFAULT_TOP_N, { min: 1, max: 500 }),
    criticWeight: parseFloatSetting(raw.criticWeight, DEFAULT_CRITIC_WEIGHT),
    audienceWeight: parseFloatSetting(
      raw.audienceWeight,
      DEFAULT_AUDIENCE_WEIGHT,
    ),
    commitmentCostScale: parseFloatSetting(
      raw.commitmentCostScale,
      DEFAULT_COMMITMENT_COST_SCALE,
    ),
    disableSymlink: parseBoolSetting(raw.disableSymlink, false),
    cron: parseStringSetting(raw.cron, DEFAULT_PIPELINE_CRON),
    timezone: timezone || null,
  };
}

/** Snapshot written to `options.sanity.json`; secrets reduced to booleans. */
export function redactOptions(options: PipelineOptions) {
  const { tmdbApiKey, ...rest } = options;
  return { ...rest, tmdbApiKeySet: Boolean(tmdbApiKey) };
}
