export const RUN_DIR_PREFIX = 'run_';
export const LATEST_POINTER_NAME = 'latest';
export const LAST_RUN_DIR_FILE = 'last_run_dir.txt';

export const ARTIFACTS = {
  runLog: 'runner.log',
  discovered: 'items.discovered.json',
  enriched: 'items.enriched.json',
  feed: 'assistant_feed.json',
  summary: 'summary.md',
  optionsSanity: 'options.sanity.json',
  linksSanity: 'links.sanity.json',
  diag: 'diag.json',
} as const;

export const DEFAULT_REGION = 'US';
export const DEFAULT_LANGUAGE = 'en-US';
export const DEFAULT_ORIGINAL_LANGS: readonly string[] = ['en'];
export const DEFAULT_SUBS_INCLUDE: readonly string[] = [];
export const DEFAULT_DISCOVER_PAGES = 3;
export const MAX_DISCOVER_PAGES = 50;
export const DEFAULT_MIN_MATCH_CUT = 58;
export const DEFAULT_TOP_N = 10;
export const DEFAULT_CRITIC_WEIGHT = 0.25;
export const DEFAULT_AUDIENCE_WEIGHT = 0.75;
export const DEFAULT_COMMITMENT_COST_SCALE = 1.0;
export const DEFAULT_IMDB_PUBLIC_MAX_PAGES = 10;
export const DEFAULT_PIPELINE_CRON = '0 6 * * *'; // 6am daily

export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3';
export const TMDB_REQUEST_TIMEOUT_MS = 20_000;
export const IMDB_BASE_URL = 'https://www.imdb.com';
export const IMDB_REQUEST_TIMEOUT_MS = 20_000;
