// Subscription slug -> TMDB watch provider id (US catalogue ids).
const WATCH_PROVIDER_IDS: Partial<Record<string, number>> = {
  netflix: 8,
  prime_video: 9,
  amazon_prime_video: 9,
  hulu: 15,
  max: 1899,
  hbo_max: 1899,
  disney_plus: 337,
  apple_tv_plus: 350,
  peacock: 386,
  paramount_plus: 531,
};

function slugify(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/\+/g, '_plus')
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Maps `SUBS_INCLUDE` entries to TMDB provider ids. Numeric entries are taken
 * as ids verbatim; unknown slugs are reported back so they can be logged.
 */
export function resolveWatchProviderIds(subs: readonly string[]): {
  ids: number[];
  unknown: string[];
} {
  const ids: number[] = [];
  const unknown: string[] = [];
  for (const raw of subs) {
    const value = raw.trim();
    if (!value) continue;
    const id = /^\d+$/.test(value)
      ? Number.parseInt(value, 10)
      : WATCH_PROVIDER_IDS[slugify(value)];
    if (id === undefined) {
      unknown.push(value);
      continue;
    }
    if (!ids.includes(id)) ids.push(id);
  }
  return { ids, unknown };
}
