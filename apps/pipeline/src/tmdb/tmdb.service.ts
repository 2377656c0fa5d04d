import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { TMDB_API_BASE_URL, TMDB_REQUEST_TIMEOUT_MS } from '../app.constants';
import type {
  CandidateItem,
  CatalogDiscoverResult,
  CatalogProvider,
  CatalogQuery,
  MediaKind,
} from '../catalog/catalog.types';
import { errToMessage } from '../errors';
import { parseImdbId } from '../lib/imdb-id';
import { normalizeTitleForMatching } from '../lib/title-normalize';
import { resolveWatchProviderIds } from './watch-providers';

// Parallel external_ids requests per batch.
const EXTERNAL_IDS_BATCH = 4;

type TmdbPage = {
  results: Record<string, unknown>[];
  totalPages: number | null;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function asTrimmedString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function yearFromDate(value: unknown): number | null {
  const d = asTrimmedString(value);
  if (!/^\d{4}/.test(d)) return null;
  return Number.parseInt(d.slice(0, 4), 10);
}

export function coerceDiscoverResult(
  kind: MediaKind,
  raw: Record<string, unknown>,
): CandidateItem | null {
  const id = asFiniteNumber(raw['id']);
  if (id === null || id <= 0) return null;

  const title = normalizeTitleForMatching(
    kind === 'movie'
      ? asTrimmedString(raw['title']) || asTrimmedString(raw['original_title'])
      : asTrimmedString(raw['name']) || asTrimmedString(raw['original_name']),
  );
  if (!title) return null;

  const originalLanguage = asTrimmedString(raw['original_language']);

  return {
    kind,
    tmdbId: Math.trunc(id),
    // discover rows carry no external ids; see TmdbService.attachImdbIds
    imdbId: null,
    title,
    year: yearFromDate(kind === 'movie' ? raw['release_date'] : raw['first_air_date']),
    popularity: asFiniteNumber(raw['popularity']),
    voteAverage: asFiniteNumber(raw['vote_average']),
    voteCount: asFiniteNumber(raw['vote_count']),
    originalLanguage: originalLanguage || null,
  };
}

@Injectable()
export class TmdbService implements CatalogProvider {
  private readonly logger = new Logger(TmdbService.name);

  /**
   * Discover movies and TV for pages 1..discoverPages, merged and sorted by
   * popularity (desc), then look up each title's IMDb id. Throws
   * `BadGatewayException` when a discover request fails; id lookups are
   * best-effort per title.
   */
  async discover(query: CatalogQuery): Promise<CatalogDiscoverResult> {
    const apiKey = query.tmdbApiKey.trim();
    if (!apiKey) {
      throw new BadGatewayException('TMDB apiKey is not set (TMDB_API_KEY)');
    }

    const providers = resolveWatchProviderIds(query.subsInclude);
    if (providers.unknown.length) {
      this.logger.warn(
        `Unknown subscription providers ignored: ${providers.unknown.join(', ')}`,
      );
    }

    const movie = await this.discoverKind('movie', query, apiKey, providers.ids);
    const tv = await this.discoverKind('tv', query, apiKey, providers.ids);

    const seen = new Set<string>();
    const items: CandidateItem[] = [];
    for (const item of [...movie.items, ...tv.items]) {
      const key = `${item.kind}:${item.tmdbId}`;
      if (seen.has(key)) continue;
      seen.add(key);
      items.push(item);
    }
    items.sort((a, b) => (b.popularity ?? 0) - (a.popularity ?? 0));

    const externalIds = await this.attachImdbIds(items, apiKey);

    return {
      items,
      meta: {
        pagesRequested: query.discoverPages,
        pagesFetched: { movie: movie.pagesFetched, tv: tv.pagesFetched },
        counts: {
          movie: items.filter((i) => i.kind === 'movie').length,
          tv: items.filter((i) => i.kind === 'tv').length,
        },
        watchProviderIds: providers.ids,
        unknownProviders: providers.unknown,
        externalIds,
      },
    };
  }

  buildDiscoverUrl(params: {
    kind: MediaKind;
    query: CatalogQuery;
    apiKey: string;
    providerIds: number[];
    page: number;
  }): URL {
    const url = new URL(`${TMDB_API_BASE_URL}/discover/${params.kind}`);
    url.searchParams.set('api_key', params.apiKey);
    url.searchParams.set('language', params.query.language);
    url.searchParams.set('watch_region', params.query.region);
    url.searchParams.set('sort_by', 'popularity.desc');
    url.searchParams.set('include_adult', 'false');
    url.searchParams.set('page', String(params.page));
    if (params.query.originalLangs.length) {
      url.searchParams.set(
        'with_original_language',
        params.query.originalLangs.join('|'),
      );
    }
    if (params.providerIds.length) {
      url.searchParams.set('with_watch_providers', params.providerIds.join('|'));
      url.searchParams.set('with_watch_monetization_types', 'flatrate|free|ads');
    }
    return url;
  }

  /**
   * `/{kind}/{id}/external_ids` for a single title. `null` when TMDB has no
   * IMDb id for it.
   */
  async getImdbId(params: {
    kind: MediaKind;
    tmdbId: number;
    apiKey: string;
  }): Promise<string | null> {
    const url = new URL(
      `${TMDB_API_BASE_URL}/${params.kind}/${params.tmdbId}/external_ids`,
    );
    url.searchParams.set('api_key', params.apiKey);

    const data = await this.fetchTmdbJson(url, TMDB_REQUEST_TIMEOUT_MS);
    return isPlainObject(data) ? parseImdbId(data['imdb_id']) : null;
  }

  private async attachImdbIds(
    items: CandidateItem[],
    apiKey: string,
  ): Promise<CatalogDiscoverResult['meta']['externalIds']> {
    let found = 0;
    let failed = 0;
    let lastError: string | null = null;

    for (let i = 0; i < items.length; i += EXTERNAL_IDS_BATCH) {
      const batch = items.slice(i, i + EXTERNAL_IDS_BATCH);
      const outcomes = await Promise.all(
        batch.map(async (item) => {
          try {
            const imdbId = await this.getImdbId({
              kind: item.kind,
              tmdbId: item.tmdbId,
              apiKey,
            });
            return { item, imdbId, error: null };
          } catch (err) {
            return { item, imdbId: null, error: errToMessage(err) };
          }
        }),
      );

      for (const outcome of outcomes) {
        if (outcome.error !== null) {
          failed += 1;
          lastError = outcome.error;
        } else if (outcome.imdbId) {
          outcome.item.imdbId = outcome.imdbId;
          found += 1;
        }
      }
    }

    if (failed) {
      this.logger.warn(
        `external ids: ${failed}/${items.length} lookup(s) failed; last error: ${lastError ?? 'unknown'}`,
      );
    }
    return { requested: items.length, found, failed };
  }

  private async discoverKind(
    kind: MediaKind,
    query: CatalogQuery,
    apiKey: string,
    providerIds: number[],
  ): Promise<{ items: CandidateItem[]; pagesFetched: number }> {
    const items: CandidateItem[] = [];
    let pagesFetched = 0;

    for (let page = 1; page <= query.discoverPages; page += 1) {
      const url = this.buildDiscoverUrl({ kind, query, apiKey, providerIds, page });
      const data = await this.fetchPage(url);
      pagesFetched += 1;

      for (const raw of data.results) {
        const item = coerceDiscoverResult(kind, raw);
        if (item) items.push(item);
      }

      if (!data.results.length) break;
      if (data.totalPages !== null && page >= data.totalPages) break;
    }

    this.logger.debug(`discover ${kind}: pages=${pagesFetched} items=${items.length}`);
    return { items, pagesFetched };
  }

  private async fetchPage(url: URL): Promise<TmdbPage> {
    const data = await this.fetchTmdbJson(url, TMDB_REQUEST_TIMEOUT_MS);
    if (!isPlainObject(data)) {
      throw new BadGatewayException('TMDB request failed: response is not an object');
    }
    const results = Array.isArray(data['results'])
      ? data['results'].filter(isPlainObject)
      : [];
    return { results, totalPages: asFiniteNumber(data['total_pages']) };
  }

  private async fetchTmdbJson(url: URL, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new BadGatewayException(
          `TMDB request failed: HTTP ${res.status} ${body}`.trim(),
        );
      }

      const json: unknown = await res.json();
      return json;
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      const cause = err instanceof Error ? err.cause : undefined;
      const causeMsg = cause === undefined || cause === null ? '' : errToMessage(cause);
      throw new BadGatewayException(
        `TMDB request failed: ${errToMessage(err)}${causeMsg ? ` (cause: ${causeMsg})` : ''}`,
      );
    } finally {
      clearTimeout(timeout);
    }
  }
}
