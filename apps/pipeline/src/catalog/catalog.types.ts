import type { PipelineOptions } from '../settings/pipeline-options';

export type MediaKind = 'movie' | 'tv';

/**
 * One discovered title. `match` is only present when the provider already
 * assigned a score.
 */
export type CandidateItem = {
  kind: MediaKind;
  tmdbId: number;
  imdbId: string | null;
  title: string;
  year: number | null;
  popularity: number | null;
  voteAverage: number | null;
  voteCount: number | null;
  originalLanguage: string | null;
  match?: number | null;
};

export type CatalogQuery = Pick<
  PipelineOptions,
  'region' | 'language' | 'originalLangs' | 'subsInclude' | 'discoverPages' | 'tmdbApiKey'
>;

export type CatalogDiscoverResult = {
  items: CandidateItem[];
  meta: {
    pagesRequested: number;
    pagesFetched: { movie: number; tv: number };
    counts: { movie: number; tv: number };
    watchProviderIds: number[];
    unknownProviders: string[];
    externalIds: { requested: number; found: number; failed: number };
  };
};

export interface CatalogProvider {
  discover(query: CatalogQuery): Promise<CatalogDiscoverResult>;
}

export const CATALOG_PROVIDER = Symbol('CATALOG_PROVIDER');
