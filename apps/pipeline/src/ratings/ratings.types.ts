import type { PipelineOptions } from '../settings/pipeline-options';
import type { SeenIndex } from './seen-index';

export type SeenIndexQuery = Pick<
  PipelineOptions,
  'ratingsCsvPath' | 'imdbUserId' | 'imdbPublicMaxPages'
>;

export type SeenIndexLoadResult = {
  index: SeenIndex;
  sources: {
    csvPath: string;
    csvFound: boolean;
    csvRowsUsed: number;
    publicIds: number;
    publicError: string | null;
  };
};

export interface SeenIndexLoader {
  load(query: SeenIndexQuery): Promise<SeenIndexLoadResult>;
}

export const SEEN_INDEX_LOADER = Symbol('SEEN_INDEX_LOADER');
