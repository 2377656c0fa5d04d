import type { CandidateItem } from '../catalog/catalog.types';
import type { PipelineOptions } from '../settings/pipeline-options';

export type MatchSource = 'scorer' | 'proxy';

export type RankedItem = CandidateItem & {
  rank: number;
  match: number;
  matchSource: MatchSource;
  aboveCut: boolean;
};

export type ScoringWeights = Pick<
  PipelineOptions,
  'criticWeight' | 'audienceWeight' | 'commitmentCostScale'
>;

/** `null` (or a non-finite number) means "no opinion"; ranking falls back to a proxy. */
export interface ItemScorer {
  score(item: CandidateItem): number | null;
}

export interface ItemScorerFactory {
  create(weights: ScoringWeights): ItemScorer;
}

export const ITEM_SCORER_FACTORY = Symbol('ITEM_SCORER_FACTORY');
