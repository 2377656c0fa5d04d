import { Injectable } from '@nestjs/common';
import type { CandidateItem } from '../catalog/catalog.types';
import type {
  ItemScorer,
  ItemScorerFactory,
  RankedItem,
  ScoringWeights,
} from './scoring.types';

const TV_COMMITMENT_PENALTY = 0.02;

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

/**
 * 0..1 stand-in for critical reception: mostly popularity, plus a boost for
 * well-rated titles that few people have voted on yet.
 */
export function criticProxy(item: CandidateItem): number {
  const popularity = isFiniteNumber(item.popularity) ? Math.max(0, item.popularity) : 0;
  const voteAverage = isFiniteNumber(item.voteAverage) ? item.voteAverage : 0;
  const voteCount = isFiniteNumber(item.voteCount) ? Math.max(0, item.voteCount) : 0;

  const popNorm = 1 - Math.exp(-popularity / 50);
  const longTail = clamp01((voteAverage - 7) / 3) * (1 - sigmoid(voteCount / 200));
  return clamp01(0.8 * popNorm + 0.2 * longTail);
}

/** 0..100 match from audience and critic terms, minus a small penalty for series. */
export class WeightedScorer implements ItemScorer {
  constructor(private readonly weights: ScoringWeights) {}

  score(item: CandidateItem): number | null {
    if (isFiniteNumber(item.match)) return item.match;
    if (!isFiniteNumber(item.voteAverage)) return null;

    const audience = clamp01(item.voteAverage / 10);
    const critic = criticProxy(item);
    const base =
      this.weights.audienceWeight * audience + this.weights.criticWeight * critic;
    const penalty =
      item.kind === 'tv'
        ? TV_COMMITMENT_PENALTY * this.weights.commitmentCostScale
        : 0;
    return round1(100 * Math.max(0, base - penalty));
  }
}

export function proxyMatch(item: CandidateItem): number {
  return isFiniteNumber(item.voteAverage) ? item.voteAverage * 10 : 0;
}

/**
 * Scores every item and returns new ranked objects, highest match first.
 * Ties keep input order. Inputs are not mutated.
 */
export function rankItems(
  items: readonly CandidateItem[],
  scorer: ItemScorer,
  minMatchCut: number,
): RankedItem[] {
  const scored = items.map((item, idx) => {
    const s = scorer.score(item);
    const fromScorer = isFiniteNumber(s);
    return {
      idx,
      item,
      match: fromScorer ? s : proxyMatch(item),
      matchSource: fromScorer ? ('scorer' as const) : ('proxy' as const),
    };
  });

  scored.sort((a, b) => b.match - a.match || a.idx - b.idx);

  return scored.map((s, i) => ({
    ...s.item,
    rank: i + 1,
    match: s.match,
    matchSource: s.matchSource,
    aboveCut: s.match >= minMatchCut,
  }));
}

@Injectable()
export class ScoringService implements ItemScorerFactory {
  create(weights: ScoringWeights): ItemScorer {
    return new WeightedScorer(weights);
  }
}
