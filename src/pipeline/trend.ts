import type { TrendLabel } from '../types/index.js';

const TREND_THRESHOLD = 3;

/** 1-indexed rank by article id. */
export function rankMap(items: Array<{ articleId: string }>): Map<string, number> {
  const ranks = new Map<string, number>();
  items.forEach((it, idx) => {
    if (!ranks.has(it.articleId)) ranks.set(it.articleId, idx + 1);
  });
  return ranks;
}

export function trendLabel(previousRank: number | undefined, newRank: number): TrendLabel {
  if (previousRank === undefined) return 'NEW';
  const delta = previousRank - newRank;
  if (delta >= TREND_THRESHOLD) return 'UP';
  if (delta <= -TREND_THRESHOLD) return 'DOWN';
  return 'STEADY';
}

export function applyTrends<T extends { articleId: string; trend: TrendLabel }>(
  items: T[],
  previousRanks: Map<string, number>,
): T[] {
  return items.map((it, idx) => ({
    ...it,
    trend: trendLabel(previousRanks.get(it.articleId), idx + 1),
  }));
}
