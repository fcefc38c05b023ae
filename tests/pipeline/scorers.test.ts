import { describe, it, expect, vi } from 'vitest';
import {
  BaseScoreScorer,
  HeatScorer,
  HeuristicScorer,
  LearnedAffinityScorer,
  MoodInterestScorer,
  PersonalScoreCombiner,
  RerankerScorer,
  VectorSimilarityScorer,
  rerankTopK,
} from '../../src/pipeline/scorers.js';
import type { GlobalCandidate } from '../../src/pipeline/types.js';
import type { RerankerClient, RerankInput, RerankPick } from '../../src/types/index.js';
import {
  NOW,
  hoursAgo,
  makeArticle,
  makeFeatures,
  makeGlobalCandidate,
  makeGlobalQuery,
  makePersonalCandidate,
  makePersonalQuery,
} from '../support/fixtures.js';

describe('HeuristicScorer', () => {
  const scorer = new HeuristicScorer({
    tier1Sources: ['Reuters'],
    boostKeywords: ['verdict', 'tariff'],
    penaltyKeywords: ['deal', 'review'],
  });

  it('scores a plain story from recency, corroboration and default arousal', () => {
    const h = scorer.evaluate(makeArticle({ sourceId: 'Some Blog', title: 'Quiet day in the park', publishedAt: hoursAgo(4) }), 1, NOW);

    expect(h.raw).toBeCloseTo(0.9251964, 6);
    expect(h.eventBoost).toBe(0);
    expect(h.reasons).toEqual([]);
  });

  it('applies authority, keyword and pattern boosts with reasons', () => {
    const h = scorer.evaluate(
      makeArticle({
        sourceId: 'reuters ',
        title: 'Court verdict: 12 killed in blast, tariff ruling',
        publishedAt: hoursAgo(1),
        features: makeFeatures({ arousal: 0.8 }),
      }),
      3,
      NOW,
    );

    expect(h.eventBoost).toBeCloseTo(0.95, 10);
    expect(h.raw).toBeCloseTo(3.1018025, 6);
    expect(h.reasons).toEqual(['Multi-source', 'Tier-1 source', 'High-impact keywords', 'Very fresh']);
  });

  it('penalizes commerce keywords', () => {
    const h = scorer.evaluate(makeArticle({ sourceId: 'Some Blog', title: 'Hands-on review: best deal', publishedAt: hoursAgo(4) }), 1, NOW);

    expect(h.eventBoost).toBeCloseTo(-0.7, 10);
    expect(h.raw).toBeCloseTo(0.2251964, 6);
  });

  it('writes the heuristic into both raw and final scores', async () => {
    const [scored] = await scorer.score(makeGlobalQuery(), [makeGlobalCandidate({ sourceId: 'Some Blog', title: 'Quiet day in the park', publishedAt: hoursAgo(4) })]);
    expect(scored.rawScore).toBeCloseTo(0.9251964, 6);
    expect(scored.finalScore).toBe(scored.rawScore);
  });
});

function ranked(count: number): GlobalCandidate[] {
  return Array.from({ length: count }, (_, i) => {
    const id = `c${String(i + 1).padStart(2, '0')}`;
    return makeGlobalCandidate({ id }, { rawScore: count - i, finalScore: count - i });
  });
}

function oracle(picks: RerankPick[]) {
  return {
    rerank: vi.fn(async (_items: RerankInput[], _topK: number, _signal?: AbortSignal) => picks),
  } satisfies RerankerClient;
}

describe('rerankTopK', () => {
  it('clamps to [6, max(6, take)]', () => {
    expect(rerankTopK(undefined, 12)).toBe(12);
    expect(rerankTopK(30, 12)).toBe(12);
    expect(rerankTopK(2, 12)).toBe(6);
    expect(rerankTopK(undefined, 3)).toBe(6);
  });
});

describe('RerankerScorer', () => {
  const sizing = { storeCount: 20, maxCandidates: 80, enabled: true };

  it('is disabled for heuristics-only runs and without a client', () => {
    expect(new RerankerScorer(oracle([]), sizing).enable(makeGlobalQuery({ heuristicsOnly: true }))).toBe(false);
    expect(new RerankerScorer(null, sizing).enable(makeGlobalQuery())).toBe(false);
    expect(new RerankerScorer(oracle([]), { ...sizing, enabled: false }).enable(makeGlobalQuery())).toBe(false);
  });

  it('skips the oracle for a window under 10', async () => {
    const client = oracle([{ id: 'c01', score: 1, reasons: [] }]);
    const candidates = ranked(9);

    const result = await new RerankerScorer(client, sizing).score(makeGlobalQuery(), candidates);

    expect(client.rerank).not.toHaveBeenCalled();
    expect(result).toBe(candidates);
  });

  it('leads with valid picks and backfills below the weakest pick', async () => {
    const client = oracle([
      { id: 'c05', score: 0.9, reasons: ['Policy'] },
      { id: 'zzz', score: 0.8, reasons: [] },
      { id: 'c05', score: 0.7, reasons: [] },
      { id: 'c02', score: 0.6, reasons: [] },
    ]);
    const candidates = ranked(12).map((c) => (c.article.id === 'c05' ? { ...c, reasons: ['Very fresh'] } : c));

    const result = await new RerankerScorer(client, sizing).score(makeGlobalQuery({ take: 12 }), candidates);
    const byId = new Map(result.map((c) => [c.article.id, c]));

    expect(client.rerank).toHaveBeenCalledWith(expect.any(Array), 12, undefined);
    expect(byId.get('c05')).toMatchObject({ finalScore: 0.9, reranked: true, reasons: ['Very fresh', 'Policy'] });
    expect(byId.get('c02')?.finalScore).toBe(0.6);
    // Ten backfill items: minPick * (n - i) / (n + 1)
    expect(byId.get('c01')?.finalScore).toBeCloseTo((0.6 * 10) / 11, 10);
    expect(byId.get('c03')?.finalScore).toBeCloseTo((0.6 * 9) / 11, 10);
    expect(byId.get('c12')?.finalScore).toBeCloseTo(0.6 / 11, 10);
    expect(byId.get('c01')?.reranked).toBe(false);
  });

  it('assembles the same number of scored items as the heuristic pool', async () => {
    const client = oracle([
      { id: 'c10', score: 0.8, reasons: [] },
      { id: 'c11', score: 0.5, reasons: [] },
      { id: 'c12', score: 0.3, reasons: [] },
    ]);
    const options = { storeCount: 20, maxCandidates: 20, enabled: true };

    const result = await new RerankerScorer(client, options).score(makeGlobalQuery({ take: 12 }), ranked(30));

    // poolSize = min(20, max(20, 24, 12)) = 20
    expect(result.filter((c) => c.finalScore > 0)).toHaveLength(20);
    expect(result.find((c) => c.article.id === 'c21')?.finalScore).toBe(0);
  });

  it('keeps heuristic order when the oracle returns nothing usable', async () => {
    const candidates = ranked(12);
    const result = await new RerankerScorer(oracle([{ id: 'nope', score: 1, reasons: [] }]), sizing).score(
      makeGlobalQuery(),
      candidates,
    );
    expect(result).toBe(candidates);
  });
});

describe('HeatScorer', () => {
  it('min-max normalizes final scores over the pool', async () => {
    const candidates = [2, 1, 0].map((s, i) => makeGlobalCandidate({ id: `h${i}` }, { finalScore: s, rawScore: s }));

    const result = await new HeatScorer({ storeCount: 20, maxCandidates: 80 }).score(makeGlobalQuery(), candidates);

    expect(result.map((c) => c.heat)).toEqual([1, 0.5, 0]);
  });

  it('gives candidates outside the pool zero heat', async () => {
    const candidates = [2, 1, 0.5].map((s, i) => makeGlobalCandidate({ id: `h${i}` }, { finalScore: s, rawScore: s }));

    const result = await new HeatScorer({ storeCount: 20, maxCandidates: 2 }).score(makeGlobalQuery(), candidates);

    expect(result.map((c) => c.heat)).toEqual([1, 0, 0]);
  });
});

describe('BaseScoreScorer', () => {
  it('normalizes blended strength and recency across the pool', async () => {
    const candidates = [
      makePersonalCandidate({ articleId: 'strong', scoreGlobal: 2, heat: 1 }, { ageHours: 1 }),
      makePersonalCandidate({ articleId: 'weak', scoreGlobal: 0, heat: 0 }, { ageHours: 9 }),
    ];

    const result = await new BaseScoreScorer().score(makePersonalQuery(), candidates);

    expect(result.map((c) => c.base)).toEqual([1, 0]);
  });
});

describe('MoodInterestScorer', () => {
  it('measures topic overlap with the user interests', async () => {
    const query = makePersonalQuery({ interestNames: [' AI ', 'space'] });
    const [scored] = await new MoodInterestScorer().score(query, [
      makePersonalCandidate({ topics: ['ai', 'Chips', 'Space', 'markets'] }),
    ]);

    expect(scored.interestOverlap).toBe(0.5);
    expect(scored.moodScore).toBe(0.5);
  });
});

describe('LearnedAffinityScorer', () => {
  it('sums learned feature scores through tanh', async () => {
    const query = makePersonalQuery({
      mood: 'Focused',
      profile: { source: new Map([['example wire', 2]]), tag: new Map([['ai', 2]]) },
    });

    const [scored] = await new LearnedAffinityScorer().score(query, [makePersonalCandidate({ title: 'Ok' }, { tags: ['AI'] })]);

    expect(scored.learnedAffinity).toBeCloseTo(0.5 * Math.tanh(1), 10);
  });
});

describe('VectorSimilarityScorer', () => {
  it('weights user and global centroid similarity', async () => {
    const query = makePersonalQuery({ mood: 'Calm', userCentroid: [1, 0], globalCentroid: [0, 1] });

    const [aligned, opposed, missing] = await new VectorSimilarityScorer().score(query, [
      makePersonalCandidate({ articleId: 'v1' }, { embedding: [3, 0] }),
      makePersonalCandidate({ articleId: 'v2' }, { embedding: [-1, 0] }),
      makePersonalCandidate({ articleId: 'v3' }, { embedding: null }),
    ]);

    expect(aligned.vectorBoost).toBeCloseTo(0.22, 10);
    expect(aligned.userSimilarity).toBeCloseTo(1, 10);
    expect(opposed.vectorBoost).toBe(0);
    expect(opposed.userSimilarity).toBeCloseTo(-1, 10);
    expect(missing.vectorBoost).toBe(0);
  });
});

describe('PersonalScoreCombiner', () => {
  const combiner = new PersonalScoreCombiner({ minDeltaFromGlobal: 0.12 });

  it('combines base, interest, mood and learned terms with the per-id jitter', async () => {
    const [scored] = await combiner.score(makePersonalQuery({ blend: 0.5 }), [
      makePersonalCandidate(
        { articleId: 'r1', heat: 0.5 },
        { base: 0.8, interestOverlap: 0.5, moodScore: 0.5, learnedAffinity: 0.1, ageHours: 2 },
      ),
    ]);

    // 0.8 * (1 + 1.05 * 0.5) + 0.1, times the jitter for "r1" (0.995 + 0.0062)
    expect(scored.personalScore).toBeCloseTo(1.32 * 0.9962, 10);
    expect(scored.reasons).toEqual(['Matches your topics']);
  });

  it('pulls down items hot on the global list but weak on mood', async () => {
    const query = makePersonalQuery({ blend: 0.5 });
    const make = (heat: number) =>
      makePersonalCandidate({ articleId: 'r1', heat }, { base: 0.6, moodScore: 0.55, ageHours: 1 });

    const [hot] = await combiner.score(query, [make(0.9)]);
    const [cold] = await combiner.score(query, [make(0.5)]);

    expect(hot.personalScore / cold.personalScore).toBeCloseTo(0.88, 10);
  });

  it('names the mood when the item fits it', async () => {
    const [scored] = await combiner.score(makePersonalQuery({ mood: 'Hyped' }), [
      makePersonalCandidate({ articleId: 'r1' }, { base: 0.5, moodScore: 0.7, ageHours: 1, userSimilarity: 0.6 }),
    ]);

    expect(scored.reasons).toEqual(['Tuned for Hyped', 'Matches your vibe history']);
  });
});
