/**
 * Candidate scorers.
 *
 * Global (generation) pipeline:
 *   1. HeuristicScorer: recency, corroboration, arousal, authority, event keywords
 *   2. RerankerScorer:  external oracle over the top window, heuristic backfill
 *   3. HeatScorer:      min-max heat over the assembled list
 *
 * Personal (overlay) pipeline:
 *   1. BaseScoreScorer:        pool-normalized global strength + recency
 *   2. MoodInterestScorer:     interest overlap and mood fit
 *   3. LearnedAffinityScorer:  feedback-learned feature affinities
 *   4. VectorSimilarityScorer: closeness to the user's and global mood centroids
 *   5. PersonalScoreCombiner:  weights, penalties, jitter and reasons
 */

import type { Scorer } from './interfaces.js';
import type { GlobalQuery, GlobalCandidate, PersonalQuery, PersonalCandidate } from './types.js';
import type { Article, RerankerClient, RerankInput } from '../types/index.js';
import { assembleSize, poolSize } from './sizing.js';
import type { GlobalSizing } from './sizing.js';
import { moodScore } from './mood.js';
import { learnedAffinity } from './features.js';
import { cosine, normalize } from './vector.js';
import {
  clamp,
  distinct,
  hoursBetween,
  minMaxNormalize,
  stableHashPercent,
} from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

const MAX_REASONS = 4;

/** finalScore desc, then rawScore desc, then id; a total order for the generation pipeline. */
export function compareByFinalScore(a: GlobalCandidate, b: GlobalCandidate): number {
  return (
    b.finalScore - a.finalScore ||
    b.rawScore - a.rawScore ||
    (a.article.id < b.article.id ? -1 : a.article.id > b.article.id ? 1 : 0)
  );
}

function compareByRawScore(a: GlobalCandidate, b: GlobalCandidate): number {
  return (
    b.rawScore - a.rawScore ||
    (a.article.id < b.article.id ? -1 : a.article.id > b.article.id ? 1 : 0)
  );
}

// ---------------------------------------------------------------------------
// Heuristic importance
// ---------------------------------------------------------------------------

export interface HeuristicScorerOptions {
  tier1Sources: string[];
  boostKeywords: string[];
  penaltyKeywords: string[];
}

export interface HeuristicScore {
  raw: number;
  eventBoost: number;
  reasons: string[];
}

const CASUALTY_PATTERN = /\b\d+\s+(dead|killed|injured)\b/;
const LEGAL_PATTERN = /\b(ban|verdict|ruling|fine|sanction|tariff|indictment)\b/;

const BOOST_PER_KEYWORD = 0.25;
const PENALTY_PER_KEYWORD = 0.35;
const CASUALTY_BOOST = 0.25;
const LEGAL_BOOST = 0.2;
const TIER1_AUTHORITY = 1.25;

/**
 * Relative importance of one cluster representative. The value only has
 * meaning compared against other articles in the same cycle.
 *
 *   raw = (recency * 1.1 + log10(1 + corroboration) * 0.7 + arousal * 0.25) * authority + eventBoost
 */
export class HeuristicScorer implements Scorer<GlobalQuery, GlobalCandidate> {
  name = 'HeuristicScorer';
  private tier1: Set<string>;
  private boost: string[];
  private penalty: string[];

  constructor(options: HeuristicScorerOptions) {
    this.tier1 = new Set(options.tier1Sources.map((s) => s.trim().toLowerCase()));
    this.boost = options.boostKeywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0);
    this.penalty = options.penaltyKeywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0);
  }

  enable(): boolean {
    return true;
  }

  async score(query: GlobalQuery, candidates: GlobalCandidate[]): Promise<GlobalCandidate[]> {
    return candidates.map((c) => {
      const h = this.evaluate(c.article, c.corroboration, query.now);
      return { ...c, rawScore: h.raw, finalScore: h.raw, reasons: h.reasons };
    });
  }

  evaluate(article: Article, corroboration: number, now: Date): HeuristicScore {
    const hours = Math.max(0.5, hoursBetween(article.publishedAt, now));
    const recency = 1 / Math.pow(hours, 0.45);
    const arousal = article.features.arousal ?? 0.5;
    const isTier1 = article.sourceId !== null && this.tier1.has(article.sourceId.trim().toLowerCase());
    const authority = isTier1 ? TIER1_AUTHORITY : 1;

    const text = `${article.title} ${article.summary ?? ''} ${article.tags.join(' ')}`.toLowerCase();
    let eventBoost = 0;
    for (const k of this.boost) if (text.includes(k)) eventBoost += BOOST_PER_KEYWORD;
    for (const k of this.penalty) if (text.includes(k)) eventBoost -= PENALTY_PER_KEYWORD;
    if (CASUALTY_PATTERN.test(text)) eventBoost += CASUALTY_BOOST;
    if (LEGAL_PATTERN.test(text)) eventBoost += LEGAL_BOOST;

    const raw =
      (recency * 1.1 + Math.log10(1 + corroboration) * 0.7 + arousal * 0.25) * authority + eventBoost;

    const reasons: string[] = [];
    if (corroboration >= 2) reasons.push('Multi-source');
    if (isTier1) reasons.push('Tier-1 source');
    if (eventBoost > 0.2) reasons.push('High-impact keywords');
    if (hours < 3) reasons.push('Very fresh');

    return { raw, eventBoost, reasons };
  }
}

// ---------------------------------------------------------------------------
// Reranker
// ---------------------------------------------------------------------------

export interface RerankerScorerOptions extends GlobalSizing {
  enabled: boolean;
  /** Oracle list length; defaults to the request's take. */
  topK?: number;
}

/** Smallest window worth an oracle call. */
const MIN_RERANK_WINDOW = 10;
const MIN_TOP_K = 6;
const MIN_PICK_SCORE = 0.0001;

export function rerankTopK(configured: number | undefined, take: number): number {
  return clamp(configured ?? take, MIN_TOP_K, Math.max(MIN_TOP_K, take));
}

function toRerankInput(c: GlobalCandidate): RerankInput {
  return {
    id: c.article.id,
    title: c.article.title,
    sourceId: c.article.sourceId ?? '',
    publishedAt: c.article.publishedAt,
    summary: c.article.summary,
    tags: c.topics,
  };
}

/**
 * Sends the top `maxCandidates` by raw score to the oracle. Oracle picks lead
 * with their own scores; the rest of the window backfills in heuristic order
 * with scores below the weakest pick, so the assembled list has the same
 * length the heuristic path would produce. Everything outside it scores 0.
 *
 * No picks (oracle down, timed out, malformed reply) leaves the heuristic
 * ordering in place. Caller cancellation propagates.
 */
export class RerankerScorer implements Scorer<GlobalQuery, GlobalCandidate> {
  name = 'RerankerScorer';

  constructor(
    private client: RerankerClient | null,
    private options: RerankerScorerOptions,
  ) {}

  enable(query: GlobalQuery): boolean {
    return !query.heuristicsOnly && this.options.enabled && this.client !== null;
  }

  async score(query: GlobalQuery, candidates: GlobalCandidate[]): Promise<GlobalCandidate[]> {
    const client = this.client;
    if (!client) return candidates;

    const window = [...candidates].sort(compareByRawScore).slice(0, this.options.maxCandidates);
    if (window.length < MIN_RERANK_WINDOW) {
      logger.debug({ requestId: query.requestId, window: window.length }, 'Reranker skipped, window too small');
      return candidates;
    }

    const topK = rerankTopK(this.options.topK, query.take);
    const picks = await client.rerank(window.map(toRerankInput), topK, query.signal);

    const target = Math.min(window.length, assembleSize(this.options.storeCount, query.take));
    const inWindow = new Set(window.map((c) => c.article.id));
    const picked = new Map<string, { score: number; reasons: string[] }>();
    for (const p of picks) {
      if (picked.size >= target) break;
      if (!inWindow.has(p.id) || picked.has(p.id)) continue;
      picked.set(p.id, { score: Math.max(MIN_PICK_SCORE, p.score), reasons: p.reasons });
    }

    if (picked.size === 0) {
      logger.info(
        { requestId: query.requestId, window: window.length },
        'Reranker returned nothing usable, keeping heuristic order',
      );
      return candidates;
    }

    const minPick = Math.min(...[...picked.values()].map((p) => p.score));
    const backfill = window.filter((c) => !picked.has(c.article.id)).slice(0, target - picked.size);
    const n = backfill.length;
    const backfillScores = new Map<string, number>(
      backfill.map((c, i) => [c.article.id, (minPick * (n - i)) / (n + 1)]),
    );

    logger.info(
      { requestId: query.requestId, picks: picked.size, backfill: n, topK },
      'Reranker applied',
    );

    return candidates.map((c) => {
      const pick = picked.get(c.article.id);
      if (pick) {
        return {
          ...c,
          finalScore: pick.score,
          reranked: true,
          reasons: distinct([...c.reasons, ...pick.reasons]).slice(0, MAX_REASONS),
        };
      }
      return { ...c, finalScore: backfillScores.get(c.article.id) ?? 0 };
    });
  }
}

/** Heat: min-max of finalScore over the top pool; candidates outside it get 0. */
export class HeatScorer implements Scorer<GlobalQuery, GlobalCandidate> {
  name = 'HeatScorer';

  constructor(private sizing: GlobalSizing) {}

  enable(): boolean {
    return true;
  }

  async score(query: GlobalQuery, candidates: GlobalCandidate[]): Promise<GlobalCandidate[]> {
    const top = [...candidates].sort(compareByFinalScore).slice(0, poolSize(this.sizing, query.take));
    const heats = minMaxNormalize(top.map((c) => c.finalScore));
    const heatById = new Map(top.map((c, i) => [c.article.id, heats[i]]));
    return candidates.map((c) => ({ ...c, heat: heatById.get(c.article.id) ?? 0 }));
  }
}

// ---------------------------------------------------------------------------
// Personal overlay
// ---------------------------------------------------------------------------

export class BaseScoreScorer implements Scorer<PersonalQuery, PersonalCandidate> {
  name = 'BaseScoreScorer';

  enable(): boolean {
    return true;
  }

  async score(_query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    const blended = candidates.map((c) => {
      const hours = Math.max(0.25, c.ageHours);
      const recency = 1 / Math.pow(hours, 0.45);
      return 0.7 * Math.max(c.item.scoreGlobal, c.item.heat) + 0.3 * recency;
    });
    const base = minMaxNormalize(blended);
    return candidates.map((c, i) => ({ ...c, base: base[i] }));
  }
}

export class MoodInterestScorer implements Scorer<PersonalQuery, PersonalCandidate> {
  name = 'MoodInterestScorer';

  enable(): boolean {
    return true;
  }

  async score(query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    const interests = new Set(
      query.interestNames.map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0),
    );

    return candidates.map((c) => {
      const topics = c.item.topics.map((t) => t.trim().toLowerCase());
      const overlap =
        topics.length === 0 ? 0 : topics.filter((t) => interests.has(t)).length / topics.length;
      return {
        ...c,
        interestOverlap: overlap,
        moodScore: moodScore(query.mood, query.blend, {
          title: c.item.title,
          summary: c.item.summary,
          topics: c.item.topics,
          ageHours: c.ageHours,
          arousal: c.item.arousal,
        }),
      };
    });
  }
}

/** Learned state is per mood, so this is a no-op without one. */
export class LearnedAffinityScorer implements Scorer<PersonalQuery, PersonalCandidate> {
  name = 'LearnedAffinityScorer';

  enable(query: PersonalQuery): boolean {
    return query.mood !== null;
  }

  async score(query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      learnedAffinity: learnedAffinity(query.profile, {
        sourceId: c.item.sourceId || null,
        interestMatches: c.interestMatches,
        tags: c.tags,
        title: c.item.title,
      }),
    }));
  }
}

const USER_CENTROID_WEIGHT = 0.22;
const GLOBAL_CENTROID_WEIGHT = 0.18;

export class VectorSimilarityScorer implements Scorer<PersonalQuery, PersonalCandidate> {
  name = 'VectorSimilarityScorer';

  enable(query: PersonalQuery): boolean {
    return query.mood !== null && (query.userCentroid !== null || query.globalCentroid !== null);
  }

  async score(query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    return candidates.map((c) => {
      if (!c.embedding || c.embedding.length === 0) return c;
      const unit = normalize(c.embedding);
      const user = query.userCentroid ? cosine(unit, query.userCentroid) : null;
      const global = query.globalCentroid ? cosine(unit, query.globalCentroid) : null;
      return {
        ...c,
        userSimilarity: user ?? 0,
        vectorBoost:
          USER_CENTROID_WEIGHT * Math.max(0, user ?? 0) +
          GLOBAL_CENTROID_WEIGHT * Math.max(0, global ?? 0),
      };
    });
  }
}

export interface PersonalScoreCombinerOptions {
  /** Penalty for items already hot globally but weak on mood. */
  minDeltaFromGlobal: number;
}

/**
 * personal = base * (1 + W_interest * overlap + W_mood * (mood - 0.5)),
 * then age damping, off-mood and global-overlap penalties, the additive
 * learned and vector terms, and a per-id jitter in [0.995, 1.005).
 *
 * Higher blend (challenge) weighs mood more and damps older items harder;
 * lower blend (comfort) weighs interest overlap more.
 */
export class PersonalScoreCombiner implements Scorer<PersonalQuery, PersonalCandidate> {
  name = 'PersonalScoreCombiner';

  constructor(private options: PersonalScoreCombinerOptions) {}

  enable(): boolean {
    return true;
  }

  async score(query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    const blend = query.blend;
    const wMood = 1.25 + (blend - 0.5) * 0.6;
    const wInterest = 1.05 + (0.5 - blend) * 0.3;
    const ageDamp = 0.92 - blend * 0.06;
    const offMoodCap = blend <= 0.5 ? 0.08 : 0.05;

    return candidates.map((c) => {
      let personal = c.base * (1 + wInterest * c.interestOverlap + wMood * (c.moodScore - 0.5));
      if (Math.max(0.25, c.ageHours) > 6) personal *= ageDamp;
      if (c.moodScore < 0.48) personal *= 1 - Math.min(offMoodCap, 0.48 - c.moodScore);
      if (c.item.heat >= 0.85 && c.moodScore < 0.62) personal *= 1 - this.options.minDeltaFromGlobal;
      personal += c.learnedAffinity + c.vectorBoost;
      personal *= 0.995 + (0.01 * stableHashPercent(c.item.articleId)) / 100;

      const reasons = [...c.reasons];
      if (c.interestOverlap > 0.15) reasons.push('Matches your topics');
      if (query.mood !== null && c.moodScore > 0.55) reasons.push(`Tuned for ${query.mood}`);
      if (c.userSimilarity > 0.52) reasons.push('Matches your vibe history');

      return {
        ...c,
        personalScore: Math.max(0.0001, personal),
        reasons: distinct(reasons).slice(0, MAX_REASONS),
      };
    });
  }
}
