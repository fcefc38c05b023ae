/**
 * Candidate sources.
 *
 *   TodayArticlesSource: today's articles for the hourly generation cycle
 *   SnapshotPoolSource:  recent snapshot items for the personal overlay
 */

import type { Source } from './interfaces.js';
import type { GlobalQuery, GlobalCandidate, PersonalQuery, PersonalCandidate } from './types.js';
import type { Article, ArticleStore, RankedItem } from '../types/index.js';
import { moodLookbackHours } from './mood.js';
import { coarseBucket } from './topics.js';
import { hoursBetween } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

export interface TodayArticlesSourceOptions {
  limit: number;
  minResults: number;
  /** Widened window, by ingestion time, used when the day is thin. */
  fallbackWindowHours: number;
}

const DEFAULT_TODAY_OPTIONS: TodayArticlesSourceOptions = {
  limit: 400,
  minResults: 10,
  fallbackWindowHours: 24,
};

export function toGlobalCandidate(article: Article): GlobalCandidate {
  return {
    article,
    clusterKey: '',
    clusterSize: 1,
    corroboration: 1,
    rawScore: 0,
    finalScore: 0,
    heat: 0,
    reasons: [],
    topics: [],
    reranked: false,
  };
}

/**
 * Articles published between local midnight and now. When fewer than
 * `minResults` come back, articles ingested within the widened window are
 * merged in by id.
 *
 * Required: a store failure aborts the generation cycle rather than writing
 * an empty snapshot over a good hour.
 */
export class TodayArticlesSource implements Source<GlobalQuery, GlobalCandidate> {
  name = 'TodayArticlesSource';
  required = true;
  private options: TodayArticlesSourceOptions;

  constructor(
    private articles: ArticleStore,
    options?: Partial<TodayArticlesSourceOptions>,
  ) {
    this.options = { ...DEFAULT_TODAY_OPTIONS, ...options };
  }

  enable(): boolean {
    return true;
  }

  async getCandidates(query: GlobalQuery): Promise<GlobalCandidate[]> {
    const today = await this.articles.queryByTimeWindow({
      start: query.windowStart,
      end: query.now,
      field: 'publishedAt',
      limit: this.options.limit,
    });

    if (today.length >= this.options.minResults) {
      return today.map(toGlobalCandidate);
    }

    const widenedStart = new Date(
      query.now.getTime() - this.options.fallbackWindowHours * 60 * 60 * 1000,
    );
    const more = await this.articles.queryByTimeWindow({
      start: widenedStart,
      end: query.now,
      field: 'createdAt',
      limit: this.options.limit,
    });

    const seen = new Set(today.map((a) => a.id));
    const merged = [...today];
    for (const a of more) {
      if (!seen.has(a.id)) {
        seen.add(a.id);
        merged.push(a);
      }
    }

    logger.debug(
      { requestId: query.requestId, today: today.length, merged: merged.length },
      'Thin day, widened article window',
    );
    return merged.map(toGlobalCandidate);
  }
}

export function toPersonalCandidate(item: RankedItem, now: Date): PersonalCandidate {
  return {
    item,
    bucket: coarseBucket(item.topics),
    tags: item.topics,
    interestMatches: [],
    embedding: null,
    ageHours: hoursBetween(new Date(item.publishedAt), now),
    base: 0,
    interestOverlap: 0,
    moodScore: 0.5,
    learnedAffinity: 0,
    vectorBoost: 0,
    userSimilarity: 0,
    personalScore: 0,
    reasons: [...item.reasons],
  };
}

/**
 * Distinct items from the last N hours of today's snapshots, newest hour
 * first. N comes from the mood and blend. A pool smaller than twice the
 * target falls back to the current hour alone.
 */
export class SnapshotPoolSource implements Source<PersonalQuery, PersonalCandidate> {
  name = 'SnapshotPoolSource';
  required = true;

  enable(): boolean {
    return true;
  }

  async getCandidates(query: PersonalQuery): Promise<PersonalCandidate[]> {
    const lookback = moodLookbackHours(query.mood, query.blend);
    const fromHour = Math.max(0, query.currentHour - lookback + 1);

    const recent = query.hours
      .filter((h) => h.hour >= fromHour && h.hour <= query.currentHour)
      .sort((a, b) => b.hour - a.hour);

    const seen = new Set<string>();
    let pool: RankedItem[] = [];
    for (const h of recent) {
      for (const it of h.snapshot.items) {
        if (!it.articleId || seen.has(it.articleId)) continue;
        seen.add(it.articleId);
        pool.push(it);
      }
    }

    if (pool.length < query.target * 2) {
      pool = query.currentItems;
    }

    logger.debug(
      { requestId: query.requestId, lookback, pool: pool.length },
      'Personal pool built',
    );
    return pool.map((it) => toPersonalCandidate(it, query.now));
  }
}
