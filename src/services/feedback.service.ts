import { randomUUID } from 'crypto';
import type {
  AffinityProfile,
  AffinityStore,
  ArticleStore,
  FeatureAffinity,
  FeedbackAction,
  LearningStateReader,
  Mood,
  MoodCentroid,
  MoodCentroids,
} from '../types/index.js';
import { POSITIVE_ACTIONS } from '../types/index.js';
import { extractFeatures } from '../pipeline/features.js';
import type { Feature } from '../pipeline/features.js';
import { normalize, updateCentroid } from '../pipeline/vector.js';
import { clamp } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { InterestMatcher } from './interest-matcher.service.js';

/** Feature EMA step. */
export const ALPHA_FEATURE = 0.35;
export const ALPHA_USER_POSITIVE = 0.12;
export const ALPHA_USER_NEGATIVE = 0.08;
export const ALPHA_GLOBAL_POSITIVE = 0.03;

export interface FeedbackInput {
  /** Stable id of the feedback event; redelivering the same id is a no-op. */
  eventId?: string;
  userId: string;
  articleId: string;
  mood: Mood;
  action: FeedbackAction;
}

export interface FeedbackServiceDeps {
  articles: ArticleStore;
  affinities: AffinityStore;
  /** Fills interest matches for articles ingested without any. */
  matcher?: InterestMatcher | null;
  now?: () => Date;
  newId?: () => string;
}

export function isPositive(action: FeedbackAction): boolean {
  return POSITIVE_ACTIONS.has(action);
}

/** One EMA step toward the clamped signal. */
export function emaStep(previous: number, signal: number, alpha = ALPHA_FEATURE): number {
  return clamp((1 - alpha) * previous + alpha * clamp(signal, -1, 1), -1, 1);
}

interface CentroidStep {
  eventId: string;
  userId: string | null;
  mood: Mood;
  sample: number[];
  toward: boolean;
  alpha: number;
  at: string;
}

function dedupeFeatures(features: Feature[]): Feature[] {
  const seen = new Set<string>();
  return features.filter((f) => {
    const id = `${f.type}|${f.key}`;
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

/**
 * Online learning from explicit feedback: an append-only event log, per-mood
 * feature EMAs, and user and global mood centroids. The only writer of
 * learning state; the personal overlay reads it through LearningStateReader.
 *
 * Processing is idempotent per event id: each affinity and centroid row
 * records the last event applied to it, and the event is logged only after
 * every row is written, so a retried job finishes what a failed attempt left.
 * Concurrent events on the same key are last-writer-wins.
 */
export class FeedbackService implements LearningStateReader {
  private now: () => Date;
  private newId: () => string;

  constructor(private deps: FeedbackServiceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  /** Returns false when the article is unknown and nothing was recorded. */
  async recordFeedback(input: FeedbackInput): Promise<boolean> {
    const eventId = input.eventId ?? this.newId();
    if (await this.deps.affinities.hasFeedback(eventId)) {
      logger.debug({ eventId, userId: input.userId }, 'Feedback event already applied');
      return true;
    }

    const article = await this.deps.articles.getById(input.articleId);
    if (!article) {
      logger.info({ userId: input.userId, articleId: input.articleId }, 'Feedback for unknown article ignored');
      return false;
    }

    const positive = isPositive(input.action);
    const at = this.now().toISOString();

    let interestMatches = article.interestMatches;
    if (interestMatches.length === 0 && this.deps.matcher) {
      interestMatches = await this.deps.matcher.match(article.title, article.summary);
    }

    const features = dedupeFeatures(
      extractFeatures({
        sourceId: article.sourceId,
        interestMatches,
        tags: article.tags,
        title: article.title,
        genre: article.features.genre,
        eventStage: article.features.eventStage,
        format: article.features.format,
      }),
    );

    const signal = positive ? 1 : -1;
    await Promise.all(
      features.map(async (f) => {
        const prev = await this.deps.affinities.getAffinity(input.userId, input.mood, f.type, f.key);
        if (prev?.lastEventId === eventId) return;
        const next: FeatureAffinity = {
          userId: input.userId,
          mood: input.mood,
          type: f.type,
          key: f.key,
          score: emaStep(prev?.score ?? 0, signal),
          count: (prev?.count ?? 0) + 1,
          updatedAt: at,
          lastEventId: eventId,
        };
        await this.deps.affinities.setAffinity(next);
      }),
    );

    if (article.embedding && article.embedding.length > 0) {
      const sample = normalize(article.embedding);
      const step = { eventId, mood: input.mood, sample, at };
      await this.nudgeCentroid({
        ...step,
        userId: input.userId,
        toward: positive,
        alpha: positive ? ALPHA_USER_POSITIVE : ALPHA_USER_NEGATIVE,
      });
      if (positive) {
        await this.nudgeCentroid({ ...step, userId: null, toward: true, alpha: ALPHA_GLOBAL_POSITIVE });
      }
    }

    await this.deps.affinities.appendFeedback({
      id: eventId,
      userId: input.userId,
      articleId: input.articleId,
      mood: input.mood,
      action: input.action,
      positive,
      createdAt: at,
    });

    logger.info(
      {
        eventId,
        userId: input.userId,
        articleId: input.articleId,
        mood: input.mood,
        action: input.action,
        features: features.length,
      },
      'Feedback recorded',
    );
    return true;
  }

  async getProfile(userId: string, mood: Mood): Promise<AffinityProfile> {
    const rows = await this.deps.affinities.listAffinities(userId, mood);
    const profile: AffinityProfile = {};
    for (const r of rows) {
      let byKey = profile[r.type];
      if (!byKey) {
        byKey = new Map();
        profile[r.type] = byKey;
      }
      byKey.set(r.key, r.score);
    }
    return profile;
  }

  async getCentroids(userId: string, mood: Mood): Promise<MoodCentroids> {
    const [user, global] = await Promise.all([
      this.deps.affinities.getCentroid(userId, mood),
      this.deps.affinities.getCentroid(null, mood),
    ]);
    const unit = (c: MoodCentroid | null) => (c && c.vector.length > 0 ? normalize(c.vector) : null);
    return { user: unit(user), global: unit(global) };
  }

  private async nudgeCentroid(step: CentroidStep): Promise<void> {
    const current = await this.deps.affinities.getCentroid(step.userId, step.mood);
    if (current?.lastEventId === step.eventId) return;
    await this.deps.affinities.setCentroid({
      userId: step.userId,
      mood: step.mood,
      vector: updateCentroid(current?.vector ?? null, step.sample, step.toward, step.alpha),
      count: Math.max(1, (current?.count ?? 0) + 1),
      updatedAt: step.at,
      lastEventId: step.eventId,
    });
  }
}
