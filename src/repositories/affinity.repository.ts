import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import { moodSchema } from '../types/schemas.js';
import type {
  AffinityStore,
  FeatureAffinity,
  FeatureType,
  FeedbackEvent,
  Mood,
  MoodCentroid,
} from '../types/index.js';

const FEATURE_TYPES = ['source', 'interest', 'tag', 'token', 'genre', 'event', 'format'] as const;

const affinityRowSchema = z.object({
  user_id: z.string(),
  mood: moodSchema,
  type: z.enum(FEATURE_TYPES),
  key: z.string(),
  score: z.number(),
  count: z.number().int(),
  updated_at: z.string(),
  last_event_id: z.string().nullish().transform((v) => v ?? null),
});

const centroidRowSchema = z.object({
  user_id: z.string().nullable(),
  mood: moodSchema,
  vector: z.array(z.number()),
  count: z.number().int(),
  updated_at: z.string(),
  last_event_id: z.string().nullish().transform((v) => v ?? null),
});

/** Document id of one (user, mood, type, key) affinity. */
export function affinityId(userId: string, mood: Mood, type: FeatureType, key: string): string {
  return `${userId}|${mood}|${type}|${key}`;
}

/** Document id of a centroid. User ids are prefixed so none can take the global slot. */
export function centroidId(userId: string | null, mood: Mood): string {
  return userId === null ? `global|${mood}` : `user:${userId}|${mood}`;
}

function toAffinity(raw: unknown): FeatureAffinity | null {
  const parsed = affinityRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    userId: r.user_id,
    mood: r.mood,
    type: r.type,
    key: r.key,
    score: r.score,
    count: r.count,
    updatedAt: r.updated_at,
    lastEventId: r.last_event_id,
  };
}

function toCentroid(raw: unknown): MoodCentroid | null {
  const parsed = centroidRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    userId: r.user_id,
    mood: r.mood,
    vector: r.vector,
    count: r.count,
    updatedAt: r.updated_at,
    lastEventId: r.last_event_id,
  };
}

export const affinityRepository: AffinityStore = {
  async getAffinity(userId, mood, type, key) {
    const { data, error } = await supabase
      .from('feature_affinities')
      .select('user_id, mood, type, key, score, count, updated_at, last_event_id')
      .eq('id', affinityId(userId, mood, type, key))
      .maybeSingle();

    if (error) {
      logger.error({ error, userId, mood, type }, 'Failed to fetch feature affinity');
      throw error;
    }

    return data ? toAffinity(data) : null;
  },

  async setAffinity(affinity) {
    const { error } = await supabase.from('feature_affinities').upsert(
      {
        id: affinityId(affinity.userId, affinity.mood, affinity.type, affinity.key),
        user_id: affinity.userId,
        mood: affinity.mood,
        type: affinity.type,
        key: affinity.key,
        score: affinity.score,
        count: affinity.count,
        updated_at: affinity.updatedAt,
        last_event_id: affinity.lastEventId,
      },
      { onConflict: 'id' },
    );

    if (error) {
      logger.error({ error, userId: affinity.userId, type: affinity.type }, 'Failed to write feature affinity');
      throw error;
    }
  },

  async listAffinities(userId, mood) {
    const { data, error } = await supabase
      .from('feature_affinities')
      .select('user_id, mood, type, key, score, count, updated_at, last_event_id')
      .eq('user_id', userId)
      .eq('mood', mood);

    if (error) {
      logger.error({ error, userId, mood }, 'Failed to list feature affinities');
      throw error;
    }

    const out: FeatureAffinity[] = [];
    for (const row of data ?? []) {
      const a = toAffinity(row);
      if (a) out.push(a);
    }
    return out;
  },

  async getCentroid(userId, mood) {
    const { data, error } = await supabase
      .from('mood_centroids')
      .select('user_id, mood, vector, count, updated_at, last_event_id')
      .eq('id', centroidId(userId, mood))
      .maybeSingle();

    if (error) {
      logger.error({ error, userId, mood }, 'Failed to fetch mood centroid');
      throw error;
    }

    return data ? toCentroid(data) : null;
  },

  async setCentroid(centroid) {
    const { error } = await supabase.from('mood_centroids').upsert(
      {
        id: centroidId(centroid.userId, centroid.mood),
        user_id: centroid.userId,
        mood: centroid.mood,
        vector: centroid.vector,
        count: centroid.count,
        updated_at: centroid.updatedAt,
        last_event_id: centroid.lastEventId,
      },
      { onConflict: 'id' },
    );

    if (error) {
      logger.error({ error, userId: centroid.userId, mood: centroid.mood }, 'Failed to write mood centroid');
      throw error;
    }
  },

  async appendFeedback(event: FeedbackEvent) {
    const { error } = await supabase.from('feedback_events').insert({
      id: event.id,
      user_id: event.userId,
      article_id: event.articleId,
      mood: event.mood,
      action: event.action,
      positive: event.positive,
      created_at: event.createdAt,
    });

    if (error) {
      logger.error({ error, userId: event.userId, articleId: event.articleId }, 'Failed to append feedback event');
      throw error;
    }
  },

  async hasFeedback(eventId: string) {
    const { count, error } = await supabase
      .from('feedback_events')
      .select('id', { count: 'exact', head: true })
      .eq('id', eventId);

    if (error) {
      logger.error({ error, eventId }, 'Failed to look up feedback event');
      throw error;
    }

    return (count ?? 0) > 0;
  },
};
