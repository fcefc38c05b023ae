import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import { parseMood } from '../pipeline/mood.js';
import { chunk, clamp } from '../utils/helpers.js';
import type { Interest, MoodSetting, UserStore } from '../types/index.js';

const DEFAULT_BLEND = 0.3;
const SAVED_LOOKUP_CHUNK = 10;

const moodRowSchema = z.object({
  mood: z.string().nullable(),
  blend: z.number().nullable(),
});

const interestRowSchema = z.object({ id: z.string(), name: z.string() });
const interestIdRowSchema = z.object({ interest_id: z.string() });
const savedRowSchema = z.object({ article_id: z.string() });

export const userRepository: UserStore = {
  async getMoodSetting(userId: string): Promise<MoodSetting | null> {
    const { data, error } = await supabase
      .from('user_moods')
      .select('mood, blend')
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      logger.error({ error, userId }, 'Failed to fetch mood setting');
      throw error;
    }
    if (!data) return null;

    const row = moodRowSchema.safeParse(data);
    if (!row.success) return null;
    return {
      mood: parseMood(row.data.mood),
      blend: clamp(row.data.blend ?? DEFAULT_BLEND, 0, 1),
    };
  },

  async getInterestNames(userId: string): Promise<string[]> {
    const { data: links, error } = await supabase
      .from('user_interests')
      .select('interest_id')
      .eq('user_id', userId);

    if (error) {
      logger.error({ error, userId }, 'Failed to fetch user interests');
      throw error;
    }

    const ids = z.array(interestIdRowSchema).parse(links ?? []).map((r) => r.interest_id);
    if (ids.length === 0) return [];

    const { data: rows, error: namesError } = await supabase
      .from('interests')
      .select('id, name')
      .in('id', ids);

    if (namesError) {
      logger.error({ error: namesError, userId }, 'Failed to resolve interest names');
      throw namesError;
    }

    return z.array(interestRowSchema).parse(rows ?? []).map((r) => r.name);
  },

  /** Which of `articleIds` the user saved. Looked up in chunks of 10, concurrently. */
  async savedSet(userId: string, articleIds: string[]): Promise<Set<string>> {
    const batches = await Promise.all(
      chunk(articleIds, SAVED_LOOKUP_CHUNK).map(async (batch) => {
        const { data, error } = await supabase
          .from('user_saves')
          .select('article_id')
          .eq('user_id', userId)
          .in('article_id', batch);

        if (error) {
          logger.error({ error, userId }, 'Failed to fetch saved articles');
          throw error;
        }
        return z.array(savedRowSchema).parse(data ?? []).map((r) => r.article_id);
      }),
    );
    return new Set(batches.flat());
  },

  async listInterests(): Promise<Interest[]> {
    const { data, error } = await supabase.from('interests').select('id, name');

    if (error) {
      logger.error({ error }, 'Failed to list interests');
      throw error;
    }

    return z.array(interestRowSchema).parse(data ?? []);
  },
};
