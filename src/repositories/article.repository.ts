import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import type { Article, ArticleStore, MoodFeatures, TimeWindowQuery } from '../types/index.js';

const num = z.number().nullish().transform((v) => v ?? null);
const str = z.string().nullish().transform((v) => v ?? null);
const strings = z.array(z.string()).nullish().transform((v) => v ?? []);
const timestamp = z.string().refine((v) => !Number.isNaN(Date.parse(v)), 'Invalid timestamp');

const featuresSchema = z.object({
  arousal: num,
  sentiment: num,
  depth: num,
  conflict: num,
  practicality: num,
  optimism: num,
  novelty: num,
  humanInterest: num,
  hype: num,
  explainer: num,
  analysis: num,
  wholesome: num,
  readMinutes: num,
  genre: str,
  eventStage: str,
  format: str,
});

const EMPTY_FEATURES: MoodFeatures = featuresSchema.parse({});

const articleRowSchema = z.object({
  id: z.string(),
  url: str,
  source_id: str,
  title: str,
  summary: str,
  image_url: str,
  published_at: timestamp,
  created_at: timestamp,
  tags: strings,
  interest_matches: strings,
  vibe: str,
  features: featuresSchema.nullish(),
  embedding: z.array(z.number()).nullish().transform((v) => v ?? null),
});

type ArticleRow = z.infer<typeof articleRowSchema>;

const COLUMNS =
  'id, url, source_id, title, summary, image_url, published_at, created_at, tags, interest_matches, vibe, features, embedding';

function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    url: row.url,
    sourceId: row.source_id,
    title: row.title ?? '',
    summary: row.summary,
    imageUrl: row.image_url,
    publishedAt: new Date(row.published_at),
    createdAt: new Date(row.created_at),
    tags: row.tags,
    interestMatches: row.interest_matches,
    vibe: row.vibe,
    features: row.features ?? EMPTY_FEATURES,
    embedding: row.embedding,
  };
}

/** Rows that fail to parse are skipped and logged rather than failing the batch. */
function toArticles(rows: unknown[]): Article[] {
  const out: Article[] = [];
  for (const raw of rows) {
    const parsed = articleRowSchema.safeParse(raw);
    if (parsed.success) {
      out.push(toArticle(parsed.data));
    } else {
      logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed article row');
    }
  }
  return out;
}

const WINDOW_COLUMN: Record<TimeWindowQuery['field'], string> = {
  publishedAt: 'published_at',
  createdAt: 'created_at',
};

export const articleRepository: ArticleStore = {
  async queryByTimeWindow(query: TimeWindowQuery): Promise<Article[]> {
    const column = WINDOW_COLUMN[query.field];
    const { data, error } = await supabase
      .from('articles')
      .select(COLUMNS)
      .gte(column, query.start.toISOString())
      .lte(column, query.end.toISOString())
      .order(column, { ascending: false })
      .limit(query.limit);

    if (error) {
      logger.error({ error, field: query.field }, 'Failed to query articles by time window');
      throw error;
    }

    return toArticles(data ?? []);
  },

  async getById(id: string): Promise<Article | null> {
    const { data, error } = await supabase
      .from('articles')
      .select(COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) {
      logger.error({ error, id }, 'Failed to fetch article');
      throw error;
    }

    return data ? (toArticles([data])[0] ?? null) : null;
  },

  async getByIds(ids: string[]): Promise<Article[]> {
    if (ids.length === 0) return [];
    const { data, error } = await supabase.from('articles').select(COLUMNS).in('id', ids);

    if (error) {
      logger.error({ error, count: ids.length }, 'Failed to fetch articles by id');
      throw error;
    }

    return toArticles(data ?? []);
  },
};
