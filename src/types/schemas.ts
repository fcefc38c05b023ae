import { z } from 'zod';
import { MOODS } from './index.js';
import type { Snapshot } from './index.js';

export const rankedItemSchema = z.object({
  articleId: z.string(),
  title: z.string(),
  sourceId: z.string(),
  publishedAt: z.string(),
  summary: z.string().nullable(),
  imageUrl: z.string().nullable(),
  scoreGlobal: z.number(),
  heat: z.number(),
  trend: z.enum(['NEW', 'UP', 'DOWN', 'STEADY']),
  reasons: z.array(z.string()),
  topics: z.array(z.string()),
  clusterId: z.string(),
  arousal: z.number().nullable().default(null),
});

export const snapshotSchema = z.object({
  date: z.string(),
  hour: z.number().int().min(0).max(23),
  updatedAt: z.string(),
  items: z.array(rankedItemSchema),
});

export const moodSchema = z.enum(MOODS);

/** Parse a stored snapshot document; null when it does not have the expected shape. */
export function parseSnapshot(value: unknown): Snapshot | null {
  const parsed = snapshotSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
