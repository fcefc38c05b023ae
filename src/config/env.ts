import 'dotenv/config';
import { z } from 'zod';

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const csv = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  REDIS_URL: z.string().default('redis://localhost:6379'),

  PULSE_TIMEZONE: z.string().default('America/New_York'),
  PULSE_TAKE: z.coerce.number().int().positive().default(12),
  PULSE_SNAPSHOT_CRON: z.string().default('0 * * * *'),
  PULSE_FALLBACK_WINDOW_HOURS: z.coerce.number().positive().default(24),
  PULSE_STORE_COUNT: z.coerce.number().int().default(60),
  PULSE_PER_SOURCE_CAP: z.coerce.number().int().default(3),
  PULSE_PER_BUCKET_CAP: z.coerce.number().int().default(12),
  PULSE_WARMUP_MINUTES: z.coerce.number().int().default(5),
  PULSE_ON_DEMAND_AFTER_MINUTES: z.coerce.number().int().default(8),
  PULSE_TIER1_SOURCES: csv.optional(),
  PULSE_BOOST_KEYWORDS: csv.optional(),
  PULSE_PENALTY_KEYWORDS: csv.optional(),

  PULSE_PERSONAL_PER_SOURCE_CAP: z.coerce.number().int().default(2),
  PULSE_PERSONAL_MIN_BUCKETS: z.coerce.number().int().default(4),
  PULSE_PERSONAL_MIN_DELTA_FROM_GLOBAL: z.coerce.number().default(0.12),

  RERANKER_ENABLED: bool.default('true'),
  RERANKER_BASE_URL: z.string().url().default('https://api.openai.com'),
  RERANKER_API_KEY: z.string().optional(),
  RERANKER_MODEL: z.string().default('gpt-4o-mini'),
  RERANKER_MAX_CANDIDATES: z.coerce.number().int().default(80),
  RERANKER_TOP_K: z.coerce.number().int().optional(),
  RERANKER_TIMEOUT_SECONDS: z.coerce.number().default(12),

  EMBEDDING_BASE_URL: z.string().url().default('https://api.openai.com'),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
