import { env } from './config/env.js';
import { lexicon } from './config/lexicon.js';
import { articleRepository } from './repositories/article.repository.js';
import { snapshotRepository } from './repositories/snapshot.repository.js';
import { affinityRepository } from './repositories/affinity.repository.js';
import { userRepository } from './repositories/user.repository.js';
import { cacheService } from './services/cache.service.js';
import { OpenAiReranker } from './services/reranker.service.js';
import { OpenAiEmbedder } from './services/embedding.service.js';
import { InterestMatcher } from './services/interest-matcher.service.js';
import { FeedbackService } from './services/feedback.service.js';
import { PulseService } from './services/pulse.service.js';
import { createGlobalPipeline, createPersonalPipeline } from './pipeline/index.js';
import { clamp, clampInt } from './utils/helpers.js';
import { logger } from './utils/logger.js';

const reranker = env.RERANKER_API_KEY
  ? new OpenAiReranker({
      baseUrl: env.RERANKER_BASE_URL,
      apiKey: env.RERANKER_API_KEY,
      model: env.RERANKER_MODEL,
      timeoutSeconds: env.RERANKER_TIMEOUT_SECONDS,
    })
  : null;

const embedder = env.EMBEDDING_API_KEY
  ? new OpenAiEmbedder({
      baseUrl: env.EMBEDDING_BASE_URL,
      apiKey: env.EMBEDDING_API_KEY,
      model: env.EMBEDDING_MODEL,
    })
  : null;

const matcher = embedder ? new InterestMatcher(userRepository, embedder) : null;

const feedbackService = new FeedbackService({
  articles: articleRepository,
  affinities: affinityRepository,
  matcher,
});

const globalPipeline = createGlobalPipeline(
  { articles: articleRepository, snapshots: snapshotRepository, reranker },
  {
    storeCount: clampInt(env.PULSE_STORE_COUNT, 60, 20, 120),
    maxCandidates: clampInt(env.RERANKER_MAX_CANDIDATES, 80, 20, 200),
    perSourceCap: clampInt(env.PULSE_PER_SOURCE_CAP, 3, 1, 5),
    perBucketCap: clampInt(env.PULSE_PER_BUCKET_CAP, 12, 4, 24),
    fallbackWindowHours: env.PULSE_FALLBACK_WINDOW_HOURS,
    rerankerEnabled: env.RERANKER_ENABLED,
    rerankerTopK: env.RERANKER_TOP_K,
    heuristics: {
      tier1Sources: env.PULSE_TIER1_SOURCES ?? lexicon.tier1Sources,
      boostKeywords: env.PULSE_BOOST_KEYWORDS ?? lexicon.boostKeywords,
      penaltyKeywords: env.PULSE_PENALTY_KEYWORDS ?? lexicon.penaltyKeywords,
    },
  },
);

const personalPipeline = createPersonalPipeline(
  { articles: articleRepository, users: userRepository, learning: feedbackService },
  {
    perSourceCap: clampInt(env.PULSE_PERSONAL_PER_SOURCE_CAP, 2, 1, 4),
    perBucketCap: clampInt(env.PULSE_PER_BUCKET_CAP, 12, 4, 24),
    minBuckets: clampInt(env.PULSE_PERSONAL_MIN_BUCKETS, 4, 2, 8),
    minDeltaFromGlobal: clamp(env.PULSE_PERSONAL_MIN_DELTA_FROM_GLOBAL, 0, 0.5),
  },
);

const pulseService = new PulseService(
  {
    snapshots: snapshotRepository,
    users: userRepository,
    cache: cacheService,
    globalPipeline,
    personalPipeline,
  },
  {
    timeZone: env.PULSE_TIMEZONE,
    take: env.PULSE_TAKE,
    warmupMinutes: env.PULSE_WARMUP_MINUTES,
    onDemandAfterMinutes: env.PULSE_ON_DEMAND_AFTER_MINUTES,
  },
);

logger.debug(
  { reranker: reranker !== null, embeddings: embedder !== null, timeZone: env.PULSE_TIMEZONE },
  'Ranking services wired',
);

/** Process-wide service graph. Route and job tests mock this module. */
export const container = {
  pulseService,
  feedbackService,
};
