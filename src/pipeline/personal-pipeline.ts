/**
 * Personal pipeline: the per-user overlay on top of today's snapshots.
 *
 * 1. **Query Hydration** (parallel): interest names; learned affinities and
 *    mood centroids when a mood is set
 * 2. **Source**: recent snapshot hours sized by mood lookback
 * 3. **Hydration**: tags, interest matches and embeddings from the article store
 * 4. **Filter**: dedupe, then exclude items already on the global list
 * 5. **Scoring** (sequential): base, mood and interest, learned affinity,
 *    vector similarity, combination
 * 6. **Selection**: softmax sampling under source and bucket caps
 */

import { CandidatePipeline } from './candidate-pipeline.js';
import type { PersonalQuery, PersonalCandidate } from './types.js';
import type { ArticleStore, LearningStateReader, UserStore } from '../types/index.js';
import { SnapshotPoolSource } from './sources.js';
import {
  InterestsQueryHydrator,
  LearningStateQueryHydrator,
  ArticleDetailsHydrator,
} from './hydrators.js';
import { DeduplicateFilter, GlobalExclusionFilter } from './filters.js';
import {
  BaseScoreScorer,
  MoodInterestScorer,
  LearnedAffinityScorer,
  VectorSimilarityScorer,
  PersonalScoreCombiner,
} from './scorers.js';
import { WeightedSamplingSelector, sourceKey } from './selector.js';
import { MetricsLogSideEffect } from './side-effects.js';

/** Upper bound of the personal target (take - 5, clamped 3..10). */
export const MAX_PERSONAL_TARGET = 10;

export interface PersonalPipelineDeps {
  articles: ArticleStore;
  users: UserStore;
  learning: LearningStateReader;
}

export interface PersonalPipelineConfig {
  perSourceCap: number;
  perBucketCap: number;
  minBuckets: number;
  minDeltaFromGlobal: number;
  random?: () => number;
}

export function createPersonalPipeline(
  deps: PersonalPipelineDeps,
  config: PersonalPipelineConfig,
): CandidatePipeline<PersonalQuery, PersonalCandidate> {
  return new CandidatePipeline<PersonalQuery, PersonalCandidate>({
    name: 'PersonalOverlayPipeline',
    resultSize: MAX_PERSONAL_TARGET,

    queryHydrators: [
      new InterestsQueryHydrator(deps.users),
      new LearningStateQueryHydrator(deps.learning),
    ],

    sources: [new SnapshotPoolSource()],

    hydrators: [new ArticleDetailsHydrator(deps.articles)],

    filters: [
      new DeduplicateFilter<PersonalQuery, PersonalCandidate>((c) => c.item.articleId),
      new GlobalExclusionFilter(),
    ],

    scorers: [
      new BaseScoreScorer(),
      new MoodInterestScorer(),
      new LearnedAffinityScorer(),
      new VectorSimilarityScorer(),
      new PersonalScoreCombiner({ minDeltaFromGlobal: config.minDeltaFromGlobal }),
    ],

    selector: new WeightedSamplingSelector({
      perSourceCap: config.perSourceCap,
      perBucketCap: config.perBucketCap,
      minBuckets: config.minBuckets,
      random: config.random,
    }),

    postSelectionFilters: [],

    sideEffects: [
      new MetricsLogSideEffect<PersonalQuery, PersonalCandidate>('personal', (c) => ({
        source: sourceKey(c.item.sourceId),
        bucket: c.bucket,
        score: c.personalScore,
      })),
    ],
  });
}
