/**
 * Pipeline module: the ranking engine built on a generic candidate pipeline.
 *
 *   candidate-pipeline.ts   orchestration (stages, fail-soft, cancellation)
 *   global-pipeline.ts      hourly snapshot generation
 *   personal-pipeline.ts    per-user mood and interest overlay
 */

// Core pipeline framework
export { CandidatePipeline } from './candidate-pipeline.js';
export type { CandidatePipelineConfig } from './candidate-pipeline.js';

export type {
  QueryHydrator,
  Source,
  Hydrator,
  Filter,
  Scorer,
  Selector,
  SideEffect,
} from './interfaces.js';

// Types
export { PipelineStage } from './types.js';
export type {
  BaseQuery,
  GlobalQuery,
  GlobalCandidate,
  PersonalQuery,
  PersonalCandidate,
  FilterResult,
  PipelineResult,
  PipelineMetrics,
} from './types.js';

// Concrete implementations
export { TodayArticlesSource, SnapshotPoolSource } from './sources.js';
export {
  PreviousRanksQueryHydrator,
  ClusterHydrator,
  TopicHydrator,
  InterestsQueryHydrator,
  LearningStateQueryHydrator,
  ArticleDetailsHydrator,
} from './hydrators.js';
export { ClusterRepresentativeFilter, DeduplicateFilter, GlobalExclusionFilter } from './filters.js';
export {
  HeuristicScorer,
  RerankerScorer,
  HeatScorer,
  BaseScoreScorer,
  MoodInterestScorer,
  LearnedAffinityScorer,
  VectorSimilarityScorer,
  PersonalScoreCombiner,
} from './scorers.js';
export { DiversitySelector, WeightedSamplingSelector, diversify } from './selector.js';
export { MetricsLogSideEffect } from './side-effects.js';

// Assemblers
export { createGlobalPipeline } from './global-pipeline.js';
export type { GlobalPipelineDeps, GlobalPipelineConfig } from './global-pipeline.js';
export { createPersonalPipeline, MAX_PERSONAL_TARGET } from './personal-pipeline.js';
export type { PersonalPipelineDeps, PersonalPipelineConfig } from './personal-pipeline.js';
