/**
 * Core types for the candidate pipeline framework and the two ranking
 * pipelines built on it (hourly global snapshot, per-user personal overlay).
 */

import type {
  AffinityProfile,
  Article,
  Mood,
  RankedItem,
  SnapshotHourEntry,
} from '../types/index.js';

/**
 * Pipeline stages in execution order:
 * QueryHydration -> Source -> Hydration -> Filter -> Score -> Select -> PostFilter
 */
export enum PipelineStage {
  QueryHydrator = 'QueryHydrator',
  Source = 'Source',
  Hydrator = 'Hydrator',
  Filter = 'Filter',
  Scorer = 'Scorer',
  Selector = 'Selector',
  PostSelectionFilter = 'PostSelectionFilter',
  SideEffect = 'SideEffect',
}

/** Minimum shape every pipeline query carries. */
export interface BaseQuery {
  requestId: string;
  /** Caller cancellation; an abort propagates out of every stage. */
  signal?: AbortSignal;
}

/** Query for one hourly generation cycle. */
export interface GlobalQuery extends BaseQuery {
  now: Date;
  date: string;
  hour: number;
  /** Start of the local day, i.e. the today window start. */
  windowStart: Date;
  heuristicsOnly: boolean;
  take: number;

  // Hydrated
  previousRanks: Map<string, number>;
}

/** A clustered article flowing through the generation pipeline. */
export interface GlobalCandidate {
  article: Article;
  clusterKey: string;
  /** Number of articles sharing the canonical URL. */
  clusterSize: number;
  /** Distinct sources in the cluster. */
  corroboration: number;

  rawScore: number;
  /** Score the snapshot is ordered by: oracle score, or heuristic when no oracle ran. */
  finalScore: number;
  heat: number;
  reasons: string[];
  topics: string[];
  reranked: boolean;
}

/** Query for one personal overlay read. */
export interface PersonalQuery extends BaseQuery {
  userId: string;
  now: Date;
  mood: Mood | null;
  blend: number;
  target: number;
  currentHour: number;
  /** Today's snapshot hours, any order. */
  hours: SnapshotHourEntry[];
  /** Items of the resolved current hour (after warmup / on-demand). */
  currentItems: RankedItem[];
  excludeIds: Set<string>;

  // Hydrated
  interestNames: string[];
  profile: AffinityProfile;
  userCentroid: number[] | null;
  globalCentroid: number[] | null;
}

export interface PersonalCandidate {
  item: RankedItem;
  bucket: string;

  // From the article store
  tags: string[];
  interestMatches: string[];
  embedding: number[] | null;

  ageHours: number;
  base: number;
  interestOverlap: number;
  moodScore: number;
  learnedAffinity: number;
  vectorBoost: number;
  userSimilarity: number;
  personalScore: number;
  reasons: string[];
}

/** Result of a filter stage: kept and removed candidate sets. */
export interface FilterResult<C> {
  kept: C[];
  removed: C[];
}

/** Output returned by the pipeline after all stages execute. */
export interface PipelineResult<Q, C> {
  query: Q;
  retrievedCandidates: C[];
  filteredCandidates: C[];
  selectedCandidates: C[];
  pipelineMetrics: PipelineMetrics;
}

/** Timing and count metrics for observability. */
export interface PipelineMetrics {
  totalMs: number;
  stageMetrics: Record<string, { durationMs: number; candidateCount: number }>;
}
