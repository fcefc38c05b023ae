/**
 * Global pipeline: one hourly snapshot generation cycle.
 *
 *   Query Hydration -> Source -> Hydration -> Filter -> Score -> Select
 *
 * 1. **Query Hydration**: previous hour's ranks (trend labels)
 * 2. **Source**: today's articles, widened by ingestion time on thin days
 * 3. **Hydration**: canonical cluster keys and corroboration, normalized topics
 * 4. **Filter**: one representative per cluster
 * 5. **Scoring** (sequential):
 *    - HeuristicScorer: importance from recency, corroboration, arousal, keywords
 *    - RerankerScorer: oracle over the top window (scheduled runs only)
 *    - HeatScorer: min-max heat over the assembled list
 * 6. **Selection**: per-source and per-bucket caps, then fill to the store count
 * 7. **Side Effects**: selection metrics
 *
 * Trend labels and the snapshot write happen in PulseService once the result
 * is final.
 */

import { CandidatePipeline } from './candidate-pipeline.js';
import type { GlobalQuery, GlobalCandidate } from './types.js';
import type { ArticleStore, RerankerClient, SnapshotStore } from '../types/index.js';
import { TodayArticlesSource } from './sources.js';
import { PreviousRanksQueryHydrator, ClusterHydrator, TopicHydrator } from './hydrators.js';
import { ClusterRepresentativeFilter } from './filters.js';
import { HeuristicScorer, RerankerScorer, HeatScorer } from './scorers.js';
import type { HeuristicScorerOptions } from './scorers.js';
import { DiversitySelector, sourceKey } from './selector.js';
import { MetricsLogSideEffect } from './side-effects.js';
import type { GlobalSizing } from './sizing.js';
import { coarseBucket } from './topics.js';

export interface GlobalPipelineDeps {
  articles: ArticleStore;
  snapshots: SnapshotStore;
  /** Null when no oracle is configured. */
  reranker: RerankerClient | null;
}

export interface GlobalPipelineConfig extends GlobalSizing {
  perSourceCap: number;
  perBucketCap: number;
  fallbackWindowHours: number;
  rerankerEnabled: boolean;
  rerankerTopK?: number;
  heuristics: HeuristicScorerOptions;
}

export function createGlobalPipeline(
  deps: GlobalPipelineDeps,
  config: GlobalPipelineConfig,
): CandidatePipeline<GlobalQuery, GlobalCandidate> {
  const sizing: GlobalSizing = {
    storeCount: config.storeCount,
    maxCandidates: config.maxCandidates,
  };

  return new CandidatePipeline<GlobalQuery, GlobalCandidate>({
    name: 'GlobalSnapshotPipeline',
    resultSize: config.storeCount,

    queryHydrators: [new PreviousRanksQueryHydrator(deps.snapshots)],

    sources: [
      new TodayArticlesSource(deps.articles, { fallbackWindowHours: config.fallbackWindowHours }),
    ],

    hydrators: [new ClusterHydrator(), new TopicHydrator()],

    filters: [new ClusterRepresentativeFilter()],

    scorers: [
      new HeuristicScorer(config.heuristics),
      new RerankerScorer(deps.reranker, {
        ...sizing,
        enabled: config.rerankerEnabled,
        topK: config.rerankerTopK,
      }),
      new HeatScorer(sizing),
    ],

    selector: new DiversitySelector({
      ...sizing,
      perSourceCap: config.perSourceCap,
      perBucketCap: config.perBucketCap,
    }),

    postSelectionFilters: [],

    sideEffects: [
      new MetricsLogSideEffect<GlobalQuery, GlobalCandidate>('global', (c) => ({
        source: sourceKey(c.article.sourceId),
        bucket: coarseBucket(c.topics),
        score: c.heat,
      })),
    ],
  });
}
