/**
 * Pipeline side effects: fire-and-forget work after selection.
 *
 * Snapshot writes are not side effects: a failed write has to reach the
 * scheduler so the job is retried, so PulseService performs them.
 */

import type { SideEffect } from './interfaces.js';
import type { BaseQuery } from './types.js';
import { logger } from '../utils/logger.js';

export interface SelectionSummary {
  sources: Record<string, number>;
  buckets: Record<string, number>;
  avgScore: number;
}

/**
 * MetricsLogSideEffect: logs the source and bucket mix of a selection.
 * The summarizer lets each pipeline describe its own candidate type.
 */
export class MetricsLogSideEffect<Q extends BaseQuery, C> implements SideEffect<Q, C> {
  name = 'MetricsLogSideEffect';

  constructor(
    private pipeline: string,
    private describe: (c: C) => { source: string; bucket: string; score: number },
  ) {}

  enable(): boolean {
    return true;
  }

  async run(query: Q, selectedCandidates: C[]): Promise<void> {
    try {
      const summary: SelectionSummary = { sources: {}, buckets: {}, avgScore: 0 };
      let total = 0;
      for (const c of selectedCandidates) {
        const d = this.describe(c);
        summary.sources[d.source] = (summary.sources[d.source] ?? 0) + 1;
        summary.buckets[d.bucket] = (summary.buckets[d.bucket] ?? 0) + 1;
        total += d.score;
      }
      summary.avgScore = selectedCandidates.length > 0 ? total / selectedCandidates.length : 0;

      logger.info(
        {
          requestId: query.requestId,
          pipeline: this.pipeline,
          totalSelected: selectedCandidates.length,
          ...summary,
        },
        'Pipeline: selection metrics',
      );
    } catch (error) {
      logger.error({ error, sideEffect: this.name }, 'Metrics logging side effect failed');
    }
  }
}
