/**
 * Candidate filters: partition candidates into kept and removed sets.
 *
 *   - ClusterRepresentativeFilter: one article per canonical URL cluster
 *   - DeduplicateFilter:           drop repeated ids, keeping the first
 *   - GlobalExclusionFilter:       keep the personal list off the global one
 */

import type { Filter } from './interfaces.js';
import type {
  BaseQuery,
  FilterResult,
  GlobalQuery,
  GlobalCandidate,
  PersonalQuery,
  PersonalCandidate,
} from './types.js';
import type { Article } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Deterministic representative order: latest publishedAt, then latest
 * createdAt, then the lexicographically smallest id.
 */
export function compareRepresentative(a: Article, b: Article): number {
  const byPublished = b.publishedAt.getTime() - a.publishedAt.getTime();
  if (byPublished !== 0) return byPublished;
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Keep one representative per cluster. Kept candidates come out in the order
 * their cluster first appeared.
 */
export class ClusterRepresentativeFilter implements Filter<GlobalQuery, GlobalCandidate> {
  name = 'ClusterRepresentativeFilter';

  enable(): boolean {
    return true;
  }

  async filter(
    _query: GlobalQuery,
    candidates: GlobalCandidate[],
  ): Promise<FilterResult<GlobalCandidate>> {
    const best = new Map<string, GlobalCandidate>();
    for (const c of candidates) {
      const current = best.get(c.clusterKey);
      if (!current || compareRepresentative(c.article, current.article) < 0) {
        best.set(c.clusterKey, c);
      }
    }

    const kept = [...best.values()];
    const keptSet = new Set(kept);
    const removed = candidates.filter((c) => !keptSet.has(c));
    return { kept, removed };
  }
}

/** Remove duplicate ids, keeping the first occurrence. */
export class DeduplicateFilter<Q extends BaseQuery, C> implements Filter<Q, C> {
  name = 'DeduplicateFilter';

  constructor(private keyOf: (candidate: C) => string) {}

  enable(): boolean {
    return true;
  }

  async filter(_query: Q, candidates: C[]): Promise<FilterResult<C>> {
    const seen = new Set<string>();
    const kept: C[] = [];
    const removed: C[] = [];

    for (const c of candidates) {
      const key = this.keyOf(c);
      if (seen.has(key)) {
        removed.push(c);
      } else {
        seen.add(key);
        kept.push(c);
      }
    }

    return { kept, removed };
  }
}

/**
 * Drop items already shown on the global list.
 *
 * Early in the day the pool can be almost entirely global items. When fewer
 * than max(3, floor(target / 2)) would survive, the exclusion is skipped and
 * the personal list may repeat global items.
 */
export class GlobalExclusionFilter implements Filter<PersonalQuery, PersonalCandidate> {
  name = 'GlobalExclusionFilter';

  enable(query: PersonalQuery): boolean {
    return query.excludeIds.size > 0;
  }

  async filter(
    query: PersonalQuery,
    candidates: PersonalCandidate[],
  ): Promise<FilterResult<PersonalCandidate>> {
    const kept: PersonalCandidate[] = [];
    const removed: PersonalCandidate[] = [];
    for (const c of candidates) {
      if (query.excludeIds.has(c.item.articleId)) {
        removed.push(c);
      } else {
        kept.push(c);
      }
    }

    const minNeeded = Math.max(3, Math.floor(query.target / 2));
    if (kept.length < minNeeded) {
      logger.debug(
        { requestId: query.requestId, remaining: kept.length, minNeeded },
        'Global exclusion skipped, pool too thin',
      );
      return { kept: candidates, removed: [] };
    }
    return { kept, removed };
  }
}
