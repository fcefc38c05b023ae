/**
 * Query and candidate hydrators.
 *
 * Query hydrators (parallel):
 *   - PreviousRanksQueryHydrator: ranks from the prior hour's snapshot (trend labels)
 *   - InterestsQueryHydrator:     the user's interest names
 *   - LearningStateQueryHydrator: per-mood feature affinities and centroids
 *
 * Candidate hydrators (sequential):
 *   - ClusterHydrator:        canonical cluster key, cluster size, corroboration
 *   - TopicHydrator:          normalized topics per candidate
 *   - ArticleDetailsHydrator: tags, interest matches and embeddings for pool items
 */

import type { QueryHydrator, Hydrator } from './interfaces.js';
import type { GlobalQuery, GlobalCandidate, PersonalQuery, PersonalCandidate } from './types.js';
import type {
  Article,
  ArticleStore,
  LearningStateReader,
  SnapshotStore,
  UserStore,
} from '../types/index.js';
import { clusterKeyFor } from './canonical-url.js';
import { normalizeTopics } from './topics.js';
import { rankMap } from './trend.js';
import { previousHourSlot } from '../utils/clock.js';
import { chunk } from '../utils/helpers.js';

// ---------------------------------------------------------------------------
// Global (generation) pipeline
// ---------------------------------------------------------------------------

/** Loads the prior hour's ranks. Hour 0 compares against yesterday's hour 23. */
export class PreviousRanksQueryHydrator implements QueryHydrator<GlobalQuery> {
  name = 'PreviousRanksQueryHydrator';

  constructor(private snapshots: SnapshotStore) {}

  enable(): boolean {
    return true;
  }

  async hydrate(query: GlobalQuery): Promise<Partial<GlobalQuery>> {
    const prev = previousHourSlot(query.date, query.hour);
    const snapshot = await this.snapshots.get(prev.date, prev.hour);
    return { previousRanks: rankMap(snapshot?.items ?? []) };
  }
}

export class ClusterHydrator implements Hydrator<GlobalQuery, GlobalCandidate> {
  name = 'ClusterHydrator';

  enable(): boolean {
    return true;
  }

  async hydrate(_query: GlobalQuery, candidates: GlobalCandidate[]): Promise<GlobalCandidate[]> {
    const withKeys = candidates.map((c) => ({ ...c, clusterKey: clusterKeyFor(c.article) }));

    const sizes = new Map<string, number>();
    const sources = new Map<string, Set<string>>();
    for (const c of withKeys) {
      sizes.set(c.clusterKey, (sizes.get(c.clusterKey) ?? 0) + 1);
      let set = sources.get(c.clusterKey);
      if (!set) {
        set = new Set();
        sources.set(c.clusterKey, set);
      }
      set.add((c.article.sourceId ?? 'src').toLowerCase());
    }

    return withKeys.map((c) => ({
      ...c,
      clusterSize: sizes.get(c.clusterKey) ?? 1,
      corroboration: sources.get(c.clusterKey)?.size ?? 1,
    }));
  }
}

export class TopicHydrator implements Hydrator<GlobalQuery, GlobalCandidate> {
  name = 'TopicHydrator';

  enable(): boolean {
    return true;
  }

  async hydrate(_query: GlobalQuery, candidates: GlobalCandidate[]): Promise<GlobalCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      topics: normalizeTopics(c.article.tags, c.article.title, c.article.summary),
    }));
  }
}

// ---------------------------------------------------------------------------
// Personal (overlay) pipeline
// ---------------------------------------------------------------------------

export class InterestsQueryHydrator implements QueryHydrator<PersonalQuery> {
  name = 'InterestsQueryHydrator';

  constructor(private users: UserStore) {}

  enable(): boolean {
    return true;
  }

  async hydrate(query: PersonalQuery): Promise<Partial<PersonalQuery>> {
    return { interestNames: await this.users.getInterestNames(query.userId) };
  }
}

/** Affinities and centroids are kept per mood, so this only runs with a mood. */
export class LearningStateQueryHydrator implements QueryHydrator<PersonalQuery> {
  name = 'LearningStateQueryHydrator';

  constructor(private learning: LearningStateReader) {}

  enable(query: PersonalQuery): boolean {
    return query.mood !== null;
  }

  async hydrate(query: PersonalQuery): Promise<Partial<PersonalQuery>> {
    if (query.mood === null) return {};
    const [profile, centroids] = await Promise.all([
      this.learning.getProfile(query.userId, query.mood),
      this.learning.getCentroids(query.userId, query.mood),
    ]);
    return {
      profile,
      userCentroid: centroids.user,
      globalCentroid: centroids.global,
    };
  }
}

const LOOKUP_CHUNK_SIZE = 10;

/**
 * Fetches the pool's articles in chunks of 10, issued concurrently, and copies
 * tags, interest matches and embeddings onto the candidates. Items whose
 * article is gone keep their snapshot topics and no embedding.
 */
export class ArticleDetailsHydrator implements Hydrator<PersonalQuery, PersonalCandidate> {
  name = 'ArticleDetailsHydrator';

  constructor(private articles: ArticleStore) {}

  enable(): boolean {
    return true;
  }

  async hydrate(_query: PersonalQuery, candidates: PersonalCandidate[]): Promise<PersonalCandidate[]> {
    const ids = candidates.map((c) => c.item.articleId);
    if (ids.length === 0) return candidates;

    const batches = await Promise.all(
      chunk(ids, LOOKUP_CHUNK_SIZE).map((batch) => this.articles.getByIds(batch)),
    );
    const byId = new Map<string, Article>();
    for (const a of batches.flat()) byId.set(a.id, a);

    return candidates.map((c) => {
      const a = byId.get(c.item.articleId);
      if (!a) return c;
      return {
        ...c,
        tags: a.tags.length > 0 ? a.tags : c.tags,
        interestMatches: a.interestMatches,
        embedding: a.embedding && a.embedding.length > 0 ? a.embedding : null,
      };
    });
  }
}
