import { describe, it, expect } from 'vitest';
import { TodayArticlesSource, SnapshotPoolSource } from '../../src/pipeline/sources.js';
import { InMemoryArticleStore } from '../support/stores.js';
import {
  hoursAgo,
  makeArticle,
  makeGlobalQuery,
  makePersonalQuery,
  makeRankedItem,
  makeSnapshot,
} from '../support/fixtures.js';

describe('TodayArticlesSource', () => {
  it('reads only the published-today window on a busy day', async () => {
    const store = new InMemoryArticleStore(
      Array.from({ length: 12 }, (_, i) => makeArticle({ id: `t${i}`, publishedAt: hoursAgo(1 + i * 0.5) })),
    );
    const source = new TodayArticlesSource(store);

    const candidates = await source.getCandidates(makeGlobalQuery());

    expect(candidates).toHaveLength(12);
    expect(store.queries).toHaveLength(1);
    expect(store.queries[0].field).toBe('publishedAt');
    expect(source.required).toBe(true);
  });

  it('widens by ingestion time on a thin day and merges by id', async () => {
    const store = new InMemoryArticleStore([
      makeArticle({ id: 't1', publishedAt: hoursAgo(1), createdAt: hoursAgo(1) }),
      makeArticle({ id: 't2', publishedAt: hoursAgo(3), createdAt: hoursAgo(3) }),
      makeArticle({ id: 'o1', publishedAt: hoursAgo(20), createdAt: hoursAgo(2) }),
      makeArticle({ id: 'o2', publishedAt: hoursAgo(30), createdAt: hoursAgo(30) }),
    ]);
    const source = new TodayArticlesSource(store, { fallbackWindowHours: 24 });

    const candidates = await source.getCandidates(makeGlobalQuery());

    expect(candidates.map((c) => c.article.id)).toEqual(['t1', 't2', 'o1']);
    expect(store.queries.map((q) => q.field)).toEqual(['publishedAt', 'createdAt']);
  });
});

describe('SnapshotPoolSource', () => {
  const source = new SnapshotPoolSource();

  it('collects distinct items from the lookback hours, newest hour first', async () => {
    const query = makePersonalQuery({
      target: 2,
      currentHour: 11,
      hours: [
        { hour: 4, snapshot: makeSnapshot(4, [makeRankedItem({ articleId: 'x5' })]) },
        { hour: 10, snapshot: makeSnapshot(10, [makeRankedItem({ articleId: 'x2' }), makeRankedItem({ articleId: 'x3' })]) },
        { hour: 6, snapshot: makeSnapshot(6, [makeRankedItem({ articleId: 'x4' })]) },
        { hour: 11, snapshot: makeSnapshot(11, [makeRankedItem({ articleId: 'x1' }), makeRankedItem({ articleId: 'x2' })]) },
      ],
    });

    const pool = await source.getCandidates(query);

    // No mood at blend 0.3 looks back 6 hours: hours 6..11
    expect(pool.map((c) => c.item.articleId)).toEqual(['x1', 'x2', 'x3', 'x4']);
  });

  it('falls back to the current hour when the pool is under twice the target', async () => {
    const query = makePersonalQuery({
      target: 3,
      hours: [{ hour: 11, snapshot: makeSnapshot(11, [makeRankedItem({ articleId: 'x1' })]) }],
      currentItems: [makeRankedItem({ articleId: 'c1' }), makeRankedItem({ articleId: 'c2' })],
    });

    const pool = await source.getCandidates(query);

    expect(pool.map((c) => c.item.articleId)).toEqual(['c1', 'c2']);
  });

  it('derives bucket and age from the snapshot item', async () => {
    const query = makePersonalQuery({
      target: 1,
      currentItems: [makeRankedItem({ articleId: 'c1', topics: ['Rockets', 'space'], publishedAt: hoursAgo(3).toISOString() })],
    });

    const [candidate] = await source.getCandidates(query);

    expect(candidate.bucket).toBe('space');
    expect(candidate.ageHours).toBeCloseTo(3, 6);
    expect(candidate.moodScore).toBe(0.5);
  });
});
