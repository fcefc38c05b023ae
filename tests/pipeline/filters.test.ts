import { describe, it, expect } from 'vitest';
import {
  ClusterRepresentativeFilter,
  DeduplicateFilter,
  GlobalExclusionFilter,
  compareRepresentative,
} from '../../src/pipeline/filters.js';
import type { PersonalCandidate, PersonalQuery } from '../../src/pipeline/types.js';
import {
  makeArticle,
  makeGlobalCandidate,
  makeGlobalQuery,
  makePersonalCandidate,
  makePersonalQuery,
} from '../support/fixtures.js';

describe('ClusterRepresentativeFilter', () => {
  const filter = new ClusterRepresentativeFilter();

  it('keeps the latest-published article per cluster in first-appearance order', async () => {
    const a = makeGlobalCandidate({ id: 'a', publishedAt: new Date('2025-03-10T10:00:00Z') }, { clusterKey: 'k1' });
    const c = makeGlobalCandidate({ id: 'c' }, { clusterKey: 'k2' });
    const b = makeGlobalCandidate({ id: 'b', publishedAt: new Date('2025-03-10T11:00:00Z') }, { clusterKey: 'k1' });

    const result = await filter.filter(makeGlobalQuery(), [a, c, b]);

    expect(result.kept.map((x) => x.article.id)).toEqual(['b', 'c']);
    expect(result.removed.map((x) => x.article.id)).toEqual(['a']);
  });
});

describe('compareRepresentative', () => {
  const published = new Date('2025-03-10T09:00:00Z');

  it('breaks a publishedAt tie on the later createdAt', () => {
    const early = makeArticle({ id: 'a', publishedAt: published, createdAt: new Date('2025-03-10T09:05:00Z') });
    const late = makeArticle({ id: 'b', publishedAt: published, createdAt: new Date('2025-03-10T09:10:00Z') });
    expect(compareRepresentative(late, early)).toBeLessThan(0);
  });

  it('falls back to the smallest id', () => {
    const x = makeArticle({ id: 'x', publishedAt: published, createdAt: published });
    const y = makeArticle({ id: 'y', publishedAt: published, createdAt: published });
    expect(compareRepresentative(x, y)).toBe(-1);
    expect(compareRepresentative(y, x)).toBe(1);
  });
});

describe('DeduplicateFilter', () => {
  const filter = new DeduplicateFilter<PersonalQuery, PersonalCandidate>((c) => c.item.articleId);

  it('keeps the first occurrence of each id', async () => {
    const first = makePersonalCandidate({ articleId: 'a', heat: 0.9 });
    const dup = makePersonalCandidate({ articleId: 'a', heat: 0.1 });
    const other = makePersonalCandidate({ articleId: 'b' });

    const result = await filter.filter(makePersonalQuery(), [first, dup, other]);

    expect(result.kept).toEqual([first, other]);
    expect(result.removed).toEqual([dup]);
  });
});

describe('GlobalExclusionFilter', () => {
  const filter = new GlobalExclusionFilter();
  const pool = ['a', 'b', 'c', 'd', 'e'].map((id) => makePersonalCandidate({ articleId: id }));

  it('is disabled without a global list', () => {
    expect(filter.enable(makePersonalQuery())).toBe(false);
  });

  it('drops items already on the global list', async () => {
    const query = makePersonalQuery({ target: 7, excludeIds: new Set(['a', 'b']) });

    const result = await filter.filter(query, pool);

    expect(result.kept.map((c) => c.item.articleId)).toEqual(['c', 'd', 'e']);
    expect(result.removed.map((c) => c.item.articleId)).toEqual(['a', 'b']);
  });

  it('skips the exclusion when fewer than max(3, target / 2) would remain', async () => {
    const query = makePersonalQuery({ target: 7, excludeIds: new Set(['a', 'b', 'c']) });

    const result = await filter.filter(query, pool);

    expect(result.kept).toHaveLength(5);
    expect(result.removed).toEqual([]);
  });
});
