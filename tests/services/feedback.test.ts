import { describe, it, expect, vi } from 'vitest';
import { FeedbackService, emaStep, isPositive } from '../../src/services/feedback.service.js';
import { InterestMatcher } from '../../src/services/interest-matcher.service.js';
import type { EmbeddingProvider, FeatureAffinity } from '../../src/types/index.js';
import { InMemoryAffinityStore, InMemoryArticleStore, InMemoryUserStore } from '../support/stores.js';
import { NOW, makeArticle } from '../support/fixtures.js';

/** Fails the first write of one feature type, then behaves. */
class FailOnceAffinityStore extends InMemoryAffinityStore {
  private failed = false;

  constructor(private failType: FeatureAffinity['type']) {
    super();
  }

  async setAffinity(a: FeatureAffinity): Promise<void> {
    if (!this.failed && a.type === this.failType) {
      this.failed = true;
      throw new Error('write timeout');
    }
    return super.setAffinity(a);
  }
}

function setup(overrides: { embedding?: number[] | null; tags?: string[] } = {}) {
  const articles = new InMemoryArticleStore([
    makeArticle({
      id: 'art-1',
      sourceId: 'Reuters',
      title: 'AI chips',
      tags: overrides.tags ?? ['AI'],
      embedding: overrides.embedding === undefined ? [3, 4] : overrides.embedding,
    }),
  ]);
  const affinities = new InMemoryAffinityStore();
  let seq = 0;
  const service = new FeedbackService({
    articles,
    affinities,
    now: () => NOW,
    newId: () => `evt-${++seq}`,
  });
  return { service, affinities };
}

describe('emaStep', () => {
  it('moves toward the clamped signal', () => {
    expect(emaStep(0, 1)).toBeCloseTo(0.35, 10);
    expect(emaStep(0.35, 1)).toBeCloseTo(0.5775, 10);
    expect(emaStep(0, -5)).toBeCloseTo(-0.35, 10);
  });
});

describe('isPositive', () => {
  it('splits actions into positive and negative', () => {
    expect(isPositive('MoreLikeThis')).toBe(true);
    expect(isPositive('GreatExplainer')).toBe(true);
    expect(isPositive('TooIntense')).toBe(false);
    expect(isPositive('NotRelevant')).toBe(false);
  });
});

describe('FeedbackService', () => {
  it('appends an event and updates every feature of the article', async () => {
    const { service, affinities } = setup();

    const recorded = await service.recordFeedback({
      userId: 'user-1',
      articleId: 'art-1',
      mood: 'Focused',
      action: 'MoreLikeThis',
    });

    expect(recorded).toBe(true);
    expect(affinities.events).toEqual([
      {
        id: 'evt-1',
        userId: 'user-1',
        articleId: 'art-1',
        mood: 'Focused',
        action: 'MoreLikeThis',
        positive: true,
        createdAt: NOW.toISOString(),
      },
    ]);
    expect([...affinities.affinities.keys()].sort()).toEqual([
      'user-1|Focused|source|reuters',
      'user-1|Focused|tag|ai',
      'user-1|Focused|token|chips',
    ]);
    expect(affinities.affinities.get('user-1|Focused|tag|ai')?.score).toBeCloseTo(0.35, 10);
  });

  it('compounds repeated feedback through the EMA', async () => {
    const { service, affinities } = setup();
    const input = { userId: 'user-1', articleId: 'art-1', mood: 'Focused', action: 'MoreLikeThis' } as const;

    await service.recordFeedback(input);
    await service.recordFeedback(input);

    const row = affinities.affinities.get('user-1|Focused|source|reuters');
    expect(row?.score).toBeCloseTo(0.5775, 10);
    expect(row?.count).toBe(2);
  });

  it('applies an event once when a failed attempt is retried', async () => {
    const articles = new InMemoryArticleStore([
      makeArticle({ id: 'art-1', sourceId: 'Reuters', title: 'AI chips', tags: ['AI'], embedding: [3, 4] }),
    ]);
    const affinities = new FailOnceAffinityStore('tag');
    const service = new FeedbackService({ articles, affinities, now: () => NOW });
    const input = {
      eventId: 'evt-42',
      userId: 'user-1',
      articleId: 'art-1',
      mood: 'Focused',
      action: 'MoreLikeThis',
    } as const;

    await expect(service.recordFeedback(input)).rejects.toThrow('write timeout');
    expect(affinities.events).toHaveLength(0);

    await service.recordFeedback(input);

    expect(affinities.events.map((e) => e.id)).toEqual(['evt-42']);
    for (const key of ['user-1|Focused|source|reuters', 'user-1|Focused|tag|ai', 'user-1|Focused|token|chips']) {
      expect(affinities.affinities.get(key)?.score).toBeCloseTo(0.35, 10);
      expect(affinities.affinities.get(key)?.count).toBe(1);
    }
    expect(affinities.centroids.get('user:user-1|Focused')?.count).toBe(1);
  });

  it('ignores a redelivered event', async () => {
    const { service, affinities } = setup();
    const input = {
      eventId: 'evt-7',
      userId: 'user-1',
      articleId: 'art-1',
      mood: 'Calm',
      action: 'MoreLikeThis',
    } as const;

    expect(await service.recordFeedback(input)).toBe(true);
    expect(await service.recordFeedback(input)).toBe(true);

    expect(affinities.events).toHaveLength(1);
    expect(affinities.affinities.get('user-1|Calm|source|reuters')?.count).toBe(1);
    expect(affinities.centroids.get('global|Calm')?.count).toBe(1);
  });

  it('counts a repeated tag once', async () => {
    const { service, affinities } = setup({ tags: ['AI', 'ai'] });

    await service.recordFeedback({ userId: 'user-1', articleId: 'art-1', mood: 'Calm', action: 'MoreLikeThis' });

    expect(affinities.affinities.get('user-1|Calm|tag|ai')?.count).toBe(1);
  });

  it('nudges the user and global centroids on positive feedback', async () => {
    const { service, affinities } = setup();

    await service.recordFeedback({ userId: 'user-1', articleId: 'art-1', mood: 'Curious', action: 'GreatExplainer' });

    expect(affinities.centroids.get('user:user-1|Curious')?.vector).toEqual([0.6, 0.8]);
    expect(affinities.centroids.get('global|Curious')?.vector).toEqual([0.6, 0.8]);
  });

  it('leaves the global centroid alone on negative feedback', async () => {
    const { service, affinities } = setup();

    await service.recordFeedback({ userId: 'user-1', articleId: 'art-1', mood: 'Sad', action: 'TooIntense' });

    expect(affinities.affinities.get('user-1|Sad|source|reuters')?.score).toBeCloseTo(-0.35, 10);
    expect(affinities.centroids.get('user:user-1|Sad')?.vector).toEqual([0.6, 0.8]);
    expect(affinities.centroids.has('global|Sad')).toBe(false);
  });

  it('skips centroids for articles without an embedding', async () => {
    const { service, affinities } = setup({ embedding: null });

    await service.recordFeedback({ userId: 'user-1', articleId: 'art-1', mood: 'Calm', action: 'MoreLikeThis' });

    expect(affinities.centroids.size).toBe(0);
  });

  it('ignores feedback on an unknown article', async () => {
    const { service, affinities } = setup();

    const recorded = await service.recordFeedback({
      userId: 'user-1',
      articleId: 'missing',
      mood: 'Calm',
      action: 'MoreLikeThis',
    });

    expect(recorded).toBe(false);
    expect(affinities.events).toHaveLength(0);
    expect(affinities.affinities.size).toBe(0);
  });

  it('matches interests for articles ingested without any', async () => {
    const articles = new InMemoryArticleStore([makeArticle({ id: 'art-1', sourceId: 'Reuters', title: 'AI chips' })]);
    const affinities = new InMemoryAffinityStore();
    const users = new InMemoryUserStore();
    users.interests = [
      { id: 'int-ai', name: 'AI' },
      { id: 'int-space', name: 'Space' },
    ];
    const embedder: EmbeddingProvider = {
      embed: vi.fn(async (text: string) => (text.startsWith('AI') ? [1, 0] : [0, 1])),
    };
    const service = new FeedbackService({
      articles,
      affinities,
      matcher: new InterestMatcher(users, embedder),
      now: () => NOW,
    });

    await service.recordFeedback({ userId: 'user-1', articleId: 'art-1', mood: 'Calm', action: 'MoreLikeThis' });

    expect(affinities.affinities.has('user-1|Calm|interest|int-ai')).toBe(true);
    expect(affinities.affinities.has('user-1|Calm|interest|int-space')).toBe(false);
  });
});

describe('FeedbackService read side', () => {
  it('groups affinities into a profile and unit-normalizes centroids', async () => {
    const { service, affinities } = setup();
    await affinities.setAffinity({
      userId: 'user-1',
      mood: 'Calm',
      type: 'tag',
      key: 'ai',
      score: 0.4,
      count: 2,
      updatedAt: NOW.toISOString(),
      lastEventId: null,
    });
    await affinities.setCentroid({
      userId: 'user-1',
      mood: 'Calm',
      vector: [0, 2],
      count: 1,
      updatedAt: NOW.toISOString(),
      lastEventId: null,
    });

    const profile = await service.getProfile('user-1', 'Calm');
    const centroids = await service.getCentroids('user-1', 'Calm');

    expect(profile.tag?.get('ai')).toBe(0.4);
    expect(profile.source).toBeUndefined();
    expect(centroids).toEqual({ user: [0, 1], global: null });
  });
});
