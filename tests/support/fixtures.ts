import type { Article, MoodFeatures, RankedItem, Snapshot } from '../../src/types/index.js';
import type {
  GlobalCandidate,
  GlobalQuery,
  PersonalCandidate,
  PersonalQuery,
} from '../../src/pipeline/types.js';
import { toGlobalCandidate, toPersonalCandidate } from '../../src/pipeline/sources.js';

export const NOW = new Date('2025-03-10T15:30:00.000Z');

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * 60 * 60 * 1000);
}

export function makeFeatures(overrides: Partial<MoodFeatures> = {}): MoodFeatures {
  return {
    arousal: null,
    sentiment: null,
    depth: null,
    conflict: null,
    practicality: null,
    optimism: null,
    novelty: null,
    humanInterest: null,
    hype: null,
    explainer: null,
    analysis: null,
    wholesome: null,
    readMinutes: null,
    genre: null,
    eventStage: null,
    format: null,
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<Article> = {}): Article {
  const id = overrides.id ?? 'a1';
  return {
    id,
    url: `https://news.example.com/${id}`,
    sourceId: 'Example Wire',
    title: `Story ${id}`,
    summary: null,
    imageUrl: null,
    publishedAt: hoursAgo(2),
    createdAt: hoursAgo(2),
    tags: [],
    interestMatches: [],
    vibe: null,
    features: makeFeatures(),
    embedding: null,
    ...overrides,
  };
}

export function makeGlobalQuery(overrides: Partial<GlobalQuery> = {}): GlobalQuery {
  return {
    requestId: 'req-test',
    now: NOW,
    date: '2025-03-10',
    hour: 11,
    windowStart: new Date('2025-03-10T04:00:00.000Z'),
    heuristicsOnly: false,
    take: 12,
    previousRanks: new Map(),
    ...overrides,
  };
}

export function makeGlobalCandidate(
  article: Partial<Article> = {},
  overrides: Partial<GlobalCandidate> = {},
): GlobalCandidate {
  return { ...toGlobalCandidate(makeArticle(article)), ...overrides };
}

export function makeRankedItem(overrides: Partial<RankedItem> = {}): RankedItem {
  const articleId = overrides.articleId ?? 'r1';
  return {
    articleId,
    title: `Story ${articleId}`,
    sourceId: 'Example Wire',
    publishedAt: hoursAgo(2).toISOString(),
    summary: null,
    imageUrl: null,
    scoreGlobal: 1,
    heat: 0.5,
    trend: 'NEW',
    reasons: [],
    topics: ['world'],
    clusterId: `https://news.example.com/${articleId}`,
    arousal: null,
    ...overrides,
  };
}

export function makeSnapshot(hour: number, items: RankedItem[], date = '2025-03-10'): Snapshot {
  return { date, hour, updatedAt: `${date}T${String(hour).padStart(2, '0')}:00:00.000Z`, items };
}

export function makePersonalQuery(overrides: Partial<PersonalQuery> = {}): PersonalQuery {
  return {
    requestId: 'req-test',
    userId: 'user-1',
    now: NOW,
    mood: null,
    blend: 0.3,
    target: 7,
    currentHour: 11,
    hours: [],
    currentItems: [],
    excludeIds: new Set(),
    interestNames: [],
    profile: {},
    userCentroid: null,
    globalCentroid: null,
    ...overrides,
  };
}

export function makePersonalCandidate(
  item: Partial<RankedItem> = {},
  overrides: Partial<PersonalCandidate> = {},
): PersonalCandidate {
  return { ...toPersonalCandidate(makeRankedItem(item), NOW), ...overrides };
}
