import { describe, it, expect } from 'vitest';
import { extractFeatures, learnedAffinity, titleTokens } from '../../src/pipeline/features.js';
import { cosine, normalize, updateCentroid } from '../../src/pipeline/vector.js';

describe('extractFeatures', () => {
  it('normalizes keys and skips empty values', () => {
    const features = extractFeatures({
      sourceId: ' Reuters ',
      interestMatches: ['int-1'],
      tags: ['AI', ''],
      title: 'AI chips: an update',
      genre: 'News',
      eventStage: null,
    });

    expect(features).toEqual([
      { type: 'source', key: 'reuters' },
      { type: 'interest', key: 'int-1' },
      { type: 'tag', key: 'ai' },
      { type: 'token', key: 'chips' },
      { type: 'token', key: 'update' },
      { type: 'genre', key: 'news' },
    ]);
  });

  it('drops title tokens longer than 24 characters', () => {
    expect(titleTokens('ok abcdefghijklmnopqrstuvwxyz ipo')).toEqual(['ipo']);
  });
});

describe('learnedAffinity', () => {
  const src = { sourceId: 'Reuters', interestMatches: [], tags: ['AI'], title: 'Chips' };

  it('sums matching features through tanh', () => {
    const profile = { source: new Map([['reuters', 2]]), token: new Map([['chips', 2]]) };
    expect(learnedAffinity(profile, src)).toBeCloseTo(0.5 * Math.tanh(1), 10);
  });

  it('clamps the sum before squashing', () => {
    const profile = { tag: new Map([['ai', 10]]) };
    expect(learnedAffinity(profile, src)).toBeCloseTo(0.5 * Math.tanh(1.5), 10);
  });

  it('is zero for an empty profile', () => {
    expect(learnedAffinity({}, src)).toBe(0);
  });
});

describe('vector helpers', () => {
  it('normalizes to unit length and leaves zero vectors at zero', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
    expect(normalize([0, 0])).toEqual([0, 0]);
  });

  it('returns null cosine for empty or zero vectors', () => {
    expect(cosine([], [1])).toBeNull();
    expect(cosine([1, 0], [0, 0])).toBeNull();
    expect(cosine([1, 0], [1, 0, 5])).toBe(1);
  });

  it('adopts the sample when there is no centroid', () => {
    expect(updateCentroid(null, [1, 0], false, 0.1)).toEqual([1, 0]);
  });

  it('moves toward or away from the sample and re-normalizes', () => {
    const toward = updateCentroid([1, 0], [0, 1], true, 0.5);
    expect(toward[0]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(toward[1]).toBeCloseTo(Math.SQRT1_2, 10);

    const away = updateCentroid([1, 0], [0, 1], false, 0.5);
    expect(away[0]).toBeCloseTo(2 / Math.sqrt(5), 10);
    expect(away[1]).toBeCloseTo(-1 / Math.sqrt(5), 10);
  });
});
