import type { AffinityProfile, FeatureType } from '../types/index.js';

export interface Feature {
  type: FeatureType;
  key: string;
}

export interface FeatureSource {
  sourceId: string | null;
  interestMatches: string[];
  tags: string[];
  title: string;
  genre?: string | null;
  eventStage?: string | null;
  format?: string | null;
}

const TITLE_TOKEN = /[a-z0-9+#]{3,}/g;
const MAX_TOKEN_LENGTH = 24;

export function normalizeFeatureKey(value: string): string {
  return value.trim().toLowerCase();
}

export function titleTokens(title: string): string[] {
  const tokens: string[] = [];
  for (const m of title.toLowerCase().matchAll(TITLE_TOKEN)) {
    if (m[0].length <= MAX_TOKEN_LENGTH) tokens.push(m[0]);
  }
  return tokens;
}

/**
 * Learnable features of an article. Keys are trimmed and lower-cased, and
 * empty keys are skipped. The ranking side looks up the same keys.
 */
export function extractFeatures(src: FeatureSource): Feature[] {
  const raw: Array<[FeatureType, string | null | undefined]> = [
    ['source', src.sourceId],
    ...src.interestMatches.map((id): [FeatureType, string] => ['interest', id]),
    ...src.tags.map((t): [FeatureType, string] => ['tag', t]),
    ...titleTokens(src.title).map((t): [FeatureType, string] => ['token', t]),
    ['genre', src.genre],
    ['event', src.eventStage],
    ['format', src.format],
  ];

  const features: Feature[] = [];
  for (const [type, value] of raw) {
    if (!value) continue;
    const key = normalizeFeatureKey(value);
    if (key.length > 0) features.push({ type, key });
  }
  return features;
}

function lookup(profile: AffinityProfile, type: FeatureType, key: string | null): number {
  if (!key) return 0;
  return profile[type]?.get(normalizeFeatureKey(key)) ?? 0;
}

/**
 * Learned affinity boost in [-0.5, 0.5]: 0.5 * tanh(clamp(sum, -6, 6) / 4)
 * over the item's source, interests, tags and title tokens.
 */
export function learnedAffinity(profile: AffinityProfile, src: FeatureSource): number {
  let sum = lookup(profile, 'source', src.sourceId);
  for (const id of src.interestMatches) sum += lookup(profile, 'interest', id);
  for (const tag of src.tags) sum += lookup(profile, 'tag', tag);
  for (const tok of titleTokens(src.title)) sum += lookup(profile, 'token', tok);

  const clamped = Math.max(-6, Math.min(6, sum));
  return 0.5 * Math.tanh(clamped / 4);
}
