import { lexicon } from '../config/lexicon.js';
import { distinctIgnoreCase } from '../utils/helpers.js';

const MAX_TAG_TOPICS = 6;
const MAX_TOPICS = 8;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const topicMatchers: Array<{ pattern: RegExp; topic: string }> = lexicon.topicMap.map(
  ([token, topic]) => ({
    pattern: new RegExp(`(^|[^a-z0-9])${escapeRegExp(token)}($|[^a-z0-9])`),
    topic,
  }),
);

/**
 * Keyword-derived topics for items that carry no tags. Falls back to the
 * first few longer words when no mapped keyword matches.
 */
export function extractTopics(title: string, summary: string | null): string[] {
  const text = `${title} ${summary ?? ''}`.toLowerCase();
  const topics = new Set<string>();
  for (const { pattern, topic } of topicMatchers) {
    if (pattern.test(text)) topics.add(topic);
  }
  if (topics.size > 0) return [...topics];

  for (const match of text.matchAll(/\b[a-z0-9+#]{4,}\b/g)) {
    if (topics.size >= MAX_TAG_TOPICS) break;
    topics.add(match[0]);
  }
  return [...topics];
}

export function normalizeTopics(tags: string[], title: string, summary: string | null): string[] {
  const base = tags.length > 0 ? tags.slice(0, MAX_TAG_TOPICS) : extractTopics(title, summary);
  const trimmed = base.map((t) => t.trim()).filter((t) => t.length > 0);
  return distinctIgnoreCase(trimmed).slice(0, MAX_TOPICS);
}

const ontology = lexicon.bucketOntology.map((b) => b.toLowerCase());

/**
 * Coarse diversity bucket: first ontology entry present among the topics,
 * else the first raw topic, else "misc".
 */
export function coarseBucket(topics: string[]): string {
  if (topics.length === 0) return 'misc';
  const lowered = new Set(topics.map((t) => t.toLowerCase()));
  for (const bucket of ontology) {
    if (lowered.has(bucket)) return bucket;
  }
  return topics[0].toLowerCase();
}
