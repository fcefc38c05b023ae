import type { EmbeddingProvider, Interest, UserStore } from '../types/index.js';
import { cosine } from '../pipeline/vector.js';
import { logger } from '../utils/logger.js';

const MATCH_THRESHOLD = 0.23;
const LEXICAL_BOOST = 0.1;
const MAX_MATCHES = 10;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Interest-name embeddings by interest id.
 *
 * Unbounded: it holds at most one vector per interest in the catalogue, and
 * the catalogue is small and curated. Empty vectors (embedder failures) are
 * not stored, so they are retried on the next match.
 */
export class InterestEmbeddingCache {
  private vectors = new Map<string, number[]>();

  get size(): number {
    return this.vectors.size;
  }

  async resolve(interest: Interest, embedder: EmbeddingProvider): Promise<number[]> {
    const cached = this.vectors.get(interest.id);
    if (cached) return cached;
    const vector = await embedder.embed(interest.name.trim());
    if (vector.length > 0) this.vectors.set(interest.id, vector);
    return vector;
  }

  clear(): void {
    this.vectors.clear();
  }
}

/**
 * Maps an article's text onto catalogue interests: cosine similarity between
 * the document and interest-name embeddings, plus small boosts for an exact
 * token hit and a word-boundary hit. Without embeddings only the lexical
 * boosts count, and together they stay under the 0.23 threshold.
 */
export class InterestMatcher {
  constructor(
    private interests: Pick<UserStore, 'listInterests'>,
    private embedder: EmbeddingProvider,
    private cache: InterestEmbeddingCache = new InterestEmbeddingCache(),
  ) {}

  async match(title: string, text: string | null): Promise<string[]> {
    const catalogue = await this.interests.listInterests();
    if (catalogue.length === 0) return [];

    const doc = text && text.trim().length > 0 ? `${title}\n${text}` : title;
    const hay = doc.toLowerCase();
    const tokens = new Set(hay.match(/[a-z0-9+#]+/g) ?? []);
    const docVector = await this.embedder.embed(doc);

    const scored: Array<{ id: string; score: number }> = [];
    for (const interest of catalogue) {
      const key = interest.name.trim().toLowerCase();
      if (key.length === 0) continue;

      let boost = 0;
      if (tokens.has(key)) boost += LEXICAL_BOOST;
      if (new RegExp(`\\b${escapeRegExp(key)}\\b`).test(hay)) boost += LEXICAL_BOOST;

      const vector = docVector.length > 0 ? await this.cache.resolve(interest, this.embedder) : [];
      const similarity = cosine(docVector, vector) ?? 0;
      const score = Math.max(0, similarity) + boost;
      if (score >= MATCH_THRESHOLD) scored.push({ id: interest.id, score });
    }

    const ids = [...new Set(scored.sort((a, b) => b.score - a.score).map((s) => s.id))].slice(0, MAX_MATCHES);
    logger.debug({ candidates: catalogue.length, matched: ids.length }, 'Interest match complete');
    return ids;
  }
}
