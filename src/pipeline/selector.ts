/**
 * Candidate selectors.
 *
 *   DiversitySelector:        deterministic, capped per source and bucket (snapshot list)
 *   WeightedSamplingSelector: softmax sampling without replacement (personal list)
 */

import type { Selector } from './interfaces.js';
import type { GlobalQuery, GlobalCandidate, PersonalQuery, PersonalCandidate } from './types.js';
import { compareByFinalScore } from './scorers.js';
import { poolSize } from './sizing.js';
import type { GlobalSizing } from './sizing.js';
import { coarseBucket } from './topics.js';

export interface DiversityOptions<T> {
  target: number;
  perSourceCap: number;
  perBucketCap: number;
  sourceOf: (item: T) => string;
  bucketOf: (item: T) => string;
}

/**
 * Two passes over an already ordered list: first admit items while their
 * source and bucket are under the caps, then fill to `target` ignoring caps.
 */
export function diversify<T>(ordered: T[], options: DiversityOptions<T>): T[] {
  const bySource = new Map<string, number>();
  const byBucket = new Map<string, number>();
  const chosen: T[] = [];
  const taken = new Set<T>();

  for (const it of ordered) {
    if (chosen.length >= options.target) break;
    const src = options.sourceOf(it);
    const bucket = options.bucketOf(it);
    const sCnt = bySource.get(src) ?? 0;
    const bCnt = byBucket.get(bucket) ?? 0;
    if (sCnt >= options.perSourceCap || bCnt >= options.perBucketCap) continue;

    chosen.push(it);
    taken.add(it);
    bySource.set(src, sCnt + 1);
    byBucket.set(bucket, bCnt + 1);
  }

  for (const it of ordered) {
    if (chosen.length >= options.target) break;
    if (taken.has(it)) continue;
    chosen.push(it);
    taken.add(it);
  }

  return chosen;
}

export function sourceKey(sourceId: string | null): string {
  return (sourceId || 'source').toLowerCase();
}

export interface DiversitySelectorOptions extends GlobalSizing {
  perSourceCap: number;
  perBucketCap: number;
}

export class DiversitySelector implements Selector<GlobalQuery, GlobalCandidate> {
  name = 'DiversitySelector';

  constructor(private options: DiversitySelectorOptions) {}

  enable(): boolean {
    return true;
  }

  select(query: GlobalQuery, candidates: GlobalCandidate[]): GlobalCandidate[] {
    const ordered = [...candidates]
      .sort(compareByFinalScore)
      .slice(0, poolSize(this.options, query.take));

    return diversify(ordered, {
      target: this.options.storeCount,
      perSourceCap: this.options.perSourceCap,
      perBucketCap: this.options.perBucketCap,
      sourceOf: (c) => sourceKey(c.article.sourceId),
      bucketOf: (c) => coarseBucket(c.topics),
    });
  }
}

// ---------------------------------------------------------------------------
// Personal sampling
// ---------------------------------------------------------------------------

export interface WeightedSamplingOptions {
  perSourceCap: number;
  perBucketCap: number;
  minBuckets: number;
  /** Uniform [0, 1); injectable for reproducible tests. */
  random?: () => number;
  temperature?: number;
}

const DEFAULT_TEMPERATURE = 0.9;

function byPersonalScore(a: PersonalCandidate, b: PersonalCandidate): number {
  return b.personalScore - a.personalScore;
}

/** Running per-source and per-bucket counts of a selection. */
class CapCounter {
  private sources = new Map<string, number>();
  private buckets = new Map<string, number>();

  add(c: PersonalCandidate): void {
    const src = sourceKey(c.item.sourceId);
    this.sources.set(src, (this.sources.get(src) ?? 0) + 1);
    this.buckets.set(c.bucket, (this.buckets.get(c.bucket) ?? 0) + 1);
  }

  remove(c: PersonalCandidate): void {
    const src = sourceKey(c.item.sourceId);
    this.sources.set(src, (this.sources.get(src) ?? 1) - 1);
    this.buckets.set(c.bucket, (this.buckets.get(c.bucket) ?? 1) - 1);
  }

  source(c: PersonalCandidate): number {
    return this.sources.get(sourceKey(c.item.sourceId)) ?? 0;
  }

  bucket(c: PersonalCandidate): number {
    return this.buckets.get(c.bucket) ?? 0;
  }

  bucketCount(): number {
    let n = 0;
    for (const v of this.buckets.values()) if (v > 0) n++;
    return n;
  }
}

/**
 * Softmax sampling (T = 0.9) without replacement from the top max(k * 4, 24)
 * by personal score. A draw that would break a cap is discarded. If the
 * selection spans fewer than `minBuckets` buckets, the highest-scored items
 * from unused buckets are added, displacing the weakest item of a repeated
 * bucket once the list is full. Any remaining room is filled by score.
 * Output is ordered by personal score.
 */
export class WeightedSamplingSelector implements Selector<PersonalQuery, PersonalCandidate> {
  name = 'WeightedSamplingSelector';
  private random: () => number;
  private temperature: number;

  constructor(private options: WeightedSamplingOptions) {
    this.random = options.random ?? Math.random;
    this.temperature = Math.max(1e-6, options.temperature ?? DEFAULT_TEMPERATURE);
  }

  enable(): boolean {
    return true;
  }

  select(query: PersonalQuery, candidates: PersonalCandidate[]): PersonalCandidate[] {
    const k = query.target;
    const pool = [...candidates].sort(byPersonalScore).slice(0, Math.max(k * 4, 24));
    const weights = pool.map((c) => Math.exp(c.personalScore / this.temperature));

    const counts = new CapCounter();
    const chosen: PersonalCandidate[] = [];
    const withinCaps = (c: PersonalCandidate) =>
      counts.source(c) < this.options.perSourceCap && counts.bucket(c) < this.options.perBucketCap;

    const active = pool.map((_, i) => i);
    while (chosen.length < k && active.length > 0) {
      const total = active.reduce((acc, i) => acc + weights[i], 0);
      if (!(total > 1e-12)) break;

      const r = this.random() * total;
      let pick = active.length - 1;
      let cum = 0;
      for (let j = 0; j < active.length; j++) {
        cum += weights[active[j]];
        if (r < cum) {
          pick = j;
          break;
        }
      }

      const cand = pool[active[pick]];
      active.splice(pick, 1);
      if (withinCaps(cand)) {
        chosen.push(cand);
        counts.add(cand);
      }
    }

    if (counts.bucketCount() < this.options.minBuckets) {
      for (const cand of pool) {
        if (counts.bucketCount() >= this.options.minBuckets) break;
        if (chosen.includes(cand) || counts.bucket(cand) > 0) continue;
        if (counts.source(cand) >= this.options.perSourceCap) continue;

        if (chosen.length >= k) {
          const victim = this.weakestRepeated(chosen, counts);
          if (!victim) break;
          chosen.splice(chosen.indexOf(victim), 1);
          counts.remove(victim);
        }
        chosen.push(cand);
        counts.add(cand);
      }
    }

    for (const cand of pool) {
      if (chosen.length >= k) break;
      if (chosen.includes(cand)) continue;
      chosen.push(cand);
      counts.add(cand);
    }

    return chosen.sort(byPersonalScore);
  }

  private weakestRepeated(chosen: PersonalCandidate[], counts: CapCounter): PersonalCandidate | null {
    let weakest: PersonalCandidate | null = null;
    for (const c of chosen) {
      if (counts.bucket(c) <= 1) continue;
      if (!weakest || c.personalScore < weakest.personalScore) weakest = c;
    }
    return weakest;
  }
}
