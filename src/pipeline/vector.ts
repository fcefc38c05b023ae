/** Unit-normalize; a zero vector stays zero. */
export function normalize(v: readonly number[]): number[] {
  const n = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (n <= 1e-9) return v.map(() => 0);
  return v.map((x) => x / n);
}

/** Cosine similarity over the shared prefix; null when either side is empty or zero. */
export function cosine(a: readonly number[], b: readonly number[]): number | null {
  const len = Math.min(a.length, b.length);
  if (len === 0) return null;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na <= 1e-9 || nb <= 1e-9) return null;
  return dot / Math.sqrt(na * nb);
}

/**
 * One EMA step of a centroid relative to a unit sample, re-normalized.
 * toward: (1 - alpha) * c + alpha * s. away: c - alpha * s.
 * An empty centroid adopts the sample.
 */
export function updateCentroid(
  current: readonly number[] | null,
  sampleUnit: readonly number[],
  toward: boolean,
  alpha: number,
): number[] {
  if (!current || current.length === 0) return [...sampleUnit];
  const len = Math.min(current.length, sampleUnit.length);
  const next = new Array<number>(len);
  for (let i = 0; i < len; i++) {
    next[i] = toward
      ? current[i] * (1 - alpha) + sampleUnit[i] * alpha
      : current[i] - sampleUnit[i] * alpha;
  }
  return normalize(next);
}
