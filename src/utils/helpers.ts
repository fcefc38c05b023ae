import { createHash } from 'crypto';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Clamp an integer config knob; non-finite input falls back to the default. */
export function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  const v = value === undefined || !Number.isFinite(value) ? fallback : Math.trunc(value);
  return clamp(v, min, max);
}

export function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Min-max normalize into [0, 1]. The span is floored at 1e-6 so a flat
 * input maps to all zeros instead of NaN.
 */
export function minMaxNormalize(values: number[]): number[] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = Math.max(1e-6, max - min);
  return values.map((v) => clamp((v - min) / span, 0, 1));
}

/** Case-insensitive distinct that keeps the first spelling seen. */
export function distinctIgnoreCase(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    const k = v.toLowerCase();
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(v);
  }
  return out;
}

export function distinct<T>(values: T[]): T[] {
  return [...new Set(values)];
}

/** Stable bucket in [0, 100) derived from an id, for reproducible tie-breaking. */
export function stableHashPercent(id: string): number {
  return createHash('md5').update(id).digest().readUInt32BE(0) % 100;
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / (1000 * 60 * 60);
}
