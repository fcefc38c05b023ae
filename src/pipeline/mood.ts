/**
 * Mood archetypes as data. Each profile lists the keywords and patterns that
 * signal a fit, the bonus they earn, an optional age band, and the lookback
 * window used to build the personal pool. Adding a mood means adding a row.
 */

import { MOODS } from '../types/index.js';
import type { Mood } from '../types/index.js';
import { clamp } from '../utils/helpers.js';

export const EXPLAINER_PATTERN = /\b(what is|why|how|explainer|q&a|faq|guide|analysis|deep dive)\b/;
export const LIVE_BREAKING_PATTERN = /\b(live|breaking|wins|win|beats|defeats|launch|announces)\b/;

interface AgeBand {
  splitHours: number;
  /** Added when age < splitHours (or <= when freshInclusive). */
  fresh: number;
  aged: number;
  freshInclusive?: boolean;
}

export interface MoodProfile {
  lookbackHours: number;
  keywords: string[];
  patterns: RegExp[];
  keywordBonus: number;
  /** Bonus when the text does not read as live or breaking. */
  notLiveBonus?: number;
  ageBand?: AgeBand;
}

export const MOOD_PROFILES: Record<Mood, MoodProfile> = {
  Calm: {
    lookbackHours: 6,
    keywords: ['wholesome', 'nature', 'uplift', 'guide'],
    patterns: [],
    keywordBonus: 0.6,
    notLiveBonus: 0.15,
  },
  Focused: {
    lookbackHours: 8,
    keywords: ['analysis', 'policy', 'report'],
    patterns: [EXPLAINER_PATTERN],
    keywordBonus: 0.7,
    ageBand: { splitHours: 2, fresh: -0.05, aged: 0.1 },
  },
  Curious: {
    lookbackHours: 6,
    keywords: ['science', 'research', 'discovery', 'space'],
    patterns: [EXPLAINER_PATTERN],
    keywordBonus: 0.7,
  },
  Hyped: {
    lookbackHours: 3,
    keywords: ['sports', 'launch', 'win'],
    patterns: [LIVE_BREAKING_PATTERN],
    keywordBonus: 0.7,
    ageBand: { splitHours: 3, fresh: 0.25, aged: 0, freshInclusive: true },
  },
  Meh: {
    lookbackHours: 4,
    keywords: ['roundup', 'recap', 'list', 'visual', 'summary'],
    patterns: [],
    keywordBonus: 0.65,
  },
  Stressed: {
    lookbackHours: 5,
    keywords: ['solutions', 'how to', 'how-to'],
    patterns: [EXPLAINER_PATTERN],
    keywordBonus: 0.7,
    ageBand: { splitHours: 1.5, fresh: 0, aged: 0.05 },
  },
  Sad: {
    lookbackHours: 6,
    keywords: ['human', 'good news', 'wholesome', 'community', 'uplift'],
    patterns: [],
    keywordBonus: 0.75,
  },
};

const MOOD_BY_KEY = new Map<string, Mood>(MOODS.map((m) => [m.toLowerCase(), m]));

/** Map any mood string onto a known mood; unknown values become Calm. */
export function normalizeMood(value: string): Mood {
  return MOOD_BY_KEY.get(value.trim().toLowerCase()) ?? 'Calm';
}

/** Like normalizeMood, but blank or missing input means "no mood". */
export function parseMood(value: string | null | undefined): Mood | null {
  if (!value || value.trim().length === 0) return null;
  return normalizeMood(value);
}

/** Personal pool lookback: mood base, grown toward comfort, shrunk toward challenge. */
export function moodLookbackHours(mood: Mood | null, blend: number): number {
  const base = MOOD_PROFILES[mood ?? 'Calm'].lookbackHours;
  return clamp(base + Math.round((0.5 - blend) * 2), 2, 12);
}

export interface MoodScoreInput {
  title: string;
  summary: string | null;
  topics: string[];
  ageHours: number;
  arousal: number | null;
}

function ageBandBonus(band: AgeBand, ageHours: number): number {
  const fresh = band.freshInclusive ? ageHours <= band.splitHours : ageHours < band.splitHours;
  return fresh ? band.fresh : band.aged;
}

/**
 * Small centered term in [-0.04, 0.04] rewarding arousal close to the
 * blend: low blend (comfort) targets calm content, high blend livelier.
 */
export function arousalCloseness(arousal: number | null, blend: number): number {
  if (arousal === null) return 0;
  return 0.08 * (1 - Math.abs(clamp(arousal, 0, 1) - clamp(blend, 0, 1))) - 0.04;
}

/**
 * Mood fit in [0, 1], centered on 0.5. With no mood selected the score is
 * exactly 0.5 and contributes nothing downstream.
 */
export function moodScore(mood: Mood | null, blend: number, input: MoodScoreInput): number {
  if (mood === null) return 0.5;
  const profile = MOOD_PROFILES[mood];
  const text = `${input.title} ${input.summary ?? ''} ${input.topics.join(' ')}`.toLowerCase();
  const hours = Math.max(0.25, input.ageHours);

  let affinity = 0;
  const hit =
    profile.keywords.some((k) => text.includes(k)) || profile.patterns.some((p) => p.test(text));
  if (hit) affinity += profile.keywordBonus;
  if (profile.notLiveBonus !== undefined && !LIVE_BREAKING_PATTERN.test(text)) {
    affinity += profile.notLiveBonus;
  }
  if (profile.ageBand) affinity += ageBandBonus(profile.ageBand, hours);

  const recency = 1 / Math.pow(hours, 0.35);
  const blendRecency = Math.min(0.18, recency * (0.12 + 0.18 * blend));

  const score = 0.5 + 0.4 * Math.tanh(affinity) + blendRecency + arousalCloseness(input.arousal, blend);
  return clamp(score, 0, 1);
}
