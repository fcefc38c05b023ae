import { randomUUID } from 'crypto';
import type { CandidatePipeline } from '../pipeline/candidate-pipeline.js';
import type {
  GlobalCandidate,
  GlobalQuery,
  PersonalCandidate,
  PersonalQuery,
} from '../pipeline/types.js';
import { applyTrends } from '../pipeline/trend.js';
import { parseMood } from '../pipeline/mood.js';
import type {
  Mood,
  MoodSetting,
  PulseItemView,
  PulseToday,
  RankedItem,
  Snapshot,
  SnapshotHourEntry,
  SnapshotStore,
  TimelineHour,
  UserStore,
} from '../types/index.js';
import { localTime, startOfLocalDay } from '../utils/clock.js';
import type { LocalTime } from '../utils/clock.js';
import { clamp, clampInt, distinct, minMaxNormalize } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

const DEFAULT_BLEND = 0.3;
const MIN_ON_DEMAND_TAKE = 12;
const MAX_TAKE = 50;

/** Last-good copies of snapshots, consulted when the store cannot be read. */
export interface SnapshotCache {
  getSnapshot(date: string, hour: number): Promise<Snapshot | null>;
  setSnapshot(snapshot: Snapshot): Promise<void>;
  getDay(date: string): Promise<SnapshotHourEntry[] | null>;
  setDay(date: string, entries: SnapshotHourEntry[]): Promise<void>;
  invalidateDay(date: string): Promise<void>;
}

export interface PulseServiceConfig {
  timeZone: string;
  take: number;
  /** First minutes of an hour that fall back to the latest prior hour. */
  warmupMinutes: number;
  /** Minute after which an empty hour is generated on demand, heuristics only. */
  onDemandAfterMinutes: number;
}

export interface PulseServiceDeps {
  snapshots: SnapshotStore;
  users: UserStore;
  cache: SnapshotCache;
  globalPipeline: CandidatePipeline<GlobalQuery, GlobalCandidate>;
  personalPipeline: CandidatePipeline<PersonalQuery, PersonalCandidate>;
  now?: () => Date;
}

export interface GenerateOptions {
  heuristicsOnly?: boolean;
  onlyIfMissing?: boolean;
  take?: number;
  signal?: AbortSignal;
  requestId?: string;
}

export interface GenerateResult {
  date: string;
  hour: number;
  skipped: boolean;
  count: number;
}

export interface PersonalOptions {
  mood?: string | null;
  blend?: number | null;
  take?: number;
}

interface ResolvedHour {
  time: LocalTime;
  entries: SnapshotHourEntry[];
  current: Snapshot | null;
}

export function toRankedItem(c: GlobalCandidate): RankedItem {
  return {
    articleId: c.article.id,
    title: c.article.title,
    sourceId: c.article.sourceId ?? '',
    publishedAt: c.article.publishedAt.toISOString(),
    summary: c.article.summary,
    imageUrl: c.article.imageUrl,
    scoreGlobal: c.rawScore,
    heat: c.heat,
    trend: 'NEW',
    reasons: c.reasons,
    topics: c.topics,
    clusterId: c.clusterKey,
    arousal: c.article.features.arousal,
  };
}

/** Personal target: clamp(take - 5, 3, 10). */
export function personalTarget(take: number): number {
  return clamp(take - 5, 3, 10);
}

function byHeat(a: RankedItem, b: RankedItem): number {
  return b.heat - a.heat;
}

/**
 * Hourly snapshot generation and the read path on top of it.
 *
 * Generation is idempotent per (date, hour) and writes one full snapshot.
 * Reads never call the reranker: an empty current hour is served from the
 * latest prior hour during warmup, or generated heuristics-only once the
 * on-demand minute has passed.
 */
export class PulseService {
  private now: () => Date;
  private inflight = new Map<string, Promise<GenerateResult>>();
  private warmupMinutes: number;
  private onDemandAfterMinutes: number;

  constructor(
    private deps: PulseServiceDeps,
    private config: PulseServiceConfig,
  ) {
    this.now = deps.now ?? (() => new Date());
    this.warmupMinutes = clampInt(config.warmupMinutes, 5, 0, 20);
    this.onDemandAfterMinutes = clampInt(config.onDemandAfterMinutes, 8, 0, 59);
  }

  // --- Generation ---

  async generateHour(options: GenerateOptions = {}): Promise<GenerateResult> {
    const time = localTime(this.now(), this.config.timeZone);
    if (!options.onlyIfMissing) return this.runGeneration(options);

    const key = `${time.date}:${time.hour}`;
    const pending = this.inflight.get(key);
    if (pending) {
      logger.debug({ date: time.date, hour: time.hour }, 'Joining in-flight generation');
      return pending;
    }

    const run = this.runGeneration(options).finally(() => this.inflight.delete(key));
    this.inflight.set(key, run);
    return run;
  }

  private async runGeneration(options: GenerateOptions): Promise<GenerateResult> {
    const now = this.now();
    const { date, hour } = localTime(now, this.config.timeZone);
    const requestId = options.requestId ?? randomUUID();

    if (options.onlyIfMissing && (await this.deps.snapshots.exists(date, hour))) {
      logger.debug({ requestId, date, hour }, 'Snapshot exists, generation skipped');
      return { date, hour, skipped: true, count: 0 };
    }

    const result = await this.deps.globalPipeline.execute({
      requestId,
      signal: options.signal,
      now,
      date,
      hour,
      windowStart: startOfLocalDay(now, this.config.timeZone),
      heuristicsOnly: options.heuristicsOnly ?? false,
      take: clampInt(options.take, this.config.take, 1, MAX_TAKE),
      previousRanks: new Map(),
    });
    options.signal?.throwIfAborted();

    const items = applyTrends(result.selectedCandidates.map(toRankedItem), result.query.previousRanks);
    const snapshot: Snapshot = { date, hour, updatedAt: now.toISOString(), items };

    await this.deps.snapshots.set(date, hour, snapshot);
    await Promise.all([this.deps.cache.setSnapshot(snapshot), this.deps.cache.invalidateDay(date)]);

    logger.info(
      {
        requestId,
        date,
        hour,
        count: items.length,
        reranked: result.selectedCandidates.filter((c) => c.reranked).length,
        heuristicsOnly: options.heuristicsOnly ?? false,
      },
      'Snapshot written',
    );
    return { date, hour, skipped: false, count: items.length };
  }

  // --- Reads ---

  /** Global list for today (current hour) or for a past date (its latest non-empty hour). */
  async getGlobal(options: { date?: string; take?: number } = {}): Promise<RankedItem[]> {
    const take = clampInt(options.take, this.config.take, 1, MAX_TAKE);
    const today = localTime(this.now(), this.config.timeZone);

    let snapshot: Snapshot | null;
    if (!options.date || options.date === today.date) {
      snapshot = (await this.resolveCurrentHour(take)).current;
    } else {
      const entries = await this.readDay(options.date);
      snapshot = latestNonEmpty(entries, 24);
    }

    return [...(snapshot?.items ?? [])].sort(byHeat).slice(0, take);
  }

  async getPersonal(userId: string, options: PersonalOptions = {}): Promise<PulseItemView[]> {
    const today = await this.getToday(userId, options);
    return today.personal;
  }

  async getToday(userId: string, options: PersonalOptions = {}): Promise<PulseToday> {
    const take = clampInt(options.take, this.config.take, 1, MAX_TAKE);
    const setting = await this.resolveMoodSetting(userId, options);
    const { time, entries, current } = await this.resolveCurrentHour(take);

    const currentItems = current?.items ?? [];
    const global = [...currentItems].sort(byHeat).slice(0, take);

    const result = await this.deps.personalPipeline.execute({
      requestId: randomUUID(),
      userId,
      now: this.now(),
      mood: setting.mood,
      blend: setting.blend,
      target: personalTarget(take),
      currentHour: time.hour,
      hours: entries,
      currentItems,
      excludeIds: new Set(global.map((g) => g.articleId)),
      interestNames: [],
      profile: {},
      userCentroid: null,
      globalCentroid: null,
    });

    const selected = result.selectedCandidates;
    const normalized = minMaxNormalize(selected.map((c) => c.personalScore));

    const saved = await this.savedSet(
      userId,
      distinct([...global.map((g) => g.articleId), ...selected.map((c) => c.item.articleId)]),
    );

    const timeline: TimelineHour[] = entries
      .map((e) => ({ hour: e.hour, count: e.snapshot.items.length, updatedAt: e.snapshot.updatedAt }))
      .sort((a, b) => a.hour - b.hour);

    return {
      date: time.date,
      currentHour: time.hour,
      updatedAt: current?.updatedAt ?? null,
      global: global.map((g) => ({ ...g, heat: clamp(g.heat, 0, 1), saved: saved.has(g.articleId) })),
      personal: selected.map((c, i) => ({
        ...c.item,
        reasons: c.reasons,
        scorePersonal: normalized[i],
        saved: saved.has(c.item.articleId),
      })),
      timeline,
    };
  }

  // --- Helpers ---

  private async resolveMoodSetting(userId: string, options: PersonalOptions): Promise<MoodSetting> {
    let stored: MoodSetting | null = null;
    try {
      stored = await this.deps.users.getMoodSetting(userId);
    } catch (error) {
      logger.warn({ error, userId }, 'Mood setting unavailable, using defaults');
    }

    const mood: Mood | null = parseMood(options.mood) ?? stored?.mood ?? null;
    const blend = clamp(options.blend ?? stored?.blend ?? DEFAULT_BLEND, 0, 1);
    return { mood, blend };
  }

  private async resolveCurrentHour(take: number): Promise<ResolvedHour> {
    const time = localTime(this.now(), this.config.timeZone);
    let entries = await this.readDay(time.date);
    let current = entries.find((e) => e.hour === time.hour)?.snapshot ?? null;

    if (!current || current.items.length === 0) {
      if (time.minute < this.warmupMinutes) {
        const prior = latestNonEmpty(entries, time.hour);
        if (prior) current = prior;
      } else if (time.minute >= this.onDemandAfterMinutes) {
        try {
          await this.generateHour({
            heuristicsOnly: true,
            onlyIfMissing: true,
            take: Math.max(take, MIN_ON_DEMAND_TAKE),
          });
          const fresh = await this.readSnapshot(time.date, time.hour);
          if (fresh) {
            current = fresh;
            entries = [...entries.filter((e) => e.hour !== time.hour), { hour: time.hour, snapshot: fresh }];
          }
        } catch (error) {
          logger.warn({ error, date: time.date, hour: time.hour }, 'On-demand generation failed, serving latest prior hour');
          current = latestNonEmpty(entries, time.hour) ?? current;
        }
      }
    }

    return { time, entries, current };
  }

  private async readSnapshot(date: string, hour: number): Promise<Snapshot | null> {
    try {
      const snapshot = await this.deps.snapshots.get(date, hour);
      if (snapshot) await this.deps.cache.setSnapshot(snapshot);
      return snapshot;
    } catch (error) {
      const cached = await this.deps.cache.getSnapshot(date, hour);
      if (!cached) throw error;
      logger.warn({ error, date, hour }, 'Snapshot store unavailable, serving last good snapshot');
      return cached;
    }
  }

  private async readDay(date: string): Promise<SnapshotHourEntry[]> {
    try {
      const entries = await this.deps.snapshots.listHours(date);
      await this.deps.cache.setDay(date, entries);
      return entries;
    } catch (error) {
      const cached = await this.deps.cache.getDay(date);
      if (!cached) throw error;
      logger.warn({ error, date }, 'Snapshot store unavailable, serving last good day');
      return cached;
    }
  }

  private async savedSet(userId: string, ids: string[]): Promise<Set<string>> {
    if (ids.length === 0) return new Set();
    try {
      return await this.deps.users.savedSet(userId, ids);
    } catch (error) {
      logger.warn({ error, userId }, 'Saved flags unavailable');
      return new Set();
    }
  }
}

/** Latest snapshot with items among hours strictly before `beforeHour`. */
function latestNonEmpty(entries: SnapshotHourEntry[], beforeHour: number): Snapshot | null {
  let best: SnapshotHourEntry | null = null;
  for (const e of entries) {
    if (e.hour >= beforeHour || e.snapshot.items.length === 0) continue;
    if (!best || e.hour > best.hour) best = e;
  }
  return best?.snapshot ?? null;
}
