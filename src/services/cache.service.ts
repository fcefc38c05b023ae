import { redis } from '../config/redis.js';
import { logger } from '../utils/logger.js';
import { parseSnapshot } from '../types/schemas.js';
import type { Snapshot, SnapshotHourEntry } from '../types/index.js';

const TTL = {
  SNAPSHOT: 60 * 60 * 48,
  DAY: 60 * 60 * 48,
};

const REDIS_TIMEOUT = 2000;

async function safeGet(key: string): Promise<string | null> {
  try {
    return await Promise.race([
      redis.get(key),
      new Promise<never>((_, reject) => setTimeout(() => reject(new Error('Redis timeout')), REDIS_TIMEOUT)),
    ]);
  } catch (error) {
    logger.warn({ key, error }, 'Cache get failed, skipping');
    return null;
  }
}

async function safeSet(key: string, ttl: number, value: string): Promise<void> {
  try {
    await Promise.race([
      redis.setex(key, ttl, value),
      new Promise<never>((_, reject) => setTimeout(() => reject(new Error('Redis timeout')), REDIS_TIMEOUT)),
    ]);
  } catch (error) {
    logger.warn({ key, error }, 'Cache set failed, skipping');
  }
}

async function safeDel(key: string): Promise<void> {
  try {
    await Promise.race([
      redis.del(key),
      new Promise<never>((_, reject) => setTimeout(() => reject(new Error('Redis timeout')), REDIS_TIMEOUT)),
    ]);
  } catch (error) {
    logger.warn({ key, error }, 'Cache del failed, skipping');
  }
}

function parseJson(key: string, data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    logger.warn({ key }, 'Cache entry is not valid JSON, ignoring');
    return null;
  }
}

const snapshotKey = (date: string, hour: number) => `pulse:snapshot:${date}:${hour}`;
const dayKey = (date: string) => `pulse:day:${date}`;

/**
 * Last-good copies of snapshots, served when the snapshot store cannot be
 * read. Entries are refreshed on every successful read or write.
 */
export const cacheService = {
  async getSnapshot(date: string, hour: number): Promise<Snapshot | null> {
    const key = snapshotKey(date, hour);
    const data = await safeGet(key);
    return data ? parseSnapshot(parseJson(key, data)) : null;
  },

  async setSnapshot(snapshot: Snapshot): Promise<void> {
    await safeSet(snapshotKey(snapshot.date, snapshot.hour), TTL.SNAPSHOT, JSON.stringify(snapshot));
  },

  /** Every hour of a day, as last listed from the store. */
  async getDay(date: string): Promise<SnapshotHourEntry[] | null> {
    const key = dayKey(date);
    const data = await safeGet(key);
    if (!data) return null;
    const parsed = parseJson(key, data);
    if (!Array.isArray(parsed)) return null;

    const entries: SnapshotHourEntry[] = [];
    for (const value of parsed) {
      const snapshot = parseSnapshot(value);
      if (snapshot) entries.push({ hour: snapshot.hour, snapshot });
    }
    return entries;
  },

  async setDay(date: string, entries: SnapshotHourEntry[]): Promise<void> {
    await safeSet(dayKey(date), TTL.DAY, JSON.stringify(entries.map((e) => e.snapshot)));
  },

  async invalidateDay(date: string): Promise<void> {
    await safeDel(dayKey(date));
  },
};
