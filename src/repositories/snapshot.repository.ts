import { z } from 'zod';
import { supabase } from '../config/supabase.js';
import { logger } from '../utils/logger.js';
import { rankedItemSchema } from '../types/schemas.js';
import type { Snapshot, SnapshotHourEntry, SnapshotStore } from '../types/index.js';

const snapshotRowSchema = z.object({
  date: z.string(),
  hour: z.number().int(),
  updated_at: z.string(),
  items: z.array(rankedItemSchema).nullish().transform((v) => v ?? []),
});

function toSnapshot(raw: unknown): Snapshot | null {
  const parsed = snapshotRowSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues.slice(0, 3) }, 'Skipping malformed snapshot row');
    return null;
  }
  const row = parsed.data;
  return { date: row.date, hour: row.hour, updatedAt: row.updated_at, items: row.items };
}

/** One row per (date, hour). Writes are a single upsert, so each hour is replaced whole. */
export const snapshotRepository: SnapshotStore = {
  async get(date: string, hour: number): Promise<Snapshot | null> {
    const { data, error } = await supabase
      .from('pulse_snapshots')
      .select('date, hour, updated_at, items')
      .eq('date', date)
      .eq('hour', hour)
      .maybeSingle();

    if (error) {
      logger.error({ error, date, hour }, 'Failed to fetch snapshot');
      throw error;
    }

    return data ? toSnapshot(data) : null;
  },

  async set(date: string, hour: number, snapshot: Snapshot): Promise<void> {
    const { error } = await supabase.from('pulse_snapshots').upsert(
      {
        date,
        hour,
        updated_at: snapshot.updatedAt,
        items: snapshot.items,
      },
      { onConflict: 'date,hour' },
    );

    if (error) {
      logger.error({ error, date, hour }, 'Failed to write snapshot');
      throw error;
    }
  },

  async listHours(date: string): Promise<SnapshotHourEntry[]> {
    const { data, error } = await supabase
      .from('pulse_snapshots')
      .select('date, hour, updated_at, items')
      .eq('date', date)
      .order('hour', { ascending: true });

    if (error) {
      logger.error({ error, date }, 'Failed to list snapshot hours');
      throw error;
    }

    const entries: SnapshotHourEntry[] = [];
    for (const row of data ?? []) {
      const snapshot = toSnapshot(row);
      if (snapshot) entries.push({ hour: snapshot.hour, snapshot });
    }
    return entries;
  },

  async exists(date: string, hour: number): Promise<boolean> {
    const { count, error } = await supabase
      .from('pulse_snapshots')
      .select('hour', { count: 'exact', head: true })
      .eq('date', date)
      .eq('hour', hour);

    if (error) {
      logger.error({ error, date, hour }, 'Failed to check snapshot');
      throw error;
    }

    return (count ?? 0) > 0;
  },
};
