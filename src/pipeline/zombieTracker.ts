/**
 * ZombieTracker persistence.
 * Entries are only mutated by the change detector; this module loads them,
 * bounds their number and writes them back.
 */

import { z } from 'zod';
import { SOURCE_NAMES } from '../types/adapter';
import type { ZombieTrackerEntry, ZombieTrackerState } from '../types/scan';
import { readJsonFile, writeJsonAtomic } from '../utils/jsonFile';
import { logger as rootLogger, type Logger } from '../utils/logger';

const entrySchema = z.object({
  identifier: z.string(),
  first_seen_timestamp: z.string(),
  last_seen_timestamp: z.string(),
  disappearance_count: z.number().int().min(0),
  absent_since: z.string().nullable()
});

const programSchema = z.object({
  source: z.enum(SOURCE_NAMES),
  program: z.string(),
  last_results: z.string().nullable(),
  zero_since: z.string().nullable()
});

const stateSchema = z.object({
  version: z.literal(1),
  updated_at: z.string(),
  entries: z.record(entrySchema),
  // Files written before program tracking have no `programs`
  programs: z.record(programSchema).default({})
});

export function emptyTrackerState(): ZombieTrackerState {
  return { version: 1, updated_at: '', entries: {}, programs: {} };
}

/** Keeps at most `maxEntries`, evicting the oldest `last_seen_timestamp` first. */
export function enforceRetention(state: ZombieTrackerState, maxEntries: number): { state: ZombieTrackerState; evicted: string[] } {
  const entries = Object.values(state.entries);
  if (entries.length <= maxEntries) {
    return { state, evicted: [] };
  }

  const byRecency = [...entries].sort(compareLastSeen);
  const evicted = byRecency.slice(0, entries.length - maxEntries).map((entry) => entry.identifier);
  const kept: Record<string, ZombieTrackerEntry> = {};
  for (const entry of byRecency.slice(entries.length - maxEntries)) {
    kept[entry.identifier] = entry;
  }
  return { state: { ...state, entries: kept }, evicted };
}

function compareLastSeen(a: ZombieTrackerEntry, b: ZombieTrackerEntry): number {
  const diff = Date.parse(a.last_seen_timestamp) - Date.parse(b.last_seen_timestamp);
  if (diff !== 0 && !Number.isNaN(diff)) return diff;
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}

export class ZombieTrackerStore {
  private readonly log: Logger;

  constructor(
    readonly filePath: string,
    private readonly maxEntries: number,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child('zombie-tracker');
  }

  async load(): Promise<ZombieTrackerState> {
    const read = await readJsonFile(this.filePath);
    if (!read.ok) {
      this.log.warn('Zombie tracker unavailable, starting empty', {
        event: 'zombie_tracker_unavailable',
        reason: read.reason,
        path: this.filePath,
        error: read.message
      });
      return emptyTrackerState();
    }

    const parsed = stateSchema.safeParse(read.data);
    if (!parsed.success) {
      this.log.warn('Zombie tracker failed validation, starting empty', {
        event: 'zombie_tracker_unavailable',
        reason: 'invalid',
        path: this.filePath
      });
      return emptyTrackerState();
    }
    return parsed.data;
  }

  async save(state: ZombieTrackerState): Promise<ZombieTrackerState> {
    const { state: bounded, evicted } = enforceRetention(state, this.maxEntries);
    if (evicted.length > 0) {
      this.log.info(`Evicted ${evicted.length} stale tracker entries`, { maxEntries: this.maxEntries });
    }
    await writeJsonAtomic(this.filePath, bounded);
    return bounded;
  }
}
