/**
 * SnapshotStore - one generation of the previous run's items.
 * An unusable snapshot is never fatal: the next diff treats every item as new.
 */

import { z } from 'zod';
import { SOURCE_NAMES } from '../types/adapter';
import type { RawItem } from '../types/adapter';
import type { ScanSnapshot } from '../types/scan';
import { readJsonFile, writeJsonAtomic } from '../utils/jsonFile';
import { logger as rootLogger, type Logger } from '../utils/logger';

export const rawItemSchema = z.object({
  source: z.enum(SOURCE_NAMES),
  external_id: z.string().min(1),
  title: z.string(),
  published_date: z.string(),
  payload: z.record(z.unknown())
});

const snapshotSchema = z.object({
  version: z.literal(1),
  scan_timestamp: z.string(),
  // Items are checked one by one so a single bad record does not void the baseline
  items: z.record(z.unknown())
});

export class SnapshotStore {
  private readonly log: Logger;

  constructor(readonly filePath: string, logger?: Logger) {
    this.log = logger ?? rootLogger.child('snapshot');
  }

  async load(): Promise<ScanSnapshot | null> {
    const read = await readJsonFile(this.filePath);
    if (!read.ok) {
      this.log.warn(
        read.reason === 'missing'
          ? 'No prior snapshot, every item will be reported as added'
          : 'Prior snapshot unreadable, every item will be reported as added',
        { event: 'snapshot_unavailable', reason: read.reason, path: this.filePath, error: read.message }
      );
      return null;
    }

    const parsed = snapshotSchema.safeParse(read.data);
    if (!parsed.success) {
      this.log.warn('Prior snapshot failed validation, every item will be reported as added', {
        event: 'snapshot_unavailable',
        reason: 'invalid',
        path: this.filePath,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
      return null;
    }

    const items: Record<string, RawItem> = {};
    const dropped: string[] = [];
    for (const [key, value] of Object.entries(parsed.data.items)) {
      const item = rawItemSchema.safeParse(value);
      if (item.success) {
        items[key] = item.data;
      } else {
        dropped.push(key);
      }
    }
    if (dropped.length > 0) {
      this.log.warn(`Dropped ${dropped.length} invalid items from the prior snapshot`, {
        event: 'snapshot_items_dropped',
        path: this.filePath,
        keys: dropped.slice(0, 5)
      });
    }

    this.log.debug('Loaded prior snapshot', {
      scanTimestamp: parsed.data.scan_timestamp,
      items: Object.keys(items).length
    });
    return { version: parsed.data.version, scan_timestamp: parsed.data.scan_timestamp, items };
  }

  async save(snapshot: ScanSnapshot): Promise<void> {
    await writeJsonAtomic(this.filePath, snapshot);
    this.log.info(`Snapshot written with ${Object.keys(snapshot.items).length} items`, { path: this.filePath });
  }
}
