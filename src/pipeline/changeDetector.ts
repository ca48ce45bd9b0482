/**
 * ChangeDetector - diffs this run's items against the previous snapshot.
 *
 * Every identity key lands in exactly one of added / removed / modified /
 * unchanged, where `reappeared` is the part of `added` the zombie tracker has
 * seen disappear before. Items of sources that did not complete are carried
 * forward from the snapshot instead of being reported as removed.
 *
 * Tracked program searches (CFDA numbers) are followed the same way: a program
 * that keeps returning zero results for dormantAfterDays is reported dormant.
 *
 * The detector is pure: it returns the next snapshot and tracker state and
 * leaves persistence to the caller.
 */

import CryptoJS from 'crypto-js';
import { identityKey, type IdentityKey, type ProgramResult, type RawItem, type SourceName } from '../types/adapter';
import type {
  ChangeReport,
  DormantIdentifier,
  DormantProgram,
  ModifiedItem,
  ProgramTrackerEntry,
  ReappearedItem,
  ScanSnapshot,
  TrackedField,
  ZombieTrackerEntry,
  ZombieTrackerState
} from '../types/scan';
import { daysBetween } from '../utils/dates';
import { logger as rootLogger, type Logger } from '../utils/logger';

export interface ChangeDetectorOptions {
  trackedSources: SourceName[];
  dormantAfterDays: number;
  logger?: Logger;
}

export interface ProgramSearchResult extends ProgramResult {
  source: SourceName;
}

export interface ChangeDetectionInput {
  current: RawItem[];
  previous: ScanSnapshot | null;
  tracker: ZombieTrackerState;
  /** Sources whose prior items are kept as last-known data */
  carryForwardSources: SourceName[];
  /** Completed program searches of this run */
  programResults?: ProgramSearchResult[];
  now: Date;
}

export interface ChangeDetectionResult {
  report: ChangeReport;
  snapshot: ScanSnapshot;
  tracker: ZombieTrackerState;
}

/** JSON with object keys sorted, so equal payloads hash equally. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) => {
    if (nested !== null && typeof nested === 'object' && !Array.isArray(nested)) {
      return Object.fromEntries(
        Object.entries(nested).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return nested;
  });
}

export function payloadFingerprint(payload: Record<string, unknown>): string {
  return CryptoJS.SHA256(stableStringify(payload)).toString();
}

export function changedFields(previous: RawItem, current: RawItem): TrackedField[] {
  const fields: TrackedField[] = [];
  if (previous.title !== current.title) fields.push('title');
  if (previous.published_date !== current.published_date) fields.push('published_date');
  if (payloadFingerprint(previous.payload) !== payloadFingerprint(current.payload)) fields.push('payload');
  return fields;
}

export class ChangeDetector {
  private readonly log: Logger;

  constructor(private readonly options: ChangeDetectorOptions) {
    this.log = options.logger ?? rootLogger.child('changes');
  }

  /** Tracked items carry a CFDA number from a CFDA-queried source. */
  isTrackable(item: RawItem): boolean {
    return this.options.trackedSources.includes(item.source) && typeof item.payload.cfda === 'string';
  }

  detect(input: ChangeDetectionInput): ChangeDetectionResult {
    const { previous, now } = input;
    const nowIso = now.toISOString();
    const previousItems = previous?.items ?? {};
    const entries: Record<string, ZombieTrackerEntry> = {};
    for (const [key, entry] of Object.entries(input.tracker.entries)) {
      entries[key] = { ...entry };
    }

    const current = new Map<IdentityKey, RawItem>();
    for (const item of input.current) {
      const key = identityKey(item);
      if (!current.has(key)) current.set(key, item);
    }

    const added: RawItem[] = [];
    const reappeared: ReappearedItem[] = [];
    const modified: ModifiedItem[] = [];
    const unchanged: IdentityKey[] = [];
    const removed: RawItem[] = [];
    const carriedForward: RawItem[] = [];
    const nextItems: Record<string, RawItem> = {};

    for (const [key, item] of current) {
      nextItems[key] = item;
      const before = previousItems[key];
      const entry = this.isTrackable(item) ? entries[key] : undefined;

      if (!before) {
        if (entry && entry.absent_since !== null && entry.disappearance_count > 0) {
          reappeared.push({
            key,
            item,
            disappearance_count: entry.disappearance_count,
            absent_since: entry.absent_since
          });
        } else {
          added.push(item);
        }
      } else {
        const fields = changedFields(before, item);
        if (fields.length > 0) {
          modified.push({ key, previous: before, current: item, changedFields: fields });
        } else {
          unchanged.push(key);
        }
      }

      if (this.isTrackable(item)) {
        entries[key] = {
          identifier: key,
          first_seen_timestamp: entries[key]?.first_seen_timestamp ?? nowIso,
          last_seen_timestamp: nowIso,
          disappearance_count: entries[key]?.disappearance_count ?? 0,
          absent_since: null
        };
      }
    }

    for (const [key, before] of Object.entries(previousItems)) {
      const previousKey = identityKey(before);
      if (current.has(previousKey)) continue;

      if (input.carryForwardSources.includes(before.source)) {
        nextItems[key] = before;
        carriedForward.push(before);
        unchanged.push(previousKey);
        continue;
      }

      removed.push(before);
      if (this.isTrackable(before)) {
        const entry = entries[previousKey];
        // A run that failed to write its snapshot may already have counted this disappearance
        if (entry?.absent_since && previous && entry.absent_since > previous.scan_timestamp) continue;
        entries[previousKey] = {
          identifier: previousKey,
          first_seen_timestamp: entry?.first_seen_timestamp ?? previous?.scan_timestamp ?? nowIso,
          last_seen_timestamp: entry?.last_seen_timestamp ?? previous?.scan_timestamp ?? nowIso,
          disappearance_count: (entry?.disappearance_count ?? 0) + 1,
          absent_since: nowIso
        };
      }
    }

    if (carriedForward.length > 0) {
      const bySource: Record<string, number> = {};
      for (const item of carriedForward) {
        bySource[item.source] = (bySource[item.source] ?? 0) + 1;
      }
      this.log.warn(`Carried forward ${carriedForward.length} items from the previous snapshot`, {
        event: 'carry_forward',
        bySource
      });
    }

    const dormant = this.dormantIdentifiers(Object.values(entries), now);
    if (dormant.length > 0) {
      this.log.warn(`${dormant.length} tracked identifiers dormant for ${this.options.dormantAfterDays}+ days`, {
        event: 'dormant_identifiers',
        identifiers: dormant.map((entry) => entry.key)
      });
    }

    const programs = this.updatePrograms(input.tracker.programs, input.programResults ?? [], nowIso);
    const dormantPrograms = this.dormantPrograms(Object.values(programs), now);
    for (const program of dormantPrograms) {
      this.log.warn(
        `CFDA ${program.program} has returned 0 results for ${program.days_zero} days, check for ALN archival or migration`,
        { event: 'dormant_program', source: program.source, zeroSince: program.zero_since }
      );
    }

    const report: ChangeReport = {
      baseline: previous ? 'snapshot' : 'none',
      added,
      reappeared,
      removed,
      modified,
      unchanged,
      carriedForward,
      dormant,
      dormantPrograms,
      summary: {
        added: added.length,
        reappeared: reappeared.length,
        removed: removed.length,
        modified: modified.length,
        unchanged: unchanged.length,
        carriedForward: carriedForward.length,
        totalCurrent: Object.keys(nextItems).length,
        totalPrevious: Object.keys(previousItems).length
      }
    };

    this.log.info('Change detection complete', { ...report.summary, baseline: report.baseline });

    return {
      report,
      snapshot: { version: 1, scan_timestamp: nowIso, items: nextItems },
      tracker: { version: 1, updated_at: nowIso, entries, programs }
    };
  }

  private updatePrograms(
    tracked: Record<string, ProgramTrackerEntry>,
    results: ProgramSearchResult[],
    nowIso: string
  ): Record<string, ProgramTrackerEntry> {
    const programs: Record<string, ProgramTrackerEntry> = {};
    for (const [key, entry] of Object.entries(tracked)) {
      programs[key] = { ...entry };
    }
    for (const { source, program, results: count } of results) {
      const key = `${source}:${program}`;
      const entry = programs[key];
      programs[key] = count > 0
        ? { source, program, last_results: nowIso, zero_since: null }
        : { source, program, last_results: entry?.last_results ?? null, zero_since: entry?.zero_since ?? nowIso };
    }
    return programs;
  }

  private dormantPrograms(entries: ProgramTrackerEntry[], now: Date): DormantProgram[] {
    const dormant: DormantProgram[] = [];
    for (const entry of entries) {
      if (entry.zero_since === null) continue;
      const daysZero = daysBetween(new Date(entry.zero_since), now);
      if (daysZero >= this.options.dormantAfterDays) {
        dormant.push({
          key: `${entry.source}:${entry.program}`,
          source: entry.source,
          program: entry.program,
          days_zero: daysZero,
          zero_since: entry.zero_since,
          last_results: entry.last_results
        });
      }
    }
    return dormant.sort((a, b) => b.days_zero - a.days_zero);
  }

  private dormantIdentifiers(entries: ZombieTrackerEntry[], now: Date): DormantIdentifier[] {
    const dormant: DormantIdentifier[] = [];
    for (const entry of entries) {
      if (entry.absent_since === null) continue;
      const daysAbsent = daysBetween(new Date(entry.absent_since), now);
      if (daysAbsent >= this.options.dormantAfterDays) {
        dormant.push({
          key: entry.identifier,
          days_absent: daysAbsent,
          absent_since: entry.absent_since,
          last_seen_timestamp: entry.last_seen_timestamp
        });
      }
    }
    return dormant.sort((a, b) => b.days_absent - a.days_absent);
  }
}
