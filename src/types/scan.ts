import type { IdentityKey, ProgramResult, RawItem, SourceName } from './adapter';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerState {
  source_name: string;
  state: CircuitState;
  consecutive_terminal_failures: number;
  opened_at: number | null; // epoch ms, null while CLOSED
}

export interface ScanSnapshot {
  version: 1;
  scan_timestamp: string;
  items: Record<string, RawItem>;
}

export interface ZombieTrackerEntry {
  identifier: string;
  first_seen_timestamp: string;
  last_seen_timestamp: string;
  disappearance_count: number;
  absent_since: string | null;
}

/** Keyed `source:program`; `zero_since` is set while the program search returns nothing. */
export interface ProgramTrackerEntry {
  source: SourceName;
  program: string;
  last_results: string | null;
  zero_since: string | null;
}

export interface ZombieTrackerState {
  version: 1;
  updated_at: string;
  entries: Record<string, ZombieTrackerEntry>;
  programs: Record<string, ProgramTrackerEntry>;
}

export type SourceStatus = 'ok' | 'partial' | 'failed' | 'timed_out' | 'skipped';

export interface SourceRunResult {
  source: SourceName;
  status: SourceStatus;
  items: RawItem[];
  pages: number;
  durationMs: number;
  reason?: string;
  breaker: CircuitBreakerState;
  programs: ProgramResult[];
}

export type TrackedField = 'title' | 'published_date' | 'payload';

export interface ModifiedItem {
  key: IdentityKey;
  previous: RawItem;
  current: RawItem;
  changedFields: TrackedField[];
}

export interface ReappearedItem {
  key: IdentityKey;
  item: RawItem;
  disappearance_count: number;
  absent_since: string | null;
}

export interface DormantIdentifier {
  key: string;
  days_absent: number;
  absent_since: string;
  last_seen_timestamp: string;
}

export interface DormantProgram {
  key: string;
  source: SourceName;
  program: string;
  days_zero: number;
  zero_since: string;
  last_results: string | null;
}

export interface ChangeReport {
  baseline: 'snapshot' | 'none';
  added: RawItem[];
  reappeared: ReappearedItem[];
  removed: RawItem[];
  modified: ModifiedItem[];
  unchanged: IdentityKey[];
  carriedForward: RawItem[];
  dormant: DormantIdentifier[];
  dormantPrograms: DormantProgram[];
  summary: {
    added: number;
    reappeared: number;
    removed: number;
    modified: number;
    unchanged: number;
    carriedForward: number;
    totalCurrent: number;
    totalPrevious: number;
  };
}

export interface FailedSource {
  source: SourceName;
  status: Exclude<SourceStatus, 'ok'>;
  reason: string;
}

export interface RunSummary {
  totalItems: number;
  sourcesSucceeded: SourceName[];
  failedSources: FailedSource[];
  added: number;
  reappeared: number;
  removed: number;
  modified: number;
  dormant: number;
  dormantPrograms: number;
  snapshotWritten: boolean;
  trackerWritten: boolean;
  durationMs: number;
}

export interface ScanRunResult {
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  items: RawItem[];
  sources: SourceRunResult[];
  changes: ChangeReport;
  summary: RunSummary;
}
