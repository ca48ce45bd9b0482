/**
 * Full scan run: fetch every source, diff against the previous run, persist.
 *
 * The result is handed back to the caller (scoring and reporting live
 * downstream); nothing here fails because a single source is down.
 */

import { adapterFactory, type AdapterDependencies, type AdapterFactory } from '../adapters';
import { loadEnvironmentConfig, resolveBreakerOptions, isSourceName, type EnvironmentConfig } from '../config/environment';
import type { Clock } from '../resilience/retryController';
import { SOURCE_NAMES, type ScanQuery, type SourceName } from '../types/adapter';
import type { FailedSource, RunSummary, ScanRunResult } from '../types/scan';
import { windowStart } from '../utils/dates';
import { logger as rootLogger } from '../utils/logger';
import { ChangeDetector } from './changeDetector';
import { ScanOrchestrator } from './scanOrchestrator';
import { SnapshotStore } from './snapshotStore';
import { ZombieTrackerStore } from './zombieTracker';

export interface RunScanOptions {
  /** Compute everything, write nothing */
  dryRun?: boolean;
  /** Restrict the run to these sources; the others keep their last-known items */
  sources?: SourceName[];
  env?: EnvironmentConfig;
  signal?: AbortSignal;
  now?: () => Date;
  clock?: Clock;
  adapters?: AdapterDependencies;
  /** Replaces the configured adapters entirely */
  createAdapters?: AdapterFactory;
}

const log = rootLogger.child('scan');

export async function runScan(options: RunScanOptions = {}): Promise<ScanRunResult> {
  const env = options.env ?? loadEnvironmentConfig();
  const { scanner } = env;
  const now = options.now ?? (() => new Date());
  const clock = options.clock ?? Date.now;
  const dryRun = options.dryRun ?? false;

  const started = now();
  const startedMs = clock();
  const query: ScanQuery = {
    terms: scanner.searchQueries,
    windowStart: windowStart(started, scanner.scanWindowDays),
    programs: scanner.trackedPrograms
  };

  log.info('Starting scan', {
    dryRun,
    sources: options.sources ?? 'all',
    windowDays: scanner.scanWindowDays,
    programs: Object.keys(query.programs).length
  });

  const orchestrator = new ScanOrchestrator({
    createAdapters: options.createAdapters ?? adapterFactory(env, options.sources, { now, clock, ...options.adapters }),
    breakerOptions: (source) => (isSourceName(source)
      ? resolveBreakerOptions(scanner, source)
      : scanner.resilience.circuitBreaker),
    maxConcurrency: scanner.orchestrator.maxConcurrency,
    deadlineMs: scanner.orchestrator.deadlineSeconds * 1000,
    clock
  });
  const scan = await orchestrator.run(query, options.signal);

  const snapshotStore = new SnapshotStore(scanner.changeDetection.snapshotPath);
  const trackerStore = new ZombieTrackerStore(
    scanner.changeDetection.zombieTrackerPath,
    scanner.changeDetection.zombieTrackerMaxEntries
  );
  const [previous, tracker] = await Promise.all([snapshotStore.load(), trackerStore.load()]);

  // Only a complete run replaces a source's items
  const completed = new Set<SourceName>(
    scan.sources.filter((result) => result.status === 'ok').map((result) => result.source)
  );
  const carryForwardSources = SOURCE_NAMES.filter((name) => !completed.has(name));

  const detector = new ChangeDetector({
    trackedSources: scanner.changeDetection.trackedSources,
    dormantAfterDays: scanner.changeDetection.dormantAfterDays
  });
  const detection = detector.detect({
    current: scan.items,
    previous,
    tracker,
    carryForwardSources,
    programResults: scan.sources.flatMap((result) =>
      result.programs.map((program) => ({ source: result.source, ...program }))
    ),
    now: now()
  });

  let snapshotWritten = false;
  let trackerWritten = false;
  if (dryRun) {
    log.info('Dry run, snapshot and zombie tracker not written');
  } else {
    // The snapshot is the commit point and is written last
    await trackerStore.save(detection.tracker);
    trackerWritten = true;
    await snapshotStore.save(detection.snapshot);
    snapshotWritten = true;
  }

  const failedSources: FailedSource[] = [];
  for (const result of scan.sources) {
    if (result.status !== 'ok') {
      failedSources.push({ source: result.source, status: result.status, reason: result.reason ?? result.status });
    }
  }

  const items = [...scan.items, ...detection.report.carriedForward];
  const { report } = detection;
  const summary: RunSummary = {
    totalItems: items.length,
    sourcesSucceeded: scan.sources.filter((result) => result.status === 'ok').map((result) => result.source),
    failedSources,
    added: report.summary.added,
    reappeared: report.summary.reappeared,
    removed: report.summary.removed,
    modified: report.summary.modified,
    dormant: report.dormant.length,
    dormantPrograms: report.dormantPrograms.length,
    snapshotWritten,
    trackerWritten,
    durationMs: clock() - startedMs
  };

  if (failedSources.length > 0) {
    log.warn(`${failedSources.length} sources did not complete`, { failedSources });
  }
  log.info('Scan complete', { ...summary, failedSources: failedSources.map((failed) => failed.source) });

  return {
    startedAt: started.toISOString(),
    finishedAt: now().toISOString(),
    dryRun,
    items,
    sources: scan.sources,
    changes: report,
    summary
  };
}
