/**
 * ScanOrchestrator - runs every source concurrently under one deadline.
 *
 * Each source task owns its breaker (a fresh registry per run) and converts
 * every failure into a status at its own boundary, so one unreachable source
 * never aborts the run. On the deadline, running tasks are cancelled through
 * the shared AbortSignal and keep the pages they already collected.
 */

import pLimit from 'p-limit';
import { PartialSourceError } from '../adapters/base';
import type { AdapterFactory } from '../adapters';
import { CircuitBreakerRegistry, type CircuitBreakerOptions } from '../resilience/circuitBreaker';
import { ScanCancelledError, errorMessage } from '../resilience/errors';
import type { Clock } from '../resilience/retryController';
import type { RawItem, ScanQuery, SourceAdapter } from '../types/adapter';
import type { SourceRunResult, SourceStatus } from '../types/scan';
import { logger as rootLogger, type Logger } from '../utils/logger';

export interface ScanOrchestratorOptions {
  createAdapters: AdapterFactory;
  breakerOptions: (source: string) => CircuitBreakerOptions;
  maxConcurrency: number;
  deadlineMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface OrchestratorResult {
  items: RawItem[];
  sources: SourceRunResult[];
  deadlineReached: boolean;
  durationMs: number;
}

export class ScanOrchestrator {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly options: ScanOrchestratorOptions) {
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? rootLogger.child('orchestrator');
  }

  async run(query: ScanQuery, signal?: AbortSignal): Promise<OrchestratorResult> {
    const startedAt = this.clock();
    const registry = new CircuitBreakerRegistry(this.options.breakerOptions, this.clock);
    const adapters = this.options.createAdapters(registry);

    const deadline = new AbortController();
    const timer = setTimeout(() => {
      this.log.warn('Scan deadline reached, cancelling running sources', {
        event: 'scan_deadline',
        deadlineMs: this.options.deadlineMs
      });
      deadline.abort(new ScanCancelledError());
    }, this.options.deadlineMs);
    const runSignal = signal ? AbortSignal.any([signal, deadline.signal]) : deadline.signal;

    const limit = pLimit(this.options.maxConcurrency);
    this.log.info(`Scanning ${adapters.length} sources`, {
      sources: adapters.map((adapter) => adapter.name),
      maxConcurrency: this.options.maxConcurrency,
      deadlineMs: this.options.deadlineMs
    });

    let sources: SourceRunResult[];
    try {
      sources = await Promise.all(
        adapters.map((adapter) => limit(() => this.runSource(adapter, query, registry, runSignal)))
      );
    } finally {
      clearTimeout(timer);
    }

    return {
      items: sources.flatMap((result) => result.items),
      sources,
      deadlineReached: runSignal.aborted,
      durationMs: this.clock() - startedAt
    };
  }

  private async runSource(
    adapter: SourceAdapter,
    query: ScanQuery,
    registry: CircuitBreakerRegistry,
    signal: AbortSignal
  ): Promise<SourceRunResult> {
    const startedAt = this.clock();
    const breaker = registry.get(adapter.name);
    const items: RawItem[] = [];
    let pages = 0;

    const finish = (status: SourceStatus, reason?: string): SourceRunResult => ({
      source: adapter.name,
      status,
      items,
      pages,
      durationMs: this.clock() - startedAt,
      reason,
      breaker: breaker.snapshot(),
      programs: adapter.programResults?.() ?? []
    });

    if (signal.aborted) {
      this.log.warn('Source not started before the deadline', { event: 'source_timeout', source: adapter.name });
      return finish('timed_out', 'deadline reached before the source started');
    }

    try {
      for await (const page of adapter.fetchPages(query, signal)) {
        pages += 1;
        items.push(...page);
      }
    } catch (error) {
      if (error instanceof ScanCancelledError || signal.aborted) {
        this.log.warn(`Source timed out, keeping ${items.length} items from ${pages} pages`, {
          event: 'source_timeout',
          source: adapter.name
        });
        return finish('timed_out', 'deadline reached');
      }
      if (error instanceof PartialSourceError && error.succeededSearches > 0) {
        this.log.warn('Source completed with failed searches', {
          event: 'source_partial',
          source: adapter.name,
          failures: error.failures
        });
        return finish('partial', error.message);
      }
      this.log.error(`Source ${adapter.name} failed`, error, { event: 'source_failed', source: adapter.name });
      return finish('failed', errorMessage(error));
    }

    if (!adapter.isConfigured()) {
      return finish('skipped', 'missing credential');
    }

    this.log.info(`Source ${adapter.name} complete`, { items: items.length, pages });
    return finish('ok');
  }
}
