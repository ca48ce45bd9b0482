/**
 * Shared plumbing for every source adapter.
 *
 * An adapter is a list of searches (one per query term, CFDA number, ...), each
 * paginated to exhaustion or to the source's maxPages ceiling. Every request is
 * routed through CircuitBreaker(RetryController(http)) and its envelope is
 * validated with zod inside the attempt, so a malformed body is a terminal
 * failure the breaker can see.
 *
 * A failed search does not stop the others: the breaker decides when to stop
 * hitting the network. Failures are reported together at the end as a
 * PartialSourceError.
 */

import type { z } from 'zod';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { HttpExecutor, HttpRequest } from '../utils/httpClient';
import { failure, success, type AttemptOutcome } from '../types/outcome';
import type { ProgramResult, RawItem, ScanQuery, SourceAdapter, SourceName } from '../types/adapter';
import type { SourceConfig } from '../config/environment';
import type { CircuitBreaker } from '../resilience/circuitBreaker';
import type { RetryController } from '../resilience/retryController';
import { CircuitOpenError, ScanCancelledError, TerminalSourceError, errorMessage } from '../resilience/errors';

export interface AdapterContext<S extends SourceName> {
  config: SourceConfig<S>;
  credential?: string;
  breaker: CircuitBreaker;
  retry: RetryController;
  http: HttpExecutor;
  logger?: Logger;
  now?: () => Date;
}

export interface Search {
  label: string;
  /** CFDA number whose result count is tracked across runs */
  program?: string;
  run: (signal?: AbortSignal) => AsyncGenerator<RawItem[], void, undefined>;
}

export interface SearchFailure {
  search: string;
  error: string;
}

export class PartialSourceError extends Error {
  constructor(
    readonly source: SourceName,
    readonly failures: SearchFailure[],
    readonly succeededSearches: number
  ) {
    super(`${source}: ${failures.length} of ${failures.length + succeededSearches} searches failed (first: ${failures[0]?.error ?? 'unknown'})`);
    this.name = 'PartialSourceError';
  }
}

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export abstract class BaseSourceAdapter<S extends SourceName> implements SourceAdapter {
  protected readonly log: Logger;
  private credentialWarningLogged = false;
  private completedPrograms: ProgramResult[] = [];

  constructor(
    readonly name: S,
    protected readonly context: AdapterContext<S>
  ) {
    this.log = context.logger ?? rootLogger.child(name);
  }

  protected abstract searches(query: ScanQuery): Search[];

  protected get config(): SourceConfig<S> {
    return this.context.config;
  }

  protected now(): Date {
    return this.context.now ? this.context.now() : new Date();
  }

  programResults(): ProgramResult[] {
    return [...this.completedPrograms];
  }

  isConfigured(): boolean {
    return !this.config.credentialEnv || Boolean(this.context.credential);
  }

  async *fetchPages(query: ScanQuery, signal?: AbortSignal): AsyncGenerator<RawItem[], void, undefined> {
    if (!this.isConfigured()) {
      if (!this.credentialWarningLogged) {
        this.credentialWarningLogged = true;
        this.log.warn(`${this.config.credentialEnv} not set, skipping source`, {
          event: 'missing_credential',
          source: this.name
        });
      }
      return;
    }

    const seen = new Set<string>();
    const failures: SearchFailure[] = [];
    let succeeded = 0;
    this.completedPrograms = [];

    for (const search of this.searches(query)) {
      if (signal?.aborted) throw new ScanCancelledError();
      let results = 0;
      try {
        for await (const page of search.run(signal)) {
          results += page.length;
          // Same record can come back from several searches; first one wins
          const fresh = page.filter((item) => {
            if (seen.has(item.external_id)) return false;
            seen.add(item.external_id);
            return true;
          });
          yield fresh;
        }
        succeeded += 1;
        if (search.program !== undefined) {
          this.completedPrograms.push({ program: search.program, results });
        }
      } catch (error) {
        if (error instanceof TerminalSourceError || error instanceof CircuitOpenError) {
          failures.push({ search: search.label, error: errorMessage(error) });
          this.log.warn('Search failed, continuing with next search', {
            search: search.label,
            error: errorMessage(error)
          });
          continue;
        }
        throw error;
      }
    }

    this.log.info(`Collected ${seen.size} unique items`, { searches: succeeded, failed: failures.length });
    if (failures.length > 0) {
      throw new PartialSourceError(this.name, failures, succeeded);
    }
  }

  async fetchAll(query: ScanQuery, signal?: AbortSignal): Promise<RawItem[]> {
    const items: RawItem[] = [];
    for await (const page of this.fetchPages(query, signal)) {
      items.push(...page);
    }
    return items;
  }

  /** One logical request: breaker gate, retry budget, envelope validation. */
  protected request<T>(request: HttpRequest, schema: ResponseSchema<T>, signal?: AbortSignal): Promise<T> {
    const { breaker, retry, http } = this.context;
    return breaker.call(() =>
      retry.execute(async (attemptSignal): Promise<AttemptOutcome<T>> => {
        const outcome = await http(request, attemptSignal);
        if (outcome.kind !== 'success') return outcome;
        const parsed = schema.safeParse(outcome.payload);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown';
          return failure(new Error(`Unexpected response shape from ${request.url} (${where})`), false, outcome.status);
        }
        return success(parsed.data, outcome.status);
      }, signal)
    );
  }

  /** Drops records the normalizer could not identify, with one warning per page. */
  protected identified(items: Array<RawItem | null>, search: string): RawItem[] {
    const kept = items.filter((item): item is RawItem => item !== null);
    if (kept.length < items.length) {
      this.log.warn('Skipped records without an identifier', {
        event: 'record_skipped',
        search,
        skipped: items.length - kept.length
      });
    }
    return kept;
  }

  /** True (and logged) once `page` pages have been fetched for a search. */
  protected reachedPageCeiling(page: number, search: string): boolean {
    if (page < this.config.maxPages) return false;
    this.log.warn('Pagination ceiling reached, results may be truncated', {
      event: 'pagination_ceiling',
      search,
      maxPages: this.config.maxPages
    });
    return true;
  }
}

export function asText(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}
