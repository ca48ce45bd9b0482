/**
 * RetryController - executes one logical request with a bounded attempt budget.
 *
 * Attempt accounting is delegated to p-retry: only thrown errors spend an
 * attempt. Throttled outcomes (HTTP 429) are absorbed inside a single attempt
 * by sleeping and reissuing the request, so rate limiting never consumes the
 * budget and never reaches the circuit breaker.
 */

import pRetry, { AbortError, type FailedAttemptError } from 'p-retry';
import { setTimeout as delay } from 'node:timers/promises';
import { logger as rootLogger, type Logger } from '../utils/logger';
import type { AttemptOutcome } from '../types/outcome';
import { ScanCancelledError, TerminalSourceError, errorMessage } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseSeconds: number;
  jitterMaxSeconds: number;
  backoffMaxSeconds: number;
  defaultThrottleSeconds: number;
  throttleCeilingSeconds: number;
}

// Retry-After has one-second resolution; 0 or a past date still waits this long
const MIN_THROTTLE_MS = 1000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryControllerOptions {
  policy: RetryPolicy;
  sleep?: Sleep;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

export type Attempt<T> = (signal?: AbortSignal) => Promise<AttemptOutcome<T>>;

export class RetryController {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(private readonly source: string, options: RetryControllerOptions) {
    this.policy = options.policy;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? rootLogger.child(source);
  }

  /** Delay after the given failed attempt (1-based): base^attempt + jitter, capped. */
  backoffDelayMs(attemptNumber: number): number {
    const { backoffBaseSeconds, jitterMaxSeconds, backoffMaxSeconds } = this.policy;
    const seconds = Math.pow(backoffBaseSeconds, attemptNumber) + this.random() * jitterMaxSeconds;
    return Math.round(Math.min(seconds, backoffMaxSeconds) * 1000);
  }

  throttleDelayMs(retryAfterMs: number | null): number {
    const capMs = this.policy.backoffMaxSeconds * 1000;
    if (retryAfterMs === null) {
      return Math.min(this.policy.defaultThrottleSeconds * 1000, capMs);
    }
    return Math.min(Math.max(retryAfterMs, MIN_THROTTLE_MS), capMs);
  }

  async execute<T>(attempt: Attempt<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw new ScanCancelledError();
    }

    const startedAt = this.clock();
    const ceilingMs = this.policy.throttleCeilingSeconds * 1000;

    const runAttempt = async (attemptNumber: number): Promise<T> => {
      for (;;) {
        let outcome: AttemptOutcome<T>;
        try {
          outcome = await attempt(signal);
        } catch (error) {
          if (signal?.aborted) {
            throw new AbortError(new ScanCancelledError());
          }
          throw new AbortError(
            new TerminalSourceError(this.source, 'non_retryable', errorMessage(error), { cause: error })
          );
        }

        switch (outcome.kind) {
          case 'success':
            return outcome.payload;

          case 'throttled': {
            const waitMs = this.throttleDelayMs(outcome.retryAfterMs);
            const elapsedMs = this.clock() - startedAt;
            if (elapsedMs + waitMs > ceilingMs) {
              throw new AbortError(
                new TerminalSourceError(
                  this.source,
                  'throttle_ceiling',
                  `still throttled after ${Math.round(elapsedMs / 1000)}s (ceiling ${this.policy.throttleCeilingSeconds}s)`
                )
              );
            }
            this.log.warn('429 rate limited, waiting before reissuing request', {
              attempt: attemptNumber,
              waitMs,
              retryAfterHeader: outcome.retryAfterMs !== null
            });
            try {
              await this.pause(waitMs, signal);
            } catch (error) {
              throw new AbortError(error instanceof Error ? error : new ScanCancelledError());
            }
            // Same attempt: throttling never spends the budget
            continue;
          }

          case 'failure':
            if (!outcome.retryable) {
              throw new AbortError(
                new TerminalSourceError(this.source, 'non_retryable', outcome.error.message, { cause: outcome.error })
              );
            }
            throw outcome.error;
        }
      }
    };

    try {
      return await pRetry(runAttempt, {
        retries: Math.max(0, this.policy.maxAttempts - 1),
        // Backoff is applied in onFailedAttempt so the sleep stays injectable
        minTimeout: 0,
        factor: 1,
        randomize: false,
        signal,
        onFailedAttempt: async (error: FailedAttemptError) => {
          this.log.warn('Request failed', {
            attempt: error.attemptNumber,
            maxAttempts: this.policy.maxAttempts,
            error: error.message
          });
          if (error.retriesLeft > 0) {
            const waitMs = this.backoffDelayMs(error.attemptNumber);
            this.log.info('Retrying after backoff', { waitMs });
            await this.pause(waitMs, signal);
          }
        }
      });
    } catch (error) {
      if (error instanceof TerminalSourceError || error instanceof ScanCancelledError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new ScanCancelledError();
      }
      this.log.error(`All ${this.policy.maxAttempts} attempts exhausted`, error);
      throw new TerminalSourceError(
        this.source,
        'attempts_exhausted',
        `all ${this.policy.maxAttempts} attempts failed, last error: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanCancelledError();
      }
      throw error;
    }
  }
}
