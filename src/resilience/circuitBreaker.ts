/**
 * Per-source three-state circuit breaker.
 *
 *   CLOSED    -> OPEN       failureThreshold consecutive TerminalSourceErrors
 *   OPEN      -> HALF_OPEN  cooldown elapsed (checked lazily on inspection)
 *   HALF_OPEN -> CLOSED     the single probe call succeeds
 *   HALF_OPEN -> OPEN       the probe fails; cooldown restarts
 *
 * The breaker wraps a whole RetryController sequence, so it only ever sees the
 * final outcome of a request. Errors other than TerminalSourceError (for example
 * cancellation at the run deadline) pass through without touching the counter.
 */

import { logger as rootLogger, type Logger } from '../utils/logger';
import type { CircuitBreakerState, CircuitState } from '../types/scan';
import { CircuitOpenError, TerminalSourceError } from './errors';
import type { Clock } from './retryController';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownSeconds: number;
}

export class CircuitBreaker {
  private currentState: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private probeInFlight = false;
  private readonly log: Logger;

  constructor(
    readonly sourceName: string,
    private readonly options: CircuitBreakerOptions,
    private readonly clock: Clock = Date.now,
    logger?: Logger
  ) {
    this.log = logger ?? rootLogger.child(sourceName);
  }

  get state(): CircuitState {
    if (this.currentState === 'OPEN' && this.openedAt !== null) {
      const elapsedMs = this.clock() - this.openedAt;
      if (elapsedMs >= this.options.cooldownSeconds * 1000) {
        this.transition('HALF_OPEN', { elapsedMs });
      }
    }
    return this.currentState;
  }

  get isCallPermitted(): boolean {
    const state = this.state;
    return state === 'CLOSED' || (state === 'HALF_OPEN' && !this.probeInFlight);
  }

  snapshot(): CircuitBreakerState {
    return {
      source_name: this.sourceName,
      state: this.state,
      consecutive_terminal_failures: this.consecutiveFailures,
      opened_at: this.openedAt
    };
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.state;
    if (state === 'OPEN' || (state === 'HALF_OPEN' && this.probeInFlight)) {
      throw new CircuitOpenError(this.sourceName, this.retryAt());
    }

    const isProbe = state === 'HALF_OPEN';
    if (isProbe) {
      this.probeInFlight = true;
      this.log.info('Circuit breaker allowing half-open probe');
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (error instanceof TerminalSourceError) {
        this.recordFailure(error);
      }
      throw error;
    } finally {
      if (isProbe) {
        this.probeInFlight = false;
      }
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.currentState === 'HALF_OPEN') {
      this.openedAt = null;
      this.transition('CLOSED', { reason: 'probe succeeded' });
    }
  }

  recordFailure(error?: Error): void {
    this.consecutiveFailures += 1;

    if (this.currentState === 'HALF_OPEN') {
      this.openedAt = this.clock();
      this.transition('OPEN', { reason: 'probe failed', error: error?.message });
      return;
    }

    if (this.currentState === 'CLOSED' && this.consecutiveFailures >= this.options.failureThreshold) {
      this.openedAt = this.clock();
      this.transition('OPEN', {
        reason: 'failure threshold reached',
        consecutiveFailures: this.consecutiveFailures,
        threshold: this.options.failureThreshold,
        error: error?.message
      });
    }
  }

  private retryAt(): number | null {
    return this.openedAt === null ? null : this.openedAt + this.options.cooldownSeconds * 1000;
  }

  private transition(to: CircuitState, data: Record<string, unknown>): void {
    const from = this.currentState;
    this.currentState = to;
    const event = {
      event: 'circuit_breaker_transition',
      source: this.sourceName,
      from,
      to,
      ...data
    };
    if (to === 'OPEN') {
      this.log.warn(`Circuit breaker ${from} -> ${to}`, event);
    } else {
      this.log.info(`Circuit breaker ${from} -> ${to}`, event);
    }
  }
}

/**
 * Breakers for one run, keyed by source name. Owned by a ScanOrchestrator
 * instance; a fresh registry means every breaker starts CLOSED.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly optionsFor: (sourceName: string) => CircuitBreakerOptions,
    private readonly clock: Clock = Date.now
  ) {}

  get(sourceName: string): CircuitBreaker {
    let breaker = this.breakers.get(sourceName);
    if (!breaker) {
      breaker = new CircuitBreaker(sourceName, this.optionsFor(sourceName), this.clock);
      this.breakers.set(sourceName, breaker);
    }
    return breaker;
  }

  states(): CircuitBreakerState[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }
}
