/**
 * Unit tests for CircuitBreaker
 * State machine, probe handling and interaction with RetryController
 */

import { CircuitBreaker, CircuitBreakerRegistry } from '../circuitBreaker';
import { CircuitOpenError, ScanCancelledError, TerminalSourceError } from '../errors';
import { RetryController } from '../retryController';
import { Logger } from '../../utils/logger';
import { failure, success, throttled } from '../../types/outcome';
import { fakeHttp, manualClock } from '../../__tests__/fixtures';

const options = { failureThreshold: 3, cooldownSeconds: 60 };

const terminal = () => new TerminalSourceError('usaspending', 'attempts_exhausted', 'down');

async function failWith(breaker: CircuitBreaker, error: Error) {
  await expect(breaker.call(async () => {
    throw error;
  })).rejects.toBe(error);
}

describe('CircuitBreaker', () => {
  let clock: ReturnType<typeof manualClock>;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = manualClock();
    breaker = new CircuitBreaker('usaspending', options, clock.now);
  });

  it('starts CLOSED with no failures', () => {
    expect(breaker.snapshot()).toEqual({
      source_name: 'usaspending',
      state: 'CLOSED',
      consecutive_terminal_failures: 0,
      opened_at: null
    });
  });

  it('stays CLOSED below the threshold and opens exactly at it', async () => {
    for (let i = 1; i < options.failureThreshold; i++) {
      await failWith(breaker, terminal());
      expect(breaker.state).toBe('CLOSED');
      expect(breaker.snapshot().consecutive_terminal_failures).toBe(i);
    }

    await failWith(breaker, terminal());
    expect(breaker.state).toBe('OPEN');
    expect(breaker.snapshot().opened_at).toBe(clock.now());
  });

  it('ignores errors that are not terminal source failures', async () => {
    for (let i = 0; i < 10; i++) {
      await failWith(breaker, new ScanCancelledError());
      await failWith(breaker, new Error('parse bug'));
    }
    expect(breaker.snapshot()).toMatchObject({ state: 'CLOSED', consecutive_terminal_failures: 0 });
  });

  it('resets the counter on success', async () => {
    await failWith(breaker, terminal());
    await failWith(breaker, terminal());
    await expect(breaker.call(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.snapshot().consecutive_terminal_failures).toBe(0);

    await failWith(breaker, terminal());
    expect(breaker.state).toBe('CLOSED');
  });

  it('rejects calls while OPEN without invoking them', async () => {
    for (let i = 0; i < options.failureThreshold; i++) await failWith(breaker, terminal());
    const fn = vi.fn(async () => 'never');

    const error = await breaker.call(fn).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CircuitOpenError);
    expect(error).toMatchObject({ source: 'usaspending', retryAt: clock.now() + 60_000 });
    expect(fn).not.toHaveBeenCalled();
  });

  it('moves to HALF_OPEN once the cooldown has elapsed', async () => {
    for (let i = 0; i < options.failureThreshold; i++) await failWith(breaker, terminal());

    clock.advance(59_999);
    expect(breaker.state).toBe('OPEN');
    clock.advance(1);
    expect(breaker.state).toBe('HALF_OPEN');
    expect(breaker.isCallPermitted).toBe(true);
  });

  it('closes and resets after a successful probe', async () => {
    for (let i = 0; i < options.failureThreshold; i++) await failWith(breaker, terminal());
    clock.advance(60_000);

    await expect(breaker.call(async () => 'probe ok')).resolves.toBe('probe ok');
    expect(breaker.snapshot()).toEqual({
      source_name: 'usaspending',
      state: 'CLOSED',
      consecutive_terminal_failures: 0,
      opened_at: null
    });
  });

  it('re-opens and restarts the cooldown after a failed probe', async () => {
    for (let i = 0; i < options.failureThreshold; i++) await failWith(breaker, terminal());
    clock.advance(60_000);

    await failWith(breaker, terminal());
    expect(breaker.state).toBe('OPEN');
    expect(breaker.snapshot().opened_at).toBe(clock.now());

    clock.advance(30_000);
    expect(breaker.state).toBe('OPEN');
    clock.advance(30_000);
    expect(breaker.state).toBe('HALF_OPEN');
  });

  it('permits exactly one probe at a time', async () => {
    for (let i = 0; i < options.failureThreshold; i++) await failWith(breaker, terminal());
    clock.advance(60_000);

    let release: (value: string) => void = () => undefined;
    const probe = breaker.call(() => new Promise<string>((resolve) => {
      release = resolve;
    }));

    const second = vi.fn(async () => 'second');
    await expect(breaker.call(second)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(second).not.toHaveBeenCalled();
    expect(breaker.isCallPermitted).toBe(false);

    release('probe ok');
    await expect(probe).resolves.toBe('probe ok');
    expect(breaker.state).toBe('CLOSED');
  });

  it('logs every transition as a structured event', async () => {
    const warn = vi.mocked(console.warn);
    const logged = new CircuitBreaker('grants_gov', options, clock.now, new Logger('grants_gov', 'debug'));
    for (let i = 0; i < options.failureThreshold; i++) await failWith(logged, terminal());

    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining('[WARN] [grants_gov]'),
      'Circuit breaker CLOSED -> OPEN',
      expect.objectContaining({
        event: 'circuit_breaker_transition',
        source: 'grants_gov',
        from: 'CLOSED',
        to: 'OPEN',
        consecutiveFailures: 3
      })
    );
  });

  describe('with RetryController and HTTP', () => {
    function stack(handler: Parameters<typeof fakeHttp>[0]) {
      const http = fakeHttp(handler);
      const retry = new RetryController('usaspending', {
        policy: {
          maxAttempts: 3,
          backoffBaseSeconds: 2,
          jitterMaxSeconds: 0,
          backoffMaxSeconds: 300,
          defaultThrottleSeconds: 30,
          throttleCeilingSeconds: 3600
        },
        sleep: clock.sleep,
        clock: clock.now
      });
      const request = () => breaker.call(() =>
        retry.execute((signal) => http.executor({ method: 'GET', url: 'https://spending.example.test' }, signal))
      );
      return { http, request };
    }

    it('never counts 429 responses against the breaker', async () => {
      const { http, request } = stack((_request, call) => (call <= 25 ? throttled(1000) : success({ ok: true })));

      await expect(request()).resolves.toEqual({ ok: true });
      expect(http.requests).toHaveLength(26);
      expect(breaker.snapshot()).toMatchObject({ state: 'CLOSED', consecutive_terminal_failures: 0 });
    });

    it('issues no HTTP calls while OPEN until the cooldown elapses', async () => {
      let healthy = false;
      const { http, request } = stack(() => (healthy ? success('back') : failure(new Error('HTTP 503'), true, 503)));

      for (let i = 0; i < options.failureThreshold; i++) {
        await expect(request()).rejects.toBeInstanceOf(TerminalSourceError);
      }
      expect(breaker.state).toBe('OPEN');
      const issued = http.requests.length;
      expect(issued).toBe(9);

      await expect(request()).rejects.toBeInstanceOf(CircuitOpenError);
      await expect(request()).rejects.toBeInstanceOf(CircuitOpenError);
      expect(http.requests).toHaveLength(issued);

      clock.advance(60_000);
      healthy = true;
      await expect(request()).resolves.toBe('back');
      expect(http.requests).toHaveLength(issued + 1);
      expect(breaker.state).toBe('CLOSED');
    });
  });
});

describe('CircuitBreakerRegistry', () => {
  it('keeps one isolated breaker per source', async () => {
    const registry = new CircuitBreakerRegistry(() => ({ failureThreshold: 1, cooldownSeconds: 60 }));
    const grants = registry.get('grants_gov');
    expect(registry.get('grants_gov')).toBe(grants);

    await expect(grants.call(async () => {
      throw new TerminalSourceError('grants_gov', 'non_retryable', 'HTTP 400');
    })).rejects.toBeInstanceOf(TerminalSourceError);

    expect(grants.state).toBe('OPEN');
    expect(registry.get('usaspending').state).toBe('CLOSED');
    expect(registry.states().map((state) => [state.source_name, state.state])).toEqual([
      ['grants_gov', 'OPEN'],
      ['usaspending', 'CLOSED']
    ]);
  });

  it('starts every breaker CLOSED in a fresh registry', () => {
    const optionsFor = () => ({ failureThreshold: 1, cooldownSeconds: 60 });
    const first = new CircuitBreakerRegistry(optionsFor);
    first.get('congress_gov').recordFailure();
    expect(first.get('congress_gov').state).toBe('OPEN');

    const next = new CircuitBreakerRegistry(optionsFor);
    expect(next.get('congress_gov').state).toBe('CLOSED');
  });
});
