// Builds adapters against in-process HTTP fakes

import { createAdapter } from '../index';
import { CircuitBreakerRegistry } from '../../resilience/circuitBreaker';
import { resolveBreakerOptions, isSourceName, type EnvironmentConfig } from '../../config/environment';
import type { ScanQuery, SourceName } from '../../types/adapter';
import { fakeHttp, manualClock, testEnvironment, type HttpHandler } from '../../__tests__/fixtures';

export const NOW = new Date('2025-06-01T12:00:00Z');

export const query: ScanQuery = {
  terms: ['tribal consultation'],
  windowStart: new Date('2025-05-18T12:00:00Z'),
  programs: {}
};

export function buildAdapter(name: SourceName, handler: HttpHandler, env: EnvironmentConfig = testEnvironment()) {
  const clock = manualClock(NOW.getTime());
  const registry = new CircuitBreakerRegistry(
    (source) => (isSourceName(source) ? resolveBreakerOptions(env.scanner, source) : env.scanner.resilience.circuitBreaker),
    clock.now
  );
  const http = fakeHttp(handler);
  const adapter = createAdapter(name, env, registry, {
    http: () => http.executor,
    sleep: clock.sleep,
    clock: clock.now,
    random: () => 0,
    now: () => NOW
  });
  return { adapter, http, registry, clock };
}

export async function collect<T>(pages: AsyncGenerator<T[], void, undefined>): Promise<{ pages: T[][]; error?: unknown }> {
  const collected: T[][] = [];
  try {
    for await (const page of pages) collected.push(page);
  } catch (error) {
    return { pages: collected, error };
  }
  return { pages: collected };
}
