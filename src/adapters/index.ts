/**
 * Adapter registry
 * Builds one adapter per enabled source, each wired to its own breaker (from
 * the run's registry), retry controller and HTTP executor.
 */

import type { EnvironmentConfig } from '../config/environment';
import { resolveRetryPolicy } from '../config/environment';
import type { CircuitBreakerRegistry } from '../resilience/circuitBreaker';
import { RetryController, type Clock, type Sleep } from '../resilience/retryController';
import { SOURCE_NAMES, type SourceAdapter, type SourceName } from '../types/adapter';
import { createHttpExecutor, type HttpExecutor } from '../utils/httpClient';
import { logger } from '../utils/logger';
import type { AdapterContext } from './base';
import { CongressGovAdapter } from './congress-gov';
import { FederalRegisterAdapter } from './federal-register';
import { GrantsGovAdapter } from './grants-gov';
import { USASpendingAdapter } from './usaspending';

export { BaseSourceAdapter, PartialSourceError } from './base';
export { FederalRegisterAdapter, GrantsGovAdapter, CongressGovAdapter, USASpendingAdapter };

type AdapterConstructors = { [S in SourceName]: (context: AdapterContext<S>) => SourceAdapter };

const ADAPTERS: AdapterConstructors = {
  federal_register: (context) => new FederalRegisterAdapter(context),
  grants_gov: (context) => new GrantsGovAdapter(context),
  congress_gov: (context) => new CongressGovAdapter(context),
  usaspending: (context) => new USASpendingAdapter(context)
};

export interface AdapterDependencies {
  /** Replaces the fetch-backed executor, e.g. with an in-process fake in tests */
  http?: (source: SourceName, timeoutMs: number) => HttpExecutor;
  sleep?: Sleep;
  clock?: Clock;
  random?: () => number;
  now?: () => Date;
}

export type AdapterFactory = (registry: CircuitBreakerRegistry) => SourceAdapter[];

export function createAdapter<S extends SourceName>(
  name: S,
  env: EnvironmentConfig,
  registry: CircuitBreakerRegistry,
  deps: AdapterDependencies = {}
): SourceAdapter {
  const { scanner } = env;
  const policy = resolveRetryPolicy(scanner, name);
  const timeoutMs = policy.requestTimeoutSeconds * 1000;
  const log = logger.child(name);

  const context: AdapterContext<S> = {
    config: scanner.sources[name],
    credential: env.credentials[name],
    breaker: registry.get(name),
    retry: new RetryController(name, {
      policy,
      sleep: deps.sleep,
      clock: deps.clock,
      random: deps.random,
      logger: log
    }),
    http: deps.http
      ? deps.http(name, timeoutMs)
      : createHttpExecutor({ userAgent: scanner.userAgent, timeoutMs }),
    logger: log,
    now: deps.now
  };

  return ADAPTERS[name](context);
}

/**
 * Adapter factory for a run. `only` narrows the run to the named sources;
 * disabled sources are never built.
 */
export function adapterFactory(
  env: EnvironmentConfig,
  only?: SourceName[],
  deps: AdapterDependencies = {}
): AdapterFactory {
  const selected = SOURCE_NAMES.filter(
    (name) => env.scanner.sources[name].enabled && (!only || only.length === 0 || only.includes(name))
  );
  return (registry) => selected.map((name) => createAdapter(name, env, registry, deps));
}
