/**
 * Shared test fixtures: in-process HTTP fakes, a manual clock and small
 * builders for items and configuration.
 */

import { parseScannerConfig, type EnvironmentConfig, type ScannerConfigInput } from '../config/environment';
import type { RawItem, SourceName } from '../types/adapter';
import type { AttemptOutcome } from '../types/outcome';
import type { HttpExecutor, HttpRequest } from '../utils/httpClient';

export type HttpHandler = (request: HttpRequest, call: number) => AttemptOutcome<unknown> | Promise<AttemptOutcome<unknown>>;

export interface FakeHttp {
  executor: HttpExecutor;
  requests: HttpRequest[];
}

/** Records every request and answers it with `handler` (call numbers start at 1). */
export function fakeHttp(handler: HttpHandler): FakeHttp {
  const requests: HttpRequest[] = [];
  const executor: HttpExecutor = async (request) => {
    requests.push(request);
    return handler(request, requests.length);
  };
  return { executor, requests };
}

export interface ManualClock {
  now: () => number;
  advance: (ms: number) => void;
  /** Sleep that advances the clock instead of waiting */
  sleep: (ms: number) => Promise<void>;
  sleeps: number[];
}

export function manualClock(start = Date.parse('2025-06-01T12:00:00Z')): ManualClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
    sleeps
  };
}

export function makeItem(
  source: SourceName,
  externalId: string,
  overrides: Partial<Omit<RawItem, 'source' | 'external_id'>> = {}
): RawItem {
  return {
    source,
    external_id: externalId,
    title: overrides.title ?? `Item ${externalId}`,
    published_date: overrides.published_date ?? '2025-05-01',
    payload: overrides.payload ?? { url: `https://example.test/${externalId}` }
  };
}

export const baseScannerConfig: ScannerConfigInput = {
  userAgent: 'policy-scan-ingest/test',
  scanWindowDays: 14,
  searchQueries: ['tribal consultation'],
  trackedPrograms: { '15.156': 'bia_tcr' },
  resilience: {
    maxAttempts: 3,
    backoffBaseSeconds: 2,
    jitterMaxSeconds: 0,
    backoffMaxSeconds: 300,
    defaultThrottleSeconds: 30,
    throttleCeilingSeconds: 600,
    requestTimeoutSeconds: 30,
    circuitBreaker: { failureThreshold: 3, cooldownSeconds: 60 }
  },
  orchestrator: { maxConcurrency: 4, deadlineSeconds: 900 },
  sources: {
    federal_register: {
      baseUrl: 'https://fr.example.test/api/v1',
      pageSize: 2,
      maxPages: 3,
      agencyIds: []
    },
    grants_gov: {
      baseUrl: 'https://grants.example.test',
      pageSize: 2,
      maxPages: 3
    },
    congress_gov: {
      baseUrl: 'https://congress.example.test/v3',
      credentialEnv: 'CONGRESS_API_KEY',
      pageSize: 2,
      maxPages: 3,
      congress: 119
    },
    usaspending: {
      baseUrl: 'https://spending.example.test/api/v2',
      pageSize: 2,
      maxPages: 3
    }
  }
};

export function testEnvironment(
  changes: (raw: ScannerConfigInput) => unknown = (raw) => raw,
  credentials: Partial<Record<SourceName, string>> = { congress_gov: 'test-key' }
): EnvironmentConfig {
  const raw = changes(structuredClone(baseScannerConfig));
  return {
    configPath: 'test',
    scanner: parseScannerConfig(raw),
    credentials,
    logging: { level: 'error' }
  };
}
