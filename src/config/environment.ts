/**
 * Environment configuration for the scanner
 * Loads the JSON scanner config, applies environment overrides and validates
 * the result. Credentials are resolved from the env var each source names.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../resilience/errors';
import type { RetryPolicy } from '../resilience/retryController';
import type { CircuitBreakerOptions } from '../resilience/circuitBreaker';
import { SOURCE_NAMES, type SourceName } from '../types/adapter';
import { isLogLevel, type LogLevel } from '../utils/logger';

export const DEFAULT_CONFIG_PATH = 'config/scanner.config.json';

const resilienceOverrideSchema = z.object({
  maxAttempts: z.number().int().min(1).optional(),
  backoffBaseSeconds: z.number().min(0).optional(),
  jitterMaxSeconds: z.number().min(0).optional(),
  backoffMaxSeconds: z.number().positive().optional(),
  defaultThrottleSeconds: z.number().min(0).optional(),
  throttleCeilingSeconds: z.number().positive().optional(),
  requestTimeoutSeconds: z.number().positive().optional(),
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).optional(),
      cooldownSeconds: z.number().min(0).optional()
    })
    .optional()
});

// Breaker defaults are conservative placeholders; tune per source in the config file
const resilienceSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  backoffBaseSeconds: z.number().min(0).default(2),
  jitterMaxSeconds: z.number().min(0).default(1),
  backoffMaxSeconds: z.number().positive().default(300),
  defaultThrottleSeconds: z.number().min(0).default(30),
  throttleCeilingSeconds: z.number().positive().default(600),
  requestTimeoutSeconds: z.number().positive().default(30),
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      cooldownSeconds: z.number().min(0).default(60)
    })
    .default({})
});

const sourceBaseSchema = z.object({
  enabled: z.boolean().default(true),
  baseUrl: z.string().url(),
  credentialEnv: z.string().min(1).optional(),
  pageSize: z.number().int().positive(),
  maxPages: z.number().int().positive(),
  resilience: resilienceOverrideSchema.optional()
});

const legislativeQuerySchema = z.object({
  term: z.string().min(1),
  billType: z.string().min(1)
});

const sourcesSchema = z.object({
  federal_register: sourceBaseSchema.extend({
    agencyIds: z.array(z.number().int()).default([]),
    agencySweepTerm: z.string().default('tribal'),
    documentTypes: z.array(z.string()).default(['RULE', 'PRORULE', 'NOTICE', 'PRESDOCU'])
  }),
  grants_gov: sourceBaseSchema.extend({
    opportunityStatuses: z.string().default('forecasted|posted'),
    tribalEligibilityCodes: z.array(z.string()).default(['00', '06', '07', '11'])
  }),
  congress_gov: sourceBaseSchema.extend({
    congress: z.number().int().positive(),
    legislativeQueries: z.array(legislativeQuerySchema).default([])
  }),
  usaspending: sourceBaseSchema.extend({
    awardTypeCodes: z.array(z.string()).default(['02', '03', '04', '05'])
  })
});

export const scannerConfigSchema = z.object({
  userAgent: z.string().min(1),
  scanWindowDays: z.number().int().positive().default(14),
  searchQueries: z.array(z.string().min(1)).default([]),
  trackedPrograms: z.record(z.string().regex(/^\d{2}\.\d{3}$/, 'CFDA numbers look like 15.156'), z.string()),
  resilience: resilienceSchema.default({}),
  orchestrator: z
    .object({
      maxConcurrency: z.number().int().min(1).default(4),
      deadlineSeconds: z.number().positive().default(900)
    })
    .default({}),
  changeDetection: z
    .object({
      snapshotPath: z.string().default('outputs/LATEST-SNAPSHOT.json'),
      zombieTrackerPath: z.string().default('outputs/.zombie_tracker.json'),
      zombieTrackerMaxEntries: z.number().int().positive().default(5000),
      dormantAfterDays: z.number().int().positive().default(30),
      trackedSources: z.array(z.enum(SOURCE_NAMES)).default(['grants_gov', 'usaspending'])
    })
    .default({}),
  sources: sourcesSchema
});

export type ScannerConfig = z.infer<typeof scannerConfigSchema>;
export type ScannerConfigInput = z.input<typeof scannerConfigSchema>;
export type SourcesConfig = ScannerConfig['sources'];
export type SourceConfig<S extends SourceName> = SourcesConfig[S];

export interface EnvironmentConfig {
  configPath: string;
  scanner: ScannerConfig;
  credentials: Partial<Record<SourceName, string>>;
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

function parsePositiveInt(name: string, value: string | undefined, problems: string[]): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    problems.push(`${name} must be a positive integer (got "${value}")`);
    return undefined;
  }
  return parsed;
}

export function parseScannerConfig(raw: unknown): ScannerConfig {
  const result = scannerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid scanner configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load and validate configuration
 * @throws ConfigurationError if the config file is missing, malformed or invalid
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const configPath = path.resolve(env.SCANNER_CONFIG_PATH || DEFAULT_CONFIG_PATH);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read scanner config at ${configPath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const scanner = parseScannerConfig(raw);
  const problems: string[] = [];

  const concurrency = parsePositiveInt('SCAN_CONCURRENCY', env.SCAN_CONCURRENCY, problems);
  const deadline = parsePositiveInt('SCAN_DEADLINE_SECONDS', env.SCAN_DEADLINE_SECONDS, problems);
  if (problems.length > 0) {
    throw new ConfigurationError('Invalid environment variables', problems);
  }

  if (concurrency !== undefined) scanner.orchestrator.maxConcurrency = concurrency;
  if (deadline !== undefined) scanner.orchestrator.deadlineSeconds = deadline;
  if (env.SNAPSHOT_PATH) scanner.changeDetection.snapshotPath = env.SNAPSHOT_PATH;
  if (env.ZOMBIE_TRACKER_PATH) scanner.changeDetection.zombieTrackerPath = env.ZOMBIE_TRACKER_PATH;

  const credentials: Partial<Record<SourceName, string>> = {};
  for (const name of SOURCE_NAMES) {
    const envName = scanner.sources[name].credentialEnv;
    const value = envName ? env[envName] : undefined;
    if (value) credentials[name] = value;
  }

  return {
    configPath,
    scanner,
    credentials,
    logging: {
      level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info'
    }
  };
}

/** Global resilience settings with the source's own overrides applied. */
export function resolveRetryPolicy(config: ScannerConfig, source: SourceName): RetryPolicy & { requestTimeoutSeconds: number } {
  const base = config.resilience;
  const override = config.sources[source].resilience ?? {};
  return {
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    backoffBaseSeconds: override.backoffBaseSeconds ?? base.backoffBaseSeconds,
    jitterMaxSeconds: override.jitterMaxSeconds ?? base.jitterMaxSeconds,
    backoffMaxSeconds: override.backoffMaxSeconds ?? base.backoffMaxSeconds,
    defaultThrottleSeconds: override.defaultThrottleSeconds ?? base.defaultThrottleSeconds,
    throttleCeilingSeconds: override.throttleCeilingSeconds ?? base.throttleCeilingSeconds,
    requestTimeoutSeconds: override.requestTimeoutSeconds ?? base.requestTimeoutSeconds
  };
}

export function resolveBreakerOptions(config: ScannerConfig, source: SourceName): CircuitBreakerOptions {
  const base = config.resilience.circuitBreaker;
  const override = config.sources[source].resilience?.circuitBreaker ?? {};
  return {
    failureThreshold: override.failureThreshold ?? base.failureThreshold,
    cooldownSeconds: override.cooldownSeconds ?? base.cooldownSeconds
  };
}

export function isSourceName(value: string): value is SourceName {
  return (SOURCE_NAMES as readonly string[]).includes(value);
}
