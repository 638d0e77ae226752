import path from 'node:path';
import { z } from 'zod';

import { ConfigurationError, DEFAULT_POLLUTANT_PRIORITY } from '@airq/core';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type LockMode = 'table' | 'transaction';

export interface EtlConfig {
  databasePath: string;
  logLevel: LogLevel;
  stationsFile: string;
  pollutantsFile: string;
  breakpointsFile: string;
  sourcesFile: string;
  /** Longest run of missing hours the Imputer may interpolate; 0 disables imputation. */
  maxGapHours: number;
  /** Tie-break order for the dominant pollutant. */
  pollutantPriority: string[];
  lockMode: LockMode;
  lockTtlMs: number;
  extractionTimeoutMs: number;
  storeTimeoutMs: number;
  storeRetries: number;
  storeRetryDelayMs: number;
  /** JSONL file receiving run-log entries the store could not accept. */
  fallbackJournalPath: string;
}

export const DEFAULT_RESOURCES_DIR = path.resolve(__dirname, '..', 'resources');

const configSchema = z.object({
  databasePath: z.string().min(1),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  stationsFile: z.string().min(1),
  pollutantsFile: z.string().min(1),
  breakpointsFile: z.string().min(1),
  sourcesFile: z.string().min(1),
  maxGapHours: z.number().int().min(0).max(168),
  pollutantPriority: z.array(z.string().min(1)).min(1),
  lockMode: z.enum(['table', 'transaction']),
  lockTtlMs: z.number().int().positive(),
  extractionTimeoutMs: z.number().int().positive(),
  storeTimeoutMs: z.number().int().positive(),
  storeRetries: z.number().int().min(0).max(20),
  storeRetryDelayMs: z.number().int().nonnegative(),
  fallbackJournalPath: z.string().min(1)
});

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const resolvePath = (value: string | undefined, fallback: string): string =>
  path.resolve(process.cwd(), value?.trim() || fallback);

/**
 * Reads `AIRQ_*` variables into an explicit configuration object. Values in `overrides`
 * (usually CLI flags) take precedence over the environment.
 */
export function loadEtlConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<EtlConfig> = {}): EtlConfig {
  const resourcesDir = resolvePath(env.AIRQ_RESOURCES_DIR, DEFAULT_RESOURCES_DIR);
  const databasePath = overrides.databasePath ?? resolvePath(env.AIRQ_DATABASE_PATH, path.join('data', 'airq.db'));
  const priority = parseList(env.AIRQ_POLLUTANT_PRIORITY);

  const candidate = {
    databasePath,
    logLevel: env.AIRQ_LOG_LEVEL?.trim().toLowerCase() || 'info',
    stationsFile: resolvePath(env.AIRQ_STATIONS_FILE, path.join(resourcesDir, 'stations.json')),
    pollutantsFile: resolvePath(env.AIRQ_POLLUTANTS_FILE, path.join(resourcesDir, 'pollutants.json')),
    breakpointsFile: resolvePath(env.AIRQ_BREAKPOINTS_FILE, path.join(resourcesDir, 'breakpoints.json')),
    sourcesFile: resolvePath(env.AIRQ_SOURCES_FILE, path.join(resourcesDir, 'sources.json')),
    maxGapHours: parseNumber(env.AIRQ_MAX_GAP_HOURS, 3),
    pollutantPriority: priority.length > 0 ? priority : [...DEFAULT_POLLUTANT_PRIORITY],
    lockMode: env.AIRQ_LOCK_MODE?.trim().toLowerCase() || 'table',
    lockTtlMs: parseNumber(env.AIRQ_LOCK_TTL_MS, 15 * 60_000),
    extractionTimeoutMs: parseNumber(env.AIRQ_EXTRACTION_TIMEOUT_MS, 30_000),
    storeTimeoutMs: parseNumber(env.AIRQ_STORE_TIMEOUT_MS, 5_000),
    storeRetries: parseNumber(env.AIRQ_STORE_RETRIES, 3),
    storeRetryDelayMs: parseNumber(env.AIRQ_STORE_RETRY_DELAY_MS, 100),
    fallbackJournalPath: resolvePath(
      env.AIRQ_FALLBACK_JOURNAL,
      path.join(path.dirname(databasePath), 'etl-log-pending.jsonl')
    ),
    ...overrides
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid ETL configuration: ${summary}`, parsed.error.issues);
  }
  return parsed.data;
}
