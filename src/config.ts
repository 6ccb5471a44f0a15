/**
 * @fileoverview Engine Configuration
 *
 * Central configuration for the monitor. {@link resolveConfig} is the first
 * function consumers call — it accepts a partial {@link SyncEngineConfig}
 * and fills every option the caller left out from {@link DEFAULT_CONFIG}:
 *   - Where the remote endpoint and the local database live
 *   - Sync sizing and timing (batch size, request timeout, intervals)
 *   - How many rejections a record survives before it is flagged
 *   - Sensor loop timing and the model version tag
 *
 * Unlike a module-level singleton, the resolved config is a plain value
 * handed to each component's factory, so two monitors in one process never
 * share state.
 *
 * {@link loadConfigFromEnv} builds the same object from `VITALS_*`
 * environment variables, validated with zod.
 *
 * @see {@link monitor.ts} for the composition root that consumes this config
 */

import { z } from 'zod';
import { _setDebugPrefix } from './debug';
import { ConfigError } from './errors';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Top-level configuration.
 *
 * @example
 * const config = resolveConfig({
 *   baseUrl: 'http://localhost:8000',
 *   databasePath: './health_data.db',
 *   batchSize: 50,
 * });
 */
export interface SyncEngineConfig {
  /** Application prefix — used for the debug environment flag. Default: `'VITALS'`. */
  prefix?: string;
  /** Base URL of the remote sync endpoint. Default: `'http://localhost:8000'`. */
  baseUrl?: string;
  /** SQLite file path, or `':memory:'`. Default: `'health_data.db'`. */
  databasePath?: string;

  /** Maximum records per upload request. Default: 100. */
  batchSize?: number;
  /** Abort an upload/login request after this many ms. Default: 15000. */
  requestTimeoutMs?: number;
  /** Rejections a record survives before it is flagged as permanently failed. Default: 5. */
  maxRecordRetries?: number;
  /** Days to keep synced records before {@link purgeSynced} removes them. Default: 30. */
  retentionDays?: number;

  /** Interval (ms) between background syncs. Default: 900000 (15 min). */
  syncIntervalMs?: number;
  /** Delay (ms) after a trigger before a scheduled sync runs. Default: 2000. */
  syncDebounceMs?: number;
  /** Maximum batches uploaded by a single `syncAll()` call. Default: 10. */
  maxSyncIterations?: number;

  /** Interval (ms) between sensor reads. Default: 2000. */
  sensorIntervalMs?: number;
  /** Give up on a sensor read after this many ms and use the fallback. Default: 1000. */
  sensorTimeoutMs?: number;
  /** Version tag stamped on every record the sensor loop writes. Default: `'v1.0'`. */
  modelVersion?: string;
}

export type ResolvedConfig = Required<SyncEngineConfig>;

// =============================================================================
// Defaults
// =============================================================================

/**
 * Default batch size. Each serialized vector is roughly 250 bytes, so 100
 * records stay around 25 KB, far below common request body limits.
 */
const DEFAULT_BATCH_SIZE = 100;

export const DEFAULT_CONFIG: ResolvedConfig = {
  prefix: 'VITALS',
  baseUrl: 'http://localhost:8000',
  databasePath: 'health_data.db',
  batchSize: DEFAULT_BATCH_SIZE,
  requestTimeoutMs: 15_000,
  maxRecordRetries: 5,
  retentionDays: 30,
  syncIntervalMs: 900_000,
  syncDebounceMs: 2000,
  maxSyncIterations: 10,
  sensorIntervalMs: 2000,
  sensorTimeoutMs: 1000,
  modelVersion: 'v1.0'
};

// =============================================================================
// Resolution
// =============================================================================

const positiveInt = z.number().int().positive();

const configSchema = z.object({
  prefix: z.string().min(1),
  baseUrl: z.string().url(),
  databasePath: z.string().min(1),
  batchSize: positiveInt,
  requestTimeoutMs: positiveInt,
  maxRecordRetries: positiveInt,
  retentionDays: z.number().nonnegative(),
  syncIntervalMs: positiveInt,
  syncDebounceMs: z.number().int().nonnegative(),
  maxSyncIterations: positiveInt,
  sensorIntervalMs: positiveInt,
  sensorTimeoutMs: positiveInt,
  modelVersion: z.string().min(1)
});

/**
 * Merge a partial config over {@link DEFAULT_CONFIG} and validate it.
 *
 * Also propagates `prefix` to the debug logger.
 *
 * @throws {ConfigError} If any option is out of range.
 */
export function resolveConfig(config: SyncEngineConfig = {}): ResolvedConfig {
  return parseConfig(config);
}

function parseConfig(input: object): ResolvedConfig {
  const defined = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
  const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...defined });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  _setDebugPrefix(result.data.prefix);
  return result.data;
}

// =============================================================================
// Environment
// =============================================================================

/** Environment variable suffix for each option (prefixed with `VITALS_`). */
const ENV_KEYS: Record<keyof SyncEngineConfig, string> = {
  prefix: 'PREFIX',
  baseUrl: 'BASE_URL',
  databasePath: 'DATABASE_PATH',
  batchSize: 'BATCH_SIZE',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
  maxRecordRetries: 'MAX_RECORD_RETRIES',
  retentionDays: 'RETENTION_DAYS',
  syncIntervalMs: 'SYNC_INTERVAL_MS',
  syncDebounceMs: 'SYNC_DEBOUNCE_MS',
  maxSyncIterations: 'MAX_SYNC_ITERATIONS',
  sensorIntervalMs: 'SENSOR_INTERVAL_MS',
  sensorTimeoutMs: 'SENSOR_TIMEOUT_MS',
  modelVersion: 'MODEL_VERSION'
};

const STRING_KEYS = new Set<string>([
  'prefix',
  'baseUrl',
  'databasePath',
  'modelVersion'
]);

/**
 * Build a config from `VITALS_*` environment variables. Unset variables
 * fall back to the defaults; numeric variables must parse as numbers.
 *
 * @example
 * // VITALS_BASE_URL=https://api.example.com VITALS_BATCH_SIZE=50
 * const config = loadConfigFromEnv(process.env);
 *
 * @throws {ConfigError} If a variable is present but invalid.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const config: Record<string, unknown> = {};

  for (const [key, suffix] of Object.entries(ENV_KEYS)) {
    const raw = env[`VITALS_${suffix}`];
    if (raw === undefined || raw === '') continue;

    if (STRING_KEYS.has(key)) {
      config[key] = raw;
    } else {
      const parsed = Number(raw);
      if (Number.isNaN(parsed)) {
        throw new ConfigError(`VITALS_${suffix} must be a number, got "${raw}"`);
      }
      config[key] = parsed;
    }
  }

  return parseConfig(config);
}
