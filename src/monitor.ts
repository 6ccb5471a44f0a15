/**
 * @fileoverview Monitor (composition root)
 *
 * Wires one of each component together and owns their lifetimes:
 *
 *   sensor loop ──append──> record store <──listPending/markSynced── sync engine
 *                                                                      │
 *                                   session manager <──credential──────┘
 *
 * Nothing here is a module-level singleton; two monitors in one process
 * (e.g. in tests) share no state.
 */

import { createSessionManager, type SessionManager } from './auth/session';
import { resolveConfig, type ResolvedConfig, type SyncEngineConfig } from './config';
import { debugLog } from './debug';
import { getDiagnostics, type DiagnosticsSnapshot } from './diagnostics';
import { createSyncEngine, type SyncEngine } from './engine';
import { openRecordStore, type RecordStore } from './recordStore';
import { createHttpSyncClient, type RemoteSyncClient } from './remote/client';
import {
  createSensorLoop,
  type HeartRateSensor,
  type SensorLoop,
  type StressModel
} from './sensor/loop';
import type { VitalRecord } from './types';
import { formatDuration } from './utils';

export interface MonitorOptions {
  config?: SyncEngineConfig | ResolvedConfig;
  sensor: HeartRateSensor;
  model: StressModel;
  /** Remote client override; defaults to the HTTP client for `config.baseUrl`. */
  client?: RemoteSyncClient;
  /** Pre-opened store; defaults to opening `config.databasePath`. */
  store?: RecordStore;
  onReading?: (record: VitalRecord) => void;
  onError?: (error: unknown) => void;
}

export interface Monitor {
  readonly config: ResolvedConfig;
  readonly store: RecordStore;
  readonly client: RemoteSyncClient;
  readonly session: SessionManager;
  readonly engine: SyncEngine;
  readonly sensorLoop: SensorLoop;
  /** Start acquisition and periodic background sync. */
  start(): void;
  /** Stop both loops and cancel any in-flight sync. */
  stop(): void;
  /** Stop, log out and close the database. */
  close(): void;
  getDiagnostics(): Promise<DiagnosticsSnapshot>;
}

export function createMonitor(options: MonitorOptions): Monitor {
  const config = resolveConfig(options.config);

  const store =
    options.store ??
    openRecordStore(config.databasePath, {
      maxRecordRetries: config.maxRecordRetries,
      retentionDays: config.retentionDays,
      modelVersion: config.modelVersion
    });
  const client =
    options.client ??
    createHttpSyncClient({ baseUrl: config.baseUrl, timeoutMs: config.requestTimeoutMs });
  const session = createSessionManager({ client });
  const engine = createSyncEngine({
    store,
    session,
    client,
    batchSize: config.batchSize,
    syncIntervalMs: config.syncIntervalMs,
    syncDebounceMs: config.syncDebounceMs,
    maxSyncIterations: config.maxSyncIterations
  });
  const sensorLoop = createSensorLoop({
    store,
    sensor: options.sensor,
    model: options.model,
    intervalMs: config.sensorIntervalMs,
    timeoutMs: config.sensorTimeoutMs,
    modelVersion: config.modelVersion,
    onReading: options.onReading,
    onError: options.onError
  });

  let closed = false;

  const monitor: Monitor = {
    config,
    store,
    client,
    session,
    engine,
    sensorLoop,

    start() {
      sensorLoop.start();
      engine.start();
      debugLog(
        `[SYNC] Monitor started: sensor every ${formatDuration(config.sensorIntervalMs)}, ` +
          `sync every ${formatDuration(config.syncIntervalMs)}`
      );
    },

    stop() {
      sensorLoop.stop();
      engine.stop();
    },

    close() {
      if (closed) return;
      closed = true;
      monitor.stop();
      session.logout();
      store.close();
    },

    getDiagnostics() {
      return getDiagnostics({ store, session, engine, config });
    }
  };

  return monitor;
}
