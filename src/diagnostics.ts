/**
 * @fileoverview Diagnostics
 *
 * `getDiagnostics()` returns a point-in-time, JSON-serializable snapshot of
 * a monitor: store counts, session state, sync status and recent sync
 * cycles. Nothing here is reactive; poll it (e.g. from `onSyncComplete`)
 * for a live view.
 *
 * This module only reads.
 */

import { get } from 'svelte/store';
import type { SessionManager } from './auth/session';
import type { ResolvedConfig } from './config';
import type { SyncCycleStats, SyncEngine } from './engine';
import type { RecordStore } from './recordStore';
import type { SyncError } from './stores/sync';
import type { AuthMode, Entitlement, SyncStatus } from './types';

// =============================================================================
// Types
// =============================================================================

export interface DiagnosticsSnapshot {
  /** ISO 8601 timestamp of when this snapshot was captured */
  timestamp: string;
  deviceId: string;

  store: {
    pendingCount: number;
    flaggedCount: number;
    syncedCount: number;
    oldestPendingTimestamp: string | null;
  };

  session: {
    mode: AuthMode;
    userId: number | null;
    entitlement: Entitlement | null;
    subscriptionEnd: string | null;
    authKickedMessage: string | null;
  };

  sync: {
    status: SyncStatus;
    syncing: boolean;
    lastSyncTime: string | null;
    syncMessage: string | null;
    recentCycles: SyncCycleStats[];
    cyclesLastMinute: number;
  };

  errors: {
    lastError: string | null;
    lastErrorDetails: string | null;
    recentErrors: SyncError[];
  };

  config: Pick<
    ResolvedConfig,
    'baseUrl' | 'batchSize' | 'syncIntervalMs' | 'maxRecordRetries' | 'retentionDays'
  >;
}

export interface DiagnosticsSources {
  store: RecordStore;
  session: SessionManager;
  engine: SyncEngine;
  config: ResolvedConfig;
}

// =============================================================================
// Main Diagnostics Function
// =============================================================================

/**
 * Capture a diagnostics snapshot.
 *
 * @example
 * ```ts
 * const snapshot = await getDiagnostics(monitor);
 * console.log(JSON.stringify(snapshot, null, 2));
 * ```
 */
export async function getDiagnostics(sources: DiagnosticsSources): Promise<DiagnosticsSnapshot> {
  const { store, session, engine, config } = sources;
  const syncState = get(engine.status);
  const authState = get(session.authState);

  const [pendingCount, flaggedCount, syncedCount, oldest] = await Promise.all([
    store.countPending(),
    store.countFlagged(),
    store.countSynced(),
    store.listPending(1)
  ]);

  const recentCycles = engine.getRecentCycles();
  const oneMinuteAgo = Date.now() - 60000;
  const cyclesLastMinute = recentCycles.filter(
    (c) => new Date(c.timestamp).getTime() > oneMinuteAgo
  ).length;

  const current = session.currentSession();

  return {
    timestamp: new Date().toISOString(),
    deviceId: store.deviceId,

    store: {
      pendingCount,
      flaggedCount,
      syncedCount,
      oldestPendingTimestamp: oldest[0]?.capturedAt ?? null
    },

    session: {
      mode: authState.mode,
      userId: current?.userId ?? null,
      entitlement: current?.entitlement ?? null,
      subscriptionEnd: current?.subscriptionEnd ?? null,
      authKickedMessage: authState.authKickedMessage
    },

    sync: {
      status: syncState.status,
      syncing: engine.isSyncing(),
      lastSyncTime: syncState.lastSyncTime,
      syncMessage: syncState.syncMessage,
      recentCycles,
      cyclesLastMinute
    },

    errors: {
      lastError: syncState.lastError,
      lastErrorDetails: syncState.lastErrorDetails,
      recentErrors: syncState.syncErrors
    },

    config: {
      baseUrl: config.baseUrl,
      batchSize: config.batchSize,
      syncIntervalMs: config.syncIntervalMs,
      maxRecordRetries: config.maxRecordRetries,
      retentionDays: config.retentionDays
    }
  };
}
