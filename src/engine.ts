import { debugError, debugLog, debugWarn } from './debug';
import {
  NotAuthorizedError,
  NotFoundError,
  SyncInProgressError,
  TransientSyncError,
  VitalsSyncError,
  extractErrorMessage,
  parseErrorMessage
} from './errors';
import type { SessionManager } from './auth/session';
import { RemoteRequestError, type RemoteAuth, type RemoteSyncClient } from './remote/client';
import {
  toVectorPayload,
  vectorKey,
  type RemoteVector,
  type UploadResponse,
  type VectorPayload
} from './remote/schema';
import type { RecordStore } from './recordStore';
import { createSyncStatusStore, type SyncStatusStore } from './stores/sync';
import type { RejectedRecord, Session, SyncResult, VitalRecord } from './types';
import { formatDuration, now } from './utils';

// ============================================================
// OFFLINE-FIRST SYNC ENGINE
//
// Rules:
// 1. Every reading is written to the local store first, unconditionally
// 2. The engine never mutates records itself; it asks the store
// 3. A record becomes synced only after the server acknowledged it
// 4. Any failure before that point leaves records pending (re-send is
//    idempotent: the server deduplicates on (device_id, timestamp))
// 5. One sync at a time; a concurrent call is rejected, not queued
// ============================================================

export interface SyncEngineOptions {
  store: RecordStore;
  session: SessionManager;
  client: RemoteSyncClient;
  batchSize: number;
  syncIntervalMs: number;
  syncDebounceMs: number;
  maxSyncIterations: number;
}

export interface RunSyncOptions {
  /** Cancels the in-flight upload; cancellation behaves like a network failure. */
  signal?: AbortSignal;
}

export type SyncTrigger = 'user' | 'periodic' | 'scheduled';

export interface SyncCycleStats {
  trigger: SyncTrigger;
  outcome: 'ok' | 'error';
  batches: number;
  attempted: number;
  synced: number;
  rejected: number;
  durationMs: number;
  timestamp: string;
}

export interface SyncEngine {
  readonly status: SyncStatusStore;
  /** Upload one batch of pending records. */
  runSync(options?: RunSyncOptions): Promise<SyncResult>;
  /** Upload batches until the queue is drained, a batch is not fully acknowledged, or the iteration cap is hit. */
  syncAll(options?: RunSyncOptions): Promise<SyncResult>;
  /** Download vectors previously uploaded by this account. */
  pullRecords(limit: number, options?: RunSyncOptions): Promise<RemoteVector[]>;
  /** Abort the in-flight sync, if any. */
  cancel(): void;
  isSyncing(): boolean;
  /** Run `syncAll` after the debounce delay; repeated calls restart the delay. */
  scheduleSync(): void;
  /** Start periodic background sync. */
  start(): void;
  stop(): void;
  onSyncComplete(callback: (result: SyncResult) => void): () => void;
  getRecentCycles(): SyncCycleStats[];
  refreshCounts(): Promise<void>;
}

// Max cycle stats to keep for diagnostics
const MAX_CYCLE_HISTORY = 20;

// =============================================================================
// Error classification
// =============================================================================

/**
 * Decide what an upload failure means. Anything that is not an explicit
 * credential/entitlement rejection is transient: the records stay pending
 * and the next sync re-sends them.
 */
function classifyRemoteError(error: unknown, session: SessionManager): Error {
  if (!(error instanceof RemoteRequestError)) {
    return new TransientSyncError(`Upload failed: ${extractErrorMessage(error)}`, { cause: error });
  }
  if (error.kind === 'http' && error.status === 401) {
    session.invalidate('Session expired. Please sign in again.');
    return new NotAuthorizedError('credential', 'Credential rejected by server', { cause: error });
  }
  if (error.kind === 'http' && error.status === 403) {
    // Background triggers skip a non-premium session, so this is not retried
    // until a login or entitlement refresh says otherwise.
    session.revokeEntitlement('Server refused sync (403)');
    return new NotAuthorizedError('entitlement', 'Server refused sync: account is not Premium', {
      cause: error
    });
  }
  return new TransientSyncError(error.message, { cause: error, status: error.status ?? undefined });
}

function requireSyncSession(session: SessionManager): Session {
  const current = session.currentSession();
  if (!current) {
    throw new NotAuthorizedError('no_session', 'Not logged in');
  }
  if (current.entitlement !== 'premium') {
    throw new NotAuthorizedError('entitlement', 'Sync requires a Premium account');
  }
  return current;
}

function emptyResult(durationMs = 0): SyncResult {
  return { attempted: 0, synced: [], rejected: [], durationMs };
}

// =============================================================================
// Factory
// =============================================================================

export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  const { store, session, client } = options;
  const status = createSyncStatusStore();

  // In-flight sync; non-null while the lock is held
  let inFlight: AbortController | null = null;

  let syncTimeout: ReturnType<typeof setTimeout> | null = null;
  let syncInterval: ReturnType<typeof setInterval> | null = null;
  let appendUnsubscribe: (() => void) | null = null;

  const syncCompleteCallbacks: Set<(result: SyncResult) => void> = new Set();
  const cycles: SyncCycleStats[] = [];

  function notifySyncComplete(result: SyncResult): void {
    for (const callback of syncCompleteCallbacks) {
      try {
        callback(result);
      } catch (e) {
        debugError('[SYNC] Sync complete callback error:', e);
      }
    }
  }

  function logSyncCycle(stats: Omit<SyncCycleStats, 'timestamp'>): void {
    cycles.push({ ...stats, timestamp: now() });
    if (cycles.length > MAX_CYCLE_HISTORY) cycles.shift();
    debugLog(
      `[SYNC] Cycle (${stats.trigger}, ${stats.outcome}): ${stats.batches} batch(es), ` +
        `${stats.synced}/${stats.attempted} synced, ${stats.rejected} rejected, ${stats.durationMs}ms`
    );
  }

  async function refreshCounts(): Promise<void> {
    const [pending, flagged] = await Promise.all([store.countPending(), store.countFlagged()]);
    status.setCounts(pending, flagged);
  }

  /**
   * Transition acknowledged ids. A NotFoundError means some ids stopped
   * being pending behind our back (a purge, a duplicate acknowledgment);
   * the rest are still marked.
   */
  async function acknowledge(ids: number[]): Promise<number[]> {
    if (ids.length === 0) return [];
    try {
      await store.markSynced(ids);
      return ids;
    } catch (e) {
      if (!(e instanceof NotFoundError)) throw e;
      debugWarn('[SYNC] Acknowledged ids no longer pending (benign race):', e.ids);
      const missing = new Set(e.ids);
      const remaining = ids.filter((id) => !missing.has(id));
      if (remaining.length > 0) {
        await store.markSynced(remaining);
      }
      return remaining;
    }
  }

  async function reject(
    byReason: Map<string, number[]>,
    rejected: RejectedRecord[]
  ): Promise<void> {
    for (const [reason, ids] of byReason) {
      const outcomes = await store.recordRejections(ids, reason);
      for (const outcome of outcomes) {
        rejected.push({ id: outcome.id, reason, flagged: outcome.flagged });
      }
    }
  }

  /**
   * Upload one batch. The only mutation paths are `markSynced` for
   * acknowledged ids and `recordRejections` for ids the server refused.
   */
  async function pushBatch(signal: AbortSignal): Promise<SyncResult> {
    const started = Date.now();
    const current = requireSyncSession(session);

    const batch = await store.listPending(options.batchSize);
    if (batch.length === 0) {
      debugLog('[SYNC] Nothing pending');
      return emptyResult(Date.now() - started);
    }

    const rejected: RejectedRecord[] = [];
    const localRejects = new Map<string, number[]>();
    const sendable: Array<{ record: VitalRecord; vector: VectorPayload; key: string }> = [];
    for (const record of batch) {
      try {
        const vector = toVectorPayload(record, store.deviceId);
        sendable.push({ record, vector, key: vectorKey(vector.device_id, vector.timestamp) });
      } catch (e) {
        const reason = `Invalid local record: ${extractErrorMessage(e)}`;
        localRejects.set(reason, [...(localRejects.get(reason) ?? []), record.id]);
      }
    }
    await reject(localRejects, rejected);
    if (sendable.length === 0) {
      return { attempted: batch.length, synced: [], rejected, durationMs: Date.now() - started };
    }

    const auth: RemoteAuth = { token: current.credential, userId: current.userId };
    debugLog(`[SYNC] Uploading ${sendable.length} record(s) for user ${current.userId}`);

    let response: UploadResponse;
    try {
      response = await client.uploadVectors(
        auth,
        sendable.map((s) => s.vector),
        { signal }
      );
    } catch (e) {
      // The server refused the whole batch as malformed: count a rejection
      // against every record so a poisoned batch is eventually flagged.
      if (e instanceof RemoteRequestError && e.kind === 'http' && e.status === 422) {
        const reason = e.detail ?? 'Batch rejected by server (422)';
        await reject(new Map([[reason, sendable.map((s) => s.record.id)]]), rejected);
        debugWarn(`[SYNC] Batch of ${sendable.length} rejected:`, reason);
        return { attempted: batch.length, synced: [], rejected, durationMs: Date.now() - started };
      }
      throw classifyRemoteError(e, session);
    }

    let acknowledgedIds: number[];
    if (response.rejected !== undefined) {
      const refusedKeys = new Map<string, string>();
      for (const entry of response.rejected) {
        refusedKeys.set(
          vectorKey(entry.device_id, entry.timestamp),
          entry.reason ?? 'Rejected by server'
        );
      }
      const remoteRejects = new Map<string, number[]>();
      acknowledgedIds = [];
      for (const { record, key } of sendable) {
        const reason = refusedKeys.get(key);
        if (reason === undefined) {
          acknowledgedIds.push(record.id);
        } else {
          remoteRejects.set(reason, [...(remoteRejects.get(reason) ?? []), record.id]);
        }
      }
      if (response.count !== acknowledgedIds.length) {
        throw new TransientSyncError(
          `Server acknowledged ${response.count} record(s) but listed ` +
            `${sendable.length - acknowledgedIds.length} of ${sendable.length} as rejected`
        );
      }
      await reject(remoteRejects, rejected);
    } else if (response.count === sendable.length) {
      acknowledgedIds = sendable.map((s) => s.record.id);
    } else {
      // Without a rejection list a short count is ambiguous; leave everything
      // pending and let the idempotent re-send settle it.
      throw new TransientSyncError(
        `Server acknowledged ${response.count} of ${sendable.length} record(s) without listing rejections`
      );
    }

    const synced = await acknowledge(acknowledgedIds);
    debugLog(`[SYNC] Batch done: ${synced.length} synced, ${rejected.length} rejected`);
    return { attempted: batch.length, synced, rejected, durationMs: Date.now() - started };
  }

  /**
   * Hold the sync lock for the duration of `body`. Concurrent callers get
   * {@link SyncInProgressError} immediately.
   */
  async function withSyncLock(
    trigger: SyncTrigger,
    runOptions: RunSyncOptions | undefined,
    body: (signal: AbortSignal) => Promise<{ result: SyncResult; batches: number }>
  ): Promise<SyncResult> {
    if (inFlight) {
      throw new SyncInProgressError();
    }
    const controller = new AbortController();
    inFlight = controller;
    const onCallerAbort = () => controller.abort();
    runOptions?.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (runOptions?.signal?.aborted) controller.abort();

    const cycleStart = Date.now();
    let batches = 0;
    let result = emptyResult();
    let outcome: SyncCycleStats['outcome'] = 'ok';

    try {
      requireSyncSession(session);
      status.setStatus('syncing');
      status.setSyncMessage('Uploading readings...');

      ({ result, batches } = await body(controller.signal));
      result = { ...result, durationMs: Date.now() - cycleStart };

      await refreshCounts();
      status.setStatus('idle');
      status.setLastSyncTime(now());
      if (result.rejected.length > 0) {
        const flagged = result.rejected.filter((r) => r.flagged).length;
        status.setSyncMessage(
          `${result.rejected.length} reading${result.rejected.length === 1 ? '' : 's'} rejected` +
            (flagged > 0 ? `, ${flagged} flagged for review` : '')
        );
        status.addSyncError({
          code: 'REJECTED',
          message: result.rejected[result.rejected.length - 1]?.reason ?? 'Rejected by server',
          recordIds: result.rejected.map((r) => r.id),
          timestamp: now()
        });
      } else {
        status.setSyncMessage(
          result.synced.length > 0
            ? `Synced ${result.synced.length} reading${result.synced.length === 1 ? '' : 's'}`
            : 'Everything is synced!'
        );
      }

      notifySyncComplete(result);
      return result;
    } catch (error) {
      outcome = 'error';
      debugError('[SYNC] Sync failed:', error);
      const friendly = parseErrorMessage(error);
      status.setStatus(error instanceof NotAuthorizedError ? 'unauthorized' : 'error');
      status.setError(friendly, extractErrorMessage(error));
      status.setSyncMessage(friendly);
      status.addSyncError({
        code: error instanceof VitalsSyncError ? error.code : 'UNKNOWN',
        message: extractErrorMessage(error),
        recordIds: [],
        timestamp: now()
      });
      throw error;
    } finally {
      runOptions?.signal?.removeEventListener('abort', onCallerAbort);
      inFlight = null;
      logSyncCycle({
        trigger,
        outcome,
        batches,
        attempted: result.attempted,
        synced: result.synced.length,
        rejected: result.rejected.length,
        durationMs: Date.now() - cycleStart
      });
    }
  }

  function drain(trigger: SyncTrigger, runOptions?: RunSyncOptions): Promise<SyncResult> {
    return withSyncLock(trigger, runOptions, async (signal) => {
      const total = emptyResult();
      let batches = 0;
      while (batches < options.maxSyncIterations) {
        const batch = await pushBatch(signal);
        if (batch.attempted === 0) break;
        batches++;
        total.attempted += batch.attempted;
        total.synced.push(...batch.synced);
        total.rejected.push(...batch.rejected);
        // Continue only while full batches are fully acknowledged
        if (batch.attempted < options.batchSize || batch.synced.length < batch.attempted) break;
      }
      if (batches >= options.maxSyncIterations) {
        debugWarn(`[SYNC] Stopped after ${batches} batches (iteration cap)`);
      }
      return { result: total, batches };
    });
  }

  /**
   * Background entry point: timer callbacks only dispatch the task and log
   * its failure; they never block on it.
   */
  function runInBackground(trigger: SyncTrigger): void {
    const current = session.currentSession();
    if (!current || current.entitlement !== 'premium') {
      debugLog(`[SYNC] Skipping ${trigger} sync: no premium session`);
      return;
    }
    if (inFlight) {
      debugLog(`[SYNC] Skipping ${trigger} sync: already syncing`);
      return;
    }
    drain(trigger).catch((e) => debugError(`[SYNC] ${trigger} sync failed:`, e));
  }

  return {
    status,

    runSync(runOptions) {
      return withSyncLock('user', runOptions, async (signal) => {
        const result = await pushBatch(signal);
        return { result, batches: result.attempted > 0 ? 1 : 0 };
      });
    },

    syncAll(runOptions) {
      return drain('user', runOptions);
    },

    async pullRecords(limit, runOptions) {
      const current = requireSyncSession(session);
      try {
        return await client.downloadVectors(
          { token: current.credential, userId: current.userId },
          limit,
          { signal: runOptions?.signal }
        );
      } catch (e) {
        throw classifyRemoteError(e, session);
      }
    },

    cancel() {
      if (inFlight) {
        debugLog('[SYNC] Cancelling in-flight sync');
        inFlight.abort();
      }
    },

    isSyncing() {
      return inFlight !== null;
    },

    scheduleSync() {
      if (syncTimeout) {
        clearTimeout(syncTimeout);
      }
      syncTimeout = setTimeout(() => {
        syncTimeout = null;
        runInBackground('scheduled');
      }, options.syncDebounceMs);
    },

    start() {
      if (syncInterval) return;
      appendUnsubscribe = store.onAppend(() => {
        refreshCounts().catch((e) => debugError('[SYNC] Failed to refresh counts:', e));
      });
      syncInterval = setInterval(() => runInBackground('periodic'), options.syncIntervalMs);
      refreshCounts().catch((e) => debugError('[SYNC] Failed to refresh counts:', e));
      debugLog(`[SYNC] Background sync every ${formatDuration(options.syncIntervalMs)}`);
    },

    stop() {
      if (syncInterval) {
        clearInterval(syncInterval);
        syncInterval = null;
      }
      if (syncTimeout) {
        clearTimeout(syncTimeout);
        syncTimeout = null;
      }
      if (appendUnsubscribe) {
        appendUnsubscribe();
        appendUnsubscribe = null;
      }
      inFlight?.abort();
    },

    onSyncComplete(callback) {
      syncCompleteCallbacks.add(callback);
      return () => syncCompleteCallbacks.delete(callback);
    },

    getRecentCycles() {
      return [...cycles];
    },

    refreshCounts
  };
}
