/**
 * @fileoverview Local Durable Record Store
 *
 * Append-only log of vital records backed by the SQLite `records` table.
 * This is the only module that mutates records; the sync engine reads
 * batches through {@link RecordStore.listPending} and reports outcomes back
 * through {@link RecordStore.markSynced} and
 * {@link RecordStore.recordRejections}.
 *
 * ## Atomicity
 *
 * better-sqlite3 executes statements synchronously, so every public method
 * runs to completion before any other JavaScript (the sensor loop, the
 * sync engine) can touch the database. Methods that change more than one
 * row additionally run inside a single `db.transaction(...)`, so a crash
 * mid-way rolls the whole change back. No separate lock is needed.
 *
 * ## Record lifecycle
 *
 *   append ──> pending ──(markSynced)──> synced ──(purgeSynced)──> removed
 *                 │
 *                 └─(recordRejections × maxRecordRetries)──> pending + flagged
 *
 * A flagged record is still pending but no longer returned by
 * `listPending`; it waits for {@link RecordStore.requeueFlagged} (a user
 * decision) instead of being retried forever.
 *
 * ## Capture timestamps
 *
 * The server identifies a reading by `(device_id, timestamp)`, so two
 * records of one store never share a `capturedAt`: a colliding append is
 * moved forward by 1 ms until it is free (a UNIQUE index backs this).
 */

import { debugLog, debugWarn } from './debug';
import { openDatabase, getDeviceId, type SqliteDatabase } from './database';
import { NotFoundError, PersistenceError, VitalsSyncError } from './errors';
import type { NewVitalRecord, SyncState, VitalRecord } from './types';

// =============================================================================
// Types
// =============================================================================

export interface RecordStoreOptions {
  /** Rejections a record survives before it is flagged. */
  maxRecordRetries: number;
  /** Synced records older than this many days are removed by `purgeSynced`. */
  retentionDays: number;
  /** Default model tag for appended records. */
  modelVersion: string;
  /** Clock override (tests). */
  now?: () => Date;
}

/** Result of recording one server rejection against a record. */
export interface RejectionOutcome {
  id: number;
  attempts: number;
  flagged: boolean;
}

interface RecordRow {
  id: number;
  captured_at: string;
  heart_rate: number;
  stress_level: number;
  model_version: string;
  sync_state: SyncState;
  sync_attempts: number;
  last_attempt_at: string | null;
  flagged_at: string | null;
  last_error: string | null;
  synced_at: string | null;
}

type AppendListener = (record: VitalRecord) => void;

export interface RecordStore {
  /** Stable identifier of the device this database belongs to. */
  readonly deviceId: string;
  append(fields: NewVitalRecord): Promise<number>;
  markSynced(ids: Iterable<number>): Promise<void>;
  recordRejections(ids: Iterable<number>, reason: string): Promise<RejectionOutcome[]>;
  requeueFlagged(ids?: Iterable<number>): Promise<number>;
  purgeSynced(olderThan?: Date): Promise<number>;
  listPending(limit?: number): Promise<VitalRecord[]>;
  listFlagged(): Promise<VitalRecord[]>;
  get(id: number): Promise<VitalRecord | null>;
  countPending(): Promise<number>;
  countFlagged(): Promise<number>;
  countSynced(): Promise<number>;
  onAppend(listener: AppendListener): () => void;
  close(): void;
}

const MS_PER_DAY = 86_400_000;

function toRecord(row: RecordRow): VitalRecord {
  return {
    id: row.id,
    capturedAt: row.captured_at,
    heartRate: row.heart_rate,
    stressLevel: row.stress_level,
    modelVersion: row.model_version,
    syncState: row.sync_state,
    syncAttempts: row.sync_attempts,
    lastAttemptAt: row.last_attempt_at,
    flaggedAt: row.flagged_at,
    lastError: row.last_error,
    syncedAt: row.synced_at
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Open (or create) the database file at `filePath` and wrap it.
 *
 * @throws {PersistenceError} If the database cannot be opened.
 */
export function openRecordStore(filePath: string, options: RecordStoreOptions): RecordStore {
  return createRecordStore(openDatabase(filePath), options);
}

/** Wrap an already-migrated database handle. The store owns it from now on. */
export function createRecordStore(db: SqliteDatabase, options: RecordStoreOptions): RecordStore {
  const now = options.now ?? (() => new Date());
  const appendListeners: Set<AppendListener> = new Set();
  let closed = false;

  /**
   * Run a storage operation, converting driver failures into
   * {@link PersistenceError}. Errors from this package pass through as is.
   */
  function guard<T>(label: string, fn: () => T): T {
    if (closed) {
      throw new PersistenceError(`Cannot ${label}: store is closed`);
    }
    try {
      return fn();
    } catch (e) {
      if (e instanceof VitalsSyncError) throw e;
      throw new PersistenceError(`Failed to ${label}`, { cause: e });
    }
  }

  function count(where: string): number {
    const row = guard('count records', () =>
      db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM records WHERE ${where}`).get()
    );
    return row?.n ?? 0;
  }

  function requireRow(id: number): VitalRecord {
    const row = db.prepare<[number], RecordRow>('SELECT * FROM records WHERE id = ?').get(id);
    if (!row) {
      throw new PersistenceError(`Record ${id} missing immediately after insert`);
    }
    return toRecord(row);
  }

  function normalizeTimestamp(value: string | undefined): Date {
    if (value === undefined) return now();
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw new RangeError(`Invalid capturedAt timestamp: ${value}`);
    }
    return parsed;
  }

  const deviceId = guard('read device id', () => getDeviceId(db));

  return {
    deviceId,

    // --------------------------------------------------------------------------
    // Writes
    // --------------------------------------------------------------------------

    /**
     * Append a new record in the pending state.
     *
     * The insert is committed (and fsynced, see {@link openDatabase}) before
     * the returned promise resolves, so the record survives a process crash
     * from that point on. A `capturedAt` already taken by another record is
     * moved forward to the next free millisecond.
     *
     * @returns The new record's id.
     * @throws {RangeError} If heart rate or stress level is not a finite number.
     * @throws {PersistenceError} If the write fails.
     */
    async append(fields) {
      if (!Number.isFinite(fields.heartRate) || !Number.isFinite(fields.stressLevel)) {
        throw new RangeError('heartRate and stressLevel must be finite numbers');
      }
      const requested = normalizeTimestamp(fields.capturedAt);
      const modelVersion = fields.modelVersion ?? options.modelVersion;

      const record = guard('append record', () =>
        db.transaction(() => {
          const taken = db.prepare<[string], { id: number }>(
            'SELECT id FROM records WHERE captured_at = ?'
          );
          let ms = requested.getTime();
          let capturedAt = requested.toISOString();
          while (taken.get(capturedAt)) {
            ms += 1;
            capturedAt = new Date(ms).toISOString();
          }
          if (capturedAt !== requested.toISOString()) {
            debugLog(`[STORE] capturedAt ${requested.toISOString()} taken, using ${capturedAt}`);
          }
          const info = db
            .prepare<[string, number, number, string]>(
              `INSERT INTO records (captured_at, heart_rate, stress_level, model_version, sync_state)
               VALUES (?, ?, ?, ?, 'pending')`
            )
            .run(capturedAt, Math.round(fields.heartRate), fields.stressLevel, modelVersion);
          return requireRow(Number(info.lastInsertRowid));
        })()
      );

      for (const listener of appendListeners) {
        try {
          listener(record);
        } catch (e) {
          debugWarn('[STORE] Append listener error:', e);
        }
      }
      return record.id;
    },

    /**
     * Transition every listed record from pending to synced, atomically.
     *
     * Either all ids transition or none do: when any id is unknown or already
     * synced, nothing changes and {@link NotFoundError} lists the offenders.
     * Callers that just uploaded these ids should treat that as a benign race
     * (e.g. a purge or a concurrent acknowledgment), not a fatal error.
     *
     * @throws {NotFoundError} If any id is unknown or not pending.
     * @throws {PersistenceError} If the write fails.
     */
    async markSynced(ids) {
      const unique = [...new Set(ids)];
      if (unique.length === 0) return;
      const syncedAt = now().toISOString();

      guard('mark records synced', () =>
        db.transaction(() => {
          const select = db.prepare<[number], { sync_state: SyncState }>(
            'SELECT sync_state FROM records WHERE id = ?'
          );
          const missing = unique.filter((id) => select.get(id)?.sync_state !== 'pending');
          if (missing.length > 0) {
            throw new NotFoundError(missing);
          }

          const update = db.prepare<[string, number]>(
            `UPDATE records SET sync_state = 'synced', synced_at = ?, flagged_at = NULL
             WHERE id = ? AND sync_state = 'pending'`
          );
          for (const id of unique) {
            update.run(syncedAt, id);
          }
        })()
      );
      debugLog(`[STORE] Marked ${unique.length} record(s) synced`);
    },

    /**
     * Count one server rejection against each listed pending record and flag
     * the ones that have now reached `maxRecordRetries`. Unknown or synced ids
     * are skipped. Runs in one transaction.
     *
     * @param reason - The server's explanation, kept for inspection.
     */
    async recordRejections(ids, reason) {
      const unique = [...new Set(ids)];
      if (unique.length === 0) return [];
      const at = now().toISOString();
      const max = options.maxRecordRetries;

      const outcomes = guard('record rejections', () =>
        db.transaction(() => {
          const update = db.prepare<[string, string, number, string, number]>(
            `UPDATE records
               SET sync_attempts = sync_attempts + 1,
                   last_attempt_at = ?,
                   last_error = ?,
                   flagged_at = CASE WHEN sync_attempts + 1 >= ? THEN COALESCE(flagged_at, ?) ELSE flagged_at END
             WHERE id = ? AND sync_state = 'pending'`
          );
          const select = db.prepare<[number], { sync_attempts: number; flagged_at: string | null }>(
            'SELECT sync_attempts, flagged_at FROM records WHERE id = ?'
          );

          const result: RejectionOutcome[] = [];
          for (const id of unique) {
            const changes = update.run(at, reason, max, at, id).changes;
            if (changes === 0) continue;
            const row = select.get(id);
            if (row) {
              result.push({ id, attempts: row.sync_attempts, flagged: row.flagged_at !== null });
            }
          }
          return result;
        })()
      );

      const flagged = outcomes.filter((o) => o.flagged);
      if (flagged.length > 0) {
        debugWarn(
          `[STORE] ${flagged.length} record(s) flagged after ${max} rejections:`,
          flagged.map((o) => o.id)
        );
      }
      return outcomes;
    },

    /**
     * Put flagged records back into the upload queue (clears the flag and the
     * attempt counter). Without `ids`, every flagged record is requeued.
     *
     * @returns The number of records requeued.
     */
    async requeueFlagged(ids) {
      const changes = guard('requeue flagged records', () => {
        if (ids === undefined) {
          return db
            .prepare(
              `UPDATE records SET flagged_at = NULL, sync_attempts = 0
               WHERE flagged_at IS NOT NULL AND sync_state = 'pending'`
            )
            .run().changes;
        }
        const unique = [...new Set(ids)];
        return db.transaction(() => {
          const update = db.prepare<[number]>(
            `UPDATE records SET flagged_at = NULL, sync_attempts = 0
             WHERE id = ? AND flagged_at IS NOT NULL AND sync_state = 'pending'`
          );
          let total = 0;
          for (const id of unique) {
            total += update.run(id).changes;
          }
          return total;
        })();
      });
      debugLog(`[STORE] Requeued ${changes} flagged record(s)`);
      return changes;
    },

    /**
     * Remove synced records acknowledged before the retention horizon.
     * Pending records are never touched, flagged or not.
     *
     * @param olderThan - Cutoff; defaults to now minus `retentionDays`.
     * @returns The number of records removed.
     */
    async purgeSynced(olderThan) {
      const cutoff = olderThan ?? new Date(now().getTime() - options.retentionDays * MS_PER_DAY);
      const removed = guard('purge synced records', () =>
        db
          .prepare<[string]>(`DELETE FROM records WHERE sync_state = 'synced' AND synced_at < ?`)
          .run(cutoff.toISOString()).changes
      );
      if (removed > 0) {
        debugLog(`[STORE] Purged ${removed} synced record(s) older than ${cutoff.toISOString()}`);
      }
      return removed;
    },

    // --------------------------------------------------------------------------
    // Reads
    // --------------------------------------------------------------------------

    /**
     * Pending, unflagged records, oldest `capturedAt` first (ties by id).
     * Re-querying after a sync returns only what is still pending.
     *
     * @param limit - Maximum rows; omit for all.
     */
    async listPending(limit) {
      const rows = guard('list pending records', () =>
        db
          .prepare<[number], RecordRow>(
            `SELECT * FROM records
             WHERE sync_state = 'pending' AND flagged_at IS NULL
             ORDER BY captured_at ASC, id ASC
             LIMIT ?`
          )
          .all(limit ?? -1)
      );
      return rows.map(toRecord);
    },

    /** Pending records that exhausted their retry budget, oldest first. */
    async listFlagged() {
      const rows = guard('list flagged records', () =>
        db
          .prepare<[], RecordRow>(
            `SELECT * FROM records
             WHERE sync_state = 'pending' AND flagged_at IS NOT NULL
             ORDER BY captured_at ASC, id ASC`
          )
          .all()
      );
      return rows.map(toRecord);
    },

    async get(id) {
      const row = guard('read record', () =>
        db.prepare<[number], RecordRow>('SELECT * FROM records WHERE id = ?').get(id)
      );
      return row ? toRecord(row) : null;
    },

    /** Number of records `listPending` would return without a limit. */
    async countPending() {
      return count(`sync_state = 'pending' AND flagged_at IS NULL`);
    },

    async countFlagged() {
      return count(`sync_state = 'pending' AND flagged_at IS NOT NULL`);
    },

    async countSynced() {
      return count(`sync_state = 'synced'`);
    },

    /**
     * Register a callback fired after every successful append.
     *
     * @returns An unsubscribe function.
     */
    onAppend(listener) {
      appendListeners.add(listener);
      return () => appendListeners.delete(listener);
    },

    /** Close the database. Further calls fail with {@link PersistenceError}. */
    close() {
      if (closed) return;
      closed = true;
      appendListeners.clear();
      db.close();
    }
  };
}
