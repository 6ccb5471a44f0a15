/**
 * @fileoverview SQLite Database Management via better-sqlite3
 *
 * Manages the lifecycle of the local database the record store writes to.
 * {@link openDatabase} opens (or creates) the file, applies the schema
 * migrations in order and returns the handle; the caller owns it and must
 * {@link Database.close} it on shutdown.
 *
 * Durability settings:
 *   - `journal_mode = WAL` so readers never block the sensor loop's writes.
 *   - `synchronous = FULL` so a committed transaction survives power loss,
 *     which is what makes `append` durable before it returns.
 *
 * Schema versions are tracked with `PRAGMA user_version`; each entry in
 * {@link MIGRATIONS} runs exactly once, inside its own transaction.
 *
 * @see {@link recordStore.ts} for the only consumer of the records table
 */

import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { debugLog } from './debug';
import { PersistenceError } from './errors';

export type SqliteDatabase = Database.Database;

// =============================================================================
// Migrations
// =============================================================================

/**
 * A single schema version. `version` must increase monotonically; `up`
 * receives the open handle inside a transaction.
 */
export interface MigrationConfig {
  version: number;
  up: (db: SqliteDatabase) => void;
}

export const MIGRATIONS: MigrationConfig[] = [
  {
    version: 1,
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS records (
          id            INTEGER PRIMARY KEY AUTOINCREMENT,
          captured_at   TEXT    NOT NULL,
          heart_rate    INTEGER NOT NULL,
          stress_level  REAL    NOT NULL,
          model_version TEXT    NOT NULL DEFAULT 'v1.0',
          sync_state    TEXT    NOT NULL DEFAULT 'pending'
                                CHECK (sync_state IN ('pending', 'synced'))
        );
        CREATE INDEX IF NOT EXISTS idx_records_pending
          ON records (sync_state, captured_at, id);
        CREATE TABLE IF NOT EXISTS meta (
          key   TEXT PRIMARY KEY,
          value TEXT NOT NULL
        );
      `);
    }
  },
  {
    version: 2,
    up: (db) => {
      db.exec(`
        ALTER TABLE records ADD COLUMN sync_attempts   INTEGER NOT NULL DEFAULT 0;
        ALTER TABLE records ADD COLUMN last_attempt_at TEXT;
        ALTER TABLE records ADD COLUMN flagged_at      TEXT;
        ALTER TABLE records ADD COLUMN last_error      TEXT;
        ALTER TABLE records ADD COLUMN synced_at       TEXT;
      `);
    }
  },
  {
    // captured_at doubles as the server's dedup key; spread out any
    // duplicates written before it was enforced, then make it unique.
    version: 3,
    up: (db) => {
      const rows = db
        .prepare<[], { id: number; captured_at: string }>(
          'SELECT id, captured_at FROM records ORDER BY captured_at ASC, id ASC'
        )
        .all();
      const used = new Set(rows.map((r) => r.captured_at));
      const seen = new Set<string>();
      const move = db.prepare<[string, number]>('UPDATE records SET captured_at = ? WHERE id = ?');
      for (const row of rows) {
        if (!seen.has(row.captured_at)) {
          seen.add(row.captured_at);
          continue;
        }
        let ms = new Date(row.captured_at).getTime();
        let next = row.captured_at;
        while (used.has(next)) {
          ms += 1;
          next = new Date(ms).toISOString();
        }
        used.add(next);
        seen.add(next);
        move.run(next, row.id);
      }
      db.exec('CREATE UNIQUE INDEX IF NOT EXISTS idx_records_captured_at ON records (captured_at)');
    }
  }
];

// =============================================================================
// Database Creation
// =============================================================================

/**
 * Open the database at `filePath` and bring its schema up to date.
 *
 * Creates the parent directory when it is missing. `':memory:'` opens a
 * private in-memory database (nothing survives `close`).
 *
 * @throws {PersistenceError} If the file cannot be opened or a migration fails.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  let db: SqliteDatabase;
  try {
    if (filePath !== ':memory:') {
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    db = new Database(filePath);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
  } catch (e) {
    throw new PersistenceError(`Failed to open database at ${filePath}`, { cause: e });
  }

  try {
    migrate(db);
  } catch (e) {
    db.close();
    throw new PersistenceError('Failed to migrate database schema', { cause: e });
  }

  return db;
}

function migrate(db: SqliteDatabase): void {
  const current = db.pragma('user_version', { simple: true });
  const currentVersion = typeof current === 'number' ? current : 0;

  for (const migration of MIGRATIONS) {
    if (migration.version <= currentVersion) continue;
    db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    })();
    debugLog(`[DB] Migrated schema to version ${migration.version}`);
  }
}

// =============================================================================
// Device Identity
// =============================================================================

const DEVICE_ID_KEY = 'device_id';

/**
 * Get or create the stable device identifier stored with this database.
 *
 * Generated once (UUID v4) and kept in the `meta` table, so it survives
 * restarts and stays tied to the records it labels. Every uploaded vector
 * carries it as `device_id`; together with the capture timestamp it forms
 * the server's deduplication key.
 */
export function getDeviceId(db: SqliteDatabase): string {
  const row = db
    .prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
    .get(DEVICE_ID_KEY);
  if (row) {
    return row.value;
  }
  const deviceId = randomUUID();
  db.prepare('INSERT OR IGNORE INTO meta (key, value) VALUES (?, ?)').run(DEVICE_ID_KEY, deviceId);
  debugLog(`[DB] Generated device id ${deviceId}`);
  return deviceId;
}
