// ============================================================================
// Record Store Tests
// ============================================================================

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MIGRATIONS } from '../src/database';
import { NotFoundError, PersistenceError } from '../src/errors';
import { openRecordStore, type RecordStore, type RecordStoreOptions } from '../src/recordStore';

const DAY = 86_400_000;

describe('RecordStore', () => {
  let dir: string;
  let clock: Date;
  let store: RecordStore;

  const options = (): RecordStoreOptions => ({
    maxRecordRetries: 2,
    retentionDays: 30,
    modelVersion: 'v1.0',
    now: () => clock
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vitals-store-'));
    clock = new Date('2024-05-01T12:00:00.000Z');
    store = openRecordStore(path.join(dir, 'health_data.db'), options());
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  // --------------------------------------------------------------------------
  // Append
  // --------------------------------------------------------------------------
  describe('append', () => {
    it('stores a pending record with defaults filled in', async () => {
      const id = await store.append({ heartRate: 72.6, stressLevel: 0.42 });

      expect(await store.get(id)).toEqual({
        id,
        capturedAt: '2024-05-01T12:00:00.000Z',
        heartRate: 73,
        stressLevel: 0.42,
        modelVersion: 'v1.0',
        syncState: 'pending',
        syncAttempts: 0,
        lastAttemptAt: null,
        flaggedAt: null,
        lastError: null,
        syncedAt: null
      });
    });

    it('assigns increasing ids', async () => {
      const first = await store.append({ heartRate: 70, stressLevel: 0.1 });
      const second = await store.append({ heartRate: 71, stressLevel: 0.1 });

      expect(second).toBeGreaterThan(first);
    });

    it('normalizes capturedAt to UTC', async () => {
      const id = await store.append({
        capturedAt: '2024-05-01T14:00:00+02:00',
        heartRate: 70,
        stressLevel: 0.1
      });

      expect((await store.get(id))?.capturedAt).toBe('2024-05-01T12:00:00.000Z');
    });

    it('moves a colliding capturedAt to the next free millisecond', async () => {
      const at = '2024-05-01T10:00:00.000Z';
      const first = await store.append({ capturedAt: at, heartRate: 70, stressLevel: 0.1 });
      const second = await store.append({ capturedAt: at, heartRate: 90, stressLevel: 0.5 });
      const third = await store.append({ capturedAt: at, heartRate: 95, stressLevel: 0.6 });

      expect((await store.get(first))?.capturedAt).toBe('2024-05-01T10:00:00.000Z');
      expect((await store.get(second))?.capturedAt).toBe('2024-05-01T10:00:00.001Z');
      expect((await store.get(third))?.capturedAt).toBe('2024-05-01T10:00:00.002Z');
      expect((await store.get(second))?.heartRate).toBe(90);
    });

    it('skips past a later timestamp that is already taken', async () => {
      await store.append({ capturedAt: '2024-05-01T10:00:00.001Z', heartRate: 70, stressLevel: 0.1 });
      await store.append({ capturedAt: '2024-05-01T10:00:00.000Z', heartRate: 71, stressLevel: 0.1 });
      const id = await store.append({
        capturedAt: '2024-05-01T10:00:00.000Z',
        heartRate: 72,
        stressLevel: 0.1
      });

      expect((await store.get(id))?.capturedAt).toBe('2024-05-01T10:00:00.002Z');
    });

    it('rejects non-finite values', async () => {
      await expect(store.append({ heartRate: Number.NaN, stressLevel: 0.1 })).rejects.toBeInstanceOf(
        RangeError
      );
      await expect(
        store.append({ heartRate: 70, stressLevel: Number.POSITIVE_INFINITY })
      ).rejects.toBeInstanceOf(RangeError);
      expect(await store.countPending()).toBe(0);
    });

    it('rejects an unparseable timestamp', async () => {
      await expect(
        store.append({ capturedAt: 'not-a-date', heartRate: 70, stressLevel: 0.1 })
      ).rejects.toBeInstanceOf(RangeError);
    });

    it('notifies append listeners until they unsubscribe', async () => {
      const seen: number[] = [];
      const unsubscribe = store.onAppend((record) => seen.push(record.heartRate));

      await store.append({ heartRate: 70, stressLevel: 0.1 });
      unsubscribe();
      await store.append({ heartRate: 80, stressLevel: 0.1 });

      expect(seen).toEqual([70]);
    });
  });

  // --------------------------------------------------------------------------
  // Durability
  // --------------------------------------------------------------------------
  describe('durability', () => {
    it('keeps records and the device id across a reopen', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });
      const deviceId = store.deviceId;
      store.close();

      store = openRecordStore(path.join(dir, 'health_data.db'), options());

      expect(store.deviceId).toBe(deviceId);
      expect((await store.listPending()).map((r) => r.id)).toEqual([id]);
    });

    it('never reuses an id after the record is purged', async () => {
      const first = await store.append({ heartRate: 70, stressLevel: 0.1 });
      await store.markSynced([first]);
      clock = new Date(clock.getTime() + 31 * DAY);
      await store.purgeSynced();

      const second = await store.append({ heartRate: 70, stressLevel: 0.1 });

      expect(second).toBeGreaterThan(first);
    });

    it('spreads out duplicate timestamps left by an older schema', async () => {
      store.close();
      const file = path.join(dir, 'legacy.db');
      const legacy = new Database(file);
      for (const migration of MIGRATIONS.filter((m) => m.version <= 2)) {
        migration.up(legacy);
      }
      legacy.pragma('user_version = 2');
      const insert = legacy.prepare(
        'INSERT INTO records (captured_at, heart_rate, stress_level) VALUES (?, ?, ?)'
      );
      insert.run('2024-05-01T10:00:00.000Z', 70, 0.1);
      insert.run('2024-05-01T10:00:00.000Z', 71, 0.1);
      insert.run('2024-05-01T10:00:00.001Z', 72, 0.1);
      legacy.close();

      store = openRecordStore(file, options());

      expect((await store.listPending()).map((r) => [r.heartRate, r.capturedAt])).toEqual([
        [70, '2024-05-01T10:00:00.000Z'],
        [72, '2024-05-01T10:00:00.001Z'],
        [71, '2024-05-01T10:00:00.002Z']
      ]);
    });

    it('creates the parent directory of a new database', async () => {
      const nested = openRecordStore(path.join(dir, 'a', 'b', 'data.db'), options());
      await nested.append({ heartRate: 70, stressLevel: 0.1 });

      expect(await nested.countPending()).toBe(1);
      nested.close();
    });

    it('fails with PersistenceError once closed', async () => {
      store.close();

      await expect(store.append({ heartRate: 70, stressLevel: 0.1 })).rejects.toBeInstanceOf(
        PersistenceError
      );
    });
  });

  // --------------------------------------------------------------------------
  // Listing
  // --------------------------------------------------------------------------
  describe('listPending', () => {
    it('returns oldest capturedAt first', async () => {
      const late = await store.append({
        capturedAt: '2024-05-01T10:00:04.000Z',
        heartRate: 70,
        stressLevel: 0.1
      });
      const earlyA = await store.append({
        capturedAt: '2024-05-01T10:00:00.000Z',
        heartRate: 71,
        stressLevel: 0.1
      });
      const earlyB = await store.append({
        capturedAt: '2024-05-01T10:00:00.000Z',
        heartRate: 72,
        stressLevel: 0.1
      });

      expect((await store.listPending()).map((r) => r.id)).toEqual([earlyA, earlyB, late]);
      expect((await store.listPending(2)).map((r) => r.id)).toEqual([earlyA, earlyB]);
    });

    it('only returns what is still pending after a sync', async () => {
      const a = await store.append({ heartRate: 70, stressLevel: 0.1 });
      const b = await store.append({ heartRate: 71, stressLevel: 0.1 });

      await store.markSynced([a]);

      expect((await store.listPending()).map((r) => r.id)).toEqual([b]);
      expect(await store.countSynced()).toBe(1);
    });
  });

  // --------------------------------------------------------------------------
  // markSynced
  // --------------------------------------------------------------------------
  describe('markSynced', () => {
    it('records when the acknowledgment happened', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });

      await store.markSynced([id]);

      const record = await store.get(id);
      expect(record?.syncState).toBe('synced');
      expect(record?.syncedAt).toBe('2024-05-01T12:00:00.000Z');
    });

    it('changes nothing when any id is unknown', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });

      const error = await store.markSynced([id, 99]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error instanceof NotFoundError && error.ids).toEqual([99]);
      expect((await store.get(id))?.syncState).toBe('pending');
    });

    it('refuses to mark an already synced record again', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });
      await store.markSynced([id]);

      await expect(store.markSynced([id])).rejects.toBeInstanceOf(NotFoundError);
    });

    it('is a no-op for an empty list', async () => {
      await expect(store.markSynced([])).resolves.toBeUndefined();
    });
  });

  // --------------------------------------------------------------------------
  // Rejections and flagging
  // --------------------------------------------------------------------------
  describe('recordRejections', () => {
    it('flags a record once it reaches the retry limit', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });

      expect(await store.recordRejections([id], 'bad value')).toEqual([
        { id, attempts: 1, flagged: false }
      ]);
      expect(await store.recordRejections([id], 'bad value')).toEqual([
        { id, attempts: 2, flagged: true }
      ]);

      expect(await store.listPending()).toEqual([]);
      const flagged = await store.listFlagged();
      expect(flagged.map((r) => r.id)).toEqual([id]);
      expect(flagged[0].lastError).toBe('bad value');
      expect(flagged[0].flaggedAt).toBe('2024-05-01T12:00:00.000Z');
      expect(flagged[0].syncState).toBe('pending');
    });

    it('skips ids that are not pending', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });
      await store.markSynced([id]);

      expect(await store.recordRejections([id, 42], 'late')).toEqual([]);
    });

    it('requeues flagged records with a fresh retry budget', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });
      await store.recordRejections([id], 'bad value');
      await store.recordRejections([id], 'bad value');

      expect(await store.requeueFlagged([id])).toBe(1);

      const record = await store.get(id);
      expect(record?.flaggedAt).toBeNull();
      expect(record?.syncAttempts).toBe(0);
      expect(await store.countPending()).toBe(1);
      expect(await store.countFlagged()).toBe(0);
    });
  });

  // --------------------------------------------------------------------------
  // Retention
  // --------------------------------------------------------------------------
  describe('purgeSynced', () => {
    it('removes synced records past the retention horizon only', async () => {
      const old = await store.append({ heartRate: 70, stressLevel: 0.1 });
      await store.markSynced([old]);
      clock = new Date(clock.getTime() + 10 * DAY);
      const recent = await store.append({ heartRate: 71, stressLevel: 0.1 });
      await store.markSynced([recent]);
      const pending = await store.append({ heartRate: 72, stressLevel: 0.1 });
      clock = new Date(clock.getTime() + 25 * DAY);

      expect(await store.purgeSynced()).toBe(1);

      expect(await store.get(old)).toBeNull();
      expect((await store.get(recent))?.syncState).toBe('synced');
      expect((await store.get(pending))?.syncState).toBe('pending');
    });

    it('never removes pending records, however old', async () => {
      const id = await store.append({ heartRate: 70, stressLevel: 0.1 });

      expect(await store.purgeSynced(new Date('2100-01-01T00:00:00.000Z'))).toBe(0);
      expect(await store.get(id)).not.toBeNull();
    });
  });
});
