/**
 * Shared record, session and status types.
 *
 * Records are the only data the engine moves. They are written locally by
 * the sensor loop, read in batches by the sync engine and acknowledged back
 * into the store; nothing else mutates them.
 */

// ============================================================
// RECORD TYPES
// ============================================================

/**
 * Lifecycle of a record in the local store:
 * - 'pending': captured locally, not yet acknowledged by the server
 * - 'synced': acknowledged by the server; terminal, never reverts
 */
export type SyncState = 'pending' | 'synced';

/**
 * One sensor/inference observation as stored locally.
 */
export interface VitalRecord {
  id: number; // Auto-increment ID, never reused
  capturedAt: string; // ISO timestamp (UTC) of acquisition
  heartRate: number; // Beats per minute, range advisory only
  stressLevel: number; // Inference output
  modelVersion: string; // Tag of the model that produced stressLevel
  syncState: SyncState;
  syncAttempts: number; // Number of server rejections so far
  lastAttemptAt: string | null; // ISO timestamp of the last rejection
  flaggedAt: string | null; // Set once syncAttempts reaches the retry limit
  lastError: string | null; // Reason given by the server for the last rejection
  syncedAt: string | null; // ISO timestamp of the acknowledgment
}

/**
 * Fields a caller supplies when appending a record. `capturedAt` defaults
 * to the current time and `modelVersion` to the configured model tag.
 */
export interface NewVitalRecord {
  capturedAt?: string;
  heartRate: number;
  stressLevel: number;
  modelVersion?: string;
}

// ============================================================
// SESSION TYPES
// ============================================================

/** Account tier. Only premium accounts may upload. */
export type Entitlement = 'free' | 'premium';

export interface Session {
  credential: string; // Opaque bearer token
  tokenType: string;
  userId: number; // Server-assigned identity
  username: string;
  entitlement: Entitlement;
  subscriptionEnd: string | null;
  createdAt: string; // ISO timestamp of login
}

export type AuthMode = 'logged_in' | 'logged_out';

// ============================================================
// SYNC RESULT TYPES
// ============================================================

export type SyncStatus = 'idle' | 'syncing' | 'error' | 'unauthorized';

/** A record the server refused, with the reason it gave (if any). */
export interface RejectedRecord {
  id: number;
  reason: string;
  flagged: boolean; // True when this rejection exhausted the retry budget
}

/**
 * Outcome of one `runSync()` call.
 *
 * `attempted` is the batch size that was sent; `synced` lists the ids the
 * server acknowledged and the store transitioned; `rejected` lists ids the
 * server refused (they stay pending, or flagged once over the limit).
 */
export interface SyncResult {
  attempted: number;
  synced: number[];
  rejected: RejectedRecord[];
  durationMs: number;
}
