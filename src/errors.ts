/**
 * @fileoverview Error Taxonomy
 *
 * Every failure the engine surfaces is one of these classes, so callers can
 * branch with `instanceof` (or on the stable `code`) instead of matching
 * message text:
 *
 *   - {@link TransientSyncError}  network / timeout / cancellation / 5xx.
 *                                 Records stay pending; retry later.
 *   - {@link NotAuthorizedError}  credential or entitlement rejected.
 *                                 Re-login or upgrade; never auto-retried.
 *   - {@link NotFoundError}       `markSynced` named an unknown or already
 *                                 synced id. A benign race.
 *   - {@link PersistenceError}    local storage failed. Fatal to the current
 *                                 operation.
 *   - {@link SyncInProgressError} `runSync()` called while one is in flight.
 *   - {@link AuthError}           login failed, with a {@link AuthErrorKind}.
 *   - {@link ConfigError}         invalid configuration.
 */

export type VitalsSyncErrorCode =
  | 'TRANSIENT'
  | 'NOT_AUTHORIZED'
  | 'NOT_FOUND'
  | 'PERSISTENCE'
  | 'SYNC_IN_PROGRESS'
  | 'AUTH'
  | 'CONFIG';

export class VitalsSyncError extends Error {
  readonly code: VitalsSyncErrorCode;

  constructor(code: VitalsSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientSyncError extends VitalsSyncError {
  /** HTTP status when the failure came from a response, otherwise null. */
  readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('TRANSIENT', message, options);
    this.status = options?.status ?? null;
  }
}

/**
 * - 'no_session': never logged in, or the session was invalidated
 * - 'credential': the server rejected the bearer token (401)
 * - 'entitlement': the account is not premium (client check or 403)
 */
export type NotAuthorizedReason = 'no_session' | 'credential' | 'entitlement';

export class NotAuthorizedError extends VitalsSyncError {
  readonly reason: NotAuthorizedReason;

  constructor(reason: NotAuthorizedReason, message: string, options?: { cause?: unknown }) {
    super('NOT_AUTHORIZED', message, options);
    this.reason = reason;
  }
}

export class NotFoundError extends VitalsSyncError {
  readonly ids: number[];

  constructor(ids: number[]) {
    super('NOT_FOUND', `Unknown or already synced record ids: ${ids.join(', ')}`);
    this.ids = ids;
  }
}

export class PersistenceError extends VitalsSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', message, options);
  }
}

export class SyncInProgressError extends VitalsSyncError {
  constructor() {
    super('SYNC_IN_PROGRESS', 'A sync is already running');
  }
}

export type AuthErrorKind = 'invalid_credentials' | 'network_unavailable' | 'server_error';

export class AuthError extends VitalsSyncError {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super('AUTH', message, options);
    this.kind = kind;
  }
}

export class ConfigError extends VitalsSyncError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

// =============================================================================
// Message helpers
// =============================================================================

/** Extract the raw message from an unknown thrown value. */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === 'object') {
    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }
  return String(error);
}

/** Map an error to the short message shown in the sync status store. */
export function parseErrorMessage(error: unknown): string {
  if (error instanceof TransientSyncError) {
    return 'Server unreachable. Readings are saved locally and will sync later.';
  }
  if (error instanceof NotAuthorizedError) {
    switch (error.reason) {
      case 'no_session':
        return 'Sign in required to sync.';
      case 'credential':
        return 'Session expired. Please sign in again.';
      case 'entitlement':
        return 'Sync requires a Premium account.';
    }
  }
  if (error instanceof PersistenceError) {
    return 'Local storage failed. Sync was not attempted.';
  }
  if (error instanceof SyncInProgressError) {
    return 'A sync is already running.';
  }
  if (error instanceof Error) {
    return error.message.length > 100 ? error.message.substring(0, 100) + '...' : error.message;
  }
  return 'An unexpected error occurred';
}
