/**
 * @fileoverview Main entry point — `vitals-sync`
 *
 * Client side of an offline-first health monitor. The public API covers:
 *
 * - **Monitor** — one call that wires store, session, sync engine and sensor
 *   loop together.
 * - **Record Store** — the durable local log of readings.
 * - **Session** — login, logout, entitlement.
 * - **Sync Engine** — upload pending readings, background sync, status.
 * - **Sensor Loop** — periodic acquisition with fallbacks.
 * - **Reactive Stores** — svelte-compatible status and auth stores.
 * - **Configuration, Errors, Debug** — the ambient pieces.
 */

// =============================================================================
//  Monitor
// =============================================================================
// `createMonitor` is the composition root; most consumers need nothing else.

export { createMonitor } from './monitor';
export type { Monitor, MonitorOptions } from './monitor';

// =============================================================================
//  Configuration
// =============================================================================

export { resolveConfig, loadConfigFromEnv, DEFAULT_CONFIG } from './config';
export type { SyncEngineConfig, ResolvedConfig } from './config';

// =============================================================================
//  Local Durable Store
// =============================================================================
// - `openRecordStore` — append, list pending, mark synced, purge.
// - `openDatabase` — open/migrate a SQLite file directly (advanced).

export { openRecordStore, createRecordStore } from './recordStore';
export type { RecordStore, RecordStoreOptions, RejectionOutcome } from './recordStore';
export { openDatabase } from './database';

// =============================================================================
//  Authentication Session
// =============================================================================

export { createSessionManager, entitlementFromProfile } from './auth/session';
export type { SessionManager, SessionManagerOptions } from './auth/session';

// =============================================================================
//  Remote Client
// =============================================================================
// The HTTP client and the zod schemas of everything on the wire.

export { createHttpSyncClient, RemoteRequestError } from './remote/client';
export type {
  RemoteSyncClient,
  RemoteAuth,
  RemoteErrorKind,
  RequestOptions,
  HttpSyncClientOptions
} from './remote/client';
export { toVectorPayload, vectorKey, NO_ACCELEROMETER_READING } from './remote/schema';
export type { VectorPayload, UploadResponse, UserProfile, RemoteVector } from './remote/schema';

// =============================================================================
//  Sync Engine
// =============================================================================

export { createSyncEngine } from './engine';
export type {
  SyncEngine,
  SyncEngineOptions,
  RunSyncOptions,
  SyncTrigger,
  SyncCycleStats
} from './engine';

// =============================================================================
//  Sensor Acquisition Loop
// =============================================================================

export { createSensorLoop, FALLBACK_HEART_RATE, FALLBACK_STRESS_LEVEL } from './sensor/loop';
export type { SensorLoop, SensorLoopOptions, HeartRateSensor, StressModel } from './sensor/loop';

// =============================================================================
//  Reactive Stores
// =============================================================================

export { createSyncStatusStore } from './stores/sync';
export type { SyncStatusStore, SyncState as SyncStatusState, SyncError } from './stores/sync';
export { createAuthStateStore, isAuthenticated, canSync } from './stores/authState';
export type { AuthStateStore, AuthState } from './stores/authState';

// =============================================================================
//  Diagnostics
// =============================================================================

export { getDiagnostics } from './diagnostics';
export type { DiagnosticsSnapshot, DiagnosticsSources } from './diagnostics';

// =============================================================================
//  Errors
// =============================================================================

export {
  VitalsSyncError,
  TransientSyncError,
  NotAuthorizedError,
  NotFoundError,
  PersistenceError,
  SyncInProgressError,
  AuthError,
  ConfigError,
  extractErrorMessage,
  parseErrorMessage
} from './errors';
export type {
  VitalsSyncErrorCode,
  NotAuthorizedReason,
  AuthErrorKind
} from './errors';

// =============================================================================
//  Debug
// =============================================================================

export { debug, isDebugMode, setDebugMode } from './debug';

// =============================================================================
//  Types
// =============================================================================

export type {
  VitalRecord,
  NewVitalRecord,
  SyncState,
  Session,
  Entitlement,
  AuthMode,
  SyncStatus,
  SyncResult,
  RejectedRecord
} from './types';
