import { writable } from 'svelte/store';
import type { SyncStatus } from '../types';

// Detailed sync error for inspection
export interface SyncError {
  code: string;
  message: string;
  recordIds: number[];
  timestamp: string;
}

export interface SyncState {
  status: SyncStatus;
  pendingCount: number;
  flaggedCount: number; // Records that exhausted their retry budget
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  syncErrors: SyncError[]; // Detailed errors for inspection
  lastSyncTime: string | null;
  syncMessage: string | null; // Human-readable status message
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): SyncState {
  return {
    status: 'idle',
    pendingCount: 0,
    flaggedCount: 0,
    lastError: null,
    lastErrorDetails: null,
    syncErrors: [],
    lastSyncTime: null,
    syncMessage: null
  };
}

export type SyncStatusStore = ReturnType<typeof createSyncStatusStore>;

/**
 * Reactive sync status, one per engine. Subscribers (a UI, a CLI status
 * line, a test) see every transition.
 */
export function createSyncStatusStore() {
  const { subscribe, set, update } = writable<SyncState>(initialState());

  return {
    subscribe,
    setStatus: (status: SyncStatus) =>
      update((state) => {
        // Ignore redundant status updates to prevent unnecessary notifications
        if (status === state.status && status !== 'syncing') return state;
        if (status === 'syncing') {
          // Starting sync - clear previous errors
          return { ...state, status, lastError: null, lastErrorDetails: null, syncErrors: [] };
        }
        return {
          ...state,
          status,
          lastError: status === 'idle' ? null : state.lastError,
          lastErrorDetails: status === 'idle' ? null : state.lastErrorDetails
        };
      }),
    setCounts: (pendingCount: number, flaggedCount: number) =>
      update((state) => ({ ...state, pendingCount, flaggedCount })),
    setError: (friendly: string | null, raw?: string | null) =>
      update((state) => ({
        ...state,
        lastError: friendly,
        lastErrorDetails: raw ?? null
      })),
    addSyncError: (error: SyncError) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    clearSyncErrors: () => update((state) => ({ ...state, syncErrors: [] })),
    setLastSyncTime: (time: string) => update((state) => ({ ...state, lastSyncTime: time })),
    setSyncMessage: (message: string | null) =>
      update((state) => ({ ...state, syncMessage: message })),
    reset: () => set(initialState())
  };
}
