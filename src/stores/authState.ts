/**
 * Auth State Store
 * Tracks the current authentication mode (logged_in/logged_out)
 */

import { writable, derived, type Readable } from 'svelte/store';
import type { AuthMode, Entitlement, Session } from '../types';

export interface AuthState {
  mode: AuthMode;
  session: Session | null;
  isLoading: boolean; // A login or profile lookup is in flight
  authKickedMessage: string | null; // Why the user was sent back to login
}

function initialState(): AuthState {
  return {
    mode: 'logged_out',
    session: null,
    isLoading: false,
    authKickedMessage: null
  };
}

export type AuthStateStore = ReturnType<typeof createAuthStateStore>;

export function createAuthStateStore() {
  const { subscribe, set, update } = writable<AuthState>(initialState());

  return {
    subscribe,

    /**
     * Set auth mode to logged in with session
     */
    setLoggedIn(session: Session): void {
      update((state) => ({
        ...state,
        mode: 'logged_in',
        session,
        isLoading: false,
        authKickedMessage: null
      }));
    },

    /**
     * Set auth mode to logged out (no session)
     */
    setLoggedOut(kickedMessage?: string): void {
      update((state) => ({
        ...state,
        mode: 'logged_out',
        session: null,
        isLoading: false,
        authKickedMessage: kickedMessage || null
      }));
    },

    setLoading(isLoading: boolean): void {
      update((state) => ({ ...state, isLoading }));
    },

    /**
     * Update the entitlement of the current session (after a profile refresh)
     */
    updateEntitlement(entitlement: Entitlement, subscriptionEnd: string | null): void {
      update((state) => {
        if (state.mode !== 'logged_in' || !state.session) return state;
        return { ...state, session: { ...state.session, entitlement, subscriptionEnd } };
      });
    },

    clearKickedMessage(): void {
      update((state) => ({ ...state, authKickedMessage: null }));
    },

    reset(): void {
      set(initialState());
    }
  };
}

/** Derived store: is any session active. */
export function isAuthenticated(store: Readable<AuthState>): Readable<boolean> {
  return derived(store, ($authState) => $authState.mode === 'logged_in' && !$authState.isLoading);
}

/** Derived store: may the current session upload. */
export function canSync(store: Readable<AuthState>): Readable<boolean> {
  return derived(
    store,
    ($authState) =>
      $authState.mode === 'logged_in' && $authState.session?.entitlement === 'premium'
  );
}
