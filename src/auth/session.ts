/**
 * @fileoverview Authentication Session Manager
 *
 * Owns the single bearer session of a monitor. Two states:
 *
 *   logged_out ──login()/register()──> logged_in
 *   logged_in  ──invalidate()/logout()──> logged_out
 *
 * A login is two requests: `POST /auth/login` for the token, then
 * `GET /users/me` with that token for the user id and account tier. Only
 * when both succeed does the state change; a failed login leaves the
 * previous state untouched.
 *
 * There is no token refresh: a credential lives until the server rejects
 * it, at which point the sync engine calls {@link SessionManager.invalidate}
 * and the user must log in again.
 *
 * The session lives in this object (and its {@link authState} store), not
 * in a module global, so each monitor owns exactly one.
 */

import { debugLog, debugWarn } from '../debug';
import { AuthError, NotAuthorizedError } from '../errors';
import { RemoteRequestError, type RemoteSyncClient } from '../remote/client';
import type { TokenResponse, UserProfile } from '../remote/schema';
import { createAuthStateStore, type AuthStateStore } from '../stores/authState';
import type { Entitlement, Session } from '../types';

// =============================================================================
// Types
// =============================================================================

export interface SessionManagerOptions {
  client: RemoteSyncClient;
  /** Clock override (tests). */
  now?: () => Date;
}

export interface SessionManager {
  /** Reactive view of the session state. */
  readonly authState: AuthStateStore;
  login(username: string, password: string): Promise<Session>;
  register(username: string, email: string, password: string): Promise<Session>;
  currentSession(): Session | null;
  /** Re-read the account tier from the server. */
  refreshEntitlement(): Promise<Session>;
  /**
   * Downgrade the session to `free` after the server refused it a
   * Premium-only call. The credential stays valid; a later
   * {@link SessionManager.refreshEntitlement} or login restores the tier.
   */
  revokeEntitlement(reason?: string): void;
  /** Drop the session after the server rejected it (or on any forced logout). */
  invalidate(reason?: string): void;
  /** Explicit user logout. */
  logout(): void;
}

const PREMIUM_USER_TYPE = 'premium';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Derive the entitlement from a profile. A premium account whose
 * `subscription_end` lies in the past counts as free.
 */
export function entitlementFromProfile(profile: UserProfile, now: Date): Entitlement {
  if (profile.user_type.toLowerCase() !== PREMIUM_USER_TYPE) return 'free';
  if (profile.subscription_end) {
    const end = new Date(profile.subscription_end);
    if (!Number.isNaN(end.getTime()) && end.getTime() < now.getTime()) {
      return 'free';
    }
  }
  return 'premium';
}

/** Translate a transport/HTTP failure during login into an {@link AuthError}. */
function toAuthError(error: unknown, action: string): AuthError {
  if (error instanceof AuthError) return error;
  if (error instanceof RemoteRequestError) {
    switch (error.kind) {
      case 'network':
      case 'timeout':
      case 'aborted':
        return new AuthError('network_unavailable', `${action}: server unreachable`, {
          cause: error
        });
      case 'http':
        if (error.status === 400 || error.status === 401 || error.status === 403 || error.status === 422) {
          return new AuthError(
            'invalid_credentials',
            error.detail ? `${action}: ${error.detail}` : `${action}: invalid credentials`,
            { cause: error }
          );
        }
        return new AuthError('server_error', `${action}: server error (${error.status})`, {
          cause: error
        });
      case 'invalid_response':
        return new AuthError('server_error', `${action}: unexpected server response`, {
          cause: error
        });
    }
  }
  return new AuthError('server_error', `${action}: ${String(error)}`, { cause: error });
}

// =============================================================================
// Factory
// =============================================================================

export function createSessionManager(options: SessionManagerOptions): SessionManager {
  const { client } = options;
  const now = options.now ?? (() => new Date());
  const authState = createAuthStateStore();

  let session: Session | null = null;

  async function establish(
    username: string,
    action: string,
    obtainToken: () => Promise<TokenResponse>
  ): Promise<Session> {
    authState.setLoading(true);
    try {
      const token = await obtainToken();
      const profile = await client.fetchProfile(token.access_token);
      const established: Session = {
        credential: token.access_token,
        tokenType: token.token_type,
        userId: profile.id,
        username: profile.username || username,
        entitlement: entitlementFromProfile(profile, now()),
        subscriptionEnd: profile.subscription_end ?? null,
        createdAt: now().toISOString()
      };
      session = established;
      authState.setLoggedIn(established);
      debugLog(
        `[AUTH] ${action} succeeded for user ${established.userId} (${established.entitlement})`
      );
      return established;
    } catch (e) {
      authState.setLoading(false);
      const authError = toAuthError(e, action);
      debugWarn(`[AUTH] ${action} failed (${authError.kind}):`, authError.message);
      throw authError;
    }
  }

  function invalidate(reason?: string): void {
    if (!session) return;
    debugWarn(`[AUTH] Session invalidated${reason ? `: ${reason}` : ''}`);
    session = null;
    authState.setLoggedOut(reason);
  }

  return {
    authState,
    invalidate,

    login(username, password) {
      return establish(username, 'Login', () => client.login(username, password));
    },

    register(username, email, password) {
      return establish(username, 'Registration', () => client.register(username, email, password));
    },

    currentSession() {
      return session;
    },

    revokeEntitlement(reason) {
      if (!session || session.entitlement === 'free') return;
      debugWarn(`[AUTH] Entitlement revoked${reason ? `: ${reason}` : ''}`);
      session = { ...session, entitlement: 'free' };
      authState.updateEntitlement('free', session.subscriptionEnd);
    },

    async refreshEntitlement() {
      const current = session;
      if (!current) {
        throw new NotAuthorizedError('no_session', 'Not logged in');
      }
      let profile: UserProfile;
      try {
        profile = await client.fetchProfile(current.credential);
      } catch (e) {
        if (e instanceof RemoteRequestError && e.kind === 'http' && e.status === 401) {
          invalidate('Session expired. Please sign in again.');
          throw new NotAuthorizedError('credential', 'Credential rejected by server', { cause: e });
        }
        throw toAuthError(e, 'Entitlement refresh');
      }

      // The session may have been dropped while the request was in flight.
      if (session !== current) {
        throw new NotAuthorizedError('no_session', 'Session ended during entitlement refresh');
      }
      const entitlement = entitlementFromProfile(profile, now());
      const subscriptionEnd = profile.subscription_end ?? null;
      session = { ...current, entitlement, subscriptionEnd };
      authState.updateEntitlement(entitlement, subscriptionEnd);
      if (entitlement !== current.entitlement) {
        debugLog(`[AUTH] Entitlement changed: ${current.entitlement} -> ${entitlement}`);
      }
      return session;
    },

    logout() {
      if (session) {
        debugLog(`[AUTH] User ${session.userId} logged out`);
      }
      session = null;
      authState.setLoggedOut();
    }
  };
}
