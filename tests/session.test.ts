// ============================================================================
// Session Manager Tests
// ============================================================================

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { get } from 'svelte/store';
import { createSessionManager, entitlementFromProfile, type SessionManager } from '../src/auth/session';
import { AuthError, NotAuthorizedError } from '../src/errors';
import { RemoteRequestError } from '../src/remote/client';
import { canSync, isAuthenticated } from '../src/stores/authState';
import { FakeRemote, premiumUser } from './fakes/fakeRemote';

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('SessionManager', () => {
  let remote: FakeRemote;
  let session: SessionManager;

  beforeEach(() => {
    remote = new FakeRemote();
    remote.addUser(premiumUser());
    session = createSessionManager({ client: remote, now: () => NOW });
  });

  // --------------------------------------------------------------------------
  // Login
  // --------------------------------------------------------------------------
  describe('login', () => {
    it('establishes a premium session from the token and profile', async () => {
      const established = await session.login('alice', 'test-password');

      expect(established).toEqual({
        credential: 'test-token-1',
        tokenType: 'bearer',
        userId: 7,
        username: 'alice',
        entitlement: 'premium',
        subscriptionEnd: null,
        createdAt: '2024-05-01T12:00:00.000Z'
      });
      expect(session.currentSession()).toBe(established);
      const state = get(session.authState);
      expect(state.mode).toBe('logged_in');
      expect(state.isLoading).toBe(false);
      expect(get(isAuthenticated(session.authState))).toBe(true);
      expect(get(canSync(session.authState))).toBe(true);
    });

    it('fails with invalid_credentials on a wrong password', async () => {
      const error = await session.login('alice', 'wrong').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error instanceof AuthError && error.kind).toBe('invalid_credentials');
      expect(error instanceof AuthError && error.message).toBe(
        'Login: Incorrect username or password'
      );
      expect(session.currentSession()).toBeNull();
      expect(get(session.authState).isLoading).toBe(false);
    });

    it('keeps the previous session when a later login fails', async () => {
      const first = await session.login('alice', 'test-password');

      await expect(session.login('alice', 'wrong')).rejects.toBeInstanceOf(AuthError);

      expect(session.currentSession()).toBe(first);
      expect(get(session.authState).mode).toBe('logged_in');
    });

    it('fails with network_unavailable when the server is unreachable', async () => {
      vi.spyOn(remote, 'login').mockRejectedValueOnce(
        new RemoteRequestError('timeout', 'POST /auth/login timed out after 15s')
      );

      const error = await session.login('alice', 'test-password').catch((e: unknown) => e);

      expect(error instanceof AuthError && error.kind).toBe('network_unavailable');
    });

    it('fails with server_error on a 5xx', async () => {
      vi.spyOn(remote, 'login').mockRejectedValueOnce(
        new RemoteRequestError('http', 'POST /auth/login failed with status 500', { status: 500 })
      );

      const error = await session.login('alice', 'test-password').catch((e: unknown) => e);

      expect(error instanceof AuthError && error.kind).toBe('server_error');
      expect(error instanceof AuthError && error.message).toBe('Login: server error (500)');
    });

    it('treats a free account as not entitled to sync', async () => {
      remote.addUser(premiumUser({ id: 8, username: 'bob', userType: 'free' }));

      const established = await session.login('bob', 'test-password');

      expect(established.entitlement).toBe('free');
      expect(get(canSync(session.authState))).toBe(false);
    });
  });

  describe('register', () => {
    it('creates the account and logs in', async () => {
      const established = await session.register('carol', 'carol@example.com', 'test-password');

      expect(established.username).toBe('carol');
      expect(established.entitlement).toBe('free');
      expect(remote.profileCalls).toBe(1);
    });

    it('reports a taken username as invalid_credentials', async () => {
      const error = await session
        .register('alice', 'alice@example.com', 'test-password')
        .catch((e: unknown) => e);

      expect(error instanceof AuthError && error.kind).toBe('invalid_credentials');
    });
  });

  // --------------------------------------------------------------------------
  // Entitlement
  // --------------------------------------------------------------------------
  describe('entitlementFromProfile', () => {
    const profile = {
      id: 1,
      username: 'alice',
      email: 'alice@example.com',
      user_type: 'premium'
    };

    it('is premium for a premium account without an end date', () => {
      expect(entitlementFromProfile(profile, NOW)).toBe('premium');
    });

    it('is premium while the subscription runs', () => {
      expect(
        entitlementFromProfile({ ...profile, subscription_end: '2024-06-01T00:00:00Z' }, NOW)
      ).toBe('premium');
    });

    it('is free once the subscription has ended', () => {
      expect(
        entitlementFromProfile({ ...profile, subscription_end: '2024-04-01T00:00:00Z' }, NOW)
      ).toBe('free');
    });

    it('is free for any other account type', () => {
      expect(entitlementFromProfile({ ...profile, user_type: 'free' }, NOW)).toBe('free');
    });
  });

  describe('refreshEntitlement', () => {
    it('picks up an upgrade', async () => {
      const user = premiumUser({ id: 8, username: 'bob', userType: 'free' });
      remote.addUser(user);
      await session.login('bob', 'test-password');
      user.userType = 'premium';

      const refreshed = await session.refreshEntitlement();

      expect(refreshed.entitlement).toBe('premium');
      expect(session.currentSession()?.entitlement).toBe('premium');
      expect(get(session.authState).session?.entitlement).toBe('premium');
    });

    it('invalidates the session when the credential is rejected', async () => {
      await session.login('alice', 'test-password');
      remote.revokeAll();

      const error = await session.refreshEntitlement().catch((e: unknown) => e);

      expect(error instanceof NotAuthorizedError && error.reason).toBe('credential');
      expect(session.currentSession()).toBeNull();
      expect(get(session.authState).authKickedMessage).toBe(
        'Session expired. Please sign in again.'
      );
    });

    it('restores the tier after the server refused it', async () => {
      await session.login('alice', 'test-password');

      session.revokeEntitlement('Server refused sync (403)');
      expect(session.currentSession()?.entitlement).toBe('free');
      expect(get(canSync(session.authState))).toBe(false);
      expect(get(session.authState).mode).toBe('logged_in');

      const refreshed = await session.refreshEntitlement();

      expect(refreshed.entitlement).toBe('premium');
      expect(get(canSync(session.authState))).toBe(true);
    });

    it('requires a session', async () => {
      const error = await session.refreshEntitlement().catch((e: unknown) => e);

      expect(error instanceof NotAuthorizedError && error.reason).toBe('no_session');
    });
  });

  // --------------------------------------------------------------------------
  // Logout
  // --------------------------------------------------------------------------
  describe('invalidate and logout', () => {
    it('invalidate records why the user was logged out', async () => {
      await session.login('alice', 'test-password');

      session.invalidate('Session expired. Please sign in again.');

      expect(session.currentSession()).toBeNull();
      const state = get(session.authState);
      expect(state.mode).toBe('logged_out');
      expect(state.authKickedMessage).toBe('Session expired. Please sign in again.');
    });

    it('invalidate without a session is a no-op', () => {
      session.invalidate('ignored');

      expect(get(session.authState).authKickedMessage).toBeNull();
    });

    it('logout clears the session without a message', async () => {
      await session.login('alice', 'test-password');

      session.logout();

      expect(session.currentSession()).toBeNull();
      expect(get(session.authState).authKickedMessage).toBeNull();
      expect(get(isAuthenticated(session.authState))).toBe(false);
    });
  });
});
