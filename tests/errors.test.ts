// ============================================================================
// Error Taxonomy Tests
// ============================================================================

import { describe, expect, it } from 'vitest';
import {
  NotAuthorizedError,
  NotFoundError,
  TransientSyncError,
  VitalsSyncError,
  extractErrorMessage,
  parseErrorMessage
} from '../src/errors';

describe('errors', () => {
  it('carries a stable code and class name', () => {
    const error = new NotFoundError([3, 4]);

    expect(error).toBeInstanceOf(VitalsSyncError);
    expect(error.code).toBe('NOT_FOUND');
    expect(error.name).toBe('NotFoundError');
    expect(error.ids).toEqual([3, 4]);
    expect(error.message).toBe('Unknown or already synced record ids: 3, 4');
  });

  it('maps each failure to a short status message', () => {
    expect(parseErrorMessage(new TransientSyncError('socket hang up'))).toBe(
      'Server unreachable. Readings are saved locally and will sync later.'
    );
    expect(parseErrorMessage(new NotAuthorizedError('credential', 'rejected'))).toBe(
      'Session expired. Please sign in again.'
    );
    expect(parseErrorMessage(new Error('x'.repeat(120)))).toBe(`${'x'.repeat(100)}...`);
    expect(parseErrorMessage('nope')).toBe('An unexpected error occurred');
  });

  it('extracts a message from any thrown value', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage({ status: 500 })).toBe('{"status":500}');
    expect(extractErrorMessage(42)).toBe('42');
  });
});
