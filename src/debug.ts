/**
 * @fileoverview Debug logging
 *
 * Every module logs through these helpers with a bracketed tag (`[SYNC]`,
 * `[STORE]`, `[AUTH]`, `[SENSOR]`, `[HTTP]`, `[DB]`). Output is off unless
 * `<PREFIX>_DEBUG_MODE=true` is set in the environment or
 * {@link setDebugMode} turns it on; the prefix follows the resolved config
 * (`VITALS` by default).
 *
 * @example
 *   VITALS_DEBUG_MODE=true node monitor.js
 */

type Level = 'log' | 'warn' | 'error';

let prefix = 'VITALS';

/** null until the environment has been read (or an override was set). */
let enabled: boolean | null = null;

/**
 * Switch the environment variable the gate reads. Called by
 * `resolveConfig`; a changed prefix forces a fresh read.
 *
 * @internal
 */
export function _setDebugPrefix(next: string) {
  const upper = next.toUpperCase();
  if (upper === prefix) return;
  prefix = upper;
  enabled = null;
}

export function isDebugMode(): boolean {
  if (enabled === null) {
    enabled = process.env[`${prefix}_DEBUG_MODE`] === 'true';
  }
  return enabled;
}

/** Force logging on or off, ignoring the environment from now on. */
export function setDebugMode(on: boolean) {
  enabled = on;
}

function emit(level: Level, args: unknown[]): void {
  if (isDebugMode()) console[level](...args);
}

export function debugLog(...args: unknown[]) {
  emit('log', args);
}

export function debugWarn(...args: unknown[]) {
  emit('warn', args);
}

export function debugError(...args: unknown[]) {
  emit('error', args);
}

/**
 * Level-parameterized form of the helpers above.
 *
 * @example
 * debug('warn', '[SYNC] Upload slow:', elapsedMs);
 */
export function debug(level: Level, ...args: unknown[]): void {
  emit(level, args);
}
