/**
 * @fileoverview Debug Logging Utilities
 *
 * Opt-in debug logging gated by an environment flag. When debug mode is
 * enabled (`<PREFIX>_DEBUG_MODE=true`), debug calls forward to the console.
 * When disabled, they are dropped.
 *
 * The prefix is set by {@link config.ts#initEngine} so several engines in one
 * process read separate flags.
 *
 * @example
 * // Enable from the shell:
 * //   TIMESHEET_DEBUG_MODE=true node server.js
 *
 * // Or programmatically:
 * import { setDebugMode } from 'tandem-reconcile';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check. `null` until first read. */
let debugEnabled: boolean | null = null;

let debugPrefix = 'reconcile';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment variable.
 *
 * Called by {@link config.ts#initEngine}. Clears the cached flag so the new
 * variable is read on the next log call.
 *
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  debugPrefix = prefix;
  debugEnabled = null;
}

/** Name of the environment variable read for the current prefix. */
export function debugFlagName(): string {
  return `${debugPrefix.toUpperCase()}_DEBUG_MODE`;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Whether debug logging is active. Reads the environment once and caches the
 * answer until {@link setDebugMode} or a prefix change.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled = process.env[debugFlagName()] === 'true';
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime. Overrides the environment flag for
 * the rest of the process.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}

/**
 * Single entry point with a severity argument.
 *
 * @example
 * debug('log', '[Reconcile] Starting merge...');
 * debug('error', '[Store] Save failed:', error);
 */
export function debug(level: 'log' | 'warn' | 'error', ...args: unknown[]): void {
  if (!isDebugMode()) return;
  switch (level) {
    case 'log':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}
