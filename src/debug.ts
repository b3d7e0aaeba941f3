/**
 * Debug logging utilities for conditional output
 *
 * Codecs take a `debug` flag in their options and trace through these helpers;
 * warnings that always matter go straight to console.warn instead.
 */

const PREFIX = '[meshwire]';

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(debug: boolean | undefined, ...args: unknown[]): void {
  if (debug) {
    console.log(PREFIX, ...args);
  }
}

/**
 * Log a debug warning if debug mode is enabled
 */
export function debugWarn(debug: boolean | undefined, ...args: unknown[]): void {
  if (debug) {
    console.warn(PREFIX, ...args);
  }
}
