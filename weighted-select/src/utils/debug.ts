/**
 * Debug logging utility
 *
 * Centralized debug logging that can be easily enabled/disabled.
 * Set WSELECT_DEBUG=1 (or true) in the environment to enable debug logs.
 */

/**
 * Whether debug output is on for this process
 */
export function isDebugEnabled(): boolean {
  const flag = process.env['WSELECT_DEBUG'];
  return flag === '1' || flag === 'true';
}

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(`[DEBUG] ${message}`, ...args);
  }
}
