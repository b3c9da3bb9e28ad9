/**
 * Pass logging.
 *
 * Activated by setting SCOPECAST_DEBUG=1, or per call through the `debug`
 * option. When disabled nothing is printed.
 */

const DEBUG_ENABLED =
  typeof process !== "undefined" && process.env?.SCOPECAST_DEBUG === "1";

export function isDebugEnabled(): boolean {
  return DEBUG_ENABLED;
}

export function debugLog(enabled: boolean, tag: string, message: string): void {
  if (enabled) {
    console.log(`[${tag}] ${message}`);
  }
}
