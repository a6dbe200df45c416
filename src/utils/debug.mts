/**
 * Debug logging
 *
 * Process-wide switches for verbose and timing output. Everything goes to the
 * console, prefixed by the caller with its component tag (e.g. `[TestCase]`).
 */

let debugEnabled = false;
let timingEnabled = false;

export function setDebug(enabled: boolean, timing = false): void {
  debugEnabled = enabled;
  timingEnabled = timing;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function isTimingEnabled(): boolean {
  return timingEnabled;
}

export function debug(...args: unknown[]): void {
  if (debugEnabled) {
    console.log(...args);
  }
}

export function debugTiming(...args: unknown[]): void {
  if (timingEnabled) {
    console.log(...args);
  }
}
