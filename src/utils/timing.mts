/**
 * Wall-clock spans for `[TIMING]` debug lines
 */

import type { PhaseTimings } from '../types.js';

/**
 * Open a span at the current `performance.now()` reading
 */
export function createPhaseTimings(): PhaseTimings {
  return {
    phaseStart: performance.now(),
    phaseEnd: 0,
  };
}

/**
 * Close a phase and return its duration in milliseconds
 */
export function endPhase(timings: PhaseTimings): number {
  timings.phaseEnd = performance.now();
  return timings.phaseEnd - timings.phaseStart;
}
