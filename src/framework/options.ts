import type { RunnerOptions, ResolvedRunnerOptions } from '../types.js';
import { defaultCallSiteResolver } from '../executor/call-site.js';
import { consoleWriter } from '../reporter/writer.js';
import { isDebugEnabled, isTimingEnabled, setDebug } from '../utils/debug.mjs';

/**
 * Fill in RunnerOptions defaults
 *
 * Debug flags stay unset unless given, so a run without them leaves the
 * switches from setDebug() alone.
 *
 * @param options - Options given to an IndividualTest or TestCase
 * @example
 * const { writer, resolver } = resolveRunnerOptions({ debug: true });
 */
export function resolveRunnerOptions(options: RunnerOptions = {}): ResolvedRunnerOptions {
  return {
    writer: options.writer ?? consoleWriter,
    resolver: options.resolver ?? defaultCallSiteResolver,
    debug: options.debug,
    debugTiming: options.debugTiming,
  };
}

/**
 * Apply the debug switches of a top-level run; an unset flag keeps its current value
 */
export function applyDebugOptions(options: ResolvedRunnerOptions): void {
  if (options.debug === undefined && options.debugTiming === undefined) {
    return;
  }
  setDebug(options.debug ?? isDebugEnabled(), options.debugTiming ?? isTimingEnabled());
}
