/**
 * Call-Site Resolution
 *
 * Finds "where in user code" something happened. Assertions, IndividualTest
 * and TestCase sit between the user's line and the point where a location is
 * wanted, and the number of those layers varies, so the resolver walks the
 * stack and skips every frame that belongs to one of the framework modules.
 */

import type { CallSite, CallSiteResolverOptions, StackFrame, StackInspector } from '../types.js';
import { debug } from '../utils/debug.mjs';
import { v8StackInspector } from './stack-inspector.js';

const FRAMEWORK_MODULES = ['assert', 'individual-test', 'test-case'];
const MODULE_EXTENSIONS = ['.ts', '.js'];

/**
 * Final path components of the framework modules, as sources and as compiled output
 */
export const DEFAULT_INTERNAL_MODULES: readonly string[] = FRAMEWORK_MODULES.flatMap(module =>
  MODULE_EXTENSIONS.map(extension => module + extension)
);

/** Frame 0 is resolve() itself, frame 1 its immediate framework caller */
export const DEFAULT_FIRST_LEVEL = 2;

export const DEFAULT_MAX_DEPTH = 10;

/**
 * Strip directories (or a file URL prefix) from a frame source
 *
 * @example
 * stripSourcePath('/repo/tests/math.test.ts') // 'math.test.ts'
 * stripSourcePath('file:///repo/dist/assert.js') // 'assert.js'
 */
export function stripSourcePath(source: string): string {
  const lastSeparator = Math.max(source.lastIndexOf('/'), source.lastIndexOf('\\'));
  return lastSeparator === -1 ? source : source.slice(lastSeparator + 1);
}

export class CallSiteResolver {
  readonly internalModules: ReadonlySet<string>;
  private readonly inspector: StackInspector;
  private readonly firstLevel: number;
  private readonly maxDepth: number;

  constructor(options: CallSiteResolverOptions = {}) {
    this.internalModules = new Set(options.internalModules ?? DEFAULT_INTERNAL_MODULES);
    this.inspector = options.inspector ?? v8StackInspector;
    this.firstLevel = options.firstLevel ?? DEFAULT_FIRST_LEVEL;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Resolve the nearest frame outside the framework
   *
   * Must be called directly by the framework function whose caller is wanted,
   * since the first `firstLevel` frames are skipped unexamined.
   *
   * @returns The frame's file name and line, or undefined when every examined
   *          frame is internal or the stack ends first
   */
  resolve(): CallSite | undefined {
    const frames = this.inspector.capture();
    const lastLevel = this.firstLevel + this.maxDepth;

    for (let level = this.firstLevel; level < lastLevel; level++) {
      const frame: StackFrame | undefined = frames[level];
      if (!frame) {
        break;
      }

      const source = stripSourcePath(frame.source);
      if (!this.internalModules.has(source)) {
        return { source, line: frame.line };
      }
    }

    debug('[CallSite] No frame outside', [...this.internalModules].join(', '), 'within', this.maxDepth, 'levels');
    return undefined;
  }

  /**
   * Whether a frame source belongs to the framework
   */
  isInternal(source: string): boolean {
    return this.internalModules.has(stripSourcePath(source));
  }
}

/**
 * Shared resolver over the V8 stack with the default framework modules
 */
export const defaultCallSiteResolver = new CallSiteResolver();

/**
 * Format a call site as `source:line`
 */
export function formatCallSite(callSite: CallSite): string {
  return `${callSite.source}:${callSite.line}`;
}
