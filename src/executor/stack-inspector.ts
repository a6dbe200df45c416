/**
 * V8 Stack Inspection
 *
 * Captures the active call stack with Error.captureStackTrace and reads the
 * frames back from the formatted `stack` text. The text is produced by the
 * host's own Error.prepareStackTrace, so loaders that install source-map
 * support (Vitest, tsx, --enable-source-maps) have already mapped every
 * position back to the original source.
 */

import { parse } from 'stacktrace-parser';
import type { StackFrame as ParsedFrame } from 'stacktrace-parser';
import type { StackFrame, StackInspector } from '../types.js';

/**
 * Upper bound on captured frames; must exceed the resolver's firstLevel + maxDepth
 */
const MAX_CAPTURED_FRAMES = 32;

const ANONYMOUS_SOURCE = '<anonymous>';

function toStackFrame(frame: ParsedFrame): StackFrame {
  return {
    source: frame.file ?? ANONYMOUS_SOURCE,
    line: frame.lineNumber ?? 0,
  };
}

/**
 * Capture the stack above this function.
 * Frame 0 of the result is whoever called capture().
 */
function captureV8Frames(): StackFrame[] {
  const originalLimit = Error.stackTraceLimit;
  const holder: { stack?: string } = {};

  try {
    Error.stackTraceLimit = MAX_CAPTURED_FRAMES;
    Error.captureStackTrace(holder, captureV8Frames);
  } finally {
    Error.stackTraceLimit = originalLimit;
  }

  return holder.stack === undefined ? [] : parse(holder.stack).map(toStackFrame);
}

/**
 * Stack inspector backed by the running V8 isolate
 */
export const v8StackInspector: StackInspector = {
  capture: captureV8Frames,
};
