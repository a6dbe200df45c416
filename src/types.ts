/**
 * Types shared by the stack, reporter and framework layers
 */

import type { CallSiteResolver } from './executor/call-site.js';
import type { IndividualTest } from './framework/individual-test.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Width of every report rule and padded header line
 */
export const LINE_WIDTH = 80;

// ============================================================================
// Stack Inspection
// ============================================================================

/**
 * One captured stack frame, reduced to what call-site resolution needs
 */
export interface StackFrame {
  /** File path, file URL or synthetic name (e.g. `<anonymous>`) */
  source: string;
  /** 1-based line number, 0 when the host does not know it */
  line: number;
}

/**
 * Host capability for reading the active call stack
 */
export interface StackInspector {
  /**
   * Capture the current stack. Index 0 is the frame that called `capture()`,
   * index 1 its caller, and so on up to the outermost captured frame.
   */
  capture(): StackFrame[];
}

/**
 * Location of the nearest frame outside the framework's own modules
 */
export interface CallSite {
  /** Final path component of the frame's source, e.g. `math.test.ts` */
  source: string;
  line: number;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Ordered, append-only line sink for reports
 */
export interface LineWriter {
  writeLine(line: string): void;
}

// ============================================================================
// Test Definitions & Results
// ============================================================================

/**
 * A single check or group of checks; receives the running test as context
 */
export type TestProcedure = (test: IndividualTest) => void;

/**
 * Procedure input accepted by the IndividualTest constructor
 */
export type ProcedureInput = TestProcedure | readonly TestProcedure[];

/**
 * Procedure shape, resolved once at construction
 */
export type Procedures =
  | { kind: 'single'; procedure: TestProcedure }
  | { kind: 'many'; procedures: readonly TestProcedure[] };

/**
 * Outcome of one IndividualTest.execute() call
 */
export interface ExecutionResult {
  passed: boolean;
  /** Normalized failure text; newline-joined when several procedures failed */
  message?: string;
  /** Absent when no frame outside the framework was found */
  callSite?: CallSite;
}

/**
 * Tally returned by TestCase.execute()
 */
export interface TestCaseSummary {
  total: number;
  passed: number;
  failed: number;
}

// ============================================================================
// Configuration & Options
// ============================================================================

/**
 * Options accepted by IndividualTest and TestCase
 */
export interface RunnerOptions {
  /** Report sink, defaults to the console */
  writer?: LineWriter;
  /** Call-site resolver, defaults to the shared resolver over the V8 stack */
  resolver?: CallSiteResolver;
  /** Enable verbose debug logging */
  debug?: boolean;
  /** Enable execution timing logs */
  debugTiming?: boolean;
}

/**
 * RunnerOptions with writer and resolver filled in.
 * Debug flags stay undefined when not given.
 */
export interface ResolvedRunnerOptions {
  writer: LineWriter;
  resolver: CallSiteResolver;
  debug?: boolean;
  debugTiming?: boolean;
}

/**
 * Options for building a CallSiteResolver
 */
export interface CallSiteResolverOptions {
  /**
   * Final path components treated as framework internals.
   * Defaults to the assertion, individual-test and test-case modules.
   */
  internalModules?: Iterable<string>;
  /** Stack source, defaults to the V8 structured stack trace */
  inspector?: StackInspector;
  /**
   * First frame index examined; frames below it are the resolver and its
   * immediate framework caller
   *
   * @default 2
   */
  firstLevel?: number;
  /**
   * Number of frames examined from `firstLevel` on
   *
   * @default 10
   */
  maxDepth?: number;
}

/**
 * Start and end of one timed span of a run, in `performance.now()` milliseconds
 */
export interface PhaseTimings {
  phaseStart: number;
  /** 0 until endPhase() closes the span */
  phaseEnd: number;
}
