/**
 * unit-check
 *
 * Minimal synchronous unit testing: named test cases of named individual
 * tests, fixed-width pass/fail reports, and assertion failures located at the
 * calling line of user code.
 *
 * Package entry point
 */

export {
  UnitTest,
  Assert,
  createAssert,
  formatValue,
  ALMOST_EQUAL_TOLERANCE,
  IndividualTest,
  resolveProcedures,
  TestCase,
  resolveRunnerOptions,
} from './framework/index.js';
export type { Assertions } from './framework/index.js';
export {
  CallSiteResolver,
  defaultCallSiteResolver,
  DEFAULT_INTERNAL_MODULES,
  formatCallSite,
  stripSourcePath,
} from './executor/call-site.js';
export { v8StackInspector } from './executor/stack-inspector.js';
export {
  AssertionFailure,
  ConfigurationError,
  describeThrown,
  normalizeErrorMessage,
} from './executor/errors.js';
export { consoleWriter, createBufferWriter } from './reporter/writer.js';
export type { BufferWriter } from './reporter/writer.js';
export { setDebug } from './utils/debug.mjs';
export { LINE_WIDTH } from './types.js';
export type {
  CallSite,
  CallSiteResolverOptions,
  ExecutionResult,
  LineWriter,
  ProcedureInput,
  Procedures,
  RunnerOptions,
  StackFrame,
  StackInspector,
  TestCaseSummary,
  TestProcedure,
} from './types.js';
