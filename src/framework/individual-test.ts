/**
 * IndividualTest
 *
 * Smallest unit of testing: one procedure, or several run and reported
 * together, under one descriptive name (module_test, functionName_test, ...).
 *
 * Execution flow:
 * 1. execute() runs the procedure(s), capturing every throw as a failure
 * 2. The call site of the execute() caller is resolved once, after the run
 * 3. report() renders the result as a dash-ruled block
 */

import type {
  ExecutionResult,
  LineWriter,
  ProcedureInput,
  Procedures,
  ResolvedRunnerOptions,
  RunnerOptions,
  TestProcedure,
} from '../types.js';
import { ConfigurationError, describeThrown, normalizeErrorMessage } from '../executor/errors.js';
import { DASH_RULE, formatTestHeader } from '../reporter/format.js';
import { debug, debugTiming } from '../utils/debug.mjs';
import { createPhaseTimings, endPhase } from '../utils/timing.mjs';
import { applyDebugOptions, resolveRunnerOptions } from './options.js';
import type { TestCase } from './test-case.js';

/**
 * Resolve constructor input into its procedure shape
 *
 * Anything other than a function or a non-empty array of functions has no
 * shape; execute() turns that into a ConfigurationError.
 */
export function resolveProcedures(input: unknown): Procedures | undefined {
  if (typeof input === 'function') {
    const procedure: TestProcedure = (test) => {
      input(test);
    };
    return { kind: 'single', procedure };
  }

  if (Array.isArray(input) && input.length > 0) {
    const procedures: TestProcedure[] = [];
    for (const entry of input) {
      if (typeof entry !== 'function') {
        return undefined;
      }
      procedures.push((test) => {
        entry(test);
      });
    }
    return { kind: 'many', procedures };
  }

  return undefined;
}

/**
 * Run one procedure, returning its normalized failure text or undefined on success
 */
function runProcedure(procedure: TestProcedure, test: IndividualTest): string | undefined {
  try {
    procedure(test);
    return undefined;
  } catch (thrown) {
    return normalizeErrorMessage(describeThrown(thrown));
  }
}

/**
 * Owning TestCase of each linked test
 */
const owners = new WeakMap<IndividualTest, TestCase>();

/**
 * Link a test to its TestCase. Only the TestCase constructor calls this.
 *
 * @internal
 * @throws ConfigurationError when the test already belongs to another case
 */
export function attachToTestCase(test: IndividualTest, testCase: TestCase): void {
  const owner = owners.get(test);
  if (owner && owner !== testCase) {
    throw new ConfigurationError(
      test.name,
      `"${test.name}" already belongs to test case "${owner.name}".`
    );
  }
  owners.set(test, testCase);
}

export class IndividualTest {
  readonly name: string;
  readonly procedures: Procedures | undefined;
  private readonly options: ResolvedRunnerOptions;

  /**
   * @param name - Name shown in the report header
   * @param procedures - A procedure or a non-empty list of procedures
   * @param options - Report sink, resolver and debug switches
   */
  constructor(name: string, procedures: ProcedureInput, options: RunnerOptions = {}) {
    this.name = name;
    this.procedures = resolveProcedures(procedures);
    this.options = resolveRunnerOptions(options);
  }

  /**
   * Owning TestCase, if any; lookup only
   */
  get testCase(): TestCase | undefined {
    return owners.get(this);
  }

  /**
   * Run the test
   *
   * A single procedure yields its own normalized failure message. A list of
   * procedures always runs to the end and yields every failure message,
   * newline-joined in procedure order.
   *
   * @returns Pass/fail, failure text when failed, and the caller's location
   * @throws ConfigurationError when the test has no usable procedures
   */
  execute(): ExecutionResult {
    const procedures = this.procedures;
    if (!procedures) {
      throw new ConfigurationError(this.name, `"${this.name}" does not contain any tests.`);
    }

    if (!this.testCase) {
      applyDebugOptions(this.options);
    }

    const timings = createPhaseTimings();
    let result: ExecutionResult;

    if (procedures.kind === 'single') {
      const message = runProcedure(procedures.procedure, this);
      const callSite = this.options.resolver.resolve();
      result = message === undefined
        ? { passed: true, callSite }
        : { passed: false, message, callSite };
    } else {
      const messages: string[] = [];
      for (const procedure of procedures.procedures) {
        const message = runProcedure(procedure, this);
        if (message !== undefined) {
          messages.push(message);
        }
      }
      const callSite = this.options.resolver.resolve();
      result = messages.length === 0
        ? { passed: true, callSite }
        : { passed: false, message: messages.join('\n'), callSite };
    }

    debugTiming(`[TIMING] ${this.name}: ${endPhase(timings)}ms`);
    debug('[IndividualTest]', this.name, result.passed ? 'passed' : 'failed');
    return result;
  }

  /**
   * Write the report block for a result of execute()
   *
   * @param result - Result to render
   * @param writer - Sink to write to; TestCase passes its own
   */
  report(result: ExecutionResult, writer: LineWriter = this.options.writer): void {
    const testCase = this.testCase;

    writer.writeLine(DASH_RULE);
    writer.writeLine(formatTestHeader(result.passed, this.name, result.callSite, testCase?.name));
    if (!result.passed) {
      writer.writeLine(result.message ?? '');
    }
    if (!testCase) {
      writer.writeLine(DASH_RULE);
    }
  }
}
