/**
 * TestCase
 *
 * Ordered collection of IndividualTests reported under one banner and summary.
 */

import type { ResolvedRunnerOptions, RunnerOptions, TestCaseSummary } from '../types.js';
import { formatCallSite } from '../executor/call-site.js';
import { ConfigurationError } from '../executor/errors.js';
import { DASH_RULE, DOUBLE_RULE, formatSummary } from '../reporter/format.js';
import { debug, debugTiming } from '../utils/debug.mjs';
import { createPhaseTimings, endPhase } from '../utils/timing.mjs';
import { attachToTestCase } from './individual-test.js';
import type { IndividualTest } from './individual-test.js';
import { applyDebugOptions, resolveRunnerOptions } from './options.js';

export class TestCase {
  readonly name: string;
  readonly tests: readonly IndividualTest[];
  private readonly options: ResolvedRunnerOptions;

  /**
   * @param name - Name shown in the banner and beside each test header
   * @param tests - Tests in execution and report order; each is linked to this case
   * @param options - Report sink, resolver and debug switches
   * @throws ConfigurationError when a test already belongs to another case
   */
  constructor(name: string, tests: readonly IndividualTest[], options: RunnerOptions = {}) {
    this.name = name;
    this.tests = [...tests];
    this.options = resolveRunnerOptions(options);

    // Reject before linking anything so a failed construction leaves no test attached
    const claimed = this.tests.find(test => test.testCase !== undefined);
    if (claimed?.testCase) {
      throw new ConfigurationError(
        claimed.name,
        `"${claimed.name}" already belongs to test case "${claimed.testCase.name}".`
      );
    }

    for (const test of this.tests) {
      attachToTestCase(test, this);
    }
  }

  /**
   * Execute every test in order and write the full report
   *
   * Layout: banner, one block per test, dash rule, summary, closing rule.
   * A ConfigurationError from any test aborts the run before the summary.
   *
   * @returns Counts of tests run, passed and failed
   */
  execute(): TestCaseSummary {
    applyDebugOptions(this.options);
    const { writer } = this.options;
    const timings = createPhaseTimings();

    let passed = 0;
    let failed = 0;

    const callSite = this.options.resolver.resolve();
    const header = callSite ? `${this.name}, ${formatCallSite(callSite)}` : this.name;

    writer.writeLine(DOUBLE_RULE);
    writer.writeLine(header);
    writer.writeLine(DOUBLE_RULE);

    for (const test of this.tests) {
      const result = test.execute();
      test.report(result, writer);
      if (result.passed) {
        passed++;
      } else {
        failed++;
      }
    }

    writer.writeLine(DASH_RULE);
    const total = passed + failed;
    if (total !== this.tests.length) {
      writer.writeLine(`WARNING: Not all tests (${this.tests.length} total) run.`);
    }
    writer.writeLine('');
    writer.writeLine(formatSummary(passed, failed));
    writer.writeLine(DOUBLE_RULE);

    debugTiming(`[TIMING] ${this.name}: ${endPhase(timings)}ms`);
    debug('[TestCase]', this.name, '-', passed, 'passed,', failed, 'failed');

    return { total, passed, failed };
  }
}
