/**
 * UnitTest
 *
 * Simple unit testing framework: bundles the test types with the assertions.
 *
 * @example
 * const { IndividualTest, TestCase, Assert } = UnitTest;
 *
 * new TestCase('Math', [
 *   new IndividualTest('Addition', () => Assert.equal(2 + 2, 4)),
 * ]).execute();
 */

import { Assert } from './assert.js';
import { IndividualTest } from './individual-test.js';
import { TestCase } from './test-case.js';

export const UnitTest = {
  IndividualTest,
  TestCase,
  Assert,
} as const;

export { Assert, createAssert, formatValue, ALMOST_EQUAL_TOLERANCE } from './assert.js';
export type { Assertions } from './assert.js';
export { IndividualTest, resolveProcedures } from './individual-test.js';
export { TestCase } from './test-case.js';
export { resolveRunnerOptions } from './options.js';
