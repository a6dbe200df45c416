/**
 * Assert
 *
 * Assertions for use inside IndividualTest procedures. Each returns normally
 * when its condition holds and throws an AssertionFailure otherwise:
 *
 *   ASSERT_EQUAL: 4 is not equal to 5.                                     :12
 *
 * The ` :<line>` suffix names the line of the calling procedure and is
 * right-aligned to the report width when the message is short enough.
 */

import { inspect } from 'node:util';
import { CallSiteResolver, defaultCallSiteResolver } from '../executor/call-site.js';
import { AssertionFailure } from '../executor/errors.js';
import { withLineSuffix } from '../reporter/format.js';

/** 2^-22 */
export const ALMOST_EQUAL_TOLERANCE = 2.384185791015625e-7;

type Comparable = number | bigint | string;

export interface Assertions {
  equal(actual: unknown, expected: unknown): void;
  notEqual(actual: unknown, expected: unknown): void;
  isTrue(value: unknown): void;
  isFalse(value: unknown): void;
  truthy(value: unknown): void;
  falsy(value: unknown): void;
  nullish(value: unknown): void;
  raises(fn: () => unknown): void;
  notRaises(fn: () => unknown): void;
  almostEqual(actual: number, expected: number): void;
  notAlmostEqual(actual: number, expected: number): void;
  greater<T extends Comparable>(actual: T, expected: T): void;
  greaterEqual<T extends Comparable>(actual: T, expected: T): void;
  less<T extends Comparable>(actual: T, expected: T): void;
  lessEqual<T extends Comparable>(actual: T, expected: T): void;
}

/**
 * Render a value for an assertion message; strings are shown as-is
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return inspect(value, { depth: 2, breakLength: Infinity });
}

function succeeds(fn: () => unknown): boolean {
  try {
    fn();
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the assertion set around a call-site resolver
 *
 * @param resolver - Resolver used to locate the failing line; its internal
 *                   modules must include this module
 * @returns Assertions that report locations through `resolver`
 */
export function createAssert(resolver: CallSiteResolver = defaultCallSiteResolver): Assertions {
  // Called directly by each assertion so the resolver sees: check <- assertion <- procedure
  const check = (condition: boolean, tag: string, description: string): void => {
    if (condition) {
      return;
    }
    const callSite = resolver.resolve();
    throw new AssertionFailure(tag, withLineSuffix(`${tag}: ${description}.`, callSite?.line));
  };

  return {
    equal(actual, expected) {
      check(actual === expected, 'ASSERT_EQUAL',
        `${formatValue(actual)} is not equal to ${formatValue(expected)}`);
    },

    notEqual(actual, expected) {
      check(actual !== expected, 'ASSERT_NOT_EQUAL',
        `${formatValue(actual)} is equal to ${formatValue(expected)}`);
    },

    isTrue(value) {
      check(value === true, 'ASSERT_TRUE', `${formatValue(value)} is not true`);
    },

    isFalse(value) {
      check(value === false, 'ASSERT_FALSE', `${formatValue(value)} is not false`);
    },

    truthy(value) {
      check(Boolean(value), 'ASSERT_TRUTHY', `${formatValue(value)} is not truthy`);
    },

    falsy(value) {
      check(!value, 'ASSERT_FALSY', `${formatValue(value)} is not falsy`);
    },

    nullish(value) {
      check(value === null || value === undefined, 'ASSERT_NULLISH',
        `${formatValue(value)} is not null or undefined`);
    },

    raises(fn) {
      check(!succeeds(fn), 'ASSERT_RAISES', `${formatValue(fn)} did not raise error`);
    },

    notRaises(fn) {
      check(succeeds(fn), 'ASSERT_NOT_RAISES', `${formatValue(fn)} raised an error`);
    },

    almostEqual(actual, expected) {
      check(Math.abs(actual - expected) < ALMOST_EQUAL_TOLERANCE, 'ASSERT_ALMOST_EQUAL',
        `${formatValue(actual)} is not almost equal to ${formatValue(expected)}`);
    },

    notAlmostEqual(actual, expected) {
      check(Math.abs(actual - expected) > ALMOST_EQUAL_TOLERANCE, 'ASSERT_NOT_ALMOST_EQUAL',
        `${formatValue(actual)} is almost equal to ${formatValue(expected)}`);
    },

    greater(actual, expected) {
      check(actual > expected, 'ASSERT_GREATER',
        `${formatValue(actual)} is not greater than ${formatValue(expected)}`);
    },

    greaterEqual(actual, expected) {
      check(actual >= expected, 'ASSERT_GREATER_EQUAL',
        `${formatValue(actual)} is not greater or equal to ${formatValue(expected)}`);
    },

    less(actual, expected) {
      check(actual < expected, 'ASSERT_LESS',
        `${formatValue(actual)} is not less than ${formatValue(expected)}`);
    },

    lessEqual(actual, expected) {
      check(actual <= expected, 'ASSERT_LESS_EQUAL',
        `${formatValue(actual)} is not less or equal to ${formatValue(expected)}`);
    },
  };
}

/**
 * Assertions over the shared V8 resolver
 */
export const Assert: Assertions = createAssert();
