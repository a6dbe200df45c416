/**
 * Report Layout Helpers
 *
 * Fixed-width text building blocks shared by IndividualTest, TestCase and the
 * assertion messages. All widths are measured in UTF-16 code units.
 */

import type { CallSite } from '../types.js';
import { LINE_WIDTH } from '../types.js';
import { formatCallSite } from '../executor/call-site.js';

export const DASH_RULE = '-'.repeat(LINE_WIDTH);
export const DOUBLE_RULE = '='.repeat(LINE_WIDTH);

/**
 * Join `body` and `suffix`, padding the body with spaces so the line is
 * exactly `width` wide. Lines already `width` or longer are left unpadded.
 */
export function padBetween(body: string, suffix: string, width: number = LINE_WIDTH): string {
  const length = body.length + suffix.length;
  if (length < width) {
    return body + ' '.repeat(width - length) + suffix;
  }
  return body + suffix;
}

/**
 * Header line of an IndividualTest report block
 *
 * Standalone tests show their call site inline; tests inside a TestCase show
 * the case name at the right edge instead.
 *
 * @example
 * formatTestHeader(false, 'BadAdd', undefined, 'Math')
 * // 'FAILED | BadAdd' + spaces + ' | Math' (80 wide)
 */
export function formatTestHeader(
  passed: boolean,
  testName: string,
  callSite: CallSite | undefined,
  testCaseName: string | undefined
): string {
  const front = passed ? 'PASSED | ' : 'FAILED | ';
  let body = front + testName;
  let back = '';

  if (callSite && testCaseName === undefined) {
    body += `, ${formatCallSite(callSite)}`;
  }
  if (testCaseName !== undefined) {
    back = ` | ${testCaseName}`;
  }

  return padBetween(body, back);
}

/**
 * Append the ` :<line>` suffix to an assertion message, right-aligned to the
 * line width when it fits
 *
 * @example
 * withLineSuffix('ASSERT_TRUE: false is not true.', 12)
 * // 'ASSERT_TRUE: false is not true.' + 45 spaces + ' :12'
 */
export function withLineSuffix(message: string, line: number | undefined): string {
  if (line === undefined) {
    return message;
  }
  return padBetween(message, ` :${line}`);
}

/**
 * `<n> tests run. <p> passed, <f> failed.`, singular for exactly one test
 */
export function formatSummary(passed: number, failed: number): string {
  const total = passed + failed;
  const run = total === 1 ? `${total} test run. ` : `${total} tests run. `;
  return `${run}${passed} passed, ${failed} failed.`;
}
