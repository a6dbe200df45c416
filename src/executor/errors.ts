/**
 * Error Types and Message Normalization
 *
 * Two kinds of errors leave a test procedure:
 * - AssertionFailure and any other throw: recoverable, captured by IndividualTest
 * - ConfigurationError: a malformed test definition, never captured
 *
 * Failure text is cleaned of location prefixes before it reaches a report.
 */

/**
 * Marker carried by every assertion failure message
 */
export const ASSERT_MARKER = 'ASSERT_';

/**
 * Everything up to and including the first `<path>.<ext>:<line>: ` tag
 */
const LOCATION_TAG_PREFIX = /^[\s\S]*?\.(?:[cm]?[jt]s|[jt]sx):\d*:\s/;

/**
 * Everything up to and including the separator in front of the first source file name
 */
const SOURCE_DIRECTORY_PREFIX = /^[\s\S]*?[\\/](?=[\w\s-]*\.(?:[cm]?[jt]s|[jt]sx)(?!\w))/;

/**
 * Failed assertion raised by the Assert module
 */
export class AssertionFailure extends Error {
  override readonly name = 'AssertionFailure';

  constructor(
    /** Assertion tag, e.g. `ASSERT_EQUAL` */
    readonly tag: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * Malformed test definition; aborts the run instead of failing a test
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    readonly testName: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * Raw message text of any thrown value
 */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  if (typeof thrown === 'string') {
    return thrown;
  }
  return String(thrown);
}

/**
 * Strip location front matter from a failure message
 *
 * - Assertion messages behind a `file.ts:12: ` tag lose everything up to and
 *   including the tag (the assertion already carries its own line suffix).
 * - Otherwise a `dir/dir/file.ts` path loses its directories.
 * - Anything else is returned unchanged.
 *
 * @example
 * normalizeErrorMessage('src/math.test.ts:9: ASSERT_TRUE: false is not true.')
 * // 'ASSERT_TRUE: false is not true.'
 * normalizeErrorMessage('/repo/src/math.ts:4: boom')
 * // 'math.ts:4: boom'
 */
export function normalizeErrorMessage(rawMessage: string): string {
  if (LOCATION_TAG_PREFIX.test(rawMessage) && rawMessage.includes(ASSERT_MARKER)) {
    return rawMessage.replace(LOCATION_TAG_PREFIX, '');
  }

  if (SOURCE_DIRECTORY_PREFIX.test(rawMessage)) {
    return rawMessage.replace(SOURCE_DIRECTORY_PREFIX, '');
  }

  return rawMessage;
}
