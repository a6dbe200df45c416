import { describe, expect, it } from 'vitest';
import { createAssert, formatValue } from '../src/framework/assert.js';
import { AssertionFailure } from '../src/executor/errors.js';
import { createFixedResolver } from './helpers/fake-stack.js';

// No call site: messages carry no line suffix
const assert = createAssert(createFixedResolver());

function failureOf(check: () => void): AssertionFailure {
  try {
    check();
  } catch (thrown) {
    if (thrown instanceof AssertionFailure) {
      return thrown;
    }
    throw thrown;
  }
  throw new Error('assertion did not fail');
}

describe('formatValue', () => {
  it('shows strings as-is and other values inspected', () => {
    expect(formatValue('text')).toBe('text');
    expect(formatValue(4)).toBe('4');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(2n)).toBe('2n');
    expect(formatValue({ a: 1 })).toBe('{ a: 1 }');
  });

  it('shows functions by name', () => {
    function boom(): void {
      throw new Error('boom');
    }
    expect(formatValue(boom)).toBe('[Function: boom]');
  });
});

describe('assertions that pass', () => {
  it('return without throwing', () => {
    expect(() => {
      assert.equal(4, 4);
      assert.notEqual('a', 'b');
      assert.isTrue(true);
      assert.isFalse(false);
      assert.truthy('yes');
      assert.falsy(0);
      assert.nullish(null);
      assert.nullish(undefined);
      assert.raises(() => {
        throw new Error('expected');
      });
      assert.notRaises(() => 1);
      assert.almostEqual(0.1 + 0.2, 0.3);
      assert.notAlmostEqual(1, 1.001);
      assert.greater(3, 2);
      assert.greaterEqual(2, 2);
      assert.less('a', 'b');
      assert.lessEqual(5n, 5n);
    }).not.toThrow();
  });
});

describe('assertions that fail', () => {
  it.each([
    ['equal', () => assert.equal(4, 5), 'ASSERT_EQUAL', 'ASSERT_EQUAL: 4 is not equal to 5.'],
    ['notEqual', () => assert.notEqual(3, 3), 'ASSERT_NOT_EQUAL', 'ASSERT_NOT_EQUAL: 3 is equal to 3.'],
    ['isTrue', () => assert.isTrue(1), 'ASSERT_TRUE', 'ASSERT_TRUE: 1 is not true.'],
    ['isFalse', () => assert.isFalse(0), 'ASSERT_FALSE', 'ASSERT_FALSE: 0 is not false.'],
    ['truthy', () => assert.truthy(''), 'ASSERT_TRUTHY', 'ASSERT_TRUTHY:  is not truthy.'],
    ['falsy', () => assert.falsy('x'), 'ASSERT_FALSY', 'ASSERT_FALSY: x is not falsy.'],
    ['nullish', () => assert.nullish(0), 'ASSERT_NULLISH', 'ASSERT_NULLISH: 0 is not null or undefined.'],
    ['almostEqual', () => assert.almostEqual(1, 1.5), 'ASSERT_ALMOST_EQUAL',
      'ASSERT_ALMOST_EQUAL: 1 is not almost equal to 1.5.'],
    ['notAlmostEqual', () => assert.notAlmostEqual(2, 2), 'ASSERT_NOT_ALMOST_EQUAL',
      'ASSERT_NOT_ALMOST_EQUAL: 2 is almost equal to 2.'],
    ['greater', () => assert.greater('a', 'b'), 'ASSERT_GREATER', 'ASSERT_GREATER: a is not greater than b.'],
    ['greaterEqual', () => assert.greaterEqual(1, 2), 'ASSERT_GREATER_EQUAL',
      'ASSERT_GREATER_EQUAL: 1 is not greater or equal to 2.'],
    ['less', () => assert.less(2, 2), 'ASSERT_LESS', 'ASSERT_LESS: 2 is not less than 2.'],
    ['lessEqual', () => assert.lessEqual(3, 2), 'ASSERT_LESS_EQUAL', 'ASSERT_LESS_EQUAL: 3 is not less or equal to 2.'],
  ])('%s throws a tagged failure', (_name, check, tag, message) => {
    const failure = failureOf(check);

    expect(failure.tag).toBe(tag);
    expect(failure.message).toBe(message);
  });

  it('raises names the function that did not throw', () => {
    const quiet = (): number => 1;

    expect(failureOf(() => assert.raises(quiet)).message).toBe('ASSERT_RAISES: [Function: quiet] did not raise error.');
  });

  it('notRaises names the function that threw', () => {
    const loud = (): never => {
      throw new Error('loud');
    };

    expect(failureOf(() => assert.notRaises(loud)).message).toBe('ASSERT_NOT_RAISES: [Function: loud] raised an error.');
  });

  it('compares with strict equality', () => {
    expect(failureOf(() => assert.equal(1, '1')).message).toBe('ASSERT_EQUAL: 1 is not equal to 1.');
    expect(failureOf(() => assert.equal(Number.NaN, Number.NaN)).message).toBe('ASSERT_EQUAL: NaN is not equal to NaN.');
  });

  it('appends the caller line when the call site is known', () => {
    const located = createAssert(createFixedResolver({ source: 'math.test.ts', line: 7 }));

    expect(failureOf(() => located.isTrue(false)).message)
      .toBe('ASSERT_TRUE: false is not true.' + ' '.repeat(46) + ' :7');
  });
});
