import { isEqual } from 'es-toolkit';

import { assertionResult, type Matcher } from '../assertion';
import { getStringRepr } from '../repr';

export const isEqualTo = <T>(expected: T): Matcher<T> => ({
  eval: (observed) => {
    const observedText = getStringRepr(observed);
    return assertionResult(
      isEqual(observed, expected),
      `Both values were: ${observedText}`,
      `Expected: ${getStringRepr(expected)}\n\tObserved: ${observedText}`,
    );
  },
});

export const is = isEqualTo;

export const isNotEqualTo = <T>(unexpected: T): Matcher<T> => ({
  eval: (observed) => {
    const observedText = getStringRepr(observed);
    return assertionResult(
      !isEqual(observed, unexpected),
      `${observedText} differs from ${getStringRepr(unexpected)}`,
      `Both values were: ${observedText}`,
    );
  },
});

export const isNot = isNotEqualTo;

/** Passes when the subject lies in `[expected - delta, expected + delta]`. NaN never does. */
export const isApproximately = (expected: number, delta: number): Matcher<number> => ({
  eval: (observed) => {
    const low = getStringRepr(expected - delta);
    const high = getStringRepr(expected + delta);
    const observedText = getStringRepr(observed);
    const inside = observed >= expected - delta && observed <= expected + delta;
    return assertionResult(
      inside,
      `${observedText} is between ${low} and ${high}`,
      `${observedText} is outside the range ${low} .. ${high}`,
    );
  },
});

/** Values with a natural total order. Dates compare by timestamp. */
export type Ordered = number | bigint | string | Date;

const comparable = (value: Ordered): number | bigint | string =>
  value instanceof Date ? value.getTime() : value;

const lessThan = (left: Ordered, right: Ordered): boolean =>
  comparable(left) < comparable(right);

type Comparison = {
  readonly holds: (left: Ordered, right: Ordered) => boolean;
  readonly pass: string;
  readonly fail: string;
};

const compareWith =
  ({ holds, pass, fail }: Comparison) =>
  (right: Ordered): Matcher<Ordered> => ({
    eval: (left) => {
      const leftText = getStringRepr(left);
      const rightText = getStringRepr(right);
      return assertionResult(
        holds(left, right),
        `${leftText} ${pass} ${rightText}`,
        `${leftText} ${fail} ${rightText}`,
      );
    },
  });

export const isLessThan = compareWith({
  holds: lessThan,
  pass: 'is less than',
  fail: 'is not less than',
});

export const isGreaterThan = compareWith({
  holds: (left, right) => lessThan(right, left),
  pass: 'is greater than',
  fail: 'is not greater than',
});

export const isLessThanOrEqualTo = compareWith({
  holds: (left, right) => !lessThan(right, left),
  pass: 'is less than or equal to',
  fail: 'is greater than',
});

export const isGreaterThanOrEqualTo = compareWith({
  holds: (left, right) => !lessThan(left, right),
  pass: 'is greater than or equal to',
  fail: 'is less than',
});

/** Deep-equal to any of the candidates. Both explanations list them all. */
export const isOneOf = <T>(...candidates: readonly T[]): Matcher<T> => ({
  eval: (observed) => {
    const observedText = getStringRepr(observed);
    const candidatesText = getStringRepr(candidates);
    return assertionResult(
      candidates.some((candidate) => isEqual(observed, candidate)),
      `Found ${observedText} in ${candidatesText}`,
      `Could not find ${observedText} in ${candidatesText}`,
    );
  },
});
