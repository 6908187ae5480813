import { describe, expect, it } from 'vitest';

import type { Matcher } from '../src/lib/assertion';
import {
  allOf,
  anyOf,
  contains,
  containsSubstring,
  endsWith,
  hasEntry,
  hasItem,
  hasItems,
  hasKey,
  isApproximately,
  isEqualTo,
  isGreaterThan,
  isGreaterThanOrEqualTo,
  isIn,
  isInRange,
  isLessThan,
  isLessThanOrEqualTo,
  isNotEqualTo,
  isNotNull,
  isNull,
  isOneOf,
  matches,
  not,
  startsWith,
} from '../src/lib/matchers';

describe('relational matchers', () => {
  it('isEqualTo explains both outcomes', () => {
    expect(isEqualTo(4).eval(4)).toEqual({
      matched: true,
      passExplanation: 'Both values were: 4',
      failExplanation: 'Expected: 4\n\tObserved: 4',
    });
    expect(isEqualTo(4).eval(5).failExplanation).toBe('Expected: 4\n\tObserved: 5');
  });

  it('isEqualTo compares structurally', () => {
    expect(isEqualTo({ a: [1, 2] }).eval({ a: [1, 2] }).matched).toBe(true);
  });

  it('isNotEqualTo passes on differing values', () => {
    const result = isNotEqualTo(4).eval(5);
    expect(result.matched).toBe(true);
    expect(result.passExplanation).toBe('5 differs from 4');
    expect(isNotEqualTo(4).eval(4).failExplanation).toBe('Both values were: 4');
  });

  it('isApproximately accepts values inside the band', () => {
    expect(isApproximately(1, 0.1).eval(1.05)).toEqual({
      matched: true,
      passExplanation: '1.05 is between 0.9 and 1.1',
      failExplanation: '1.05 is outside the range 0.9 .. 1.1',
    });
    expect(isApproximately(1, 0.1).eval(1.2).matched).toBe(false);
    expect(isApproximately(1, 0.1).eval(Number.NaN).matched).toBe(false);
  });

  it('orders numbers, strings and dates', () => {
    expect(isLessThan(5).eval(3).passExplanation).toBe('3 is less than 5');
    expect(isLessThan(5).eval(7).failExplanation).toBe('7 is not less than 5');
    expect(isGreaterThan(5).eval(5).matched).toBe(false);
    expect(isGreaterThanOrEqualTo(5).eval(5).passExplanation).toBe(
      '5 is greater than or equal to 5',
    );
    expect(isLessThanOrEqualTo('b').eval('c').failExplanation).toBe("'c' is greater than 'b'");
    expect(isLessThan(new Date(1000)).eval(new Date(0)).matched).toBe(true);
  });

  it('isOneOf lists every candidate', () => {
    expect(isOneOf(1, 2, 3).eval(2).passExplanation).toBe('Found 2 in [1, 2, 3]');
    expect(isOneOf(1, 2, 3).eval(4)).toEqual({
      matched: false,
      passExplanation: 'Found 4 in [1, 2, 3]',
      failExplanation: 'Could not find 4 in [1, 2, 3]',
    });
  });
});

describe('string matchers', () => {
  it('containsSubstring reports where the match starts', () => {
    expect(containsSubstring('bc').eval('abcd').passExplanation).toBe(
      'Found "bc" starting in position 1 of "abcd"',
    );
    expect(containsSubstring('bc').eval('xyz').failExplanation).toBe(
      'Within "xyz", cannot find "bc"',
    );
  });

  it('startsWith and endsWith', () => {
    expect(startsWith('ab').eval('abc').passExplanation).toBe('"abc" begins with "ab"');
    expect(endsWith('bc').eval('abd')).toEqual({
      matched: false,
      passExplanation: '"abd" ends with "bc"',
      failExplanation: '"abd" does not end with "bc"',
    });
  });
});

describe('null matchers', () => {
  it('treats null and undefined as absent', () => {
    expect(isNull().eval(null).matched).toBe(true);
    expect(isNull().eval(undefined).matched).toBe(true);
    expect(isNull().eval(0).failExplanation).toBe('0 is not null');
    expect(isNotNull().eval(undefined).failExplanation).toBe('undefined is null');
  });
});

describe('container matchers', () => {
  it('reports the position found by a sequential scan', () => {
    expect(contains(3).eval([1, 2, 3]).passExplanation).toBe('Found 3 in position 2 of [1, 2, 3]');
    expect(contains({ id: 1 }).eval([{ id: 1 }]).matched).toBe(true);
  });

  it('searches strings for substrings and sequences for elements', () => {
    expect(contains('b').eval('abc').passExplanation).toBe(
      `Found 'b' starting in position 1 of "abc"`,
    );
    expect(contains('b').eval(['a', 'b']).passExplanation).toBe(
      "Found 'b' in position 1 of ['a', 'b']",
    );
  });

  it('probes keyed containers with their own membership test', () => {
    expect(hasItem(2).eval(new Set([1, 2])).passExplanation).toBe('Found 2 in [1, 2]');
    expect(hasKey('a').eval(new Map([['a', 1]])).matched).toBe(true);
    expect(hasItem(Number.NaN).eval(new Set([Number.NaN])).matched).toBe(true);
    expect(hasItem({ id: 1 }).eval(new Set([{ id: 1 }])).matched).toBe(false);
  });

  it('follows additions and removals in a keyed container', () => {
    const seen = new Set<number>();
    const hasFive = hasItem(5);
    expect(hasFive.eval(seen).matched).toBe(false);
    seen.add(5);
    expect(hasFive.eval(seen).matched).toBe(true);
    seen.delete(5);
    expect(hasFive.eval(seen).failExplanation).toBe('Could not find 5 in []');
  });

  it('hasItems names exactly the first missing value', () => {
    const values = [3, 6, 9];
    expect(hasItems(3, 9).eval(values)).toEqual({
      matched: true,
      passExplanation: 'Found all of [3, 9] in [3, 6, 9]',
      failExplanation: 'Found all of [3, 9] in [3, 6, 9]',
    });
    expect(hasItems(3, 9, 42).eval(values).failExplanation).toBe('Did not find 42 in [3, 6, 9]');
  });

  it('hasEntry distinguishes a missing key from a different value', () => {
    const map = new Map([['a', 1]]);
    expect(hasEntry('a', 1).eval(map).passExplanation).toBe("Found <'a', 1> in [<'a', 1>]");
    expect(hasEntry('a', 2).eval(map).failExplanation).toBe(
      "Could not find <'a', 2> in [<'a', 1>]",
    );
    expect(hasEntry('z', 1).eval(map).failExplanation).toBe("Could not find 'z' in [<'a', 1>]");
  });

  it('hasEntry reads own properties of plain records', () => {
    expect(hasEntry('width', 3).eval({ width: 3 }).passExplanation).toBe(
      'Found <"width", 3> in {width:3}',
    );
    expect(hasEntry('toString', 3).eval({ width: 3 }).matched).toBe(false);
  });

  it('matches compares sequences position by position', () => {
    expect(matches([1, 2, 3]).eval([1, 2, 3]).passExplanation).toBe(
      'All corresponding elements were equal.',
    );
    expect(matches([1, 2, 3]).eval([1, 2]).failExplanation).toBe(
      'Sequences are of different length (2 and 3)',
    );
    expect(matches([1, 2, 3]).eval([1, 5, 3]).failExplanation).toBe('In position 1, 5 != 2');
  });

  it('isIn treats the subject as the candidate', () => {
    expect(isIn([10, 20]).eval(20).passExplanation).toBe('Found 20 in position 1 of [10, 20]');
    expect(isIn(new Set(['x'])).eval('y').failExplanation).toBe("Could not find 'y' in ['x']");
  });

  it('isInRange counts steps from the start of the range', () => {
    const inMiddle = isInRange([5, 6, 7, 8], 1, 3);
    expect(inMiddle.eval(7).passExplanation).toBe('Found 7 in range, 1 steps from the start');
    expect(inMiddle.eval(8).failExplanation).toBe('Could not find 8 in the range');
    expect(inMiddle.eval(5).matched).toBe(false);
  });
});

describe('combinators', () => {
  const subjects = [0, 1, 2, 5, 10];
  const samples: readonly Matcher<number>[] = [isEqualTo(1), isGreaterThan(2), isOneOf(0, 10)];

  it('not swaps the verdict and the explanations', () => {
    expect(not(isEqualTo(1)).eval(2)).toEqual({
      matched: true,
      passExplanation: 'Expected: 1\n\tObserved: 2',
      failExplanation: 'Both values were: 2',
    });
  });

  it('satisfies the usual boolean identities', () => {
    for (const matcher of samples) {
      for (const subject of subjects) {
        const plain = matcher.eval(subject).matched;
        expect(not(not(matcher)).eval(subject).matched).toBe(plain);
        expect(allOf(matcher, not(matcher)).eval(subject).matched).toBe(false);
        expect(anyOf(matcher, not(matcher)).eval(subject).matched).toBe(true);
      }
    }
  });

  it('allOf reports the first failure only', () => {
    expect(allOf(isGreaterThan(1), isLessThan(10)).eval(5).passExplanation).toBe(
      'All of the conditions were true',
    );
    expect(allOf(isGreaterThan(1), isLessThan(3), isLessThan(2)).eval(5).failExplanation).toBe(
      '5 is not less than 3',
    );
    expect(allOf<number>().eval(1).matched).toBe(true);
  });

  it('anyOf reports the first success only', () => {
    expect(anyOf(isEqualTo(1), isEqualTo(5)).eval(5).passExplanation).toBe(
      'Both values were: 5',
    );
    expect(anyOf(isEqualTo(1), isEqualTo(5)).eval(7).failExplanation).toBe(
      'None of the conditions were true',
    );
    expect(anyOf<number>().eval(1).matched).toBe(false);
  });

  it('turns a throwing sub-matcher into a failure', () => {
    const broken: Matcher<number> = {
      eval: () => {
        throw new Error('bad');
      },
    };
    expect(allOf(broken).eval(1).failExplanation).toBe('Matcher could not evaluate 1: bad');
    expect(not(broken).eval(1).matched).toBe(true);
  });
});
