import { assertionResult, type Matcher, safeEval } from '../assertion';

export const not = <T>(matcher: Matcher<T>): Matcher<T> => ({
  eval: (subject) => {
    const { matched, passExplanation, failExplanation } = safeEval(matcher, subject);
    return assertionResult(!matched, failExplanation, passExplanation);
  },
});

/** Stops at the first failure and reports exactly its explanation. */
export const allOf = <T>(...matchers: readonly Matcher<T>[]): Matcher<T> => ({
  eval: (subject) => {
    for (const matcher of matchers) {
      const result = safeEval(matcher, subject);
      if (!result.matched) {
        return assertionResult(false, 'All of the conditions were true', result.failExplanation);
      }
    }
    return assertionResult(true, 'All of the conditions were true', '');
  },
});

/** Stops at the first success and reports exactly its explanation. */
export const anyOf = <T>(...matchers: readonly Matcher<T>[]): Matcher<T> => ({
  eval: (subject) => {
    for (const matcher of matchers) {
      const result = safeEval(matcher, subject);
      if (result.matched) {
        return assertionResult(true, result.passExplanation, 'None of the conditions were true');
      }
    }
    return assertionResult(false, '', 'None of the conditions were true');
  },
});
