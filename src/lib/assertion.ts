import { isEqual } from 'es-toolkit';

import { noteAssertion } from './execution';
import { getStringRepr } from './repr';
import { captureCallerLocation, formatLocation, type Loc } from './stacks';

export type AssertionResult = {
  readonly matched: boolean;
  readonly passExplanation: string;
  readonly failExplanation: string;
};

export const assertionResult = (
  matched: boolean,
  passExplanation = '',
  failExplanation = '',
): AssertionResult => ({ matched, passExplanation, failExplanation });

/**
 * A reusable predicate over `T` that explains itself either way. Evaluation
 * must not throw and must not change the subject.
 */
export type Matcher<T> = {
  eval(subject: T): AssertionResult;
};

/** Evaluates a matcher that may not honour the no-throw contract. */
export const safeEval = <T>(matcher: Matcher<T>, subject: T): AssertionResult => {
  try {
    return matcher.eval(subject);
  } catch (thrown) {
    const reason = thrown instanceof Error ? thrown.message : getStringRepr(thrown);
    return assertionResult(
      false,
      '',
      `Matcher could not evaluate ${getStringRepr(subject)}: ${reason}`,
    );
  }
};

const renderFailure = (description: string, failExplanation: string, location?: Loc): string => {
  const detail = failExplanation ? `\n\t${failExplanation}` : '';
  return `at ${formatLocation(location)}\n\t${description}${detail}`;
};

/** Raised by a failed assertion; the runner classifies it as a test failure. */
export class AssertionFailure extends Error {
  override readonly name = 'AssertionFailure';

  constructor(
    readonly description: string,
    readonly failExplanation: string,
    readonly location: Loc | undefined,
  ) {
    super(renderFailure(description, failExplanation, location));
  }
}

/**
 * Does nothing when `result` matched; otherwise throws an AssertionFailure
 * carrying the description, the failure explanation and where it happened.
 */
export function checkTest(
  result: AssertionResult,
  description: string,
  location: Loc | undefined = captureCallerLocation(checkTest),
): void {
  noteAssertion();
  if (!result.matched) {
    throw new AssertionFailure(description, result.failExplanation, location);
  }
}

export const assertThat = <T>(subject: T, matcher: Matcher<T>, description?: string): void => {
  checkTest(
    safeEval(matcher, subject),
    description ?? `assertThat(${getStringRepr(subject)})`,
    captureCallerLocation(assertThat),
  );
};

export const assertTrue = (condition: boolean, description = 'assertTrue'): void => {
  checkTest(assertionResult(condition), description, captureCallerLocation(assertTrue));
};

export const assertFalse = (condition: boolean, description = 'assertFalse'): void => {
  checkTest(assertionResult(!condition), description, captureCallerLocation(assertFalse));
};

export const assertEqual = <T>(observed: T, expected: T, description?: string): void => {
  const observedText = getStringRepr(observed);
  const expectedText = getStringRepr(expected);
  checkTest(
    assertionResult(
      isEqual(observed, expected),
      `Both values were: ${observedText}`,
      `Expected: ${expectedText}\n\tObserved: ${observedText}`,
    ),
    description ?? `assertEqual(${observedText}, ${expectedText})`,
    captureCallerLocation(assertEqual),
  );
};

export const assertNotEqual = <T>(observed: T, unexpected: T, description?: string): void => {
  const observedText = getStringRepr(observed);
  checkTest(
    assertionResult(
      !isEqual(observed, unexpected),
      `${observedText} differs from ${getStringRepr(unexpected)}`,
      `Both values were: ${observedText}`,
    ),
    description ?? `assertNotEqual(${observedText}, ${getStringRepr(unexpected)})`,
    captureCallerLocation(assertNotEqual),
  );
};

export const assertNull = (value: unknown, description = 'assertNull'): void => {
  checkTest(
    assertionResult(value == null, '', `${getStringRepr(value)} is not null`),
    description,
    captureCallerLocation(assertNull),
  );
};

export const assertNotNull = (value: unknown, description = 'assertNotNull'): void => {
  checkTest(
    assertionResult(value != null, '', `${getStringRepr(value)} is null`),
    description,
    captureCallerLocation(assertNotNull),
  );
};

export const succeed = (): void => {
  checkTest(assertionResult(true), 'succeed', captureCallerLocation(succeed));
};

export const fail = (reason = ''): void => {
  checkTest(assertionResult(false, '', reason), 'fail', captureCallerLocation(fail));
};
