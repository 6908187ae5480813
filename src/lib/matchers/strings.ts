import { assertionResult, type AssertionResult, type Matcher } from '../assertion';
import { getStringRepr } from '../repr';

const notAString = (subject: unknown): AssertionResult =>
  assertionResult(false, '', `${getStringRepr(subject)} is not a string`);

/** Substring search; the pass explanation gives where the match starts. */
export const containsSubstring = (needle: string): Matcher<string> => ({
  eval: (subject) => {
    if (typeof subject !== 'string') {
      return notAString(subject);
    }
    const position = subject.indexOf(needle);
    return assertionResult(
      position >= 0,
      `Found ${getStringRepr(needle)} starting in position ${position} of ${getStringRepr(subject)}`,
      `Within ${getStringRepr(subject)}, cannot find ${getStringRepr(needle)}`,
    );
  },
});

export const startsWith = (prefix: string): Matcher<string> => ({
  eval: (subject) => {
    if (typeof subject !== 'string') {
      return notAString(subject);
    }
    const subjectText = getStringRepr(subject);
    const prefixText = getStringRepr(prefix);
    return assertionResult(
      subject.startsWith(prefix),
      `${subjectText} begins with ${prefixText}`,
      `${subjectText} does not begin with ${prefixText}`,
    );
  },
});

export const beginsWith = startsWith;

export const endsWith = (suffix: string): Matcher<string> => ({
  eval: (subject) => {
    if (typeof subject !== 'string') {
      return notAString(subject);
    }
    const subjectText = getStringRepr(subject);
    const suffixText = getStringRepr(suffix);
    return assertionResult(
      subject.endsWith(suffix),
      `${subjectText} ends with ${suffixText}`,
      `${subjectText} does not end with ${suffixText}`,
    );
  },
});
