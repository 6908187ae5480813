import { assertionResult, type Matcher } from '../assertion';
import { getStringRepr } from '../repr';

// undefined counts as null: both are the absent value.
export const isNull = (): Matcher<unknown> => ({
  eval: (subject) =>
    assertionResult(subject == null, '', `${getStringRepr(subject)} is not null`),
});

export const isNotNull = (): Matcher<unknown> => ({
  eval: (subject) => assertionResult(subject != null, '', `${getStringRepr(subject)} is null`),
});
