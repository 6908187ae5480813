import { isEqual } from 'es-toolkit';

import { assertionResult, type AssertionResult, type Matcher } from '../assertion';
import {
  type Container,
  findInContainer,
  isKeyed,
  type Lookup,
  lookupFound,
  scanFor,
} from '../containers';
import { getStringRepr, tuple } from '../repr';
import { containsSubstring } from './strings';

const describeLookup = (
  lookup: Lookup,
  wantedText: string,
  containerText: string,
): AssertionResult => {
  const failText = `Could not find ${wantedText} in ${containerText}`;
  switch (lookup.tag) {
    case 'Keyed':
      return assertionResult(lookup.found, `Found ${wantedText} in ${containerText}`, failText);
    case 'Scanned':
      return lookup.position === undefined
        ? assertionResult(false, '', failText)
        : assertionResult(
            true,
            `Found ${wantedText} in position ${lookup.position} of ${containerText}`,
            failText,
          );
    case 'Unsearchable':
      return assertionResult(false, '', `${failText} (${lookup.reason})`);
    default: {
      const neverGuard: never = lookup;
      return neverGuard;
    }
  }
};

const elementMatcher = <E>(element: E): Matcher<Container<E>> => ({
  eval: (container) =>
    describeLookup(
      findInContainer(container, element),
      getStringRepr(element),
      getStringRepr(container),
    ),
});

export const hasItem = elementMatcher;

export const hasKey = elementMatcher;

/**
 * Membership. A string needle against a string subject is a substring
 * search; anything else is an element lookup.
 */
export function contains(needle: string): Matcher<string | Container<string>>;
export function contains<E>(element: E): Matcher<Container<E>>;
export function contains(needle: unknown): Matcher<unknown> {
  const asElement: Matcher<unknown> = elementMatcher(needle);
  return {
    eval: (subject) => {
      if (typeof needle === 'string' && typeof subject === 'string') {
        return containsSubstring(needle).eval(subject);
      }
      return asElement.eval(subject);
    },
  };
}

/** Passes when every item is present; otherwise names the first missing one. */
export const hasItems = <E>(...items: readonly E[]): Matcher<Container<E>> => ({
  eval: (container) => {
    const containerText = getStringRepr(container);
    const foundAll = `Found all of ${getStringRepr(items)} in ${containerText}`;
    const missing = items.findIndex((item) => !lookupFound(findInContainer(container, item)));
    if (missing >= 0) {
      return assertionResult(
        false,
        foundAll,
        `Did not find ${getStringRepr(items[missing])} in ${containerText}`,
      );
    }
    return assertionResult(true, foundAll, foundAll);
  },
});

export const hasKeys = hasItems;

/** A keyed container that can also hand back the value stored under a key. */
export type MapLike<K, V> = {
  has(key: K): boolean;
  get(key: K): V | undefined;
};

export type EntryRecord<V> = { readonly [key: string]: V };

type EntryProbe =
  | { readonly tag: 'Present'; readonly value: unknown }
  | { readonly tag: 'Absent' };

const ABSENT: EntryProbe = { tag: 'Absent' };

const isMapLike = (value: unknown): value is MapLike<unknown, unknown> =>
  isKeyed(value) && 'get' in value && typeof value.get === 'function';

const isPropertyKey = (value: unknown): value is PropertyKey =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'symbol';

const probeEntry = (container: unknown, key: unknown): EntryProbe => {
  if (isMapLike(container)) {
    return container.has(key) ? { tag: 'Present', value: container.get(key) } : ABSENT;
  }
  if (typeof container === 'object' && container !== null && isPropertyKey(key)) {
    const descriptor = Object.getOwnPropertyDescriptor(container, key);
    if (descriptor === undefined) {
      return ABSENT;
    }
    const value: unknown = descriptor.value;
    return { tag: 'Present', value };
  }
  return ABSENT;
};

/**
 * A missing key fails naming only the key; a key holding some other value
 * fails naming the entry that was expected.
 */
export const hasEntry = <K, V>(
  key: K,
  value: V,
): Matcher<MapLike<K, V> | EntryRecord<V>> => ({
  eval: (container) => {
    const containerText = getStringRepr(container);
    const entryText = getStringRepr(tuple(key, value));
    const probe = probeEntry(container, key);
    if (probe.tag === 'Absent') {
      return assertionResult(false, '', `Could not find ${getStringRepr(key)} in ${containerText}`);
    }
    return assertionResult(
      isEqual(probe.value, value),
      `Found ${entryText} in ${containerText}`,
      `Could not find ${entryText} in ${containerText}`,
    );
  },
});

/**
 * Element-by-element comparison against an expected sequence. Diagnostics
 * give the subject's side first.
 */
export const matches = <E>(expected: Iterable<E>): Matcher<Iterable<E>> => ({
  eval: (subject) => {
    const observedItems = [...subject];
    const expectedItems = [...expected];
    if (observedItems.length !== expectedItems.length) {
      return assertionResult(
        false,
        '',
        `Sequences are of different length (${observedItems.length} and ${expectedItems.length})`,
      );
    }
    const mismatch = observedItems.findIndex(
      (item, index) => !isEqual(item, expectedItems[index]),
    );
    if (mismatch >= 0) {
      return assertionResult(
        false,
        '',
        `In position ${mismatch}, ${getStringRepr(observedItems[mismatch])} != ` +
          getStringRepr(expectedItems[mismatch]),
      );
    }
    return assertionResult(true, 'All corresponding elements were equal.', '');
  },
});

/** The subject is the candidate; the container is fixed up front. */
export const isIn = <E>(container: Container<E>): Matcher<E> => ({
  eval: (element) =>
    describeLookup(
      findInContainer(container, element),
      getStringRepr(element),
      getStringRepr(container),
    ),
});

/**
 * Looks for the subject among `sequence[start, stop)`. Steps are counted from
 * `start`.
 */
export const isInRange = <E>(
  sequence: Iterable<E>,
  start = 0,
  stop = Number.POSITIVE_INFINITY,
): Matcher<E> => ({
  eval: (element) => {
    const elementText = getStringRepr(element);
    const position = scanFor(sequence, element, start, stop);
    return assertionResult(
      position !== undefined,
      `Found ${elementText} in range, ${(position ?? start) - start} steps from the start`,
      `Could not find ${elementText} in the range`,
    );
  },
});
