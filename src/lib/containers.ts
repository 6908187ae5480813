import { isEqual } from 'es-toolkit';

/** Anything that can answer membership itself: Set, Map, user classes. */
export type Keyed<E> = { has(element: E): boolean };

export type Container<E> = Iterable<E> | Keyed<E>;

export type Lookup =
  | { readonly tag: 'Keyed'; readonly found: boolean }
  | { readonly tag: 'Scanned'; readonly position: number | undefined }
  | { readonly tag: 'Unsearchable'; readonly reason: string };

export const isKeyed = (value: unknown): value is Keyed<unknown> =>
  typeof value === 'object' &&
  value !== null &&
  'has' in value &&
  typeof value.has === 'function';

const isIterableValue = (value: unknown): value is Iterable<unknown> =>
  typeof value === 'string' ||
  (typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function');

/** 0-based index of the first element deep-equal to `wanted`. */
export const scanFor = (
  items: Iterable<unknown>,
  wanted: unknown,
  start = 0,
  stop = Number.POSITIVE_INFINITY,
): number | undefined => {
  let index = 0;
  for (const item of items) {
    if (index >= stop) {
      break;
    }
    if (index >= start && isEqual(item, wanted)) {
      return index;
    }
    index += 1;
  }
  return undefined;
};

/**
 * Keyed containers are probed with their own `has`, which for Set and Map is
 * SameValueZero. Everything else iterable is scanned front to back with deep
 * equality so the diagnostic can name a position.
 */
export const findInContainer = (container: unknown, wanted: unknown): Lookup => {
  try {
    if (isKeyed(container)) {
      return { tag: 'Keyed', found: Boolean(container.has(wanted)) };
    }
    if (isIterableValue(container)) {
      return { tag: 'Scanned', position: scanFor(container, wanted) };
    }
    return { tag: 'Unsearchable', reason: 'not a container' };
  } catch (thrown) {
    return {
      tag: 'Unsearchable',
      reason: thrown instanceof Error ? thrown.message : 'lookup threw',
    };
  }
};

export const lookupFound = (lookup: Lookup): boolean => {
  switch (lookup.tag) {
    case 'Keyed':
      return lookup.found;
    case 'Scanned':
      return lookup.position !== undefined;
    case 'Unsearchable':
      return false;
    default: {
      const neverGuard: never = lookup;
      return neverGuard;
    }
  }
};
