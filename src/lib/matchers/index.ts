export { allOf, anyOf, not } from './combinators';
export {
  contains,
  type EntryRecord,
  hasEntry,
  hasItem,
  hasItems,
  hasKey,
  hasKeys,
  isIn,
  isInRange,
  type MapLike,
  matches,
} from './containers';
export { isNotNull, isNull } from './nulls';
export {
  is,
  isApproximately,
  isEqualTo,
  isGreaterThan,
  isGreaterThanOrEqualTo,
  isLessThan,
  isLessThanOrEqualTo,
  isNot,
  isNotEqualTo,
  isOneOf,
  type Ordered,
} from './relational';
export { beginsWith, containsSubstring, endsWith, startsWith } from './strings';
