/**
 * @lattice-kit/support — generic numeric and sequence helpers.
 *
 * Consumed by @lattice-kit/core; nothing here knows about types,
 * operability, null objects or chains.
 */

export { factorial, gcd, min } from './math'

export {
  type Comparator, type Maybe, type Direction,
  naturalOrder, insertionSort,
  toList, toArray, combineArrays, iterate,
} from './sequence'

export {
  type Predicate,
  findFirst, findLast, findFirstIndex, findLastIndex,
  sortedFind, sortedFindIndex,
} from './search'

export { type Equatable, areNullOrEqual, areNonNullAndNonEqual } from './equality'
