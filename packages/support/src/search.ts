/**
 * Linear and binary search over arrays.
 *
 * Every search returns null when the array is absent or nothing matches.
 */

import type { Comparator, Maybe } from './sequence'

export type Predicate<T> = (element: T, index: number) => boolean

// ─── Linear ─────────────────────────────────────────────────────────────────

export function findFirstIndex<T>(array: Maybe<readonly T[]>, predicate: Predicate<T>): number | null {
  if (array == null) return null
  for (let i = 0; i < array.length; i++) {
    if (predicate(array[i], i)) return i
  }
  return null
}

export function findLastIndex<T>(array: Maybe<readonly T[]>, predicate: Predicate<T>): number | null {
  if (array == null) return null
  for (let i = array.length - 1; i >= 0; i--) {
    if (predicate(array[i], i)) return i
  }
  return null
}

export function findFirst<T>(array: Maybe<readonly T[]>, predicate: Predicate<T>): T | null {
  const index = findFirstIndex(array, predicate)
  return array == null || index === null ? null : array[index]
}

export function findLast<T>(array: Maybe<readonly T[]>, predicate: Predicate<T>): T | null {
  const index = findLastIndex(array, predicate)
  return array == null || index === null ? null : array[index]
}

// ─── Binary ─────────────────────────────────────────────────────────────────

/**
 * Binary search for `item` in an array sorted ascending by `compare`.
 * With duplicate keys, any matching index may be returned.
 */
export function sortedFindIndex<T>(
  item: T,
  sortedArray: Maybe<readonly T[]>,
  compare: Comparator<T>,
): number | null {
  if (sortedArray == null) return null
  let lo = 0
  let hi = sortedArray.length - 1
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1
    const c = compare(sortedArray[mid], item)
    if (c === 0) return mid
    if (c < 0) lo = mid + 1
    else hi = mid - 1
  }
  return null
}

export function sortedFind<T>(
  item: T,
  sortedArray: Maybe<readonly T[]>,
  compare: Comparator<T>,
): T | null {
  const index = sortedFindIndex(item, sortedArray, compare)
  return sortedArray == null || index === null ? null : sortedArray[index]
}
