/**
 * Sequence helpers.
 *
 * An absent input (null or undefined) yields null — "no value" — rather
 * than an empty result, so callers can tell the two apart.
 */

export type Comparator<T> = (a: T, b: T) => number

export type Maybe<T> = T | null | undefined

export function naturalOrder<T extends number | string | bigint>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// ─── Sorting ────────────────────────────────────────────────────────────────

/**
 * Stable in-place insertion sort. Returns the same array.
 * An element only moves left past strictly greater elements, so equal keys
 * keep their relative order.
 */
export function insertionSort<T extends number | string | bigint>(items: T[]): T[]
export function insertionSort<T>(items: T[], compare: Comparator<T>): T[]
export function insertionSort<T>(items: T[], compare?: Comparator<T>): T[] {
  const cmp = compare ?? defaultCompare
  for (let i = 1; i < items.length; i++) {
    const current = items[i]
    let j = i - 1
    while (j >= 0 && cmp(items[j], current) > 0) {
      items[j + 1] = items[j]
      j--
    }
    items[j + 1] = current
  }
  return items
}

function defaultCompare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return naturalOrder(a, b)
  if (typeof a === 'string' && typeof b === 'string') return naturalOrder(a, b)
  if (typeof a === 'bigint' && typeof b === 'bigint') return naturalOrder(a, b)
  throw new TypeError('insertionSort needs a comparator for non-primitive items')
}

// ─── Conversion ─────────────────────────────────────────────────────────────

/** Copy an iterable into a new array; null when the iterable is absent. */
export function toList<T>(iterable: Maybe<Iterable<T>>): T[] | null {
  if (iterable == null) return null
  return Array.from(iterable)
}

/** Like toList, but the result is frozen. */
export function toArray<T>(iterable: Maybe<Iterable<T>>): readonly T[] | null {
  const list = toList(iterable)
  return list === null ? null : Object.freeze(list)
}

/** Concatenate arrays into one new array. */
export function combineArrays<T>(...arrays: readonly (readonly T[])[]): T[] {
  const combined: T[] = []
  for (const array of arrays) combined.push(...array)
  return combined
}

export type Direction = 'forward' | 'backward'

/** Iterate an array in either direction; an absent array iterates nothing. */
export function* iterate<T>(array: Maybe<readonly T[]>, direction: Direction = 'forward'): Generator<T, void, undefined> {
  if (array == null) return
  if (direction === 'forward') {
    for (let i = 0; i < array.length; i++) yield array[i]
  } else {
    for (let i = array.length - 1; i >= 0; i--) yield array[i]
  }
}
