/** Equality helpers that treat null and undefined as the same absent value. */

export interface Equatable {
  equals(other: unknown): boolean
}

function isEquatable(value: unknown): value is Equatable {
  return typeof value === 'object' && value !== null && 'equals' in value && typeof value.equals === 'function'
}

function equal(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (isEquatable(a)) return a.equals(b)
  if (isEquatable(b)) return b.equals(a)
  return false
}

/** True when both are absent, or when they are equal. */
export function areNullOrEqual(a: unknown, b: unknown): boolean {
  if (a == null || b == null) return a == null && b == null
  return equal(a, b)
}

/** True when exactly one is absent, or when both are present and unequal. */
export function areNonNullAndNonEqual(a: unknown, b: unknown): boolean {
  return !areNullOrEqual(a, b)
}
