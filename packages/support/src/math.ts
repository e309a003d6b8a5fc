/**
 * Integer helpers.
 *
 * Inputs outside an operation's domain (negative, fractional, non-finite)
 * throw a RangeError instead of returning a meaningless number.
 */

function requireNonNegativeInteger(name: string, n: number | bigint): void {
  const valid = typeof n === 'bigint' ? n >= 0n : Number.isSafeInteger(n) && n >= 0
  if (!valid) {
    throw new RangeError(`${name} expects a non-negative integer, got ${n}`)
  }
}

/** n! for n ≥ 0. factorial(0) = factorial(1) = 1. */
export function factorial(n: number): number {
  requireNonNegativeInteger('factorial', n)
  let result = 1
  for (let k = 2; k <= n; k++) result *= k
  return result
}

/**
 * Greatest common divisor by Euclid's algorithm. gcd(a, 0) = a.
 * The bigint form serves terms past Number.MAX_SAFE_INTEGER.
 */
export function gcd(a: number, b: number): number
export function gcd(a: bigint, b: bigint): bigint
export function gcd(a: number | bigint, b: number | bigint): number | bigint {
  requireNonNegativeInteger('gcd', a)
  requireNonNegativeInteger('gcd', b)
  if (typeof a === 'bigint' && typeof b === 'bigint') return euclidBig(a, b)
  if (typeof a === 'number' && typeof b === 'number') return euclid(a, b)
  throw new TypeError('gcd expects two numbers or two bigints')
}

function euclid(a: number, b: number): number {
  return b === 0 ? a : euclid(b, a % b)
}

function euclidBig(a: bigint, b: bigint): bigint {
  while (b !== 0n) [a, b] = [b, a % b]
  return a
}

/** The smaller of two values (the first one on ties). */
export function min(a: number, b: number): number {
  return b < a ? b : a
}
