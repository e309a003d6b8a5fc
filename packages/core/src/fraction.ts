/**
 * Immutable rational numbers.
 *
 * A fraction is always kept simplified with a positive denominator, so two
 * equal fractions have equal terms.
 */

import { gcd } from '@lattice-kit/support'
import { ArithmeticError } from './errors'
import { Messages } from './messages'
import { free, locked, type Arithmetic, type FreeOperable, type LockedOperable } from './operable'

const MAX_TERM = BigInt(Number.MAX_SAFE_INTEGER)

export class Fraction {
  readonly numerator: number
  readonly denominator: number

  private constructor(numerator: number, denominator: number) {
    if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {
      throw new ArithmeticError(Messages.InvalidFraction)
    }
    if (denominator === 0) throw new ArithmeticError(Messages.ZeroDenominator)

    const sign = denominator < 0 ? -1 : 1
    const n = sign * numerator
    const d = sign * denominator
    const g = n === 0 ? d : gcd(Math.abs(n), d)
    // Normalise -0 so that zero has a single representation.
    this.numerator = n === 0 ? 0 : n / g
    this.denominator = d / g
    Object.freeze(this)
  }

  static readonly ZERO = new Fraction(0, 1)
  static readonly ONE = new Fraction(1, 1)

  static of(numerator: number, denominator = 1): Fraction {
    return new Fraction(numerator, denominator)
  }

  static from(value: Fraction | number): Fraction {
    return value instanceof Fraction ? value : new Fraction(value, 1)
  }

  /**
   * Simplify exact intermediate terms, then narrow them back to numbers.
   * @throws ArithmeticError when a simplified term leaves the safe integer range
   */
  private static reduce(numerator: bigint, denominator: bigint): Fraction {
    const sign = denominator < 0n ? -1n : 1n
    const n = sign * numerator
    const d = sign * denominator
    const g = n === 0n ? d : gcd(n < 0n ? -n : n, d)
    const rn = n / g
    const rd = d / g
    if (rn > MAX_TERM || rn < -MAX_TERM || rd > MAX_TERM) {
      throw new ArithmeticError(Messages.FractionOverflow)
    }
    return new Fraction(Number(rn), Number(rd))
  }

  plus(other: Fraction | number): Fraction {
    const o = Fraction.from(other)
    return Fraction.reduce(
      BigInt(this.numerator) * BigInt(o.denominator) + BigInt(o.numerator) * BigInt(this.denominator),
      BigInt(this.denominator) * BigInt(o.denominator),
    )
  }

  minus(other: Fraction | number): Fraction {
    return this.plus(Fraction.from(other).negated())
  }

  times(other: Fraction | number): Fraction {
    const o = Fraction.from(other)
    return Fraction.reduce(
      BigInt(this.numerator) * BigInt(o.numerator),
      BigInt(this.denominator) * BigInt(o.denominator),
    )
  }

  /** @throws ArithmeticError when `other` is zero */
  by(other: Fraction | number): Fraction {
    const o = Fraction.from(other)
    if (o.numerator === 0) throw new ArithmeticError()
    return this.times(o.inverted())
  }

  negated(): Fraction {
    return new Fraction(-this.numerator, this.denominator)
  }

  /** @throws ArithmeticError when this fraction is zero */
  inverted(): Fraction {
    if (this.numerator === 0) throw new ArithmeticError(Messages.ZeroNumerator)
    return new Fraction(this.denominator, this.numerator)
  }

  compareTo(other: Fraction | number): number {
    const o = Fraction.from(other)
    const lhs = BigInt(this.numerator) * BigInt(o.denominator)
    const rhs = BigInt(o.numerator) * BigInt(this.denominator)
    return lhs < rhs ? -1 : lhs > rhs ? 1 : 0
  }

  equals(other: unknown): boolean {
    if (other instanceof Fraction) return this.numerator === other.numerator && this.denominator === other.denominator
    if (typeof other === 'number') return this.denominator === 1 && this.numerator === other
    return false
  }

  isZero(): boolean {
    return this.numerator === 0
  }

  valueOf(): number {
    return this.numerator / this.denominator
  }

  toString(): string {
    return this.denominator === 1 ? String(this.numerator) : `${this.numerator}/${this.denominator}`
  }
}

// ─── Arithmetic ─────────────────────────────────────────────────────────────

export const fractionArithmetic: Arithmetic<Fraction> = Object.freeze({
  zero: Fraction.ZERO,
  one: Fraction.ONE,
  equals: (a: Fraction, b: Fraction) => a.equals(b),
  add: (a: Fraction, b: Fraction) => a.plus(b),
  subtract: (a: Fraction, b: Fraction) => a.minus(b),
  multiply: (a: Fraction, b: Fraction) => a.times(b),
  divide: (a: Fraction, b: Fraction) => a.by(b),
})

export function freeFraction(value: Fraction | number = Fraction.ZERO): FreeOperable<Fraction> {
  return free(fractionArithmetic, Fraction.from(value))
}

export function lockedFraction(value: Fraction | number = Fraction.ZERO): LockedOperable<Fraction> {
  return locked(fractionArithmetic, Fraction.from(value))
}
