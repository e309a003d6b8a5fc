/**
 * Law checkers.
 *
 * These utilities verify the laws the toolkit promises:
 *   1. Type relation: reflexivity, transitivity, absent exclusion
 *   2. Locked operability: additive and multiplicative identity-only algebra
 *   3. Null objects: totality (no throw, no observable change)
 *   4. Chains: the subject result depends only on the final context
 *
 * Each checker returns a boolean so it can be used directly as a
 * fast-check property.
 */

import { AbsentType } from './absent'
import { carry, type ChainStep } from './contextual'
import { InvariantViolationError } from './errors'
import type { OperableValue } from './operable'
import type { TypeDescriptor } from './type-relation'

// ─── Type Relation Laws ─────────────────────────────────────────────────────

/** Check reflexivity: t.is(t) */
export function checkReflexivity(t: TypeDescriptor<unknown>): boolean {
  return t.is(t)
}

/** Check transitivity: a.is(b) ∧ b.is(c) ⇒ a.is(c) */
export function checkTransitivity(
  a: TypeDescriptor<unknown>,
  b: TypeDescriptor<unknown>,
  c: TypeDescriptor<unknown>,
): boolean {
  return !(a.is(b) && b.is(c)) || a.is(c)
}

/** Check absent exclusion: neither t.is(Absent) nor Absent.is(t), unless t is Absent. */
export function checkAbsentExclusion(t: TypeDescriptor<unknown>): boolean {
  if (t === AbsentType) return t.is(AbsentType)
  return !t.is(AbsentType) && !AbsentType.is(t)
}

// ─── Locked Operability Laws ────────────────────────────────────────────────

type InPlace = 'add' | 'subtract' | 'multiply' | 'divide'

/**
 * Check that `operation(operand)` on a locked value either is an accepted
 * no-op (operand is the identity) or throws InvariantViolationError, and in
 * both cases leaves the value unchanged.
 */
export function checkLockedOperation<T>(
  value: OperableValue<T>,
  operation: InPlace,
  operand: T,
): boolean {
  const { arithmetic } = value
  const before = value.value
  const identity = operation === 'add' || operation === 'subtract' ? arithmetic.zero : arithmetic.one
  const expectFailure = !arithmetic.equals(operand, identity)

  let failed = false
  try {
    value[operation](operand)
  } catch (error) {
    if (!(error instanceof InvariantViolationError)) return false
    failed = true
  }
  return failed === expectFailure && arithmetic.equals(value.value, before)
}

/** Check the additive identity law: add(zero) is a no-op, add(other) fails. */
export function checkLockedIdentity<T>(value: OperableValue<T>, operand: T): boolean {
  return checkLockedOperation(value, 'add', operand) &&
    checkLockedOperation(value, 'subtract', operand)
}

/** Check the multiplicative law: multiply(one) is a no-op, multiply(other) fails. */
export function checkLockedMultiplicative<T>(value: OperableValue<T>, operand: T): boolean {
  return checkLockedOperation(value, 'multiply', operand) &&
    checkLockedOperation(value, 'divide', operand)
}

// ─── Null Object Laws ───────────────────────────────────────────────────────

/**
 * Check totality: calling every method of `target` with `args` neither
 * throws nor changes any own property of `target`.
 */
export function checkTotality(target: object, args: readonly unknown[] = []): boolean {
  const before = snapshot(target)
  for (const key of Reflect.ownKeys(target)) {
    const member: unknown = Reflect.get(target, key)
    if (typeof member !== 'function') continue
    try {
      Reflect.apply(member, target, args)
    } catch {
      return false
    }
  }
  return structuralEquals(snapshot(target), before)
}

function snapshot(target: object): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const key of Reflect.ownKeys(target)) {
    const member: unknown = Reflect.get(target, key)
    if (typeof member !== 'function') out[String(key)] = member
  }
  return out
}

// ─── Chain Laws ─────────────────────────────────────────────────────────────

/**
 * Check chain termination: running `inPlace` steps from `start()` and
 * `replacing` steps from another `start()` yields the same subject result
 * whenever both reach equivalent final contexts.
 */
export function checkChainTermination<C, R>(
  start: () => C,
  inPlace: readonly ChainStep<C>[],
  replacing: readonly ChainStep<C>[],
  consume: (context: Readonly<C>) => R,
  equals: (a: R, b: R) => boolean = Object.is,
): boolean {
  const lhs = carry(start()).chain(...inPlace).subject(consume)
  const rhs = carry(start()).chain(...replacing).subject(consume)
  return equals(lhs, rhs)
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Structural equality using JSON serialization. */
export function structuralEquals<T>(a: T, b: T): boolean {
  return JSON.stringify(a) === JSON.stringify(b)
}
