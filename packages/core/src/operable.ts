/**
 * Operability contract for numeric-like values.
 *
 * Every operable value offers the four operations in two forms:
 *   - in place:        add, subtract, multiply, divide  → void
 *   - value-returning: plus, minus, times, by          → the same object
 * Both forms mutate; the value-returning form returns the post-operation state.
 *
 * Two variants, fixed at construction:
 *   - Free:   operations always apply; dividing by zero is an ArithmeticError.
 *   - Locked: only identity operands are accepted (0 for add/subtract,
 *             1 for multiply/divide), so the value never changes. Any other
 *             operand is an InvariantViolationError.
 * A null or undefined operand is a MissingArgumentError in both variants,
 * checked first.
 */

import {
  ArithmeticError, InvariantViolationError, MissingArgumentError,
  type OperationName,
} from './errors'

// ─── Arithmetic ─────────────────────────────────────────────────────────────

/** The algebra an operable value computes with. */
export interface Arithmetic<T> {
  readonly zero: T
  readonly one: T
  equals(a: T, b: T): boolean
  add(a: T, b: T): T
  subtract(a: T, b: T): T
  multiply(a: T, b: T): T
  /** Never called with a zero divisor. */
  divide(a: T, b: T): T
}

export const numberArithmetic: Arithmetic<number> = Object.freeze({
  zero: 0,
  one: 1,
  equals: (a: number, b: number) => a === b,
  add: (a: number, b: number) => a + b,
  subtract: (a: number, b: number) => a - b,
  multiply: (a: number, b: number) => a * b,
  divide: (a: number, b: number) => a / b,
})

// ─── Contract ───────────────────────────────────────────────────────────────

export type Operand<T> = T | null | undefined

export interface Operable<T> {
  readonly value: T
  add(operand: Operand<T>): void
  subtract(operand: Operand<T>): void
  multiply(operand: Operand<T>): void
  divide(operand: Operand<T>): void
  plus(operand: Operand<T>): this
  minus(operand: Operand<T>): this
  times(operand: Operand<T>): this
  by(operand: Operand<T>): this
}

export type OperableVariant = 'free' | 'locked'

export type OperationKind = 'add' | 'subtract' | 'multiply' | 'divide'

const KIND: Record<OperationName, OperationKind> = {
  add: 'add',
  plus: 'add',
  subtract: 'subtract',
  minus: 'subtract',
  multiply: 'multiply',
  times: 'multiply',
  divide: 'divide',
  by: 'divide',
}

function requireOperand<T>(operation: OperationName, operand: Operand<T>): T {
  if (operand === null || operand === undefined) throw new MissingArgumentError(operation)
  return operand
}

export abstract class OperableValue<T> implements Operable<T> {
  abstract readonly variant: OperableVariant

  protected current: T

  constructor(readonly arithmetic: Arithmetic<T>, initial: T) {
    this.current = initial
  }

  get value(): T {
    return this.current
  }

  add(operand: Operand<T>): void {
    this.apply('add', operand)
  }

  subtract(operand: Operand<T>): void {
    this.apply('subtract', operand)
  }

  multiply(operand: Operand<T>): void {
    this.apply('multiply', operand)
  }

  divide(operand: Operand<T>): void {
    this.apply('divide', operand)
  }

  plus(operand: Operand<T>): this {
    this.apply('plus', operand)
    return this
  }

  minus(operand: Operand<T>): this {
    this.apply('minus', operand)
    return this
  }

  times(operand: Operand<T>): this {
    this.apply('times', operand)
    return this
  }

  by(operand: Operand<T>): this {
    this.apply('by', operand)
    return this
  }

  equals(other: unknown): boolean {
    if (other instanceof OperableValue) return other.arithmetic === this.arithmetic && this.arithmetic.equals(this.current, other.current)
    return false
  }

  toString(): string {
    return String(this.current)
  }

  private apply(operation: OperationName, operand: Operand<T>): void {
    this.operate(KIND[operation], operation, requireOperand(operation, operand))
  }

  /** Apply a checked, non-null operand. `operation` is the name the caller used. */
  protected abstract operate(kind: OperationKind, operation: OperationName, operand: T): void
}

// ─── Free ───────────────────────────────────────────────────────────────────

export class FreeOperable<T> extends OperableValue<T> {
  readonly variant = 'free'

  protected operate(kind: OperationKind, _operation: OperationName, operand: T): void {
    const { arithmetic } = this
    if (kind === 'divide' && arithmetic.equals(operand, arithmetic.zero)) {
      throw new ArithmeticError()
    }
    this.current = arithmetic[kind](this.current, operand)
  }
}

// ─── Locked ─────────────────────────────────────────────────────────────────

export class LockedOperable<T> extends OperableValue<T> {
  readonly variant = 'locked'

  protected operate(kind: OperationKind, operation: OperationName, operand: T): void {
    const { arithmetic } = this
    const identity = kind === 'add' || kind === 'subtract' ? arithmetic.zero : arithmetic.one
    if (!arithmetic.equals(operand, identity)) {
      throw new InvariantViolationError(operation, operand)
    }
  }
}

// ─── Factories ──────────────────────────────────────────────────────────────

export function free<T>(arithmetic: Arithmetic<T>, value: T): FreeOperable<T> {
  return new FreeOperable(arithmetic, value)
}

export function locked<T>(arithmetic: Arithmetic<T>, value: T): LockedOperable<T> {
  return new LockedOperable(arithmetic, value)
}

export function freeNumber(value = 0): FreeOperable<number> {
  return free(numberArithmetic, value)
}

export function lockedNumber(value = 0): LockedOperable<number> {
  return locked(numberArithmetic, value)
}

export function isOperable(value: unknown): value is OperableValue<unknown> {
  return value instanceof OperableValue
}
