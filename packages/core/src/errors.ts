/**
 * Error taxonomy.
 *
 * All errors are raised synchronously and propagate to the direct caller.
 * Nothing in this package catches and recovers from them.
 */

import { Messages, colon } from './messages'

export type OperationName =
  | 'add' | 'subtract' | 'multiply' | 'divide'
  | 'plus' | 'minus' | 'times' | 'by'

/** An operation whose operand is not the identity a locked value requires. */
export class InvariantViolationError extends Error {
  constructor(
    public readonly operation: OperationName | 'declare',
    public readonly operand: unknown,
    reason: string = Messages.LockedValueInoperable,
  ) {
    super(`${colon(reason)}${operation}(${String(operand)})`)
    this.name = 'InvariantViolationError'
  }
}

/** A required operand was null or undefined. */
export class MissingArgumentError extends Error {
  constructor(public readonly operation: OperationName) {
    super(`${colon(Messages.MissingOperand)}${operation}`)
    this.name = 'MissingArgumentError'
  }
}

/** Division by zero and other undefined arithmetic. */
export class ArithmeticError extends Error {
  constructor(message: string = Messages.DivisionByZero) {
    super(message)
    this.name = 'ArithmeticError'
  }
}

export type ChainPhase = 'open' | 'superseded' | 'terminated' | 'failed'

/** A carrier was used after its chain moved on, ended or failed. */
export class ChainStateError extends Error {
  constructor(
    public readonly phase: ChainPhase,
    public readonly action: 'link' | 'subject',
    reason: string = Messages.ChainPhase,
  ) {
    super(`${colon(reason)}cannot ${action} a ${phase} carrier`)
    this.name = 'ChainStateError'
  }
}
