/** Shared error message vocabulary. */

export const Messages = {
  ChainPhase: 'Chain is no longer open',
  ChainLinkResult: 'A chain link must return an open carrier',
  DivisionByZero: 'Division by zero',
  DuplicateType: 'Type is already declared',
  ForeignSupertype: 'Supertype belongs to another hierarchy',
  FractionOverflow: 'Fraction terms exceed the safe integer range',
  InvalidFraction: 'Fraction terms must be integers',
  LockedValueInoperable: 'Locked value is inoperable',
  MissingOperand: 'Operand cannot be null',
  ZeroDenominator: 'Denominator is zero',
  ZeroNumerator: 'Numerator is zero',
} as const

export type MessageKey = keyof typeof Messages

/**
 * Normalise a message so it can prefix details: "msg" → "msg: ".
 * An absent message becomes the empty string.
 */
export function colon(msg: string | null | undefined): string {
  if (!msg) return ''
  if (msg.endsWith(': ')) return msg
  if (msg.endsWith(':')) return msg + ' '
  return msg + ': '
}
