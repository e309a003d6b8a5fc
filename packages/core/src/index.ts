/**
 * @lattice-kit/core — cross-cutting capability abstractions
 *
 * Type relation:   hierarchy-aware `is`, AbsentType
 * Operability:     free and locked operable values, fractions
 * Null objects:    node, reflective-type and element defaults
 * Contextual:      context-carrying chains ending in a subject call
 */

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  InvariantViolationError, MissingArgumentError, ArithmeticError, ChainStateError,
  type OperationName, type ChainPhase,
} from './errors'

export { Messages, colon, type MessageKey } from './messages'

// ─── Logging ────────────────────────────────────────────────────────────────
export {
  createLogger, getLogger, setLogger,
  type Logger, type LoggerOptions, type LogSink, type LogFields, type EntryLevel,
} from './logger'

// ─── Type Relation ──────────────────────────────────────────────────────────
export {
  TypeHierarchy,
  type TypeDescriptor, type DeclareOptions, type Guard,
} from './type-relation'

export {
  AbsentType, isAbsent,
  ABSENT_NODE, NullNode, NullElement,
  isNullObject, nodeOrNull, elementOrNull, reflectiveOrNull,
  type AbsentTypeDescriptor, type AbsentNode,
} from './absent'

// ─── Operability ────────────────────────────────────────────────────────────
export {
  OperableValue, FreeOperable, LockedOperable,
  free, locked, freeNumber, lockedNumber, isOperable,
  numberArithmetic,
  type Arithmetic, type Operable, type Operand, type OperableVariant, type OperationKind,
} from './operable'

export { Fraction, fractionArithmetic, freeFraction, lockedFraction } from './fraction'

// ─── Null Objects ───────────────────────────────────────────────────────────
export {
  NULL_NODE, EMPTY_NODE_LIST,
  type DocumentNode, type NodeListLike, type NamedNodeMapLike, type UserDataHandler,
} from './null-node'

export {
  NULL_REFLECTIVE_TYPE,
  type ReflectiveType, type TypeVisitor, type AnnotationMirror, type TypeKind,
} from './null-type'

export {
  NULL_ELEMENT,
  type AbsentElement, type CharSequence, type JsonElement, type XmlElement, type Element, type ElementValueType,
} from './null-element'

// ─── Contextual ─────────────────────────────────────────────────────────────
export {
  Contextual, Carrier, carry, isContextual,
  type Context, type ChainStep,
} from './contextual'

// ─── Laws ───────────────────────────────────────────────────────────────────
export {
  checkReflexivity, checkTransitivity, checkAbsentExclusion,
  checkLockedOperation, checkLockedIdentity, checkLockedMultiplicative,
  checkTotality, checkChainTermination,
  structuralEquals,
} from './laws'
