/**
 * Absence as a value.
 *
 * AbsentType is the terminal type descriptor: it is only itself, matches no
 * value, and doubles as a null reflective type. The composite null objects
 * (ABSENT_NODE, NULL_ELEMENT) satisfy the reflective-type set together with
 * a node or element set, for places where one absent value must stand in
 * for both. They carry no data, so every construction path returns the
 * same shared instance.
 */

import type { TypeDescriptor } from './type-relation'
import { NULL_REFLECTIVE_TYPE, type ReflectiveType } from './null-type'
import { NULL_NODE, type DocumentNode } from './null-node'
import { NULL_ELEMENT, type AbsentElement, type JsonElement, type XmlElement } from './null-element'

// ─── Composites ─────────────────────────────────────────────────────────────

export type AbsentNode = ReflectiveType & DocumentNode

export const ABSENT_NODE: AbsentNode = Object.freeze({ ...NULL_NODE, ...NULL_REFLECTIVE_TYPE })

export const NullNode = {
  /** The absent stand-in for `node`; always ABSENT_NODE. */
  of(_node?: DocumentNode | null): AbsentNode {
    return ABSENT_NODE
  },
} as const

export const NullElement = {
  /** The absent stand-in for a JSON or XML element; always NULL_ELEMENT. */
  of(_element?: JsonElement | XmlElement | null): AbsentElement {
    return NULL_ELEMENT
  },
} as const

// ─── Absent Type ────────────────────────────────────────────────────────────

export interface AbsentTypeDescriptor extends TypeDescriptor<never>, ReflectiveType {
  /** True only for AbsentType itself. Accepts any descriptor. */
  is(candidate: TypeDescriptor<unknown>): boolean
  fromNode(node?: DocumentNode | null): AbsentNode
  fromElement(element?: JsonElement | XmlElement | null): AbsentElement
}

export const AbsentType: AbsentTypeDescriptor = Object.freeze({
  ...NULL_REFLECTIVE_TYPE,
  name: 'absent',
  supertypes: Object.freeze([]),
  is: (candidate: TypeDescriptor<unknown>) => candidate === AbsentType,
  matches: (_value: unknown): _value is never => false,
  fromNode: NullNode.of,
  fromElement: NullElement.of,
})

export function isAbsent(value: unknown): boolean {
  return value === AbsentType
}

// ─── Boundary Helpers ───────────────────────────────────────────────────────

const NULL_OBJECTS: ReadonlySet<unknown> = new Set<unknown>([
  AbsentType,
  ABSENT_NODE,
  NULL_ELEMENT,
  NULL_NODE,
  NULL_REFLECTIVE_TYPE,
])

/** True for the package's shared null objects. */
export function isNullObject(value: unknown): boolean {
  return NULL_OBJECTS.has(value)
}

/** `node`, or NULL_NODE when there is none. */
export function nodeOrNull(node: DocumentNode | null | undefined): DocumentNode {
  return node ?? NULL_NODE
}

/** `element`, or NULL_ELEMENT when there is none. */
export function elementOrNull<E extends JsonElement | XmlElement>(element: E | null | undefined): E | AbsentElement {
  return element ?? NULL_ELEMENT
}

/** `type`, or NULL_REFLECTIVE_TYPE when there is none. */
export function reflectiveOrNull(type: ReflectiveType | null | undefined): ReflectiveType {
  return type ?? NULL_REFLECTIVE_TYPE
}
