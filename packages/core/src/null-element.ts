/**
 * Element capability sets for JSON-like and XML-like documents.
 *
 * Both are character sequences over their source text; a JSON element also
 * knows its span and value type, an XML element its underlying node.
 */

import type { DocumentNode } from './null-node'
import { NULL_REFLECTIVE_TYPE, type ReflectiveType } from './null-type'

export type ElementValueType =
  | 'array' | 'double' | 'false' | 'integer' | 'null'
  | 'object' | 'scientific' | 'string' | 'true'

export interface CharSequence {
  readonly length: number
  charAt(index: number): string
  subSequence(start: number, end: number): string
}

export interface JsonElement extends CharSequence {
  /** Offset of the first character in the source text. */
  readonly start: number
  /** Offset just past the last character. */
  readonly end: number
  readonly valueType: ElementValueType | null
  object(): unknown
}

export interface XmlElement extends CharSequence {
  object(): DocumentNode | null
}

/** Satisfies both element sets at once. */
export type Element = JsonElement & XmlElement

export type AbsentElement = ReflectiveType & Element

const emptyElement: Element = {
  length: 0,
  start: 0,
  end: 0,
  valueType: null,
  charAt: () => '',
  subSequence: () => '',
  object: () => null,
}

/**
 * The null element. One instance answers the JSON, XML and reflective-type
 * sets, so both element kinds share it.
 */
export const NULL_ELEMENT: AbsentElement = Object.freeze({ ...emptyElement, ...NULL_REFLECTIVE_TYPE })
