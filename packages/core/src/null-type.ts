/**
 * Reflective-type capability set and its null object.
 *
 * A narrow local view of a type model: callers adapt whatever reflection
 * facility they have (decorator metadata, schema introspection) to this
 * shape at their boundary.
 */

export type TypeKind =
  | 'boolean' | 'number' | 'bigint' | 'string' | 'symbol'
  | 'array' | 'object' | 'function' | 'null' | 'void' | 'none'

export interface AnnotationMirror {
  readonly annotationType: string
  readonly values: Readonly<Record<string, unknown>>
}

/** Visitor over reflective types; P is an extra parameter threaded through. */
export interface TypeVisitor<R, P> {
  visit(type: ReflectiveType, param: P): R
}

export interface ReflectiveType {
  accept<R, P>(visitor: TypeVisitor<R, P>, param: P): R | null
  getAnnotation(annotationType: string): AnnotationMirror | null
  getAnnotationMirrors(): readonly AnnotationMirror[]
  getAnnotationsByType(annotationType: string): readonly AnnotationMirror[]
  getKind(): TypeKind | null
}

const NO_ANNOTATIONS: readonly AnnotationMirror[] = Object.freeze([])

/** The null reflective type: visiting yields null, it has no annotations and no kind. */
export const NULL_REFLECTIVE_TYPE: ReflectiveType = Object.freeze({
  accept: () => null,
  getAnnotation: () => null,
  getAnnotationMirrors: () => NO_ANNOTATIONS,
  getAnnotationsByType: () => NO_ANNOTATIONS,
  getKind: () => null,
})
