/**
 * Type relation: reflexive, transitive `is` comparison over a declared hierarchy.
 *
 *   a.is(b)  ⇔  b is a, or b is a (direct or transitive) subtype of a
 *
 * Laws:
 *   1. Reflexivity:  t.is(t)
 *   2. Transitivity: a.is(b) ∧ b.is(c) ⇒ a.is(c)
 *   3. Absence:      t.is(AbsentType) ⇔ t = AbsentType
 *
 * Descriptors are immutable. Each one records its full ancestor set when it
 * is declared, and supertypes must exist first, so the hierarchy is acyclic
 * and `is` is a set lookup.
 */

import { resolveFlag } from '@lattice-kit/config'
import { AbsentType, isAbsent } from './absent'
import { InvariantViolationError } from './errors'
import { getLogger } from './logger'
import { Messages } from './messages'

// ─── Descriptor ─────────────────────────────────────────────────────────────

/**
 * A reifiable type. T only appears in `matches`, so a descriptor of a
 * subtype is assignable wherever a descriptor of its supertype is expected.
 */
export interface TypeDescriptor<T> {
  readonly name: string
  readonly supertypes: readonly TypeDescriptor<unknown>[]
  /** True iff `candidate` is this type or one of its declared subtypes. */
  is(candidate: TypeDescriptor<T>): boolean
  /** Runtime check that a value belongs to this type. */
  matches(value: unknown): value is T
}

export type Guard<T> = (value: unknown) => value is T

export interface DeclareOptions<T> {
  extends?: readonly TypeDescriptor<unknown>[]
  guard?: Guard<T>
}

class DeclaredType<T> implements TypeDescriptor<T> {
  readonly ancestors: ReadonlySet<TypeDescriptor<unknown>>

  constructor(
    readonly hierarchy: TypeHierarchy,
    readonly name: string,
    readonly supertypes: readonly TypeDescriptor<unknown>[],
    private readonly guard: Guard<T> | undefined,
  ) {
    const ancestors = new Set<TypeDescriptor<unknown>>()
    for (const parent of supertypes) {
      ancestors.add(parent)
      if (parent instanceof DeclaredType) {
        for (const a of parent.ancestors) ancestors.add(a)
      }
    }
    this.ancestors = ancestors
    Object.freeze(this.supertypes)
    Object.freeze(this)
  }

  is(candidate: TypeDescriptor<T>): boolean {
    if (candidate === this) return true
    return candidate instanceof DeclaredType && candidate.ancestors.has(this)
  }

  matches(value: unknown): value is T {
    return this.guard !== undefined && this.guard(value)
  }

  toString(): string {
    return this.name
  }
}

// ─── Hierarchy ──────────────────────────────────────────────────────────────

/** Owns a set of uniquely named descriptors. */
export class TypeHierarchy {
  private readonly byName = new Map<string, DeclaredType<unknown>>()

  constructor(readonly label = 'types') {}

  /**
   * Declare a new type below `options.extends`.
   * @throws InvariantViolationError on a duplicate name or a supertype from another hierarchy
   */
  declare<T = unknown>(name: string, options: DeclareOptions<T> = {}): TypeDescriptor<T> {
    if (this.byName.has(name)) {
      throw new InvariantViolationError('declare', name, Messages.DuplicateType)
    }
    const supertypes = [...(options.extends ?? [])]
    for (const parent of supertypes) {
      if (!(parent instanceof DeclaredType) || parent.hierarchy !== this) {
        throw new InvariantViolationError('declare', parent.name, Messages.ForeignSupertype)
      }
    }

    const descriptor = new DeclaredType<T>(this, name, supertypes, options.guard)
    this.byName.set(name, descriptor)

    if (resolveFlag('TRACE_TYPES')) {
      getLogger().debug('type.declare', {
        hierarchy: this.label,
        name,
        supertypes: supertypes.map((s) => s.name),
      })
    }
    return descriptor
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }

  /** The descriptor named `name`, or AbsentType. */
  get(name: string): TypeDescriptor<unknown> {
    return this.byName.get(name) ?? AbsentType
  }

  /** All descriptors in declaration order. */
  types(): readonly TypeDescriptor<unknown>[] {
    return [...this.byName.values()]
  }

  /** Every proper subtype of `type`, in declaration order. */
  subtypesOf(type: TypeDescriptor<unknown>): readonly TypeDescriptor<unknown>[] {
    return this.types().filter((d) => d !== type && type.is(d))
  }

  /** Every proper supertype of `type` (transitive), in declaration order. */
  supertypesOf(type: TypeDescriptor<unknown>): readonly TypeDescriptor<unknown>[] {
    return this.types().filter((d) => d !== type && d.is(type))
  }

  /**
   * The most specific type that both `a` and `b` are. AbsentType when they
   * share none, or when either is AbsentType.
   */
  leastCommonSupertype(a: TypeDescriptor<unknown>, b: TypeDescriptor<unknown>): TypeDescriptor<unknown> {
    if (isAbsent(a) || isAbsent(b)) return AbsentType
    const common = this.types().filter((s) => s.is(a) && s.is(b))
    // A most specific candidate is one no other candidate sits below.
    const best = common.find((s) => !common.some((o) => o !== s && s.is(o)))
    return best ?? AbsentType
  }
}
