/**
 * Contextual chaining.
 *
 * A carrier owns a context value and is itself a Context, so a chain can
 * treat any link either as more context or as the context itself.
 *
 *   start → link* → subject → done
 *
 * A link step receives the carrier and returns either
 *   - the same carrier (context accumulated in place), or
 *   - a new open carrier (context replaced; the old one is superseded).
 * The subject call reads the final context and ends the chain. A failing
 * step marks the carrier failed and rethrows; no subject runs.
 */

import { resolveFlag } from '@lattice-kit/config'
import { ChainStateError, type ChainPhase } from './errors'
import { getLogger } from './logger'
import { Messages } from './messages'

export interface Context<C> {
  readonly context: C
}

export type ChainStep<C, S extends Contextual<C> = Contextual<C>> = (carrier: S) => Contextual<C>

let nextCarrierId = 1

export abstract class Contextual<C> implements Context<C> {
  readonly id = nextCarrierId++
  private current: ChainPhase = 'open'

  protected abstract getContext(): C

  get context(): C {
    return this.getContext()
  }

  get phase(): ChainPhase {
    return this.current
  }

  /** Run one chain transition. Returns the carrier the chain continues with. */
  link<S extends Contextual<C>>(step: (carrier: this) => S): S {
    this.requireOpen('link')
    let next: S
    try {
      next = step(this)
    } catch (error) {
      this.current = 'failed'
      trace('chain.fail', { carrier: this.id, error })
      throw error
    }

    // Covers `this` too: a step may have ended or replaced its own carrier.
    if (next.phase !== 'open') {
      const phase = next.phase
      this.current = 'failed'
      trace('chain.fail', { carrier: this.id, phase })
      throw new ChainStateError(phase, 'link', Messages.ChainLinkResult)
    }
    const self: Contextual<C> = this
    if (next !== self) this.current = 'superseded'
    trace('chain.link', { carrier: this.id, next: next.id, replaced: next !== self })
    return next
  }

  /** Run several transitions in order. */
  chain(...steps: ChainStep<C>[]): Contextual<C> {
    let carrier: Contextual<C> = this
    for (const step of steps) carrier = carrier.link(step)
    return carrier
  }

  /** In-place transition: mutate the context and keep this carrier. */
  update(mutate: (context: C) => void): this {
    return this.link((self) => {
      mutate(self.context)
      return self
    })
  }

  /** Replacing transition: continue with a new carrier around `transform(context)`. */
  derive(transform: (context: C) => C): Carrier<C> {
    return this.link(() => new Carrier(transform(this.context)))
  }

  /** Terminal transition: consume the final context and end the chain. */
  subject<R>(consume: (context: Readonly<C>) => R): R {
    this.requireOpen('subject')
    this.current = 'terminated'
    try {
      const result = consume(this.context)
      trace('chain.subject', { carrier: this.id })
      return result
    } catch (error) {
      this.current = 'failed'
      trace('chain.fail', { carrier: this.id, error })
      throw error
    }
  }

  private requireOpen(action: 'link' | 'subject'): void {
    if (this.current !== 'open') throw new ChainStateError(this.current, action)
  }
}

/** A carrier that simply holds its context value. */
export class Carrier<C> extends Contextual<C> {
  constructor(private readonly value: C) {
    super()
  }

  protected getContext(): C {
    return this.value
  }
}

/** Start a chain from `context`. */
export function carry<C>(context: C): Carrier<C> {
  return new Carrier(context)
}

export function isContextual(value: unknown): value is Contextual<unknown> {
  return value instanceof Contextual
}

function trace(event: string, fields: Record<string, unknown>): void {
  if (resolveFlag('TRACE_CHAINS')) getLogger().debug(event, fields)
}
