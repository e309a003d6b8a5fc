/**
 * Chain composition tests, including the end-to-end additive scenario over
 * free and locked operable contexts.
 */

import { describe, test, expect, vi, afterEach } from 'vitest'
import fc from 'fast-check'
import { setOverride, clearAllOverrides } from '@lattice-kit/config'
import {
  carry, Carrier, Contextual, isContextual,
  freeNumber, lockedNumber,
  ChainStateError, InvariantViolationError,
  createLogger, setLogger,
  checkChainTermination,
} from '../index'
import type { ChainStep, FreeOperable, Operable } from '../index'

afterEach(() => {
  clearAllOverrides()
  setLogger(null)
})

// ─── Helpers ────────────────────────────────────────────────────────────────

/** In-place link: adds to the operable context and keeps the carrier. */
const addInPlace = (n: number): ChainStep<Operable<number>> => (carrier) =>
  carrier.update((context) => context.add(n))

/** Replacing link: a new carrier holding a new, larger operable. */
const addReplacing = (n: number): ChainStep<Operable<number>> => (carrier) =>
  carrier.derive((context) => freeNumber(context.value).plus(n))

const sum = (context: Readonly<Operable<number>>): number => context.value

/** A carrier whose context is a running list of visited names. */
class Trail extends Contextual<string[]> {
  private readonly names: string[] = []

  protected getContext(): string[] {
    return this.names
  }

  visit(name: string): this {
    return this.update((names) => names.push(name))
  }
}

// ─── End-to-End ─────────────────────────────────────────────────────────────

describe('end-to-end: 0 +2 +3 +5', () => {
  test('free context sums to 10', () => {
    const result = carry<Operable<number>>(freeNumber(0))
      .chain(addInPlace(2), addInPlace(3), addInPlace(5))
      .subject(sum)
    expect(result).toBe(10)
  })

  test('locked context fails at the +5 link and never runs the subject', () => {
    const subject = vi.fn(sum)
    const start = carry<Operable<number>>(lockedNumber(0))
    const first = start.link(addInPlace(0))
    const second = first.link(addInPlace(0))

    expect(() => second.link(addInPlace(5)).subject(subject)).toThrow(InvariantViolationError)
    expect(subject).not.toHaveBeenCalled()
    expect(second.phase).toBe('failed')
    expect(second.context.value).toBe(0)
  })

  test('locked context fails at the first non-zero link', () => {
    const subject = vi.fn(sum)
    const steps = [addInPlace(2), addInPlace(3), addInPlace(5)]
    const spies = steps.map((s) => vi.fn(s))
    expect(() => carry<Operable<number>>(lockedNumber(0)).chain(...spies).subject(subject))
      .toThrow('Locked value is inoperable: add(2)')
    expect(spies[0]).toHaveBeenCalledTimes(1)
    expect(spies[1]).not.toHaveBeenCalled()
    expect(subject).not.toHaveBeenCalled()
  })
})

// ─── Transitions ────────────────────────────────────────────────────────────

describe('chain transitions', () => {
  test('in-place links keep the carrier open', () => {
    const trail = new Trail()
    const same = trail.visit('a').visit('b')
    expect(same).toBe(trail)
    expect(trail.phase).toBe('open')
    expect(trail.subject((names) => names.join('>'))).toBe('a>b')
    expect(trail.phase).toBe('terminated')
  })

  test('replacing links supersede the old carrier', () => {
    const start = carry(2)
    const next = start.derive((n) => n * 10)
    expect(next).not.toBe(start)
    expect(next).toBeInstanceOf(Carrier)
    expect(start.phase).toBe('superseded')
    expect(next.phase).toBe('open')
    expect(next.subject((n) => n + 1)).toBe(21)
  })

  test('a carrier is itself a context', () => {
    const inner = carry('inner')
    const outer = carry(inner)
    expect(outer.context.context).toBe('inner')
    expect(isContextual(outer.context)).toBe(true)
    expect(isContextual({ context: 1 })).toBe(false)
  })

  test('the subject reads the final context', () => {
    const result = carry(1)
      .derive((n) => n + 1)
      .derive((n) => n * 3)
      .subject((n) => `final:${n}`)
    expect(result).toBe('final:6')
  })

  test('custom links may return any fresh carrier', () => {
    const start = carry<number[]>([1])
    const next = start.link((c) => carry([...c.context, 2]))
    expect(next.context).toEqual([1, 2])
    expect(start.context).toEqual([1])
  })
})

// ─── Termination and Failure ────────────────────────────────────────────────

describe('chain phases', () => {
  test('a terminated carrier cannot be linked or re-subjected', () => {
    const c = carry(1)
    c.subject((n) => n)
    expect(() => c.link((x) => x)).toThrow(ChainStateError)
    expect(() => c.subject((n) => n)).toThrow('Chain is no longer open: cannot subject a terminated carrier')
  })

  test('a superseded carrier cannot continue', () => {
    const start = carry(1)
    start.derive((n) => n + 1)
    expect(() => start.derive((n) => n + 2)).toThrow('cannot link a superseded carrier')
  })

  test('a link returning a closed carrier fails the chain', () => {
    const closed = carry(9)
    closed.subject((n) => n)
    const start = carry(1)
    expect(() => start.link(() => closed)).toThrow(
      'A chain link must return an open carrier: cannot link a terminated carrier',
    )
    expect(start.phase).toBe('failed')
  })

  test('a link that ends its own carrier fails the chain', () => {
    const start = carry(1)
    expect(() => start.link((self) => {
      self.subject((n) => n)
      return self
    })).toThrow('A chain link must return an open carrier: cannot link a terminated carrier')
    expect(start.phase).toBe('failed')
  })

  test('a link that replaces its own carrier but returns it fails the chain', () => {
    const start = carry(1)
    expect(() => start.link((self) => {
      self.derive((n) => n + 1)
      return self
    })).toThrow('A chain link must return an open carrier: cannot link a superseded carrier')
    expect(start.phase).toBe('failed')
  })

  test('a failing link aborts and propagates the original error', () => {
    const boom = new Error('boom')
    const start = carry(1)
    expect(() => start.link(() => { throw boom })).toThrow(boom)
    expect(start.phase).toBe('failed')
    expect(() => start.subject((n) => n)).toThrow(ChainStateError)
  })

  test('a failing subject marks the carrier failed', () => {
    const c = carry(1)
    expect(() => c.subject(() => { throw new Error('nope') })).toThrow('nope')
    expect(c.phase).toBe('failed')
  })
})

// ─── Laws ───────────────────────────────────────────────────────────────────

describe('chain termination law', () => {
  test('in-place and replacing chains agree on equal final state', () => {
    fc.assert(fc.property(
      fc.integer({ min: -100, max: 100 }),
      fc.array(fc.integer({ min: -100, max: 100 }), { maxLength: 10 }),
      (start, deltas) => checkChainTermination<Operable<number>, number>(
        () => freeNumber(start),
        deltas.map(addInPlace),
        deltas.map(addReplacing),
        sum,
      ),
    ))
  })

  test('result equals the plain sum', () => {
    fc.assert(fc.property(
      fc.array(fc.integer({ min: -100, max: 100 }), { maxLength: 10 }),
      (deltas) => {
        const total = carry<FreeOperable<number>>(freeNumber(0))
          .chain(...deltas.map((d): ChainStep<FreeOperable<number>> => (c) => c.update((v) => v.add(d))))
          .subject((v) => v.value)
        return total === deltas.reduce((a, b) => a + b, 0)
      },
    ))
  })
})

// ─── Tracing ────────────────────────────────────────────────────────────────

describe('tracing', () => {
  test('logs each transition at debug when TRACE_CHAINS is on', () => {
    const events: string[] = []
    setLogger(createLogger({ level: 'debug', sink: (line) => events.push(JSON.parse(line).event) }))
    setOverride('TRACE_CHAINS', true)

    const start = carry(1)
    start.derive((n) => n + 1).subject((n) => n)
    expect(() => carry(1).link(() => { throw new Error('x') })).toThrow('x')

    expect(events).toEqual(['chain.link', 'chain.subject', 'chain.fail'])
  })

  test('stays below the default info threshold even with TRACE_CHAINS on', () => {
    const sink = vi.fn()
    setLogger(createLogger({ level: 'info', sink }))
    setOverride('TRACE_CHAINS', true)
    carry(1).derive((n) => n + 1).subject((n) => n)
    expect(sink).not.toHaveBeenCalled()
  })

  test('is silent by default', () => {
    const sink = vi.fn()
    setLogger(createLogger({ level: 'debug', sink }))
    setOverride('TRACE_CHAINS', false)
    carry(1).derive((n) => n).subject((n) => n)
    expect(sink).not.toHaveBeenCalled()
  })
})
