import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, getLogger, setLogger, colon, Messages, ArithmeticError } from '../index'

const epoch = () => new Date(0)

afterEach(() => {
  setLogger(null)
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('writes one JSON line per entry', () => {
    const lines: string[] = []
    const log = createLogger({ level: 'info', sink: (l) => lines.push(l), clock: epoch })
    log.info('start', { n: 1 })
    expect(lines).toEqual(['{"ts":"1970-01-01T00:00:00.000Z","level":"info","event":"start","n":1}'])
  })

  it('drops entries below the threshold', () => {
    const lines: string[] = []
    const log = createLogger({ level: 'warn', sink: (l) => lines.push(l), clock: epoch })
    log.debug('a')
    log.info('b')
    log.warn('c')
    log.error('d')
    expect(lines.map((l) => JSON.parse(l).event)).toEqual(['c', 'd'])
  })

  it('silent drops everything', () => {
    const sink = vi.fn()
    const log = createLogger({ level: 'silent', sink })
    log.error('x')
    expect(sink).not.toHaveBeenCalled()
  })

  it('child loggers carry bindings', () => {
    const lines: string[] = []
    const log = createLogger({ level: 'debug', sink: (l) => lines.push(l), clock: epoch })
      .child({ component: 'chain' })
    log.debug('link', { carrier: 3 })
    expect(lines).toEqual([
      '{"ts":"1970-01-01T00:00:00.000Z","level":"debug","event":"link","component":"chain","carrier":3}',
    ])
  })

  it('serializes errors and bigints', () => {
    const lines: string[] = []
    const log = createLogger({ level: 'error', sink: (l) => lines.push(l), clock: epoch })
    log.error('fail', { error: new ArithmeticError(), big: 10n })
    expect(lines).toEqual([
      '{"ts":"1970-01-01T00:00:00.000Z","level":"error","event":"fail","error":{"name":"ArithmeticError","message":"Division by zero"},"big":"10"}',
    ])
  })

  it('defaults to stdout', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    createLogger({ level: 'info', clock: epoch }).info('hello')
    expect(write).toHaveBeenCalledWith('{"ts":"1970-01-01T00:00:00.000Z","level":"info","event":"hello"}\n')
  })
})

describe('shared logger', () => {
  it('can be replaced and reset', () => {
    const custom = createLogger({ level: 'silent' })
    setLogger(custom)
    expect(getLogger()).toBe(custom)
    setLogger(null)
    expect(getLogger()).not.toBe(custom)
  })
})

describe('colon', () => {
  it('normalises message prefixes', () => {
    expect(colon('Denied')).toBe('Denied: ')
    expect(colon('Denied:')).toBe('Denied: ')
    expect(colon('Denied: ')).toBe('Denied: ')
    expect(colon('')).toBe('')
    expect(colon(null)).toBe('')
    expect(colon(Messages.DivisionByZero)).toBe('Division by zero: ')
  })
})
