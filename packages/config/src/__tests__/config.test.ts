import { describe, it, expect, afterEach } from 'vitest'
import {
  resolveFlag,
  resolveFlags,
  readEnvFlag,
  setOverride,
  clearOverride,
  clearAllOverrides,
  readOverrides,
  DEFAULT_FLAGS,
  resolveSettings,
} from '../index'

afterEach(() => {
  clearAllOverrides()
})

// ─── Flags ──────────────────────────────────────────────────────────────────

describe('readEnvFlag', () => {
  it('reads true/1 and false/0', () => {
    expect(readEnvFlag('X', { X: 'true' })).toBe(true)
    expect(readEnvFlag('X', { X: '1' })).toBe(true)
    expect(readEnvFlag('X', { X: 'false' })).toBe(false)
    expect(readEnvFlag('X', { X: '0' })).toBe(false)
  })

  it('ignores anything else', () => {
    expect(readEnvFlag('X', { X: 'yes' })).toBeUndefined()
    expect(readEnvFlag('X', {})).toBeUndefined()
  })
})

describe('resolveFlag', () => {
  it('falls back to defaults', () => {
    expect(resolveFlags({})).toEqual(DEFAULT_FLAGS)
  })

  it('reads LATTICE_ prefixed env vars', () => {
    expect(resolveFlag('TRACE_CHAINS', { LATTICE_TRACE_CHAINS: 'true' })).toBe(true)
    expect(resolveFlag('TRACE_TYPES', { LATTICE_TRACE_CHAINS: 'true' })).toBe(false)
  })

  it('prefers overrides to env', () => {
    setOverride('TRACE_CHAINS', false)
    expect(resolveFlag('TRACE_CHAINS', { LATTICE_TRACE_CHAINS: '1' })).toBe(false)
    clearOverride('TRACE_CHAINS')
    expect(resolveFlag('TRACE_CHAINS', { LATTICE_TRACE_CHAINS: '1' })).toBe(true)
  })

  it('readOverrides returns a copy', () => {
    setOverride('TRACE_TYPES', true)
    const copy = readOverrides()
    copy.TRACE_TYPES = false
    expect(readOverrides()).toEqual({ TRACE_TYPES: true })
  })

  it('clearAllOverrides drops every override', () => {
    setOverride('TRACE_TYPES', true)
    setOverride('TRACE_CHAINS', true)
    clearAllOverrides()
    expect(readOverrides()).toEqual({})
  })
})

// ─── Settings ───────────────────────────────────────────────────────────────

describe('resolveSettings', () => {
  it('defaults log level to info', () => {
    expect(resolveSettings({})).toEqual({ logLevel: 'info' })
    expect(resolveSettings({ LATTICE_LOG_LEVEL: '' })).toEqual({ logLevel: 'info' })
  })

  it('accepts any case', () => {
    expect(resolveSettings({ LATTICE_LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug')
  })

  it('names the variable when invalid', () => {
    expect(() => resolveSettings({ LATTICE_LOG_LEVEL: 'loud' })).toThrow(
      'Invalid environment variable: LATTICE_LOG_LEVEL. Expected one of debug|info|warn|error|silent.',
    )
  })
})
