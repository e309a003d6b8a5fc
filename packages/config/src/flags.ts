/**
 * Feature flags for optional diagnostics.
 *
 * Trace events are logged at `debug`, and the default log level is `info`:
 * set `LATTICE_LOG_LEVEL=debug` as well, or a trace flag prints nothing.
 */
export interface FeatureFlags {
  /** Log each chain link, subject and failure (`chain.*` events). */
  TRACE_CHAINS: boolean
  /** Log each type declaration (`type.declare` events). */
  TRACE_TYPES: boolean
}

export type FeatureFlagKey = keyof FeatureFlags

/** All flag keys for iteration. */
export const FEATURE_FLAG_KEYS: FeatureFlagKey[] = [
  'TRACE_CHAINS',
  'TRACE_TYPES',
]

/** Default flag values — tracing is off unless asked for. */
export const DEFAULT_FLAGS: FeatureFlags = {
  TRACE_CHAINS: false,
  TRACE_TYPES: false,
}

export const ENV_PREFIX = 'LATTICE_'

export function readEnvFlag(key: string, env: NodeJS.ProcessEnv = process.env): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

// Process-local overrides, mostly for tests and embedding hosts.
const overrides: Partial<FeatureFlags> = {}

export function readOverrides(): Partial<FeatureFlags> {
  return { ...overrides }
}

/** Override a flag for the rest of the process (or until cleared). */
export function setOverride(key: FeatureFlagKey, value: boolean): void {
  overrides[key] = value
}

/** Remove a flag override (revert to env/default). */
export function clearOverride(key: FeatureFlagKey): void {
  delete overrides[key]
}

/** Clear all flag overrides. */
export function clearAllOverrides(): void {
  for (const key of FEATURE_FLAG_KEYS) delete overrides[key]
}

/** Resolve a single flag: override > env > default. */
export function resolveFlag(key: FeatureFlagKey, env: NodeJS.ProcessEnv = process.env): boolean {
  const override = overrides[key]
  if (override !== undefined) return override
  return readEnvFlag(`${ENV_PREFIX}${key}`, env) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag at once. */
export function resolveFlags(env: NodeJS.ProcessEnv = process.env): FeatureFlags {
  return {
    TRACE_CHAINS: resolveFlag('TRACE_CHAINS', env),
    TRACE_TYPES: resolveFlag('TRACE_TYPES', env),
  }
}
