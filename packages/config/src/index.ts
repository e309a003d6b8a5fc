// Shared configuration: feature flags and validated environment settings.

export {
  resolveFlag,
  resolveFlags,
  readEnvFlag,
  setOverride,
  clearOverride,
  clearAllOverrides,
  readOverrides,
  DEFAULT_FLAGS,
  FEATURE_FLAG_KEYS,
  ENV_PREFIX,
  type FeatureFlags,
  type FeatureFlagKey,
} from './flags'

export {
  resolveSettings,
  settingsSchema,
  logLevelSchema,
  LOG_LEVELS,
  type LogLevel,
  type Settings,
} from './settings'
