/**
 * Environment settings, validated with zod.
 *
 * Unlike flags, settings carry a value other than on/off. A malformed value
 * throws immediately with the variable's name in the message.
 */

import { z } from 'zod'
import { ENV_PREFIX } from './flags'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export const logLevelSchema = z.enum(LOG_LEVELS)

export type LogLevel = z.infer<typeof logLevelSchema>

export const settingsSchema = z.object({
  logLevel: logLevelSchema.default('info'),
})

export type Settings = z.infer<typeof settingsSchema>

function optional(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const val = env[`${ENV_PREFIX}${key}`]
  return val === undefined || val === '' ? undefined : val.trim().toLowerCase()
}

/** Read and validate settings from the environment. */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse({
    logLevel: optional(env, 'LOG_LEVEL'),
  })
  if (!result.success) {
    const fields = Object.keys(result.error.flatten().fieldErrors)
    throw new Error(
      `Invalid environment variable: ${fields.map(toEnvName).join(', ')}. ` +
      `Expected one of ${LOG_LEVELS.join('|')}.`,
    )
  }
  return result.data
}

function toEnvName(field: string): string {
  return ENV_PREFIX + field.replace(/([A-Z])/g, '_$1').toUpperCase()
}
