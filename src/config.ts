/**
 * Environment configuration for the shared agent.
 */

import type { LogLevel } from './providers/logger/console.js'
import { LogLevelSchema } from './schemas.js'

/** Environment variable selecting the shared agent's log level */
export const LOG_LEVEL_ENV = 'DELIBERATE_LOG_LEVEL'

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

/**
 * Read the log level from the environment; unknown values fall back to the default
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase()
  if (!raw) return DEFAULT_LOG_LEVEL

  const parsed = LogLevelSchema.safeParse(raw)
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL
}
