/**
 * Numeric logging options read from the environment.
 *
 * Unset variables fall back to their defaults; a set variable that is not a
 * non-negative integer throws immediately rather than failing later inside
 * a formatter.
 */

import { ENV_PREFIX, type Env } from './flags'

export function optional(key: string, fallback: string, env: Env = process.env): string {
  return env[key] ?? fallback
}

function nonNegativeInt(key: string, fallback: number, env: Env): number {
  const raw = optional(key, String(fallback), env)
  const val = Number(raw)
  if (!Number.isInteger(val) || val < 0) {
    throw new Error(
      `Invalid environment variable ${key}: expected a non-negative integer, got "${raw}".`,
    )
  }
  return val
}

export interface LogEnv {
  LOG_PRECISION: number
  LOG_NAME_PADDING: number
}

export const DEFAULT_LOG_ENV: LogEnv = {
  LOG_PRECISION: 3,
  LOG_NAME_PADDING: 20,
}

export function readLogEnv(env: Env = process.env): LogEnv {
  return {
    LOG_PRECISION: nonNegativeInt(`${ENV_PREFIX}LOG_PRECISION`, DEFAULT_LOG_ENV.LOG_PRECISION, env),
    LOG_NAME_PADDING: nonNegativeInt(`${ENV_PREFIX}LOG_NAME_PADDING`, DEFAULT_LOG_ENV.LOG_NAME_PADDING, env),
  }
}
