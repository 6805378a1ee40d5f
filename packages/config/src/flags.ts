/** Runtime flags for logging and instrumentation. */
export interface Flags {
  DEBUG_LOG: boolean
  LOG_COLOR: boolean
  LOG_TIMED: boolean
  LOG_RELATIVE_TIME: boolean
  LOG_SCIENTIFIC: boolean
}

export type FlagKey = keyof Flags

/** All flag keys for iteration. */
export const FLAG_KEYS: FlagKey[] = [
  'DEBUG_LOG',
  'LOG_COLOR',
  'LOG_TIMED',
  'LOG_RELATIVE_TIME',
  'LOG_SCIENTIFIC',
]

/** Default flag values — debug output off, colored untimed logs. */
export const DEFAULT_FLAGS: Flags = {
  DEBUG_LOG: false,
  LOG_COLOR: true,
  LOG_TIMED: false,
  LOG_RELATIVE_TIME: false,
  LOG_SCIENTIFIC: false,
}

export const ENV_PREFIX = 'LAPSTAT_'

export type Env = Record<string, string | undefined>

export function readEnvFlag(key: string, env: Env = process.env): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

/** Resolve a single flag: env override > default. */
export function resolveFlag(key: FlagKey, env: Env = process.env): boolean {
  return readEnvFlag(`${ENV_PREFIX}${key}`, env) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag against the given environment. */
export function resolveFlags(env: Env = process.env): Flags {
  const resolved: Flags = { ...DEFAULT_FLAGS }
  for (const key of FLAG_KEYS) {
    resolved[key] = resolveFlag(key, env)
  }
  return resolved
}
