import { z } from 'zod'
import { readLogEnv, resolveFlags, type Env } from '@lapstat/config'

export const loggerSettingsSchema = z.object({
  /** ANSI colors per level; uncolored output spells the level out instead. */
  colored: z.boolean(),
  /** Prefix each line with a timestamp. */
  timed: z.boolean(),
  /** Seconds since the logger was created instead of the local time of day. */
  relativeTime: z.boolean(),
  scientific: z.boolean(),
  /** Fraction digits for non-integer numbers passed to write(). */
  precision: z.number().int().min(0).max(100),
  /** Minimum width of the "[name] " tag. */
  namePadding: z.number().int().min(0),
  /** Selects the active debug sink. */
  debug: z.boolean(),
})

export const loggerSettingsInputSchema = loggerSettingsSchema.partial().strict()

export type LoggerSettings = z.infer<typeof loggerSettingsSchema>
export type LoggerSettingsInput = z.input<typeof loggerSettingsInputSchema>

/** Environment-derived defaults overlaid with explicit settings. */
export function resolveLoggerSettings(input: LoggerSettingsInput = {}, env: Env = process.env): LoggerSettings {
  const overrides = loggerSettingsInputSchema.parse(input)
  const flags = resolveFlags(env)
  const logEnv = readLogEnv(env)
  return loggerSettingsSchema.parse({
    colored: flags.LOG_COLOR,
    timed: flags.LOG_TIMED,
    relativeTime: flags.LOG_RELATIVE_TIME,
    scientific: flags.LOG_SCIENTIFIC,
    precision: logEnv.LOG_PRECISION,
    namePadding: logEnv.LOG_NAME_PADDING,
    debug: flags.DEBUG_LOG,
    ...overrides,
  })
}
