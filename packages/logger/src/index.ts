// Name-tagged console and file logging with a selectable debug sink.

export {
  Logger,
  padName,
  type LogLevel,
  type LoggerOptions,
} from './logger'

export { FileLogger } from './file-logger'

export {
  loggerSettingsSchema,
  loggerSettingsInputSchema,
  resolveLoggerSettings,
  type LoggerSettings,
  type LoggerSettingsInput,
} from './settings'

export {
  ActiveDebugSink,
  nullDebugSink,
  selectDebugSink,
  type DebugSink,
} from './debug-sink'

export { FileWriter, stdoutWriter, type TextWriter } from './writers'

export { LoggerFatalError } from './errors'
