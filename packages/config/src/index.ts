// Shared configuration: environment flags and numeric logging options.

export {
  resolveFlag,
  resolveFlags,
  readEnvFlag,
  DEFAULT_FLAGS,
  FLAG_KEYS,
  ENV_PREFIX,
  type Flags,
  type FlagKey,
  type Env,
} from './flags'

export {
  optional,
  readLogEnv,
  DEFAULT_LOG_ENV,
  type LogEnv,
} from './env'
