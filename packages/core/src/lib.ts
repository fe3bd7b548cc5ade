// Public API for consumption by other packages (server)

export { loadConfig, parseConfig } from './config.js'
export type { TimetableConfig, ConfigValues, LoadConfigOptions } from './config.js'

export { createLogger, loggerOptions } from './logger.js'
export type { Logger } from './logger.js'

export {
  TimetableError,
  ConfigError,
  FetchError,
  NoMatchError,
  EncodingError,
  PublishError,
  describeError,
} from './errors.js'
export type { TimetableErrorKind } from './errors.js'

export * from './timetable/index.js'
export * from './publish/index.js'
export * from './refresh/index.js'
