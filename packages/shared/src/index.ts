// Shared configuration: estimator option schemas and structured logging.

export * from './schemas/index.js'

export {
  createJsonLogger,
  silentLogger,
  resolveLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogFields,
  type JsonLoggerOptions,
} from './logging.js'
