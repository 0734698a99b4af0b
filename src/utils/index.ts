/**
 * Utility modules
 */

export {
  configureLogging,
  getLogger,
  Logger,
  LogEvent,
  LogLevel,
  logger,
  serializeError,
} from './logger';
export type {
  LogContext,
  LoggingOptions,
  LogMetadata,
  LogRecord,
  LogSink,
  StructuredLogMetadata,
} from './logger';
export {
  CommitError,
  ConfigError,
  DeliveryError,
  DiffError,
  errorMessage,
  FetchError,
  StatuscastError,
} from './errors';
export { formatDuration, MAX_DURATION_MS, parseDuration } from './duration';
export { readJsonFile, writeJsonFileAtomic } from './json-file';
export { Mutex } from './mutex';
