/**
 * Logging Module Index
 */

export {
  Logger,
  LOG_LEVELS,
  getLogger,
  setLogLevel,
  resetLogger,
  isLogLevelName,
  type LogLevelName,
  type LogCategory,
  type LogEntry,
  type LogSubscriber,
  type LoggerOptions,
} from './logger';

export {
  atomicWriteFileSync,
  writeFileAtomicOrThrow,
  DEFAULT_MAX_RETRIES,
  type AtomicWriteOptions,
  type AtomicWriteResult,
} from './atomic-file-writer';
