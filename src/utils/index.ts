/**
 * Utility exports
 */

// Buffer utilities
export {
  isByteSource,
  toUint8Array,
  copyToUint8Array,
  type ByteSource,
} from './buffer.js';

// Logger
export {
  Logger,
  createLogger,
  setDebugMode,
  isDebugMode,
  setLogLevel,
  getLogLevel,
  setLogSink,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './logger.js';

// Error utilities
export {
  dataError,
  notFoundError,
  notReadableError,
  wrapAsNaluError,
  isNaluError,
  getErrorCode,
  getErrorMessage,
  type NaluErrorName,
} from './errors.js';
