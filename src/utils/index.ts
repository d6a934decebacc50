/**
 * Utility exports
 * @module utils
 */

// Math utilities
export { clamp, lerp, percentile, sortedCopy, gridExtent, isNearInteger } from './math';

// Validation utilities
export {
  ValidationError,
  InvalidRangeError,
  InvalidWindowError,
  IndexOutOfRangeError,
  InvalidDurationEntryError,
  LabelNotFoundError,
  validatePercentileRange,
  validateWindowSize,
  validatePositiveInteger,
  type HeatmapErrorCode,
} from './validation';

// Logging utilities
export {
  Logger,
  LoggerWithContext,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  resetLoggerConfig,
  configureFromEnvironment,
  parseLogLevel,
  formatLogEntry,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
