/**
 * Utils - 基础工具
 *
 * @module Utils
 * @version 1.0.0
 */

// ============================================================================
// Logging
// ============================================================================

export {
  Logger,
  formatEntry,
  MemoryTransport,
  DEFAULT_LOGGER_CONFIG,
  isLevelEnabled,
  getGlobalLogger,
  setGlobalLogger,
  getLogger,
  createLogger,
} from './logger.js';
export type { LogLevel, LogModule, LogContext, LogEntry, LoggerConfig, LogTransport } from './logger.js';

// ============================================================================
// Error Handling
// ============================================================================

export {
  ErrorCodes,
  MemoryError,
  InvalidEventError,
  MissingTextError,
  EncoderFailureError,
  ConfigError,
  isMemoryError,
  toMemoryError,
} from './errors.js';
export type { ErrorCodeType } from './errors.js';

// ============================================================================
// Data Structures
// ============================================================================

export { RingBuffer } from './ring-buffer.js';
export { TypedEventEmitter } from './typed-event-emitter.js';
export type { EventHandler } from './typed-event-emitter.js';
export { parseTimestamp, toStoredTimestamp, MS_PER_DAY, MS_PER_MINUTE } from './time.js';
export type { TimestampInput } from './time.js';
