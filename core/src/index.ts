// @framegraph/core
// Errors, logging, results, content tokens and caches shared by every package

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  captureStackTrace,
  FrameGraphError,
  isFrameGraphError,
  ExpressionError,
  ValidationError,
  PlanError,
  UnsupportedOperationError,
  ExecutionError,
  ConfigError,
} from './errors.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogContextValue,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Result
// =============================================================================

export { ok, err, isOk, isErr, unwrap, settle, all, type Ok, type Err, type Result } from './result.js';

// =============================================================================
// Tokens & Caches
// =============================================================================

export { tokenize, normalizeToken, digest, hashString, isTokenizable, type Tokenizable } from './tokenize.js';
export { LruCache, type LruCacheStats } from './lru-cache.js';
