/**
 * Structured Logging for framegraph
 *
 * A small logging interface the planner, IO layer and executor accept by
 * injection. Nothing logs unless a logger is supplied; the default is
 * `createNoopLogger()`.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@framegraph/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const planLogger = withContext(logger, { component: 'optimizer' });
 * planLogger.info('Simplified expression', { passes: 3, durationMs: 1.2 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in a log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to log entries.
 */
export interface LogContext {
  /** Component emitting the entry (optimizer, fusion, io, executor) */
  component?: string;
  /** Operation being performed */
  operation?: string;
  /** Content-addressed name of the expression involved */
  expr?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Number of partitions involved */
  partitions?: number;
  /** Number of tasks involved */
  tasks?: number;
  /** Error code for error logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

/**
 * Check whether a value can be serialized into a log context.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isLogContextValue);
      }
      return Object.values(value).every(isLogContextValue);
    default:
      return false;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for log entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends Omit<LoggerConfig, 'output'> {
  /** 'json' for structured logs, 'pretty' for human-readable */
  format?: 'json' | 'pretty';
  /** Where formatted lines go (default: console.error) */
  write?: (line: string, entry: LogEntry) => void;
}

/**
 * Logger that keeps every entry for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_ORDER;
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

type Emit = (level: LogLevel, message: string, context?: LogContext, error?: Error) => void;

/** Logger whose four methods all forward to `emit`. */
function fromEmit(emit: Emit): Logger {
  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, error, context) => emit('error', message, context, error),
  };
}

/**
 * Create a logger that sends entries at or above `minLevel` to `output`.
 *
 * @example
 * ```typescript
 * const entries: LogEntry[] = [];
 * const logger = createLogger({ minLevel: 'info', output: (e) => entries.push(e) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const { output } = config;
  if (output === undefined) return createNoopLogger();

  return fromEmit((level, message, context, error) => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;
    output({
      level,
      message,
      timestamp: Date.now(),
      ...(context === undefined ? {} : { context }),
      ...(error === undefined ? {} : { error }),
    });
  });
}

/**
 * Name, message and the loggable own fields of an error (code, details).
 */
function errorFields(error: Error): Record<string, LogContextValue> {
  const fields: Record<string, LogContextValue> = { name: error.name, message: error.message };
  for (const [key, value] of Object.entries(error)) {
    if (isLogContextValue(value)) fields[key] = value;
  }
  return fields;
}

/**
 * Render a log entry as a single line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && { error: errorFields(entry.error) }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger that writes to stderr through `console.error`, keeping
 * stdout free for program output.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  const write = config.write ?? ((line: string) => console.error(line));
  return createLogger({
    minLevel: config.minLevel,
    output: (entry) => write(formatLogEntry(entry, format), entry),
  });
}

export function createNoopLogger(): Logger {
  return fromEmit(() => undefined);
}

/**
 * Create a logger that captures entries for assertions.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * optimize(expr, { logger });
 * expect(logger.getLogsByLevel('debug').length).toBeGreaterThan(0);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter((entry) => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger whose entries carry `context` merged under the
 * context given at log time.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  return fromEmit((level, message, local, error) => {
    const merged = local === undefined ? context : { ...context, ...local };
    if (level === 'error') logger.error(message, error, merged);
    else logger[level](message, merged);
  });
}
