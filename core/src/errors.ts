/**
 * Typed exception classes for framegraph
 *
 * Error hierarchy:
 * - FrameGraphError: Base error class for all framegraph errors
 *   - ExpressionError: Malformed node construction (unknown parameter, missing operand)
 *   - ValidationError: Schema and value checks (column not found, type mismatch, divisions)
 *   - PlanError: Planning failures (divisions mismatch, missing implementation, no fixed point)
 *   - UnsupportedOperationError: Operations that need an explicit user step first
 *   - ExecutionError: Per-key task failures reported by an executor
 *   - ConfigError: Invalid configuration
 *
 * Use error codes for fine-grained programmatic error handling:
 * - ErrorCode.UNKNOWN_PARAMETER, ErrorCode.MISSING_OPERAND, etc.
 * - ErrorCode.COLUMN_NOT_FOUND, ErrorCode.INVALID_DIVISIONS, etc.
 * - ErrorCode.TASK_FAILED, ErrorCode.DEPENDENCY_FAILED, etc.
 *
 * @example
 * ```typescript
 * import { ValidationError, UnsupportedOperationError } from '@framegraph/core';
 *
 * try {
 *   df.get('missing');
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     logger.warn(error.message, { errorCode: error.code });
 *   } else if (error instanceof UnsupportedOperationError) {
 *     console.log(error.suggestion);
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Expression construction
  EXPRESSION_ERROR = 'EXPRESSION_ERROR',
  UNKNOWN_PARAMETER = 'UNKNOWN_PARAMETER',
  MISSING_OPERAND = 'MISSING_OPERAND',
  TOO_MANY_OPERANDS = 'TOO_MANY_OPERANDS',
  UNKNOWN_ATTRIBUTE = 'UNKNOWN_ATTRIBUTE',
  DUPLICATE_OPERAND = 'DUPLICATE_OPERAND',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
  INVALID_DIVISIONS = 'INVALID_DIVISIONS',
  INVALID_PARTITION = 'INVALID_PARTITION',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',

  // Planning errors
  PLAN_ERROR = 'PLAN_ERROR',
  DIVISIONS_MISMATCH = 'DIVISIONS_MISMATCH',
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
  NO_FIXED_POINT = 'NO_FIXED_POINT',

  // User-visible unsupported combinations
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  UNKNOWN_CATEGORIES = 'UNKNOWN_CATEGORIES',

  // Execution errors
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  TASK_FAILED = 'TASK_FAILED',
  DEPENDENCY_FAILED = 'DEPENDENCY_FAILED',
  MISSING_DEPENDENCY = 'MISSING_DEPENDENCY',
  CYCLIC_GRAPH = 'CYCLIC_GRAPH',

  // Configuration
  CONFIG_ERROR = 'CONFIG_ERROR',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

/**
 * V8 exposes Error.captureStackTrace; other engines already fill `stack`
 * from the Error constructor.
 */
interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(ctor: ErrorConstructor): ctor is ErrorConstructor & V8ErrorConstructor {
  return 'captureStackTrace' in ctor && typeof ctor.captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting frames above `constructorOpt`.
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all framegraph errors
 *
 * Every error carries a `code`, optional structured `details`, an optional
 * `suggestion` naming the remediation, and the creation `timestamp`.
 *
 * @example
 * ```typescript
 * try {
 *   optimize(expr);
 * } catch (error) {
 *   if (error instanceof FrameGraphError) {
 *     logger.error(error.message, error, { errorCode: error.code });
 *   }
 * }
 * ```
 */
export class FrameGraphError extends Error {
  /**
   * Error code for programmatic identification.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (operation, expression, column, ...)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'FrameGraphError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();
    captureStackTrace(this, FrameGraphError);
  }

  /**
   * Format error for logging with all context.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

/**
 * Type guard for any framegraph error.
 */
export function isFrameGraphError(error: unknown): error is FrameGraphError {
  return error instanceof FrameGraphError;
}

// =============================================================================
// Expression Errors
// =============================================================================

/**
 * Error thrown when an expression node cannot be constructed
 *
 * @example
 * ```typescript
 * throw ExpressionError.unknownParameter('Projection', 'colums', ['frame', 'columns']);
 * ```
 */
export class ExpressionError extends FrameGraphError {
  constructor(
    message: string,
    code: string = ErrorCode.EXPRESSION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ExpressionError';
    captureStackTrace(this, ExpressionError);
  }

  static unknownParameter(kind: string, parameter: string, parameters: readonly string[]): ExpressionError {
    return new ExpressionError(
      `${kind} has no parameter "${parameter}"`,
      ErrorCode.UNKNOWN_PARAMETER,
      { operation: 'construct', kind, parameter },
      `Valid parameters: ${parameters.join(', ') || '(none)'}`
    );
  }

  static missingOperand(kind: string, parameter: string): ExpressionError {
    return new ExpressionError(
      `${kind} requires a value for "${parameter}"`,
      ErrorCode.MISSING_OPERAND,
      { operation: 'construct', kind, parameter }
    );
  }

  static tooManyOperands(kind: string, expected: number, received: number): ExpressionError {
    return new ExpressionError(
      `${kind} takes ${expected} operand(s), received ${received}`,
      ErrorCode.TOO_MANY_OPERANDS,
      { operation: 'construct', kind, expected, received }
    );
  }

  static duplicateOperand(kind: string, parameter: string): ExpressionError {
    return new ExpressionError(
      `${kind} received "${parameter}" both by position and by name`,
      ErrorCode.DUPLICATE_OPERAND,
      { operation: 'construct', kind, parameter }
    );
  }

  static unknownAttribute(kind: string, key: string): ExpressionError {
    return new ExpressionError(
      `${kind} has no attribute or operand "${key}"`,
      ErrorCode.UNKNOWN_ATTRIBUTE,
      { operation: 'lookup', kind, key }
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when a value or schema check fails
 *
 * Raised synchronously while metadata is inferred, so a bad column
 * reference fails when the node is built rather than when it runs.
 *
 * @example
 * ```typescript
 * throw ValidationError.columnNotFound('z', ['x', 'y']);
 * throw ValidationError.invalidDivisions([3, 1, 5]);
 * ```
 */
export class ValidationError extends FrameGraphError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  static columnNotFound(column: string, available: readonly string[]): ValidationError {
    return new ValidationError(
      `Column "${column}" not found`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column, available: [...available] },
      `Available columns: ${available.join(', ') || '(none)'}`
    );
  }

  static typeMismatch(operation: string, expected: string, actual: string): ValidationError {
    return new ValidationError(
      `${operation} expected ${expected} but received ${actual}`,
      ErrorCode.TYPE_MISMATCH,
      { operation, expected, actual }
    );
  }

  static lengthMismatch(operation: string, left: number, right: number): ValidationError {
    return new ValidationError(
      `${operation} requires equal lengths, received ${left} and ${right}`,
      ErrorCode.LENGTH_MISMATCH,
      { operation, left, right }
    );
  }

  static invalidDivisions(divisions: readonly unknown[]): ValidationError {
    return new ValidationError(
      'Divisions must be non-decreasing',
      ErrorCode.INVALID_DIVISIONS,
      { divisions: divisions.map(String) }
    );
  }

  static invalidPartition(index: number, npartitions: number): ValidationError {
    return new ValidationError(
      `Partition ${index} is out of range for ${npartitions} partition(s)`,
      ErrorCode.INVALID_PARTITION,
      { index, npartitions }
    );
  }
}

// =============================================================================
// Planning Errors
// =============================================================================

/**
 * Error thrown when a plan cannot be built from an otherwise valid tree
 */
export class PlanError extends FrameGraphError {
  constructor(
    message: string,
    code: string = ErrorCode.PLAN_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'PlanError';
    captureStackTrace(this, PlanError);
  }

  static divisionsMismatch(kind: string, names: readonly string[]): PlanError {
    return new PlanError(
      `${kind} operands are not partitioned alike`,
      ErrorCode.DIVISIONS_MISMATCH,
      { kind, operands: [...names] },
      'Repartition the operands to the same divisions first'
    );
  }

  static notImplemented(kind: string, member: string): PlanError {
    return new PlanError(
      `${kind} does not implement ${member}`,
      ErrorCode.NOT_IMPLEMENTED,
      { kind, member }
    );
  }

  static noFixedPoint(passes: number, name: string): PlanError {
    return new PlanError(
      `Rewriting did not settle after ${passes} passes`,
      ErrorCode.NO_FIXED_POINT,
      { passes, name },
      'A rewrite rule keeps producing new trees; raise optimizer.maxPasses only if the tree is very deep'
    );
  }
}

// =============================================================================
// Unsupported Operations
// =============================================================================

/**
 * Error thrown for operation combinations that need an explicit user step first
 *
 * @example
 * ```typescript
 * throw UnsupportedOperationError.unknownCategories('codes');
 * ```
 */
export class UnsupportedOperationError extends FrameGraphError {
  constructor(
    message: string,
    code: string = ErrorCode.UNSUPPORTED_OPERATION,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'UnsupportedOperationError';
    captureStackTrace(this, UnsupportedOperationError);
  }

  static unknownCategories(operation: string): UnsupportedOperationError {
    return new UnsupportedOperationError(
      `\`${operation}\` with unknown categories is not supported. ` +
        'Please use `column.cat.asKnown()` or `df.categorize()` beforehand to ensure known categories',
      ErrorCode.UNKNOWN_CATEGORIES,
      { operation },
      'Materialize categories first with column.cat.asKnown() or df.categorize()'
    );
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * Error reported by an executor for a single task key
 */
export class ExecutionError extends FrameGraphError {
  constructor(
    message: string,
    code: string = ErrorCode.EXECUTION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ExecutionError';
    captureStackTrace(this, ExecutionError);
  }

  static taskFailed(key: string, cause: unknown): ExecutionError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const error = new ExecutionError(`Task ${key} failed: ${reason}`, ErrorCode.TASK_FAILED, {
      key,
      ...(cause instanceof FrameGraphError && { causeCode: cause.code }),
    });
    error.cause = cause;
    return error;
  }

  static dependencyFailed(key: string, dependency: string): ExecutionError {
    return new ExecutionError(
      `Task ${key} was not run because ${dependency} failed`,
      ErrorCode.DEPENDENCY_FAILED,
      { key, dependency }
    );
  }

  static missingDependency(key: string, dependency: string): ExecutionError {
    return new ExecutionError(
      `Task ${key} depends on ${dependency}, which is not in the graph`,
      ErrorCode.MISSING_DEPENDENCY,
      { key, dependency }
    );
  }

  static cyclicGraph(keys: readonly string[]): ExecutionError {
    return new ExecutionError(
      `Task graph has a cycle through ${keys.length} key(s)`,
      ErrorCode.CYCLIC_GRAPH,
      { keys: keys.slice(0, 10) }
    );
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when a configuration fails validation
 */
export class ConfigError extends FrameGraphError {
  public readonly errors: readonly string[];

  constructor(message: string, errors: readonly string[] = []) {
    super(message, ErrorCode.CONFIG_ERROR, errors.length > 0 ? { errors: [...errors] } : undefined);
    this.name = 'ConfigError';
    this.errors = errors;
    captureStackTrace(this, ConfigError);
  }
}
