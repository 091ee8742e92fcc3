/**
 * Tests for typed exception classes
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  isErrorCode,
  FrameGraphError,
  isFrameGraphError,
  ExpressionError,
  ValidationError,
  PlanError,
  UnsupportedOperationError,
  ExecutionError,
  ConfigError,
} from '../errors.js';

describe('FrameGraphError base class', () => {
  it('should be an instance of Error', () => {
    const error = new FrameGraphError('Test error', 'TEST_ERROR');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('FrameGraphError');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_ERROR');
  });

  it('should default to the UNKNOWN code', () => {
    expect(new FrameGraphError('x').code).toBe(ErrorCode.UNKNOWN);
  });

  it('should capture stack trace', () => {
    const error = new FrameGraphError('Test error');
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('FrameGraphError');
  });

  it('should format log context with details and suggestion', () => {
    const error = new FrameGraphError('Broken', 'X', { column: 'a' }, 'Fix it');
    expect(error.toLogContext()).toEqual({
      name: 'FrameGraphError',
      message: 'Broken',
      code: 'X',
      details: { column: 'a' },
      suggestion: 'Fix it',
      timestamp: error.timestamp,
    });
  });

  it('should format a detailed string', () => {
    const error = new FrameGraphError('Broken', 'X', { column: 'a', n: 2 }, 'Fix it');
    expect(error.toDetailedString()).toBe('[X] Broken\n  Details: column="a", n=2\n  Suggestion: Fix it');
  });

  it('should be recognised by isFrameGraphError', () => {
    expect(isFrameGraphError(new PlanError('p'))).toBe(true);
    expect(isFrameGraphError(new Error('plain'))).toBe(false);
  });
});

describe('ErrorCode', () => {
  it('should recognise known codes only', () => {
    expect(isErrorCode('COLUMN_NOT_FOUND')).toBe(true);
    expect(isErrorCode('NOT_A_CODE')).toBe(false);
  });
});

describe('ExpressionError', () => {
  it('should describe an unknown parameter', () => {
    const error = ExpressionError.unknownParameter('Projection', 'colums', ['frame', 'columns']);
    expect(error).toBeInstanceOf(FrameGraphError);
    expect(error.name).toBe('ExpressionError');
    expect(error.code).toBe(ErrorCode.UNKNOWN_PARAMETER);
    expect(error.message).toBe('Projection has no parameter "colums"');
    expect(error.suggestion).toBe('Valid parameters: frame, columns');
  });

  it('should describe a missing operand', () => {
    const error = ExpressionError.missingOperand('Filter', 'predicate');
    expect(error.code).toBe(ErrorCode.MISSING_OPERAND);
    expect(error.details).toEqual({ operation: 'construct', kind: 'Filter', parameter: 'predicate' });
  });

  it('should describe too many operands and unknown attributes', () => {
    expect(ExpressionError.tooManyOperands('Head', 2, 3).message).toBe('Head takes 2 operand(s), received 3');
    expect(ExpressionError.unknownAttribute('Head', 'x').code).toBe(ErrorCode.UNKNOWN_ATTRIBUTE);
  });
});

describe('ValidationError', () => {
  it('should list available columns', () => {
    const error = ValidationError.columnNotFound('z', ['x', 'y']);
    expect(error.code).toBe(ErrorCode.COLUMN_NOT_FOUND);
    expect(error.message).toBe('Column "z" not found');
    expect(error.suggestion).toBe('Available columns: x, y');
  });

  it('should stringify divisions in details', () => {
    const error = ValidationError.invalidDivisions([3, 1, null]);
    expect(error.details).toEqual({ divisions: ['3', '1', 'null'] });
  });

  it('should report partition ranges', () => {
    const error = ValidationError.invalidPartition(7, 4);
    expect(error.message).toBe('Partition 7 is out of range for 4 partition(s)');
  });
});

describe('PlanError', () => {
  it('should suggest repartitioning on mismatched divisions', () => {
    const error = PlanError.divisionsMismatch('Add', ['a-1', 'b-2']);
    expect(error.code).toBe(ErrorCode.DIVISIONS_MISMATCH);
    expect(error.details).toEqual({ kind: 'Add', operands: ['a-1', 'b-2'] });
  });

  it('should report a missing fixed point', () => {
    const error = PlanError.noFixedPoint(100, 'add-abc');
    expect(error.code).toBe(ErrorCode.NO_FIXED_POINT);
    expect(error.message).toBe('Rewriting did not settle after 100 passes');
  });
});

describe('UnsupportedOperationError', () => {
  it('should name the remediation for unknown categories', () => {
    const error = UnsupportedOperationError.unknownCategories('codes');
    expect(error.code).toBe(ErrorCode.UNKNOWN_CATEGORIES);
    expect(error.message).toContain('`codes` with unknown categories is not supported');
    expect(error.message).toContain('column.cat.asKnown()');
    expect(error.message).toContain('df.categorize()');
  });
});

describe('ExecutionError', () => {
  it('should wrap the cause of a failed task', () => {
    const cause = ValidationError.columnNotFound('q', []);
    const error = ExecutionError.taskFailed('("getitem-1", 0)', cause);
    expect(error.code).toBe(ErrorCode.TASK_FAILED);
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ key: '("getitem-1", 0)', causeCode: ErrorCode.COLUMN_NOT_FOUND });
  });

  it('should describe failed and missing dependencies', () => {
    expect(ExecutionError.dependencyFailed('b', 'a').message).toBe('Task b was not run because a failed');
    expect(ExecutionError.missingDependency('b', 'a').code).toBe(ErrorCode.MISSING_DEPENDENCY);
  });
});

describe('ConfigError', () => {
  it('should keep the error list', () => {
    const error = new ConfigError('Invalid configuration', ['a: bad']);
    expect(error.errors).toEqual(['a: bad']);
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.details).toEqual({ errors: ['a: bad'] });
  });
});
