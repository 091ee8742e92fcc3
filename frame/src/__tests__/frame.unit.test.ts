/**
 * Tests for the DataFrame and Series containers
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, ValidationError } from '@framegraph/core';
import { DataFrame } from '../dataframe.js';
import { Series } from '../series.js';
import { compareScalars, inferDType, unifyDTypes } from '../types.js';

describe('dtypes', () => {
  it('should infer dtypes while ignoring nulls', () => {
    expect(inferDType([1, 2, null])).toBe('int64');
    expect(inferDType([1, 2.5])).toBe('float64');
    expect(inferDType(['a', null])).toBe('string');
    expect(inferDType([null])).toBe('object');
    expect(inferDType([1, 'a'])).toBe('object');
  });

  it('should unify numeric dtypes', () => {
    expect(unifyDTypes('bool', 'int64')).toBe('int64');
    expect(unifyDTypes('int64', 'float64')).toBe('float64');
    expect(unifyDTypes('category', 'string')).toBe('string');
  });

  it('should order null before booleans, numbers and strings', () => {
    const values = ['b', 3, null, true, 'a', 1];
    expect([...values].sort(compareScalars)).toEqual([null, true, 1, 3, 'a', 'b']);
  });
});

describe('Series', () => {
  it('should default to a range index', () => {
    const s = new Series([10, 20, 30], { name: 'x' });
    expect(s.index).toEqual([0, 1, 2]);
    expect(s.dtype).toBe('int64');
    expect(s.length).toBe(3);
  });

  it('should reject an index of the wrong length', () => {
    expect(() => new Series([1, 2], { index: [0] })).toThrow(ValidationError);
  });

  it('should keep categories only for category series', () => {
    expect(new Series(['a'], { categories: ['a'] }).categories).toBeNull();
    const cat = new Series(['a'], { dtype: 'category', categories: ['a', 'b'] });
    expect(cat.categories).toEqual(['a', 'b']);
    expect(cat.knownCategories).toBe(true);
  });

  it('should give equal tokens to equal content', () => {
    const a = new Series([1, 2], { name: 'x' });
    const b = new Series([1, 2], { name: 'x' });
    const c = new Series([1, 3], { name: 'x' });
    expect(a.toToken()).toBe(b.toToken());
    expect(a.toToken()).not.toBe(c.toToken());
  });
});

describe('DataFrame', () => {
  const df = DataFrame.fromColumns({ a: [1, 2, 3], b: ['x', 'y', 'z'] });

  it('should build from columns', () => {
    expect(df.columns).toEqual(['a', 'b']);
    expect(df.dtypes()).toEqual({ a: 'int64', b: 'string' });
    expect(df.length).toBe(3);
  });

  it('should build from records with missing keys as null', () => {
    const frame = DataFrame.fromRecords([{ a: 1 }, { a: 2, b: 'q' }]);
    expect(frame.columns).toEqual(['a', 'b']);
    expect(frame.columnData('b').values).toEqual([null, 'q']);
    expect(frame.toRecords()).toEqual([
      { a: 1, b: null },
      { a: 2, b: 'q' },
    ]);
  });

  it('should build from named series', () => {
    const frame = DataFrame.fromSeries([new Series([1, 2], { name: 'p', index: [5, 6], indexName: 'id' })]);
    expect(frame.index).toEqual([5, 6]);
    expect(frame.indexName).toBe('id');
  });

  it('should return a column as a Series sharing the index', () => {
    const s = df.column('b');
    expect(s.name).toBe('b');
    expect(s.values).toEqual(['x', 'y', 'z']);
    expect(s.index).toEqual([0, 1, 2]);
  });

  it('should report a missing column with the available ones', () => {
    try {
      df.column('q');
      expect.fail('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.COLUMN_NOT_FOUND);
        expect(error.suggestion).toBe('Available columns: a, b');
      }
    }
  });

  it('should reject duplicate column names', () => {
    const column = { values: [1], dtype: 'int64' as const, categories: null };
    expect(() => new DataFrame([['a', column], ['a', column]], [0])).toThrow(ValidationError);
  });

  it('should give different tokens to different index names', () => {
    const named = DataFrame.fromColumns({ a: [1] }, { indexName: 'id' });
    const plain = DataFrame.fromColumns({ a: [1] });
    expect(named.toToken()).not.toBe(plain.toToken());
  });
});
