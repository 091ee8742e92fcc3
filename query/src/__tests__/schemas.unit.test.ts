/**
 * @framegraph/query - Reader Boundary Schema Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, ValidationError } from '@framegraph/core';
import { Dataset, type DatasetManifest, type FragmentInfo } from '../dataset.js';
import { InMemoryReader } from '../memory-reader.js';
import { FilterListSchema, isFilterPredicateList, validate } from '../schemas.js';
import { caught, eventFragments } from './fixtures/frames.js';

class MissingDTypeReader extends InMemoryReader {
  manifest(): DatasetManifest {
    return { columns: ['a', 'b'], dtypes: { a: 'int64' }, indexName: null };
  }
}

class NegativeCountReader extends InMemoryReader {
  fragments(): readonly FragmentInfo[] {
    return [{ id: 'bad/0', rowCount: -1, columns: {} }];
  }
}

describe('filter schemas', () => {
  it('should accept (column, operator, value) predicates', () => {
    expect(validate(FilterListSchema, [['a', '>=', 8]], 'filters')).toEqual([['a', '>=', 8]]);
    expect(isFilterPredicateList([['a', '==', null]])).toBe(true);
    expect(isFilterPredicateList([])).toBe(true);
  });

  it('should reject unknown operators and malformed tuples', () => {
    expect(isFilterPredicateList([['a', '~', 1]])).toBe(false);
    expect(isFilterPredicateList([['a', '==']])).toBe(false);
    expect(isFilterPredicateList('a == 1')).toBe(false);
  });

  it('should report each issue by path', () => {
    const error = caught(() => validate(FilterListSchema, [['a', '==', 1], ['', '==', 1]], 'filters'));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
    expect(error instanceof ValidationError ? error.details?.issues : undefined).toEqual([
      { path: '1.0', message: expect.any(String) },
    ]);
  });
});

describe('reader output', () => {
  it('should reject a manifest column without a dtype', () => {
    const dataset = new Dataset(new MissingDTypeReader('bad', eventFragments(1)));
    const error = caught(() => dataset.manifest);
    expect(error).toMatchObject({ code: ErrorCode.VALIDATION_ERROR });
    expect(error instanceof Error ? error.message : undefined).toBe(
      'Invalid manifest of bad: dtypes: Every column needs a dtype'
    );
  });

  it('should reject fragment statistics with a negative row count', () => {
    const dataset = new Dataset(new NegativeCountReader('bad', eventFragments(1)));
    const error = caught(() => dataset.plan([], true));
    expect(error instanceof ValidationError ? error.details?.issues : undefined).toEqual([
      { path: 'rowCount', message: expect.any(String) },
    ]);
  });

  it('should accept what the in-memory reader reports', () => {
    const dataset = new Dataset(new InMemoryReader('events', eventFragments(2)));
    expect(dataset.manifest.columns).toEqual(['a', 'b', 'c']);
    expect(dataset.plan([], true).divisions).toEqual([0, 10, 19]);
  });
});
