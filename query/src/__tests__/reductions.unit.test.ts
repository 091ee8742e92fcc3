/**
 * @framegraph/query - Tree Reduction Unit Tests
 *
 * - Fan-in of every combine task is bounded by splitEvery
 * - Chunk, combine and aggregate agree with a single pass
 * - splitOut hash-partitions the result
 * - Grouped aggregation and value reductions
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, ValidationError } from '@framegraph/core';
import { DataFrame, Series, expectFrame, expectSeries, type Value } from '@framegraph/frame';
import { kw, Projection, type Expr } from '../expr.js';
import { materialize } from '../graph.js';
import { FromFrame } from '../io.js';
import { lower } from '../optimize.js';
import {
  Count,
  DropDuplicates,
  GroupbyAggregation,
  Len,
  Max,
  Mean,
  Min,
  Mode,
  Sum,
  TreeReduce,
  Unique,
  ValueCounts,
  resolveSplitEvery,
} from '../reductions.js';
import { caught, computeParts, numbers } from './fixtures/frames.js';

const df = new FromFrame(numbers, kw({ npartitions: 2 }));

/** Lower `expr` and return its single output partition. */
async function reduce(expr: Expr, splitEvery: number | null = 2): Promise<Value> {
  const [result] = await computeParts(lower(expr, { splitEvery }));
  return result;
}

// =============================================================================
// Tree Shape
// =============================================================================

describe('tree reduce', () => {
  const hundred = new FromFrame(
    DataFrame.fromColumns({ v: Array.from({ length: 100 }, (_, i) => i) }),
    kw({ npartitions: 100 })
  );

  it('should bound the fan-in of every level', () => {
    const lowered = lower(new Sum(hundred.getItem('v')), { splitEvery: 8 });
    expect(lowered).toBeInstanceOf(TreeReduce);
    const layer = lowered.layer();
    const keys = [...layer.keys()];
    expect(keys.filter((key) => key.includes('-combine-0-0:'))).toHaveLength(13);
    expect(keys.filter((key) => key.includes('-combine-0-1:'))).toHaveLength(2);
    const aggregate = layer.get(`${lowered.name}:0`);
    const inputs = aggregate?.args[0];
    expect(Array.isArray(inputs) ? inputs.length : -1).toBe(2);
  });

  it('should give the same answer at any fan-in', async () => {
    const total = new Sum(hundred.getItem('v'));
    expect(await reduce(total, 8)).toBe(4950);
    expect(await reduce(total, 2)).toBe(4950);
    expect(await reduce(total, null)).toBe(4950);
  });

  it('should aggregate every chunk at once when splitEvery is null', () => {
    const lowered = lower(new Sum(hundred.getItem('v'), null), { splitEvery: 8 });
    const layer = lowered.layer();
    expect(layer.size).toBe(1);
    const inputs = layer.get(`${lowered.name}:0`)?.args[0];
    expect(Array.isArray(inputs) ? inputs.length : -1).toBe(100);
  });

  it('should include every layer once when materialized', () => {
    const lowered = lower(new Sum(df.getItem('x')), { splitEvery: 8 });
    const graph = materialize(lowered);
    // 2 reads, 2 projections, 2 chunks, 1 aggregate
    expect(graph.size).toBe(7);
  });

  it('should validate splitEvery', () => {
    expect(resolveSplitEvery(undefined, 8)).toBe(8);
    expect(resolveSplitEvery(false, 8)).toBeNull();
    expect(resolveSplitEvery(4, 8)).toBe(4);
    const error = caught(() => new Sum(df.getItem('x'), 1).meta);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: ErrorCode.TYPE_MISMATCH });
  });
});

// =============================================================================
// Scalar & Column-wise Reductions
// =============================================================================

describe('reductions', () => {
  it('should reduce a series to a scalar', async () => {
    expect(await reduce(new Sum(df.getItem('x')))).toBe(36);
    expect(await reduce(new Min(df.getItem('label')))).toBe('p');
    expect(await reduce(new Max(df.getItem('label')))).toBe('r');
    expect(await reduce(new Len(df))).toBe(8);
  });

  it('should reduce a frame to a series indexed by column', async () => {
    const sums = expectSeries(await reduce(new Sum(df)), 'test');
    expect(sums.index).toEqual(['x', 'y']);
    expect(sums.values).toEqual([36, 360]);

    const counts = expectSeries(await reduce(new Count(df)), 'test');
    expect(counts.index).toEqual(['x', 'y', 'label']);
    expect(counts.values).toEqual([8, 8, 8]);
  });

  it('should infer the reduced schema without data', () => {
    expect(new Sum(df.getItem('x')).meta).toBe(0);
    expect(new Sum(df.getItem('x')).ndim).toBe(0);
    expect(new Sum(df).ndim).toBe(1);
    expect(new Sum(df).npartitions).toBe(1);
  });

  it('should expand mean into sum over count', async () => {
    expect(await reduce(new Mean(df.getItem('x')))).toBe(4.5);
    const means = expectSeries(await reduce(new Mean(df)), 'test');
    expect(means.values).toEqual([4.5, 45]);
  });
});

// =============================================================================
// Value Reductions
// =============================================================================

describe('value reductions', () => {
  const label = df.getItem('label');

  it('should count values, largest first', async () => {
    const counts = expectSeries(await reduce(new ValueCounts(label)), 'test');
    expect(counts.index).toEqual(['p', 'q', 'r']);
    expect(counts.values).toEqual([4, 2, 2]);
    expect(counts.name).toBe('count');
    expect(counts.indexName).toBe('label');
  });

  it('should return every most frequent value in ascending order', async () => {
    const tied = new FromFrame(new Series([3, 1, 3, 1, 2]), kw({ npartitions: 2 }));
    const mode = expectSeries(await reduce(new Mode(tied)), 'test');
    expect(mode.values).toEqual([1, 3]);
    expect(expectSeries(await reduce(new Mode(label)), 'test').values).toEqual(['p']);
  });

  it('should keep distinct values in order of first appearance', async () => {
    const unique = expectSeries(await reduce(new Unique(label)), 'test');
    expect(unique.values).toEqual(['p', 'q', 'r']);
  });

  it('should drop duplicate rows by subset', async () => {
    const result = expectFrame(await reduce(new DropDuplicates(df, ['label'])), 'test');
    expect(result.index).toEqual([0, 1, 3]);
    expect(result.columnData('x').values).toEqual([1, 2, 4]);
  });

  it('should reject a subset column that does not exist', () => {
    expect(() => new DropDuplicates(df, ['missing']).meta).toThrow(ValidationError);
  });

  it('should hash-partition output with splitOut', async () => {
    const unique = new Unique(label, kw({ splitOut: 2 }));
    expect(unique.npartitions).toBe(2);
    expect(unique.knownDivisions).toBe(false);

    const lowered = lower(unique, { splitEvery: 8 });
    const picks = [...lowered.layer().keys()].filter((key) => key.includes('-pick-'));
    expect(picks).toHaveLength(4);

    const parts = await computeParts(lowered);
    const values = parts.flatMap((part) => expectSeries(part, 'test').values);
    expect(values).toHaveLength(3);
    expect([...values].sort()).toEqual(['p', 'q', 'r']);
  });
});

// =============================================================================
// Grouped Aggregation
// =============================================================================

describe('groupby aggregation', () => {
  it('should aggregate per group sorted by key', async () => {
    const result = expectFrame(await reduce(new GroupbyAggregation(df, 'label', { x: 'sum', y: 'mean' })), 'test');
    expect(result.index).toEqual(['p', 'q', 'r']);
    expect(result.indexName).toBe('label');
    expect(result.columnData('x').values).toEqual([18, 7, 11]);
    expect(result.columnData('y').values).toEqual([45, 35, 55]);
    expect(result.columnData('y').dtype).toBe('float64');
  });

  it('should match a single pass at any fan-in', async () => {
    const agg = new GroupbyAggregation(df, 'label', { x: 'count', y: 'max' });
    const single = expectFrame(await reduce(agg, null), 'test');
    const tree = expectFrame(await reduce(agg, 2), 'test');
    expect(tree.columnData('x').values).toEqual(single.columnData('x').values);
    expect(tree.columnData('y').values).toEqual([80, 50, 70]);
  });

  it('should read only the key and aggregated columns', () => {
    const agg = new GroupbyAggregation(df, 'label', { x: 'sum' });
    const expected = new GroupbyAggregation(new Projection(df, ['label', 'x']), 'label', { x: 'sum' });
    expect(agg.simplify()?.name).toBe(expected.name);
  });

  it('should reject a sum over a string column', () => {
    expect(() => new GroupbyAggregation(df, 'x', { label: 'sum' }).meta).toThrow(ValidationError);
  });
});
