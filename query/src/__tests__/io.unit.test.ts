/**
 * @framegraph/query - IO Unit Tests
 *
 * - In-memory frames split by sorted index
 * - Dataset reads absorb projections, filters and partition selections
 * - Fragment statistics prune reads and yield divisions
 * - Plans are cached per filter set
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, ValidationError, createTestLogger } from '@framegraph/core';
import { DataFrame, Series, expectFrame, expectSeries } from '@framegraph/frame';
import { Filter, Head, Partitions, kw, lt } from '../expr.js';
import { Dataset, applyFilters, divisionsFromStatistics, statisticsExclude, type FragmentInfo } from '../dataset.js';
import { FromFrame, FromGraph, ReadDataset } from '../io.js';
import { InMemoryReader, computeStatistics } from '../memory-reader.js';
import { optimize, simplify } from '../optimize.js';
import { Len, Sum } from '../reductions.js';
import { caught, computeParts, eventsReader, numbers } from './fixtures/frames.js';

// =============================================================================
// FromFrame
// =============================================================================

describe('FromFrame', () => {
  it('should split a sorted frame at index boundaries', () => {
    const leaf = new FromFrame(numbers, kw({ npartitions: 3 }));
    expect(leaf.divisions).toEqual([0, 2, 5, 7]);
    expect(leaf.partitionLengths()).toEqual([2, 3, 3]);
  });

  it('should sort by index before splitting', async () => {
    const shuffled = DataFrame.fromColumns({ v: ['c', 'a', 'd', 'b'] }, { index: [30, 10, 40, 20] });
    const leaf = new FromFrame(shuffled, kw({ npartitions: 2 }));
    expect(leaf.divisions).toEqual([10, 30, 40]);
    const parts = await computeParts(leaf);
    expect(parts.map((part) => expectFrame(part, 'test').index)).toEqual([
      [10, 20],
      [30, 40],
    ]);
  });

  it('should keep duplicate index values in one partition', () => {
    const repeated = DataFrame.fromColumns({ v: [1, 2, 3, 4, 5, 6] }, { index: [1, 1, 1, 1, 2, 3] });
    const leaf = new FromFrame(repeated, kw({ npartitions: 3 }));
    expect(leaf.divisions).toEqual([1, 2, 3]);
    expect(leaf.partitionLengths()).toEqual([4, 2]);
  });

  it('should leave divisions unknown without sorting', () => {
    const leaf = new FromFrame(numbers, kw({ npartitions: 3, sort: false }));
    expect(leaf.divisions).toEqual([null, null, null, null]);
    expect(leaf.partitionLengths()).toEqual([3, 3, 2]);
  });

  it('should reject a non-positive partition count', () => {
    expect(() => new FromFrame(numbers, kw({ npartitions: 0 })).divisions).toThrow(ValidationError);
  });

  it('should wrap a series', async () => {
    const leaf = new FromFrame(numbers.column('y'), kw({ npartitions: 2 }));
    expect(leaf.ndim).toBe(1);
    const parts = await computeParts(leaf);
    expect(parts.map((part) => expectSeries(part, 'test').values)).toEqual([
      [10, 20, 30, 40],
      [50, 60, 70, 80],
    ]);
  });
});

// =============================================================================
// Statistics
// =============================================================================

describe('statistics', () => {
  it('should compute min, max and nulls', () => {
    expect(computeStatistics([3, null, 1, 7])).toEqual({ min: 1, max: 7, nullCount: 1 });
    expect(computeStatistics([null])).toEqual({ min: null, max: null, nullCount: 1 });
  });

  it('should exclude fragments that cannot match', () => {
    const stats = { min: 10, max: 20, nullCount: 0 };
    expect(statisticsExclude(stats, '==', 25)).toBe(true);
    expect(statisticsExclude(stats, '==', 15)).toBe(false);
    expect(statisticsExclude(stats, '<', 10)).toBe(true);
    expect(statisticsExclude(stats, '<=', 10)).toBe(false);
    expect(statisticsExclude(stats, '>', 20)).toBe(true);
    expect(statisticsExclude(stats, '>=', 20)).toBe(false);
    expect(statisticsExclude({ min: 4, max: 4, nullCount: 0 }, '!=', 4)).toBe(true);
    expect(statisticsExclude({ min: 4, max: 4, nullCount: 2 }, '!=', 4)).toBe(false);
    expect(statisticsExclude({ min: null, max: null, nullCount: 3 }, '==', 1)).toBe(false);
  });

  it('should infer divisions only from strictly ordered fragments', () => {
    const fragment = (id: string, min: number, max: number): FragmentInfo => ({
      id,
      rowCount: 1,
      columns: {},
      index: { min, max, nullCount: 0 },
    });
    expect(divisionsFromStatistics([fragment('a', 0, 9), fragment('b', 10, 19)])).toEqual([0, 10, 19]);
    expect(divisionsFromStatistics([fragment('a', 0, 10), fragment('b', 10, 19)])).toEqual([null, null, null]);
    expect(divisionsFromStatistics([{ id: 'a', rowCount: 1, columns: {} }])).toEqual([null, null]);
  });

  it('should apply filters row by row', () => {
    const frame = DataFrame.fromColumns({ k: [1, 2, 3, 4], s: ['w', 'x', 'y', 'z'] });
    const result = applyFilters(frame, [
      ['k', '>', 1],
      ['s', '!=', 'y'],
    ]);
    expect(result.index).toEqual([1, 3]);
    expect(result.columnData('s').values).toEqual(['x', 'z']);
  });
});

// =============================================================================
// Dataset
// =============================================================================

describe('Dataset', () => {
  it('should derive the schema from the manifest', () => {
    const dataset = new Dataset(eventsReader());
    const meta = dataset.meta();
    expect(meta.columns).toEqual(['a', 'b', 'c']);
    expect(meta.length).toBe(0);
    expect(meta.indexName).toBe('id');
    expect(meta.dtypes()).toEqual({ a: 'int64', b: 'string', c: 'int64' });
  });

  it('should prune fragments by statistics', () => {
    const plan = new Dataset(eventsReader()).plan([['a', '>=', 7]], true);
    expect(plan.fragments.map((f) => f.id)).toEqual(['events/7', 'events/8', 'events/9']);
    expect(plan.pruned).toBe(7);
    expect(plan.divisions).toEqual([70, 80, 90, 99]);
  });

  it('should leave divisions unknown when asked not to calculate them', () => {
    const plan = new Dataset(eventsReader()).plan([], false);
    expect(plan.fragments).toHaveLength(10);
    expect(plan.divisions).toEqual(Array(11).fill(null));
  });

  it('should cache plans per filter set', () => {
    const logger = createTestLogger();
    const dataset = new Dataset(eventsReader(), { cacheSize: 2, logger });
    dataset.plan([], true);
    dataset.plan([], true);
    dataset.plan([['a', '==', 1]], true);
    dataset.plan([['a', '==', 2]], true);
    expect(dataset.cacheStats()).toEqual({ size: 2, capacity: 2, hits: 1, misses: 3, evictions: 1 });
    expect(logger.getLogs().filter((entry) => entry.message === 'Planned dataset read')).toHaveLength(3);
  });

  it('should read the columns the filters need', async () => {
    const reader = eventsReader();
    const dataset = new Dataset(reader);
    const [fragment] = reader.fragments();
    const frame = await dataset.readFragment(fragment, ['b'], [['c', '>=', 40]]);
    expect(frame.columns).toEqual(['b']);
    expect(frame.columnData('b').values).toEqual(['b8', 'b9']);
    expect(reader.reads).toEqual([{ fragment: 'events/0', columns: ['b', 'c'] }]);
  });

  it('should refuse an empty reader', () => {
    expect(() => new InMemoryReader('empty', [])).toThrow(ValidationError);
  });
});

// =============================================================================
// ReadDataset
// =============================================================================

describe('ReadDataset', () => {
  const source = () => new ReadDataset(new Dataset(eventsReader()));

  it('should have one partition per fragment with known divisions', () => {
    const leaf = source();
    expect(leaf.npartitions).toBe(10);
    expect(leaf.divisions).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 99]);
  });

  it('should absorb a filter on one of its columns', () => {
    const leaf = source();
    const expr = leaf.getItem(leaf.getItem('a').eq(5));
    const result = simplify(expr);
    expect(result).toBeInstanceOf(ReadDataset);
    expect(result instanceof ReadDataset ? result.filters : []).toEqual([['a', '==', 5]]);
    expect(result.npartitions).toBe(1);
    expect(result.divisions).toEqual([50, 59]);
  });

  it('should flip a comparison with the literal on the left', () => {
    const leaf = source();
    const result = simplify(leaf.getItem(lt(30, leaf.getItem('c'))));
    expect(result instanceof ReadDataset ? result.filters : []).toEqual([['c', '>', 30]]);
  });

  it('should keep predicates that are not a column against a literal', () => {
    const leaf = source();
    const expr = leaf.getItem(leaf.getItem('c').lt(30).eq(true));
    expect(simplify(expr)).toBeInstanceOf(Filter);
  });

  it('should keep a filter whose column comes from another source', () => {
    const leaf = source();
    const other = new ReadDataset(new Dataset(new InMemoryReader('other', [DataFrame.fromColumns({ a: [1] })])));
    const expr = leaf.getItem(other.getItem('a').eq(1));
    expect(simplify(expr)).not.toBeInstanceOf(ReadDataset);
  });

  it('should absorb partition selections', () => {
    const leaf = source();
    const result = simplify(new Partitions(leaf.getItem('b'), [2, 3]));
    expect(result.divisions).toEqual([20, 30, 40]);
    expect(result.toString()).toBe('ReadDataset(events, "b")');
  });

  it('should keep a partition selection when a filter is absorbed below it', async () => {
    const leaf = source();
    const expr = new Partitions(new Filter(leaf, leaf.getItem('a').ge(1)), [2]);
    const result = simplify(expr);
    expect(result instanceof ReadDataset ? [result.filters, result.partitionFilter] : undefined).toEqual([
      [['a', '>=', 1]],
      [2],
    ]);
    expect(result.divisions).toEqual(expr.divisions);

    const column = (parts: unknown[]) => parts.map((part) => expectFrame(part, 'test').columnData('a').values);
    const [expected, actual] = await Promise.all([computeParts(expr), computeParts(result)]);
    expect(column(actual)).toEqual(column(expected));
    expect(column(actual)).toEqual([Array.from({ length: 10 }, () => 2)]);
  });

  it('should leave a selected fragment empty when an absorbed filter prunes it', async () => {
    const reader = eventsReader();
    const leaf = new ReadDataset(new Dataset(reader));
    const expr = new Partitions(new Filter(leaf, leaf.getItem('a').eq(7)), [2, 7]);
    const result = simplify(expr);
    expect(result.npartitions).toBe(2);
    expect(result.divisions).toEqual([20, 70, 80]);

    const parts = await computeParts(result);
    expect(parts.map((part) => expectFrame(part, 'test').length)).toEqual([0, 10]);
    expect(reader.reads).toEqual([{ fragment: 'events/7', columns: ['a', 'b', 'c'] }]);
  });

  it('should take head of the first unfiltered partition', async () => {
    const reader = eventsReader();
    const leaf = new ReadDataset(new Dataset(reader));
    const result = simplify(new Head(new Filter(leaf, leaf.getItem('a').ge(3)), 2));
    const parts = await computeParts(result);
    expect(parts.map((part) => expectFrame(part, 'test').length)).toEqual([0]);
    expect(reader.reads).toEqual([]);
  });

  it('should map a selection of a filtered read to its fragments', () => {
    const leaf = source();
    const filtered = simplify(leaf.getItem(leaf.getItem('a').ge(8)));
    const result = simplify(new Partitions(filtered, [1]));
    expect(result instanceof ReadDataset ? result.partitionFilter : undefined).toEqual([9]);
    expect(result.divisions).toEqual([90, 99]);
  });

  it('should reject a selection past the last partition', () => {
    const leaf = source();
    const error = caught(() => simplify(new Partitions(leaf, [10])));
    expect(error).toMatchObject({ code: ErrorCode.INVALID_PARTITION });
  });

  it('should read a source once when several selections consume it', async () => {
    const reader = eventsReader();
    const leaf = new ReadDataset(new Dataset(reader));
    const optimized = optimize(new Partitions(leaf.getItem('a').add(leaf.getItem('c')), [0]), { fuse: false });
    expect(optimized.findOperations(ReadDataset)).toHaveLength(1);

    const parts = await computeParts(optimized);
    expect(expectSeries(parts[0], 'test').values).toEqual([0, 5, 10, 15, 20, 25, 30, 35, 40, 45]);
    expect(reader.reads).toEqual([{ fragment: 'events/0', columns: ['a', 'c'] }]);
  });

  it('should answer length from fragment row counts', () => {
    const result = simplify(new Len(source()));
    expect(result.toString()).toBe('Literal(100)');
  });

  it('should not answer length from row counts once filtered', () => {
    const leaf = source();
    const result = simplify(new Len(leaf.getItem(leaf.getItem('a').gt(7))));
    expect(result).toBeInstanceOf(Len);
  });

  it('should produce one empty partition when every fragment is pruned', async () => {
    const leaf = source();
    const result = simplify(leaf.getItem(leaf.getItem('a').gt(100)));
    expect(result.npartitions).toBe(1);
    const parts = await computeParts(result);
    expect(expectFrame(parts[0], 'test').length).toBe(0);
  });

  it('should read only the projected columns of the surviving fragments', async () => {
    const reader = eventsReader();
    const leaf = new ReadDataset(new Dataset(reader));
    const result = simplify(leaf.getItem(leaf.getItem('a').ge(8)).getItem('b'));
    const parts = await computeParts(result);
    expect(parts.map((part) => expectSeries(part, 'test').length)).toEqual([10, 10]);
    expect(reader.reads.map((read) => read.fragment).sort()).toEqual(['events/8', 'events/9']);
    expect(reader.reads[0].columns).toEqual(['b', 'a']);
  });

  it('should reject malformed filters', () => {
    const leaf = new ReadDataset(new Dataset(eventsReader()), kw({ filters: [['a', '~', 1]] }));
    expect(caught(() => leaf.filters)).toMatchObject({ code: ErrorCode.TYPE_MISMATCH });
  });
});

// =============================================================================
// FromGraph
// =============================================================================

describe('FromGraph', () => {
  it('should serve computed partitions under the given name', async () => {
    const parts = [new Series([1, 2], { name: 'v' }), new Series([3], { name: 'v', index: [2] })];
    const leaf = new FromGraph(parts, new Series([], { name: 'v', dtype: 'int64' }), [0, 2, 2], 'sum-persisted');
    expect(leaf.name).toBe('sum-persisted');
    expect(leaf.npartitions).toBe(2);
    const computed = await computeParts(leaf);
    expect(computed.map((part) => expectSeries(part, 'test').values)).toEqual([[1, 2], [3]]);
  });

  it('should feed downstream nodes', async () => {
    const leaf = new FromGraph([new Series([4, 5])], new Series([], { dtype: 'int64' }), [0, 1], 'base');
    const parts = await computeParts(leaf.add(1));
    expect(expectSeries(parts[0], 'test').values).toEqual([5, 6]);
    expect(new Sum(leaf).ndim).toBe(0);
  });
});
