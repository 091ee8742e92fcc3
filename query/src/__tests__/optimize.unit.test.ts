/**
 * @framegraph/query - Rewrite Engine Unit Tests
 *
 * - Local and parent-context rules run to a fixed point
 * - Projections and partition selections sink into IO leaves
 * - Reads of one source are combined into a single read
 * - The full pipeline is idempotent and logs what it did
 */

import { describe, it, expect } from 'vitest';
import { createConfig } from '@framegraph/config';
import { ErrorCode, createTestLogger } from '@framegraph/core';
import { expectSeries, type Scalar } from '@framegraph/frame';
import { Expr, Filter, GT, Head, Literal, Mul, Partitions, Projection, kw } from '../expr.js';
import { Fused } from '../fusion.js';
import { FromFrame } from '../io.js';
import { combineSimilar, lower, optimize, simplify } from '../optimize.js';
import { Chunk, Len, Sum, TreeReduce } from '../reductions.js';
import { caught, computeParts, numbers } from './fixtures/frames.js';

const df = new FromFrame(numbers, kw({ npartitions: 2 }));
const read = (columns: string[], series = false): Expr =>
  new FromFrame(numbers, kw({ npartitions: 2, columns, _series: series }));

/** A node whose local rule never settles. */
class Restless extends Expr {
  static parameters = ['frame', 'step'];

  simplify(): Expr | undefined {
    return new Restless(this.operand('frame'), Number(this.operand('step')) + 1);
  }
}

// =============================================================================
// Simplify
// =============================================================================

describe('simplify', () => {
  it('should collapse a selection of a selection', () => {
    const expr = df.getItem(['x', 'y', 'label']).getItem(['y', 'x']);
    expect(simplify(expr).name).toBe(read(['y', 'x']).name);
  });

  it('should absorb a single-column selection as a series read', () => {
    const result = simplify(df.getItem('x'));
    expect(result.name).toBe(read(['x'], true).name);
    expect(result.toString()).toBe('df["x"]');
    expect(expectSeries(result.meta, 'test').name).toBe('x');
  });

  it('should drop a selection of every column in order', () => {
    expect(simplify(df.getItem(['x', 'y', 'label'])).name).toBe(df.name);
  });

  it('should move a selection below a filter', () => {
    const expr = df.getItem(df.getItem('x').gt(2)).getItem('y');
    const expected = new Filter(read(['y'], true), new GT(read(['x'], true), 2));
    expect(simplify(expr).name).toBe(expected.name);
  });

  it('should push a selection through arithmetic and past assignments', () => {
    const doubled = df.mul(2).getItem(['x']);
    expect(simplify(doubled).name).toBe(new Mul(read(['x']), 2).name);

    const assigned = df.assign('z', df.getItem('x')).getItem(['y']);
    expect(simplify(assigned).name).toBe(read(['y']).name);
  });

  it('should rewrite x + x and fold constant multiplications', () => {
    const x = df.getItem('x');
    expect(simplify(x.add(x)).name).toBe(new Mul(2, read(['x'], true)).name);
    expect(simplify(new Mul(3, new Mul(2, x))).name).toBe(new Mul(6, read(['x'], true)).name);
  });

  it('should push a selection into a column-wise reduction', () => {
    const expr = new Sum(df).getItem(['y']);
    expect(simplify(expr).name).toBe(new Sum(read(['y'])).name);
  });

  it('should turn partition selections into an IO filter', () => {
    const expr = new Partitions(new Partitions(df.getItem('x'), [1, 0]), [0]);
    const result = simplify(expr);
    expect(result.name).toBe(new FromFrame(numbers, kw({ npartitions: 2, columns: ['x'], _partitions: [1], _series: true })).name);
    expect(result.divisions).toEqual([4, 7]);
  });

  it('should answer length from the leaf without reading', () => {
    const result = simplify(new Len(df.getItem('x').add(1)));
    expect(result).toBeInstanceOf(Literal);
    expect(result instanceof Literal ? result.value : undefined).toBe(8);
  });

  it('should reduce head to the first partition', () => {
    const result = simplify(new Head(df.getItem('x'), 3));
    expect(result.name).toBe(
      new Head(new FromFrame(numbers, kw({ npartitions: 2, columns: ['x'], _partitions: [0], _series: true })), 3).name
    );
  });

  it('should keep functions with equal source but different captures apart', async () => {
    const scaler = (k: number) => (v: Scalar) => (typeof v === 'number' ? v * k : v);
    const x = df.getItem('x');
    const twice = x.apply(scaler(2));
    const thrice = x.apply(scaler(3));
    expect(twice.name).not.toBe(thrice.name);

    const parts = await computeParts(optimize(twice.add(thrice)));
    expect(parts.flatMap((part) => expectSeries(part, 'test').values)).toEqual([5, 10, 15, 20, 25, 30, 35, 40]);
  });

  it('should stop after the configured number of passes', () => {
    const error = caught(() => simplify(new Restless(df, 0), { maxPasses: 5 }));
    expect(error).toMatchObject({ code: ErrorCode.NO_FIXED_POINT });
  });
});

// =============================================================================
// Lower
// =============================================================================

describe('lower', () => {
  it('should expand a reduction into a chunk layer and a tree reduce', () => {
    const lowered = lower(new Sum(df.getItem('x')), { splitEvery: 8 });
    expect(lowered).toBeInstanceOf(TreeReduce);
    expect(lowered.dependencies()[0]).toBeInstanceOf(Chunk);
    expect(lowered.get('splitEvery')).toBe(8);
  });

  it('should prefer a fan-in declared on the node', () => {
    const lowered = lower(new Sum(df.getItem('x'), 3), { splitEvery: 8 });
    expect(lowered.get('splitEvery')).toBe(3);
  });
});

// =============================================================================
// Combine Similar
// =============================================================================

describe('combineSimilar', () => {
  it('should replace reads of one source by projections of a union read', () => {
    const expr = read(['x'], true).add(read(['y'], true));
    const combined = combineSimilar(expr);
    const union = read(['x', 'y']);
    expect(combined.name).toBe(new Projection(union, 'x').add(new Projection(union, 'y')).name);
    expect(combined.findOperations(FromFrame)).toHaveLength(1);
  });

  it('should read every column when one read has no projection', () => {
    const expr = read(['x'], true).add(df.getItem('y'));
    const combined = combineSimilar(expr);
    const reads = combined.findOperations(FromFrame);
    expect(reads.map((node) => node.name)).toEqual([df.name]);
  });

  it('should leave reads of different partitions apart', () => {
    const first = new FromFrame(numbers, kw({ npartitions: 2, columns: ['x'], _partitions: [0], _series: true }));
    const second = new FromFrame(numbers, kw({ npartitions: 2, columns: ['y'], _partitions: [1], _series: true }));
    const expr = first.add(second);
    expect(combineSimilar(expr)).toBe(expr);
  });

  it('should compute the same values as the separate reads', async () => {
    const expr = read(['x'], true).add(read(['y'], true));
    const [separate, combined] = await Promise.all([computeParts(expr), computeParts(combineSimilar(expr))]);
    expect(combined.map((part) => expectSeries(part, 'test').values)).toEqual(
      separate.map((part) => expectSeries(part, 'test').values)
    );
    expect(combined.map((part) => expectSeries(part, 'test').values)).toEqual([
      [11, 22, 33, 44],
      [55, 66, 77, 88],
    ]);
  });
});

// =============================================================================
// Optimize
// =============================================================================

describe('optimize', () => {
  it('should read once and fuse the chain into one task per partition', () => {
    const expr = df.getItem('x').add(df.getItem('y')).sub(1);
    const optimized = optimize(expr);
    expect(optimized).toBeInstanceOf(Fused);
    expect(optimized.findOperations(FromFrame)).toHaveLength(0);
    expect(optimized.npartitions).toBe(2);
  });

  it('should be idempotent', () => {
    const expr = df.getItem(df.getItem('x').gt(2)).getItem('y').mul(3);
    const once = optimize(expr);
    expect(optimize(once).name).toBe(once.name);

    const unfused = optimize(expr, { fuse: false });
    expect(optimize(unfused, { fuse: false }).name).toBe(unfused.name);
  });

  it('should keep reads separate when combining is disabled', () => {
    const config = createConfig({ optimizer: { combineSimilar: false, fuse: false } });
    const optimized = optimize(df.getItem('x').add(df.getItem('y')), { config });
    expect(optimized.findOperations(FromFrame)).toHaveLength(2);
  });

  it('should log the optimized expression', () => {
    const logger = createTestLogger();
    const optimized = optimize(df.getItem('x').add(1), { logger });
    const entries = logger.getLogsByLevel('info');
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('Optimized expression');
    expect(entries[0].context).toMatchObject({ component: 'optimizer', expr: optimized.name, partitions: 2 });
  });
});
