/**
 * @framegraph/query - Expression IR Unit Tests
 *
 * - Names are content hashes of kind and operands
 * - Construction checks operand counts and names
 * - Meta and divisions are inferred from the children
 * - Tree utilities: walk, substitute, findOperations, explain
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ErrorCode, ExpressionError, PlanError, ValidationError } from '@framegraph/core';
import { DataFrame, Series, expectSeries } from '@framegraph/frame';
import {
  Add,
  Blockwise,
  EQ,
  Filter,
  Head,
  Literal,
  Mul,
  Partitions,
  Projection,
  isComparison,
  kw,
  selectDivisions,
  sub,
} from '../expr.js';
import { FromFrame, FromGraph } from '../io.js';
import { caught, computeParts, numbers } from './fixtures/frames.js';

const df = new FromFrame(numbers, kw({ npartitions: 2 }));

// =============================================================================
// Identity
// =============================================================================

describe('names', () => {
  it('should give structurally equal trees equal names', () => {
    fc.assert(
      fc.property(fc.array(fc.integer(), { minLength: 1, maxLength: 20 }), fc.integer({ min: 1, max: 4 }), (values, npartitions) => {
        const build = () =>
          new FromFrame(DataFrame.fromColumns({ v: values }), kw({ npartitions })).getItem('v').add(1);
        expect(build().name).toBe(build().name);
      })
    );
  });

  it('should prefix the hash with the lower-cased kind', () => {
    expect(df.getItem('x').add(1).name).toMatch(/^add-[0-9a-f]{16}$/);
    expect(df.getItem('x').name).toMatch(/^projection-[0-9a-f]{16}$/);
  });

  it('should give different operands different names', () => {
    expect(df.getItem('x').name).not.toBe(df.getItem('y').name);
    expect(df.getItem('x').add(1).name).not.toBe(df.getItem('x').add(2).name);
    expect(new FromFrame(numbers, kw({ npartitions: 3 })).name).not.toBe(df.name);
  });

  it('should treat keywords and positional operands alike', () => {
    expect(new Head(df, 3).name).toBe(new Head(df, kw({ n: 3 })).name);
    expect(new Head(df).name).toBe(new Head(df, 5).name);
  });
});

// =============================================================================
// Construction
// =============================================================================

describe('construction', () => {
  it('should reject too many positional operands', () => {
    const error = caught(() => new Head(df, 5, 6));
    expect(error).toBeInstanceOf(ExpressionError);
    expect(error).toMatchObject({ code: ErrorCode.TOO_MANY_OPERANDS });
  });

  it('should reject a missing operand without a default', () => {
    expect(caught(() => new Projection(df))).toMatchObject({ code: ErrorCode.MISSING_OPERAND });
  });

  it('should reject unknown and duplicate keywords', () => {
    expect(caught(() => new Head(df, kw({ m: 3 })))).toMatchObject({ code: ErrorCode.UNKNOWN_PARAMETER });
    expect(caught(() => new Head(df, 3, kw({ n: 4 })))).toMatchObject({ code: ErrorCode.DUPLICATE_OPERAND });
  });

  it('should resolve attributes before operands in get', () => {
    const head = new Head(df, 3);
    expect(head.get('n')).toBe(3);
    expect(head.get('npartitions')).toBe(1);
    expect(head.get('columns')).toEqual(['x', 'y', 'label']);
    expect(caught(() => head.get('missing'))).toMatchObject({ code: ErrorCode.UNKNOWN_ATTRIBUTE });
  });

  it('should keep the same node when withOperands changes nothing', () => {
    const x = df.getItem('x');
    expect(x.withOperands([...x.operands])).toBe(x);
    expect(x.substituteParameters({ columns: 'y' }).name).toBe(df.getItem('y').name);
  });
});

// =============================================================================
// Meta & Divisions
// =============================================================================

describe('meta', () => {
  it('should infer a zero-row schema from the children', () => {
    const meta = expectSeries(df.getItem('x').add(df.getItem('y')).meta, 'test');
    expect(meta.length).toBe(0);
    expect(meta.dtype).toBe('int64');
    expect(meta.name).toBeNull();
  });

  it('should report shape information from meta', () => {
    expect(df.ndim).toBe(2);
    expect(df.getItem('x').ndim).toBe(1);
    expect(new Literal(3).ndim).toBe(0);
    expect(df.getItem(['y', 'x']).columns).toEqual(['y', 'x']);
    expect(df.dtypes).toEqual({ x: 'int64', y: 'int64', label: 'string' });
  });

  it('should fail where the operation does not apply', () => {
    expect(() => df.getItem('missing').meta).toThrow(ValidationError);
    expect(() => df.getItem('label').sub(1).meta).toThrow(ValidationError);
  });
});

describe('divisions', () => {
  it('should inherit divisions through block-wise nodes', () => {
    const expr = sub(df.getItem('x'), 1);
    expect(df.divisions).toEqual([0, 4, 7]);
    expect(expr.divisions).toEqual([0, 4, 7]);
    expect(expr.npartitions).toBe(2);
    expect(expr.knownDivisions).toBe(true);
  });

  it('should reject block-wise inputs with different divisions', () => {
    const other = new FromFrame(numbers, kw({ npartitions: 4 }));
    const error = caught(() => new Add(df.getItem('x'), other.getItem('x')).divisions);
    expect(error).toBeInstanceOf(PlanError);
    expect(error).toMatchObject({ code: ErrorCode.DIVISIONS_MISMATCH });
  });

  it('should broadcast single-partition and scalar inputs', () => {
    const single = new FromFrame(numbers);
    const expr = new Add(df.getItem('x'), single.getItem('y'));
    expect(expr).toBeInstanceOf(Blockwise);
    expect(expr.divisions).toEqual([0, 4, 7]);
    if (expr instanceof Blockwise) {
      expect(expr.isBroadcast(single.getItem('y'))).toBe(true);
      expect(expr.isBroadcast(df.getItem('x'))).toBe(false);
    }
  });

  it('should reject decreasing divisions', () => {
    const meta = numbers.column('x');
    const error = caught(() => new FromGraph([], meta, [3, 1], 'stale-0').divisions);
    expect(error).toMatchObject({ code: ErrorCode.INVALID_DIVISIONS });
  });

  it('should select divisions of increasing partition lists only', () => {
    const divisions = [0, 10, 20, 30];
    expect(selectDivisions(divisions, [0, 2])).toEqual([0, 20, 30]);
    expect(selectDivisions(divisions, [1])).toEqual([10, 20]);
    expect(selectDivisions(divisions, [2, 0])).toEqual([null, null, null]);
    expect(caught(() => selectDivisions(divisions, [3]))).toMatchObject({ code: ErrorCode.INVALID_PARTITION });
  });

  it('should take one partition for head', () => {
    expect(new Head(df, 2).divisions).toEqual([0, 4]);
    expect(new Partitions(df, [1]).divisions).toEqual([4, 7]);
  });
});

// =============================================================================
// Tree Utilities
// =============================================================================

describe('tree utilities', () => {
  it('should walk each distinct node once', () => {
    const x = df.getItem('x');
    const expr = new Mul(x, x);
    expect([...expr.walk()].map((node) => node.kind.name)).toEqual(['Mul', 'Projection', 'FromFrame']);
    expect(expr.findOperations(Projection)).toHaveLength(1);
  });

  it('should substitute nodes by name', () => {
    const x = df.getItem('x');
    const replaced = x.add(1).substitute(new Map([[x.name, df.getItem('y')]]));
    expect(replaced.name).toBe(df.getItem('y').add(1).name);
  });

  it('should build a filter for an expression key and a projection otherwise', () => {
    expect(df.getItem(df.getItem('x').gt(2))).toBeInstanceOf(Filter);
    expect(df.getItem(['x'])).toBeInstanceOf(Projection);
  });

  it('should recognise comparisons', () => {
    expect(isComparison(new EQ(df.getItem('x'), 1))).toBe(true);
    expect(isComparison(new Add(df.getItem('x'), 1))).toBe(false);
  });

  it('should explain one node per line', () => {
    const lines = df.getItem('x').explain().split('\n');
    expect(lines[0]).toBe('Projection: columns="x"');
    expect(lines[1]).toMatch(/^ {2}FromFrame: frame=/);
    expect(lines).toHaveLength(2);
  });

  it('should print binary operators infix', () => {
    expect(new Add(new Literal(1), 2).toString()).toBe('Literal(1) + 2');
  });
});

// =============================================================================
// Tasks
// =============================================================================

describe('tasks', () => {
  it('should compute each partition of a block-wise chain', async () => {
    const parts = await computeParts(df.getItem('x').mul(10));
    expect(parts.map((part) => expectSeries(part, 'test').values)).toEqual([
      [10, 20, 30, 40],
      [50, 60, 70, 80],
    ]);
  });

  it('should broadcast a scalar literal into every partition', async () => {
    const parts = await computeParts(new Add(df.getItem('y'), new Literal(1)));
    expect(parts.map((part) => expectSeries(part, 'test').values)).toEqual([
      [11, 21, 31, 41],
      [51, 61, 71, 81],
    ]);
  });

  it('should alias selected partitions', async () => {
    const parts = await computeParts(new Partitions(df.getItem('x'), [1]));
    expect(parts).toHaveLength(1);
    expect(parts[0]).toBeInstanceOf(Series);
    expect(expectSeries(parts[0], 'test').index).toEqual([4, 5, 6, 7]);
  });
});
