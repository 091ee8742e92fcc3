/**
 * Grouped aggregation kernels
 *
 * Partial results are frames indexed by group key. `mean` travels as a
 * pair of partial sum and count columns and is finalized by
 * `groupbyAggregate`.
 */

import { ValidationError } from '@framegraph/core';
import { DataFrame, type Column } from './dataframe.js';
import { concatValues } from './ops.js';
import { reductionDType } from './reductions.js';
import { compareScalars, isNumericDType, type DType, type Scalar } from './types.js';
import { expectFrame, type Value } from './value.js';

export type GroupbyAggregate = 'sum' | 'count' | 'min' | 'max' | 'mean';

export const GROUPBY_AGGREGATES: readonly GroupbyAggregate[] = ['sum', 'count', 'min', 'max', 'mean'];

export function isGroupbyAggregate(value: unknown): value is GroupbyAggregate {
  return GROUPBY_AGGREGATES.some((agg) => agg === value);
}

/** Output column name → aggregation over the column of the same name. */
export type GroupbySpec = Readonly<Record<string, GroupbyAggregate>>;

interface PartialColumn {
  name: string;
  source: string;
  chunk: 'sum' | 'count' | 'min' | 'max';
}

const SUM_SUFFIX = '__sum';
const COUNT_SUFFIX = '__count';

function partialsOf(spec: GroupbySpec): PartialColumn[] {
  return Object.entries(spec).flatMap(([column, agg]): PartialColumn[] =>
    agg === 'mean'
      ? [
          { name: `${column}${SUM_SUFFIX}`, source: column, chunk: 'sum' },
          { name: `${column}${COUNT_SUFFIX}`, source: column, chunk: 'count' },
        ]
      : [{ name: column, source: column, chunk: agg }]
  );
}

/**
 * Columns an aggregation reads, including the grouping column.
 */
export function groupbyColumns(by: string, spec: GroupbySpec): string[] {
  return [by, ...Object.keys(spec).filter((column) => column !== by)];
}

const toNumber = (value: Scalar): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return Number(value);
  throw ValidationError.typeMismatch('groupby', 'numeric values', typeof value);
};

function fold(op: PartialColumn['chunk'] | 'add', acc: Scalar, value: Scalar): Scalar {
  if (value === null) return acc;
  switch (op) {
    case 'count':
      return toNumber(acc) + 1;
    case 'sum':
    case 'add':
      return toNumber(acc) + toNumber(value);
    case 'min':
      return acc === null || compareScalars(value, acc) < 0 ? value : acc;
    case 'max':
      return acc === null || compareScalars(value, acc) > 0 ? value : acc;
  }
}

const initial = (op: PartialColumn['chunk'] | 'add'): Scalar => (op === 'min' || op === 'max' ? null : 0);

function partialDType(partial: PartialColumn, source: DType): DType {
  if (partial.chunk === 'count') return 'int64';
  return reductionDType(partial.chunk, source);
}

/**
 * Group `rows` of `frame` by the values of `keys`, folding each partial.
 * Null keys are dropped.
 */
function foldGroups(
  keys: readonly Scalar[],
  frame: DataFrame,
  columns: ReadonlyArray<{ name: string; source: string; op: PartialColumn['chunk'] | 'add'; dtype: DType }>,
  indexName: string
): DataFrame {
  const order: Scalar[] = [];
  const groups = new Map<Scalar, Scalar[]>();
  keys.forEach((key, row) => {
    if (key === null) return;
    let acc = groups.get(key);
    if (acc === undefined) {
      acc = columns.map((c) => initial(c.op));
      groups.set(key, acc);
      order.push(key);
    }
    for (let i = 0; i < columns.length; i++) {
      acc[i] = fold(columns[i].op, acc[i], frame.columnData(columns[i].source).values[row]);
    }
  });
  return new DataFrame(
    columns.map((c, i) => [
      c.name,
      { values: order.map((key) => groups.get(key)?.[i] ?? null), dtype: c.dtype, categories: null },
    ] as const),
    order,
    indexName
  );
}

/**
 * Per-partition partial aggregates, indexed by the `by` column.
 */
export function groupbyChunk(obj: Value, by: string, spec: GroupbySpec): DataFrame {
  const frame = expectFrame(obj, 'groupby');
  const keys = frame.columnData(by).values;
  const columns = partialsOf(spec).map((p) => ({
    name: p.name,
    source: p.source,
    op: p.chunk,
    dtype: partialDType(p, frame.columnData(p.source).dtype),
  }));
  return foldGroups(keys, frame, columns, by);
}

/**
 * Merge partial frames by group key.
 */
export function groupbyCombine(parts: readonly Value[], by: string, spec: GroupbySpec): DataFrame {
  const frames = parts.map((part) => expectFrame(part, 'groupby'));
  const merged = expectFrame(concatValues(frames), 'groupby');
  const columns = partialsOf(spec).map((p) => ({
    name: p.name,
    source: p.name,
    op: p.chunk === 'count' ? ('add' as const) : p.chunk,
    dtype: merged.columnData(p.name).dtype,
  }));
  return foldGroups(merged.index, merged, columns, by);
}

/**
 * Final aggregation: merge, finalize means, sort by group key.
 */
export function groupbyAggregate(parts: readonly Value[], by: string, spec: GroupbySpec): DataFrame {
  const combined = groupbyCombine(parts, by, spec);
  const order = combined.index.map((_, i) => i).sort((a, b) => compareScalars(combined.index[a], combined.index[b]));
  const pick = (values: readonly Scalar[]): Scalar[] => order.map((row) => values[row]);
  const columns: Array<readonly [string, Column]> = Object.entries(spec).map(([column, agg]) => {
    if (agg !== 'mean') {
      const data = combined.columnData(column);
      return [column, { ...data, values: pick(data.values) }] as const;
    }
    const sums = pick(combined.columnData(`${column}${SUM_SUFFIX}`).values);
    const counts = pick(combined.columnData(`${column}${COUNT_SUFFIX}`).values);
    const values = sums.map((sum, i) => {
      const count = toNumber(counts[i]);
      return count === 0 ? null : toNumber(sum) / count;
    });
    return [column, { values, dtype: 'float64', categories: null }] as const;
  });
  return new DataFrame(columns, pick(combined.index), by);
}

/**
 * Schema of a grouped aggregation over `meta`; validates the columns.
 */
export function groupbyMeta(obj: Value, by: string, spec: GroupbySpec): DataFrame {
  const frame = expectFrame(obj, 'groupby');
  frame.columnData(by);
  for (const [column, agg] of Object.entries(spec)) {
    const dtype = frame.columnData(column).dtype;
    if ((agg === 'sum' || agg === 'mean') && !isNumericDType(dtype) && dtype !== 'object') {
      throw ValidationError.typeMismatch(`groupby.${agg}`, 'a numeric column', `"${column}" of dtype ${dtype}`);
    }
  }
  return groupbyAggregate([groupbyChunk(frame, by, spec)], by, spec);
}
