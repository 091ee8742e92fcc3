/**
 * Reduction kernels
 *
 * Each reduction is a chunk/combine/aggregate triple: `chunk` runs on one
 * partition, `combine` merges a batch of chunk outputs into one value of the
 * same shape, and `aggregate` produces the final answer. Reductions over a
 * Series yield scalars; over a DataFrame they yield a Series indexed by
 * column name.
 */

import { ValidationError } from '@framegraph/core';
import type { DataFrame } from './dataframe.js';
import { concatValues } from './ops.js';
import { Series } from './series.js';
import { compareScalars, isNumericDType, isScalar, unifyDTypes, type DType, type Scalar } from './types.js';
import { expectContainer, expectSeries, takeRows, type Value } from './value.js';

// =============================================================================
// Scalar Reductions
// =============================================================================

export type ReductionKind = 'sum' | 'prod' | 'min' | 'max' | 'count' | 'any' | 'all' | 'size' | 'len';

export const REDUCTION_KINDS: readonly ReductionKind[] = ['sum', 'prod', 'min', 'max', 'count', 'any', 'all', 'size', 'len'];

export function isReductionKind(value: unknown): value is ReductionKind {
  return REDUCTION_KINDS.some((kind) => kind === value);
}

/** How partial results of each reduction merge. */
const COMBINE_KIND: Readonly<Record<ReductionKind, ReductionKind>> = {
  sum: 'sum',
  prod: 'prod',
  min: 'min',
  max: 'max',
  count: 'sum',
  any: 'any',
  all: 'all',
  size: 'sum',
  len: 'sum',
};

/** Reductions that only look at numeric columns of a frame. */
const NUMERIC_ONLY: ReadonlySet<ReductionKind> = new Set(['sum', 'prod']);

const numberOf = (value: Scalar, kind: ReductionKind): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return Number(value);
  throw ValidationError.typeMismatch(kind, 'numeric values', typeof value);
};

function reduceScalars(kind: ReductionKind, values: readonly Scalar[]): Scalar {
  const present = values.filter((v) => v !== null);
  switch (kind) {
    case 'sum':
      return present.reduce<number>((acc, v) => acc + numberOf(v, kind), 0);
    case 'prod':
      return present.reduce<number>((acc, v) => acc * numberOf(v, kind), 1);
    case 'min':
    case 'max': {
      let best: Scalar = null;
      for (const v of present) {
        const cmp = best === null ? 1 : compareScalars(v, best);
        if (best === null || (kind === 'min' ? cmp < 0 : cmp > 0)) best = v;
      }
      return best;
    }
    case 'count':
      return present.length;
    case 'any':
      return present.some(Boolean);
    case 'all':
      return present.every(Boolean);
    case 'size':
    case 'len':
      return values.length;
  }
}

/**
 * dtype of a reduction over a column of `dtype`.
 */
export function reductionDType(kind: ReductionKind, dtype: DType): DType {
  switch (kind) {
    case 'sum':
    case 'prod':
      if (!isNumericDType(dtype) && dtype !== 'object') {
        throw ValidationError.typeMismatch(kind, 'a numeric dtype', dtype);
      }
      return dtype === 'float64' ? 'float64' : 'int64';
    case 'min':
    case 'max':
      return dtype;
    case 'any':
    case 'all':
      return 'bool';
    default:
      return 'int64';
  }
}

/**
 * Per-partition step.
 */
export function reduceChunk(kind: ReductionKind, obj: Value): Value {
  const container = expectContainer(obj, kind);
  if (kind === 'len') return container.length;
  if (container instanceof Series) {
    reductionDType(kind, container.dtype);
    return reduceScalars(kind, container.values);
  }
  const columns = NUMERIC_ONLY.has(kind)
    ? container.columns.filter((name) => isNumericDType(container.columnData(name).dtype))
    : container.columns;
  const dtypes = columns.map((name) => reductionDType(kind, container.columnData(name).dtype));
  return new Series(
    columns.map((name) => reduceScalars(kind, container.columnData(name).values)),
    { index: columns, dtype: dtypes.length > 0 ? dtypes.reduce(unifyDTypes) : reductionDType(kind, 'int64') }
  );
}

/**
 * Merge partial results (scalars, or series indexed by column name).
 */
export function reduceCombine(kind: ReductionKind, parts: readonly Value[]): Value {
  const combineKind = COMBINE_KIND[kind];
  if (parts.every(isScalar)) {
    return reduceScalars(combineKind, parts.filter(isScalar));
  }
  const series = parts.map((part) => expectSeries(part, kind));
  const labels: Scalar[] = [];
  const grouped = new Map<Scalar, Scalar[]>();
  for (const s of series) {
    s.index.forEach((label, i) => {
      const bucket = grouped.get(label);
      if (bucket === undefined) {
        labels.push(label);
        grouped.set(label, [s.values[i]]);
      } else {
        bucket.push(s.values[i]);
      }
    });
  }
  const first = series[0];
  return new Series(
    labels.map((label) => reduceScalars(combineKind, grouped.get(label) ?? [])),
    { index: labels, name: first.name, dtype: first.dtype }
  );
}

export const reduceAggregate = reduceCombine;

/**
 * Placeholder result used as metadata: the reduction of the zero-row input.
 */
export function reductionMeta(kind: ReductionKind, meta: Value): Value {
  return reduceAggregate(kind, [reduceChunk(kind, meta)]);
}

// =============================================================================
// Value Counts & Mode
// =============================================================================

function countValues(values: readonly Scalar[], weights?: readonly Scalar[]): Map<Scalar, number> {
  const counts = new Map<Scalar, number>();
  values.forEach((value, i) => {
    if (value === null) return;
    const weight = weights === undefined ? 1 : numberOf(weights[i], 'count');
    counts.set(value, (counts.get(value) ?? 0) + weight);
  });
  return counts;
}

function countsSeries(counts: Map<Scalar, number>, source: Series): Series {
  return new Series([...counts.values()], {
    index: [...counts.keys()],
    name: 'count',
    dtype: 'int64',
    indexName: source.name,
  });
}

/**
 * Occurrences of each non-null value in one partition, in order of first
 * appearance.
 */
export function valueCountsChunk(obj: Value): Series {
  const series = expectSeries(obj, 'valueCounts');
  return countsSeries(countValues(series.values), series);
}

export function valueCountsCombine(parts: readonly Value[]): Series {
  const series = parts.map((part) => expectSeries(part, 'valueCounts'));
  const labels = series.flatMap((s) => [...s.index]);
  const weights = series.flatMap((s) => [...s.values]);
  const counts = countValues(labels, weights);
  return new Series([...counts.values()], {
    index: [...counts.keys()],
    name: 'count',
    dtype: 'int64',
    indexName: series[0]?.indexName ?? null,
  });
}

/**
 * Final counts, largest first; ties keep first-appearance order.
 */
export function valueCountsAggregate(parts: readonly Value[], sort = true): Series {
  const combined = valueCountsCombine(parts);
  if (!sort) return combined;
  const positions = combined.values.map((_, i) => i);
  positions.sort((a, b) => numberOf(combined.values[b], 'count') - numberOf(combined.values[a], 'count') || a - b);
  return expectSeries(takeRows(combined, positions), 'valueCounts');
}

/**
 * Most frequent values, ascending. Consumes value-count partials.
 */
export function modeAggregate(parts: readonly Value[], name: string | null, dtype: DType): Series {
  const combined = valueCountsCombine(parts);
  const counts = combined.values.map((v) => numberOf(v, 'count'));
  const top = counts.length === 0 ? 0 : Math.max(...counts);
  const winners = combined.index.filter((_, i) => counts[i] === top).sort(compareScalars);
  return new Series(winners, { name, dtype });
}

// =============================================================================
// Unique & Drop Duplicates
// =============================================================================

function distinct(values: readonly Scalar[]): Scalar[] {
  return [...new Set(values)];
}

/**
 * Distinct values of a series in order of first appearance, index reset.
 */
export function uniqueChunk(obj: Value): Series {
  const series = expectSeries(obj, 'unique');
  return new Series(distinct(series.values), {
    name: series.name,
    dtype: series.dtype,
    categories: series.categories,
  });
}

export function uniqueCombine(parts: readonly Value[]): Series {
  return uniqueChunk(concatValues(parts.map((part) => expectSeries(part, 'unique'))));
}

export const uniqueAggregate = uniqueCombine;

const rowKey = (values: readonly Scalar[]): string => JSON.stringify(values);

/**
 * Remove repeated rows, keeping the first occurrence. `subset` restricts
 * which columns decide equality.
 */
export function dropDuplicates(obj: Value, subset: readonly string[] | null = null): DataFrame | Series {
  const container = expectContainer(obj, 'dropDuplicates');
  const seen = new Set<string>();
  const positions: number[] = [];
  for (let row = 0; row < container.length; row++) {
    const key =
      container instanceof Series
        ? rowKey([container.values[row]])
        : rowKey((subset ?? container.columns).map((name) => container.columnData(name).values[row]));
    if (seen.has(key)) continue;
    seen.add(key);
    positions.push(row);
  }
  return takeRows(container, positions);
}

export function dropDuplicatesCombine(parts: readonly Value[], subset: readonly string[] | null = null): DataFrame | Series {
  return dropDuplicates(concatValues(parts), subset);
}

export const dropDuplicatesAggregate = dropDuplicatesCombine;
