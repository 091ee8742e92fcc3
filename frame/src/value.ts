/**
 * Partition values and their guards
 */

import { ValidationError } from '@framegraph/core';
import { DataFrame } from './dataframe.js';
import { Series } from './series.js';
import { isScalar, type Scalar } from './types.js';

/** What a partition task produces: a table, a column, or a single scalar. */
export type Value = DataFrame | Series | Scalar;

export function isDataFrame(value: unknown): value is DataFrame {
  return value instanceof DataFrame;
}

export function isSeries(value: unknown): value is Series {
  return value instanceof Series;
}

export function isValue(value: unknown): value is Value {
  return value instanceof DataFrame || value instanceof Series || isScalar(value);
}

export function describeValue(value: unknown): string {
  if (value instanceof DataFrame) return 'DataFrame';
  if (value instanceof Series) return 'Series';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Number of dimensions: 2 for frames, 1 for series, 0 for scalars.
 */
export function ndimOf(value: Value): 0 | 1 | 2 {
  if (value instanceof DataFrame) return 2;
  if (value instanceof Series) return 1;
  return 0;
}

export function expectValue(value: unknown, operation: string): Value {
  if (isValue(value)) return value;
  throw ValidationError.typeMismatch(operation, 'a DataFrame, Series or scalar', describeValue(value));
}

export function expectFrame(value: unknown, operation: string): DataFrame {
  if (value instanceof DataFrame) return value;
  throw ValidationError.typeMismatch(operation, 'a DataFrame', describeValue(value));
}

export function expectSeries(value: unknown, operation: string): Series {
  if (value instanceof Series) return value;
  throw ValidationError.typeMismatch(operation, 'a Series', describeValue(value));
}

export function expectContainer(value: unknown, operation: string): DataFrame | Series {
  if (value instanceof DataFrame || value instanceof Series) return value;
  throw ValidationError.typeMismatch(operation, 'a DataFrame or Series', describeValue(value));
}

export function expectValues(value: unknown, operation: string): Value[] {
  if (!Array.isArray(value)) {
    throw ValidationError.typeMismatch(operation, 'a list of partitions', describeValue(value));
  }
  return value.map((item: unknown) => expectValue(item, operation));
}

/**
 * Rows of a frame or series at the given positions.
 */
export function takeRows(obj: DataFrame | Series, positions: readonly number[]): DataFrame | Series {
  const index = positions.map((p) => obj.index[p]);
  if (obj instanceof Series) {
    return obj.with({ values: positions.map((p) => obj.values[p]), index });
  }
  return obj.withColumns(
    obj.entries().map(([name, column]) => [
      name,
      { ...column, values: positions.map((p) => column.values[p]) },
    ] as const),
    index
  );
}

export function takeFrameRows(frame: DataFrame, positions: readonly number[]): DataFrame {
  const result = takeRows(frame, positions);
  return expectFrame(result, 'takeRows');
}
