/**
 * Categorical kernels
 */

import { UnsupportedOperationError, ValidationError } from '@framegraph/core';
import { DataFrame, type Column } from './dataframe.js';
import { concatValues } from './ops.js';
import { Series } from './series.js';
import type { Scalar } from './types.js';
import { expectContainer, expectFrame, expectSeries, type Value } from './value.js';

/** Known categories per column. */
export type CategoryMap = Readonly<Record<string, readonly Scalar[]>>;

/**
 * Columns that `categorize` converts when none are named: string columns
 * and category columns whose categories are unknown.
 */
export function categorizableColumns(frame: DataFrame): string[] {
  return frame.columns.filter((name) => {
    const column = frame.columnData(name);
    return column.dtype === 'string' || (column.dtype === 'category' && column.categories === null);
  });
}

/**
 * Distinct non-null values per column in one partition, as a long frame
 * with columns `column` and `category`.
 */
export function getCategoriesChunk(obj: Value, columns: readonly string[]): DataFrame {
  const container = expectContainer(obj, 'getCategories');
  const names: Scalar[] = [];
  const categories: Scalar[] = [];
  const collect = (name: string, values: readonly Scalar[]): void => {
    for (const value of new Set(values)) {
      if (value === null) continue;
      names.push(name);
      categories.push(value);
    }
  };
  if (container instanceof Series) {
    collect(container.name ?? '', container.values);
  } else {
    for (const name of columns) collect(name, container.columnData(name).values);
  }
  return DataFrame.fromColumns(
    { column: names, category: categories },
    { dtypes: { column: 'string', category: 'object' } }
  );
}

/**
 * Merge long-format partials, keeping the first appearance of each pair.
 */
export function getCategoriesAggregate(parts: readonly Value[]): DataFrame {
  const merged = expectFrame(concatValues(parts.map((part) => expectFrame(part, 'getCategories'))), 'getCategories');
  const names = merged.columnData('column').values;
  const categories = merged.columnData('category').values;
  const seen = new Set<string>();
  const keep: number[] = [];
  names.forEach((name, row) => {
    const key = JSON.stringify([name, categories[row]]);
    if (seen.has(key)) return;
    seen.add(key);
    keep.push(row);
  });
  return DataFrame.fromColumns(
    { column: keep.map((row) => names[row]), category: keep.map((row) => categories[row]) },
    { dtypes: { column: 'string', category: 'object' } }
  );
}

/**
 * Category lists from the long frame `getCategoriesAggregate` produces.
 */
export function categoryMapFromFrame(frame: DataFrame): Record<string, Scalar[]> {
  const result: Record<string, Scalar[]> = {};
  const names = frame.columnData('column').values;
  const categories = frame.columnData('category').values;
  names.forEach((name, row) => {
    const key = String(name);
    (result[key] ??= []).push(categories[row]);
  });
  return result;
}

function toCategory(column: Column, categories: readonly Scalar[] | null): Column {
  return { values: column.values, dtype: 'category', categories };
}

/**
 * Mark columns (or a series) as categorical with the given known categories.
 * Values outside the categories become null.
 */
export function categorize(obj: Value, categories: CategoryMap): Value {
  const restrict = (column: Column, known: readonly Scalar[]): Column => {
    const allowed = new Set(known);
    return toCategory({ ...column, values: column.values.map((v) => (allowed.has(v) ? v : null)) }, known);
  };
  if (obj instanceof Series) {
    const known = categories[obj.name ?? ''];
    if (known === undefined) return obj;
    const column = restrict({ values: obj.values, dtype: obj.dtype, categories: obj.categories }, known);
    return obj.with({ values: column.values, dtype: 'category', categories: column.categories });
  }
  const frame = expectFrame(obj, 'categorize');
  return frame.withColumns(
    frame.entries().map(([name, column]) => {
      const known = categories[name];
      return [name, known === undefined ? column : restrict(column, known)] as const;
    })
  );
}

/**
 * Forget known categories; the values are unchanged.
 */
export function asUnknown(obj: Value): Value {
  const series = expectSeries(obj, 'cat.asUnknown');
  if (series.dtype !== 'category') {
    throw ValidationError.typeMismatch('cat.asUnknown', 'a category series', `a ${series.dtype} series`);
  }
  return series.with({ categories: null });
}

/**
 * Replace the categories of a category series; values outside the new
 * categories become null.
 */
export function setCategories(obj: Value, categories: readonly Scalar[]): Value {
  const series = expectSeries(obj, 'cat.setCategories');
  if (series.dtype !== 'category') {
    throw ValidationError.typeMismatch('cat.setCategories', 'a category series', `a ${series.dtype} series`);
  }
  const allowed = new Set(categories);
  return series.with({ values: series.values.map((v) => (allowed.has(v) ? v : null)), categories });
}

/**
 * Position of each value in the known categories, -1 for null.
 *
 * @throws UnsupportedOperationError when the categories are unknown
 */
export function categoryCodes(obj: Value): Series {
  const series = expectSeries(obj, 'cat.codes');
  if (series.dtype !== 'category') {
    throw ValidationError.typeMismatch('cat.codes', 'a category series', `a ${series.dtype} series`);
  }
  const known = series.categories;
  if (known === null) {
    throw UnsupportedOperationError.unknownCategories('cat.codes');
  }
  return series.with({
    values: series.values.map((v) => (v === null ? -1 : known.indexOf(v))),
    dtype: 'int64',
    categories: null,
  });
}
