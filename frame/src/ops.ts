/**
 * Per-partition operations
 *
 * Every function here is pure: it never mutates its inputs, and running it
 * on a zero-row input yields the zero-row version of the real result. The
 * query layer relies on the second property to infer schemas.
 */

import { hashString, normalizeToken, ValidationError } from '@framegraph/core';
import { DataFrame, type Column } from './dataframe.js';
import { Series } from './series.js';
import {
  compareScalars,
  isNumericDType,
  isScalar,
  scalarDType,
  unifyDTypes,
  type DType,
  type Scalar,
} from './types.js';
import { describeValue, expectContainer, expectFrame, takeRows, type Value } from './value.js';

// =============================================================================
// Selection
// =============================================================================

export type ColumnKey = string | readonly string[];

export function isColumnKey(value: unknown): value is ColumnKey {
  return typeof value === 'string' || (Array.isArray(value) && value.every((v) => typeof v === 'string'));
}

/**
 * `df[key]`: a single column as a Series, or a list of columns as a frame.
 * On a Series the key selects index labels instead, so a single label
 * yields a scalar.
 */
export function getItem(obj: Value, key: ColumnKey): Value {
  if (obj instanceof Series) {
    const labels = typeof key === 'string' ? [key] : key;
    const positions = labels.map((label) => {
      const at = obj.index.indexOf(label);
      if (at < 0) {
        throw ValidationError.columnNotFound(label, obj.index.map(String));
      }
      return at;
    });
    return typeof key === 'string' ? obj.values[positions[0]] : takeRows(obj, positions);
  }
  const frame = expectFrame(obj, 'getItem');
  if (typeof key === 'string') {
    return frame.column(key);
  }
  return frame.withColumns(key.map((name) => [name, frame.columnData(name)] as const));
}

/**
 * Keep rows where `mask` is true; the mask aligns by position.
 */
export function filterRows(obj: Value, mask: Value): DataFrame | Series {
  const container = expectContainer(obj, 'filter');
  if (!(mask instanceof Series)) {
    throw ValidationError.typeMismatch('filter', 'a boolean Series mask', describeValue(mask));
  }
  if (mask.dtype !== 'bool' && mask.dtype !== 'object') {
    throw ValidationError.typeMismatch('filter', 'a boolean mask', `a ${mask.dtype} mask`);
  }
  if (mask.length !== container.length) {
    throw ValidationError.lengthMismatch('filter', container.length, mask.length);
  }
  const positions: number[] = [];
  mask.values.forEach((keep, i) => {
    if (keep === true) positions.push(i);
  });
  return takeRows(container, positions);
}

export function head(obj: Value, n: number): Value {
  if (!(obj instanceof DataFrame || obj instanceof Series)) return obj;
  const count = Math.max(0, Math.min(n, obj.length));
  return takeRows(obj, Array.from({ length: count }, (_, i) => i));
}

/**
 * Zero-row version of a value, used as schema metadata.
 */
export function emptyLike(obj: Value): Value {
  return head(obj, 0);
}

export function sliceRows(obj: Value, start: number, end: number): DataFrame | Series {
  const container = expectContainer(obj, 'sliceRows');
  const from = Math.max(0, start);
  const to = Math.min(container.length, end);
  return takeRows(container, Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i));
}

/**
 * Rows whose index lies in `[lower, upper)`, or `[lower, upper]` when
 * `includeUpper`. A null bound is open.
 */
export function sliceIndexRange(obj: Value, lower: Scalar, upper: Scalar, includeUpper: boolean): DataFrame | Series {
  const container = expectContainer(obj, 'sliceIndexRange');
  const positions: number[] = [];
  container.index.forEach((label, i) => {
    if (lower !== null && compareScalars(label, lower) < 0) return;
    if (upper !== null) {
      const cmp = compareScalars(label, upper);
      if (cmp > 0 || (cmp === 0 && !includeUpper)) return;
    }
    positions.push(i);
  });
  return takeRows(container, positions);
}

/**
 * The index as a Series named after the index.
 */
export function indexOf(obj: Value): Series {
  const container = expectContainer(obj, 'index');
  return new Series(container.index, {
    index: container.index,
    name: container.indexName,
    indexName: container.indexName,
  });
}

/**
 * Stable sort by index label.
 */
export function sortByIndex(obj: Value): DataFrame | Series {
  const container = expectContainer(obj, 'sortByIndex');
  const positions = container.index.map((_, i) => i);
  positions.sort((a, b) => compareScalars(container.index[a], container.index[b]) || a - b);
  return takeRows(container, positions);
}

// =============================================================================
// Arithmetic & Comparison
// =============================================================================

export type BinaryOperator = 'add' | 'sub' | 'mul' | 'div' | 'lt' | 'le' | 'gt' | 'ge' | 'eq' | 'ne';

export const BINARY_OPERATORS: readonly BinaryOperator[] = ['add', 'sub', 'mul', 'div', 'lt', 'le', 'gt', 'ge', 'eq', 'ne'];

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
  eq: '==',
  ne: '!=',
};

export function isBinaryOperator(value: unknown): value is BinaryOperator {
  return BINARY_OPERATORS.some((op) => op === value);
}

const isComparison = (op: BinaryOperator): boolean =>
  op === 'lt' || op === 'le' || op === 'gt' || op === 'ge' || op === 'eq' || op === 'ne';

/**
 * dtype of `left <op> right`; throws when the dtypes cannot be combined.
 */
export function binaryResultDType(op: BinaryOperator, left: DType, right: DType): DType {
  const numeric = isNumericDType(left) && isNumericDType(right);
  const opaque = left === 'object' || right === 'object';

  if (isComparison(op)) {
    const textual = (d: DType): boolean => d === 'string' || d === 'category';
    const ordered = numeric || (textual(left) && textual(right));
    if (!ordered && !opaque && op !== 'eq' && op !== 'ne') {
      throw ValidationError.typeMismatch(OPERATOR_SYMBOLS[op], 'comparable dtypes', `${left} and ${right}`);
    }
    return 'bool';
  }

  if (numeric) {
    if (op === 'div') return 'float64';
    return left === 'float64' || right === 'float64' ? 'float64' : 'int64';
  }
  if (op === 'add' && left === 'string' && right === 'string') return 'string';
  if (opaque) return 'object';
  throw ValidationError.typeMismatch(OPERATOR_SYMBOLS[op], 'numeric dtypes', `${left} and ${right}`);
}

const toNumber = (value: Scalar, op: BinaryOperator): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return Number(value);
  throw ValidationError.typeMismatch(OPERATOR_SYMBOLS[op], 'a number', typeof value);
};

/**
 * `left <op> right` on two scalars. Arithmetic with null is null;
 * comparisons with null are false, except `!=`.
 */
export function applyScalarOperator(op: BinaryOperator, left: Scalar, right: Scalar): Scalar {
  if (op === 'eq') return left !== null && right !== null && left === right;
  if (op === 'ne') return left === null || right === null || left !== right;
  if (left === null || right === null) {
    return isComparison(op) ? false : null;
  }
  if (isComparison(op)) {
    const cmp =
      typeof left === 'string' && typeof right === 'string'
        ? compareScalars(left, right)
        : toNumber(left, op) - toNumber(right, op);
    switch (op) {
      case 'lt':
        return cmp < 0;
      case 'le':
        return cmp <= 0;
      case 'gt':
        return cmp > 0;
      default:
        return cmp >= 0;
    }
  }
  if (op === 'add' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  const a = toNumber(left, op);
  const b = toNumber(right, op);
  switch (op) {
    case 'add':
      return a + b;
    case 'sub':
      return a - b;
    case 'mul':
      return a * b;
    default:
      return a / b;
  }
}

const columnOfSeries = (s: Series): Column => ({ values: s.values, dtype: s.dtype, categories: s.categories });

function seriesWithScalar(op: BinaryOperator, s: Series, scalar: Scalar, scalarOnLeft: boolean): Series {
  const dtype = scalarOnLeft
    ? binaryResultDType(op, scalarDType(scalar), s.dtype)
    : binaryResultDType(op, s.dtype, scalarDType(scalar));
  const values = s.values.map((v) =>
    scalarOnLeft ? applyScalarOperator(op, scalar, v) : applyScalarOperator(op, v, scalar)
  );
  return s.with({ values, dtype, categories: null });
}

function seriesWithSeries(op: BinaryOperator, left: Series, right: Series): Series {
  const dtype = binaryResultDType(op, left.dtype, right.dtype);
  if (left.length !== right.length) {
    throw ValidationError.lengthMismatch(OPERATOR_SYMBOLS[op], left.length, right.length);
  }
  const values = left.values.map((v, i) => applyScalarOperator(op, v, right.values[i]));
  return left.with({ values, dtype, categories: null, name: left.name === right.name ? left.name : null });
}

function frameWithFrame(op: BinaryOperator, left: DataFrame, right: DataFrame): DataFrame {
  if (left.length !== right.length) {
    throw ValidationError.lengthMismatch(OPERATOR_SYMBOLS[op], left.length, right.length);
  }
  const sameColumns =
    left.columns.length === right.columns.length && left.columns.every((c, i) => right.columns[i] === c);
  const names = sameColumns
    ? [...left.columns]
    : [...new Set([...left.columns, ...right.columns])].sort();
  return left.withColumns(
    names.map((name) => {
      if (left.hasColumn(name) && right.hasColumn(name)) {
        return [name, columnOfSeries(seriesWithSeries(op, left.column(name), right.column(name)))] as const;
      }
      const missing: Column = {
        values: left.index.map(() => (isComparison(op) ? op === 'ne' : null)),
        dtype: isComparison(op) ? 'bool' : 'float64',
        categories: null,
      };
      return [name, missing] as const;
    })
  );
}

/**
 * Element-wise `left <op> right` over scalars, series and frames. Containers
 * align by position; frames combine over the union of their columns.
 */
export function binaryOp(op: BinaryOperator, left: Value, right: Value): Value {
  if (isScalar(left) && isScalar(right)) {
    binaryResultDType(op, scalarDType(left), scalarDType(right));
    return applyScalarOperator(op, left, right);
  }
  if (left instanceof Series && right instanceof Series) {
    return seriesWithSeries(op, left, right);
  }
  if (left instanceof Series && isScalar(right)) {
    return seriesWithScalar(op, left, right, false);
  }
  if (isScalar(left) && right instanceof Series) {
    return seriesWithScalar(op, right, left, true);
  }
  if (left instanceof DataFrame && right instanceof DataFrame) {
    return frameWithFrame(op, left, right);
  }
  if (left instanceof DataFrame && isScalar(right)) {
    return left.withColumns(
      left.entries().map(([name]) => [name, columnOfSeries(seriesWithScalar(op, left.column(name), right, false))] as const)
    );
  }
  if (isScalar(left) && right instanceof DataFrame) {
    return right.withColumns(
      right.entries().map(([name]) => [name, columnOfSeries(seriesWithScalar(op, right.column(name), left, true))] as const)
    );
  }
  throw ValidationError.typeMismatch(
    OPERATOR_SYMBOLS[op],
    'operands of matching shape',
    `${describeValue(left)} and ${describeValue(right)}`
  );
}

// =============================================================================
// Conversion & Assignment
// =============================================================================

function convertScalar(value: Scalar, dtype: DType): Scalar {
  if (value === null) return null;
  switch (dtype) {
    case 'int64': {
      const n = Math.trunc(Number(value));
      return Number.isNaN(n) ? null : n;
    }
    case 'float64': {
      const n = Number(value);
      return Number.isNaN(n) ? null : n;
    }
    case 'bool':
      return typeof value === 'string' ? value.length > 0 : Boolean(value);
    case 'string':
      return String(value);
    default:
      return value;
  }
}

function convertColumn(column: Column, dtype: DType): Column {
  if (column.dtype === dtype) return column;
  return {
    values: column.values.map((v) => convertScalar(v, dtype)),
    dtype,
    categories: null,
  };
}

export type DTypeSpec = DType | Readonly<Record<string, DType>>;

/**
 * Cast a series, or some or all columns of a frame. Casting to `category`
 * yields unknown categories.
 */
export function astype(obj: Value, dtypes: DTypeSpec): Value {
  if (obj instanceof Series) {
    if (typeof dtypes !== 'string') {
      throw ValidationError.typeMismatch('astype', 'a single dtype for a Series', 'a mapping');
    }
    const column = convertColumn({ values: obj.values, dtype: obj.dtype, categories: obj.categories }, dtypes);
    return obj.with({ values: column.values, dtype: column.dtype, categories: column.categories });
  }
  if (obj instanceof DataFrame) {
    if (typeof dtypes !== 'string') {
      for (const name of Object.keys(dtypes)) {
        obj.columnData(name);
      }
    }
    return obj.withColumns(
      obj.entries().map(([name, column]) => {
        const target = typeof dtypes === 'string' ? dtypes : dtypes[name];
        return [name, target === undefined ? column : convertColumn(column, target)] as const;
      })
    );
  }
  return typeof dtypes === 'string' ? convertScalar(obj, dtypes) : obj;
}

/**
 * Add or replace column `key` with a series (aligned by position) or a scalar.
 */
export function assign(obj: Value, key: string, value: Value): DataFrame {
  const frame = expectFrame(obj, 'assign');
  let column: Column;
  if (value instanceof Series) {
    if (value.length !== frame.length) {
      throw ValidationError.lengthMismatch('assign', frame.length, value.length);
    }
    column = columnOfSeries(value);
  } else if (isScalar(value)) {
    column = { values: frame.index.map(() => value), dtype: scalarDType(value), categories: null };
  } else {
    throw ValidationError.typeMismatch('assign', 'a Series or scalar', describeValue(value));
  }
  const entries = frame.entries();
  const existing = entries.findIndex(([name]) => name === key);
  if (existing >= 0) {
    entries[existing] = [key, column];
  } else {
    entries.push([key, column]);
  }
  return frame.withColumns(entries);
}

export type ApplyFunction = (value: Scalar, ...args: unknown[]) => Scalar;

/**
 * Apply `fn` to every element. The result keeps the input dtype unless
 * `dtype` is given, so zero-row and full results agree.
 */
export function applyValues(
  obj: Value,
  fn: ApplyFunction,
  args: readonly unknown[] = [],
  kwargs: Readonly<Record<string, unknown>> = {},
  dtype: DType | null = null
): Value {
  const extra = Object.keys(kwargs).length > 0 ? [...args, kwargs] : [...args];
  const call = (v: Scalar): Scalar => {
    const result: unknown = fn(v, ...extra);
    if (!isScalar(result)) {
      throw ValidationError.typeMismatch('apply', 'a scalar result', describeValue(result));
    }
    return result;
  };
  if (obj instanceof Series) {
    return obj.with({ values: obj.values.map(call), dtype: dtype ?? obj.dtype, categories: null });
  }
  if (obj instanceof DataFrame) {
    return obj.withColumns(
      obj.entries().map(([name, column]) => [
        name,
        { values: column.values.map(call), dtype: dtype ?? column.dtype, categories: null },
      ] as const)
    );
  }
  return call(obj);
}

// =============================================================================
// Concatenation
// =============================================================================

export interface ConcatOptions {
  join?: 'outer' | 'inner';
  axis?: 0 | 1;
}

function mergeColumns(parts: readonly (Column | undefined)[], lengths: readonly number[]): Column {
  const present = parts.filter((c): c is Column => c !== undefined);
  const dtype = present.map((c) => c.dtype).reduce(unifyDTypes);
  const categorical = present.every((c) => c.dtype === 'category');
  let categories: Scalar[] | null = null;
  if (categorical && present.every((c) => c.categories !== null)) {
    categories = [];
    for (const c of present) {
      for (const category of c.categories ?? []) {
        if (!categories.includes(category)) categories.push(category);
      }
    }
  }
  const values = parts.flatMap((c, i) => (c === undefined ? Array<Scalar>(lengths[i]).fill(null) : [...c.values]));
  return { values, dtype: categorical ? 'category' : dtype, categories };
}

function concatFrameRows(frames: readonly DataFrame[], join: 'outer' | 'inner'): DataFrame {
  const names =
    join === 'outer'
      ? [...new Set(frames.flatMap((f) => f.columns))]
      : frames[0].columns.filter((name) => frames.every((f) => f.hasColumn(name)));
  const lengths = frames.map((f) => f.length);
  const indexName = frames.every((f) => f.indexName === frames[0].indexName) ? frames[0].indexName : null;
  return new DataFrame(
    names.map((name) => [
      name,
      mergeColumns(frames.map((f) => (f.hasColumn(name) ? f.columnData(name) : undefined)), lengths),
    ] as const),
    frames.flatMap((f) => [...f.index]),
    indexName
  );
}

function concatSeriesRows(series: readonly Series[]): Series {
  const column = mergeColumns(series.map(columnOfSeries), series.map((s) => s.length));
  const first = series[0];
  return new Series(column.values, {
    index: series.flatMap((s) => [...s.index]),
    name: series.every((s) => s.name === first.name) ? first.name : null,
    dtype: column.dtype,
    indexName: series.every((s) => s.indexName === first.indexName) ? first.indexName : null,
    categories: column.categories,
  });
}

function concatColumns(parts: readonly (DataFrame | Series)[]): DataFrame {
  const first = parts[0];
  const entries: Array<readonly [string, Column]> = [];
  for (const part of parts) {
    if (part.length !== first.length) {
      throw ValidationError.lengthMismatch('concat', first.length, part.length);
    }
    if (part instanceof Series) {
      if (part.name === null) {
        throw ValidationError.typeMismatch('concat', 'named series', 'an unnamed series');
      }
      entries.push([part.name, columnOfSeries(part)]);
    } else {
      entries.push(...part.entries());
    }
  }
  return new DataFrame(entries, first.index, first.indexName);
}

/**
 * Concatenate partitions along rows (`axis: 0`) or columns (`axis: 1`).
 */
export function concatValues(parts: readonly Value[], options: ConcatOptions = {}): Value {
  if (parts.length === 0) {
    throw ValidationError.typeMismatch('concat', 'at least one value', 'none');
  }
  const containers = parts.map((p) => expectContainer(p, 'concat'));
  if (options.axis === 1) {
    return concatColumns(containers);
  }
  const frames = containers.filter((c): c is DataFrame => c instanceof DataFrame);
  if (frames.length === containers.length) {
    return concatFrameRows(frames, options.join ?? 'outer');
  }
  const series = containers.filter((c): c is Series => c instanceof Series);
  if (series.length === containers.length) {
    return concatSeriesRows(series);
  }
  throw ValidationError.typeMismatch('concat', 'only frames or only series', 'a mix of both');
}

// =============================================================================
// Index Shifts
// =============================================================================

/**
 * Index offsets. `fixed` adds a constant; anchored (`monthStart`,
 * `monthEnd`, `dayStart`) and relative (`months`) offsets act on epoch
 * milliseconds in UTC.
 */
export type IndexOffset =
  | { kind: 'fixed'; amount: number }
  | { kind: 'monthStart' | 'monthEnd' | 'dayStart'; periods: number }
  | { kind: 'months'; periods: number };

const DAY_MS = 86_400_000;

export function shiftLabel(label: Scalar, offset: IndexOffset): Scalar {
  if (typeof label !== 'number') {
    throw ValidationError.typeMismatch('shiftIndex', 'a numeric index', typeof label);
  }
  const date = new Date(label);
  switch (offset.kind) {
    case 'fixed':
      return label + offset.amount;
    case 'dayStart':
      return Math.floor(label / DAY_MS) * DAY_MS + offset.periods * DAY_MS;
    case 'monthStart':
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + offset.periods, 1);
    case 'monthEnd':
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + offset.periods + 1, 0);
    case 'months':
      return Date.UTC(
        date.getUTCFullYear(),
        date.getUTCMonth() + offset.periods,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
        date.getUTCMilliseconds()
      );
  }
}

export function shiftIndex(obj: Value, offset: IndexOffset): DataFrame | Series {
  const container = expectContainer(obj, 'shiftIndex');
  const index = container.index.map((label) => shiftLabel(label, offset));
  if (container instanceof Series) {
    return container.with({ index });
  }
  return container.withColumns(container.entries(), index);
}

// =============================================================================
// Hash Partitioning
// =============================================================================

/**
 * Which values decide the output piece of a row.
 */
export type HashKey = 'index' | 'values' | readonly string[];

/**
 * Split a partition into `n` pieces by a hash of each row's key; equal keys
 * always land in the same piece.
 */
export function hashSplit(obj: Value, n: number, on: HashKey = 'index'): Array<DataFrame | Series> {
  const container = expectContainer(obj, 'hashSplit');
  const keyOf = (row: number): unknown => {
    if (on === 'index') return container.index[row];
    if (container instanceof Series) return container.values[row];
    const names = on === 'values' ? container.columns : on;
    return names.map((name) => container.columnData(name).values[row]);
  };
  const buckets: number[][] = Array.from({ length: n }, () => []);
  for (let row = 0; row < container.length; row++) {
    buckets[hashString(normalizeToken(keyOf(row))) % n].push(row);
  }
  return buckets.map((positions) => takeRows(container, positions));
}
