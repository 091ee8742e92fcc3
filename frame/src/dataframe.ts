/**
 * Immutable in-memory table: ordered named columns sharing one index
 */

import { tokenize, ValidationError, type Tokenizable } from '@framegraph/core';
import { Series } from './series.js';
import { inferDType, rangeIndex, type DType, type Scalar } from './types.js';

export interface Column {
  readonly values: readonly Scalar[];
  readonly dtype: DType;
  readonly categories: readonly Scalar[] | null;
}

export interface FrameInit {
  index?: readonly Scalar[];
  indexName?: string | null;
  dtypes?: Readonly<Record<string, DType>>;
}

export class DataFrame implements Tokenizable {
  readonly columns: readonly string[];
  readonly index: readonly Scalar[];
  readonly indexName: string | null;
  private readonly data: ReadonlyMap<string, Column>;
  private token: string | undefined;

  constructor(columns: ReadonlyArray<readonly [string, Column]>, index: readonly Scalar[], indexName: string | null = null) {
    const data = new Map<string, Column>();
    for (const [name, column] of columns) {
      if (data.has(name)) {
        throw ValidationError.typeMismatch('DataFrame', 'unique column names', `duplicate "${name}"`);
      }
      if (column.values.length !== index.length) {
        throw ValidationError.lengthMismatch(`DataFrame column "${name}"`, column.values.length, index.length);
      }
      data.set(name, column);
    }
    this.data = data;
    this.columns = Object.freeze(columns.map(([name]) => name));
    this.index = Object.freeze([...index]);
    this.indexName = indexName;
  }

  /**
   * Build a frame from column arrays.
   *
   * @example
   * ```typescript
   * const df = DataFrame.fromColumns({ x: [1, 2, 3], y: ['a', 'b', 'c'] });
   * ```
   */
  static fromColumns(columns: Readonly<Record<string, readonly Scalar[]>>, init: FrameInit = {}): DataFrame {
    const entries = Object.entries(columns);
    const length = entries.length > 0 ? entries[0][1].length : (init.index?.length ?? 0);
    const index = init.index ?? rangeIndex(length);
    return new DataFrame(
      entries.map(([name, values]) => {
        const dtype = init.dtypes?.[name] ?? inferDType(values);
        return [name, { values: [...values], dtype, categories: null }] as const;
      }),
      index,
      init.indexName ?? null
    );
  }

  /**
   * Build a frame from row records; columns follow first appearance.
   */
  static fromRecords(rows: ReadonlyArray<Readonly<Record<string, Scalar>>>, init: FrameInit = {}): DataFrame {
    const names: string[] = [];
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!names.includes(key)) names.push(key);
      }
    }
    const columns: Record<string, Scalar[]> = {};
    for (const name of names) {
      columns[name] = rows.map((row) => row[name] ?? null);
    }
    return DataFrame.fromColumns(columns, { ...init, index: init.index ?? rangeIndex(rows.length) });
  }

  /**
   * Build a frame from series sharing an index; each series name becomes a column.
   */
  static fromSeries(series: readonly Series[], index?: readonly Scalar[], indexName?: string | null): DataFrame {
    const rowIndex = index ?? series[0]?.index ?? [];
    return new DataFrame(
      series.map((s) => {
        if (s.name === null) {
          throw ValidationError.typeMismatch('DataFrame.fromSeries', 'named series', 'an unnamed series');
        }
        return [s.name, { values: s.values, dtype: s.dtype, categories: s.categories }] as const;
      }),
      rowIndex,
      indexName === undefined ? (series[0]?.indexName ?? null) : indexName
    );
  }

  get length(): number {
    return this.index.length;
  }

  hasColumn(name: string): boolean {
    return this.data.has(name);
  }

  columnData(name: string): Column {
    const column = this.data.get(name);
    if (column === undefined) {
      throw ValidationError.columnNotFound(name, this.columns);
    }
    return column;
  }

  column(name: string): Series {
    const column = this.columnData(name);
    return new Series(column.values, {
      index: this.index,
      name,
      dtype: column.dtype,
      indexName: this.indexName,
      categories: column.categories,
    });
  }

  dtypes(): Record<string, DType> {
    const result: Record<string, DType> = {};
    for (const name of this.columns) {
      result[name] = this.columnData(name).dtype;
    }
    return result;
  }

  /**
   * Copy with new columns (in order), and optionally a new index.
   */
  withColumns(
    columns: ReadonlyArray<readonly [string, Column]>,
    index: readonly Scalar[] = this.index,
    indexName: string | null = this.indexName
  ): DataFrame {
    return new DataFrame(columns, index, indexName);
  }

  entries(): Array<readonly [string, Column]> {
    return this.columns.map((name) => [name, this.columnData(name)] as const);
  }

  toRecords(): Array<Record<string, Scalar>> {
    return this.index.map((_, row) => {
      const record: Record<string, Scalar> = {};
      for (const name of this.columns) {
        record[name] = this.columnData(name).values[row];
      }
      return record;
    });
  }

  toToken(): string {
    if (this.token === undefined) {
      this.token = tokenize(
        'dataframe',
        this.indexName,
        this.index,
        this.columns.map((name) => {
          const { values, dtype, categories } = this.columnData(name);
          return [name, dtype, categories, values];
        })
      );
    }
    return this.token;
  }

  toString(): string {
    return `DataFrame(columns=[${this.columns.join(', ')}], length=${this.length})`;
  }
}
