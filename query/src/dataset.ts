/**
 * Storage reader contract and the dataset wrapper that plans reads.
 *
 * A `Dataset` turns fragment statistics into a read plan: empty fragments
 * are dropped, fragments whose min/max cannot satisfy an absorbed predicate
 * are pruned (the zone-map rule), and divisions are inferred from index
 * statistics when the surviving fragments are strictly ordered. Plans are
 * kept in an LRU cache owned by the wrapper.
 */

import { LruCache, createNoopLogger, tokenize, type LruCacheStats, type Logger, type Tokenizable } from '@framegraph/core';
import {
  DataFrame,
  binaryOp,
  compareScalars,
  expectFrame,
  expectSeries,
  filterRows,
  type BinaryOperator,
  type DType,
  type Scalar,
} from '@framegraph/frame';
import { DatasetManifestSchema, FragmentInfoSchema, validate } from './schemas.js';
import { unknownDivisions, type Divisions, type FilterOperator, type FilterPredicate } from './types.js';

// =============================================================================
// Reader Contract
// =============================================================================

/**
 * Min/max statistics of one column in one fragment. `min` and `max` ignore
 * nulls and are null when every value is.
 */
export interface ColumnStatistics {
  min: Scalar;
  max: Scalar;
  nullCount: number;
}

/**
 * One physical fragment of a dataset: an addressable unit of work.
 */
export interface FragmentInfo {
  /** Reader-specific fragment identifier */
  id: string;

  rowCount: number;

  /** Per-column statistics; a missing column has none */
  columns: Readonly<Record<string, ColumnStatistics>>;

  /** Statistics of the index, when the format records them */
  index?: ColumnStatistics;
}

/**
 * Column manifest of a dataset.
 */
export interface DatasetManifest {
  columns: readonly string[];
  dtypes: Readonly<Record<string, DType>>;
  indexName: string | null;
}

export interface ReadOptions {
  /** Columns to return, in order; null for all */
  columns: readonly string[] | null;

  /** Predicates the reader may use to skip rows */
  filters: readonly FilterPredicate[];
}

/**
 * What a storage format must provide for pushdown.
 *
 * @example
 * ```typescript
 * const reader: StorageReader = new InMemoryReader('sales', [january, february]);
 * reader.fragments().map((f) => f.rowCount); // [31, 28]
 * ```
 */
export interface StorageReader {
  /** Stable identity of the source; equal ids mean equal data */
  readonly id: string;

  manifest(): DatasetManifest;

  fragments(): readonly FragmentInfo[];

  read(fragment: FragmentInfo, options: ReadOptions): Promise<DataFrame>;
}

// =============================================================================
// Predicates
// =============================================================================

const FILTER_BINARY_OPERATORS: Readonly<Record<FilterOperator, BinaryOperator>> = {
  '==': 'eq',
  '!=': 'ne',
  '<': 'lt',
  '<=': 'le',
  '>': 'gt',
  '>=': 'ge',
};

export function filterBinaryOperator(operator: FilterOperator): BinaryOperator {
  return FILTER_BINARY_OPERATORS[operator];
}

/**
 * Keep the rows of `frame` that satisfy every predicate.
 */
export function applyFilters(frame: DataFrame, filters: readonly FilterPredicate[]): DataFrame {
  let result = frame;
  for (const [column, operator, value] of filters) {
    const mask = expectSeries(binaryOp(FILTER_BINARY_OPERATORS[operator], result.column(column), value), 'filter');
    result = expectFrame(filterRows(result, mask), 'filter');
  }
  return result;
}

/**
 * True when no row with these statistics can satisfy the predicate.
 * Statistics with a null bound never prune.
 */
export function statisticsExclude(stats: ColumnStatistics, operator: FilterOperator, value: Scalar): boolean {
  const { min, max, nullCount } = stats;
  if (min === null || max === null || value === null) return false;

  switch (operator) {
    case '==':
      // value < min or value > max: no row can equal it
      return compareScalars(value, min) < 0 || compareScalars(value, max) > 0;
    case '!=':
      // Every row equals value and none is null
      return nullCount === 0 && compareScalars(min, value) === 0 && compareScalars(max, value) === 0;
    case '<':
      return compareScalars(min, value) >= 0;
    case '<=':
      return compareScalars(min, value) > 0;
    case '>':
      return compareScalars(max, value) <= 0;
    case '>=':
      return compareScalars(max, value) < 0;
  }
}

/**
 * True when the fragment is empty or its statistics rule out some filter.
 */
export function fragmentExcluded(fragment: FragmentInfo, filters: readonly FilterPredicate[]): boolean {
  return (
    fragment.rowCount === 0 ||
    filters.some(([column, operator, value]) => {
      const stats = fragment.columns[column];
      return stats !== undefined && statisticsExclude(stats, operator, value);
    })
  );
}

// =============================================================================
// Dataset
// =============================================================================

export interface DatasetPlan {
  /** Fragments to read, in order */
  fragments: readonly FragmentInfo[];

  /** Divisions over `fragments`; unknown unless statistics order them strictly */
  divisions: Divisions;

  /** Fragments dropped as empty or excluded by statistics */
  pruned: number;
}

export interface DatasetOptions {
  /** Plans kept in the cache (default: 32) */
  cacheSize?: number;
  logger?: Logger;
}

/**
 * Divisions from index statistics: known only when every fragment has index
 * statistics and each fragment's maximum is below the next one's minimum.
 */
export function divisionsFromStatistics(fragments: readonly FragmentInfo[]): Divisions {
  if (fragments.length === 0) return unknownDivisions(1);
  const bounds: Array<{ min: Scalar; max: Scalar }> = [];
  for (const fragment of fragments) {
    const stats = fragment.index;
    if (stats === undefined || stats.min === null || stats.max === null) {
      return unknownDivisions(fragments.length);
    }
    bounds.push({ min: stats.min, max: stats.max });
  }
  for (let i = 1; i < bounds.length; i++) {
    if (compareScalars(bounds[i - 1].max, bounds[i].min) >= 0) {
      return unknownDivisions(fragments.length);
    }
  }
  return [...bounds.map((b) => b.min), bounds[bounds.length - 1].max];
}

/**
 * A storage reader plus the cached read plans derived from its statistics.
 */
export class Dataset implements Tokenizable {
  private readonly plans: LruCache<string, DatasetPlan>;
  private readonly logger: Logger;
  private manifestCache: DatasetManifest | undefined;

  constructor(readonly reader: StorageReader, options: DatasetOptions = {}) {
    this.plans = new LruCache(options.cacheSize ?? 32);
    this.logger = options.logger ?? createNoopLogger();
  }

  get id(): string {
    return this.reader.id;
  }

  toToken(): string {
    return `dataset:${this.reader.id}`;
  }

  toString(): string {
    return `Dataset(${this.reader.id})`;
  }

  get manifest(): DatasetManifest {
    if (this.manifestCache === undefined) {
      this.manifestCache = validate(DatasetManifestSchema, this.reader.manifest(), `manifest of ${this.reader.id}`);
    }
    return this.manifestCache;
  }

  /**
   * Zero-row frame with the dataset's schema.
   */
  meta(): DataFrame {
    const { columns, dtypes, indexName } = this.manifest;
    const empty: Record<string, Scalar[]> = Object.fromEntries(columns.map((name) => [name, []]));
    return DataFrame.fromColumns(empty, { dtypes, indexName });
  }

  /**
   * The reader's fragments after checking their statistics. The reader's own
   * objects are kept, since `read` receives them back.
   */
  private fragments(): readonly FragmentInfo[] {
    const fragments = this.reader.fragments();
    fragments.forEach((fragment, i) => validate(FragmentInfoSchema, fragment, `fragment ${i} of ${this.reader.id}`));
    return fragments;
  }

  /**
   * Fragments to read under `filters`, and their divisions.
   */
  plan(filters: readonly FilterPredicate[], calculateDivisions: boolean): DatasetPlan {
    return this.plans.getOrCompute(tokenize(filters, calculateDivisions), () => {
      const all = this.fragments();
      const fragments = all.filter((fragment) => !fragmentExcluded(fragment, filters));
      const pruned = all.length - fragments.length;
      this.logger.debug('Planned dataset read', {
        component: 'io',
        dataset: this.reader.id,
        fragments: fragments.length,
        pruned,
        filters: filters.length,
      });
      return {
        fragments,
        divisions: calculateDivisions ? divisionsFromStatistics(fragments) : unknownDivisions(Math.max(fragments.length, 1)),
        pruned,
      };
    });
  }

  cacheStats(): LruCacheStats {
    return this.plans.stats();
  }

  /**
   * Read one fragment, apply `filters` to its rows and keep `columns`.
   * Columns the filters need are read even when not returned.
   */
  async readFragment(
    fragment: FragmentInfo,
    columns: readonly string[] | null,
    filters: readonly FilterPredicate[]
  ): Promise<DataFrame> {
    const wanted = columns ?? this.manifest.columns;
    const needed = [...wanted, ...filters.map(([column]) => column).filter((column) => !wanted.includes(column))];
    const frame = await this.reader.read(fragment, { columns: needed, filters });
    const filtered = applyFilters(frame, filters);
    return filtered.withColumns(wanted.map((name) => [name, filtered.columnData(name)] as const));
  }
}
