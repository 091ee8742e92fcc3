/**
 * Collection API
 *
 * Thin lazy wrappers over expressions. Every method builds a node; nothing
 * runs until `compute` or `persist`. Metadata is inferred when a wrapper is
 * built, so a bad column name or dtype fails at the call that introduced it.
 *
 * @example
 * ```typescript
 * import { readDataset } from '@framegraph/query';
 *
 * const df = readDataset(new InMemoryReader('trips', fragments));
 * const fares = df.where(df.get('distance').gt(10)).get('fare');
 * await fares.mean().compute();
 * ```
 */

import { DEFAULT_CONFIG, createConfiguredLogger, type FrameGraphConfig } from '@framegraph/config';
import { createNoopLogger, UnsupportedOperationError, ValidationError, type Logger } from '@framegraph/core';
import {
  DataFrame as FrameValue,
  Series as SeriesValue,
  categorizableColumns,
  categoryMapFromFrame,
  concatValues,
  describeValue,
  expectFrame,
  expectSeries,
  expectValue,
  isNumericDType,
  isScalar,
  type ApplyFunction,
  type DType,
  type DTypeSpec,
  type GroupbyAggregate,
  type GroupbySpec,
  type IndexOffset,
  type Scalar as ScalarValue,
  type Value,
} from '@framegraph/frame';
import { AsUnknown, Categorize, CategoryCodes, SetCategories } from './categorical.js';
import { Dataset, type StorageReader } from './dataset.js';
import { LocalExecutor, collectResults } from './executor.js';
import { Expr, Filter, Head, Projection, kw } from './expr.js';
import { materialize, outputKeys } from './graph.js';
import { FromFrame, FromGraph, ReadDataset } from './io.js';
import { optimize } from './optimize.js';
import { Concat, Repartition, ShiftIndex, type ConcatJoin } from './partitioning.js';
import {
  All,
  Any,
  Count,
  DropDuplicates,
  GetCategories,
  GroupbyAggregation,
  Len,
  Max,
  Mean,
  Min,
  Mode,
  Prod,
  Size,
  Sum,
  Unique,
  ValueCounts,
} from './reductions.js';
import { FilterListSchema, validate } from './schemas.js';
import type { FilterPredicate } from './types.js';

// =============================================================================
// Context
// =============================================================================

export interface CollectionOptions {
  config?: FrameGraphConfig;
  logger?: Logger;
  /** Without a `logger`, log to the console per `observability` settings */
  log?: boolean;
  executor?: LocalExecutor;
}

/**
 * Settings shared by every collection derived from one entry point.
 */
export interface CollectionContext {
  readonly config: FrameGraphConfig;
  readonly logger: Logger;
  readonly executor: LocalExecutor;
}

export function createContext(options: CollectionOptions = {}): CollectionContext {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? (options.log === true ? createConfiguredLogger(config) : createNoopLogger());
  return {
    config,
    logger,
    executor: options.executor ?? new LocalExecutor({ logger }),
  };
}

export interface ReductionOptions {
  /** Fan-in of the combine tree; `null` or `false` for a single aggregate */
  splitEvery?: number | null | false;
}

export interface SplitReductionOptions extends ReductionOptions {
  /** Output partitions (default: reduction.splitOut) */
  splitOut?: number;
}

export type RepartitionOptions = { npartitions: number } | { divisions: readonly ScalarValue[] };

export interface ApplyOptions {
  args?: readonly unknown[];
  kwargs?: Readonly<Record<string, unknown>>;
  dtype?: DType;
}

// =============================================================================
// Collection
// =============================================================================

/** A collection or a plain scalar, as the other side of an operator. */
export type Operand = Collection | ScalarValue;

const unwrap = (value: Operand): unknown => (value instanceof Collection ? value.expr : value);

export class Collection {
  constructor(
    readonly expr: Expr,
    readonly context: CollectionContext
  ) {}

  get name(): string {
    return this.expr.name;
  }

  get meta(): Value {
    return this.expr.meta;
  }

  get divisions(): readonly ScalarValue[] {
    return this.expr.divisions;
  }

  get npartitions(): number {
    return this.expr.npartitions;
  }

  get knownDivisions(): boolean {
    return this.expr.knownDivisions;
  }

  explain(): string {
    return this.expr.explain();
  }

  toString(): string {
    return this.expr.toString();
  }

  protected optimizedExpr(fuse?: boolean): Expr {
    return optimize(this.expr, { config: this.context.config, logger: this.context.logger, fuse });
  }

  /**
   * Optimize, materialize and run; partitions in order.
   */
  protected async computePartitions(): Promise<{ expr: Expr; parts: Value[] }> {
    const expr = this.optimizedExpr();
    const keys = outputKeys(expr);
    const results = await this.context.executor.execute(materialize(expr), keys);
    return { expr, parts: collectResults(results, keys).map((part) => expectValue(part, 'compute')) };
  }

  protected async computeValue(): Promise<Value> {
    const { parts } = await this.computePartitions();
    return parts.length === 1 ? parts[0] : concatValues(parts);
  }

  protected async persistExpr(): Promise<Expr> {
    const { expr, parts } = await this.computePartitions();
    return new FromGraph(parts, expr.meta, [...expr.divisions], expr.name);
  }
}

function expectDimensions(expr: Expr, ndim: 0 | 1 | 2, kind: string): void {
  if (expr.ndim !== ndim) {
    throw ValidationError.typeMismatch(kind, `a ${ndim}-dimensional expression`, describeValue(expr.meta));
  }
}

// =============================================================================
// DataFrame
// =============================================================================

export class DataFrame extends Collection {
  constructor(expr: Expr, context: CollectionContext) {
    super(expr, context);
    expectDimensions(expr, 2, 'DataFrame');
  }

  private frame(expr: Expr): DataFrame {
    return new DataFrame(expr, this.context);
  }

  private series(expr: Expr): Series {
    return new Series(expr, this.context);
  }

  get columns(): string[] {
    return this.expr.columns;
  }

  get dtypes(): Record<string, DType> {
    return this.expr.dtypes;
  }

  get index(): Series {
    return this.series(this.expr.projectIndex());
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  get(key: string): Series;
  get(key: readonly string[]): DataFrame;
  get(key: string | readonly string[]): Series | DataFrame {
    const expr = new Projection(this.expr, typeof key === 'string' ? key : [...key]);
    return typeof key === 'string' ? this.series(expr) : this.frame(expr);
  }

  /** Rows where `predicate` is true. */
  where(predicate: Series): DataFrame {
    return this.frame(new Filter(this.expr, predicate.expr));
  }

  head(n = 5): DataFrame {
    return this.frame(new Head(this.expr, n));
  }

  partitions(indices: readonly number[]): DataFrame {
    return this.frame(this.expr.partitions(indices));
  }

  drop(columns: string | readonly string[]): DataFrame {
    const dropped = typeof columns === 'string' ? [columns] : columns;
    for (const name of dropped) {
      if (!this.columns.includes(name)) throw ValidationError.columnNotFound(name, this.columns);
    }
    return this.frame(new Projection(this.expr, this.columns.filter((name) => !dropped.includes(name))));
  }

  // ---------------------------------------------------------------------------
  // Element-wise
  // ---------------------------------------------------------------------------

  add(other: Operand): DataFrame {
    return this.frame(this.expr.add(unwrap(other)));
  }

  sub(other: Operand): DataFrame {
    return this.frame(this.expr.sub(unwrap(other)));
  }

  mul(other: Operand): DataFrame {
    return this.frame(this.expr.mul(unwrap(other)));
  }

  div(other: Operand): DataFrame {
    return this.frame(this.expr.div(unwrap(other)));
  }

  lt(other: Operand): DataFrame {
    return this.frame(this.expr.lt(unwrap(other)));
  }

  le(other: Operand): DataFrame {
    return this.frame(this.expr.le(unwrap(other)));
  }

  gt(other: Operand): DataFrame {
    return this.frame(this.expr.gt(unwrap(other)));
  }

  ge(other: Operand): DataFrame {
    return this.frame(this.expr.ge(unwrap(other)));
  }

  eq(other: Operand): DataFrame {
    return this.frame(this.expr.eq(unwrap(other)));
  }

  ne(other: Operand): DataFrame {
    return this.frame(this.expr.ne(unwrap(other)));
  }

  /**
   * Add or replace columns, in the order given.
   */
  assign(values: Readonly<Record<string, Series | ScalarValue>>): DataFrame {
    let expr = this.expr;
    for (const [key, value] of Object.entries(values)) {
      expr = expr.assign(key, unwrap(value));
    }
    return this.frame(expr);
  }

  astype(dtypes: DTypeSpec): DataFrame {
    return this.frame(this.expr.astype(dtypes));
  }

  apply(fn: ApplyFunction, options: ApplyOptions = {}): DataFrame {
    return this.frame(this.expr.apply(fn, options));
  }

  shiftIndex(offset: IndexOffset): DataFrame {
    return this.frame(new ShiftIndex(this.expr, offset));
  }

  // ---------------------------------------------------------------------------
  // Partitioning
  // ---------------------------------------------------------------------------

  repartition(options: RepartitionOptions): DataFrame {
    return this.frame(
      'npartitions' in options
        ? new Repartition(this.expr, kw({ npartitions: options.npartitions }))
        : new Repartition(this.expr, kw({ newDivisions: [...options.divisions] }))
    );
  }

  // ---------------------------------------------------------------------------
  // Reductions
  // ---------------------------------------------------------------------------

  sum(options: ReductionOptions = {}): Series {
    return this.series(new Sum(this.expr, options.splitEvery));
  }

  prod(options: ReductionOptions = {}): Series {
    return this.series(new Prod(this.expr, options.splitEvery));
  }

  min(options: ReductionOptions = {}): Series {
    return this.series(new Min(this.expr, options.splitEvery));
  }

  max(options: ReductionOptions = {}): Series {
    return this.series(new Max(this.expr, options.splitEvery));
  }

  count(options: ReductionOptions = {}): Series {
    return this.series(new Count(this.expr, options.splitEvery));
  }

  any(options: ReductionOptions = {}): Series {
    return this.series(new Any(this.expr, options.splitEvery));
  }

  all(options: ReductionOptions = {}): Series {
    return this.series(new All(this.expr, options.splitEvery));
  }

  mean(options: ReductionOptions = {}): Series {
    return this.series(new Mean(this.expr, options.splitEvery));
  }

  /** Number of rows. */
  length(): Scalar {
    return new Scalar(new Len(this.expr), this.context);
  }

  dropDuplicates(options: SplitReductionOptions & { subset?: readonly string[] } = {}): DataFrame {
    return this.frame(
      new DropDuplicates(
        this.expr,
        options.subset === undefined ? null : [...options.subset],
        options.splitEvery,
        options.splitOut ?? this.context.config.reduction.splitOut
      )
    );
  }

  groupby(by: string): GroupBy {
    return new GroupBy(this, by);
  }

  /**
   * Convert string columns (or `columns`) to categoricals with known
   * categories. Runs a reduction to find the categories.
   */
  async categorize(columns?: readonly string[]): Promise<DataFrame> {
    const meta = expectFrame(this.meta, 'categorize');
    const targets = columns === undefined ? categorizableColumns(meta) : [...columns];
    const found = await new DataFrame(new GetCategories(this.expr, targets), this.context).compute();
    const categories = categoryMapFromFrame(found);
    return this.frame(
      new Categorize(this.expr, Object.fromEntries(targets.map((name) => [name, categories[name] ?? []])))
    );
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  optimize(options: { fuse?: boolean } = {}): DataFrame {
    return this.frame(this.optimizedExpr(options.fuse));
  }

  async compute(): Promise<FrameValue> {
    return expectFrame(await this.computeValue(), 'compute');
  }

  /** Compute every partition and keep the results as a new leaf. */
  async persist(): Promise<DataFrame> {
    return this.frame(await this.persistExpr());
  }
}

// =============================================================================
// Series
// =============================================================================

export class Series extends Collection {
  constructor(expr: Expr, context: CollectionContext) {
    super(expr, context);
    expectDimensions(expr, 1, 'Series');
  }

  private series(expr: Expr): Series {
    return new Series(expr, this.context);
  }

  private scalar(expr: Expr): Scalar {
    return new Scalar(expr, this.context);
  }

  private get seriesMeta(): SeriesValue {
    return expectSeries(this.meta, 'Series');
  }

  get seriesName(): string | null {
    return this.seriesMeta.name;
  }

  get dtype(): DType {
    return this.seriesMeta.dtype;
  }

  get index(): Series {
    return this.series(this.expr.projectIndex());
  }

  /** Categorical accessor; the series must have dtype `category`. */
  get cat(): CategoricalAccessor {
    return new CategoricalAccessor(this);
  }

  where(predicate: Series): Series {
    return this.series(new Filter(this.expr, predicate.expr));
  }

  head(n = 5): Series {
    return this.series(new Head(this.expr, n));
  }

  partitions(indices: readonly number[]): Series {
    return this.series(this.expr.partitions(indices));
  }

  add(other: Operand): Series {
    return this.series(this.expr.add(unwrap(other)));
  }

  sub(other: Operand): Series {
    return this.series(this.expr.sub(unwrap(other)));
  }

  mul(other: Operand): Series {
    return this.series(this.expr.mul(unwrap(other)));
  }

  div(other: Operand): Series {
    return this.series(this.expr.div(unwrap(other)));
  }

  lt(other: Operand): Series {
    return this.series(this.expr.lt(unwrap(other)));
  }

  le(other: Operand): Series {
    return this.series(this.expr.le(unwrap(other)));
  }

  gt(other: Operand): Series {
    return this.series(this.expr.gt(unwrap(other)));
  }

  ge(other: Operand): Series {
    return this.series(this.expr.ge(unwrap(other)));
  }

  eq(other: Operand): Series {
    return this.series(this.expr.eq(unwrap(other)));
  }

  ne(other: Operand): Series {
    return this.series(this.expr.ne(unwrap(other)));
  }

  astype(dtype: DType): Series {
    return this.series(this.expr.astype(dtype));
  }

  apply(fn: ApplyFunction, options: ApplyOptions = {}): Series {
    return this.series(this.expr.apply(fn, options));
  }

  shiftIndex(offset: IndexOffset): Series {
    return this.series(new ShiftIndex(this.expr, offset));
  }

  repartition(options: RepartitionOptions): Series {
    return this.series(
      'npartitions' in options
        ? new Repartition(this.expr, kw({ npartitions: options.npartitions }))
        : new Repartition(this.expr, kw({ newDivisions: [...options.divisions] }))
    );
  }

  sum(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Sum(this.expr, options.splitEvery));
  }

  prod(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Prod(this.expr, options.splitEvery));
  }

  min(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Min(this.expr, options.splitEvery));
  }

  max(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Max(this.expr, options.splitEvery));
  }

  count(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Count(this.expr, options.splitEvery));
  }

  any(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Any(this.expr, options.splitEvery));
  }

  all(options: ReductionOptions = {}): Scalar {
    return this.scalar(new All(this.expr, options.splitEvery));
  }

  size(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Size(this.expr, options.splitEvery));
  }

  mean(options: ReductionOptions = {}): Scalar {
    return this.scalar(new Mean(this.expr, options.splitEvery));
  }

  length(): Scalar {
    return this.scalar(new Len(this.expr));
  }

  mode(options: ReductionOptions = {}): Series {
    return this.series(new Mode(this.expr, options.splitEvery));
  }

  unique(options: SplitReductionOptions = {}): Series {
    return this.series(
      new Unique(this.expr, options.splitEvery, options.splitOut ?? this.context.config.reduction.splitOut)
    );
  }

  dropDuplicates(options: SplitReductionOptions = {}): Series {
    return this.series(
      new DropDuplicates(this.expr, null, options.splitEvery, options.splitOut ?? this.context.config.reduction.splitOut)
    );
  }

  valueCounts(options: SplitReductionOptions & { sort?: boolean } = {}): Series {
    return this.series(
      new ValueCounts(
        this.expr,
        options.sort ?? true,
        options.splitEvery,
        options.splitOut ?? this.context.config.reduction.splitOut
      )
    );
  }

  optimize(options: { fuse?: boolean } = {}): Series {
    return this.series(this.optimizedExpr(options.fuse));
  }

  async compute(): Promise<SeriesValue> {
    return expectSeries(await this.computeValue(), 'compute');
  }

  async persist(): Promise<Series> {
    return this.series(await this.persistExpr());
  }
}

// =============================================================================
// Scalar
// =============================================================================

export class Scalar extends Collection {
  constructor(expr: Expr, context: CollectionContext) {
    super(expr, context);
    expectDimensions(expr, 0, 'Scalar');
  }

  private scalar(expr: Expr): Scalar {
    return new Scalar(expr, this.context);
  }

  add(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.add(unwrap(other)));
  }

  sub(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.sub(unwrap(other)));
  }

  mul(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.mul(unwrap(other)));
  }

  div(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.div(unwrap(other)));
  }

  lt(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.lt(unwrap(other)));
  }

  gt(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.gt(unwrap(other)));
  }

  eq(other: Scalar | ScalarValue): Scalar {
    return this.scalar(this.expr.eq(unwrap(other)));
  }

  optimize(options: { fuse?: boolean } = {}): Scalar {
    return this.scalar(this.optimizedExpr(options.fuse));
  }

  async compute(): Promise<ScalarValue> {
    const value = await this.computeValue();
    if (isScalar(value)) return value;
    throw ValidationError.typeMismatch('compute', 'a scalar', describeValue(value));
  }
}

// =============================================================================
// Accessors
// =============================================================================

/**
 * Grouped aggregations of a frame by one key column.
 */
export class GroupBy {
  constructor(
    readonly frame: DataFrame,
    readonly by: string
  ) {
    if (!frame.columns.includes(by)) throw ValidationError.columnNotFound(by, frame.columns);
  }

  private every(aggregate: GroupbyAggregate, numericOnly: boolean): GroupbySpec {
    const { dtypes } = this.frame;
    const columns = this.frame.columns.filter((name) => name !== this.by && (!numericOnly || isNumericDType(dtypes[name])));
    return Object.fromEntries(columns.map((name) => [name, aggregate]));
  }

  /**
   * Aggregate each column of `spec` by its named function.
   */
  agg(spec: GroupbySpec, options: SplitReductionOptions = {}): DataFrame {
    const { context } = this.frame;
    return new DataFrame(
      new GroupbyAggregation(
        this.frame.expr,
        this.by,
        spec,
        options.splitEvery,
        options.splitOut ?? context.config.reduction.splitOut
      ),
      context
    );
  }

  sum(options: SplitReductionOptions = {}): DataFrame {
    return this.agg(this.every('sum', true), options);
  }

  mean(options: SplitReductionOptions = {}): DataFrame {
    return this.agg(this.every('mean', true), options);
  }

  count(options: SplitReductionOptions = {}): DataFrame {
    return this.agg(this.every('count', false), options);
  }

  min(options: SplitReductionOptions = {}): DataFrame {
    return this.agg(this.every('min', false), options);
  }

  max(options: SplitReductionOptions = {}): DataFrame {
    return this.agg(this.every('max', false), options);
  }
}

/**
 * Operations on a category series.
 */
export class CategoricalAccessor {
  constructor(private readonly series: Series) {
    if (series.dtype !== 'category') {
      throw ValidationError.typeMismatch('cat', 'a category series', `a ${series.dtype} series`);
    }
  }

  private wrap(expr: Expr): Series {
    return new Series(expr, this.series.context);
  }

  /** Whether the categories are known without computing. */
  get known(): boolean {
    return expectSeries(this.series.meta, 'cat').knownCategories;
  }

  /**
   * @throws UnsupportedOperationError when the categories are unknown
   */
  get categories(): ScalarValue[] {
    const { categories } = expectSeries(this.series.meta, 'cat');
    if (categories === null) throw UnsupportedOperationError.unknownCategories('cat.categories');
    return [...categories];
  }

  /**
   * @throws UnsupportedOperationError when the categories are unknown
   */
  get codes(): Series {
    return this.wrap(new CategoryCodes(this.series.expr));
  }

  /** Compute the categories and mark them known. */
  async asKnown(): Promise<Series> {
    if (this.known) return this.series;
    const found = await new DataFrame(new GetCategories(this.series.expr), this.series.context).compute();
    const categories = categoryMapFromFrame(found)[this.series.seriesName ?? ''] ?? [];
    return this.setCategories(categories);
  }

  asUnknown(): Series {
    return this.wrap(new AsUnknown(this.series.expr));
  }

  setCategories(categories: readonly ScalarValue[]): Series {
    return this.wrap(new SetCategories(this.series.expr, [...categories]));
  }
}

// =============================================================================
// Entry Points
// =============================================================================

export interface FromFrameOptions extends CollectionOptions {
  /** Partitions to split into (default: 1) */
  npartitions?: number;
  /** Sort by index first, which makes divisions known (default: true) */
  sort?: boolean;
}

/**
 * Lazy collection over an in-memory frame or series.
 *
 * @example
 * ```typescript
 * const df = fromFrame(DataFrame.fromColumns({ x: [1, 2, 3, 4] }), { npartitions: 2 });
 * df.divisions; // [0, 2, 3]
 * ```
 */
export function fromFrame(data: FrameValue, options?: FromFrameOptions): DataFrame;
export function fromFrame(data: SeriesValue, options?: FromFrameOptions): Series;
export function fromFrame(data: FrameValue | SeriesValue, options: FromFrameOptions = {}): DataFrame | Series {
  const context = createContext(options);
  const expr = new FromFrame(data, kw({ npartitions: options.npartitions ?? 1, sort: options.sort ?? true }));
  return data instanceof FrameValue ? new DataFrame(expr, context) : new Series(expr, context);
}

export interface ReadDatasetOptions extends CollectionOptions {
  columns?: readonly string[];
  filters?: readonly FilterPredicate[];
  /** Infer divisions from index statistics (default: io.calculateDivisions) */
  calculateDivisions?: boolean;
}

/**
 * Lazy collection over a dataset, one partition per fragment.
 */
export function readDataset(source: StorageReader | Dataset, options: ReadDatasetOptions = {}): DataFrame {
  const context = createContext(options);
  const dataset =
    source instanceof Dataset
      ? source
      : new Dataset(source, { cacheSize: context.config.io.statisticsCacheSize, logger: context.logger });
  const expr = new ReadDataset(
    dataset,
    kw({
      columns: options.columns === undefined ? null : [...options.columns],
      filters: validate(FilterListSchema, options.filters ?? [], 'filters'),
      calculateDivisions: options.calculateDivisions ?? context.config.io.calculateDivisions,
    })
  );
  return new DataFrame(expr, context);
}

export interface ConcatOptions {
  join?: ConcatJoin;
  /** 0 stacks rows, 1 places frames side by side */
  axis?: 0 | 1;
  ignoreUnknownDivisions?: boolean;
}

/**
 * Concatenate frames; the result shares the first frame's context.
 */
export function concat(frames: readonly DataFrame[], options: ConcatOptions = {}): DataFrame {
  const [first] = frames;
  if (first === undefined) {
    throw ValidationError.typeMismatch('concat', 'at least one frame', 'none');
  }
  const expr = new Concat(
    options.join ?? 'outer',
    options.axis ?? 0,
    options.ignoreUnknownDivisions ?? false,
    ...frames.map((frame) => frame.expr)
  );
  return new DataFrame(expr, first.context);
}
