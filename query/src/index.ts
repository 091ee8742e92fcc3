/**
 * @framegraph/query - Lazy partitioned dataframe planner
 *
 * Build expressions through the collection API, let the optimizer push
 * projections and predicates into the reads, and run the resulting task
 * graph locally:
 * - Content-addressed expression nodes with inferred meta and divisions
 * - Fixed-point rewrites, lowering and fusion of block-wise chains
 * - Tree reductions with configurable fan-in and hash-partitioned output
 * - Dataset reads with statistics pruning behind an LRU cache
 *
 * @example
 * ```typescript
 * import { readDataset, InMemoryReader } from '@framegraph/query';
 *
 * const df = readDataset(new InMemoryReader('events', fragments));
 * const late = df.where(df.get('delay').gt(30)).get('route');
 *
 * late.optimize().explain();
 * const counts = await late.valueCounts().compute();
 * ```
 */

// =============================================================================
// Collection API
// =============================================================================

export {
  Collection,
  DataFrame,
  Series,
  Scalar,
  GroupBy,
  CategoricalAccessor,
  createContext,
  fromFrame,
  readDataset,
  concat,
  type CollectionContext,
  type CollectionOptions,
  type ReductionOptions,
  type SplitReductionOptions,
  type RepartitionOptions,
  type ApplyOptions,
  type Operand,
  type FromFrameOptions,
  type ReadDatasetOptions,
  type ConcatOptions,
} from './collection.js';

// =============================================================================
// Expressions
// =============================================================================

export {
  Keywords,
  kw,
  isExpr,
  selectDivisions,
  Expr,
  Literal,
  Blockwise,
  Elemwise,
  Binop,
  Add,
  Sub,
  Mul,
  Div,
  LT,
  LE,
  GT,
  GE,
  EQ,
  NE,
  isComparison,
  add,
  sub,
  mul,
  div,
  lt,
  le,
  gt,
  ge,
  eq,
  ne,
  Filter,
  Projection,
  ProjectIndex,
  Assign,
  AsType,
  Apply,
  Head,
  Partitions,
  type Comparison,
  type LowerOptions,
} from './expr.js';

export {
  resolveSplitEvery,
  ReductionSpec,
  ApplyConcatApply,
  Chunk,
  TreeReduce,
  Reduction,
  Sum,
  Prod,
  Min,
  Max,
  Count,
  Any,
  All,
  Size,
  Len,
  Mean,
  Mode,
  Unique,
  DropDuplicates,
  ValueCounts,
  GroupbyAggregation,
  GetCategories,
} from './reductions.js';

export { sortedDivisionLocations, Repartition, Concat, ShiftIndex, type ConcatJoin } from './partitioning.js';
export { Categorize, AsUnknown, SetCategories, CategoryCodes } from './categorical.js';

// =============================================================================
// IO
// =============================================================================

export { BlockwiseIO, FromFrame, ReadDataset, FromGraph } from './io.js';
export {
  Dataset,
  applyFilters,
  filterBinaryOperator,
  statisticsExclude,
  divisionsFromStatistics,
  type ColumnStatistics,
  type FragmentInfo,
  type DatasetManifest,
  type ReadOptions,
  type StorageReader,
  type DatasetPlan,
  type DatasetOptions,
} from './dataset.js';
export {
  InMemoryReader,
  computeStatistics,
  type InMemoryReaderOptions,
  type ReadRecord,
} from './memory-reader.js';

// =============================================================================
// Optimization & Execution
// =============================================================================

export {
  simplify,
  lower,
  combineSimilar,
  optimize,
  type SimplifyOptions,
  type CombineSimilarOptions,
  type OptimizeOptions,
} from './optimize.js';
export { Fused, fuse, topologicalOrder, consumerMap, type FuseOptions } from './fusion.js';
export {
  taskKey,
  parseTaskKey,
  TaskRef,
  ref,
  taskDependencies,
  resolveArgs,
  runTask,
  aliasTask,
  literalTask,
  materialize,
  outputKeys,
  cull,
} from './graph.js';
export { LocalExecutor, collectResults, type LocalExecutorOptions, type TaskResult } from './executor.js';

// =============================================================================
// Types
// =============================================================================

export {
  unknownDivisions,
  areDivisionsKnown,
  FILTER_OPERATORS,
  isFilterOperator,
  type Divisions,
  type FilterOperator,
  type FilterPredicate,
  type TaskKey,
  type TaskFunction,
  type Task,
  type TaskGraph,
} from './types.js';
export {
  ScalarSchema,
  DTypeSchema,
  FilterOperatorSchema,
  FilterPredicateSchema,
  FilterListSchema,
  ColumnStatisticsSchema,
  FragmentInfoSchema,
  DatasetManifestSchema,
  isFilterPredicateList,
  validate,
} from './schemas.js';
