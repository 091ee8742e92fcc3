// @framegraph/frame
// In-memory columnar backend: the per-partition functions the planner schedules

// =============================================================================
// Values
// =============================================================================

export {
  DTYPES,
  isDType,
  isScalar,
  isNumericDType,
  scalarDType,
  inferDType,
  unifyDTypes,
  compareScalars,
  rangeIndex,
  type Scalar,
  type DType,
} from './types.js';
export { Series, type SeriesInit } from './series.js';
export { DataFrame, type Column, type FrameInit } from './dataframe.js';
export {
  isDataFrame,
  isSeries,
  isValue,
  describeValue,
  ndimOf,
  expectValue,
  expectFrame,
  expectSeries,
  expectContainer,
  expectValues,
  takeRows,
  takeFrameRows,
  type Value,
} from './value.js';

// =============================================================================
// Partition Operations
// =============================================================================

export {
  isColumnKey,
  getItem,
  filterRows,
  head,
  emptyLike,
  sliceRows,
  sliceIndexRange,
  indexOf,
  sortByIndex,
  BINARY_OPERATORS,
  OPERATOR_SYMBOLS,
  isBinaryOperator,
  binaryResultDType,
  applyScalarOperator,
  binaryOp,
  astype,
  assign,
  applyValues,
  concatValues,
  shiftLabel,
  shiftIndex,
  hashSplit,
  type ColumnKey,
  type BinaryOperator,
  type DTypeSpec,
  type ApplyFunction,
  type ConcatOptions,
  type IndexOffset,
  type HashKey,
} from './ops.js';

// =============================================================================
// Reductions
// =============================================================================

export {
  REDUCTION_KINDS,
  isReductionKind,
  reductionDType,
  reduceChunk,
  reduceCombine,
  reduceAggregate,
  reductionMeta,
  valueCountsChunk,
  valueCountsCombine,
  valueCountsAggregate,
  modeAggregate,
  uniqueChunk,
  uniqueCombine,
  uniqueAggregate,
  dropDuplicates,
  dropDuplicatesCombine,
  dropDuplicatesAggregate,
  type ReductionKind,
} from './reductions.js';
export {
  GROUPBY_AGGREGATES,
  isGroupbyAggregate,
  groupbyColumns,
  groupbyChunk,
  groupbyCombine,
  groupbyAggregate,
  groupbyMeta,
  type GroupbyAggregate,
  type GroupbySpec,
} from './groupby.js';

// =============================================================================
// Categoricals
// =============================================================================

export {
  categorizableColumns,
  getCategoriesChunk,
  getCategoriesAggregate,
  categoryMapFromFrame,
  categorize,
  asUnknown,
  setCategories,
  categoryCodes,
  type CategoryMap,
} from './categorical.js';
