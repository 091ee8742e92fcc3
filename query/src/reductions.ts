/**
 * Tree reductions
 *
 * An `ApplyConcatApply` node describes an order-independent aggregation as
 * three kernels: `chunk` runs on every partition, `combine` merges batches of
 * at most `splitEvery` partials, and `aggregate` produces the final result.
 * Lowering expands it into a block-wise `Chunk` and a `TreeReduce` whose
 * depth grows with log(npartitions) / log(splitEvery).
 *
 * @example
 * ```typescript
 * // 100 partitions, splitEvery 8: 100 chunk tasks, 13 + 2 combine tasks,
 * // one aggregate task reading 2 inputs
 * const total = new Sum(df.getItem('amount'), kw({ splitEvery: 8 }));
 * ```
 */

import { PlanError, ValidationError, type Tokenizable } from '@framegraph/core';
import {
  DataFrame,
  Series,
  categorizableColumns,
  describeValue,
  dropDuplicates,
  dropDuplicatesAggregate,
  dropDuplicatesCombine,
  expectContainer,
  expectValue,
  expectValues,
  getCategoriesAggregate,
  getCategoriesChunk,
  groupbyAggregate,
  groupbyChunk,
  groupbyColumns,
  groupbyCombine,
  groupbyMeta,
  hashSplit,
  isGroupbyAggregate,
  isNumericDType,
  modeAggregate,
  reduceAggregate,
  reduceChunk,
  reduceCombine,
  reductionMeta,
  uniqueAggregate,
  uniqueChunk,
  uniqueCombine,
  valueCountsAggregate,
  valueCountsChunk,
  valueCountsCombine,
  type GroupbySpec,
  type HashKey,
  type ReductionKind,
  type Value,
} from '@framegraph/frame';
import { ref, taskKey, TaskRef } from './graph.js';
import { Blockwise, Div, Elemwise, Expr, Projection, type LowerOptions } from './expr.js';
import { unknownDivisions, type Divisions, type Task, type TaskGraph } from './types.js';

// =============================================================================
// Options
// =============================================================================

/**
 * Resolve a node's `splitEvery` against the configured default. `null` or
 * `false` combine every partial in the aggregate task.
 *
 * @throws ValidationError for values below 2
 */
export function resolveSplitEvery(value: unknown, fallback: number | null): number | null {
  if (value === undefined) return fallback;
  if (value === null || value === false) return null;
  if (typeof value === 'number' && Number.isInteger(value) && value >= 2) return value;
  throw ValidationError.typeMismatch('splitEvery', 'an integer of at least 2, null or false', describeValue(value));
}

function checkSplitOut(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1) return value;
  throw ValidationError.typeMismatch('splitOut', 'a positive integer', describeValue(value));
}

/**
 * Non-expression operand carrying the reduction that owns a lowered layer.
 * Tokenizes by the reduction's name.
 */
export class ReductionSpec implements Tokenizable {
  constructor(readonly reduction: ApplyConcatApply) {}

  toToken(): string {
    return this.reduction.name;
  }

  toString(): string {
    return `ReductionSpec(${this.reduction.name})`;
  }
}

function isReductionSpec(value: unknown): value is ReductionSpec {
  return value instanceof ReductionSpec;
}

// =============================================================================
// ApplyConcatApply
// =============================================================================

/**
 * Base class of tree reductions. Subclasses declare `frame` and
 * `splitEvery` parameters (and `splitOut` when their output can be
 * hash-partitioned) and implement the kernels.
 */
export class ApplyConcatApply extends Expr {
  get frame(): Expr {
    return this.exprOperand('frame');
  }

  /** Declared fan-in: a number, `null`/`false`, or undefined for the configured default */
  get splitEvery(): unknown {
    return this.kind.parameters.includes('splitEvery') ? this.operand('splitEvery') : undefined;
  }

  get splitOut(): number {
    return this.kind.parameters.includes('splitOut') ? checkSplitOut(this.operand('splitOut')) : 1;
  }

  /** Rows with equal keys land in the same output partition when `splitOut > 1`. */
  get hashKey(): HashKey {
    return 'index';
  }

  chunk(_value: Value): Value {
    throw PlanError.notImplemented(this.kind.name, 'chunk');
  }

  combine(parts: readonly Value[]): Value {
    return this.aggregate(parts);
  }

  aggregate(_parts: readonly Value[]): Value {
    throw PlanError.notImplemented(this.kind.name, 'aggregate');
  }

  protected reductionMeta(): Value {
    return this.aggregate([this.chunk(this.frame.meta)]);
  }

  protected computeMeta(): Value {
    resolveSplitEvery(this.splitEvery, null);
    return this.reductionMeta();
  }

  protected computeDivisions(): Divisions {
    return unknownDivisions(this.splitOut);
  }

  lower(options: LowerOptions): Expr | undefined {
    const spec = new ReductionSpec(this);
    return new TreeReduce(new Chunk(this.frame, spec), spec, resolveSplitEvery(this.splitEvery, options.splitEvery));
  }
}

// =============================================================================
// Lowered Layers
// =============================================================================

/**
 * Per-partition `chunk` kernel. With `splitOut > 1` each task returns one
 * hash-partitioned piece per output partition.
 */
export class Chunk extends Blockwise {
  static parameters = ['frame', 'spec'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get spec(): ReductionSpec {
    const spec = this.operand('spec');
    if (isReductionSpec(spec)) return spec;
    throw ValidationError.typeMismatch('Chunk.spec', 'a ReductionSpec', describeValue(spec));
  }

  protected operation(args: readonly unknown[]): unknown {
    const { reduction } = this.spec;
    const partial = reduction.chunk(expectValue(args[0], 'Chunk'));
    return reduction.splitOut > 1 ? hashSplit(partial, reduction.splitOut, reduction.hashKey) : partial;
  }

  protected computeMeta(): Value {
    return this.spec.reduction.chunk(this.frame.meta);
  }
}

function pickPiece(value: unknown, index: number): Value {
  const pieces = expectValues(value, 'TreeReduce');
  return expectValue(pieces[index], 'TreeReduce');
}

/**
 * Combine tree over the chunk outputs. Batches of `splitEvery` partials are
 * combined level by level until at most `splitEvery` remain, which the
 * aggregate task reads. `null` aggregates every partial at once.
 */
export class TreeReduce extends Expr {
  static parameters = ['frame', 'spec', 'splitEvery'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get spec(): ReductionSpec {
    const spec = this.operand('spec');
    if (isReductionSpec(spec)) return spec;
    throw ValidationError.typeMismatch('TreeReduce.spec', 'a ReductionSpec', describeValue(spec));
  }

  get splitEvery(): number | null {
    return resolveSplitEvery(this.operand('splitEvery'), null);
  }

  protected computeMeta(): Value {
    return this.spec.reduction.meta;
  }

  protected computeDivisions(): Divisions {
    return this.spec.reduction.divisions;
  }

  layer(): TaskGraph {
    const layer: TaskGraph = new Map();
    const { reduction } = this.spec;
    const { splitOut } = reduction;
    const splitEvery = this.splitEvery;
    const input = this.frame;

    for (let out = 0; out < splitOut; out++) {
      let inputs: TaskRef[] = [];
      for (let i = 0; i < input.npartitions; i++) {
        if (splitOut === 1) {
          inputs.push(ref(input.name, i));
        } else {
          const key = taskKey(`${this.name}-pick-${out}`, i);
          layer.set(key, { fn: (args) => pickPiece(args[0], out), args: [ref(input.name, i)] });
          inputs.push(new TaskRef(key));
        }
      }

      let depth = 0;
      while (splitEvery !== null && inputs.length > splitEvery) {
        const next: TaskRef[] = [];
        for (let start = 0; start < inputs.length; start += splitEvery) {
          const key = taskKey(`${this.name}-combine-${out}-${depth}`, next.length);
          layer.set(key, combineTask(inputs.slice(start, start + splitEvery), (parts) => reduction.combine(parts)));
          next.push(new TaskRef(key));
        }
        inputs = next;
        depth++;
      }
      layer.set(taskKey(this.name, out), combineTask(inputs, (parts) => reduction.aggregate(parts)));
    }
    return layer;
  }
}

function combineTask(inputs: readonly TaskRef[], kernel: (parts: readonly Value[]) => Value): Task {
  return { fn: (args) => kernel(expectValues(args[0], 'TreeReduce')), args: [inputs] };
}

// =============================================================================
// Scalar & Column-wise Reductions
// =============================================================================

/**
 * Reduction of a series to a scalar, or of a frame to a series indexed by
 * column name.
 */
export class Reduction extends ApplyConcatApply {
  static parameters = ['frame', 'splitEvery'];
  static defaults = { splitEvery: undefined };

  get reductionKind(): ReductionKind {
    throw PlanError.notImplemented(this.kind.name, 'reductionKind');
  }

  chunk(value: Value): Value {
    return reduceChunk(this.reductionKind, value);
  }

  combine(parts: readonly Value[]): Value {
    return reduceCombine(this.reductionKind, parts);
  }

  aggregate(parts: readonly Value[]): Value {
    return reduceAggregate(this.reductionKind, parts);
  }

  protected reductionMeta(): Value {
    return reductionMeta(this.reductionKind, this.frame.meta);
  }

  /** `df.sum()[cols] → df[cols].sum()` */
  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Projection && parent.frame.name === this.name && this.frame.ndim === 2) {
      return this.substituteParameters({ frame: new Projection(this.frame, parent.key) });
    }
    return undefined;
  }
}

export class Sum extends Reduction {
  get reductionKind(): ReductionKind {
    return 'sum';
  }
}

export class Prod extends Reduction {
  get reductionKind(): ReductionKind {
    return 'prod';
  }
}

export class Min extends Reduction {
  get reductionKind(): ReductionKind {
    return 'min';
  }
}

export class Max extends Reduction {
  get reductionKind(): ReductionKind {
    return 'max';
  }
}

export class Count extends Reduction {
  get reductionKind(): ReductionKind {
    return 'count';
  }
}

export class Any extends Reduction {
  get reductionKind(): ReductionKind {
    return 'any';
  }
}

export class All extends Reduction {
  get reductionKind(): ReductionKind {
    return 'all';
  }
}

export class Size extends Reduction {
  get reductionKind(): ReductionKind {
    return 'size';
  }
}

/**
 * Row count.
 */
export class Len extends Reduction {
  get reductionKind(): ReductionKind {
    return 'len';
  }

  /** Row-preserving operators do not change the length of their input. */
  simplify(): Expr | undefined {
    const { frame } = this;
    if (frame instanceof Elemwise) {
      const [source] = frame.dependencies().filter((dep) => dep.ndim > 0 && !frame.isBroadcast(dep));
      if (source !== undefined) return this.substituteParameters({ frame: source });
    }
    return undefined;
  }

  simplifyUp(_parent: Expr): Expr | undefined {
    return undefined;
  }
}

/**
 * Mean, expanded into `sum / count` over the numeric columns when lowered.
 */
export class Mean extends Expr {
  static parameters = ['frame', 'splitEvery'];
  static defaults = { splitEvery: undefined };

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  private expand(): Expr {
    const { frame } = this;
    const splitEvery = this.operand('splitEvery');
    const meta = frame.meta;
    const source =
      meta instanceof DataFrame
        ? new Projection(frame, meta.columns.filter((name) => isNumericDType(meta.columnData(name).dtype)))
        : frame;
    return new Div(new Sum(source, splitEvery), new Count(source, splitEvery));
  }

  protected computeMeta(): Value {
    return this.expand().meta;
  }

  protected computeDivisions(): Divisions {
    return unknownDivisions(1);
  }

  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Projection && parent.frame.name === this.name && this.frame.ndim === 2) {
      return this.substituteParameters({ frame: new Projection(this.frame, parent.key) });
    }
    return undefined;
  }

  lower(_options: LowerOptions): Expr | undefined {
    return this.expand();
  }
}

// =============================================================================
// Value Reductions
// =============================================================================

/**
 * Most frequent values of a series, ascending.
 */
export class Mode extends ApplyConcatApply {
  static parameters = ['frame', 'splitEvery'];
  static defaults = { splitEvery: undefined };

  chunk(value: Value): Value {
    return valueCountsChunk(value);
  }

  combine(parts: readonly Value[]): Value {
    return valueCountsCombine(parts);
  }

  aggregate(parts: readonly Value[]): Value {
    const source = this.source;
    return modeAggregate(parts, source.name, source.dtype);
  }

  private get source(): Series {
    const meta = this.frame.meta;
    if (meta instanceof Series) return meta;
    throw ValidationError.typeMismatch('mode', 'a series', describeValue(meta));
  }

  protected reductionMeta(): Value {
    const source = this.source;
    return new Series([], { name: source.name, dtype: source.dtype });
  }
}

/**
 * Distinct values of a series.
 */
export class Unique extends ApplyConcatApply {
  static parameters = ['frame', 'splitEvery', 'splitOut'];
  static defaults = { splitEvery: undefined, splitOut: 1 };

  get hashKey(): HashKey {
    return 'values';
  }

  chunk(value: Value): Value {
    return uniqueChunk(value);
  }

  combine(parts: readonly Value[]): Value {
    return uniqueCombine(parts);
  }

  aggregate(parts: readonly Value[]): Value {
    return uniqueAggregate(parts);
  }
}

export class DropDuplicates extends ApplyConcatApply {
  static parameters = ['frame', 'subset', 'splitEvery', 'splitOut'];
  static defaults = { subset: null, splitEvery: undefined, splitOut: 1 };

  get subset(): string[] | null {
    return this.stringListOperand('subset');
  }

  get hashKey(): HashKey {
    return this.subset ?? 'values';
  }

  chunk(value: Value): Value {
    return dropDuplicates(value, this.subset);
  }

  combine(parts: readonly Value[]): Value {
    return dropDuplicatesCombine(parts, this.subset);
  }

  aggregate(parts: readonly Value[]): Value {
    return dropDuplicatesAggregate(parts, this.subset);
  }

  protected reductionMeta(): Value {
    const meta = expectContainer(this.frame.meta, 'dropDuplicates');
    if (meta instanceof DataFrame) {
      for (const name of this.subset ?? []) meta.columnData(name);
    }
    return dropDuplicates(meta, this.subset);
  }
}

/**
 * Occurrences of each value, largest first when `sort`.
 */
export class ValueCounts extends ApplyConcatApply {
  static parameters = ['frame', 'sort', 'splitEvery', 'splitOut'];
  static defaults = { sort: true, splitEvery: undefined, splitOut: 1 };

  chunk(value: Value): Value {
    return valueCountsChunk(value);
  }

  combine(parts: readonly Value[]): Value {
    return valueCountsCombine(parts);
  }

  aggregate(parts: readonly Value[]): Value {
    return valueCountsAggregate(parts, this.booleanOperand('sort'));
  }
}

// =============================================================================
// Grouped Aggregation
// =============================================================================

function isGroupbySpec(value: unknown): value is GroupbySpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isGroupbyAggregate)
  );
}

/**
 * Per-group aggregation of a frame, keyed by column `by`.
 */
export class GroupbyAggregation extends ApplyConcatApply {
  static parameters = ['frame', 'by', 'spec', 'splitEvery', 'splitOut'];
  static defaults = { splitEvery: undefined, splitOut: 1 };

  get by(): string {
    return this.stringOperand('by');
  }

  get aggregations(): GroupbySpec {
    const spec = this.operand('spec');
    if (isGroupbySpec(spec)) return spec;
    throw ValidationError.typeMismatch('GroupbyAggregation.spec', 'a mapping of column to aggregation', describeValue(spec));
  }

  chunk(value: Value): Value {
    return groupbyChunk(value, this.by, this.aggregations);
  }

  combine(parts: readonly Value[]): Value {
    return groupbyCombine(parts, this.by, this.aggregations);
  }

  aggregate(parts: readonly Value[]): Value {
    return groupbyAggregate(parts, this.by, this.aggregations);
  }

  protected reductionMeta(): Value {
    return groupbyMeta(this.frame.meta, this.by, this.aggregations);
  }

  /** Read only the key and aggregated columns. */
  simplify(): Expr | undefined {
    const { frame } = this;
    if (frame.ndim !== 2) return undefined;
    const needed = groupbyColumns(this.by, this.aggregations);
    if (needed.length < frame.columns.length && needed.every((name) => frame.columns.includes(name))) {
      return this.substituteParameters({ frame: new Projection(frame, needed) });
    }
    return undefined;
  }
}

// =============================================================================
// Category Discovery
// =============================================================================

/**
 * Distinct values of the categorizable columns, as a long frame of
 * `(column, category)` pairs.
 */
export class GetCategories extends ApplyConcatApply {
  static parameters = ['frame', 'columns', 'splitEvery'];
  static defaults = { columns: null, splitEvery: undefined };

  get targetColumns(): string[] {
    const declared = this.stringListOperand('columns');
    if (declared !== null) return declared;
    const meta = this.frame.meta;
    return meta instanceof DataFrame ? categorizableColumns(meta) : [];
  }

  chunk(value: Value): Value {
    return getCategoriesChunk(value, this.targetColumns);
  }

  aggregate(parts: readonly Value[]): Value {
    return getCategoriesAggregate(parts);
  }

  protected reductionMeta(): Value {
    const meta = this.frame.meta;
    if (meta instanceof DataFrame) {
      for (const name of this.targetColumns) meta.columnData(name);
    }
    return getCategoriesChunk(meta, this.targetColumns);
  }

  /** Pin the column list and read only those columns. */
  simplify(): Expr | undefined {
    const { frame } = this;
    if (frame.ndim !== 2) return undefined;
    const columns = this.targetColumns;
    if (this.operand('columns') === null) {
      return this.substituteParameters({ columns });
    }
    if (columns.length < frame.columns.length) {
      return this.substituteParameters({ frame: new Projection(frame, columns) });
    }
    return undefined;
  }
}
