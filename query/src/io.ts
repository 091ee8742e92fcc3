/**
 * IO leaves
 *
 * Sources of data in an expression tree. Both data leaves absorb column
 * projections into a `columns` operand (and `_series` for a single-column
 * selection by name), absorb partition selections into `_partitions`, and
 * answer `Len` from what they know without reading. `ReadDataset` also
 * absorbs comparison filters against its own columns.
 */

import { tokenize, ValidationError } from '@framegraph/core';
import {
  DataFrame,
  Series,
  describeValue,
  expectValue,
  getItem,
  isScalar,
  sliceRows,
  sortByIndex,
  type Scalar,
  type Value,
} from '@framegraph/frame';
import { Expr, Filter, Literal, Partitions, Projection, isComparison, selectDivisions, type Comparison } from './expr.js';
import { Dataset, fragmentExcluded, type DatasetPlan, type FragmentInfo } from './dataset.js';
import { literalTask, taskKey } from './graph.js';
import { sortedDivisionLocations } from './partitioning.js';
import { Len } from './reductions.js';
import { isFilterPredicateList } from './schemas.js';
import {
  unknownDivisions,
  type Divisions,
  type FilterOperator,
  type FilterPredicate,
  type Task,
  type TaskGraph,
} from './types.js';

// =============================================================================
// Helpers
// =============================================================================

const FLIPPED: Readonly<Record<FilterOperator, FilterOperator>> = {
  '==': '==',
  '!=': '!=',
  '<': '>',
  '<=': '>=',
  '>': '<',
  '>=': '<=',
};

function comparisonOperator(predicate: Comparison): FilterOperator {
  switch (predicate.operator) {
    case 'lt':
      return '<';
    case 'le':
      return '<=';
    case 'gt':
      return '>';
    case 'ge':
      return '>=';
    case 'ne':
      return '!=';
    default:
      return '==';
  }
}

function selectColumns(value: Value, columns: readonly string[] | null, series: boolean): Value {
  if (columns === null) return value;
  return getItem(value, series ? columns[0] : columns);
}

// =============================================================================
// BlockwiseIO
// =============================================================================

/**
 * Base of the partitioned data leaves. Subclasses declare `columns`,
 * `_partitions` and `_series` parameters and implement `sourceMeta`,
 * `sourceDivisions` and `readPartition`.
 */
export class BlockwiseIO extends Expr {
  get isFusable(): boolean {
    return true;
  }

  /** Projected columns, or null for every column. */
  get columnsOperand(): string[] | null {
    return this.stringListOperand('columns');
  }

  get partitionFilter(): number[] | null {
    const value = this.operand('_partitions');
    if (value === null) return null;
    if (Array.isArray(value) && value.every((v): v is number => typeof v === 'number')) return [...value];
    throw ValidationError.typeMismatch(`${this.kind.name}._partitions`, 'a list of partition indices', describeValue(value));
  }

  get isSeries(): boolean {
    return this.booleanOperand('_series');
  }

  /** Full schema of the source, before projection. */
  protected sourceMeta(): DataFrame | Series {
    throw ValidationError.typeMismatch(this.kind.name, 'a source schema', 'none');
  }

  /** Divisions of every source partition, before partition filtering. */
  protected sourceDivisions(): Divisions {
    return unknownDivisions(1);
  }

  /** Task reading source partition `index`. */
  protected readPartition(_index: number): Task {
    throw ValidationError.typeMismatch(this.kind.name, 'a partition reader', 'none');
  }

  protected computeMeta(): Value {
    const meta = this.sourceMeta();
    const columns = this.columnsOperand;
    if (meta instanceof Series) return meta;
    if (this.isSeries && (columns === null || columns.length !== 1)) {
      throw ValidationError.typeMismatch(`${this.kind.name}._series`, 'exactly one column', describeValue(columns));
    }
    return selectColumns(meta, columns, this.isSeries);
  }

  protected computeDivisions(): Divisions {
    const filter = this.partitionFilter;
    const divisions = this.sourceDivisions();
    return filter === null ? divisions : selectDivisions(divisions, filter);
  }

  /** Source partition behind output partition `index`. */
  protected sourcePartition(index: number): number {
    const filter = this.partitionFilter;
    return filter === null ? index : filter[index];
  }

  task(index: number): Task {
    return this.readPartition(this.sourcePartition(index));
  }

  /**
   * Identity of the source ignoring the projection; reads with equal keys
   * can share one read of the union of their columns.
   */
  similarityKey(): string {
    const parameters = this.kind.parameters;
    return tokenize(
      this.label,
      this.operands.filter((_, i) => parameters[i] !== 'columns' && parameters[i] !== '_series')
    );
  }

  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Projection && parent.frame.name === this.name) {
      return this.absorbProjection(parent);
    }
    if (parent instanceof Partitions && parent.frame.name === this.name) {
      const partitions = this.sourcePartitions(parent.partitionIndices);
      return partitions === undefined ? undefined : this.substituteParameters({ _partitions: partitions });
    }
    return undefined;
  }

  /**
   * Source partitions behind output partitions `indices`, or undefined when
   * they cannot be named.
   *
   * @throws ValidationError when an index is out of range
   */
  protected sourcePartitions(indices: readonly number[]): number[] | undefined {
    const npartitions = this.npartitions;
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= npartitions) {
        throw ValidationError.invalidPartition(index, npartitions);
      }
    }
    return indices.map((i) => this.sourcePartition(i));
  }

  private absorbProjection(parent: Projection): Expr | undefined {
    if (!(this.meta instanceof DataFrame)) return undefined;
    const key = parent.key;
    const proposed = typeof key === 'string' ? [key] : [...key];
    const available = this.columns;
    if (!proposed.every((name) => available.includes(name))) return undefined;
    const series = typeof key === 'string';
    const current = this.columnsOperand;
    if (
      !series &&
      current !== null &&
      current.length === proposed.length &&
      current.every((name, i) => proposed[i] === name)
    ) {
      return undefined;
    }
    return this.substituteParameters({ columns: proposed, _series: series });
  }
}

// =============================================================================
// FromFrame
// =============================================================================

/**
 * An in-memory frame split into `npartitions` pieces. With `sort`, rows are
 * ordered by index first and divisions are known.
 */
export class FromFrame extends BlockwiseIO {
  static parameters = ['frame', 'npartitions', 'sort', 'columns', '_partitions', '_series'];
  static defaults = { npartitions: 1, sort: true, columns: null, _partitions: null, _series: false };

  private layout: { data: DataFrame | Series; divisions: Scalar[]; locations: number[] } | undefined;

  get data(): DataFrame | Series {
    const frame = this.operand('frame');
    if (frame instanceof DataFrame || frame instanceof Series) return frame;
    throw ValidationError.typeMismatch('FromFrame.frame', 'a frame or series', describeValue(frame));
  }

  private get partitionLayout(): { data: DataFrame | Series; divisions: Scalar[]; locations: number[] } {
    if (this.layout === undefined) {
      const npartitions = this.numberOperand('npartitions');
      if (!Number.isInteger(npartitions) || npartitions < 1) {
        throw ValidationError.typeMismatch('FromFrame.npartitions', 'a positive integer', String(npartitions));
      }
      if (this.booleanOperand('sort')) {
        const data = sortByIndex(this.data);
        const { divisions, locations } = sortedDivisionLocations(data.index, npartitions);
        this.layout = { data, divisions, locations };
      } else {
        const data = this.data;
        const chunk = Math.max(1, Math.ceil(data.length / npartitions));
        const locations: number[] = [];
        for (let start = 0; start < data.length; start += chunk) locations.push(start);
        locations.push(data.length);
        if (locations.length === 1) locations.unshift(0);
        this.layout = { data, divisions: unknownDivisions(locations.length - 1), locations };
      }
    }
    return this.layout;
  }

  protected sourceMeta(): DataFrame | Series {
    return sliceRows(this.data, 0, 0);
  }

  protected sourceDivisions(): Divisions {
    return this.partitionLayout.divisions;
  }

  /** Rows in each output partition. */
  partitionLengths(): number[] {
    const { locations } = this.partitionLayout;
    return Array.from({ length: this.npartitions }, (_, i) => {
      const source = this.sourcePartition(i);
      return locations[source + 1] - locations[source];
    });
  }

  protected readPartition(index: number): Task {
    const { data, locations } = this.partitionLayout;
    const columns = this.columnsOperand;
    const series = this.isSeries;
    return {
      fn: () => selectColumns(sliceRows(data, locations[index], locations[index + 1]), columns, series),
      args: [],
    };
  }

  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Len && parent.frame.name === this.name) {
      return new Literal(this.partitionLengths().reduce((a, b) => a + b, 0));
    }
    return super.simplifyUp(parent);
  }

  toString(): string {
    const columns = this.columnsOperand;
    if (columns === null) return 'df';
    return this.isSeries ? `df[${JSON.stringify(columns[0])}]` : `df[${JSON.stringify(columns)}]`;
  }
}

// =============================================================================
// ReadDataset
// =============================================================================

/**
 * A dataset read through its storage reader, one partition per fragment
 * that survives pruning.
 *
 * `_partitions` holds positions among the non-empty fragments before any
 * filter, so absorbing a filter after a partition selection keeps the
 * selection: a selected fragment the filters prune becomes an empty
 * partition.
 */
export class ReadDataset extends BlockwiseIO {
  static parameters = ['dataset', 'columns', 'filters', 'calculateDivisions', '_partitions', '_series'];
  static defaults = { columns: null, filters: [], calculateDivisions: true, _partitions: null, _series: false };

  get dataset(): Dataset {
    const dataset = this.operand('dataset');
    if (dataset instanceof Dataset) return dataset;
    throw ValidationError.typeMismatch('ReadDataset.dataset', 'a Dataset', describeValue(dataset));
  }

  get filters(): FilterPredicate[] {
    const filters = this.operand('filters');
    if (isFilterPredicateList(filters)) return [...filters];
    throw ValidationError.typeMismatch('ReadDataset.filters', 'a list of (column, operator, value) predicates', describeValue(filters));
  }

  get plan(): DatasetPlan {
    return this.dataset.plan(this.filters, this.booleanOperand('calculateDivisions'));
  }

  protected sourceMeta(): DataFrame {
    return this.dataset.meta();
  }

  /** Non-empty fragments before any filter. */
  get sourceFragments(): readonly FragmentInfo[] {
    return this.dataset.plan([], this.booleanOperand('calculateDivisions')).fragments;
  }

  protected sourceDivisions(): Divisions {
    if (this.partitionFilter === null) return this.plan.divisions;
    return this.dataset.plan([], this.booleanOperand('calculateDivisions')).divisions;
  }

  protected sourcePartitions(indices: readonly number[]): number[] | undefined {
    const selected = super.sourcePartitions(indices);
    if (selected === undefined || this.partitionFilter !== null) return selected;
    const { fragments } = this.plan;
    if (fragments.length === 0) return undefined;
    const ids = this.sourceFragments.map((fragment) => fragment.id);
    return selected.map((i) => ids.indexOf(fragments[i].id));
  }

  /** Fragment behind output partition `index`; undefined when pruned. */
  private fragmentAt(index: number): FragmentInfo | undefined {
    const filter = this.partitionFilter;
    if (filter === null) return this.plan.fragments[index];
    const fragment: FragmentInfo | undefined = this.sourceFragments[filter[index]];
    return fragment === undefined || fragmentExcluded(fragment, this.filters) ? undefined : fragment;
  }

  task(index: number): Task {
    const fragment = this.fragmentAt(index);
    const columns = this.columnsOperand;
    const series = this.isSeries;
    if (fragment === undefined) {
      return literalTask(this.meta);
    }
    const dataset = this.dataset;
    const filters = this.filters;
    return {
      fn: async () => {
        const frame = await dataset.readFragment(fragment, columns, filters);
        return selectColumns(frame, columns, series);
      },
      args: [],
    };
  }

  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Filter && parent.frame.name === this.name) {
      return this.absorbFilter(parent);
    }
    if (parent instanceof Len && parent.frame.name === this.name && this.filters.length === 0) {
      let total = 0;
      for (let i = 0; i < this.npartitions; i++) total += this.fragmentAt(i)?.rowCount ?? 0;
      return new Literal(total);
    }
    return super.simplifyUp(parent);
  }

  /**
   * `read[read.col op literal] → read(filters + [(col, op, literal)])`. The
   * column side must read the same dataset partitions under a subset of
   * this read's filters.
   */
  private absorbFilter(parent: Filter): Expr | undefined {
    const predicate = parent.predicate;
    if (!isComparison(predicate)) return undefined;
    const { left, right } = predicate;
    const operator = comparisonOperator(predicate);

    const leftColumn = this.sameSourceColumn(left);
    if (leftColumn !== undefined && isScalar(right)) {
      return this.substituteParameters({ filters: [...this.filters, [leftColumn, operator, right]] });
    }
    const rightColumn = this.sameSourceColumn(right);
    if (rightColumn !== undefined && isScalar(left)) {
      return this.substituteParameters({ filters: [...this.filters, [rightColumn, FLIPPED[operator], left]] });
    }
    return undefined;
  }

  /** Column read by `side` when it is a single-column read of this source. */
  private sameSourceColumn(side: unknown): string | undefined {
    let read: unknown = side;
    let column: string | undefined;
    if (side instanceof Projection && typeof side.key === 'string') {
      read = side.frame;
      column = side.key;
    }
    if (!(read instanceof ReadDataset)) return undefined;
    if (column === undefined) {
      const columns = read.columnsOperand;
      if (!read.isSeries || columns === null) return undefined;
      column = columns[0];
    }
    const mine = this.filters.map((f) => tokenize(f));
    const compatible =
      read.dataset.toToken() === this.dataset.toToken() &&
      tokenize(read.partitionFilter) === tokenize(this.partitionFilter) &&
      read.filters.every((f) => mine.includes(tokenize(f)));
    return compatible ? column : undefined;
  }

  toString(): string {
    const parts = [this.dataset.id];
    const columns = this.columnsOperand;
    if (columns !== null) parts.push(this.isSeries ? JSON.stringify(columns[0]) : JSON.stringify(columns));
    for (const [column, operator, value] of this.filters) {
      parts.push(`${column} ${operator} ${JSON.stringify(value)}`);
    }
    return `ReadDataset(${parts.join(', ')})`;
  }
}

// =============================================================================
// FromGraph
// =============================================================================

/**
 * Already computed partitions, as produced by `persist`. Keeps the name of
 * the expression it was computed from.
 */
export class FromGraph extends Expr {
  static parameters = ['partitions', '_meta', '_divisions', '_name'];

  get partitionValues(): Value[] {
    const value = this.operand('partitions');
    if (!Array.isArray(value)) {
      throw ValidationError.typeMismatch('FromGraph.partitions', 'a list of partitions', describeValue(value));
    }
    return value.map((part: unknown) => expectValue(part, 'FromGraph'));
  }

  get name(): string {
    return this.stringOperand('_name');
  }

  protected computeMeta(): Value {
    return expectValue(this.operand('_meta'), 'FromGraph');
  }

  protected computeDivisions(): Divisions {
    const divisions = this.operand('_divisions');
    if (Array.isArray(divisions) && divisions.every(isScalar)) return divisions;
    throw ValidationError.typeMismatch('FromGraph._divisions', 'a list of divisions', describeValue(divisions));
  }

  layer(): TaskGraph {
    const layer: TaskGraph = new Map();
    this.partitionValues.forEach((value, i) => layer.set(taskKey(this.name, i), literalTask(value)));
    return layer;
  }

  toString(): string {
    return `FromGraph(${this.name})`;
  }
}
