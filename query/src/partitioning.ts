/**
 * Operators that change how rows map to partitions: repartitioning,
 * concatenation and index shifts.
 */

import { PlanError, ValidationError } from '@framegraph/core';
import {
  compareScalars,
  concatValues,
  describeValue,
  expectContainer,
  expectValue,
  expectValues,
  isScalar,
  shiftIndex,
  shiftLabel,
  sliceIndexRange,
  sliceRows,
  type IndexOffset,
  type Scalar,
  type Value,
} from '@framegraph/frame';
import { Elemwise, Expr, Projection } from './expr.js';
import { ref } from './graph.js';
import { areDivisionsKnown, unknownDivisions, type Divisions, type Task } from './types.js';

// =============================================================================
// Division Helpers
// =============================================================================

/**
 * Split points of a sorted index into at most `npartitions` pieces of
 * similar size. Equal index values never straddle a boundary, so heavy
 * duplicates can yield fewer partitions than asked for.
 *
 * @example
 * ```typescript
 * sortedDivisionLocations([1, 1, 1, 1, 2, 3], 3);
 * // { divisions: [1, 2, 3], locations: [0, 4, 6] }
 * ```
 */
export function sortedDivisionLocations(
  sortedIndex: readonly Scalar[],
  npartitions: number
): { divisions: Scalar[]; locations: number[] } {
  const length = sortedIndex.length;
  if (length === 0) {
    return { divisions: [null, null], locations: [0, 0] };
  }
  const count = Math.max(1, Math.min(npartitions, length));
  const starts: number[] = [];
  for (let k = 0; k < count; k++) {
    let position = Math.floor((k * length) / count);
    while (position > 0 && compareScalars(sortedIndex[position - 1], sortedIndex[position]) === 0) {
      position--;
    }
    if (starts.length === 0 || position > starts[starts.length - 1]) {
      starts.push(position);
    }
  }
  return {
    divisions: [...starts.map((p) => sortedIndex[p]), sortedIndex[length - 1]],
    locations: [...starts, length],
  };
}

/** Evenly spaced group boundaries over `total` items, `groups + 1` long. */
function evenBoundaries(total: number, groups: number): number[] {
  return Array.from({ length: groups + 1 }, (_, k) => Math.round((k * total) / groups));
}

// =============================================================================
// Repartition
// =============================================================================

type RepartitionPlan = Array<{ inputs: number[]; select: (parts: Value[]) => Value }>;

/**
 * Change the number of partitions, or re-slice to explicit divisions.
 *
 * Fewer partitions concatenates neighbours and keeps their boundaries; more
 * partitions splits by row position and clears divisions; explicit
 * divisions slice by index range and need known input divisions that they
 * cover.
 */
export class Repartition extends Expr {
  static parameters = ['frame', 'npartitions', 'newDivisions'];
  static defaults = { npartitions: null, newDivisions: null };

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get targetPartitions(): number | null {
    const value = this.operand('npartitions');
    if (value === null) return null;
    if (typeof value === 'number' && Number.isInteger(value) && value >= 1) return value;
    throw ValidationError.typeMismatch('repartition', 'a positive partition count', describeValue(value));
  }

  get targetDivisions(): Scalar[] | null {
    const value = this.operand('newDivisions');
    if (value === null) return null;
    if (Array.isArray(value) && value.length >= 2 && value.every(isScalar)) return [...value];
    throw ValidationError.typeMismatch('repartition', 'at least two divisions', describeValue(value));
  }

  protected computeMeta(): Value {
    if ((this.targetPartitions === null) === (this.targetDivisions === null)) {
      throw ValidationError.typeMismatch('repartition', 'exactly one of npartitions or divisions', 'both or neither');
    }
    return this.frame.meta;
  }

  protected computeDivisions(): Divisions {
    const divisions = this.targetDivisions;
    const input = this.frame.divisions;
    if (divisions !== null) {
      if (!areDivisionsKnown(input)) {
        throw ValidationError.typeMismatch('repartition', 'an input with known divisions', 'unknown divisions');
      }
      const covers =
        compareScalars(divisions[0], input[0]) <= 0 &&
        compareScalars(divisions[divisions.length - 1], input[input.length - 1]) >= 0;
      if (!covers) {
        throw ValidationError.invalidDivisions(divisions);
      }
      return divisions;
    }
    const n = this.targetPartitions ?? this.frame.npartitions;
    const m = this.frame.npartitions;
    if (n <= m) {
      return evenBoundaries(m, n).map((b) => input[b]);
    }
    return unknownDivisions(n);
  }

  simplify(): Expr | undefined {
    const { frame } = this;
    if (this.targetPartitions === frame.npartitions) return frame;
    if (frame instanceof Repartition && this.targetPartitions !== null) {
      return this.substituteParameters({ frame: frame.frame });
    }
    return undefined;
  }

  simplifyUp(parent: Expr): Expr | undefined {
    if (parent instanceof Projection && parent.frame.name === this.name) {
      return this.substituteParameters({ frame: new Projection(this.frame, parent.key) });
    }
    return undefined;
  }

  private plan(): RepartitionPlan {
    const m = this.frame.npartitions;
    const divisions = this.targetDivisions;
    if (divisions !== null) {
      return this.rangePlan(divisions);
    }
    const n = this.targetPartitions ?? m;
    if (n <= m) {
      const bounds = evenBoundaries(m, n);
      return Array.from({ length: n }, (_, k) => ({
        inputs: Array.from({ length: bounds[k + 1] - bounds[k] }, (_, j) => bounds[k] + j),
        select: (parts: Value[]) => concatValues(parts),
      }));
    }
    const plan: RepartitionPlan = [];
    const base = Math.floor(n / m);
    for (let i = 0; i < m; i++) {
      const pieces = base + (i < n % m ? 1 : 0);
      for (let j = 0; j < pieces; j++) {
        plan.push({
          inputs: [i],
          select: ([part]) => {
            const container = expectContainer(part, 'repartition');
            const bounds = evenBoundaries(container.length, pieces);
            return sliceRows(container, bounds[j], bounds[j + 1]);
          },
        });
      }
    }
    return plan;
  }

  private rangePlan(divisions: readonly Scalar[]): RepartitionPlan {
    const input = this.frame.divisions;
    const last = divisions.length - 2;
    return divisions.slice(0, -1).map((lower, k) => {
      const upper = divisions[k + 1];
      const inputs: number[] = [];
      for (let i = 0; i < input.length - 1; i++) {
        const inputLast = i === input.length - 2;
        const startsBeforeUpper =
          k === last ? compareScalars(input[i], upper) <= 0 : compareScalars(input[i], upper) < 0;
        const endsAfterLower = inputLast
          ? compareScalars(input[i + 1], lower) >= 0
          : compareScalars(input[i + 1], lower) > 0;
        if (startsBeforeUpper && endsAfterLower) inputs.push(i);
      }
      return {
        inputs,
        select: (parts: Value[]) =>
          parts.length === 0
            ? this.frame.meta
            : concatValues(parts.map((part) => sliceIndexRange(part, lower, upper, k === last))),
      };
    });
  }

  task(index: number): Task {
    const step = this.plan()[index];
    const name = this.frame.name;
    return {
      fn: (args) => step.select(expectValues(args[0], 'repartition')),
      args: [step.inputs.map((i) => ref(name, i))],
    };
  }
}

// =============================================================================
// Concat
// =============================================================================

export type ConcatJoin = 'outer' | 'inner';

/**
 * Concatenate frames along rows (`axis` 0) or columns (`axis` 1). The
 * frames follow the declared parameters as variadic operands.
 */
export class Concat extends Expr {
  static parameters = ['join', 'axis', 'ignoreUnknownDivisions'];
  static defaults = { join: 'outer', axis: 0, ignoreUnknownDivisions: false };
  static variadic = true;

  get frames(): Expr[] {
    return this.rest.map((frame, i) => {
      if (frame instanceof Expr) return frame;
      throw ValidationError.typeMismatch(`Concat.frames[${i}]`, 'an expression', describeValue(frame));
    });
  }

  get join(): ConcatJoin {
    const join = this.operand('join');
    if (join === 'outer' || join === 'inner') return join;
    throw ValidationError.typeMismatch('concat', "'outer' or 'inner'", describeValue(join));
  }

  get axis(): 0 | 1 {
    const axis = this.operand('axis');
    if (axis === 0 || axis === 1) return axis;
    throw ValidationError.typeMismatch('concat', 'axis 0 or 1', describeValue(axis));
  }

  protected computeMeta(): Value {
    const frames = this.frames;
    if (frames.length === 0) {
      throw ValidationError.typeMismatch('concat', 'at least one frame', 'none');
    }
    return concatValues(frames.map((frame) => frame.meta), { join: this.join, axis: this.axis });
  }

  protected computeDivisions(): Divisions {
    const frames = this.frames;
    if (this.axis === 1) {
      const [first, ...others] = frames;
      if (first === undefined) {
        throw ValidationError.typeMismatch('concat', 'at least one frame', 'none');
      }
      const ignoreUnknown = this.booleanOperand('ignoreUnknownDivisions');
      for (const other of others) {
        const aligned = ignoreUnknown
          ? other.npartitions === first.npartitions
          : other.divisions.length === first.divisions.length &&
            other.divisions.every((d, i) => d === first.divisions[i]) &&
            first.knownDivisions;
        if (!aligned) {
          throw PlanError.divisionsMismatch('Concat', frames.map((frame) => frame.name));
        }
      }
      return first.divisions;
    }
    const total = frames.reduce((sum, frame) => sum + frame.npartitions, 0);
    const ordered =
      frames.every((frame) => frame.knownDivisions) &&
      frames.every(
        (frame, i) =>
          i === 0 ||
          compareScalars(frames[i - 1].divisions[frames[i - 1].divisions.length - 1], frame.divisions[0]) < 0
      );
    if (!ordered) return unknownDivisions(total);
    const last = frames[frames.length - 1];
    return [...frames.flatMap((frame) => frame.divisions.slice(0, -1)), last.divisions[last.divisions.length - 1]];
  }

  /**
   * `concat(frames)[cols] → concat(frame[cols ∩ frame.columns])[cols]`;
   * inputs that supply none of `cols` drop out of a column-wise concat.
   */
  simplifyUp(parent: Expr): Expr | undefined {
    if (!(parent instanceof Projection) || parent.frame.name !== this.name) return undefined;
    const wanted = typeof parent.key === 'string' ? [parent.key] : parent.key;
    const frames = this.frames;
    const prunable = frames.some((frame) => frame.columns.some((name) => !wanted.includes(name)));
    if (!prunable) return undefined;

    const narrowed: Expr[] = [];
    for (const frame of frames) {
      const keep = frame.columns.filter((name) => wanted.includes(name));
      if (frame.ndim === 2) {
        if (this.axis === 1 && keep.length === 0) continue;
        narrowed.push(keep.length === frame.columns.length ? frame : new Projection(frame, keep));
      } else if (this.axis === 0 || keep.length > 0) {
        narrowed.push(frame);
      }
    }
    if (narrowed.length === 0) return undefined;
    const concat = this.withOperands([...this.operands.slice(0, Concat.parameters.length), ...narrowed]);
    if (concat === this) return undefined;
    return new Projection(concat, parent.key);
  }

  /** Output partition `index` as (input frame, input partition). */
  private locate(index: number): { frame: Expr; partition: number } {
    let remaining = index;
    for (const frame of this.frames) {
      if (remaining < frame.npartitions) return { frame, partition: remaining };
      remaining -= frame.npartitions;
    }
    throw ValidationError.invalidPartition(index, this.npartitions);
  }

  task(index: number): Task {
    const join = this.join;
    if (this.axis === 1) {
      return {
        fn: (args) => concatValues(expectValues(args[0], 'concat'), { join, axis: 1 }),
        args: [this.frames.map((frame) => ref(frame.name, index))],
      };
    }
    // Conform each partition to the combined schema by concatenating it onto the empty meta
    const meta = this.meta;
    const { frame, partition } = this.locate(index);
    return {
      fn: (args) => concatValues([meta, expectValue(args[0], 'concat')], { join }),
      args: [ref(frame.name, partition)],
    };
  }
}

// =============================================================================
// ShiftIndex
// =============================================================================

function isIndexOffset(value: unknown): value is IndexOffset {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  if (value.kind === 'fixed') return 'amount' in value && typeof value.amount === 'number';
  return (
    (value.kind === 'monthStart' || value.kind === 'monthEnd' || value.kind === 'dayStart' || value.kind === 'months') &&
    'periods' in value &&
    typeof value.periods === 'number'
  );
}

/**
 * Move every index label by `offset`. Only a fixed offset keeps divisions
 * known; calendar offsets can reorder boundaries, so they clear them.
 */
export class ShiftIndex extends Elemwise {
  static parameters = ['frame', 'offset'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get offset(): IndexOffset {
    const offset = this.operand('offset');
    if (isIndexOffset(offset)) return offset;
    throw ValidationError.typeMismatch('shiftIndex', 'an index offset', describeValue(offset));
  }

  protected operation(args: readonly unknown[]): unknown {
    return shiftIndex(expectValue(args[0], 'shiftIndex'), this.offset);
  }

  protected computeDivisions(): Divisions {
    const { frame, offset } = this;
    if (offset.kind === 'fixed' && frame.knownDivisions) {
      return frame.divisions.map((d) => shiftLabel(d, offset));
    }
    return unknownDivisions(frame.npartitions);
  }
}
