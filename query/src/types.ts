/**
 * @framegraph/query - Type Definitions
 *
 * Shared types for partition boundaries, absorbed IO predicates and the
 * task graph handed to an executor.
 *
 * @packageDocumentation
 * @module @framegraph/query
 */

import type { Scalar } from '@framegraph/frame';

// =============================================================================
// Divisions
// =============================================================================

/**
 * Partition boundaries: `npartitions + 1` index values, where partition `i`
 * covers `[divisions[i], divisions[i + 1])` and the last partition also
 * includes its upper bound. Unknown divisions are all `null`.
 *
 * @example
 * ```typescript
 * // Three partitions covering index ranges [0, 10), [10, 20), [20, 25]
 * const divisions: Divisions = [0, 10, 20, 25];
 *
 * // Two partitions, boundaries unknown
 * const unknown: Divisions = [null, null, null];
 * ```
 */
export type Divisions = readonly Scalar[];

export function unknownDivisions(npartitions: number): Scalar[] {
  return Array<Scalar>(npartitions + 1).fill(null);
}

/**
 * True when every boundary is known.
 */
export function areDivisionsKnown(divisions: Divisions): boolean {
  return divisions.length > 0 && divisions.every((d) => d !== null);
}

// =============================================================================
// IO Predicates
// =============================================================================

/**
 * Comparison operators an IO leaf can absorb.
 */
export type FilterOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export const FILTER_OPERATORS: readonly FilterOperator[] = ['==', '!=', '<', '<=', '>', '>='];

export function isFilterOperator(value: unknown): value is FilterOperator {
  return FILTER_OPERATORS.some((op) => op === value);
}

/**
 * An absorbed predicate, always stored with the column on the left.
 *
 * @example
 * ```typescript
 * const filter: FilterPredicate = ['amount', '>', 100];
 * ```
 */
export type FilterPredicate = readonly [column: string, operator: FilterOperator, value: Scalar];

// =============================================================================
// Task Graph
// =============================================================================

/**
 * Key of one task: a node name and a partition index.
 */
export type TaskKey = string;

/**
 * Function run by a task. Arguments referring to other keys arrive already
 * resolved to their results. May return a promise.
 */
export type TaskFunction = (args: readonly unknown[], kwargs: Readonly<Record<string, unknown>>) => unknown;

/**
 * One unit of work in the task graph.
 */
export interface Task {
  /** Function to call */
  fn: TaskFunction;

  /** Positional arguments; `TaskRef`s (also inside arrays) name other keys */
  args: readonly unknown[];

  /** Keyword arguments, passed through unchanged */
  kwargs?: Readonly<Record<string, unknown>>;
}

/**
 * Mapping from key to task. Every `TaskRef` inside a task must name a key
 * of the same graph.
 */
export type TaskGraph = Map<TaskKey, Task>;
