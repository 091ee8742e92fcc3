/**
 * Task graph construction
 *
 * A materialized graph maps `(name, index)` keys to tasks. Arguments that
 * refer to other keys are `TaskRef`s, so an executor can read the
 * dependency edges without calling anything.
 */

import { ExecutionError, ValidationError } from '@framegraph/core';
import type { Expr } from './expr.js';
import type { Task, TaskGraph, TaskKey } from './types.js';

// =============================================================================
// Keys & References
// =============================================================================

/**
 * Key of partition `index` of node `name`.
 *
 * @example
 * ```typescript
 * taskKey('add-1a2b3c4d5e6f7a8b', 3); // 'add-1a2b3c4d5e6f7a8b:3'
 * ```
 */
export function taskKey(name: string, index: number): TaskKey {
  return `${name}:${index}`;
}

/**
 * Split a key into node name and partition index.
 */
export function parseTaskKey(key: TaskKey): { name: string; index: number } {
  const at = key.lastIndexOf(':');
  const index = Number(key.slice(at + 1));
  if (at < 0 || !Number.isInteger(index)) {
    throw ValidationError.typeMismatch('parseTaskKey', 'a "name:index" key', JSON.stringify(key));
  }
  return { name: key.slice(0, at), index };
}

/**
 * Reference to the result of another task.
 */
export class TaskRef {
  constructor(readonly key: TaskKey) {}

  toString(): string {
    return `TaskRef(${this.key})`;
  }
}

export function ref(name: string, index: number): TaskRef {
  return new TaskRef(taskKey(name, index));
}

/**
 * Keys referenced by a task's arguments, including inside arrays.
 */
export function taskDependencies(task: Task): Set<TaskKey> {
  const keys = new Set<TaskKey>();
  const visit = (arg: unknown): void => {
    if (arg instanceof TaskRef) {
      keys.add(arg.key);
    } else if (Array.isArray(arg)) {
      arg.forEach(visit);
    }
  };
  task.args.forEach(visit);
  return keys;
}

/**
 * Replace references with results from `lookup`.
 */
export function resolveArgs(args: readonly unknown[], lookup: (key: TaskKey) => unknown): unknown[] {
  const resolve = (arg: unknown): unknown => {
    if (arg instanceof TaskRef) return lookup(arg.key);
    if (Array.isArray(arg)) return arg.map(resolve);
    return arg;
  };
  return args.map(resolve);
}

/**
 * Call a task with its references resolved.
 */
export function runTask(task: Task, lookup: (key: TaskKey) => unknown): unknown {
  return task.fn(resolveArgs(task.args, lookup), task.kwargs ?? {});
}

/**
 * A task that forwards the result of another key.
 */
export function aliasTask(target: TaskKey): Task {
  return { fn: (args) => args[0], args: [new TaskRef(target)] };
}

/**
 * A task that returns a constant.
 */
export function literalTask(value: unknown): Task {
  return { fn: (args) => args[0], args: [value] };
}

// =============================================================================
// Materialization
// =============================================================================

/**
 * Lower a (possibly fused) tree into one task graph. Each distinct node name
 * contributes exactly one layer, so shared subtrees appear once.
 */
export function materialize(expr: Expr): TaskGraph {
  const graph: TaskGraph = new Map();
  const seen = new Set<string>();
  const stack: Expr[] = [expr];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || seen.has(node.name)) continue;
    seen.add(node.name);
    for (const [key, task] of node.layer()) {
      graph.set(key, task);
    }
    stack.push(...node.dependencies());
  }
  return graph;
}

/**
 * Keys producing the partitions of `expr`, in partition order.
 */
export function outputKeys(expr: Expr): TaskKey[] {
  return Array.from({ length: expr.npartitions }, (_, i) => taskKey(expr.name, i));
}

/**
 * Keep only the tasks needed to produce `keys`.
 *
 * @throws ExecutionError when a needed key is not in the graph
 */
export function cull(graph: TaskGraph, keys: Iterable<TaskKey>): TaskGraph {
  const culled: TaskGraph = new Map();
  const stack = [...keys].map((key) => ({ key, from: key }));
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || culled.has(next.key)) continue;
    const task = graph.get(next.key);
    if (task === undefined) {
      throw ExecutionError.missingDependency(next.from, next.key);
    }
    culled.set(next.key, task);
    for (const dep of taskDependencies(task)) {
      stack.push({ key: dep, from: next.key });
    }
  }
  return culled;
}
