/**
 * Block-wise fusion
 *
 * Chains of fusable nodes whose members are consumed only inside the chain
 * collapse into one `Fused` node: one task per partition instead of one per
 * member. A fused node answers to its root's name, meta and divisions, so
 * consumers and task keys are unaffected.
 */

import { createNoopLogger, ValidationError, type Logger } from '@framegraph/core';
import { describeValue, type Value } from '@framegraph/frame';
import { Expr, isExpr } from './expr.js';
import { runTask, taskDependencies, taskKey, TaskRef } from './graph.js';
import type { Divisions, Task, TaskKey } from './types.js';

// =============================================================================
// Fused
// =============================================================================

/**
 * A group of block-wise nodes run as one task per partition. `exprs` lists
 * the members root first; trailing operands are the group's external
 * dependencies.
 */
export class Fused extends Expr {
  static parameters = ['exprs'];
  static variadic = true;

  get exprs(): Expr[] {
    const value = this.operand('exprs');
    if (Array.isArray(value) && value.length > 0 && value.every(isExpr)) return [...value];
    throw ValidationError.typeMismatch('Fused.exprs', 'a non-empty list of expressions', describeValue(value));
  }

  get root(): Expr {
    return this.exprs[0];
  }

  get name(): string {
    return this.root.name;
  }

  protected computeMeta(): Value {
    return this.root.meta;
  }

  protected computeDivisions(): Divisions {
    return this.root.divisions;
  }

  /**
   * Member tasks for partition `index`, dependencies before dependents.
   */
  private memberTasks(index: number): Array<[TaskKey, Task]> {
    return this.exprs.reverse().map((expr) => [taskKey(expr.name, index), expr.task(index)]);
  }

  task(index: number): Task {
    const members = this.memberTasks(index);
    const internal = new Set(members.map(([key]) => key));
    const external: TaskKey[] = [];
    for (const [, task] of members) {
      for (const key of taskDependencies(task)) {
        if (!internal.has(key) && !external.includes(key)) external.push(key);
      }
    }
    const rootKey = taskKey(this.name, index);
    return {
      fn: async (args) => {
        const values = new Map<TaskKey, unknown>();
        external.forEach((key, i) => values.set(key, args[i]));
        for (const [key, task] of members) {
          values.set(key, await runTask(task, (dep) => values.get(dep)));
        }
        return values.get(rootKey);
      },
      args: external.map((key) => new TaskRef(key)),
    };
  }

  toString(): string {
    return `Fused(${this.exprs.map((expr) => expr.kind.name).join(', ')})`;
  }

  explain(): string {
    const lines = [`Fused: ${this.exprs.map((expr) => expr.kind.name).join(' <- ')}`];
    for (const dep of this.dependencies()) {
      lines.push(...dep.explain().split('\n').map((line) => `  ${line}`));
    }
    return lines.join('\n');
  }
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Nodes of the tree, every consumer before the nodes it consumes.
 */
export function topologicalOrder(expr: Expr): Expr[] {
  const order: Expr[] = [];
  const seen = new Set<string>();
  const visit = (node: Expr): void => {
    if (seen.has(node.name)) return;
    seen.add(node.name);
    for (const dep of node.dependencies()) visit(dep);
    order.push(node);
  };
  visit(expr);
  return order.reverse();
}

/**
 * Names of the distinct consumers of each node.
 */
export function consumerMap(expr: Expr): Map<string, Set<string>> {
  const consumers = new Map<string, Set<string>>();
  for (const node of expr.walk()) {
    if (!consumers.has(node.name)) consumers.set(node.name, new Set());
    for (const dep of node.dependencies()) {
      const set = consumers.get(dep.name) ?? new Set<string>();
      set.add(node.name);
      consumers.set(dep.name, set);
    }
  }
  return consumers;
}

export interface FuseOptions {
  logger?: Logger;
}

/**
 * Collapse single-consumer block-wise chains into `Fused` nodes.
 *
 * A node joins a group when it is fusable, has the group's partition count
 * and every one of its consumers is already in the group.
 */
export function fuse(expr: Expr, options: FuseOptions = {}): Expr {
  const logger = options.logger ?? createNoopLogger();
  const consumers = consumerMap(expr);
  const assigned = new Set<string>();
  const groups = new Map<string, Expr[]>();

  for (const root of topologicalOrder(expr)) {
    if (!root.isFusable || assigned.has(root.name)) continue;
    const members = [root];
    const names = new Set([root.name]);
    let grew = true;
    while (grew) {
      grew = false;
      for (const member of [...members]) {
        for (const dep of member.dependencies()) {
          if (names.has(dep.name) || assigned.has(dep.name)) continue;
          if (!dep.isFusable || dep.npartitions !== root.npartitions) continue;
          const users = consumers.get(dep.name) ?? new Set<string>();
          if (![...users].every((user) => names.has(user))) continue;
          members.push(dep);
          names.add(dep.name);
          grew = true;
        }
      }
    }
    if (members.length > 1) {
      groups.set(root.name, orderMembers(members));
      for (const name of names) assigned.add(name);
    }
  }

  if (groups.size === 0) return expr;

  const memo = new Map<string, Expr>();
  const rebuild = (node: Expr): Expr => {
    const cached = memo.get(node.name);
    if (cached !== undefined) return cached;
    const group = groups.get(node.name);
    let result: Expr;
    if (group !== undefined) {
      const inside = new Set(group.map((member) => member.name));
      const externals = new Map<string, Expr>();
      for (const member of group) {
        for (const dep of member.dependencies()) {
          if (!inside.has(dep.name) && !externals.has(dep.name)) externals.set(dep.name, rebuild(dep));
        }
      }
      result = new Fused(group, ...externals.values());
    } else {
      result = node.withOperands(node.operands.map((op) => (op instanceof Expr ? rebuild(op) : op)));
    }
    memo.set(node.name, result);
    return result;
  };
  const fused = rebuild(expr);

  logger.debug('Fused block-wise chains', {
    component: 'fusion',
    groups: groups.size,
    members: [...groups.values()].reduce((total, group) => total + group.length, 0),
  });
  return fused;
}

/** Root first, then every member after all of its consumers in the group. */
function orderMembers(members: readonly Expr[]): Expr[] {
  const names = new Set(members.map((member) => member.name));
  const order: Expr[] = [];
  const seen = new Set<string>();
  const visit = (node: Expr): void => {
    if (seen.has(node.name)) return;
    seen.add(node.name);
    for (const dep of node.dependencies()) {
      if (names.has(dep.name)) visit(dep);
    }
    order.push(node);
  };
  visit(members[0]);
  return order.reverse();
}
