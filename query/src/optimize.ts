/**
 * Rewrite engine
 *
 * `simplify` drives every node's local rule (`simplify`) and its
 * dependencies' parent-context rules (`simplifyUp`) to a fixed point,
 * detected by comparing content-addressed names. `optimize` chains the
 * stages: simplify, lower, simplify, combine similar reads, fuse.
 *
 * @example
 * ```typescript
 * const expr = df.getItem(['a', 'b', 'c']).getItem(['b', 'c']);
 * simplify(expr).toString(); // df["b","c"] read directly
 * ```
 */

import { DEFAULT_CONFIG, type FrameGraphConfig } from '@framegraph/config';
import { createNoopLogger, PlanError, type Logger } from '@framegraph/core';
import { Expr, Projection, type LowerOptions } from './expr.js';
import { fuse } from './fusion.js';
import { BlockwiseIO } from './io.js';

// =============================================================================
// Simplify
// =============================================================================

export interface SimplifyOptions {
  /** Passes before giving up (default: optimizer.maxPasses) */
  maxPasses?: number;
  logger?: Logger;
}

/**
 * One rewrite of `node`: its own rule first, then each dependency's rule for
 * it as a parent. Rewrites that keep the name are ignored.
 */
function rewriteNode(node: Expr): Expr | undefined {
  const local = node.simplify();
  if (local !== undefined && local.name !== node.name) return local;
  for (const dep of node.dependencies()) {
    const up = dep.simplifyUp(node);
    if (up !== undefined && up.name !== node.name) return up;
  }
  return undefined;
}

function simplifyOnce(expr: Expr, maxPasses: number): Expr {
  const memo = new Map<string, Expr>();
  const visit = (node: Expr): Expr => {
    const cached = memo.get(node.name);
    if (cached !== undefined) return cached;

    let current = node;
    for (let step = 0; ; step++) {
      if (step >= maxPasses) throw PlanError.noFixedPoint(maxPasses, current.name);
      const next = rewriteNode(current);
      if (next === undefined) break;
      current = next;
    }

    const result = current.withOperands(current.operands.map((op) => (op instanceof Expr ? visit(op) : op)));
    memo.set(node.name, result);
    return result;
  };
  return visit(expr);
}

/**
 * Rewrite `expr` until a full pass changes no name.
 *
 * @throws PlanError when no fixed point is reached within `maxPasses`
 */
export function simplify(expr: Expr, options: SimplifyOptions = {}): Expr {
  const maxPasses = options.maxPasses ?? DEFAULT_CONFIG.optimizer.maxPasses;
  const logger = options.logger ?? createNoopLogger();
  let current = expr;
  for (let pass = 1; pass <= maxPasses; pass++) {
    const next = simplifyOnce(current, maxPasses);
    if (next.name === current.name) {
      logger.debug('Simplified expression', { component: 'optimizer', expr: next.name, passes: pass });
      return next;
    }
    current = next;
  }
  throw PlanError.noFixedPoint(maxPasses, current.name);
}

// =============================================================================
// Lower
// =============================================================================

/**
 * Expand nodes that have a lower-level form (reductions into chunk and tree
 * reduce, mean into sum over count) until none is left.
 */
export function lower(expr: Expr, options: LowerOptions, maxPasses = DEFAULT_CONFIG.optimizer.maxPasses): Expr {
  const memo = new Map<string, Expr>();
  const visit = (node: Expr): Expr => {
    const cached = memo.get(node.name);
    if (cached !== undefined) return cached;

    let current = node;
    for (let step = 0; ; step++) {
      if (step >= maxPasses) throw PlanError.noFixedPoint(maxPasses, current.name);
      const next = current.lower(options);
      if (next === undefined || next.name === current.name) break;
      current = next;
    }

    const result = current.withOperands(current.operands.map((op) => (op instanceof Expr ? visit(op) : op)));
    memo.set(node.name, result);
    return result;
  };
  return visit(expr);
}

// =============================================================================
// Combine Similar
// =============================================================================

export interface CombineSimilarOptions {
  logger?: Logger;
}

/**
 * Replace reads of one source that differ only in their columns by a single
 * read of the column union, each original becoming a projection of it.
 */
export function combineSimilar(expr: Expr, options: CombineSimilarOptions = {}): Expr {
  const logger = options.logger ?? createNoopLogger();
  const groups = new Map<string, BlockwiseIO[]>();
  for (const read of expr.findOperations(BlockwiseIO)) {
    const key = read.similarityKey();
    const group = groups.get(key);
    if (group === undefined) groups.set(key, [read]);
    else group.push(read);
  }

  const replacements = new Map<string, Expr>();
  for (const reads of groups.values()) {
    if (reads.length < 2) continue;
    const wanted = reads.map((read) => read.columnsOperand);
    const union = wanted.some((columns) => columns === null)
      ? null
      : [...new Set(wanted.flatMap((columns) => columns ?? []))].sort();
    const combined = reads[0].substituteParameters({ columns: union, _series: false });

    for (const read of reads) {
      if (read.name === combined.name) continue;
      const columns = read.columnsOperand;
      const key = read.isSeries && columns !== null ? columns[0] : (columns ?? combined.columns);
      replacements.set(read.name, new Projection(combined, key));
    }
  }

  if (replacements.size === 0) return expr;
  logger.debug('Combined similar reads', { component: 'optimizer', replaced: replacements.size });
  return expr.substitute(replacements);
}

// =============================================================================
// Optimize
// =============================================================================

export interface OptimizeOptions {
  config?: FrameGraphConfig;
  logger?: Logger;
  /** Override `optimizer.fuse` */
  fuse?: boolean;
}

/**
 * Full optimization pipeline.
 *
 * @example
 * ```typescript
 * const optimized = optimize(expr, { config: createConfig({ optimizer: { fuse: false } }) });
 * ```
 */
export function optimize(expr: Expr, options: OptimizeOptions = {}): Expr {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? createNoopLogger();
  const { maxPasses } = config.optimizer;
  const started = performance.now();

  const simplified = simplify(expr, { maxPasses, logger });
  const lowered = simplify(lower(simplified, { splitEvery: config.reduction.splitEvery }, maxPasses), {
    maxPasses,
    logger,
  });
  const combined = config.optimizer.combineSimilar ? combineSimilar(lowered, { logger }) : lowered;
  const result = (options.fuse ?? config.optimizer.fuse) ? fuse(combined, { logger }) : combined;

  logger.info('Optimized expression', {
    component: 'optimizer',
    expr: result.name,
    partitions: result.npartitions,
    durationMs: performance.now() - started,
  });
  return result;
}
