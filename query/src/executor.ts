/**
 * Local executor
 *
 * Runs a task graph in process: every key whose dependencies have finished
 * is started, in waves, up to `maxConcurrency` at a time. Each key yields a
 * `Result`; a failure is reported for that key and every key depending on
 * it, and nothing is retried.
 */

import { all, createNoopLogger, err, ExecutionError, isErr, isOk, settle, unwrap, type Logger, type Result } from '@framegraph/core';
import { cull, runTask, taskDependencies } from './graph.js';
import type { TaskGraph, TaskKey } from './types.js';

export type TaskResult = Result<unknown, ExecutionError>;

export interface LocalExecutorOptions {
  /** Tasks started at once within a wave (default: 16) */
  maxConcurrency?: number;
  logger?: Logger;
}

export class LocalExecutor {
  private readonly maxConcurrency: number;
  private readonly logger: Logger;

  constructor(options: LocalExecutorOptions = {}) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 16);
    this.logger = options.logger ?? createNoopLogger();
  }

  /**
   * Run `graph`, or only what `keys` need when given.
   *
   * @throws ExecutionError when a needed key is missing or the graph has a cycle
   */
  async execute(graph: TaskGraph, keys?: Iterable<TaskKey>): Promise<Map<TaskKey, TaskResult>> {
    const tasks = keys === undefined ? graph : cull(graph, keys);
    const results = new Map<TaskKey, TaskResult>();
    const dependencies = new Map<TaskKey, TaskKey[]>();
    for (const [key, task] of tasks) {
      const deps = [...taskDependencies(task)];
      const missing = deps.find((dep) => !tasks.has(dep));
      if (missing !== undefined) throw ExecutionError.missingDependency(key, missing);
      dependencies.set(key, deps);
    }

    const started = performance.now();
    const pending = new Set(tasks.keys());
    let waves = 0;
    while (pending.size > 0) {
      const ready = [...pending].filter((key) => (dependencies.get(key) ?? []).every((dep) => results.has(dep)));
      if (ready.length === 0) {
        throw ExecutionError.cyclicGraph([...pending]);
      }
      waves++;
      for (let at = 0; at < ready.length; at += this.maxConcurrency) {
        const batch = ready.slice(at, at + this.maxConcurrency);
        await Promise.all(batch.map((key) => this.runKey(key, tasks, dependencies.get(key) ?? [], results)));
      }
      for (const key of ready) pending.delete(key);
    }

    const failed = [...results.values()].filter((result) => isErr(result)).length;
    this.logger.info('Executed task graph', {
      component: 'executor',
      tasks: tasks.size,
      waves,
      failed,
      durationMs: performance.now() - started,
    });
    return results;
  }

  private async runKey(
    key: TaskKey,
    tasks: TaskGraph,
    deps: readonly TaskKey[],
    results: Map<TaskKey, TaskResult>
  ): Promise<void> {
    const failedDep = deps.find((dep) => {
      const result = results.get(dep);
      return result !== undefined && isErr(result);
    });
    if (failedDep !== undefined) {
      results.set(key, err(ExecutionError.dependencyFailed(key, failedDep)));
      return;
    }
    const task = tasks.get(key);
    if (task === undefined) {
      results.set(key, err(ExecutionError.missingDependency(key, key)));
      return;
    }
    const outcome = await settle(() =>
      runTask(task, (dep) => {
        const result = results.get(dep);
        return result !== undefined && isOk(result) ? result.value : undefined;
      })
    );
    if (isOk(outcome)) {
      results.set(key, outcome);
      return;
    }
    const failure = ExecutionError.taskFailed(key, outcome.error);
    this.logger.error('Task failed', failure, { component: 'executor', key });
    results.set(key, err(failure));
  }
}

/**
 * Values of `keys`, in order.
 *
 * @throws ExecutionError the first failure among `keys`
 */
export function collectResults(results: ReadonlyMap<TaskKey, TaskResult>, keys: readonly TaskKey[]): unknown[] {
  return unwrap(all(keys.map((key) => results.get(key) ?? err(ExecutionError.missingDependency(key, key)))));
}
