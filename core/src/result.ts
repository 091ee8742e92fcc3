/**
 * Per-key outcomes
 *
 * A task either produced a value or failed; the executor records one of
 * these for every key so a failure never hides the keys that succeeded.
 * Outcomes are plain frozen objects, safe to put in maps and compare with
 * `toEqual`.
 *
 * @example
 * ```typescript
 * const outcome = await settle(() => runTask(task, lookup));
 * if (isErr(outcome)) logger.error('Task failed', outcome.error);
 * ```
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  const result: Ok<T> = { ok: true, value };
  return Object.freeze(result);
}

export function err<E>(error: E): Err<E> {
  const result: Err<E> = { ok: false, error };
  return Object.freeze(result);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * The value of an Ok.
 *
 * @throws the error of an Err, wrapped in an Error when it is not one
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) return result.value;
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/**
 * Run `fn`, which may be synchronous or return a promise, and capture a
 * throw or rejection as an Err.
 */
export async function settle<T>(fn: () => T | Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(error);
  }
}

/**
 * Values of every Ok, or the first Err.
 */
export function all<T, E>(results: Iterable<Result<T, E>>): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (isErr(result)) return result;
    values.push(result.value);
  }
  return ok(values);
}
