/**
 * Result type for outcomes the caller is expected to fold rather than throw.
 *
 * Usage:
 *   - Steps that can fail without aborting the run return Result<T, E>
 *   - Use Result.ok(value) for success, Result.err(error) for failure
 *   - Check result.ok before accessing result.value
 *
 * @example
 * const search = Result.wrapAsync(fetchCombination);
 * const result = await search(client, query);
 * if (!result.ok) console.error(result.error.message);
 */

export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Result = {
  ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
  },

  err<E = string>(error: E): Result<never, E> {
    return { ok: false, error };
  },

  /**
   * Wrap an async function that may throw into one that resolves to a Result.
   * The thrown value is kept as an Error so callers can still branch on its class.
   */
  wrapAsync<T, Args extends unknown[]>(
    fn: (...args: Args) => Promise<T>
  ): (...args: Args) => Promise<Result<T, Error>> {
    return async (...args: Args) => {
      try {
        return Result.ok(await fn(...args));
      } catch (e) {
        return Result.err(toError(e));
      }
    };
  },
};

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
