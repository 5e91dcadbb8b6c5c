/**
 * Result type for fallible operations.
 * Expected failures (bad corpus, provider errors, invalid input) travel as values;
 * only programming errors throw.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Returns the value or throws the error. Used at startup, where a load failure must abort. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error))
}

/** Settle a promise into a Result; a rejection becomes Err via `toError`. */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  toError: (err: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return Ok(await promise)
  } catch (err) {
    return Err(toError(err))
  }
}
