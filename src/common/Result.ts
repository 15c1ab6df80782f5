/**
 * Result type for construction paths that can fail.
 * Lets the caller choose between propagating the error and recovering locally.
 */
export type Result<T, E = Error> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Returns the data of a successful Result, throws the error otherwise.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.data;
}

/**
 * Returns the error of a failed Result.
 * @throws Error if the Result is ok
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Called unwrapErr on a successful Result');
  }
  return result.error;
}
