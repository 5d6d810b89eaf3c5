// packages/unserial-runtime/result.ts
// Result type for errors-as-values; every consumer returns one.

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** A decoded value together with the offset just past the node it came from. */
export type Consumed<T> = {
  readonly value: T;
  readonly offset: number;
};

/**
 * Result combinator namespace.
 * Lets consumers compose without manual if/else branching.
 */
export const Result = {
  /**
   * Create a successful Result with a value.
   */
  ok<T, E = never>(value: T): Result<T, E> {
    return { ok: true, value };
  },

  /**
   * Create a failed Result with an error.
   */
  err<T = never, E = unknown>(error: E): Result<T, E> {
    return { ok: false, error };
  },

  /**
   * Transform the value inside a successful Result.
   * If the Result is an error, returns the error unchanged.
   */
  map<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    return result.ok ? Result.ok(fn(result.value)) : result;
  },

  /**
   * Chain Result-returning functions together.
   * Short-circuits on the first error.
   */
  andThen<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>,
  ): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },
};
