/**
 * Result Type
 *
 * Discriminated union for operations that can fail in an expected way.
 * Expected failures travel as values; exceptions are reserved for bugs.
 *
 * @module @shellmark/shared/types/result
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Create a successful result.
 */
export function Ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed result.
 */
export function Err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Transform the error of a failed result, passing values through.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : Err(fn(result.error));
}

/**
 * Chain an operation that itself returns a Result.
 */
export function flatMap<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Run a throwing function and capture its outcome as a Result.
 *
 * @example
 * ```typescript
 * const content = tryCatch(() => fs.readFileSync(file, "utf-8"));
 * if (!content.ok) {
 *   logger.debug(content.error.message);
 * }
 * ```
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}
