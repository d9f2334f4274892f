/**
 * @fileoverview Result type for explicit error handling
 *
 * Loader and storage calls return Result<T, E> instead of throwing, so the
 * fail-empty policy is applied in one place (the engine facade).
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Map a Result's error
 */
export function mapError<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> {
  if (!result.ok) {
    return Err(fn(result.error));
  }
  return Ok(result.value);
}

/**
 * Safe JSON parse. The value is untyped; validate it before use.
 */
export function safeJsonParse(json: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(json) as unknown);
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}
