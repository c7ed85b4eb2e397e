/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Extraction and review steps return these instead of throwing, so a
 * batch can report each document's outcome.
 *
 * @example
 * ```typescript
 * const result = await extractDocument(buffer, mimeType)
 *
 * if (!result.ok) {
 *   return { name, error: result.error.toJSON() }
 * }
 *
 * return analyzeDocument(result.value.text)
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Wrap an async operation, mapping anything it throws.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}
