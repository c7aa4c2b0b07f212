import type { AppError } from "../../ports/error"

const isObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null

/**
 * Structural check for {@link AppError}, so errors from another copy of this
 * package (or plain objects shaped like one) are recognised too.
 *
 * @example
 * ```ts
 * try {
 *   await store.set(key, value)
 * } catch (err) {
 *   if (isAppError(err) && err.isRetryable) return retryLater(err)
 *   throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isObject(e)) return false

  const { name, message, code, context, isRetryable, isOperational, timestamp } = e

  return (
    typeof name === "string" &&
    typeof message === "string" &&
    typeof code === "string" &&
    isObject(context) &&
    typeof isRetryable === "boolean" &&
    typeof isOperational === "boolean" &&
    timestamp instanceof Date &&
    !Number.isNaN(timestamp.getTime())
  )
}
