/** Machine-readable error code, snake_case by convention (e.g. "kv_invalid_key"). */
export type ErrorCode = Lowercase<string>

/** Structured details attached to an error, such as the table or key involved. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Set when the same call may succeed if repeated (e.g. a network failure). */
  readonly isRetryable: boolean

  /**
   * False for failures that point at a bug or a misconfigured deployment
   * rather than at the environment.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /** Whatever was caught, unchanged. */
  readonly cause?: unknown
}

/** Output of `serializeError`. Safe to pass to `JSON.stringify`. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
