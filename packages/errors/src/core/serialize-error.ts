import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Converts anything that was thrown into a JSON-safe {@link SerializedError}.
 *
 * App errors keep their code, context and flags. Other errors (AWS SDK
 * service exceptions, `AbortError`, ...) are reported with code "unknown".
 * A thrown non-error becomes a `NonErrorThrown` entry.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: typeof err === "string" ? {} : { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const app = isAppError(err) ? err : undefined

  return {
    name: err.name,
    code: app?.code ?? "unknown",
    message: err.message,
    context: { ...app?.context },
    isRetryable: app?.isRetryable ?? false,
    isOperational: app?.isOperational ?? false,
    timestamp: (app?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}
