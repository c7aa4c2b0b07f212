import { BaseError } from "@tablekv/errors"
import type { KvKey } from "../ports/kv-key"

export type KvConfigurationErrorCode = "kv_missing_client" | "kv_missing_table_name"

/**
 * The store was asked to start with options it cannot work with.
 */
export class KvConfigurationError extends BaseError<KvConfigurationErrorCode> {
  constructor(code: KvConfigurationErrorCode, message: string) {
    super(message, { code, isOperational: false })
  }
}

export class KvTableNotFoundError extends BaseError<"kv_table_not_found"> {
  constructor(tableName: string, cause: unknown) {
    super(`Table "${tableName}" does not exist`, {
      code: "kv_table_not_found",
      context: { tableName },
      cause,
    })
  }
}

/**
 * The table could not be described within the startup deadline, or the
 * backend refused the request for another reason.
 */
export class KvConnectionError extends BaseError<"kv_connection_failed"> {
  constructor(tableName: string, cause: unknown) {
    super(`Could not verify table "${tableName}"`, {
      code: "kv_connection_failed",
      context: { tableName },
      isRetryable: true,
      cause,
    })
  }
}

export type KvValidationErrorCode = "kv_invalid_key" | "kv_invalid_value"

export class KvValidationError extends BaseError<KvValidationErrorCode> {
  constructor(code: KvValidationErrorCode, message: string, key?: KvKey) {
    super(message, { code, ...(key !== undefined && { context: { key } }) })
  }
}

export class KvEncodeError extends BaseError<"kv_encode_failed"> {
  constructor(key: KvKey, cause: unknown) {
    super(`Could not encode value for key "${key}"`, {
      code: "kv_encode_failed",
      context: { key },
      cause,
    })
  }
}

/**
 * The entry exists but its bytes could not be decoded.
 */
export class KvDecodeError extends BaseError<"kv_decode_failed"> {
  readonly found = true

  constructor(key: KvKey, cause: unknown) {
    super(`Could not decode value for key "${key}"`, {
      code: "kv_decode_failed",
      context: { key },
      cause,
    })
  }
}

export class KvCapacityError extends BaseError<"kv_capacity_exceeded"> {
  constructor(key: KvKey, maxEntries: number) {
    super(`Store is full (max entries ${maxEntries}), cannot add key "${key}"`, {
      code: "kv_capacity_exceeded",
      context: { key, maxEntries },
    })
  }
}
