import type { KvKey } from "../ports/kv-key"
import { KvValidationError } from "./errors"

export function assertValidKey(key: unknown): asserts key is KvKey {
  if (typeof key !== "string") {
    throw new KvValidationError("kv_invalid_key", "Key must be a string")
  }

  if (key.length === 0) {
    throw new KvValidationError("kv_invalid_key", "Key must not be empty")
  }
}

export function assertValidValue<T>(key: KvKey, value: T): asserts value is NonNullable<T> {
  if (value === null || value === undefined) {
    throw new KvValidationError(
      "kv_invalid_value",
      `Value for key "${key}" must not be null or undefined`,
      key,
    )
  }
}
