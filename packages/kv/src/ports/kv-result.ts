export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a get. `not_found` is a normal outcome, never an error.
 */
export type KvResult<T> = KvFound<T> | KvNotFound
