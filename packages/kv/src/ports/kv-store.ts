import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvResult } from "./kv-result"

/**
 * KeyValueStore represents persistent, authoritative key-value storage.
 *
 * @remarks
 * - Data stored here is the source of truth; successful writes persist.
 * - Every operation is a single round-trip to the backend. There is no
 *   caching, batching or retrying beyond what the backend client does.
 * - Implementations hold no mutable per-call state and are safe to share.
 */
export interface KeyValueStore<T> {
  /**
   * Retrieve a value by key.
   *
   * @remarks
   * Rejects with `KvValidationError` for an empty key (no backend call) and
   * with `KvDecodeError` when a stored value cannot be decoded.
   */
  get(key: KvKey): Promise<KvResult<T>>

  /**
   * Store a value, replacing any previous entry for the key entirely.
   *
   * @remarks
   * Rejects with `KvValidationError` for an empty key or a null/undefined
   * value, and with `KvEncodeError` when the value cannot be encoded. Nothing
   * is written in either case.
   */
  set(key: KvKey, value: T, opts?: KvSetOptions): Promise<void>

  /**
   * Delete a value. Deleting a key that does not exist succeeds.
   */
  delete(key: KvKey): Promise<void>

  /**
   * Release resources owned by the store. The caller owns the backend client.
   */
  close(): Promise<void>
}
