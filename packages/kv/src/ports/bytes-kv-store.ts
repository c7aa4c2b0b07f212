import type { KeyValueStore } from "./kv-store"

/**
 * What backend adapters implement. Values are opaque bytes produced by a codec.
 */
export type BytesKeyValueStore = KeyValueStore<Uint8Array>
