import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStore } from "../../ports/kv-store"
import { CodecKeyValueStore } from "./codec-kv-store"

export function createCodecKeyValueStore<T>(deps: {
  bytesStore: BytesKeyValueStore
  codec: Codec<T>
}): KeyValueStore<T> {
  return new CodecKeyValueStore<T>(deps)
}
