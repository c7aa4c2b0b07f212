import { type Clock, SystemClock } from "@tablekv/clock"
import { createCodecKeyValueStore } from "../../core/codec/create-store"
import { createJsonCodec } from "../../core/codecs/json-codec"
import type { Codec } from "../../ports/codec"
import type { KeyValueStore } from "../../ports/kv-store"
import { type MemoryKvStoreOptions, MemoryBytesKeyValueStore } from "./memory-bytes-kv-store"

export type MemoryKeyValueStoreOptions<T> = {
  codec?: Codec<T>
  clock?: Clock
  opts?: MemoryKvStoreOptions
}

export function createMemoryKeyValueStore<T>(
  options: MemoryKeyValueStoreOptions<T> = {},
): KeyValueStore<T> {
  const bytesStore = new MemoryBytesKeyValueStore(
    { clock: options.clock ?? new SystemClock() },
    options.opts,
  )

  return createCodecKeyValueStore({
    bytesStore,
    codec: options.codec ?? createJsonCodec<T>(),
  })
}
