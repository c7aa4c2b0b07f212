import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { Codec } from "../../ports/codec"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"
import { KvDecodeError, KvEncodeError } from "../errors"
import { assertValidKey, assertValidValue } from "../validation"

export type CodecKeyValueStoreDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStore
}

/**
 * Typed store over a bytes store. Validates input, applies the codec and
 * leaves storage errors from the bytes store untouched.
 */
export class CodecKeyValueStore<T> implements KeyValueStore<T> {
  public constructor(private readonly deps: CodecKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    assertValidKey(key)

    const res = await this.deps.bytesStore.get(key)

    if (res.kind === "not_found") {
      return { kind: "not_found" }
    }

    return { kind: "found", value: this.decode(key, res.value) }
  }

  async set(key: KvKey, value: T, opts?: KvSetOptions): Promise<void> {
    assertValidKey(key)
    assertValidValue(key, value)

    await this.deps.bytesStore.set(key, this.encode(key, value), opts)
  }

  async delete(key: KvKey): Promise<void> {
    assertValidKey(key)

    await this.deps.bytesStore.delete(key)
  }

  async close(): Promise<void> {
    await this.deps.bytesStore.close()
  }

  private encode(key: KvKey, value: T): Uint8Array {
    try {
      return this.deps.codec.encode(value)
    } catch (err) {
      throw new KvEncodeError(key, err)
    }
  }

  private decode(key: KvKey, bytes: Uint8Array): T {
    try {
      return this.deps.codec.decode(bytes)
    } catch (err) {
      throw new KvDecodeError(key, err)
    }
  }
}
