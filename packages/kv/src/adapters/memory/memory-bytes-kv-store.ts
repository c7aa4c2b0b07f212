import type { Clock, Milliseconds } from "@tablekv/clock"
import { KvCapacityError } from "../../core/errors"
import { resolveTtlMs } from "../../core/ttl"
import { assertValidKey } from "../../core/validation"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"

export type MemoryKvStoreOptions = {
  /** Adding a key past this count throws `KvCapacityError`. Overwrites always succeed. */
  maxEntries?: number

  /** Used by writes that carry no TTL of their own. */
  ttl?: KvTtl
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

type StoredItem = {
  bytes: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * In-process bytes store that mirrors the DynamoDB adapter: a write replaces
 * the whole item, so a write without TTL drops any earlier expiry. Values are
 * copied on the way in and out.
 */
export class MemoryBytesKeyValueStore implements BytesKeyValueStore {
  private readonly items = new Map<KvKey, StoredItem>()

  public constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    assertValidKey(key)

    const item = this.live(key)

    return item ? { kind: "found", value: item.bytes.slice() } : { kind: "not_found" }
  }

  async set(key: KvKey, value: Uint8Array, opts?: KvSetOptions): Promise<void> {
    assertValidKey(key)

    if (!this.live(key)) this.reserveSlot(key)

    const ttlMs = resolveTtlMs(opts?.ttl, this.opts.ttl)
    const expiresAtMs = ttlMs === undefined ? undefined : this.deps.clock.nowMs() + ttlMs

    this.items.set(key, {
      bytes: value.slice(),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  async delete(key: KvKey): Promise<void> {
    assertValidKey(key)

    this.items.delete(key)
  }

  async close(): Promise<void> {
    this.items.clear()
  }

  /** Returns the item when present and unexpired, evicting it otherwise. */
  private live(key: KvKey): StoredItem | undefined {
    const item = this.items.get(key)

    if (item && this.hasExpired(item, this.deps.clock.nowMs())) {
      this.items.delete(key)
      return undefined
    }

    return item
  }

  private reserveSlot(key: KvKey): void {
    const { maxEntries } = this.opts

    if (maxEntries === undefined || this.items.size < maxEntries) return

    const now = this.deps.clock.nowMs()

    for (const [k, item] of this.items) {
      if (this.hasExpired(item, now)) this.items.delete(k)
    }

    if (this.items.size >= maxEntries) throw new KvCapacityError(key, maxEntries)
  }

  private hasExpired(item: StoredItem, now: Milliseconds): boolean {
    return item.expiresAtMs !== undefined && now >= item.expiresAtMs
  }
}
