import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import { type Clock, toEpochSeconds } from "@tablekv/clock"
import type { Logger } from "@tablekv/logger"
import { resolveTtlMs } from "../../core/ttl"
import { assertValidKey } from "../../core/validation"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { DynamoDbTableClient } from "./table-client"

/** Partition key attribute, type S. */
export const KEY_ATTRIBUTE = "k"
/** Encoded value attribute, type B. */
export const VALUE_ATTRIBUTE = "v"
/** Expiry attribute in epoch seconds, type N. */
export const TTL_ATTRIBUTE = "ttl"

export type DynamoDbKvStoreDeps = {
  client: DynamoDbTableClient
  clock: Clock
  logger: Logger
}

export type DynamoDbKvStoreOptions = {
  tableName: string

  /**
   * Default TTL for writes. Enable TTL on the table with `ttl` as the
   * attribute name for DynamoDB to remove expired items.
   */
  ttl?: KvTtl
}

export class DynamoDbBytesKeyValueStore implements BytesKeyValueStore {
  private readonly logger: Logger

  public constructor(
    private readonly deps: DynamoDbKvStoreDeps,
    private readonly opts: DynamoDbKvStoreOptions,
  ) {
    this.logger = deps.logger.child({ module: "kv", table: opts.tableName })
  }

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    assertValidKey(key)

    const res = await this.deps.client.getItem({
      TableName: this.opts.tableName,
      Key: this.keyOf(key),
    })

    if (!res.Item) {
      return { kind: "not_found" }
    }

    const value = res.Item[VALUE_ATTRIBUTE]?.B

    if (!value) {
      this.logger.debug("Item has no binary value attribute", { key })
      return { kind: "not_found" }
    }

    return { kind: "found", value }
  }

  async set(key: KvKey, value: Uint8Array, opts?: KvSetOptions): Promise<void> {
    assertValidKey(key)

    const item: Record<string, AttributeValue> = {
      ...this.keyOf(key),
      [VALUE_ATTRIBUTE]: { B: value },
    }

    const ttlMs = resolveTtlMs(opts?.ttl, this.opts.ttl)

    if (ttlMs !== undefined) {
      item[TTL_ATTRIBUTE] = { N: String(toEpochSeconds(this.deps.clock.nowMs() + ttlMs)) }
    }

    await this.deps.client.putItem({ TableName: this.opts.tableName, Item: item })
  }

  async delete(key: KvKey): Promise<void> {
    assertValidKey(key)

    await this.deps.client.deleteItem({
      TableName: this.opts.tableName,
      Key: this.keyOf(key),
    })
  }

  async close(): Promise<void> {}

  private keyOf(key: KvKey): Record<string, AttributeValue> {
    return { [KEY_ATTRIBUTE]: { S: key } }
  }
}
