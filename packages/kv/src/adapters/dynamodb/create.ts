import { type Clock, SystemClock } from "@tablekv/clock"
import { type Logger, NullLogger } from "@tablekv/logger"
import { createCodecKeyValueStore } from "../../core/codec/create-store"
import { createJsonCodec } from "../../core/codecs/json-codec"
import {
  KvConfigurationError,
  KvConnectionError,
  KvTableNotFoundError,
} from "../../core/errors"
import type { Codec } from "../../ports/codec"
import type { KvTtl } from "../../ports/kv-options"
import type { KeyValueStore } from "../../ports/kv-store"
import { DynamoDbBytesKeyValueStore } from "./dynamodb-bytes-kv-store"
import type { DynamoDbTableClient } from "./table-client"

export const DEFAULT_DESCRIBE_TIMEOUT_MS = 5_000

export type DynamoDbKeyValueStoreOptions<T> = {
  /**
   * Required. Wrap an SDK client with `fromDynamoDbClient`.
   */
  client?: DynamoDbTableClient

  /**
   * Required. The table must exist with a string partition key named `k`.
   */
  tableName: string

  /** @default createJsonCodec() */
  codec?: Codec<T>

  /**
   * Default TTL for writes. Zero or negative disables it.
   */
  ttl?: KvTtl

  clock?: Clock
  logger?: Logger

  /**
   * Deadline for the table check done before the store is returned.
   *
   * @default 5000
   */
  describeTimeoutMs?: number
}

/**
 * Verifies the table exists, then returns a typed store over it.
 *
 * @throws {KvConfigurationError} client or table name missing; nothing is sent.
 * @throws {KvTableNotFoundError} the table does not exist.
 * @throws {KvConnectionError} the check failed for any other reason, timeout included.
 */
export async function createDynamoDbKeyValueStore<T>(
  options: DynamoDbKeyValueStoreOptions<T>,
): Promise<KeyValueStore<T>> {
  const { client, tableName } = options

  if (!client) {
    throw new KvConfigurationError("kv_missing_client", "A DynamoDB client is required")
  }

  if (!tableName) {
    throw new KvConfigurationError("kv_missing_table_name", "A table name is required")
  }

  const logger = options.logger ?? new NullLogger()

  await verifyTable(client, tableName, options.describeTimeoutMs ?? DEFAULT_DESCRIBE_TIMEOUT_MS)

  logger.debug("DynamoDB table verified", { module: "kv", table: tableName })

  const bytesStore = new DynamoDbBytesKeyValueStore(
    { client, clock: options.clock ?? new SystemClock(), logger },
    { tableName, ...(options.ttl && { ttl: options.ttl }) },
  )

  return createCodecKeyValueStore({
    bytesStore,
    codec: options.codec ?? createJsonCodec<T>(),
  })
}

async function verifyTable(
  client: DynamoDbTableClient,
  tableName: string,
  timeoutMs: number,
): Promise<void> {
  try {
    await client.describeTable(
      { TableName: tableName },
      { abortSignal: AbortSignal.timeout(timeoutMs) },
    )
  } catch (error: unknown) {
    if (isResourceNotFound(error)) {
      throw new KvTableNotFoundError(tableName, error)
    }

    throw new KvConnectionError(tableName, error)
  }
}

function isResourceNotFound(error: unknown): boolean {
  return error instanceof Error && error.name === "ResourceNotFoundException"
}
