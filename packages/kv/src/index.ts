export {
  createDynamoDbKeyValueStoreFromConfig,
  type DynamoDbKvConfig,
  type DynamoDbKvEnv,
  type DynamoDbKvFromConfigDeps,
  dynamoDbKvEnvSchema,
  loadDynamoDbKvConfig,
  mapEnvToDynamoDbKvConfig,
} from "./adapters/dynamodb/config"
export {
  createDynamoDbKeyValueStore,
  DEFAULT_DESCRIBE_TIMEOUT_MS,
  type DynamoDbKeyValueStoreOptions,
} from "./adapters/dynamodb/create"
export {
  DynamoDbBytesKeyValueStore,
  type DynamoDbKvStoreDeps,
  type DynamoDbKvStoreOptions,
  KEY_ATTRIBUTE,
  TTL_ATTRIBUTE,
  VALUE_ATTRIBUTE,
} from "./adapters/dynamodb/dynamodb-bytes-kv-store"
export {
  createDynamoDbClient,
  type DescribeTableOptions,
  type DynamoDbClientOptions,
  type DynamoDbTableClient,
  fromDynamoDbClient,
} from "./adapters/dynamodb/table-client"
export { createMemoryKeyValueStore, type MemoryKeyValueStoreOptions } from "./adapters/memory/create"
export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreDeps,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export { CodecKeyValueStore, type CodecKeyValueStoreDeps } from "./core/codec/codec-kv-store"
export { createCodecKeyValueStore } from "./core/codec/create-store"
export { createJsonCodec } from "./core/codecs/json-codec"
export { type CodecName, codecNames, resolveCodec } from "./core/codecs/resolve-codec"
export { createV8Codec } from "./core/codecs/v8-codec"
export {
  KvCapacityError,
  KvConfigurationError,
  type KvConfigurationErrorCode,
  KvConnectionError,
  KvDecodeError,
  KvEncodeError,
  KvTableNotFoundError,
  KvValidationError,
  type KvValidationErrorCode,
} from "./core/errors"
export { assertValidKey, assertValidValue } from "./core/validation"
export type { BytesKeyValueStore } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { KvKey } from "./ports/kv-key"
export type { KvSetOptions, KvTtl } from "./ports/kv-options"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
