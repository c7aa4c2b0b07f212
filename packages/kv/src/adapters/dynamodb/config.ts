import { type Clock, type Milliseconds, type Seconds, SystemClock } from "@tablekv/clock"
import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@tablekv/config"
import { createPinoLogger, type LogLevelName, type Logger, logLevelNames } from "@tablekv/logger"
import { z } from "zod"
import { type CodecName, codecNames, resolveCodec } from "../../core/codecs/resolve-codec"
import type { Codec } from "../../ports/codec"
import type { KvTtl } from "../../ports/kv-options"
import type { KeyValueStore } from "../../ports/kv-store"
import { createDynamoDbKeyValueStore, DEFAULT_DESCRIBE_TIMEOUT_MS } from "./create"
import {
  createDynamoDbClient,
  type DynamoDbTableClient,
  fromDynamoDbClient,
} from "./table-client"

export const dynamoDbKvEnvSchema = z.object({
  KV_DYNAMODB_TABLE: z.string().min(1),
  KV_DYNAMODB_REGION: z.string().min(1).optional(),
  KV_DYNAMODB_ENDPOINT: z.url().optional(),

  KV_TTL_SECONDS: z.coerce.number().int().nonnegative().default(0),
  KV_CODEC: z.enum(codecNames).default("json"),
  KV_DESCRIBE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DESCRIBE_TIMEOUT_MS),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type DynamoDbKvEnv = z.infer<typeof dynamoDbKvEnvSchema>

export type DynamoDbKvConfig = {
  dynamodb: {
    tableName: string
    region?: string
    endpoint?: string
    describeTimeoutMs: Milliseconds
  }
  kv: {
    ttlSeconds: Seconds
    codec: CodecName
  }
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

export function mapEnvToDynamoDbKvConfig(env: DynamoDbKvEnv): DynamoDbKvConfig {
  return {
    dynamodb: {
      tableName: env.KV_DYNAMODB_TABLE,
      describeTimeoutMs: env.KV_DESCRIBE_TIMEOUT_MS,
      ...(env.KV_DYNAMODB_REGION !== undefined && { region: env.KV_DYNAMODB_REGION }),
      ...(env.KV_DYNAMODB_ENDPOINT !== undefined && { endpoint: env.KV_DYNAMODB_ENDPOINT }),
    },
    kv: {
      ttlSeconds: env.KV_TTL_SECONDS,
      codec: env.KV_CODEC,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Reads `.env` in `cwd` when present, then `env`, which wins.
 */
export async function loadDynamoDbKvConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<DynamoDbKvConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: dynamoDbKvEnvSchema, sources })

  return mapEnvToDynamoDbKvConfig(result.value)
}

export type DynamoDbKvFromConfigDeps<T> = {
  client?: DynamoDbTableClient
  codec?: Codec<T>
  clock?: Clock
  logger?: Logger
}

/**
 * Wires a store from loaded config. Deps given here replace the ones the
 * config would build.
 */
export async function createDynamoDbKeyValueStoreFromConfig<T>(
  config: DynamoDbKvConfig,
  deps: DynamoDbKvFromConfigDeps<T> = {},
): Promise<KeyValueStore<T>> {
  const client =
    deps.client ??
    fromDynamoDbClient(
      createDynamoDbClient({
        ...(config.dynamodb.region && { region: config.dynamodb.region }),
        ...(config.dynamodb.endpoint && { endpoint: config.dynamodb.endpoint }),
      }),
    )

  const logger =
    deps.logger ??
    createPinoLogger({}, { level: config.logging.level, prettify: config.logging.prettify })

  const ttl: KvTtl | undefined =
    config.kv.ttlSeconds > 0 ? { kind: "seconds", seconds: config.kv.ttlSeconds } : undefined

  return createDynamoDbKeyValueStore<T>({
    client,
    tableName: config.dynamodb.tableName,
    codec: deps.codec ?? resolveCodec<T>(config.kv.codec),
    clock: deps.clock ?? new SystemClock(),
    logger,
    describeTimeoutMs: config.dynamodb.describeTimeoutMs,
    ...(ttl && { ttl }),
  })
}
