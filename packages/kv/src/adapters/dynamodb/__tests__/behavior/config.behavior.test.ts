import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import v8 from "node:v8"
import { FakeClock } from "@tablekv/clock"
import { ConfigValidationError } from "@tablekv/config"
import { NullLogger } from "@tablekv/logger"
import { FakeDynamoDbTableClient } from "../../../../tests/utils/fake-dynamodb-table-client"
import { TEST_TABLE } from "../../../../tests/utils/kv-test-helpers"
import {
  createDynamoDbKeyValueStoreFromConfig,
  type DynamoDbKvConfig,
  loadDynamoDbKvConfig,
} from "../../config"

describe("loadDynamoDbKvConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "kv-env-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("applies defaults when only the table is set", async () => {
    const config = await loadDynamoDbKvConfig({ KV_DYNAMODB_TABLE: "sessions" }, cwd)

    expect(config).toStrictEqual({
      dynamodb: { tableName: "sessions", describeTimeoutMs: 5000 },
      kv: { ttlSeconds: 0, codec: "json" },
      logging: { level: "info", prettify: false },
    })
  })

  it("maps every variable", async () => {
    const config = await loadDynamoDbKvConfig(
      {
        KV_DYNAMODB_TABLE: "sessions",
        KV_DYNAMODB_REGION: "eu-west-1",
        KV_DYNAMODB_ENDPOINT: "http://localhost:8000",
        KV_TTL_SECONDS: "3600",
        KV_CODEC: "v8",
        KV_DESCRIBE_TIMEOUT_MS: "2500",
        LOG_LEVEL: "debug",
        LOG_PRETTY: "true",
      },
      cwd,
    )

    expect(config).toStrictEqual({
      dynamodb: {
        tableName: "sessions",
        region: "eu-west-1",
        endpoint: "http://localhost:8000",
        describeTimeoutMs: 2500,
      },
      kv: { ttlSeconds: 3600, codec: "v8" },
      logging: { level: "debug", prettify: true },
    })
  })

  it("reads .env from cwd and lets the environment override it", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "KV_DYNAMODB_TABLE=from-file\nKV_TTL_SECONDS=60\n",
    )

    const config = await loadDynamoDbKvConfig({ KV_DYNAMODB_TABLE: "from-env" }, cwd)

    expect(config.dynamodb.tableName).toBe("from-env")
    expect(config.kv.ttlSeconds).toBe(60)
  })

  it("parses LOG_PRETTY=false as false", async () => {
    const config = await loadDynamoDbKvConfig(
      { KV_DYNAMODB_TABLE: "sessions", LOG_PRETTY: "false" },
      cwd,
    )

    expect(config.logging.prettify).toBe(false)
  })

  it("rejects when the table is missing", async () => {
    await expect(loadDynamoDbKvConfig({}, cwd)).rejects.toBeInstanceOf(ConfigValidationError)
  })

  it.each([
    ["KV_CODEC", "yaml"],
    ["KV_TTL_SECONDS", "-1"],
    ["KV_DESCRIBE_TIMEOUT_MS", "0"],
    ["KV_DYNAMODB_ENDPOINT", "not a url"],
  ])("rejects an invalid %s", async (name, value) => {
    const load = loadDynamoDbKvConfig({ KV_DYNAMODB_TABLE: "sessions", [name]: value }, cwd)

    await expect(load).rejects.toMatchObject({ code: "config_invalid" })
  })
})

describe("createDynamoDbKeyValueStoreFromConfig", () => {
  const config: DynamoDbKvConfig = {
    dynamodb: { tableName: TEST_TABLE, describeTimeoutMs: 5000 },
    kv: { ttlSeconds: 0, codec: "json" },
    logging: { level: "info", prettify: false },
  }

  it("builds a working store over the given client", async () => {
    const client = new FakeDynamoDbTableClient()
    const store = await createDynamoDbKeyValueStoreFromConfig<string>(config, {
      client,
      logger: new NullLogger(),
    })

    await store.set("a", "x")

    expect(await store.get("a")).toStrictEqual({ kind: "found", value: "x" })
    expect(client.rawItem("a")).not.toHaveProperty("ttl")
  })

  it("applies ttlSeconds as the default TTL", async () => {
    const client = new FakeDynamoDbTableClient()
    const store = await createDynamoDbKeyValueStoreFromConfig<string>(
      { ...config, kv: { ttlSeconds: 10, codec: "json" } },
      { client, clock: new FakeClock(0), logger: new NullLogger() },
    )

    await store.set("a", "x")

    expect(client.rawItem("a")?.ttl).toStrictEqual({ N: "10" })
  })

  it("encodes with the configured codec", async () => {
    const client = new FakeDynamoDbTableClient()
    const store = await createDynamoDbKeyValueStoreFromConfig<Map<string, number>>(
      { ...config, kv: { ttlSeconds: 0, codec: "v8" } },
      { client, logger: new NullLogger() },
    )

    await store.set("counts", new Map([["a", 1]]))

    const raw = client.rawItem("counts")?.v?.B

    expect(raw).toBeDefined()
    if (!raw) return

    expect(v8.deserialize(raw)).toStrictEqual(new Map([["a", 1]]))
  })

  it("rejects when the configured table does not exist", async () => {
    await expect(
      createDynamoDbKeyValueStoreFromConfig(
        { ...config, dynamodb: { tableName: "missing", describeTimeoutMs: 5000 } },
        { client: new FakeDynamoDbTableClient(), logger: new NullLogger() },
      ),
    ).rejects.toMatchObject({ code: "kv_table_not_found" })
  })
})
