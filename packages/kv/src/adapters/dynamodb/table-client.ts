import {
  DeleteItemCommand,
  type DeleteItemCommandInput,
  type DeleteItemCommandOutput,
  DescribeTableCommand,
  type DescribeTableCommandInput,
  type DescribeTableCommandOutput,
  DynamoDBClient,
  type DynamoDBClientConfig,
  GetItemCommand,
  type GetItemCommandInput,
  type GetItemCommandOutput,
  PutItemCommand,
  type PutItemCommandInput,
  type PutItemCommandOutput,
} from "@aws-sdk/client-dynamodb"

export type DescribeTableOptions = {
  abortSignal: AbortSignal
}

/**
 * The subset of DynamoDB the store talks to.
 *
 * @remarks
 * The store depends on this instead of `DynamoDBClient` so tests and callers
 * with their own transport can supply an implementation.
 */
export interface DynamoDbTableClient {
  putItem(input: PutItemCommandInput): Promise<PutItemCommandOutput>
  getItem(input: GetItemCommandInput): Promise<GetItemCommandOutput>
  deleteItem(input: DeleteItemCommandInput): Promise<DeleteItemCommandOutput>
  describeTable(
    input: DescribeTableCommandInput,
    opts: DescribeTableOptions,
  ): Promise<DescribeTableCommandOutput>
}

/**
 * Adapts an SDK v3 client. The caller keeps ownership of `client` and is
 * responsible for `client.destroy()`.
 */
export function fromDynamoDbClient(client: DynamoDBClient): DynamoDbTableClient {
  return {
    putItem: (input) => client.send(new PutItemCommand(input)),
    getItem: (input) => client.send(new GetItemCommand(input)),
    deleteItem: (input) => client.send(new DeleteItemCommand(input)),
    describeTable: (input, opts) =>
      client.send(new DescribeTableCommand(input), { abortSignal: opts.abortSignal }),
  }
}

export type DynamoDbClientOptions = {
  region?: string

  /**
   * Custom endpoint, e.g. `http://localhost:8000` for DynamoDB Local.
   */
  endpoint?: string

  credentials?: DynamoDBClientConfig["credentials"]
}

/**
 * Builds an SDK client. Anything not given is resolved by the SDK's default
 * provider chain (environment, shared config, instance metadata).
 */
export function createDynamoDbClient(options: DynamoDbClientOptions = {}): DynamoDBClient {
  return new DynamoDBClient({
    ...(options.region && { region: options.region }),
    ...(options.endpoint && { endpoint: options.endpoint }),
    ...(options.credentials && { credentials: options.credentials }),
  })
}
