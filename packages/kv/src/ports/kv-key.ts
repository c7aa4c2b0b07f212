/**
 * Key of an entry. Stored as the `k` string attribute in DynamoDB.
 *
 * @remarks
 * Must be a non-empty string. Namespacing ("session:123") is up to the caller.
 */
export type KvKey = string
