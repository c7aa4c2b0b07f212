/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs sit at the boundary between typed store usage (`KeyValueStore<T>`) and
 * byte-oriented adapters (DynamoDB, memory). Adapters treat codec output as
 * opaque bytes and never import codecs themselves.
 *
 * Either method may throw. `CodecKeyValueStore` reports encode failures as
 * `KvEncodeError` and decode failures as `KvDecodeError`.
 *
 * @example
 * A codec for a domain type with a `Date` field:
 * ```ts
 * const sessionCodec: Codec<Session> = {
 *   encode: (s) => new TextEncoder().encode(JSON.stringify(s)),
 *   decode: (b) => {
 *     const raw = JSON.parse(new TextDecoder().decode(b))
 *     return { ...raw, expiresAt: new Date(raw.expiresAt) }
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
