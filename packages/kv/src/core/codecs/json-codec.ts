import superjson from "superjson"
import type { Codec } from "../../ports/codec"

type SuperJsonPayload = Parameters<typeof superjson.deserialize>[0]

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

function isSuperJsonPayload(value: unknown): value is SuperJsonPayload {
  if (typeof value !== "object" || value === null || !("json" in value)) return false

  const meta: unknown = "meta" in value ? value.meta : undefined

  return meta === undefined || (typeof meta === "object" && meta !== null)
}

/**
 * UTF-8 JSON via superjson, so `Date`, `Map`, `Set`, `BigInt` and `undefined`
 * survive a round-trip. This is the default codec.
 *
 * Decoding expects the `{ json, meta? }` envelope that `encode` writes; plain
 * JSON written by another client is rejected.
 */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (bytes: Uint8Array) => {
      const parsed: unknown = JSON.parse(decoder.decode(bytes))

      if (!isSuperJsonPayload(parsed)) {
        throw new TypeError("Value is not a superjson payload")
      }

      return superjson.deserialize<T>(parsed)
    },
  }
}
