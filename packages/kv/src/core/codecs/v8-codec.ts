import v8 from "node:v8"
import type { Codec } from "../../ports/codec"

/**
 * Binary codec on the V8 structured serializer. Values are only readable by
 * Node.js processes.
 */
export function createV8Codec<T>(): Codec<T> {
  return {
    encode: (value: T) => new Uint8Array(v8.serialize(value)),
    decode: (bytes: Uint8Array): T => v8.deserialize(bytes),
  }
}
