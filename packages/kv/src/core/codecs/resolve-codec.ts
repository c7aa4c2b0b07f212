import type { Codec } from "../../ports/codec"
import { createJsonCodec } from "./json-codec"
import { createV8Codec } from "./v8-codec"

export const codecNames = ["json", "v8"] as const

export type CodecName = (typeof codecNames)[number]

export function resolveCodec<T>(name: CodecName): Codec<T> {
  switch (name) {
    case "json":
      return createJsonCodec<T>()
    case "v8":
      return createV8Codec<T>()
  }
}
