import type { Milliseconds, Seconds } from "@tablekv/clock"

type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type SecondsTtl = { kind: "seconds"; seconds: Seconds }

export type KvTtl = MillisecondsTtl | SecondsTtl

export interface KvSetOptions {
  /**
   * TTL for this write, overriding the store default.
   *
   * @remarks
   * A zero, negative or non-finite duration writes the entry without an
   * expiry. Backends that store expiry in whole seconds round it up.
   */
  readonly ttl?: KvTtl
}
