import type { Milliseconds } from "@tablekv/clock"
import type { KvTtl } from "../ports/kv-options"

export function ttlToMilliseconds(ttl: KvTtl): Milliseconds {
  switch (ttl.kind) {
    case "milliseconds":
      return ttl.milliseconds
    case "seconds":
      return ttl.seconds * 1000
  }
}

/**
 * Picks the per-call TTL over the default. Durations that are not a finite
 * positive number of milliseconds resolve to no TTL.
 */
export function resolveTtlMs(
  override: KvTtl | undefined,
  fallback: KvTtl | undefined,
): Milliseconds | undefined {
  const ttl = override ?? fallback
  if (!ttl) return undefined

  const ms = ttlToMilliseconds(ttl)

  return Number.isFinite(ms) && ms > 0 ? ms : undefined
}
