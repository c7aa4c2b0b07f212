export type Milliseconds = number

export type Seconds = number

/**
 * Converts a millisecond timestamp into whole seconds since the Unix epoch.
 *
 * @remarks
 * Fractional seconds round up, so an expiry written in seconds (e.g. a
 * DynamoDB TTL attribute) never falls before the instant it was computed from.
 */
export function toEpochSeconds(ms: Milliseconds): Seconds {
  return Math.ceil(ms / 1000)
}
