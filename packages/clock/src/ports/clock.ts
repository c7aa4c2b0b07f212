import type { Milliseconds } from "./time"

/**
 * Clock is the only source of "now" for code that computes expiries.
 *
 * @remarks
 * Inject a `FakeClock` in tests to make TTL arithmetic deterministic.
 */
export interface Clock {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}
