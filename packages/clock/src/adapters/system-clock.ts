import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Wall-clock time from the host. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
