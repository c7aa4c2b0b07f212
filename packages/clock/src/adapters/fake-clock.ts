import type { Clock } from "../ports/clock"
import type { Milliseconds, Seconds } from "../ports/time"

/**
 * Manually driven clock for tests. Time only moves when told to.
 */
export class FakeClock implements Clock {
  private currentMs: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.currentMs = toMs(start)
  }

  now(): Date {
    return new Date(this.currentMs)
  }

  nowMs(): Milliseconds {
    return this.currentMs
  }

  advance(ms: Milliseconds): void {
    this.currentMs += ms
  }

  advanceSeconds(seconds: Seconds): void {
    this.advance(seconds * 1000)
  }

  set(at: Milliseconds | Date): void {
    this.currentMs = toMs(at)
  }
}

function toMs(at: Milliseconds | Date): Milliseconds {
  return at instanceof Date ? at.getTime() : at
}
