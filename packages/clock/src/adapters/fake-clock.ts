import type { TimeSource } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Manually driven time source, for records with fixed timestamps. */
export class FakeClock implements TimeSource {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }
}
