import { Duration } from "./Duration.js";

/**
 * Source of monotonic time. `now()` is measured from an arbitrary fixed epoch
 * and must never decrease within a process run. Nothing checks this; a clock
 * that goes backwards shows up as negative elapsed readings.
 */
export interface Clock {
  now(): Duration;
}

/** Clock backed by `process.hrtime.bigint()`, with its epoch at construction. */
export class MonotonicClock implements Clock {
  private readonly origin = process.hrtime.bigint();

  now(): Duration {
    return Duration.fromNanos(process.hrtime.bigint() - this.origin);
  }
}
