import type { Clock } from "./Clock.js";
import { Duration } from "./Duration.js";

/**
 * Simulated clock for tests and deterministic replays.
 * Time only moves when advance() or set() is called. The reading is kept in
 * integer nanoseconds so many small steps add up without float drift.
 */
export class ManualClock implements Clock {
  private nanos: bigint;

  constructor(initial: Duration = Duration.ZERO) {
    this.nanos = initial.toNanos();
  }

  now(): Duration {
    return Duration.fromNanos(this.nanos);
  }

  advance(by: Duration): void {
    this.nanos += by.toNanos();
  }

  set(at: Duration): void {
    this.nanos = at.toNanos();
  }
}
