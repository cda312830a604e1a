import type { Clock } from "./Clock.js";
import type { Duration } from "./Duration.js";

/**
 * Measures time since a reference point on a borrowed clock.
 * Readings are never cached; every call samples the clock.
 */
export class Timer {
  private start: Duration;

  constructor(
    private readonly clock: Clock,
    start?: Duration,
  ) {
    this.start = start ?? clock.now();
  }

  elapsed(): Duration {
    return this.clock.now().minus(this.start);
  }

  /** Moves the reference point back by `by`: later readings grow by `by`. */
  fastForward(by: Duration): void {
    this.start = this.start.minus(by);
  }

  /**
   * Spends `by` of the elapsed time: later readings shrink by `by`.
   * Consuming the whole elapsed reading is a reset that keeps any time
   * that passes between the reading and this call.
   */
  consume(by: Duration): void {
    this.start = this.start.plus(by);
  }

  /** Copy of this timer whose reference point is moved forward by `by`. */
  advanced(by: Duration): Timer {
    return new Timer(this.clock, this.start.plus(by));
  }

  compare(target: Duration): -1 | 0 | 1 {
    return this.elapsed().compare(target);
  }

  /** True once at least `target` has elapsed. */
  reached(target: Duration): boolean {
    return this.elapsed().ge(target);
  }

  /** How far the elapsed time is past `target` (negative if not there yet). */
  beyond(target: Duration): Duration {
    return this.elapsed().minus(target);
  }

  remaining(target: Duration): Duration {
    return target.minus(this.elapsed());
  }

  toString(): string {
    return this.elapsed().toString();
  }
}
