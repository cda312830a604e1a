import { Duration } from "../time/Duration.js";

/** Anything that accepts measured durations. */
export interface DurationRecorder {
  record(elapsed: Duration): void;
}

/** Read-only face of a Stat. */
export interface StatView {
  getCount(): number;
  getRate(): number;
  getCycle(): number;
  getTotal(): Duration;
  findAverage(): Duration;
}

/**
 * Running timing statistics for one repeated piece of work.
 *
 * Cycles end with refresh(): the number of samples recorded since the
 * previous refresh becomes the rate. Refreshing once per second turns the
 * rate into a per-second counter (ticks per second, frames per second).
 */
export class Stat implements DurationRecorder, StatView {
  private total = Duration.ZERO;
  private count = 0;
  private cycle = 0;
  private rate = 0;

  record(elapsed: Duration): void {
    this.total = this.total.plus(elapsed);
    this.count++;
    this.cycle++;
  }

  refresh(): void {
    this.rate = this.cycle;
    this.cycle = 0;
  }

  /** Samples recorded over the whole lifetime. */
  getCount(): number {
    return this.count;
  }

  /** Samples recorded in the cycle that the last refresh() closed. */
  getRate(): number {
    return this.rate;
  }

  /** Samples recorded since the last refresh(). */
  getCycle(): number {
    return this.cycle;
  }

  getTotal(): Duration {
    return this.total;
  }

  findAverage(): Duration {
    if (this.count === 0) return Duration.ZERO;
    return this.total.div(this.count);
  }
}
