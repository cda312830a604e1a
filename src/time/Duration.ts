/** Integer `[seconds, nanoseconds]` pair, the shape `process.hrtime()` returns. */
export type HrTime = readonly [seconds: number, nanoseconds: number];

const NANOS_PER_SECOND = 1e9;

/**
 * Signed span of time in seconds, stored as a float64.
 *
 * Durations add and subtract with other Durations and scale by plain numbers.
 * There is no Duration + number and no Duration × Duration. Comparisons are
 * exact; callers that need a tolerance bring their own epsilon.
 * Negative values are valid and mean time owed or time remaining.
 */
export class Duration {
  static readonly ZERO = new Duration(0);
  static readonly NANO = new Duration(1e-9);
  static readonly MICRO = new Duration(1e-6);
  static readonly MILLI = new Duration(1e-3);
  static readonly SECOND = new Duration(1);
  static readonly KILO = new Duration(1e3);
  static readonly MINUTE = new Duration(60);
  static readonly HOUR = new Duration(60 * 60);
  static readonly MEGA = new Duration(1e6);
  static readonly DAY = new Duration(24 * 60 * 60);
  static readonly GIGA = new Duration(1e9);

  private constructor(readonly seconds: number) {}

  static fromSeconds(seconds: number): Duration {
    return new Duration(seconds);
  }

  static fromMillis(ms: number): Duration {
    return new Duration(ms / 1000);
  }

  static fromNanos(nanos: bigint): Duration {
    return new Duration(Number(nanos) / NANOS_PER_SECOND);
  }

  static fromHrtime([seconds, nanoseconds]: HrTime): Duration {
    return new Duration(seconds + nanoseconds / NANOS_PER_SECOND);
  }

  /** Reads `"1.5"` or `"1.5 s"`. Returns undefined for anything else. */
  static parse(text: string): Duration | undefined {
    const match = /^\s*(\S+?)\s*s?\s*$/.exec(text);
    const raw = match?.[1];
    if (raw === undefined || raw === "") return undefined;
    const seconds = Number(raw);
    if (Number.isNaN(seconds)) return undefined;
    return new Duration(seconds);
  }

  get millis(): number {
    return this.seconds * 1000;
  }

  /**
   * Splits into whole seconds (floored) and a nanosecond remainder in
   * [0, 1e9). Negative spans therefore carry a negative seconds part.
   */
  toHrtime(): [seconds: number, nanoseconds: number] {
    let whole = Math.floor(this.seconds);
    let nanos = Math.round((this.seconds - whole) * NANOS_PER_SECOND);
    if (nanos >= NANOS_PER_SECOND) {
      whole += 1;
      nanos -= NANOS_PER_SECOND;
    }
    return [whole, nanos];
  }

  toNanos(): bigint {
    const [whole, nanos] = this.toHrtime();
    return BigInt(whole) * BigInt(NANOS_PER_SECOND) + BigInt(nanos);
  }

  plus(other: Duration): Duration {
    return new Duration(this.seconds + other.seconds);
  }

  minus(other: Duration): Duration {
    return new Duration(this.seconds - other.seconds);
  }

  times(factor: number): Duration {
    return new Duration(this.seconds * factor);
  }

  div(divisor: number): Duration {
    return new Duration(this.seconds / divisor);
  }

  negate(): Duration {
    return new Duration(-this.seconds);
  }

  /** Dimensionless quotient `this / other`. */
  ratio(other: Duration): number {
    return this.seconds / other.seconds;
  }

  compare(other: Duration): -1 | 0 | 1 {
    if (this.seconds < other.seconds) return -1;
    if (this.seconds > other.seconds) return 1;
    return 0;
  }

  equals(other: Duration): boolean {
    return this.seconds === other.seconds;
  }

  lt(other: Duration): boolean {
    return this.seconds < other.seconds;
  }

  le(other: Duration): boolean {
    return this.seconds <= other.seconds;
  }

  gt(other: Duration): boolean {
    return this.seconds > other.seconds;
  }

  ge(other: Duration): boolean {
    return this.seconds >= other.seconds;
  }

  toString(): string {
    return `${this.seconds} s`;
  }
}
