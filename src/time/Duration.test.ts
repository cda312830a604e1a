import { describe, expect, it } from "vitest";
import { Duration } from "./Duration.js";

describe("Duration", () => {
  it("constructs from seconds, millis and nanos", () => {
    expect(Duration.fromSeconds(123.456).seconds).toBe(123.456);
    expect(Duration.fromMillis(250).seconds).toBe(0.25);
    expect(Duration.fromNanos(2_500_000_000n).seconds).toBe(2.5);
    expect(Duration.fromSeconds(0.25).millis).toBe(250);
  });

  it("has pre-scaled constants", () => {
    expect(Duration.MINUTE.seconds).toBe(60);
    expect(Duration.HOUR.seconds).toBe(3600);
    expect(Duration.DAY.seconds).toBe(86400);
    expect(Duration.MINUTE.times(60).equals(Duration.HOUR)).toBe(true);
    expect(Duration.MILLI.times(1000).seconds).toBeCloseTo(1, 12);
    expect(Duration.MICRO.seconds).toBe(1e-6);
    expect(Duration.ZERO.seconds).toBe(0);
  });

  it("adds and subtracts durations", () => {
    const a = Duration.fromSeconds(5);
    const b = Duration.fromSeconds(0.75);
    expect(a.plus(b).seconds).toBe(5.75);
    expect(a.minus(b).seconds).toBe(4.25);
    expect(b.minus(a).seconds).toBe(-4.25);
  });

  it("undoes an addition by subtracting the same span", () => {
    const samples = [0.1, 0.2, 1e-6, 3600.5, -2.25, 17.017];
    for (const x of samples) {
      for (const y of samples) {
        const a = Duration.fromSeconds(x);
        const b = Duration.fromSeconds(y);
        expect(a.plus(b).minus(b).seconds).toBeCloseTo(a.seconds, 9);
      }
    }
  });

  it("scales by a dimensionless factor", () => {
    const a = Duration.fromSeconds(3.7);
    expect(a.times(0).equals(Duration.ZERO)).toBe(true);
    expect(Duration.fromSeconds(-2).times(0).equals(Duration.ZERO)).toBe(true);
    expect(a.times(2).seconds).toBe(7.4);
    expect(Duration.fromSeconds(3).div(4).seconds).toBe(0.75);
    expect(a.negate().seconds).toBe(-3.7);
  });

  it("distributes scaling over addition", () => {
    const a = Duration.fromSeconds(1.25);
    const b = Duration.fromSeconds(0.1);
    for (const k of [0.3, 2, -1.5, 1e3]) {
      expect(a.plus(b).times(k).seconds).toBeCloseTo(a.times(k).plus(b.times(k)).seconds, 9);
    }
  });

  it("divides by another duration into a plain ratio", () => {
    expect(Duration.fromSeconds(0.5).ratio(Duration.fromSeconds(2))).toBe(0.25);
  });

  it("compares exactly", () => {
    const small = Duration.fromSeconds(1);
    const large = Duration.fromSeconds(2);
    expect(small.compare(large)).toBe(-1);
    expect(large.compare(small)).toBe(1);
    expect(small.compare(Duration.SECOND)).toBe(0);
    expect(small.lt(large)).toBe(true);
    expect(small.le(small)).toBe(true);
    expect(large.gt(small)).toBe(true);
    expect(large.ge(large)).toBe(true);
    expect(small.equals(Duration.fromSeconds(1 + 1e-12))).toBe(false);
  });

  describe("hrtime interop", () => {
    it("splits into whole seconds and nanoseconds", () => {
      expect(Duration.fromSeconds(1.00045).toHrtime()).toEqual([1, 450000]);
      expect(Duration.fromSeconds(2).toHrtime()).toEqual([2, 0]);
    });

    it("floors negative spans", () => {
      expect(Duration.fromSeconds(-0.25).toHrtime()).toEqual([-1, 750_000_000]);
    });

    it("reads an hrtime pair", () => {
      expect(Duration.fromHrtime([3, 250_000_000]).seconds).toBe(3.25);
    });

    it("round-trips within float precision", () => {
      for (const s of [0.016, 1.00045, 59.999, 7265.125]) {
        const back = Duration.fromHrtime(Duration.fromSeconds(s).toHrtime());
        expect(back.seconds).toBeCloseTo(s, 9);
      }
    });

    it("converts to bigint nanoseconds", () => {
      expect(Duration.fromSeconds(1.5).toNanos()).toBe(1_500_000_000n);
      expect(Duration.fromSeconds(-0.25).toNanos()).toBe(-250_000_000n);
    });
  });

  describe("text", () => {
    it("formats with a unit", () => {
      expect(Duration.fromSeconds(64.45).toString()).toBe("64.45 s");
    });

    it("parses seconds with or without the unit", () => {
      expect(Duration.parse("64.45")?.seconds).toBe(64.45);
      expect(Duration.parse("1.5 s")?.seconds).toBe(1.5);
      expect(Duration.parse("2s")?.seconds).toBe(2);
    });

    it("rejects non-numeric text", () => {
      expect(Duration.parse("abc")).toBeUndefined();
      expect(Duration.parse("")).toBeUndefined();
      expect(Duration.parse("s")).toBeUndefined();
    });
  });
});
