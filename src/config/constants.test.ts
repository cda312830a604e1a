import { describe, expect, it } from "vitest";
import {
  DEFAULT_MAX_CATCH_UP_TICKS,
  DEFAULT_TICK_RATE,
  DEFAULT_TIME_SCALE,
  MAX_TICK_RATE,
  MIN_TICK_RATE,
  REPORT_INTERVAL_SECONDS,
} from "./constants.js";

describe("constants", () => {
  it("keeps the default tick rate inside the accepted range", () => {
    expect(DEFAULT_TICK_RATE).toBeGreaterThanOrEqual(MIN_TICK_RATE);
    expect(DEFAULT_TICK_RATE).toBeLessThanOrEqual(MAX_TICK_RATE);
  });

  it("has expected defaults", () => {
    expect(DEFAULT_TICK_RATE).toBe(60);
    expect(REPORT_INTERVAL_SECONDS).toBe(1);
    expect(DEFAULT_TIME_SCALE).toBe(1);
    expect(DEFAULT_MAX_CATCH_UP_TICKS).toBe(Number.POSITIVE_INFINITY);
  });
});
