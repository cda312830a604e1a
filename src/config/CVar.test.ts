import { afterEach, describe, expect, it, vi } from "vitest";
import { CVar, enumCVar, numberCVar } from "./CVar.js";

function rateCVar() {
  return new CVar(
    numberCVar({
      name: "loop_tickrate",
      description: "ticks per second",
      defaultValue: 60,
      category: "loop",
      min: 1,
      max: 1000,
    }),
  );
}

describe("CVar", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("starts at its default", () => {
    expect(rateCVar().get()).toBe(60);
  });

  it("clamps numbers into range", () => {
    const cv = rateCVar();
    cv.set(5000);
    expect(cv.get()).toBe(1000);
    cv.set(0);
    expect(cv.get()).toBe(1);
  });

  it("notifies listeners with new and old values", () => {
    const cv = rateCVar();
    const cb = vi.fn();
    cv.onChange(cb);
    cv.set(120);
    expect(cb).toHaveBeenCalledWith(120, 60);
  });

  it("skips listeners when the value does not change", () => {
    const cv = rateCVar();
    const cb = vi.fn();
    cv.onChange(cb);
    cv.set(60);
    expect(cb).not.toHaveBeenCalled();
  });

  it("unsubscribes", () => {
    const cv = rateCVar();
    const cb = vi.fn();
    const unsub = cv.onChange(cb);
    unsub();
    cv.set(30);
    expect(cb).not.toHaveBeenCalled();
  });

  it("keeps notifying after a listener throws", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const cv = rateCVar();
    const after = vi.fn();
    cv.onChange(() => {
      throw new Error("boom");
    });
    cv.onChange(after);
    cv.set(30);
    expect(after).toHaveBeenCalledWith(30, 60);
    expect(spy).toHaveBeenCalledOnce();
  });

  it("parses console text", () => {
    const cv = rateCVar();
    expect(cv.setFromString(" 144 ")).toBe(true);
    expect(cv.get()).toBe(144);
    expect(cv.setFromString("fast")).toBe(false);
    expect(cv.setFromString("")).toBe(false);
    expect(cv.get()).toBe(144);
  });

  it("reads inf as Infinity", () => {
    const cv = new CVar(
      numberCVar({ name: "loop_maxcatchup", description: "", defaultValue: 5, category: "loop", min: 1 }),
    );
    cv.setFromString("inf");
    expect(cv.get()).toBe(Number.POSITIVE_INFINITY);
  });

  it("resets to the default", () => {
    const cv = rateCVar();
    cv.set(10);
    cv.reset();
    expect(cv.get()).toBe(60);
  });

  it("accepts only listed enum values", () => {
    const cv = new CVar(
      enumCVar<"never" | "once" | "always">({
        name: "r_limit",
        description: "render limit",
        defaultValue: "always",
        category: "r",
        values: ["never", "once", "always"] as const,
      }),
    );
    expect(cv.setFromString("once")).toBe(true);
    expect(cv.get()).toBe("once");
    expect(cv.setFromString("sometimes")).toBe(false);
    expect(cv.get()).toBe("once");
  });

  it("describes itself", () => {
    const cv = rateCVar();
    cv.set(30);
    expect(cv.toString()).toBe("loop_tickrate = 30 (default: 60) -- ticks per second");
  });
});
