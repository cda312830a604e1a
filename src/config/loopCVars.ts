import type { MainLoop } from "../loop/MainLoop.js";
import { type MainLoopOptions, RENDER_LIMITS, type RenderLimit, type SimState } from "../loop/types.js";
import { type CVar, enumCVar, numberCVar } from "./CVar.js";
import type { CVarRegistry } from "./CVarRegistry.js";
import {
  DEFAULT_MAX_CATCH_UP_TICKS,
  DEFAULT_TICK_RATE,
  DEFAULT_TIME_SCALE,
  MAX_TICK_RATE,
  MIN_TICK_RATE,
} from "./constants.js";

export interface LoopCVars {
  tickRate: CVar<number>;
  timeScale: CVar<number>;
  maxCatchUpTicks: CVar<number>;
  renderLimit: CVar<RenderLimit>;
}

export function registerLoopCVars(registry: CVarRegistry): LoopCVars {
  return {
    tickRate: registry.register(
      numberCVar({
        name: "loop_tickrate",
        description: "Fixed simulation ticks per second",
        defaultValue: DEFAULT_TICK_RATE,
        category: "loop",
        min: MIN_TICK_RATE,
        max: MAX_TICK_RATE,
      }),
    ),
    timeScale: registry.register(
      numberCVar({
        name: "loop_timescale",
        description: "Simulation speed multiplier",
        defaultValue: DEFAULT_TIME_SCALE,
        category: "loop",
        min: 0,
        max: 10,
      }),
    ),
    maxCatchUpTicks: registry.register(
      numberCVar({
        name: "loop_maxcatchup",
        description: "Most catch-up ticks per frame before the backlog is dropped (inf = no limit)",
        defaultValue: DEFAULT_MAX_CATCH_UP_TICKS,
        category: "loop",
        min: 1,
      }),
    ),
    renderLimit: registry.register(
      enumCVar<RenderLimit>({
        name: "r_limit",
        description: "Rendering: never, once (per second) or always",
        defaultValue: "always",
        category: "r",
        values: RENDER_LIMITS,
      }),
    ),
  };
}

export function loopOptionsFromCVars(cvars: LoopCVars): MainLoopOptions {
  return {
    tickRate: cvars.tickRate.get(),
    timeScale: cvars.timeScale.get(),
    maxCatchUpTicks: Math.floor(cvars.maxCatchUpTicks.get()),
    renderLimit: cvars.renderLimit.get(),
  };
}

/**
 * Push the cvars' current values into a loop and follow later changes.
 * Returns a function that stops following.
 */
export function bindLoopCVars<S extends SimState<S>>(loop: MainLoop<S>, cvars: LoopCVars): () => void {
  const applyTickRate = (hz: number) => {
    if (loop.tickDuration.seconds !== 1 / hz) loop.setTickRate(hz);
  };
  const applyCatchUp = (n: number) => loop.setMaxCatchUpTicks(Math.floor(n));

  applyTickRate(cvars.tickRate.get());
  loop.setTimeScale(cvars.timeScale.get());
  applyCatchUp(cvars.maxCatchUpTicks.get());
  loop.setRenderLimit(cvars.renderLimit.get());

  const unsubs = [
    cvars.tickRate.onChange(applyTickRate),
    cvars.timeScale.onChange((k) => loop.setTimeScale(k)),
    cvars.maxCatchUpTicks.onChange(applyCatchUp),
    cvars.renderLimit.onChange((limit) => loop.setRenderLimit(limit)),
  ];
  return () => {
    for (const unsub of unsubs) unsub();
  };
}
