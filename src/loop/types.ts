import type { StatView } from "../profiling/Stat.js";
import type { Duration } from "../time/Duration.js";
import type { Timer } from "../time/Timer.js";

export type LoopPhase = "idle" | "running" | "stopped";

/**
 * How often frames are rendered.
 * - "never": no rendering (e.g. while loading a level over many ticks)
 * - "once": the first frame of each one-second cycle
 * - "always": every frame
 */
export type RenderLimit = "never" | "once" | "always";

export const RENDER_LIMITS: readonly RenderLimit[] = ["never", "once", "always"];

/** What a renderer may see of the loop. */
export interface LoopView {
  readonly tickDuration: Duration;
  ticks(): StatView;
  frames(): StatView;
  getPhase(): LoopPhase;
  getRenderLimit(): RenderLimit;
  getTimeScale(): number;
  getDroppedTicks(): number;
}

/** What simulation callbacks may do to the loop. */
export interface LoopControl extends LoopView {
  /** Request termination. Takes effect at the next tick boundary. */
  stop(): void;
  setRenderLimit(limit: RenderLimit): void;
}

/**
 * Simulation state advanced by the loop.
 *
 * scale() and combine() must form a linear blend: the loop renders
 * `previous.scale(1 - alpha).combine(current.scale(alpha))`. Both return new
 * values. clone() snapshots the state before each tick.
 */
export interface SimState<S> {
  scale(factor: number): S;
  combine(other: S): S;
  clone(): S;
  /** Called once before the first frame. `setup` has run since the loop was constructed. */
  init?(loop: LoopControl, setup: Timer): void;
  /** Advance by exactly one fixed tick. */
  update(loop: LoopControl): void;
  /** Called once per elapsed second, before the tick and frame stats refresh. */
  sec?(loop: LoopControl): void;
}

export interface Renderer<S> {
  render(loop: LoopView, state: S): void;
}

export interface MainLoopOptions {
  /** Fixed update rate in Hz. */
  tickRate?: number;
  renderLimit?: RenderLimit;
  /** Most ticks one frame may run before the remaining backlog is dropped. */
  maxCatchUpTicks?: number;
  /** Multiplier on measured frame time (0.5 = half speed). */
  timeScale?: number;
}
