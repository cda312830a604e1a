import {
  DEFAULT_MAX_CATCH_UP_TICKS,
  DEFAULT_TICK_RATE,
  DEFAULT_TIME_SCALE,
  REPORT_INTERVAL_SECONDS,
} from "../config/constants.js";
import { profile } from "../profiling/Profile.js";
import { Stat, type StatView } from "../profiling/Stat.js";
import type { Clock } from "../time/Clock.js";
import { Duration } from "../time/Duration.js";
import { Timer } from "../time/Timer.js";
import { loopLog, loopLogError } from "./loopLog.js";
import type {
  LoopControl,
  LoopPhase,
  MainLoopOptions,
  RenderLimit,
  Renderer,
  SimState,
} from "./types.js";

const REPORT_INTERVAL = Duration.fromSeconds(REPORT_INTERVAL_SECONDS);

interface Session<S> {
  current: S;
  previous: S;
  renderer: Renderer<S>;
  /** Measures each frame; consumed as soon as it is read. */
  tickTimer: Timer;
  /** Drives the per-second report; consumed one second at a time. */
  secondTimer: Timer;
}

function isPositiveFinite(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

function isCatchUpLimit(n: number): boolean {
  return n === Number.POSITIVE_INFINITY || (Number.isInteger(n) && n >= 1);
}

/**
 * Fixed-timestep main loop with interpolated rendering.
 *
 * Each frame measures the time since the previous frame, runs as many
 * fixed-size update() ticks as that time pays for, then renders a blend of
 * the last two tick states weighted by the leftover fraction of a tick
 * (alpha). Once per second the state gets a sec() call and the tick and
 * frame stats are refreshed, so their rates read as ticks and frames per
 * second.
 *
 * Everything runs synchronously on the caller's stack. start() spins on
 * frame() until stop() is observed; callers with their own scheduler can
 * call begin() once and frame() from it instead.
 */
export class MainLoop<S extends SimState<S>> implements LoopControl {
  private phase: LoopPhase = "idle";
  private stopRequested = false;
  private fixedDt: Duration;
  private accumulator = Duration.ZERO;
  private renderLimit: RenderLimit;
  private maxCatchUpTicks: number;
  private timeScale: number;
  private droppedTicks = 0;
  private readonly tickStat = new Stat();
  private readonly frameStat = new Stat();
  private readonly setupTimer: Timer;
  private session: Session<S> | null = null;

  constructor(
    private readonly clock: Clock,
    options: MainLoopOptions = {},
  ) {
    const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
    if (!isPositiveFinite(tickRate)) {
      throw new Error(`[loop] tick rate must be a positive number, got ${tickRate}`);
    }
    this.setupTimer = new Timer(clock);
    this.fixedDt = Duration.fromSeconds(1 / tickRate);
    this.renderLimit = options.renderLimit ?? "always";
    this.maxCatchUpTicks = DEFAULT_MAX_CATCH_UP_TICKS;
    this.timeScale = DEFAULT_TIME_SCALE;
    if (options.maxCatchUpTicks !== undefined) this.setMaxCatchUpTicks(options.maxCatchUpTicks);
    if (options.timeScale !== undefined) this.setTimeScale(options.timeScale);
  }

  get tickDuration(): Duration {
    return this.fixedDt;
  }

  ticks(): StatView {
    return this.tickStat;
  }

  frames(): StatView {
    return this.frameStat;
  }

  getPhase(): LoopPhase {
    return this.phase;
  }

  getRenderLimit(): RenderLimit {
    return this.renderLimit;
  }

  getTimeScale(): number {
    return this.timeScale;
  }

  getMaxCatchUpTicks(): number {
    return this.maxCatchUpTicks;
  }

  getDroppedTicks(): number {
    return this.droppedTicks;
  }

  /** Simulation time owed but not yet ticked. */
  getAccumulator(): Duration {
    return this.accumulator;
  }

  /** Change the simulation tick rate. Resets the accumulator to avoid burst ticks. */
  setTickRate(hz: number): void {
    if (!isPositiveFinite(hz)) return;
    this.fixedDt = Duration.fromSeconds(1 / hz);
    this.accumulator = Duration.ZERO;
  }

  setTimeScale(scale: number): void {
    if (!Number.isFinite(scale) || scale < 0) return;
    this.timeScale = scale;
  }

  setMaxCatchUpTicks(limit: number): void {
    if (!isCatchUpLimit(limit)) return;
    this.maxCatchUpTicks = limit;
  }

  setRenderLimit(limit: RenderLimit): void {
    this.renderLimit = limit;
  }

  /** Request termination. The tick in progress finishes first. */
  stop(): void {
    if (this.phase === "idle") {
      this.finish();
      return;
    }
    this.stopRequested = true;
  }

  /** begin() followed by frame() until the loop stops. */
  start(createState: () => S, renderer: Renderer<S>): void {
    this.begin(createState, renderer);
    let running = true;
    while (running) running = this.frame();
  }

  /**
   * Move from idle to running: build and init the state and start the frame
   * and one-second timers. `createState` is the state's default constructor.
   */
  begin(createState: () => S, renderer: Renderer<S>): void {
    if (this.phase !== "idle") {
      throw new Error(`[loop] cannot start a loop that is ${this.phase}`);
    }
    this.phase = "running";
    const current = createState();
    try {
      current.init?.(this, this.setupTimer);
    } catch (err) {
      loopLogError("init error", err);
      this.finish();
      throw err;
    }
    if (this.stopRequested) {
      this.finish();
      return;
    }
    this.session = {
      current,
      previous: createState(),
      renderer,
      tickTimer: new Timer(this.clock),
      secondTimer: new Timer(this.clock),
    };
    this.accumulator = Duration.ZERO;
    loopLog(`loop started at ${1 / this.fixedDt.seconds} Hz`);
  }

  /**
   * Run one frame. Returns false once the loop has stopped (or was never
   * begun), true while it keeps going. An error thrown by a callback stops
   * the loop and is rethrown.
   */
  frame(): boolean {
    const session = this.session;
    if (this.phase !== "running" || session === null) return false;
    try {
      this.runFrame(session);
    } catch (err) {
      loopLogError("frame error", err);
      this.finish();
      throw err;
    }
    if (this.stopRequested) {
      this.finish();
      return false;
    }
    return true;
  }

  private runFrame(session: Session<S>): void {
    const frameTime = session.tickTimer.elapsed();
    session.tickTimer.consume(frameTime);
    this.accumulator = this.accumulator.plus(frameTime.times(this.timeScale));

    let ran = 0;
    while (this.accumulator.ge(this.fixedDt) && !this.stopRequested) {
      if (ran >= this.maxCatchUpTicks) {
        this.dropBacklog();
        break;
      }
      session.previous = session.current.clone();
      const current = session.current;
      profile(this.clock, this.tickStat, () => current.update(this));
      this.accumulator = this.accumulator.minus(this.fixedDt);
      ran++;
    }

    if (this.shouldRender()) {
      // alpha only reaches 1 when a stop or the catch-up limit cut the drain short
      const alpha = Math.min(this.accumulator.ratio(this.fixedDt), 1);
      profile(this.clock, this.frameStat, () => {
        const blended = session.previous.scale(1 - alpha).combine(session.current.scale(alpha));
        session.renderer.render(this, blended);
      });
    }

    if (!this.stopRequested && session.secondTimer.reached(REPORT_INTERVAL)) {
      session.current.sec?.(this);
      this.tickStat.refresh();
      this.frameStat.refresh();
      session.secondTimer.consume(REPORT_INTERVAL);
    }
  }

  private dropBacklog(): void {
    const owed = Math.floor(this.accumulator.ratio(this.fixedDt));
    const left = this.accumulator.minus(this.fixedDt.times(owed));
    // float rounding in the floored ratio can leave a hair below zero
    this.accumulator = left.lt(Duration.ZERO) ? Duration.ZERO : left;
    this.droppedTicks += owed;
    loopLog(`catch-up limit ${this.maxCatchUpTicks} reached, dropped ${owed} ticks`);
  }

  private shouldRender(): boolean {
    switch (this.renderLimit) {
      case "never":
        return false;
      case "once":
        return this.frameStat.getCycle() === 0;
      case "always":
        return true;
    }
  }

  private finish(): void {
    this.phase = "stopped";
    this.stopRequested = true;
    this.session = null;
    loopLog(
      `loop stopped after ${this.tickStat.getCount()} ticks, ${this.frameStat.getCount()} frames`,
    );
  }
}
