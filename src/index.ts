export { Duration, type HrTime } from "./time/Duration.js";
export { type Clock, MonotonicClock } from "./time/Clock.js";
export { ManualClock } from "./time/ManualClock.js";
export { Timer } from "./time/Timer.js";
export { Stat, type DurationRecorder, type StatView } from "./profiling/Stat.js";
export { ProfileScope, profile } from "./profiling/Profile.js";
export { MainLoop } from "./loop/MainLoop.js";
export {
  type LoopControl,
  type LoopPhase,
  type LoopView,
  type MainLoopOptions,
  RENDER_LIMITS,
  type RenderLimit,
  type Renderer,
  type SimState,
} from "./loop/types.js";
export { initLoopLog, type LoopLogOptions, loopLog, loopLogError, resetLoopLog } from "./loop/loopLog.js";
export { type AnyCVar, CVar, type CVarCategory, type CVarDesc, enumCVar, numberCVar } from "./config/CVar.js";
export { CVarRegistry } from "./config/CVarRegistry.js";
export { bindLoopCVars, type LoopCVars, loopOptionsFromCVars, registerLoopCVars } from "./config/loopCVars.js";
export * from "./config/constants.js";
