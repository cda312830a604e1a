/** Fixed update tick rate in Hz. */
export const DEFAULT_TICK_RATE = 60;

/** Lowest tick rate the loop_tickrate cvar accepts. */
export const MIN_TICK_RATE = 1;

/** Highest tick rate the loop_tickrate cvar accepts. */
export const MAX_TICK_RATE = 1000;

/** Seconds between per-second reports (tick and frame rate refresh). */
export const REPORT_INTERVAL_SECONDS = 1;

/** Simulation speed multiplier (1 = real time). */
export const DEFAULT_TIME_SCALE = 1;

/** Catch-up ticks allowed per frame. Infinity drains every owed tick. */
export const DEFAULT_MAX_CATCH_UP_TICKS = Number.POSITIVE_INFINITY;
