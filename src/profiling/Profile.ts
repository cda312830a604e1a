import type { Clock } from "../time/Clock.js";
import { Timer } from "../time/Timer.js";
import type { DurationRecorder } from "./Stat.js";

const openRecorders = new WeakSet<DurationRecorder>();

/**
 * One timed measurement bound to a recorder. The recorder gets exactly one
 * sample, on the first end() call. A recorder can have only one open scope.
 */
export class ProfileScope {
  private open = true;

  private constructor(
    private readonly timer: Timer,
    private readonly recorder: DurationRecorder,
  ) {}

  static begin(clock: Clock, recorder: DurationRecorder): ProfileScope {
    if (openRecorders.has(recorder)) {
      throw new Error("[profile] recorder already has an open scope");
    }
    openRecorders.add(recorder);
    return new ProfileScope(new Timer(clock), recorder);
  }

  get isOpen(): boolean {
    return this.open;
  }

  end(): void {
    if (!this.open) return;
    this.open = false;
    openRecorders.delete(this.recorder);
    this.recorder.record(this.timer.elapsed());
  }
}

/**
 * Runs `body` and records how long it took, however it exits.
 * Errors from `body` still propagate after the sample is recorded.
 */
export function profile<T>(clock: Clock, recorder: DurationRecorder, body: () => T): T {
  const scope = ProfileScope.begin(clock, recorder);
  try {
    return body();
  } finally {
    scope.end();
  }
}
