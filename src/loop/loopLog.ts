import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;
let verbose = process.env.FIXSTEP_LOG === "1";

export interface LoopLogOptions {
  /** Directory for `loop.log`. Omit to keep file logging off. */
  dataDir?: string;
  /** Echo informational lines to stderr. */
  verbose?: boolean;
}

/** Configure logging. Call once at startup. */
export function initLoopLog(opts: LoopLogOptions): void {
  if (opts.dataDir !== undefined) {
    mkdirSync(opts.dataDir, { recursive: true });
    logPath = join(opts.dataDir, "loop.log");
  }
  if (opts.verbose !== undefined) verbose = opts.verbose;
}

/** Turn file logging off and restore the environment's verbosity. */
export function resetLoopLog(): void {
  logPath = null;
  verbose = process.env.FIXSTEP_LOG === "1";
}

function timestamp(): string {
  return new Date().toISOString();
}

function append(line: string): void {
  if (!logPath) return;
  try {
    appendFileSync(logPath, `${line}\n`);
  } catch (err) {
    // Disable file logging after the first failed write.
    const failedPath = logPath;
    logPath = null;
    console.error(`${timestamp()} [fixstep] log file ${failedPath} disabled: ${String(err)}`);
  }
}

/** Log an informational message to the log file, and to stderr when verbose. */
export function loopLog(msg: string): void {
  const line = `${timestamp()} [fixstep] ${msg}`;
  if (verbose) console.error(line);
  append(line);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function loopLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  const line = `${timestamp()} [fixstep] ${label}: ${msg}`;
  console.error(line);
  append(line);
}
