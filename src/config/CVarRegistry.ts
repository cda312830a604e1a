import { type AnyCVar, CVar, type CVarCategory, type CVarDesc } from "./CVar.js";

/**
 * Named cvars, plus a one-line console over them:
 *
 *   exec("loop_tickrate")      -> ["loop_tickrate = 60 (default: 60) -- ..."]
 *   exec("loop_tickrate 30")   -> ["loop_tickrate = 30"]
 *   exec("cvarlist loop")      -> one line per loop cvar
 */
export class CVarRegistry {
  private readonly byName = new Map<string, AnyCVar>();

  register<T>(desc: CVarDesc<T>): CVar<T> {
    if (this.byName.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = new CVar(desc);
    this.byName.set(desc.name, cv);
    return cv;
  }

  get(name: string): AnyCVar | undefined {
    return this.byName.get(name);
  }

  getAll(): AnyCVar[] {
    return [...this.byName.values()];
  }

  getByCategory(category: CVarCategory): AnyCVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return [...this.byName.keys()];
  }

  resetAll(): void {
    for (const cv of this.byName.values()) cv.reset();
  }

  /** Run one console line and return the lines it prints. */
  exec(line: string): string[] {
    const [head = "", ...args] = line.trim().split(/\s+/);
    if (head === "") return [];
    const name = head.toLowerCase();
    if (name === "cvarlist") return this.list(args[0]);

    const cv = this.byName.get(name);
    if (cv === undefined) return [`[cvar] unknown cvar: ${head}`];
    const [text] = args;
    if (text === undefined) return [cv.toString()];
    if (!cv.setFromString(text)) return [`[cvar] ${cv.name}: cannot parse "${text}"`];
    return [`${cv.name} = ${cv.valueText()}`];
  }

  /** Run each line in order, e.g. from a config file or `--set` flags. */
  execAll(lines: readonly string[]): string[] {
    return lines.flatMap((line) => this.exec(line));
  }

  private list(category: string | undefined): string[] {
    const all = this.getAll();
    const matches = category === undefined ? all : all.filter((cv) => cv.category === category);
    if (matches.length === 0) {
      return [category === undefined ? "No cvars registered" : `No cvars in category: ${category}`];
    }
    return matches.map((cv) => `  ${cv.toString()}`);
  }
}
