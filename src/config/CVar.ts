import { loopLogError } from "../loop/loopLog.js";

export type CVarCategory = "loop" | "r" | "debug";

export interface CVarDesc<T> {
  name: string;
  description: string;
  defaultValue: T;
  category: CVarCategory;
  /** Read a value from console text. Returns undefined when the text is not valid. */
  parse(text: string): T | undefined;
  /** Bring a value into range before storing it (e.g. clamping). */
  normalize?(value: T): T;
}

/** The parts of a CVar that don't depend on its value type. */
export interface AnyCVar {
  readonly name: string;
  readonly description: string;
  readonly category: CVarCategory;
  reset(): void;
  setFromString(text: string): boolean;
  /** Current value as console text. */
  valueText(): string;
  toString(): string;
}

export class CVar<T> implements AnyCVar {
  readonly name: string;
  readonly description: string;
  readonly defaultValue: T;
  readonly category: CVarCategory;
  private readonly desc: CVarDesc<T>;
  private value: T;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  constructor(desc: CVarDesc<T>) {
    this.desc = desc;
    this.name = desc.name;
    this.description = desc.description;
    this.category = desc.category;
    this.defaultValue = this.normalize(desc.defaultValue);
    this.value = this.defaultValue;
  }

  get(): T {
    return this.value;
  }

  set(raw: T): void {
    const v = this.normalize(raw);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        loopLogError(`[cvar] onChange error for ${this.name}`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse a string value and set it. Returns false if the text didn't parse. */
  setFromString(text: string): boolean {
    const parsed = this.desc.parse(text);
    if (parsed === undefined) return false;
    this.set(parsed);
    return true;
  }

  valueText(): string {
    return String(this.value);
  }

  toString(): string {
    return `${this.name} = ${this.valueText()} (default: ${String(this.defaultValue)}) -- ${this.description}`;
  }

  private normalize(value: T): T {
    return this.desc.normalize ? this.desc.normalize(value) : value;
  }
}

interface NumberCVarOptions {
  name: string;
  description: string;
  defaultValue: number;
  category: CVarCategory;
  min?: number;
  max?: number;
}

/** Numeric cvar clamped to [min, max]. "inf" parses as Infinity. */
export function numberCVar(opts: NumberCVarOptions): CVarDesc<number> {
  const { min, max } = opts;
  return {
    name: opts.name,
    description: opts.description,
    defaultValue: opts.defaultValue,
    category: opts.category,
    parse(text) {
      const trimmed = text.trim();
      if (trimmed === "") return undefined;
      const n = trimmed === "inf" ? Number.POSITIVE_INFINITY : Number(trimmed);
      return Number.isNaN(n) ? undefined : n;
    },
    normalize(value) {
      let v = value;
      if (min != null) v = Math.max(min, v);
      if (max != null) v = Math.min(max, v);
      return v;
    },
  };
}

interface EnumCVarOptions<T extends string> {
  name: string;
  description: string;
  defaultValue: T;
  category: CVarCategory;
  values: readonly T[];
}

/** String cvar limited to a fixed set of values. */
export function enumCVar<T extends string>(opts: EnumCVarOptions<T>): CVarDesc<T> {
  return {
    name: opts.name,
    description: opts.description,
    defaultValue: opts.defaultValue,
    category: opts.category,
    parse: (text) => opts.values.find((v) => v === text.trim()),
  };
}
