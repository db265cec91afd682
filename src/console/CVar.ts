export type CVarValue = number | boolean | string;
export type CVarType = "number" | "boolean" | "string";
export type CVarCategory = "r" | "diag";

export interface CVarDesc<T extends CVarValue> {
  name: string;
  description: string;
  defaultValue: T;
  category: CVarCategory;
  min?: number;
  max?: number;
}

/** Type-erased view of a CVar, used by the registry and for string-driven updates. */
export interface CVarHandle {
  readonly name: string;
  readonly description: string;
  readonly type: CVarType;
  readonly category: CVarCategory;
  /** Parse and apply a textual value. Returns false when the text does not parse. */
  setFromString(str: string): boolean;
  reset(): void;
  toString(): string;
}

export class CVar<T extends CVarValue> implements CVarHandle {
  readonly name: string;
  readonly description: string;
  readonly type: CVarType;
  readonly category: CVarCategory;
  readonly defaultValue: T;
  private value: T;
  private readonly normalize: (v: T) => T;
  private readonly parse: (str: string) => T | undefined;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  constructor(
    desc: CVarDesc<T>,
    type: CVarType,
    parse: (str: string) => T | undefined,
    normalize: (v: T) => T = (v) => v,
  ) {
    this.name = desc.name;
    this.description = desc.description;
    this.category = desc.category;
    this.type = type;
    this.parse = parse;
    this.normalize = normalize;
    this.defaultValue = normalize(desc.defaultValue);
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
    for (const cb of this.listeners) cb(v, old);
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  setFromString(str: string): boolean {
    const v = this.parse(str.trim());
    if (v === undefined) return false;
    this.set(v);
    return true;
  }

  toString(): string {
    return `${this.name} = ${String(this.value)} (default: ${String(this.defaultValue)}) -- ${this.description}`;
  }
}

export function parseBoolean(str: string): boolean | undefined {
  const s = str.toLowerCase();
  if (s === "1" || s === "true" || s === "on") return true;
  if (s === "0" || s === "false" || s === "off") return false;
  return undefined;
}

export function parseNumber(str: string): number | undefined {
  if (str.length === 0) return undefined;
  const n = Number(str);
  return Number.isNaN(n) ? undefined : n;
}

export function clampTo(min: number | undefined, max: number | undefined): (v: number) => number {
  return (v) => {
    let out = v;
    if (min != null) out = Math.max(min, out);
    if (max != null) out = Math.min(max, out);
    return out;
  };
}
