import { CVar, type CVarCategory, type CVarDesc, type CVarHandle, clampTo, parseBoolean, parseNumber } from "./CVar.js";

export class CVarRegistry {
  private cvars = new Map<string, CVarHandle>();

  private add<T extends CVar<number> | CVar<boolean> | CVar<string>>(cv: T): T {
    if (this.cvars.has(cv.name)) {
      throw new Error(`[cvar] duplicate registration: ${cv.name}`);
    }
    this.cvars.set(cv.name, cv);
    return cv;
  }

  registerNumber(desc: CVarDesc<number>): CVar<number> {
    return this.add(new CVar(desc, "number", parseNumber, clampTo(desc.min, desc.max)));
  }

  registerBoolean(desc: CVarDesc<boolean>): CVar<boolean> {
    return this.add(new CVar(desc, "boolean", parseBoolean));
  }

  registerString(desc: CVarDesc<string>): CVar<string> {
    return this.add(new CVar(desc, "string", (s) => s));
  }

  get(name: string): CVarHandle | undefined {
    return this.cvars.get(name);
  }

  getAll(): CVarHandle[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): CVarHandle[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return [...this.cvars.keys()];
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }
}
