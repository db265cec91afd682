import { describe, expect, it } from "vitest";
import { CVarRegistry } from "../console/CVarRegistry.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";
import { applyEnvOverrides, DEFAULT_RENDER_OPTIONS, registerEngineCVars, renderOptionsFromCVars } from "./engineCVars.js";

describe("engine cvars", () => {
  it("start at the default render options", () => {
    const cvars = registerEngineCVars(new CVarRegistry());
    expect(renderOptionsFromCVars(cvars)).toEqual(DEFAULT_RENDER_OPTIONS);
    expect(DEFAULT_RENDER_OPTIONS.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(cvars.diag_log_dir.get()).toBe("");
  });

  it("snapshot into frozen options", () => {
    const cvars = registerEngineCVars(new CVarRegistry());
    cvars.r_strict.set(true);
    cvars.r_max_depth.set(7.8);
    const options = renderOptionsFromCVars(cvars);
    expect(options).toEqual({ strict: true, maxDepth: 7 });
    expect(Object.isFrozen(options)).toBe(true);
  });

  it("read TOKENSPRITE_ environment overrides", () => {
    const registry = new CVarRegistry();
    const cvars = registerEngineCVars(registry);
    const result = applyEnvOverrides(registry, {
      TOKENSPRITE_R_STRICT: "on",
      TOKENSPRITE_R_MAX_DEPTH: "999",
      TOKENSPRITE_DIAG_LOG_DIR: "/var/log/sprites",
      UNRELATED: "1",
    });
    expect(result).toEqual({ applied: ["r_strict", "r_max_depth", "diag_log_dir"], rejected: [] });
    expect(cvars.r_strict.get()).toBe(true);
    expect(cvars.r_max_depth.get()).toBe(256);
    expect(cvars.diag_log_dir.get()).toBe("/var/log/sprites");
  });

  it("leave settings alone when an override does not parse", () => {
    const registry = new CVarRegistry();
    const cvars = registerEngineCVars(registry);
    const result = applyEnvOverrides(registry, { TOKENSPRITE_R_STRICT: "maybe" });
    expect(result).toEqual({ applied: [], rejected: ["r_strict"] });
    expect(cvars.r_strict.get()).toBe(false);
  });
});
