import type { CVar } from "../console/CVar.js";
import type { CVarRegistry } from "../console/CVarRegistry.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";

/** Snapshot of the settings one render call runs under. Never changes mid-call. */
export interface RenderOptions {
  /** Recoverable conditions become errors and the call yields no buffer. */
  readonly strict: boolean;
  /** Maximum nesting of compositions and derived sprites. */
  readonly maxDepth: number;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = Object.freeze({
  strict: false,
  maxDepth: DEFAULT_MAX_DEPTH,
});

export interface EngineCVars {
  r_strict: CVar<boolean>;
  r_max_depth: CVar<number>;
  /** Directory for the batch renderer's log file; empty disables file logging. */
  diag_log_dir: CVar<string>;
}

export function registerEngineCVars(registry: CVarRegistry): EngineCVars {
  const r_strict = registry.registerBoolean({
    name: "r_strict",
    description: "Treat recoverable diagnostics as errors",
    defaultValue: DEFAULT_RENDER_OPTIONS.strict,
    category: "r",
  });

  const r_max_depth = registry.registerNumber({
    name: "r_max_depth",
    description: "Maximum composition / derived sprite nesting",
    defaultValue: DEFAULT_RENDER_OPTIONS.maxDepth,
    min: 1,
    max: 256,
    category: "r",
  });

  const diag_log_dir = registry.registerString({
    name: "diag_log_dir",
    description: "Directory for tokensprite.log (empty = stderr only)",
    defaultValue: "",
    category: "diag",
  });

  return { r_strict, r_max_depth, diag_log_dir };
}

export function renderOptionsFromCVars(cvars: EngineCVars): RenderOptions {
  return Object.freeze({
    strict: cvars.r_strict.get(),
    maxDepth: Math.floor(cvars.r_max_depth.get()),
  });
}

export const ENV_PREFIX = "TOKENSPRITE_";

/**
 * Apply `TOKENSPRITE_<CVAR NAME>` environment variables (e.g. `TOKENSPRITE_R_STRICT=1`).
 * Values that do not parse are left at their current setting and listed in `rejected`.
 */
export function applyEnvOverrides(
  registry: CVarRegistry,
  env: Readonly<Record<string, string | undefined>>,
): { applied: string[]; rejected: string[] } {
  const applied: string[] = [];
  const rejected: string[] = [];
  for (const cv of registry.getAll()) {
    const raw = env[`${ENV_PREFIX}${cv.name.toUpperCase()}`];
    if (raw === undefined) continue;
    if (cv.setFromString(raw)) applied.push(cv.name);
    else rejected.push(cv.name);
  }
  return { applied, rejected };
}
