import { renderComposition } from "../composition/Compositor.js";
import { type EngineCVars, type RenderOptions, renderOptionsFromCVars } from "../config/engineCVars.js";
import type { DiagnosticLocation, RenderResult } from "../diagnostics/Diagnostic.js";
import { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import { engineLog, engineLogError, initEngineLog } from "../log/engineLog.js";
import type { Catalog, Size } from "../model/types.js";
import type { PixelBuffer } from "../render/PixelBuffer.js";
import { renderSprite, renderSpriteNineSlice } from "../render/SpriteRenderer.js";

export type RenderJob =
  | { readonly kind: "sprite"; readonly name: string }
  | { readonly kind: "composition"; readonly name: string }
  | { readonly kind: "nineSlice"; readonly name: string; readonly size: Size };

export type JobKind = RenderJob["kind"];

export interface BatchEntry {
  readonly name: string;
  readonly kind: JobKind;
  readonly result: RenderResult<PixelBuffer>;
  /** Set when the job threw something other than a render diagnostic. */
  readonly error?: string;
}

export interface BatchTotals {
  readonly jobs: number;
  readonly ok: number;
  readonly failed: number;
  readonly warnings: number;
  readonly errors: number;
}

export interface BatchReport {
  readonly entries: readonly BatchEntry[];
  readonly totals: BatchTotals;
}

/**
 * Renders many catalog entries, each in its own call so diagnostics and caches never
 * leak between jobs. Logs one line per job and one per run; the render calls
 * themselves stay silent.
 */
export class RenderBatch {
  readonly catalog: Catalog;
  readonly options: Partial<RenderOptions>;
  private readonly logDir: string | null | undefined;

  /** `logDir` switches file logging on (a path) or off (null); undefined leaves it as is. */
  constructor(catalog: Catalog, options: Partial<RenderOptions> = {}, logDir?: string | null) {
    this.catalog = catalog;
    this.options = options;
    this.logDir = logDir;
  }

  static fromCVars(catalog: Catalog, cvars: EngineCVars): RenderBatch {
    const dir = cvars.diag_log_dir.get();
    return new RenderBatch(catalog, renderOptionsFromCVars(cvars), dir === "" ? null : dir);
  }

  /** Every sprite, then every composition, in catalog order. */
  defaultJobs(): RenderJob[] {
    const jobs: RenderJob[] = [];
    for (const name of this.catalog.sprites.keys()) jobs.push({ kind: "sprite", name });
    for (const name of this.catalog.compositions.keys()) jobs.push({ kind: "composition", name });
    return jobs;
  }

  run(jobs: readonly RenderJob[] = this.defaultJobs()): BatchReport {
    if (this.logDir !== undefined) initEngineLog(this.logDir);

    const entries = jobs.map((job) => this.runJob(job));
    const totals = summarize(entries);
    engineLog(
      `batch: ${totals.jobs} job(s), ${totals.ok} ok, ${totals.failed} failed, ` +
        `${totals.errors} error(s), ${totals.warnings} warning(s)`,
    );
    return { entries, totals };
  }

  private runJob(job: RenderJob): BatchEntry {
    const label = `${job.kind} ${job.name}`;
    let entry: BatchEntry;
    try {
      entry = { name: job.name, kind: job.kind, result: this.render(job) };
    } catch (err) {
      engineLogError(label, err);
      const error = err instanceof Error ? err.message : String(err);
      return { name: job.name, kind: job.kind, result: { ok: false, diagnostics: [] }, error };
    }
    const { result } = entry;
    const count = result.diagnostics.length;
    engineLog(
      result.ok
        ? `${label}: ${result.value.width}x${result.value.height}, ${count} diagnostic(s)`
        : `${label}: failed, ${count} diagnostic(s)`,
    );
    return entry;
  }

  private render(job: RenderJob): RenderResult<PixelBuffer> {
    if (job.kind === "composition") {
      const comp = this.catalog.compositions.get(job.name);
      if (!comp) return missing(`composition '${job.name}' is not defined`, this.options, { composition: job.name });
      return renderComposition(comp, this.catalog, this.options);
    }
    const sprite = this.catalog.sprites.get(job.name);
    if (!sprite) return missing(`sprite '${job.name}' is not defined`, this.options, { sprite: job.name });
    if (job.kind === "nineSlice") return renderSpriteNineSlice(sprite, this.catalog, job.size, this.options);
    return renderSprite(sprite, this.catalog, this.options);
  }
}

/** A job naming nothing in the catalog fails with a single `UnknownSprite`. */
function missing(
  message: string,
  options: Partial<RenderOptions>,
  location: DiagnosticLocation,
): RenderResult<PixelBuffer> {
  const diagnostics = new DiagnosticCollector(options.strict ?? false);
  return diagnostics.capture(() => diagnostics.fail("UnknownSprite", message, location));
}

function summarize(entries: readonly BatchEntry[]): BatchTotals {
  let ok = 0;
  let warnings = 0;
  let errors = 0;
  for (const { result } of entries) {
    if (result.ok) ok++;
    for (const d of result.diagnostics) {
      if (d.severity === "error") errors++;
      else warnings++;
    }
  }
  return { jobs: entries.length, ok, failed: entries.length - ok, warnings, errors };
}
