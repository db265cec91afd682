import { type PaletteTable, resolvePalette } from "../color/TokenResolver.js";
import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from "../config/engineCVars.js";
import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { Catalog, PaletteRef } from "../model/types.js";
import type { PixelBuffer } from "./PixelBuffer.js";

/**
 * State scoped to one top-level render call: the diagnostics list, the strict flag,
 * memoized sprite/composition buffers and the chain of names being rendered (for
 * cycle detection). Discarded when the call returns.
 */
export class RenderSession {
  readonly catalog: Catalog;
  readonly options: RenderOptions;
  readonly diagnostics: DiagnosticCollector;
  /** Rendered buffers by sprite name. Read-only once stored. */
  readonly sprites = new Map<string, PixelBuffer>();
  /** Rendered buffers by composition name. Read-only once stored. */
  readonly compositions = new Map<string, PixelBuffer>();
  private readonly palettes = new Map<string, PaletteTable>();
  private readonly chain: string[] = [];

  constructor(catalog: Catalog, options: Partial<RenderOptions> = {}) {
    this.catalog = catalog;
    this.options = { ...DEFAULT_RENDER_OPTIONS, ...options };
    this.diagnostics = new DiagnosticCollector(this.options.strict);
  }

  /** Resolve a palette once per owner (sprite or composition) for the whole call. */
  palette(owner: string, ref: PaletteRef | undefined, location: DiagnosticLocation): PaletteTable {
    const cached = this.palettes.get(owner);
    if (cached) return cached;
    const table = resolvePalette(ref, this.catalog, this.diagnostics, location);
    this.palettes.set(owner, table);
    return table;
  }

  /**
   * Run `body` with `key` pushed on the render chain. Re-entering a key already on the
   * chain, or nesting deeper than `maxDepth`, is a structural error.
   */
  enter<T>(key: string, location: DiagnosticLocation, body: () => T): T {
    if (this.chain.includes(key)) {
      const cycle = [...this.chain.slice(this.chain.indexOf(key)), key].join(" -> ");
      this.diagnostics.fail("StructuralError", `reference cycle: ${cycle}`, location);
    }
    if (this.chain.length >= this.options.maxDepth) {
      this.diagnostics.fail("StructuralError", `nesting deeper than ${this.options.maxDepth}`, location);
    }
    this.chain.push(key);
    try {
      return body();
    } finally {
      this.chain.pop();
    }
  }
}
