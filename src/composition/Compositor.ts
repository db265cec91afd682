import { lookup } from "../color/TokenResolver.js";
import { DEFAULT_CELL_SIZE, EMPTY_CELL } from "../config/constants.js";
import type { RenderOptions } from "../config/engineCVars.js";
import type { DiagnosticLocation, RenderResult } from "../diagnostics/Diagnostic.js";
import type { BlendMode, Catalog, Composition, Layer, MapLayer } from "../model/types.js";
import { PixelBuffer } from "../render/PixelBuffer.js";
import { RenderSession } from "../render/RenderSession.js";
import { SpriteRenderer } from "../render/SpriteRenderer.js";
import { blitBuffer, fillBlend, isBlendMode } from "./blend.js";

interface Grid {
  readonly cols: number;
  readonly rows: number;
  readonly cw: number;
  readonly ch: number;
}

/** Per-composition bookkeeping so repeated problems are reported once. */
interface LayerState {
  /** Sprite buffers already fitted to the cell size. */
  readonly fitted: Map<string, PixelBuffer>;
  readonly missingSprites: Set<string>;
}

/**
 * Renders compositions: fill, base and map layers composited bottom to top onto a
 * transparent canvas. Shares the session (and its sprite cache) with the sprite
 * renderer so every sprite is painted once per call, however many compositions use it.
 */
export class Compositor {
  private readonly session: RenderSession;
  private readonly sprites: SpriteRenderer;

  constructor(session: RenderSession, sprites: SpriteRenderer = new SpriteRenderer(session)) {
    this.session = session;
    this.sprites = sprites;
  }

  /** Render a catalog composition by name. Missing ones report `UnknownSprite` and return null. */
  renderNamed(name: string, location: DiagnosticLocation): PixelBuffer | null {
    const cached = this.session.compositions.get(name);
    if (cached) return cached;
    const comp = this.session.catalog.compositions.get(name);
    if (!comp) {
      this.session.diagnostics.report("UnknownSprite", `composition '${name}' is not defined`, location);
      return null;
    }
    const buffer = this.render(comp);
    this.session.compositions.set(name, buffer);
    return buffer;
  }

  render(comp: Composition): PixelBuffer {
    const location: DiagnosticLocation = { composition: comp.name };
    return this.session.enter(`composition:${comp.name}`, location, () => {
      const grid = this.validate(comp, location);
      const out = new PixelBuffer(comp.size[0], comp.size[1]);
      const state: LayerState = { fitted: new Map(), missingSprites: new Set() };
      comp.layers.forEach((layer, index) => {
        this.renderLayer(comp, layer, out, grid, state, { ...location, layer: index });
      });
      return out;
    });
  }

  /** Everything structural is checked before the first pixel is written. */
  private validate(comp: Composition, location: DiagnosticLocation): Grid {
    const fail = (message: string, at: DiagnosticLocation = location): never =>
      this.session.diagnostics.fail("StructuralError", message, at);

    const [w, h] = comp.size;
    const [cw, ch] = comp.cellSize ?? DEFAULT_CELL_SIZE;
    if (!isPositiveInt(w) || !isPositiveInt(h)) fail(`composition size must be positive integers, got ${w}x${h}`);
    if (!isPositiveInt(cw) || !isPositiveInt(ch)) fail(`cell size must be positive integers, got ${cw}x${ch}`);
    if (w % cw !== 0 || h % ch !== 0) fail(`size ${w}x${h} is not divisible by cell size ${cw}x${ch}`);

    comp.layers.forEach((layer, index) => {
      const at = { ...location, layer: index };
      const blend = "base" in layer ? undefined : layer.blend;
      if (blend !== undefined && !isBlendMode(blend)) fail(`unknown blend mode '${String(blend)}'`, at);
      const { opacity } = layer;
      if (opacity !== undefined && !(Number.isFinite(opacity) && opacity >= 0 && opacity <= 1)) {
        fail(`opacity must be within [0, 1], got ${opacity}`, at);
      }
      if ("map" in layer) {
        const lengths = layer.map.map((row) => Array.from(row).length);
        const width = lengths[0] ?? 0;
        lengths.forEach((length, y) => {
          if (length !== width) fail(`map row ${y} has length ${length}, expected ${width}`, at);
        });
      }
    });

    return { cols: w / cw, rows: h / ch, cw, ch };
  }

  private renderLayer(
    comp: Composition,
    layer: Layer,
    out: PixelBuffer,
    grid: Grid,
    state: LayerState,
    location: DiagnosticLocation,
  ): void {
    const opacity = layer.opacity ?? 1;
    if ("fill" in layer) {
      const table = this.session.palette(`composition:${comp.name}`, comp.palette, { composition: comp.name });
      const color = lookup(table, layer.fill, this.session.diagnostics, location);
      fillBlend(out, color, layer.blend ?? "normal", opacity);
      return;
    }
    if ("base" in layer) {
      const base = this.renderNamed(layer.base, location);
      if (base) blitBuffer(out, base, 0, 0, "normal", opacity);
      return;
    }
    this.renderMap(comp, layer, out, grid, state, location);
  }

  private renderMap(
    comp: Composition,
    layer: MapLayer,
    out: PixelBuffer,
    grid: Grid,
    state: LayerState,
    location: DiagnosticLocation,
  ): void {
    const { diagnostics } = this.session;
    const mode: BlendMode = layer.blend ?? "normal";
    const opacity = layer.opacity ?? 1;
    const unknownSymbols = new Set<string>();
    let clipped = 0;
    let firstClipped: DiagnosticLocation | null = null;

    for (const [row, line] of layer.map.entries()) {
      for (const [col, symbol] of Array.from(line).entries()) {
        if (symbol === EMPTY_CELL) continue;
        const cellLocation = { ...location, x: col, y: row };
        if (col >= grid.cols || row >= grid.rows) {
          clipped++;
          firstClipped ??= cellLocation;
          continue;
        }
        const spriteName = comp.sprites[symbol];
        if (spriteName === undefined) {
          if (!unknownSymbols.has(symbol)) {
            unknownSymbols.add(symbol);
            diagnostics.report("UnknownSymbol", `symbol '${symbol}' is not in the sprite table`, cellLocation);
          }
          continue;
        }
        const cell = this.cellBuffer(spriteName, grid, state, cellLocation);
        if (cell) blitBuffer(out, cell, col * grid.cw, row * grid.ch, mode, opacity);
      }
    }

    if (firstClipped) {
      diagnostics.report(
        "OutOfBounds",
        `${clipped} map cell(s) outside the ${grid.cols}x${grid.rows} grid were dropped`,
        firstClipped,
      );
    }
  }

  /** The sprite's buffer fitted to the cell, or null when the sprite is missing. */
  private cellBuffer(name: string, grid: Grid, state: LayerState, location: DiagnosticLocation): PixelBuffer | null {
    const fitted = state.fitted.get(name);
    if (fitted) return fitted;
    if (state.missingSprites.has(name)) return null;

    const buffer = this.sprites.renderNamed(name, location);
    if (!buffer) {
      state.missingSprites.add(name);
      return null;
    }
    if (buffer.width === grid.cw && buffer.height === grid.ch) {
      state.fitted.set(name, buffer);
      return buffer;
    }
    this.session.diagnostics.report(
      "SizeMismatch",
      `sprite '${name}' is ${buffer.width}x${buffer.height}, cell is ${grid.cw}x${grid.ch}`,
      location,
    );
    const resized = buffer.resizeCanvas(grid.cw, grid.ch);
    state.fitted.set(name, resized);
    return resized;
  }
}

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/**
 * Render one composition. Structural problems (size not divisible by the cell size,
 * ragged map rows, cycles) yield `{ ok: false }`; in strict mode so does any other
 * diagnostic.
 */
export function renderComposition(
  comp: Composition,
  catalog: Catalog,
  options?: Partial<RenderOptions>,
): RenderResult<PixelBuffer> {
  const session = new RenderSession(catalog, options);
  return session.diagnostics.capture(() => new Compositor(session).render(comp));
}
