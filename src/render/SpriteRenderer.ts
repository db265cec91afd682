import { lookup, type PaletteTable } from "../color/TokenResolver.js";
import { BACKGROUND_TOKEN } from "../config/constants.js";
import type { RenderOptions } from "../config/engineCVars.js";
import type { DiagnosticLocation, RenderResult } from "../diagnostics/Diagnostic.js";
import type { Catalog, Size, Sprite } from "../model/types.js";
import type { PixelSet } from "../raster/PixelSet.js";
import { sortRegions, validateRegionOrder } from "../raster/references.js";
import { rasterizeRegion } from "../raster/ShapeRasterizer.js";
import { renderNineSlice } from "./nineSlice.js";
import { PixelBuffer } from "./PixelBuffer.js";
import { RenderSession } from "./RenderSession.js";
import { applyTransform } from "./transforms.js";

/**
 * Paints sprites into pixel buffers. One instance serves one render call; buffers for
 * sprites looked up by name are memoized in the session.
 */
export class SpriteRenderer {
  private readonly session: RenderSession;

  constructor(session: RenderSession) {
    this.session = session;
  }

  /** Render a catalog sprite by name, once per call. Missing sprites return null. */
  renderNamed(name: string, location: DiagnosticLocation): PixelBuffer | null {
    const cached = this.session.sprites.get(name);
    if (cached) return cached;
    const sprite = this.session.catalog.sprites.get(name);
    if (!sprite) {
      this.session.diagnostics.report("UnknownSprite", `sprite '${name}' is not defined`, location);
      return null;
    }
    return this.renderCached(sprite);
  }

  private renderCached(sprite: Sprite): PixelBuffer {
    const cached = this.session.sprites.get(sprite.name);
    if (cached) return cached;
    const buffer = this.render(sprite);
    this.session.sprites.set(sprite.name, buffer);
    return buffer;
  }

  render(sprite: Sprite): PixelBuffer {
    const location: DiagnosticLocation = { sprite: sprite.name };
    return this.session.enter(`sprite:${sprite.name}`, location, () => {
      if (sprite.source !== undefined) {
        if (sprite.regions !== undefined) {
          this.session.diagnostics.fail("StructuralError", "a sprite cannot have both regions and a source", location);
        }
        return this.renderDerived(sprite, sprite.source, location);
      }
      return this.renderRegions(sprite, location);
    });
  }

  /** Resolve a sprite's palette, once per call. */
  paletteOf(sprite: Sprite): PaletteTable {
    return this.session.palette(`sprite:${sprite.name}`, sprite.palette, { sprite: sprite.name });
  }

  private requireSize(size: Size | undefined, location: DiagnosticLocation): Size {
    const fail = (message: string): never => this.session.diagnostics.fail("StructuralError", message, location);
    if (!size) return fail("sprite has no size");
    const [w, h] = size;
    if (!Number.isInteger(w) || !Number.isInteger(h) || w <= 0 || h <= 0) {
      return fail(`sprite size must be positive integers, got ${w}x${h}`);
    }
    return size;
  }

  private renderRegions(sprite: Sprite, location: DiagnosticLocation): PixelBuffer {
    const { diagnostics } = this.session;
    const [width, height] = this.requireSize(sprite.size, location);
    const ordered = sortRegions(sprite.regions ?? []);
    validateRegionOrder(ordered, diagnostics, location);

    const table = this.paletteOf(sprite);
    const background = lookup(table, sprite.background ?? BACKGROUND_TOKEN, diagnostics, location);
    const buffer = PixelBuffer.filled(width, height, background);

    const prior = new Map<string, PixelSet>();
    for (const region of ordered) {
      const regionLocation = { ...location, region: region.token };
      const pixels = rasterizeRegion(region, {
        width,
        height,
        prior,
        diagnostics,
        location: regionLocation,
      });
      prior.set(region.token, pixels);

      // Region tokens are unique, so an unknown token is reported exactly once.
      const color = lookup(table, region.token, diagnostics, regionLocation);
      for (const [x, y] of pixels) buffer.set(x, y, color);
    }
    return buffer;
  }

  private renderDerived(sprite: Sprite, sourceName: string, location: DiagnosticLocation): PixelBuffer {
    const source = this.session.catalog.sprites.get(sourceName);
    if (!source) {
      return this.session.diagnostics.fail("UnknownSprite", `source sprite '${sourceName}' is not defined`, location);
    }
    const base = this.renderCached(source);
    const ops = sprite.transforms ?? [];
    if (ops.length === 0) return base.clone();

    const table = sprite.palette ? this.paletteOf(sprite) : this.paletteOf(source);
    const ctx = { table, diagnostics: this.session.diagnostics, location };
    return ops.reduce((buf, op) => applyTransform(buf, op, ctx), base);
  }
}

function topLevel<T>(
  catalog: Catalog,
  options: Partial<RenderOptions> | undefined,
  body: (renderer: SpriteRenderer, session: RenderSession) => T,
): RenderResult<T> {
  const session = new RenderSession(catalog, options);
  return session.diagnostics.capture(() => body(new SpriteRenderer(session), session));
}

/**
 * Render one sprite. In strict mode any error-severity diagnostic yields
 * `{ ok: false }` with the collected diagnostics instead of a buffer.
 */
export function renderSprite(
  sprite: Sprite,
  catalog: Catalog,
  options?: Partial<RenderOptions>,
): RenderResult<PixelBuffer> {
  return topLevel(catalog, options, (renderer) => renderer.render(sprite));
}

/** Render a sprite and rescale it to `size` using its nine-slice margins. */
export function renderSpriteNineSlice(
  sprite: Sprite,
  catalog: Catalog,
  size: Size,
  options?: Partial<RenderOptions>,
): RenderResult<PixelBuffer> {
  return topLevel(catalog, options, (renderer, session) => {
    const location = { sprite: sprite.name };
    const margins = sprite.nineSlice;
    if (!margins) {
      return session.diagnostics.fail("StructuralError", "sprite declares no nine-slice margins", location);
    }
    const buffer = renderer.render(sprite);
    return renderNineSlice(buffer, margins, size[0], size[1], session.diagnostics, location);
  });
}
