import { colorsEqual } from "../color/Color.js";
import { lookup, type PaletteTable } from "../color/TokenResolver.js";
import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import type { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { Rgba, SpriteTransform } from "../model/types.js";
import { PixelBuffer } from "./PixelBuffer.js";

export interface TransformContext {
  /** Palette used to resolve recolor/outline tokens. */
  readonly table: PaletteTable;
  readonly diagnostics: DiagnosticCollector;
  readonly location: DiagnosticLocation;
}

export function mirrorBuffer(src: PixelBuffer, axis: "x" | "y"): PixelBuffer {
  const out = new PixelBuffer(src.width, src.height);
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) {
      const sx = axis === "x" ? src.width - 1 - x : x;
      const sy = axis === "y" ? src.height - 1 - y : y;
      out.set(x, y, src.get(sx, sy));
    }
  }
  return out;
}

/** Rotate clockwise by 90, 180 or 270 degrees. */
export function rotateBuffer(src: PixelBuffer, degrees: 90 | 180 | 270): PixelBuffer {
  const { width: w, height: h } = src;
  const out = degrees === 180 ? new PixelBuffer(w, h) : new PixelBuffer(h, w);
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const c = src.get(x, y);
      if (degrees === 90) out.set(h - 1 - y, x, c);
      else if (degrees === 180) out.set(w - 1 - x, h - 1 - y, c);
      else out.set(y, w - 1 - x, c);
    }
  }
  return out;
}

export function recolorBuffer(src: PixelBuffer, from: Rgba, to: Rgba): PixelBuffer {
  const out = src.clone();
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) {
      if (colorsEqual(src.get(x, y), from)) out.set(x, y, to);
    }
  }
  return out;
}

export function padBuffer(src: PixelBuffer, amount: number): PixelBuffer {
  const out = new PixelBuffer(src.width + amount * 2, src.height + amount * 2);
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) out.set(x + amount, y + amount, src.get(x, y));
  }
  return out;
}

/** Crop to a rectangle; the part outside the source reads as transparent. */
export function cropBuffer(src: PixelBuffer, x0: number, y0: number, w: number, h: number): PixelBuffer {
  const out = new PixelBuffer(w, h);
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      if (src.inBounds(x0 + x, y0 + y)) out.set(x, y, src.get(x0 + x, y0 + y));
    }
  }
  return out;
}

export function tileBuffer(src: PixelBuffer, columns: number, rows: number): PixelBuffer {
  const out = new PixelBuffer(src.width * columns, src.height * rows);
  for (let y = 0; y < out.height; y++) {
    for (let x = 0; x < out.width; x++) out.set(x, y, src.get(x % src.width, y % src.height));
  }
  return out;
}

/** Paint transparent pixels that touch an opaque pixel (4-connected) with `color`. */
export function outlineBuffer(src: PixelBuffer, color: Rgba): PixelBuffer {
  const out = src.clone();
  const opaque = (x: number, y: number): boolean => src.inBounds(x, y) && src.get(x, y).a > 0;
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) {
      if (opaque(x, y)) continue;
      if (opaque(x - 1, y) || opaque(x + 1, y) || opaque(x, y - 1) || opaque(x, y + 1)) out.set(x, y, color);
    }
  }
  return out;
}

function isQuarterTurn(degrees: number): degrees is 90 | 180 | 270 {
  return degrees === 90 || degrees === 180 || degrees === 270;
}

function requireCount(ctx: TransformContext, value: number, what: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    ctx.diagnostics.fail("StructuralError", `${what} must be an integer >= ${min}, got ${value}`, ctx.location);
  }
}

/** Apply one derivation op. Invalid parameters abort the render. */
export function applyTransform(src: PixelBuffer, op: SpriteTransform, ctx: TransformContext): PixelBuffer {
  switch (op.op) {
    case "mirror":
      return mirrorBuffer(src, op.axis);
    case "rotate": {
      const degrees = ((op.degrees % 360) + 360) % 360;
      if (degrees === 0) return src.clone();
      if (isQuarterTurn(degrees)) return rotateBuffer(src, degrees);
      return ctx.diagnostics.fail(
        "StructuralError",
        `rotation must be a multiple of 90 degrees, got ${op.degrees}`,
        ctx.location,
      );
    }
    case "recolor":
      return recolorBuffer(
        src,
        lookup(ctx.table, op.from, ctx.diagnostics, ctx.location),
        lookup(ctx.table, op.to, ctx.diagnostics, ctx.location),
      );
    case "pad":
      requireCount(ctx, op.amount, "pad amount", 0);
      return padBuffer(src, op.amount);
    case "crop":
      requireCount(ctx, op.x, "crop x", 0);
      requireCount(ctx, op.y, "crop y", 0);
      requireCount(ctx, op.w, "crop width", 1);
      requireCount(ctx, op.h, "crop height", 1);
      return cropBuffer(src, op.x, op.y, op.w, op.h);
    case "tile":
      requireCount(ctx, op.columns, "tile columns", 1);
      requireCount(ctx, op.rows, "tile rows", 1);
      return tileBuffer(src, op.columns, op.rows);
    case "outline":
      return outlineBuffer(src, lookup(ctx.table, op.token, ctx.diagnostics, ctx.location));
  }
}
