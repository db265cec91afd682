import type { BlendMode, Rgba } from "../model/types.js";
import type { PixelBuffer } from "../render/PixelBuffer.js";

export const BLEND_MODES: readonly BlendMode[] = [
  "normal",
  "multiply",
  "screen",
  "overlay",
  "darken",
  "lighten",
  "add",
  "subtract",
  "difference",
];

const MODE_NAMES: ReadonlySet<string> = new Set<string>(BLEND_MODES);

const ALIASES: Readonly<Record<string, BlendMode>> = {
  additive: "add",
  subtractive: "subtract",
};

export function isBlendMode(value: string): value is BlendMode {
  return MODE_NAMES.has(value);
}

/** Case-insensitive blend mode name, accepting `additive`/`subtractive`. */
export function parseBlendMode(name: string): BlendMode | undefined {
  const key = name.trim().toLowerCase();
  if (isBlendMode(key)) return key;
  return ALIASES[key];
}

function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}

/** Per-channel blend of normalized source `s` over destination `d`. */
export function blendChannel(mode: BlendMode, s: number, d: number): number {
  switch (mode) {
    case "normal":
      return s;
    case "multiply":
      return s * d;
    case "screen":
      return 1 - (1 - s) * (1 - d);
    case "overlay":
      return d < 0.5 ? 2 * s * d : 1 - 2 * (1 - s) * (1 - d);
    case "darken":
      return Math.min(s, d);
    case "lighten":
      return Math.max(s, d);
    case "add":
      return clamp01(s + d);
    case "subtract":
      return clamp01(d - s);
    case "difference":
      return Math.abs(d - s);
  }
}

function toByte(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v * 255)));
}

/**
 * Composite one pixel. Every mode shares the same alpha envelope:
 * `outA = sa + da·(1-sa)` and `out = (B(s,d)·sa + d·da·(1-sa)) / outA`.
 * `opacity` scales the source alpha.
 */
export function compositePixel(src: Rgba, dst: Rgba, mode: BlendMode, opacity = 1): Rgba {
  const sa = (src.a / 255) * opacity;
  if (sa === 0) return dst;
  const da = dst.a / 255;
  const outA = sa + da * (1 - sa);
  if (outA === 0) return { r: 0, g: 0, b: 0, a: 0 };
  const channel = (sc: number, dc: number): number => {
    const s = sc / 255;
    const d = dc / 255;
    return toByte((blendChannel(mode, s, d) * sa + d * da * (1 - sa)) / outA);
  };
  return {
    r: channel(src.r, dst.r),
    g: channel(src.g, dst.g),
    b: channel(src.b, dst.b),
    a: toByte(outA),
  };
}

/** Composite `src` onto `dst` with its top-left at (ox, oy); parts off `dst` are skipped. */
export function blitBuffer(
  dst: PixelBuffer,
  src: PixelBuffer,
  ox: number,
  oy: number,
  mode: BlendMode = "normal",
  opacity = 1,
): void {
  for (let y = 0; y < src.height; y++) {
    for (let x = 0; x < src.width; x++) {
      const tx = ox + x;
      const ty = oy + y;
      if (!dst.inBounds(tx, ty)) continue;
      dst.set(tx, ty, compositePixel(src.get(x, y), dst.get(tx, ty), mode, opacity));
    }
  }
}

/** Composite a single color over every pixel of `dst`. */
export function fillBlend(dst: PixelBuffer, color: Rgba, mode: BlendMode = "normal", opacity = 1): void {
  for (let y = 0; y < dst.height; y++) {
    for (let x = 0; x < dst.width; x++) dst.set(x, y, compositePixel(color, dst.get(x, y), mode, opacity));
  }
}
