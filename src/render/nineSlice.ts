import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import type { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { NineSliceMargins } from "../model/types.js";
import { PixelBuffer } from "./PixelBuffer.js";

/** Nearest-neighbor source offset for destination offset `d` in a strip of `dstLen`. */
function sample(d: number, srcLen: number, dstLen: number): number {
  return Math.floor((d * srcLen) / dstLen);
}

/**
 * Map one destination axis onto the source: the leading and trailing margins copy
 * 1:1, the middle is stretched by nearest neighbor.
 */
function axisMap(srcLen: number, dstLen: number, lead: number, trail: number): number[] {
  const srcMid = srcLen - lead - trail;
  const dstMid = dstLen - lead - trail;
  const map = new Array<number>(dstLen);
  for (let d = 0; d < dstLen; d++) {
    if (d < lead) map[d] = d;
    else if (d >= dstLen - trail) map[d] = srcLen - (dstLen - d);
    else map[d] = lead + sample(d - lead, srcMid, dstMid);
  }
  return map;
}

/**
 * Rescale a buffer to `width×height`, keeping corners unscaled, stretching edge strips
 * along their long axis and the center along both. Each margin must be less than half
 * of its dimension and the target must fit both margins; otherwise the render aborts.
 */
export function renderNineSlice(
  src: PixelBuffer,
  margins: NineSliceMargins,
  width: number,
  height: number,
  diagnostics: DiagnosticCollector,
  location: DiagnosticLocation,
): PixelBuffer {
  const { left, right, top, bottom } = margins;
  const fail = (message: string): never => diagnostics.fail("StructuralError", message, location);

  const named: [string, number][] = [
    ["left", left],
    ["right", right],
    ["top", top],
    ["bottom", bottom],
  ];
  for (const [name, value] of named) {
    if (!Number.isInteger(value) || value < 0) fail(`nine-slice ${name} must be a non-negative integer`);
  }
  if (left * 2 >= src.width || right * 2 >= src.width) {
    fail(`nine-slice left/right margins (${left}, ${right}) must be less than half the width ${src.width}`);
  }
  if (top * 2 >= src.height || bottom * 2 >= src.height) {
    fail(`nine-slice top/bottom margins (${top}, ${bottom}) must be less than half the height ${src.height}`);
  }
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < left + right || height < top + bottom) {
    fail(`nine-slice target ${width}x${height} cannot hold margins ${left + right}x${top + bottom}`);
  }

  const xs = axisMap(src.width, width, left, right);
  const ys = axisMap(src.height, height, top, bottom);
  const out = new PixelBuffer(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) out.set(x, y, src.get(xs[x] ?? 0, ys[y] ?? 0));
  }
  return out;
}
