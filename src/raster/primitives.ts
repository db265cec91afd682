import type { Coord } from "../model/types.js";
import { type CoordSet, packCoord } from "./coords.js";

/*
 * Primitive scan conversion. Every function here is pure, takes already-validated
 * integer parameters and returns unbounded coordinates; clipping happens later.
 */

export function rasterizePoints(points: readonly Coord[]): CoordSet {
  const out: CoordSet = new Set();
  for (const [x, y] of points) out.add(packCoord(x, y));
  return out;
}

export function rasterizeRect(x: number, y: number, w: number, h: number): CoordSet {
  const out: CoordSet = new Set();
  for (let dy = 0; dy < h; dy++) {
    for (let dx = 0; dx < w; dx++) out.add(packCoord(x + dx, y + dy));
  }
  return out;
}

/**
 * Rectangle outline `thickness` pixels wide. With `round > 0`, each corner drops the
 * cells whose corner-local offsets sum to less than `round` and draws a diagonal band
 * `thickness` cells wide instead. `round` is capped at half the shorter side.
 */
export function rasterizeStroke(
  x: number,
  y: number,
  w: number,
  h: number,
  round = 0,
  thickness = 1,
): CoordSet {
  const out: CoordSet = new Set();
  if (thickness <= 0) return out;
  const r = Math.min(round, Math.floor(Math.min(w, h) / 2));
  for (let py = y; py < y + h; py++) {
    for (let px = x; px < x + w; px++) {
      const i = Math.min(px - x, x + w - 1 - px);
      const j = Math.min(py - y, y + h - 1 - py);
      const inCorner = i < r && j < r;
      const onStroke = inCorner ? i + j >= r && i + j < r + thickness : i < thickness || j < thickness;
      if (onStroke) out.add(packCoord(px, py));
    }
  }
  return out;
}

/**
 * Discrete line that moves one unit step at a time along x or y, so consecutive
 * cells are always 4-connected. Produces `|dx| + |dy| + 1` cells.
 */
export function rasterizeSegment(x0: number, y0: number, x1: number, y1: number): CoordSet {
  const out: CoordSet = new Set();
  const nx = Math.abs(x1 - x0);
  const ny = Math.abs(y1 - y0);
  const sx = x1 > x0 ? 1 : -1;
  const sy = y1 > y0 ? 1 : -1;
  let x = x0;
  let y = y0;
  out.add(packCoord(x, y));
  let ix = 0;
  let iy = 0;
  while (ix < nx || iy < ny) {
    // Step along whichever axis is further behind its share of the segment.
    if ((1 + 2 * ix) * ny < (1 + 2 * iy) * nx) {
      x += sx;
      ix++;
    } else {
      y += sy;
      iy++;
    }
    out.add(packCoord(x, y));
  }
  return out;
}

export function rasterizePolyline(points: readonly Coord[]): CoordSet {
  const out: CoordSet = new Set();
  const [first] = points;
  if (!first) return out;
  if (points.length === 1) {
    out.add(packCoord(first[0], first[1]));
    return out;
  }
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1];
    const b = points[i];
    if (!a || !b) continue;
    for (const k of rasterizeSegment(a[0], a[1], b[0], b[1])) out.add(k);
  }
  return out;
}

/**
 * Filled ellipse. A pixel belongs to it when its center, sampled at the integer
 * coordinate, satisfies `(x-cx)²/rx² + (y-cy)²/ry² <= 1`, evaluated in integers.
 * A zero radius collapses to a line through the center.
 */
export function rasterizeEllipse(cx: number, cy: number, rx: number, ry: number): CoordSet {
  const out: CoordSet = new Set();
  if (rx === 0 || ry === 0) {
    return rasterizeSegment(cx - rx, cy - ry, cx + rx, cy + ry);
  }
  const rx2 = rx * rx;
  const ry2 = ry * ry;
  const limit = rx2 * ry2;
  for (let dy = -ry; dy <= ry; dy++) {
    for (let dx = -rx; dx <= rx; dx++) {
      if (dx * dx * ry2 + dy * dy * rx2 <= limit) out.add(packCoord(cx + dx, cy + dy));
    }
  }
  return out;
}

/**
 * Even-odd scanline fill sampled on integer rows. Each edge counts its lower endpoint
 * but not its upper one, so a vertex shared by two edges is crossed once. Spans are
 * filled inclusively and the polygon's own edges are always included.
 */
export function rasterizePolygon(vertices: readonly Coord[]): CoordSet {
  const out: CoordSet = new Set();
  if (vertices.length < 3) return out;

  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const [, vy] of vertices) {
    minY = Math.min(minY, vy);
    maxY = Math.max(maxY, vy);
  }

  const n = vertices.length;
  for (let y = minY; y <= maxY; y++) {
    const crossings: number[] = [];
    for (let i = 0; i < n; i++) {
      const a = vertices[i];
      const b = vertices[(i + 1) % n];
      if (!a || !b) continue;
      const [x1, y1] = a;
      const [x2, y2] = b;
      if (y1 === y2) continue;
      if (y >= Math.min(y1, y2) && y < Math.max(y1, y2)) {
        crossings.push(x1 + Math.trunc(((y - y1) * (x2 - x1)) / (y2 - y1)));
      }
    }
    crossings.sort((p, q) => p - q);
    for (let i = 0; i + 1 < crossings.length; i += 2) {
      const from = crossings[i] ?? 0;
      const to = crossings[i + 1] ?? 0;
      for (let x = from; x <= to; x++) out.add(packCoord(x, y));
    }
  }

  const closed = [...vertices];
  const first = vertices[0];
  if (first) closed.push(first);
  for (const k of rasterizePolyline(closed)) out.add(k);
  return out;
}
