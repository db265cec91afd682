import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import type { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { Coord, Region, ShapeDef } from "../model/types.js";
import { type CoordSet, intersectAll, isRepresentable, subtractAll, unionAll } from "./coords.js";
import { enclosedInterior } from "./fillInside.js";
import { applyJitter, applyRange, applyRepeat } from "./modifiers.js";
import { PixelSet } from "./PixelSet.js";
import {
  rasterizeEllipse,
  rasterizePoints,
  rasterizePolygon,
  rasterizePolyline,
  rasterizeRect,
  rasterizeStroke,
} from "./primitives.js";

/** Everything a shape needs to know about the sprite it is drawn into. */
export interface RasterContext {
  readonly width: number;
  readonly height: number;
  /** Pixel sets of regions already rasterized, by token. */
  readonly prior: ReadonlyMap<string, PixelSet>;
  readonly diagnostics: DiagnosticCollector;
  readonly location: DiagnosticLocation;
}

function structural(ctx: RasterContext, message: string): never {
  return ctx.diagnostics.fail("StructuralError", message, ctx.location);
}

function requireInt(ctx: RasterContext, value: number, what: string): void {
  if (!isRepresentable(value)) structural(ctx, `${what} must be an integer coordinate, got ${value}`);
}

function requireNonNegative(ctx: RasterContext, value: number, what: string): void {
  requireInt(ctx, value, what);
  if (value < 0) structural(ctx, `${what} must not be negative, got ${value}`);
}

function requireCoords(ctx: RasterContext, points: readonly Coord[], what: string): void {
  for (const [x, y] of points) {
    requireInt(ctx, x, `${what} x`);
    requireInt(ctx, y, `${what} y`);
  }
}

function priorRegion(ctx: RasterContext, token: string, use: string): PixelSet {
  const set = ctx.prior.get(token);
  if (!set) {
    return ctx.diagnostics.fail(
      "ForwardReference",
      `${use} references region '${token}' before it is drawn`,
      ctx.location,
    );
  }
  return set;
}

function fillInside(ctx: RasterContext, boundary: readonly string[], except: readonly string[]): PixelSet {
  if (boundary.length === 0) structural(ctx, "fillInside needs at least one boundary region");
  let walls = new PixelSet(ctx.width, ctx.height);
  for (const token of boundary) walls = walls.union(priorRegion(ctx, token, "fillInside boundary"));
  let inside = enclosedInterior(walls);
  for (const token of except) inside = inside.subtract(priorRegion(ctx, token, "fillInside except"));
  return inside;
}

/** Evaluate a shape tree to unbounded coordinates. Malformed parameters abort the render. */
export function rasterizeShape(shape: ShapeDef, ctx: RasterContext): CoordSet {
  switch (shape.kind) {
    case "points":
      requireCoords(ctx, shape.points, "point");
      return rasterizePoints(shape.points);
    case "rect":
      requireInt(ctx, shape.x, "rect x");
      requireInt(ctx, shape.y, "rect y");
      requireNonNegative(ctx, shape.w, "rect width");
      requireNonNegative(ctx, shape.h, "rect height");
      return rasterizeRect(shape.x, shape.y, shape.w, shape.h);
    case "stroke":
      requireInt(ctx, shape.x, "stroke x");
      requireInt(ctx, shape.y, "stroke y");
      requireNonNegative(ctx, shape.w, "stroke width");
      requireNonNegative(ctx, shape.h, "stroke height");
      requireNonNegative(ctx, shape.round ?? 0, "stroke round");
      requireNonNegative(ctx, shape.thickness ?? 1, "stroke thickness");
      return rasterizeStroke(shape.x, shape.y, shape.w, shape.h, shape.round ?? 0, shape.thickness ?? 1);
    case "line":
      requireCoords(ctx, shape.points, "line point");
      return rasterizePolyline(shape.points);
    case "circle":
      requireInt(ctx, shape.cx, "circle cx");
      requireInt(ctx, shape.cy, "circle cy");
      requireNonNegative(ctx, shape.r, "circle radius");
      return rasterizeEllipse(shape.cx, shape.cy, shape.r, shape.r);
    case "ellipse":
      requireInt(ctx, shape.cx, "ellipse cx");
      requireInt(ctx, shape.cy, "ellipse cy");
      requireNonNegative(ctx, shape.rx, "ellipse rx");
      requireNonNegative(ctx, shape.ry, "ellipse ry");
      return rasterizeEllipse(shape.cx, shape.cy, shape.rx, shape.ry);
    case "polygon":
      requireCoords(ctx, shape.points, "polygon vertex");
      return rasterizePolygon(shape.points);
    case "union":
      return unionAll(shape.shapes.map((s) => rasterizeShape(s, ctx)));
    case "intersect":
      return intersectAll(shape.shapes.map((s) => rasterizeShape(s, ctx)));
    case "subtract":
      return subtractAll(
        rasterizeShape(shape.base, ctx),
        shape.shapes.map((s) => rasterizeShape(s, ctx)),
      );
    case "fillInside":
      return fillInside(ctx, shape.boundary, shape.except ?? []).toCoordSet();
  }
}

/** Clip to the canvas; `lost` holds points that were already too far out to pack. */
function clipToCanvas(coords: CoordSet, ctx: RasterContext, lost: readonly [number, number][] = []): PixelSet {
  const { set, dropped, firstDropped } = PixelSet.clip(coords, ctx.width, ctx.height);
  const far = new Map(lost.map(([x, y]): [string, [number, number]] => [`${x},${y}`, [x, y]]));
  let first = firstDropped;
  for (const point of far.values()) {
    if (!first || point[1] < first[1] || (point[1] === first[1] && point[0] < first[0])) first = point;
  }
  if (first) {
    const [x, y] = first;
    ctx.diagnostics.report(
      "OutOfBounds",
      `${dropped + far.size} pixel(s) outside the ${ctx.width}x${ctx.height} canvas were clipped`,
      { ...ctx.location, x, y },
    );
  }
  return set;
}

/** Rasterize a bare shape and clip it to the canvas. */
export function rasterize(shape: ShapeDef, ctx: RasterContext): PixelSet {
  return clipToCanvas(rasterizeShape(shape, ctx), ctx);
}

function validateModifiers(region: Region, ctx: RasterContext): void {
  const { repeat, jitter, range } = region;
  if (repeat) {
    requireNonNegative(ctx, repeat.count[0], "repeat columns");
    requireNonNegative(ctx, repeat.count[1], "repeat rows");
    requireNonNegative(ctx, repeat.spacing?.[0] ?? 0, "repeat spacing x");
    requireNonNegative(ctx, repeat.spacing?.[1] ?? 0, "repeat spacing y");
  }
  for (const [axis, span] of [
    ["jitter x", jitter?.x],
    ["jitter y", jitter?.y],
    ["range x", range?.x],
    ["range y", range?.y],
  ] as const) {
    if (!span) continue;
    requireInt(ctx, span[0], `${axis} min`);
    requireInt(ctx, span[1], `${axis} max`);
    if (span[0] > span[1]) structural(ctx, `${axis} min ${span[0]} exceeds max ${span[1]}`);
  }
}

/**
 * Full region pipeline: shape → jitter → repeat → clip → symmetry → range → except.
 * Symmetry lands before the set is stored, so later regions see the mirrored pixels.
 */
export function rasterizeRegion(region: Region, ctx: RasterContext): PixelSet {
  validateModifiers(region, ctx);
  const lost: [number, number][] = [];
  let coords = rasterizeShape(region.shape, ctx);
  if (region.jitter) coords = applyJitter(coords, region.jitter, lost);
  if (region.repeat) coords = applyRepeat(coords, region.repeat, lost);

  let pixels = clipToCanvas(coords, ctx, lost);
  if (region.symmetric) pixels = pixels.mirror(region.symmetric);
  if (region.range) pixels = applyRange(pixels, region.range);
  for (const token of region.except ?? []) pixels = pixels.subtract(priorRegion(ctx, token, "except"));
  return pixels;
}
