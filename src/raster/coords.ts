import { MAX_COORDINATE } from "../config/constants.js";

/**
 * Unbounded coordinate set used while a shape tree is being evaluated, before it is
 * clipped to the canvas. Coordinates are packed into a single safe integer.
 */
export type CoordSet = Set<number>;

const SPAN = MAX_COORDINATE * 2;

/** Pack (x, y) into one key. Handles coords in [-MAX_COORDINATE, MAX_COORDINATE). */
export function packCoord(x: number, y: number): number {
  return (y + MAX_COORDINATE) * SPAN + (x + MAX_COORDINATE);
}

export function unpackX(key: number): number {
  return (key % SPAN) - MAX_COORDINATE;
}

export function unpackY(key: number): number {
  return Math.floor(key / SPAN) - MAX_COORDINATE;
}

export function isRepresentable(n: number): boolean {
  return Number.isInteger(n) && n >= -MAX_COORDINATE && n < MAX_COORDINATE;
}

/**
 * Add (x, y) to `set`, or push it onto `lost` when it has no packed key. Lost points
 * are always off the canvas and only count towards `OutOfBounds`.
 */
export function addCoord(set: CoordSet, x: number, y: number, lost: [number, number][]): void {
  if (isRepresentable(x) && isRepresentable(y)) set.add(packCoord(x, y));
  else lost.push([x, y]);
}

export function coordSetOf(points: Iterable<readonly [number, number]>): CoordSet {
  const set: CoordSet = new Set();
  for (const [x, y] of points) set.add(packCoord(x, y));
  return set;
}

export function unionAll(sets: readonly CoordSet[]): CoordSet {
  const out: CoordSet = new Set();
  for (const s of sets) for (const k of s) out.add(k);
  return out;
}

export function intersectAll(sets: readonly CoordSet[]): CoordSet {
  const [first, ...rest] = sets;
  if (!first) return new Set();
  const out: CoordSet = new Set();
  for (const k of first) {
    if (rest.every((s) => s.has(k))) out.add(k);
  }
  return out;
}

export function subtractAll(base: CoordSet, removals: readonly CoordSet[]): CoordSet {
  const out: CoordSet = new Set();
  for (const k of base) {
    if (!removals.some((s) => s.has(k))) out.add(k);
  }
  return out;
}

/** Sorted (row-major) list of coordinates, for stable iteration and tests. */
export function sortedCoords(set: CoordSet): [number, number][] {
  return [...set].sort((a, b) => a - b).map((k) => [unpackX(k), unpackY(k)]);
}
