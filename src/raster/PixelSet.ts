import type { SymmetryAxis } from "../model/types.js";
import { type CoordSet, packCoord, unpackX, unpackY } from "./coords.js";

/** Result of clipping an unbounded coordinate set to the canvas. */
export interface ClipResult {
  set: PixelSet;
  dropped: number;
  /** First dropped coordinate in row-major order. */
  firstDropped: [number, number] | null;
}

/**
 * Canvas-sized bitset of pixel coordinates. Set operations return new sets;
 * nothing mutates a set after it has been handed to another region.
 */
export class PixelSet {
  readonly width: number;
  readonly height: number;
  private readonly bits: Uint8Array;

  constructor(width: number, height: number, bits?: Uint8Array) {
    this.width = width;
    this.height = height;
    this.bits = bits ?? new Uint8Array(width * height);
  }

  static fromCoords(coords: Iterable<readonly [number, number]>, width: number, height: number): PixelSet {
    const set = new PixelSet(width, height);
    for (const [x, y] of coords) {
      if (set.inBounds(x, y)) set.add(x, y);
    }
    return set;
  }

  /** Clip an unbounded set to `[0,w)×[0,h)`, counting what fell outside. */
  static clip(coords: CoordSet, width: number, height: number): ClipResult {
    const set = new PixelSet(width, height);
    let dropped = 0;
    let firstKey = Number.POSITIVE_INFINITY;
    for (const key of coords) {
      const x = unpackX(key);
      const y = unpackY(key);
      if (set.inBounds(x, y)) {
        set.add(x, y);
      } else {
        dropped++;
        if (key < firstKey) firstKey = key;
      }
    }
    const firstDropped: [number, number] | null = dropped > 0 ? [unpackX(firstKey), unpackY(firstKey)] : null;
    return { set, dropped, firstDropped };
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  has(x: number, y: number): boolean {
    return this.inBounds(x, y) && this.bits[y * this.width + x] === 1;
  }

  hasIndex(i: number): boolean {
    return this.bits[i] === 1;
  }

  add(x: number, y: number): void {
    this.bits[y * this.width + x] = 1;
  }

  get size(): number {
    let n = 0;
    for (const b of this.bits) n += b;
    return n;
  }

  isEmpty(): boolean {
    return this.bits.every((b) => b === 0);
  }

  clone(): PixelSet {
    return new PixelSet(this.width, this.height, this.bits.slice());
  }

  union(other: PixelSet): PixelSet {
    const out = this.clone();
    for (let i = 0; i < out.bits.length; i++) {
      if (other.bits[i] === 1) out.bits[i] = 1;
    }
    return out;
  }

  intersect(other: PixelSet): PixelSet {
    const out = new PixelSet(this.width, this.height);
    for (let i = 0; i < out.bits.length; i++) {
      if (this.bits[i] === 1 && other.bits[i] === 1) out.bits[i] = 1;
    }
    return out;
  }

  subtract(other: PixelSet): PixelSet {
    const out = this.clone();
    for (let i = 0; i < out.bits.length; i++) {
      if (other.bits[i] === 1) out.bits[i] = 0;
    }
    return out;
  }

  /** Keep only the pixels for which `keep` returns true. */
  filter(keep: (x: number, y: number) => boolean): PixelSet {
    const out = new PixelSet(this.width, this.height);
    for (const [x, y] of this) {
      if (keep(x, y)) out.add(x, y);
    }
    return out;
  }

  /**
   * Union with the reflection about the center column (`x`), center row (`y`),
   * or both. Idempotent.
   */
  mirror(axis: SymmetryAxis): PixelSet {
    const out = this.clone();
    const w = this.width;
    const h = this.height;
    for (const [x, y] of this) {
      if (axis === "x" || axis === "both") out.add(w - 1 - x, y);
      if (axis === "y" || axis === "both") out.add(x, h - 1 - y);
      if (axis === "both") out.add(w - 1 - x, h - 1 - y);
    }
    return out;
  }

  toCoordSet(): CoordSet {
    const out: CoordSet = new Set();
    for (const [x, y] of this) out.add(packCoord(x, y));
    return out;
  }

  /** Row-major iteration over member coordinates. */
  *[Symbol.iterator](): IterableIterator<[number, number]> {
    for (let i = 0; i < this.bits.length; i++) {
      if (this.bits[i] === 1) yield [i % this.width, Math.floor(i / this.width)];
    }
  }

  equals(other: PixelSet): boolean {
    if (this.width !== other.width || this.height !== other.height) return false;
    return this.bits.every((b, i) => b === other.bits[i]);
  }
}
