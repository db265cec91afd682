import alea from "alea";
import type { RegionJitter, RegionRange, RegionRepeat } from "../model/types.js";
import { addCoord, type CoordSet, unpackX, unpackY } from "./coords.js";
import type { PixelSet } from "./PixelSet.js";

/**
 * Offset every pixel by a seeded random amount within the jitter ranges (inclusive).
 * Pixels are visited in row-major order so the same seed always yields the same set.
 * Pixels moved past the packable range go to `lost`.
 */
export function applyJitter(coords: CoordSet, jitter: RegionJitter, lost: [number, number][] = []): CoordSet {
  const rng = alea(String(jitter.seed));
  const pick = (range: readonly [number, number] | undefined): number => {
    if (!range) return 0;
    const [min, max] = range;
    return min + Math.floor(rng() * (max - min + 1));
  };
  const out: CoordSet = new Set();
  for (const key of [...coords].sort((a, b) => a - b)) {
    const dx = pick(jitter.x);
    const dy = pick(jitter.y);
    addCoord(out, unpackX(key) + dx, unpackY(key) + dy, lost);
  }
  return out;
}

/**
 * Tile a pixel set by its bounding box `count` times in each direction, with optional
 * spacing. `offsetAlternate` shifts every odd row of copies right by half a tile.
 * The original tile is always kept, so a zero count leaves the set unchanged. Copies
 * past the packable range go to `lost`.
 */
export function applyRepeat(coords: CoordSet, repeat: RegionRepeat, lost: [number, number][] = []): CoordSet {
  if (coords.size === 0) return new Set();
  let minX = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const key of coords) {
    const x = unpackX(key);
    const y = unpackY(key);
    minX = Math.min(minX, x);
    maxX = Math.max(maxX, x);
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
  }
  const [nx, ny] = repeat.count;
  const [spaceX, spaceY] = repeat.spacing ?? [0, 0];
  const tileW = maxX - minX + 1 + spaceX;
  const tileH = maxY - minY + 1 + spaceY;

  const out: CoordSet = new Set(coords);
  for (let iy = 0; iy < ny; iy++) {
    const rowShift = repeat.offsetAlternate && iy % 2 === 1 ? Math.floor(tileW / 2) : 0;
    for (let ix = 0; ix < nx; ix++) {
      if (ix === 0 && iy === 0) continue;
      const ox = ix * tileW + rowShift;
      const oy = iy * tileH;
      for (const key of coords) addCoord(out, unpackX(key) + ox, unpackY(key) + oy, lost);
    }
  }
  return out;
}

/** Keep pixels inside the inclusive column/row ranges. */
export function applyRange(pixels: PixelSet, range: RegionRange): PixelSet {
  const { x: xr, y: yr } = range;
  return pixels.filter(
    (x, y) => (!xr || (x >= xr[0] && x <= xr[1])) && (!yr || (y >= yr[0] && y <= yr[1])),
  );
}
