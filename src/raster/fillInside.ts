import { PixelSet } from "./PixelSet.js";

/**
 * Cells enclosed by `walls`: flood (4-connected) from every non-wall cell on the
 * canvas edge; whatever non-wall cell the flood never reaches is inside.
 * A wall touching the canvas edge therefore encloses nothing on that side.
 */
export function enclosedInterior(walls: PixelSet): PixelSet {
  const { width: w, height: h } = walls;
  const outside = new Uint8Array(w * h);
  const stack: number[] = [];

  const seed = (x: number, y: number): void => {
    const i = y * w + x;
    if (outside[i] === 1 || walls.hasIndex(i)) return;
    outside[i] = 1;
    stack.push(i);
  };

  for (let x = 0; x < w; x++) {
    seed(x, 0);
    seed(x, h - 1);
  }
  for (let y = 0; y < h; y++) {
    seed(0, y);
    seed(w - 1, y);
  }

  while (stack.length > 0) {
    const i = stack.pop() ?? 0;
    const x = i % w;
    const y = Math.floor(i / w);
    if (x > 0) seed(x - 1, y);
    if (x < w - 1) seed(x + 1, y);
    if (y > 0) seed(x, y - 1);
    if (y < h - 1) seed(x, y + 1);
  }

  const inside = new PixelSet(w, h);
  for (let i = 0; i < w * h; i++) {
    if (outside[i] === 0 && !walls.hasIndex(i)) inside.add(i % w, Math.floor(i / w));
  }
  return inside;
}
