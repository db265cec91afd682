import type { Rgba } from "../model/types.js";
import { PixelBuffer } from "../render/PixelBuffer.js";

/** Single-letter colors for building and reading small buffers in tests. */
export const COLORS: Readonly<Record<string, Rgba>> = {
  ".": { r: 0, g: 0, b: 0, a: 0 },
  R: { r: 255, g: 0, b: 0, a: 255 },
  G: { r: 0, g: 255, b: 0, a: 255 },
  B: { r: 0, g: 0, b: 255, a: 255 },
  W: { r: 255, g: 255, b: 255, a: 255 },
  K: { r: 0, g: 0, b: 0, a: 255 },
  M: { r: 255, g: 0, b: 255, a: 255 },
};

export function bufferOf(rows: readonly string[]): PixelBuffer {
  const width = rows[0]?.length ?? 0;
  const buf = new PixelBuffer(width, rows.length);
  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      const color = COLORS[row.charAt(x)];
      if (!color) throw new Error(`no test color for '${row.charAt(x)}'`);
      buf.set(x, y, color);
    }
  });
  return buf;
}

/** Inverse of `bufferOf`; colors without a letter read as `?`. */
export function rowsOf(buf: PixelBuffer): string[] {
  const rows: string[] = [];
  for (let y = 0; y < buf.height; y++) {
    let row = "";
    for (let x = 0; x < buf.width; x++) {
      const c = buf.get(x, y);
      const letter = Object.keys(COLORS).find((k) => {
        const known = COLORS[k];
        return known !== undefined && known.r === c.r && known.g === c.g && known.b === c.b && known.a === c.a;
      });
      row += letter ?? "?";
    }
    rows.push(row);
  }
  return rows;
}
