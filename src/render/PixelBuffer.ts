import type { Rgba } from "../model/types.js";

/** Row-major RGBA8 image owned by the caller of a render. */
export class PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number, data?: Uint8ClampedArray) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`invalid buffer size ${width}x${height}`);
    }
    if (data && data.length !== width * height * 4) {
      throw new RangeError(`buffer data length ${data.length} does not match ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8ClampedArray(width * height * 4);
  }

  static filled(width: number, height: number, color: Rgba): PixelBuffer {
    const buf = new PixelBuffer(width, height);
    buf.fill(color);
    return buf;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  get(x: number, y: number): Rgba {
    const i = (y * this.width + x) * 4;
    const d = this.data;
    return { r: d[i] ?? 0, g: d[i + 1] ?? 0, b: d[i + 2] ?? 0, a: d[i + 3] ?? 0 };
  }

  set(x: number, y: number, c: Rgba): void {
    const i = (y * this.width + x) * 4;
    this.data[i] = c.r;
    this.data[i + 1] = c.g;
    this.data[i + 2] = c.b;
    this.data[i + 3] = c.a;
  }

  fill(c: Rgba): void {
    for (let i = 0; i < this.data.length; i += 4) {
      this.data[i] = c.r;
      this.data[i + 1] = c.g;
      this.data[i + 2] = c.b;
      this.data[i + 3] = c.a;
    }
  }

  clone(): PixelBuffer {
    return new PixelBuffer(this.width, this.height, this.data.slice());
  }

  /**
   * Copy into a new `width×height` buffer anchored at the top-left: larger targets
   * are padded with transparent pixels, smaller ones clip the right/bottom.
   */
  resizeCanvas(width: number, height: number): PixelBuffer {
    const out = new PixelBuffer(width, height);
    const w = Math.min(width, this.width);
    const h = Math.min(height, this.height);
    for (let y = 0; y < h; y++) {
      const src = y * this.width * 4;
      out.data.set(this.data.subarray(src, src + w * 4), y * width * 4);
    }
    return out;
  }
}
