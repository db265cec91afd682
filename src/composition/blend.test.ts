import { describe, expect, it } from "vitest";
import { rgba } from "../color/Color.js";
import type { BlendMode } from "../model/types.js";
import { bufferOf, rowsOf } from "../test/pixels.js";
import { BLEND_MODES, blitBuffer, compositePixel, fillBlend, parseBlendMode } from "./blend.js";

describe("parseBlendMode", () => {
  it("accepts mode names in any case", () => {
    expect(parseBlendMode("  MULTIPLY ")).toBe("multiply");
    expect(parseBlendMode("difference")).toBe("difference");
  });

  it("accepts additive/subtractive aliases", () => {
    expect(parseBlendMode("Additive")).toBe("add");
    expect(parseBlendMode("subtractive")).toBe("subtract");
  });

  it("returns undefined for anything else", () => {
    expect(parseBlendMode("dodge")).toBeUndefined();
  });
});

describe("compositePixel", () => {
  const red = rgba(255, 0, 0);
  const blue = rgba(0, 0, 255);

  it("lets an opaque normal source fully replace any destination", () => {
    for (const dst of [blue, rgba(10, 20, 30, 40), rgba(0, 0, 0, 0)]) {
      expect(compositePixel(red, dst, "normal")).toEqual(red);
    }
  });

  it("leaves the destination alone under a fully transparent source", () => {
    for (const mode of BLEND_MODES) {
      expect(compositePixel(rgba(255, 255, 255, 0), blue, mode)).toEqual(blue);
    }
  });

  it("mixes half-transparent normal over opaque", () => {
    expect(compositePixel(rgba(255, 0, 0, 128), blue, "normal")).toEqual(rgba(128, 0, 127, 255));
  });

  it("keeps the source color over a transparent destination", () => {
    expect(compositePixel(rgba(255, 0, 0, 128), rgba(0, 0, 0, 0), "normal")).toEqual(rgba(255, 0, 0, 128));
  });

  it("scales source alpha by opacity", () => {
    expect(compositePixel(red, rgba(0, 0, 0, 0), "normal", 0.5)).toEqual(rgba(255, 0, 0, 128));
    expect(compositePixel(red, blue, "normal", 0)).toEqual(blue);
  });

  it.each<[BlendMode, number, number, number]>([
    ["multiply", 128, 200, 100],
    ["screen", 128, 128, 192],
    ["darken", 90, 60, 60],
    ["lighten", 90, 60, 90],
    ["add", 100, 200, 255],
    ["subtract", 100, 200, 100],
    ["subtract", 200, 100, 0],
    ["difference", 50, 200, 150],
    ["overlay", 255, 0, 0],
    ["overlay", 0, 255, 255],
  ])("%s of %i over %i gives %i on opaque pixels", (mode, s, d, expected) => {
    const out = compositePixel(rgba(s, s, s), rgba(d, d, d), mode);
    expect(out).toEqual(rgba(expected, expected, expected));
  });
});

describe("buffer helpers", () => {
  it("blits at an offset and skips what falls outside", () => {
    const dst = bufferOf(["...", "..."]);
    blitBuffer(dst, bufferOf(["RG", "BW"]), 2, 1);
    expect(rowsOf(dst)).toEqual(["...", "..R"]);
  });

  it("fills every pixel through the blend", () => {
    const dst = bufferOf(["RW"]);
    fillBlend(dst, rgba(0, 0, 255), "multiply");
    expect(rowsOf(dst)).toEqual(["KB"]);
  });
});
