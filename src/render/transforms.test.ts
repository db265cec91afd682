import { describe, expect, it } from "vitest";
import { RenderAbort } from "../diagnostics/Diagnostic.js";
import { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { SpriteTransform } from "../model/types.js";
import { bufferOf, COLORS, rowsOf } from "../test/pixels.js";
import { applyTransform, type TransformContext } from "./transforms.js";

function context(): TransformContext {
  const table = new Map(Object.entries(COLORS).filter(([k]) => k !== "."));
  return { table, diagnostics: new DiagnosticCollector(false), location: { sprite: "derived" } };
}

const src = bufferOf(["RG", "BW", "K."]);

function apply(op: SpriteTransform, ctx = context()): string[] {
  return rowsOf(applyTransform(src, op, ctx));
}

describe("applyTransform", () => {
  it("mirrors across either axis", () => {
    expect(apply({ op: "mirror", axis: "x" })).toEqual(["GR", "WB", ".K"]);
    expect(apply({ op: "mirror", axis: "y" })).toEqual(["K.", "BW", "RG"]);
  });

  it("rotates clockwise", () => {
    expect(apply({ op: "rotate", degrees: 90 })).toEqual(["KBR", ".WG"]);
    expect(apply({ op: "rotate", degrees: 180 })).toEqual([".K", "WB", "GR"]);
    expect(apply({ op: "rotate", degrees: 270 })).toEqual(["GW.", "RBK"]);
  });

  it("returns to the original after four quarter turns", () => {
    const ctx = context();
    let buf = src;
    for (let i = 0; i < 4; i++) buf = applyTransform(buf, { op: "rotate", degrees: 90 }, ctx);
    expect(rowsOf(buf)).toEqual(rowsOf(src));
  });

  it("rejects other angles", () => {
    const ctx = context();
    expect(() => applyTransform(src, { op: "rotate", degrees: 45 }, ctx)).toThrow(RenderAbort);
    expect(ctx.diagnostics.diagnostics[0]?.message).toBe("rotation must be a multiple of 90 degrees, got 45");
  });

  it("recolors exact matches only", () => {
    expect(apply({ op: "recolor", from: "R", to: "M" })).toEqual(["MG", "BW", "K."]);
  });

  it("reports an unknown recolor token and uses magenta", () => {
    const ctx = context();
    expect(apply({ op: "recolor", from: "G", to: "nope" }, ctx)).toEqual(["RM", "BW", "K."]);
    expect(ctx.diagnostics.diagnostics[0]?.kind).toBe("UnknownToken");
  });

  it("pads with transparent pixels", () => {
    expect(rowsOf(applyTransform(bufferOf(["R"]), { op: "pad", amount: 1 }, context()))).toEqual([
      "...",
      ".R.",
      "...",
    ]);
  });

  it("crops, reading outside the source as transparent", () => {
    expect(apply({ op: "crop", x: 1, y: 1, w: 2, h: 2 })).toEqual(["W.", ".."]);
  });

  it("tiles", () => {
    expect(rowsOf(applyTransform(bufferOf(["RG"]), { op: "tile", columns: 2, rows: 2 }, context()))).toEqual([
      "RGRG",
      "RGRG",
    ]);
  });

  it("outlines opaque pixels on transparent neighbors", () => {
    const dot = bufferOf(["...", ".R.", "..."]);
    expect(rowsOf(applyTransform(dot, { op: "outline", token: "K" }, context()))).toEqual([".K.", "KRK", ".K."]);
  });

  it("rejects invalid counts", () => {
    const ctx = context();
    expect(() => applyTransform(src, { op: "tile", columns: 0, rows: 1 }, ctx)).toThrow(RenderAbort);
    expect(ctx.diagnostics.diagnostics[0]?.message).toBe("tile columns must be an integer >= 1, got 0");
  });

  it("never modifies its input", () => {
    apply({ op: "recolor", from: "R", to: "M" });
    expect(rowsOf(src)).toEqual(["RG", "BW", "K."]);
  });
});
