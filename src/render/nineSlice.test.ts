import { describe, expect, it } from "vitest";
import { RenderAbort } from "../diagnostics/Diagnostic.js";
import { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import { bufferOf, rowsOf } from "../test/pixels.js";
import { renderNineSlice } from "./nineSlice.js";

const frame = bufferOf(["RGGR", "GBBG", "GBBG", "RGGR"]);
const ones = { left: 1, right: 1, top: 1, bottom: 1 };

describe("renderNineSlice", () => {
  it("keeps corners and stretches edges and center", () => {
    const out = renderNineSlice(frame, ones, 6, 5, new DiagnosticCollector(false), {});
    expect(rowsOf(out)).toEqual(["RGGGGR", "GBBBBG", "GBBBBG", "GBBBBG", "RGGGGR"]);
  });

  it("leaves a same-size target unchanged", () => {
    const out = renderNineSlice(frame, ones, 4, 4, new DiagnosticCollector(false), {});
    expect(rowsOf(out)).toEqual(rowsOf(frame));
  });

  it("shrinks the center down to nothing", () => {
    const out = renderNineSlice(frame, ones, 2, 2, new DiagnosticCollector(false), {});
    expect(rowsOf(out)).toEqual(["RR", "RR"]);
  });

  it("rejects margins of half the dimension or more", () => {
    const diagnostics = new DiagnosticCollector(false);
    expect(() =>
      renderNineSlice(frame, { ...ones, left: 2 }, 8, 8, diagnostics, { sprite: "panel" }),
    ).toThrow(RenderAbort);
    expect(diagnostics.diagnostics).toEqual([
      {
        kind: "StructuralError",
        severity: "error",
        message: "nine-slice left/right margins (2, 1) must be less than half the width 4",
        location: { sprite: "panel" },
      },
    ]);
  });

  it("rejects a target smaller than the margins", () => {
    const diagnostics = new DiagnosticCollector(false);
    expect(() => renderNineSlice(frame, ones, 1, 4, diagnostics, {})).toThrow(RenderAbort);
    expect(diagnostics.diagnostics[0]?.message).toBe("nine-slice target 1x4 cannot hold margins 2x2");
  });
});
