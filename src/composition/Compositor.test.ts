import { describe, expect, it } from "vitest";
import { rgba } from "../color/Color.js";
import type { Composition, Layer, ShapeDef, Sprite } from "../model/types.js";
import { createCatalog } from "../model/types.js";
import { rowsOf } from "../test/pixels.js";
import { renderComposition } from "./Compositor.js";

const whole = (w: number, h: number): ShapeDef => ({ kind: "rect", x: 0, y: 0, w, h });

function solid(name: string, token: string, size: [number, number] = [1, 1]): Sprite {
  return { name, size, palette: { kind: "named", name: "main" }, regions: [{ token, shape: whole(size[0], size[1]) }] };
}

const sprites: Sprite[] = [
  solid("solid_red", "red"),
  solid("solid_blue", "blue"),
  solid("big_green", "green", [2, 2]),
  solid("oops", "nonexistent"),
];

function comp(name: string, size: [number, number], layers: Layer[], extra: Partial<Composition> = {}): Composition {
  return {
    name,
    size,
    palette: { kind: "named", name: "main" },
    sprites: { A: "solid_red", B: "solid_blue", G: "big_green", O: "oops", Z: "ghost" },
    layers,
    ...extra,
  };
}

function catalogWith(...compositions: Composition[]) {
  return createCatalog({
    palettes: [{ name: "main", colors: { red: "#f00", blue: "#00f", green: "#0f0", white: "#fff" } }],
    sprites,
    compositions,
  });
}

function render(c: Composition, strict = false, ...others: Composition[]) {
  return renderComposition(c, catalogWith(c, ...others), { strict });
}

function pixels(c: Composition, ...others: Composition[]): string[] {
  const result = render(c, false, ...others);
  if (!result.ok) throw new Error(`render failed: ${result.diagnostics.map((d) => d.message).join("; ")}`);
  return rowsOf(result.value);
}

describe("renderComposition", () => {
  it("places sprites on the grid", () => {
    const c = comp("checker", [2, 2], [{ map: ["AB", "BA"] }]);
    const result = render(c);
    if (!result.ok) throw new Error("expected a buffer");
    expect(rowsOf(result.value)).toEqual(["RB", "BR"]);
    expect(result.diagnostics).toEqual([]);
  });

  it("starts transparent and skips empty cells", () => {
    expect(pixels(comp("sparse", [3, 1], [{ map: ["A.B"] }]))).toEqual(["R.B"]);
  });

  it("rejects a size not divisible by the cell size before drawing", () => {
    const c = comp("odd", [65, 64], [{ map: ["Z"] }], { cellSize: [32, 32] });
    const result = render(c);
    expect(result.ok).toBe(false);
    expect(result.diagnostics).toEqual([
      {
        kind: "StructuralError",
        severity: "error",
        message: "size 65x64 is not divisible by cell size 32x32",
        location: { composition: "odd" },
      },
    ]);
  });

  it("rejects ragged map rows", () => {
    const result = render(comp("ragged", [2, 2], [{ map: ["AB", "A"] }]));
    expect(result.ok).toBe(false);
    expect(result.diagnostics[0]?.message).toBe("map row 1 has length 1, expected 2");
  });

  it("rejects opacity outside [0, 1]", () => {
    const result = render(comp("glass", [1, 1], [{ fill: "red", opacity: 1.5 }]));
    expect(result.diagnostics[0]?.location).toEqual({ composition: "glass", layer: 0 });
    expect(result.ok).toBe(false);
  });

  describe("unknown symbols", () => {
    const c = comp("typo", [2, 2], [{ map: ["AX", "XA"] }]);

    it("leave the cell empty with one warning per symbol", () => {
      const result = render(c);
      if (!result.ok) throw new Error("expected a buffer");
      expect(rowsOf(result.value)).toEqual(["R.", ".R"]);
      expect(result.diagnostics).toEqual([
        {
          kind: "UnknownSymbol",
          severity: "warning",
          message: "symbol 'X' is not in the sprite table",
          location: { composition: "typo", layer: 0, x: 1, y: 0 },
        },
      ]);
    });

    it("fail the render in strict mode", () => {
      const result = render(c, true);
      expect(result.ok).toBe(false);
      expect(result.diagnostics.map((d) => d.severity)).toEqual(["error"]);
    });
  });

  it("reports a symbol naming a missing sprite once", () => {
    const result = render(comp("ghosts", [2, 1], [{ map: ["ZZ"] }]));
    expect(result.diagnostics.map((d) => [d.kind, d.message])).toEqual([
      ["UnknownSprite", "sprite 'ghost' is not defined"],
    ]);
  });

  it("pads or clips mismatched sprites with one warning per sprite", () => {
    const result = render(comp("fit", [2, 1], [{ map: ["GG"] }]));
    if (!result.ok) throw new Error("expected a buffer");
    expect(rowsOf(result.value)).toEqual(["GG"]);
    expect(result.diagnostics).toEqual([
      {
        kind: "SizeMismatch",
        severity: "warning",
        message: "sprite 'big_green' is 2x2, cell is 1x1",
        location: { composition: "fit", layer: 0, x: 0, y: 0 },
      },
    ]);
  });

  it("drops cells beyond the grid with one warning per layer", () => {
    const result = render(comp("wide", [2, 1], [{ map: ["AAA"] }, { map: ["BBB"] }]));
    if (!result.ok) throw new Error("expected a buffer");
    expect(rowsOf(result.value)).toEqual(["BB"]);
    expect(result.diagnostics.map((d) => [d.message, d.location])).toEqual([
      ["1 map cell(s) outside the 2x1 grid were dropped", { composition: "wide", layer: 0, x: 2, y: 0 }],
      ["1 map cell(s) outside the 2x1 grid were dropped", { composition: "wide", layer: 1, x: 2, y: 0 }],
    ]);
  });

  it("renders each sprite once per call", () => {
    const result = render(comp("repeat", [3, 1], [{ map: ["OOO"] }, { map: ["O.O"] }]));
    expect(result.diagnostics.map((d) => d.kind)).toEqual(["UnknownToken"]);
  });

  describe("layers", () => {
    it("floods a fill layer in the composition palette", () => {
      expect(pixels(comp("flood", [2, 1], [{ fill: "blue" }, { map: ["A."] }]))).toEqual(["RB"]);
    });

    it("applies the map layer blend mode", () => {
      expect(pixels(comp("tint", [2, 1], [{ fill: "white" }, { map: ["A."], blend: "multiply" }]))).toEqual([
        "RW",
      ]);
    });

    it("scales the layer by its opacity", () => {
      const result = render(comp("half", [1, 1], [{ fill: "blue" }, { map: ["A"], opacity: 0.5 }]));
      if (!result.ok) throw new Error("expected a buffer");
      expect(result.value.get(0, 0)).toEqual(rgba(128, 0, 128, 255));
    });

    it("embeds a sub-composition as a base layer", () => {
      const inner = comp("inner", [2, 1], [{ map: ["AB"] }]);
      const outer = comp("outer", [2, 1], [{ base: "inner" }, { map: ["B."] }]);
      expect(pixels(outer, inner)).toEqual(["BB"]);
    });

    it("skips a missing base with a warning", () => {
      const result = render(comp("lonely", [1, 1], [{ base: "nowhere" }]));
      expect(result.ok).toBe(true);
      expect(result.diagnostics.map((d) => [d.kind, d.message])).toEqual([
        ["UnknownSprite", "composition 'nowhere' is not defined"],
      ]);
    });

    it("rejects base cycles", () => {
      const x = comp("x", [1, 1], [{ base: "y" }]);
      const y = comp("y", [1, 1], [{ base: "x" }]);
      const result = render(x, false, y);
      expect(result.ok).toBe(false);
      expect(result.diagnostics[0]?.message).toBe("reference cycle: composition:x -> composition:y -> composition:x");
    });
  });
});
