import { describe, expect, it } from "vitest";
import { formatDiagnostic, isFatalKind, RenderAbort } from "./Diagnostic.js";
import { DiagnosticCollector } from "./DiagnosticCollector.js";

describe("formatDiagnostic", () => {
  it("lists the location from the outside in", () => {
    expect(
      formatDiagnostic({
        kind: "UnknownToken",
        severity: "warning",
        message: "token 'typo' is not in the palette",
        location: { composition: "town", layer: 1, sprite: "hero", region: "{typo}", x: 3, y: 4 },
      }),
    ).toBe("warning[UnknownToken] composition town layer 1 sprite hero region {typo} (3,4): token 'typo' is not in the palette");
  });

  it("omits an empty location", () => {
    expect(formatDiagnostic({ kind: "StructuralError", severity: "error", message: "bad", location: {} })).toBe(
      "error[StructuralError]: bad",
    );
  });
});

describe("DiagnosticCollector", () => {
  it("only treats structural kinds as fatal", () => {
    expect(isFatalKind("ForwardReference")).toBe(true);
    expect(isFatalKind("StructuralError")).toBe(true);
    expect(isFatalKind("OutOfBounds")).toBe(false);
  });

  it("grades recoverable kinds by mode", () => {
    const lenient = new DiagnosticCollector(false);
    const strict = new DiagnosticCollector(true);
    lenient.report("SizeMismatch", "m", {});
    strict.report("SizeMismatch", "m", {});
    expect(lenient.diagnostics[0]?.severity).toBe("warning");
    expect(strict.diagnostics[0]?.severity).toBe("error");
    expect(lenient.hasErrors()).toBe(false);
  });

  it("aborts when a fatal kind is reported", () => {
    const diagnostics = new DiagnosticCollector(false);
    expect(() => diagnostics.report("StructuralError", "broken", {})).toThrow(RenderAbort);
    expect(diagnostics.count).toBe(1);
  });

  it("captures values, aborts and strict errors as results", () => {
    const ok = new DiagnosticCollector(false);
    expect(ok.capture(() => 7)).toEqual({ ok: true, value: 7, diagnostics: [] });

    const aborted = new DiagnosticCollector(false);
    const result = aborted.capture(() => aborted.fail("StructuralError", "broken", { sprite: "s" }));
    expect(result).toEqual({
      ok: false,
      diagnostics: [{ kind: "StructuralError", severity: "error", message: "broken", location: { sprite: "s" } }],
    });

    const strict = new DiagnosticCollector(true);
    const withheld = strict.capture(() => {
      strict.report("UnknownToken", "typo", {});
      return 1;
    });
    expect(withheld.ok).toBe(false);
  });

  it("lets unrelated exceptions through", () => {
    const diagnostics = new DiagnosticCollector(false);
    expect(() =>
      diagnostics.capture(() => {
        throw new TypeError("bug");
      }),
    ).toThrow(TypeError);
  });
});
