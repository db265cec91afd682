import { BACKGROUND_TOKEN, FALLBACK_COLOR, TRANSPARENT } from "../config/constants.js";
import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import type { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { Catalog, ColorSpec, PaletteRef, Rgba } from "../model/types.js";
import { ColorParseError, toRgba } from "./Color.js";

/** Flat token → color table for one sprite or composition. */
export type PaletteTable = ReadonlyMap<string, Rgba>;

export const EMPTY_TABLE: PaletteTable = new Map();

/** `{skin}` and `skin` name the same token. */
export function normalizeToken(token: string): string {
  return token.length > 2 && token.startsWith("{") && token.endsWith("}") ? token.slice(1, -1) : token;
}

function buildTable(
  colors: Readonly<Record<string, ColorSpec>>,
  diagnostics: DiagnosticCollector,
  location: DiagnosticLocation,
): PaletteTable {
  const table = new Map<string, Rgba>();
  for (const [rawToken, spec] of Object.entries(colors)) {
    const token = normalizeToken(rawToken);
    try {
      table.set(token, toRgba(spec));
    } catch (e) {
      if (!(e instanceof ColorParseError)) throw e;
      diagnostics.report("InvalidColor", `${e.message} for token '${token}', using magenta`, location);
      table.set(token, FALLBACK_COLOR);
    }
  }
  return table;
}

/**
 * Flatten a named or inline palette reference. A named palette missing from the
 * catalog yields an empty table and an `UnknownPalette` diagnostic.
 */
export function resolvePalette(
  ref: PaletteRef | undefined,
  catalog: Catalog,
  diagnostics: DiagnosticCollector,
  location: DiagnosticLocation,
): PaletteTable {
  if (!ref) return EMPTY_TABLE;
  if (ref.kind === "inline") return buildTable(ref.colors, diagnostics, location);

  const palette = catalog.palettes.get(ref.name);
  if (!palette) {
    diagnostics.report("UnknownPalette", `palette '${ref.name}' is not defined`, location);
    return EMPTY_TABLE;
  }
  return buildTable(palette.colors, diagnostics, location);
}

/**
 * Resolve a token without reporting. An absent background token reads as fully
 * transparent; any other absent token is `undefined`.
 */
export function findColor(table: PaletteTable, token: string): Rgba | undefined {
  const key = normalizeToken(token);
  const color = table.get(key);
  if (color) return color;
  return key === BACKGROUND_TOKEN ? TRANSPARENT : undefined;
}

/**
 * Resolve a token to its color. Unknown tokens resolve to magenta and raise
 * `UnknownToken` (warning when lenient, error when strict).
 */
export function lookup(
  table: PaletteTable,
  token: string,
  diagnostics: DiagnosticCollector,
  location: DiagnosticLocation,
): Rgba {
  const color = findColor(table, token);
  if (color) return color;
  diagnostics.report("UnknownToken", `token '${normalizeToken(token)}' is not in the palette`, location);
  return FALLBACK_COLOR;
}
