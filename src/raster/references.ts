import type { DiagnosticLocation } from "../diagnostics/Diagnostic.js";
import type { DiagnosticCollector } from "../diagnostics/DiagnosticCollector.js";
import type { Region, ShapeDef } from "../model/types.js";

/** Region tokens a shape tree reads from other regions. */
export function shapeReferences(shape: ShapeDef): string[] {
  switch (shape.kind) {
    case "fillInside":
      return [...shape.boundary, ...(shape.except ?? [])];
    case "union":
    case "intersect":
      return shape.shapes.flatMap(shapeReferences);
    case "subtract":
      return [...shapeReferences(shape.base), ...shape.shapes.flatMap(shapeReferences)];
    default:
      return [];
  }
}

/** Tokens a region depends on: shape references plus its `except` list. */
export function regionReferences(region: Region): string[] {
  return [...shapeReferences(region.shape), ...(region.except ?? [])];
}

/** Draw order: `z` ascending, then declaration order. */
export function sortRegions(regions: readonly Region[]): Region[] {
  return regions
    .map((region, index) => ({ region, index }))
    .sort((a, b) => (a.region.z ?? 0) - (b.region.z ?? 0) || a.index - b.index)
    .map((e) => e.region);
}

/**
 * Check every cross-region reference against draw order before any pixel work.
 * Referencing a region drawn later (or itself) is a `ForwardReference`; referencing
 * a token no region declares, or declaring a token twice, is a `StructuralError`.
 */
export function validateRegionOrder(
  ordered: readonly Region[],
  diagnostics: DiagnosticCollector,
  location: DiagnosticLocation,
): void {
  const declared = new Set<string>();
  for (const region of ordered) {
    if (declared.has(region.token)) {
      diagnostics.fail("StructuralError", `region '${region.token}' is declared more than once`, {
        ...location,
        region: region.token,
      });
    }
    declared.add(region.token);
  }

  const drawn = new Set<string>();
  for (const region of ordered) {
    for (const ref of regionReferences(region)) {
      if (drawn.has(ref)) continue;
      const where = { ...location, region: region.token };
      if (declared.has(ref)) {
        diagnostics.fail("ForwardReference", `region '${region.token}' uses '${ref}' before it is drawn`, where);
      }
      diagnostics.fail("StructuralError", `region '${region.token}' references undeclared region '${ref}'`, where);
    }
    drawn.add(region.token);
  }
}
