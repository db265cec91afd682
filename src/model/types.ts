/**
 * Input object graphs consumed by the engine. These are produced upstream by a
 * parser/resolver and are treated as read-only: nothing in this package mutates them.
 */

/** 8-bit-per-channel color. */
export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** A palette entry: either an already-resolved color or a CSS-style color string. */
export type ColorSpec = Rgba | string;

export type Coord = readonly [x: number, y: number];
export type Size = readonly [width: number, height: number];

export interface Palette {
  readonly name: string;
  readonly colors: Readonly<Record<string, ColorSpec>>;
}

export type PaletteRef =
  | { readonly kind: "named"; readonly name: string }
  | { readonly kind: "inline"; readonly colors: Readonly<Record<string, ColorSpec>> };

// ---- Shapes ----

export interface PointsShape {
  readonly kind: "points";
  readonly points: readonly Coord[];
}

export interface RectShape {
  readonly kind: "rect";
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

export interface StrokeShape {
  readonly kind: "stroke";
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
  /** Corner rounding radius. */
  readonly round?: number;
  /** Outline thickness in pixels (default 1). */
  readonly thickness?: number;
}

export interface LineShape {
  readonly kind: "line";
  readonly points: readonly Coord[];
}

export interface CircleShape {
  readonly kind: "circle";
  readonly cx: number;
  readonly cy: number;
  readonly r: number;
}

export interface EllipseShape {
  readonly kind: "ellipse";
  readonly cx: number;
  readonly cy: number;
  readonly rx: number;
  readonly ry: number;
}

export interface PolygonShape {
  readonly kind: "polygon";
  readonly points: readonly Coord[];
}

export interface UnionShape {
  readonly kind: "union";
  readonly shapes: readonly ShapeDef[];
}

export interface SubtractShape {
  readonly kind: "subtract";
  readonly base: ShapeDef;
  readonly shapes: readonly ShapeDef[];
}

export interface IntersectShape {
  readonly kind: "intersect";
  readonly shapes: readonly ShapeDef[];
}

/** Enclosed interior of earlier regions, minus the pixels of the `except` regions. */
export interface FillInsideShape {
  readonly kind: "fillInside";
  readonly boundary: readonly string[];
  readonly except?: readonly string[];
}

export type ShapeDef =
  | PointsShape
  | RectShape
  | StrokeShape
  | LineShape
  | CircleShape
  | EllipseShape
  | PolygonShape
  | UnionShape
  | SubtractShape
  | IntersectShape
  | FillInsideShape;

export type ShapeKind = ShapeDef["kind"];

// ---- Regions ----

export type SymmetryAxis = "x" | "y" | "both";

export interface RegionRange {
  /** Inclusive column range. */
  readonly x?: readonly [min: number, max: number];
  /** Inclusive row range. */
  readonly y?: readonly [min: number, max: number];
}

export interface RegionRepeat {
  readonly count: readonly [columns: number, rows: number];
  readonly spacing?: readonly [x: number, y: number];
  /** Shift every odd row of copies right by half a tile. */
  readonly offsetAlternate?: boolean;
}

export interface RegionJitter {
  readonly x?: readonly [min: number, max: number];
  readonly y?: readonly [min: number, max: number];
  readonly seed: number | string;
}

export interface Region {
  readonly token: string;
  readonly shape: ShapeDef;
  /** Draw order; ties keep declaration order. Default 0. */
  readonly z?: number;
  readonly symmetric?: SymmetryAxis;
  /** Tokens of earlier regions whose pixels are removed from this one. */
  readonly except?: readonly string[];
  readonly range?: RegionRange;
  readonly repeat?: RegionRepeat;
  readonly jitter?: RegionJitter;
}

// ---- Sprites ----

export interface NineSliceMargins {
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
}

export type SpriteTransform =
  | { readonly op: "mirror"; readonly axis: "x" | "y" }
  | { readonly op: "rotate"; readonly degrees: number }
  | { readonly op: "recolor"; readonly from: string; readonly to: string }
  | { readonly op: "pad"; readonly amount: number }
  | { readonly op: "crop"; readonly x: number; readonly y: number; readonly w: number; readonly h: number }
  | { readonly op: "tile"; readonly columns: number; readonly rows: number }
  | { readonly op: "outline"; readonly token: string };

export interface Sprite {
  readonly name: string;
  /** Required for region sprites; ignored for derived sprites. */
  readonly size?: Size;
  readonly palette?: PaletteRef;
  readonly regions?: readonly Region[];
  /** Background token, default `_`. */
  readonly background?: string;
  readonly nineSlice?: NineSliceMargins;
  /** Anchor metadata, not used for rendering. */
  readonly origin?: Coord;
  /** Derive from another sprite instead of drawing regions. */
  readonly source?: string;
  /** Applied in order after the source sprite is rendered. */
  readonly transforms?: readonly SpriteTransform[];
}

// ---- Compositions ----

export type BlendMode =
  | "normal"
  | "multiply"
  | "screen"
  | "overlay"
  | "darken"
  | "lighten"
  | "add"
  | "subtract"
  | "difference";

export interface FillLayer {
  readonly fill: string;
  readonly blend?: BlendMode;
  readonly opacity?: number;
}

export interface BaseLayer {
  readonly base: string;
  readonly opacity?: number;
}

export interface MapLayer {
  readonly map: readonly string[];
  readonly blend?: BlendMode;
  readonly opacity?: number;
}

export type Layer = FillLayer | BaseLayer | MapLayer;

export interface Composition {
  readonly name: string;
  readonly size: Size;
  readonly cellSize?: Size;
  /** Palette used by `fill` layers. */
  readonly palette?: PaletteRef;
  /** Map symbol → sprite name. */
  readonly sprites: Readonly<Record<string, string>>;
  readonly layers: readonly Layer[];
}

/**
 * Read-only name → definition tables owned by the caller and passed into every
 * top-level render call.
 */
export interface Catalog {
  readonly palettes: ReadonlyMap<string, Palette>;
  readonly sprites: ReadonlyMap<string, Sprite>;
  readonly compositions: ReadonlyMap<string, Composition>;
}

/** Build a catalog from plain arrays, keyed by each entry's name. */
export function createCatalog(entries: {
  palettes?: readonly Palette[];
  sprites?: readonly Sprite[];
  compositions?: readonly Composition[];
}): Catalog {
  return {
    palettes: new Map((entries.palettes ?? []).map((p) => [p.name, p])),
    sprites: new Map((entries.sprites ?? []).map((s) => [s.name, s])),
    compositions: new Map((entries.compositions ?? []).map((c) => [c.name, c])),
  };
}
