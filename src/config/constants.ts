import type { Rgba, Size } from "../model/types.js";

/** Reserved token meaning "background / transparent". */
export const BACKGROUND_TOKEN = "_";

/** Composition map character for an empty cell. */
export const EMPTY_CELL = ".";

/** Substituted for unknown tokens and unparseable colors. */
export const FALLBACK_COLOR: Rgba = Object.freeze({ r: 255, g: 0, b: 255, a: 255 });

export const TRANSPARENT: Rgba = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

/** Composition cell size when none is declared. */
export const DEFAULT_CELL_SIZE: Size = [1, 1];

/** Largest absolute shape coordinate accepted before clipping (keeps packed keys exact). */
export const MAX_COORDINATE = 1 << 20;

/** Default cap on nested composition / derived sprite depth. */
export const DEFAULT_MAX_DEPTH = 16;
