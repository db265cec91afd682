import type { ColorSpec, Rgba } from "../model/types.js";

export class ColorParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`invalid color '${input}': ${reason}`);
    this.name = "ColorParseError";
    this.input = input;
  }
}

const NAMED_COLORS: ReadonlyMap<string, Rgba> = new Map(
  Object.entries({
    transparent: { r: 0, g: 0, b: 0, a: 0 },
    black: { r: 0, g: 0, b: 0, a: 255 },
    white: { r: 255, g: 255, b: 255, a: 255 },
    red: { r: 255, g: 0, b: 0, a: 255 },
    lime: { r: 0, g: 255, b: 0, a: 255 },
    green: { r: 0, g: 128, b: 0, a: 255 },
    blue: { r: 0, g: 0, b: 255, a: 255 },
    yellow: { r: 255, g: 255, b: 0, a: 255 },
    cyan: { r: 0, g: 255, b: 255, a: 255 },
    magenta: { r: 255, g: 0, b: 255, a: 255 },
    gray: { r: 128, g: 128, b: 128, a: 255 },
    grey: { r: 128, g: 128, b: 128, a: 255 },
    orange: { r: 255, g: 165, b: 0, a: 255 },
    purple: { r: 128, g: 0, b: 128, a: 255 },
    brown: { r: 165, g: 42, b: 42, a: 255 },
    pink: { r: 255, g: 192, b: 203, a: 255 },
  }),
);

export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return { r, g, b, a };
}

export function colorsEqual(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

function hex2(n: number): string {
  return n.toString(16).padStart(2, "0");
}

/** `#rrggbbaa`, lowercase. */
export function toHex(c: Rgba): string {
  return `#${hex2(c.r)}${hex2(c.g)}${hex2(c.b)}${hex2(c.a)}`;
}

function clampByte(n: number): number {
  return Math.max(0, Math.min(255, Math.round(n)));
}

function isValidChannel(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n <= 255;
}

function parseHex(input: string): Rgba {
  const hex = input.slice(1);
  if (!/^[0-9a-fA-F]*$/.test(hex)) throw new ColorParseError(input, "non-hex digit");
  const digit = (i: number): number => Number.parseInt(hex.charAt(i), 16) * 17;
  const pair = (i: number): number => Number.parseInt(hex.slice(i, i + 2), 16);
  switch (hex.length) {
    case 3:
      return rgba(digit(0), digit(1), digit(2));
    case 4:
      return rgba(digit(0), digit(1), digit(2), digit(3));
    case 6:
      return rgba(pair(0), pair(2), pair(4));
    case 8:
      return rgba(pair(0), pair(2), pair(4), pair(6));
    default:
      throw new ColorParseError(input, `expected 3, 4, 6 or 8 hex digits, got ${hex.length}`);
  }
}

/** Split `fn(a, b, c / d)` or `fn(a b c / d)` arguments. */
function functionArgs(input: string, body: string): string[] {
  const args = body
    .replace("/", " ")
    .split(/[\s,]+/)
    .filter((s) => s.length > 0);
  if (args.length < 3 || args.length > 4) {
    throw new ColorParseError(input, `expected 3 or 4 arguments, got ${args.length}`);
  }
  return args;
}

function parseNumber(input: string, raw: string): number {
  const n = Number(raw);
  if (raw.length === 0 || Number.isNaN(n)) throw new ColorParseError(input, `bad number '${raw}'`);
  return n;
}

/** Alpha argument: `0.5` or `50%`. */
function parseAlpha(input: string, raw: string | undefined): number {
  if (raw === undefined) return 255;
  if (raw.endsWith("%")) return clampByte((parseNumber(input, raw.slice(0, -1)) / 100) * 255);
  return clampByte(parseNumber(input, raw) * 255);
}

function parseRgbFunction(input: string, body: string): Rgba {
  const [r = "", g = "", b = "", a] = functionArgs(input, body);
  const channel = (raw: string): number =>
    raw.endsWith("%")
      ? clampByte((parseNumber(input, raw.slice(0, -1)) / 100) * 255)
      : clampByte(parseNumber(input, raw));
  return rgba(channel(r), channel(g), channel(b), parseAlpha(input, a));
}

function hslToRgb(h: number, s: number, l: number): [number, number, number] {
  const hue = ((h % 360) + 360) % 360;
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = l - c / 2;
  let rgb: [number, number, number];
  if (hue < 60) rgb = [c, x, 0];
  else if (hue < 120) rgb = [x, c, 0];
  else if (hue < 180) rgb = [0, c, x];
  else if (hue < 240) rgb = [0, x, c];
  else if (hue < 300) rgb = [x, 0, c];
  else rgb = [c, 0, x];
  return [clampByte((rgb[0] + m) * 255), clampByte((rgb[1] + m) * 255), clampByte((rgb[2] + m) * 255)];
}

function parseHslFunction(input: string, body: string): Rgba {
  const [h = "", s = "", l = "", a] = functionArgs(input, body);
  const percent = (raw: string): number => {
    if (!raw.endsWith("%")) throw new ColorParseError(input, `expected percentage, got '${raw}'`);
    return Math.max(0, Math.min(1, parseNumber(input, raw.slice(0, -1)) / 100));
  };
  const hue = parseNumber(input, h.endsWith("deg") ? h.slice(0, -3) : h);
  const [r, g, b] = hslToRgb(hue, percent(s), percent(l));
  return rgba(r, g, b, parseAlpha(input, a));
}

/**
 * Parse a color string: `#RGB`, `#RGBA`, `#RRGGBB`, `#RRGGBBAA`, `rgb()`, `rgba()`,
 * `hsl()`, `hsla()` or a basic CSS color name.
 */
export function parseColor(input: string): Rgba {
  const s = input.trim();
  if (s.length === 0) throw new ColorParseError(input, "empty color string");
  if (s.startsWith("#")) return parseHex(s);

  const fn = /^(rgba?|hsla?)\((.*)\)$/i.exec(s);
  if (fn) {
    const name = (fn[1] ?? "").toLowerCase();
    const body = fn[2] ?? "";
    return name.startsWith("rgb") ? parseRgbFunction(input, body) : parseHslFunction(input, body);
  }

  const named = NAMED_COLORS.get(s.toLowerCase());
  if (named) return named;
  throw new ColorParseError(input, "unrecognized format");
}

/** Resolve a palette entry to a concrete color. Throws `ColorParseError`. */
export function toRgba(spec: ColorSpec): Rgba {
  if (typeof spec === "string") return parseColor(spec);
  if (!isValidChannel(spec.r) || !isValidChannel(spec.g) || !isValidChannel(spec.b) || !isValidChannel(spec.a)) {
    throw new ColorParseError(JSON.stringify(spec), "channels must be integers in 0..255");
  }
  return { r: spec.r, g: spec.g, b: spec.b, a: spec.a };
}
