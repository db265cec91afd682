/** Every condition the engine can report. */
export type DiagnosticKind =
  | "UnknownToken"
  | "UnknownPalette"
  | "InvalidColor"
  | "UnknownSymbol"
  | "UnknownSprite"
  | "OutOfBounds"
  | "SizeMismatch"
  | "ForwardReference"
  | "StructuralError";

export type Severity = "warning" | "error";

/** Kinds that mean the input graph itself is malformed. Always abort, in either mode. */
const FATAL_KINDS: ReadonlySet<DiagnosticKind> = new Set(["ForwardReference", "StructuralError"]);

export function isFatalKind(kind: DiagnosticKind): boolean {
  return FATAL_KINDS.has(kind);
}

export interface DiagnosticLocation {
  readonly sprite?: string;
  readonly composition?: string;
  readonly region?: string;
  readonly layer?: number;
  readonly x?: number;
  readonly y?: number;
}

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: Severity;
  readonly message: string;
  readonly location: DiagnosticLocation;
}

/** Outcome of a top-level render call. No exception crosses this boundary. */
export type RenderResult<T> =
  | { readonly ok: true; readonly value: T; readonly diagnostics: readonly Diagnostic[] }
  | { readonly ok: false; readonly diagnostics: readonly Diagnostic[] };

/** Thrown inside a render call to unwind to the top-level boundary. */
export class RenderAbort extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "RenderAbort";
    this.diagnostic = diagnostic;
  }
}

function formatLocation(loc: DiagnosticLocation): string {
  const parts: string[] = [];
  if (loc.composition !== undefined) parts.push(`composition ${loc.composition}`);
  if (loc.layer !== undefined) parts.push(`layer ${loc.layer}`);
  if (loc.sprite !== undefined) parts.push(`sprite ${loc.sprite}`);
  if (loc.region !== undefined) parts.push(`region ${loc.region}`);
  if (loc.x !== undefined && loc.y !== undefined) parts.push(`(${loc.x},${loc.y})`);
  return parts.join(" ");
}

/** One-line rendering for callers that present diagnostics (CLI, logs). */
export function formatDiagnostic(d: Diagnostic): string {
  const where = formatLocation(d.location);
  return where
    ? `${d.severity}[${d.kind}] ${where}: ${d.message}`
    : `${d.severity}[${d.kind}]: ${d.message}`;
}
