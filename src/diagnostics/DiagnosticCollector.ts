import {
  type Diagnostic,
  type DiagnosticKind,
  type DiagnosticLocation,
  isFatalKind,
  RenderAbort,
  type RenderResult,
} from "./Diagnostic.js";

/**
 * Ordered diagnostics for one render call. The strict flag is fixed at construction
 * and shared by every nested sprite/composition render in the call.
 */
export class DiagnosticCollector {
  readonly strict: boolean;
  private readonly items: Diagnostic[] = [];

  constructor(strict: boolean) {
    this.strict = strict;
  }

  /**
   * Record a recoverable condition. Severity follows the mode: warning when lenient,
   * error when strict. The caller continues with its fallback either way.
   */
  report(kind: DiagnosticKind, message: string, location: DiagnosticLocation): void {
    if (isFatalKind(kind)) this.fail(kind, message, location);
    this.items.push({ kind, severity: this.strict ? "error" : "warning", message, location });
  }

  /** Record a fatal condition and unwind to the top-level boundary. */
  fail(kind: DiagnosticKind, message: string, location: DiagnosticLocation): never {
    const diagnostic: Diagnostic = { kind, severity: "error", message, location };
    this.items.push(diagnostic);
    throw new RenderAbort(diagnostic);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  get count(): number {
    return this.items.length;
  }

  hasErrors(): boolean {
    return this.items.some((d) => d.severity === "error");
  }

  /**
   * Run a render body and convert its outcome into a result. A `RenderAbort` becomes
   * `{ ok: false }`; any error-severity diagnostic also withholds the value.
   */
  capture<T>(body: () => T): RenderResult<T> {
    let value: T;
    try {
      value = body();
    } catch (e) {
      if (e instanceof RenderAbort) return { ok: false, diagnostics: [...this.items] };
      throw e;
    }
    if (this.hasErrors()) return { ok: false, diagnostics: [...this.items] };
    return { ok: true, value, diagnostics: [...this.items] };
  }
}
