import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

let logPath: string | null = null;

/** Also append log lines to `<dir>/tokensprite.log`. Pass null to go back to stderr only. */
export function initEngineLog(dir: string | null): void {
  if (dir === null || dir === "") {
    logPath = null;
    return;
  }
  mkdirSync(dir, { recursive: true });
  logPath = join(dir, "tokensprite.log");
}

export function engineLogPath(): string | null {
  return logPath;
}

function timestamp(): string {
  return new Date().toISOString();
}

function write(line: string): void {
  console.error(line);
  if (logPath) {
    try {
      appendFileSync(logPath, `${line}\n`);
    } catch (err) {
      // stderr only from here on
      console.error(`${timestamp()} [tokensprite] log file disabled: ${String(err)}`);
      logPath = null;
    }
  }
}

/** Log an informational message to stderr and the log file. */
export function engineLog(msg: string): void {
  write(`${timestamp()} [tokensprite] ${msg}`);
}

/** Log an error (with stack trace) to stderr and the log file. */
export function engineLogError(label: string, err: unknown): void {
  const msg = err instanceof Error ? `${err.message}\n${err.stack}` : String(err);
  write(`${timestamp()} [tokensprite] ${label}: ${msg}`);
}
