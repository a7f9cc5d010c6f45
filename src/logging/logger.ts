import { appendFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let runLogPath: string | null = null;

/**
 * Start mirroring every log line to `<dir>/run-<timestamp>.log`.
 * Returns the file path. Safe to call once per process run.
 */
export function initRunLog(dir: string, now: Date = new Date()): string {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  runLogPath = join(dir, `run-${stamp}.log`);
  appendFileSync(runLogPath, `${now.toISOString()} INFO [log] Run started\n`);
  return runLogPath;
}

export function currentRunLog(): string | null {
  return runLogPath;
}

/** Detach the file mirror. Console output is unaffected. */
export function closeRunLog(): void {
  runLogPath = null;
}

export function formatLine(level: LogLevel, scope: string, message: string, at: Date = new Date()): string {
  return `${at.toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
}

/**
 * Scoped logger: `[scope] message` on the console, timestamped line in the
 * run log when one is open.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    const line = `[${scope}] ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else if (level === "debug") {
      if (process.env.DEBUG) console.log(line);
    } else console.log(line);

    if (runLogPath) {
      try {
        appendFileSync(runLogPath, formatLine(level, scope, message) + "\n");
      } catch (error) {
        console.error(`[log] Could not write to ${runLogPath}:`, error);
        runLogPath = null;
      }
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
