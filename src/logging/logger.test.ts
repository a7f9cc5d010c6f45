import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { closeRunLog, createLogger, currentRunLog, formatLine, initRunLog } from "./logger";

const AT = new Date("2026-01-02T03:04:05.678Z");

let dir: string;
const savedDebug = process.env.DEBUG;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "dm-amplifier-logs-"));
  delete process.env.DEBUG;
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  closeRunLog();
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
  if (savedDebug !== undefined) process.env.DEBUG = savedDebug;
});

describe("formatLine", () => {
  it("puts time, level and scope in front of the message", () => {
    expect(formatLine("warn", "capture", "slow", AT)).toBe("2026-01-02T03:04:05.678Z WARN [capture] slow");
  });
});

describe("initRunLog", () => {
  it("creates a timestamped file with a start line", () => {
    const path = initRunLog(join(dir, "logs"), AT);

    expect(path).toBe(join(dir, "logs", "run-2026-01-02T03-04-05-678Z.log"));
    expect(currentRunLog()).toBe(path);
    expect(readFileSync(path, "utf-8")).toBe("2026-01-02T03:04:05.678Z INFO [log] Run started\n");
  });
});

describe("createLogger", () => {
  it("prefixes console lines with the scope", () => {
    createLogger("inbox").info("3 conversations");
    createLogger("inbox").warn("slow");

    expect(console.log).toHaveBeenCalledWith("[inbox] 3 conversations");
    expect(console.warn).toHaveBeenCalledWith("[inbox] slow");
  });

  it("mirrors every line to the run log", () => {
    const path = initRunLog(dir, AT);

    createLogger("session").error("boom");

    const lines = readFileSync(path, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1]).toMatch(/^\S+ ERROR \[session\] boom$/);
  });

  it("prints debug lines only with DEBUG set", () => {
    const log = createLogger("amplify");

    log.debug("hidden");
    expect(console.log).not.toHaveBeenCalled();

    process.env.DEBUG = "1";
    log.debug("shown");
    expect(console.log).toHaveBeenCalledWith("[amplify] shown");
    delete process.env.DEBUG;
  });
});
