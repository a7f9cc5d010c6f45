import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { formatCookieFile, loadCookieFile, parseCookieFile, saveCookieFile } from "./cookies";
import { CredentialLoadError } from "../types/errors";

const SAMPLE = [
  "// exported from the browser",
  "",
  "auth_token\tplaceholder-token\t.x.com\t/\t2027-01-01\t✓\t✓\tNone",
  "ct0\ttest-csrf\t.x.com",
  "short\tonly",
  "lang\ten\tx.com\t\t\t\t\tLax",
].join("\n");

describe("parseCookieFile", () => {
  it("reads flags and sameSite from their columns", () => {
    expect(parseCookieFile(SAMPLE)[0]).toEqual({
      name: "auth_token",
      value: "placeholder-token",
      domain: ".x.com",
      path: "/",
      secure: true,
      httpOnly: true,
      sameSite: "None",
    });
  });

  it("defaults the path and skips comments, blanks and short rows", () => {
    const cookies = parseCookieFile(SAMPLE);
    expect(cookies.map((c) => c.name)).toEqual(["auth_token", "ct0", "lang"]);
    expect(cookies[1]).toEqual({ name: "ct0", value: "test-csrf", domain: ".x.com", path: "/" });
    expect(cookies[2].path).toBe("/");
    expect(cookies[2].sameSite).toBe("Lax");
  });

  it("ignores unknown sameSite values", () => {
    const [cookie] = parseCookieFile("a\tb\tx.com\t/\t\t\t\tSometimes");
    expect(cookie.sameSite).toBeUndefined();
  });
});

describe("formatCookieFile", () => {
  it("writes a header and one tab-separated row per cookie", () => {
    const text = formatCookieFile([{ name: "a", value: "b", domain: ".x.com", path: "/", secure: true }]);
    expect(text.split("\n")[1]).toBe("a\tb\t.x.com\t/\t\t✓\t\t");
  });
});

describe("loadCookieFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dm-amplifier-cookies-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("throws CredentialLoadError when the file is missing", () => {
    expect(() => loadCookieFile(join(dir, "missing.txt"))).toThrow(CredentialLoadError);
  });

  it("throws CredentialLoadError when no row is usable", () => {
    const path = join(dir, "cookies.txt");
    writeFileSync(path, "// only a comment\n");
    expect(() => loadCookieFile(path)).toThrow(CredentialLoadError);
  });

  it("reads back what saveCookieFile wrote", () => {
    const path = join(dir, "cookies.txt");
    const cookies = [{ name: "auth_token", value: "placeholder", domain: ".x.com", path: "/", httpOnly: true }];
    saveCookieFile(path, cookies);
    expect(loadCookieFile(path)).toEqual(cookies);
  });
});
