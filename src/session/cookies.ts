import { readFileSync, writeFileSync } from "fs";
import { CredentialLoadError, errorMessage } from "../types/errors";

/**
 * Cookie shape accepted by Playwright's `context.addCookies`.
 */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: "Strict" | "Lax" | "None";
}

const SAME_SITE_VALUES = ["None", "Lax", "Strict"] as const;
const FLAG_MARK = "✓";

function isSameSite(value: string): value is NonNullable<SessionCookie["sameSite"]> {
  return SAME_SITE_VALUES.some((v) => v === value);
}

/**
 * Parse the tab-separated export of a browser's cookie table.
 *
 * Columns: name, value, domain, path, expires, secure, httpOnly, sameSite.
 * Only the first three are required. `//` lines and blank lines are skipped,
 * as are rows with fewer than three fields.
 */
export function parseCookieFile(content: string): SessionCookie[] {
  const cookies: SessionCookie[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("//")) continue;

    const parts = line.split("\t");
    if (parts.length < 3) continue;

    const [name, value, domain, path] = parts;
    const cookie: SessionCookie = { name, value, domain, path: path || "/" };

    if (parts.length > 5 && parts[5].includes(FLAG_MARK)) cookie.secure = true;
    if (parts.length > 6 && parts[6].includes(FLAG_MARK)) cookie.httpOnly = true;
    if (parts.length > 7) {
      const sameSite = parts[7].trim();
      if (isSameSite(sameSite)) cookie.sameSite = sameSite;
    }

    cookies.push(cookie);
  }

  return cookies;
}

/**
 * Inverse of {@link parseCookieFile}, used by the auth helper.
 * The expiry column is left empty; session cookies are refreshed on login.
 */
export function formatCookieFile(cookies: SessionCookie[], header = "// name\tvalue\tdomain\tpath\texpires\tsecure\thttpOnly\tsameSite"): string {
  const rows = cookies.map((c) =>
    [
      c.name,
      c.value,
      c.domain,
      c.path,
      "",
      c.secure ? FLAG_MARK : "",
      c.httpOnly ? FLAG_MARK : "",
      c.sameSite ?? "",
    ].join("\t"),
  );
  return [header, ...rows].join("\n") + "\n";
}

/**
 * Read and parse the credential file. Unlike every other input, failure
 * here ends the run.
 */
export function loadCookieFile(path: string): SessionCookie[] {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new CredentialLoadError(`Cannot read cookie file: ${errorMessage(error)}`, { path }, { cause: error });
  }

  const cookies = parseCookieFile(content);
  if (cookies.length === 0) {
    throw new CredentialLoadError("Cookie file contains no usable rows", { path });
  }
  return cookies;
}

export function saveCookieFile(path: string, cookies: SessionCookie[]): void {
  writeFileSync(path, formatCookieFile(cookies));
}
