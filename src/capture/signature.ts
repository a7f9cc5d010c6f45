import type { Box } from "../browser/driver";
import type { Candidate, Signature } from "../types/candidate";

const TEXT_PREFIX_LENGTH = 100;
const LAYOUT_GRID_PX = 10;

/**
 * `/<account>/status/<id>` at the start of a path, absolute (x.com or
 * twitter.com) or relative. Anything after the id is ignored.
 */
const STATUS_PATH_RE =
  /^(?:https?:\/\/(?:www\.|mobile\.)?(?:x\.com|twitter\.com))?\/([A-Za-z0-9_]{1,15})\/status\/(\d+)(?:[/?#].*)?$/;

/** `/i/status/<id>` and `/i/web/status/<id>`: a post reached without its author. */
const SITE_STATUS_PATH_RE =
  /^(?:https?:\/\/(?:www\.|mobile\.)?(?:x\.com|twitter\.com))?\/i\/(?:web\/)?status\/(\d+)(?:[/?#].*)?$/;

/** Account used for posts whose author is unknown; x.com resolves it by id. */
export const SITE_ACCOUNT = "i";

/** Same shape found anywhere inside serialized markup. */
const STATUS_IN_MARKUP_RE = /(?:^|[^A-Za-z0-9_])([A-Za-z0-9_]{1,15})\/status\/(\d+)/g;

/** Loose id and handle, for cards that only carry `status=<id>` style markup. */
const LOOSE_STATUS_RE = /status[/=](\d+)/;
const HANDLE_RE = /@([A-Za-z0-9_]{1,15})/;

/** Path segments that look like an account but are site routes. */
const RESERVED_ACCOUNTS = new Set(["i", "web", "home", "messages", "search", "explore", "settings"]);

export interface StatusRef {
  account: string;
  statusId: string;
}

export function parseStatusPath(href: string): StatusRef | null {
  const site = href.trim().match(SITE_STATUS_PATH_RE);
  if (site) return { account: SITE_ACCOUNT, statusId: site[1] };

  const match = href.trim().match(STATUS_PATH_RE);
  if (!match) return null;
  const account = match[1].toLowerCase();
  if (RESERVED_ACCOUNTS.has(account)) return null;
  return { account, statusId: match[2] };
}

/** First status path in `markup`, preferring one that names its author. */
export function findStatusInMarkup(markup: string): StatusRef | null {
  let siteRoute: StatusRef | null = null;
  for (const match of markup.matchAll(STATUS_IN_MARKUP_RE)) {
    const account = match[1].toLowerCase();
    if (!RESERVED_ACCOUNTS.has(account)) return { account, statusId: match[2] };
    if (!siteRoute && (account === "i" || account === "web")) {
      siteRoute = { account: SITE_ACCOUNT, statusId: match[2] };
    }
  }
  return siteRoute;
}

/**
 * Last resort for a card with no status path: any `status/<id>` or
 * `status=<id>` in its markup, credited to the first `@handle` it shows.
 */
export function statusFromCard(markup: string, text: string): StatusRef | null {
  const id = markup.match(LOOSE_STATUS_RE);
  if (!id) return null;
  const handle = text.match(HANDLE_RE) ?? markup.match(HANDLE_RE);
  return { account: handle ? handle[1].toLowerCase() : SITE_ACCOUNT, statusId: id[1] };
}

export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim().toLowerCase().slice(0, TEXT_PREFIX_LENGTH);
}

function snap(value: number): number {
  return Math.round(value / LAYOUT_GRID_PX) * LAYOUT_GRID_PX;
}

export function linkSignature(href: string): Signature {
  const status = parseStatusPath(href);
  return status ? { type: "status", ...status } : { type: "unmatched", href };
}

/**
 * Content beats layout: a card scrolled to a new position must keep its
 * identity, so the box is only used when the markup names no status.
 */
export function embeddedSignature(markup: string, text: string, box: Box | null): Signature {
  const textPrefix = normalizeText(text);
  const status = findStatusInMarkup(markup) ?? statusFromCard(markup, text);
  if (status) return { type: "content", ...status, textPrefix };

  if (!box) return { type: "text", textPrefix };
  return { type: "layout", textPrefix, x: snap(box.x), y: snap(box.y), width: snap(box.width), height: snap(box.height) };
}

/** Normalized card text, for the signatures that carry it. */
export function textPrefixOf(signature: Signature): string | null {
  return signature.type === "content" || signature.type === "layout" || signature.type === "text"
    ? signature.textPrefix
    : null;
}

/**
 * Dedup key. Direct links and embedded cards live in separate namespaces;
 * `null` means "never a duplicate".
 */
export function signatureKey(candidate: Pick<Candidate, "kind" | "signature">): string | null {
  const sig = candidate.signature;
  switch (sig.type) {
    case "status":
      return `link:${sig.account}/${sig.statusId}`;
    case "unmatched":
      return null;
    case "content":
      return `embed:${sig.account}/${sig.statusId}|${sig.textPrefix}`;
    case "layout":
      return `embed-layout:${sig.x},${sig.y},${sig.width},${sig.height}|${sig.textPrefix}`;
    case "text":
      return sig.textPrefix ? `embed-text:${sig.textPrefix}` : null;
  }
}

export function describeSignature(signature: Signature): string {
  switch (signature.type) {
    case "status":
    case "content":
      return `@${signature.account}/${signature.statusId}`;
    case "unmatched":
      return signature.href;
    case "layout":
      return `card@${signature.x},${signature.y}`;
    case "text":
      return `card "${signature.textPrefix.slice(0, 30)}"`;
  }
}

/**
 * Absolute URL to open for a candidate, or null when only its on-screen
 * element can reach the post.
 */
export function resolveCandidateUrl(candidate: Candidate, baseUrl: string): string | null {
  if (candidate.kind === "direct-link") {
    const href = candidate.href.trim();
    if (/^https?:\/\//i.test(href)) return href;
    return `${baseUrl}${href.startsWith("/") ? "" : "/"}${href}`;
  }

  const sig = candidate.signature;
  if (sig.type === "content" || sig.type === "status") {
    return `${baseUrl}/${sig.account}/status/${sig.statusId}`;
  }
  return null;
}
