import type { ElementRef } from "../browser/driver";

/**
 * Candidate - a post reference discovered in a conversation.
 *
 * Two shapes reach us from the DM pane: a plain anchor to a status URL, and
 * an embedded card rendering the post inline. They are captured and opened
 * by different code paths, so the kind is kept on the value.
 */
export type CandidateKind = "direct-link" | "embedded";

/**
 * Derived identity of a candidate.
 *
 * `unmatched` direct links are not status-shaped and are never collapsed.
 * `layout` is the last resort for embedded cards whose markup carries no
 * status id; its box only holds at the scroll offset it was taken at, so the
 * text prefix is what finds the card again. `text` is the same card when no
 * box could be read.
 */
export type Signature =
  | { type: "status"; account: string; statusId: string }
  | { type: "unmatched"; href: string }
  | { type: "content"; account: string; statusId: string; textPrefix: string }
  | { type: "layout"; textPrefix: string; x: number; y: number; width: number; height: number }
  | { type: "text"; textPrefix: string };

interface CandidateBase {
  signature: Signature;
  /** Owned by the browser driver; stale once the page navigates or reloads. */
  handle: ElementRef;
}

export interface DirectLinkCandidate extends CandidateBase {
  kind: "direct-link";
  href: string;
}

export interface EmbeddedCandidate extends CandidateBase {
  kind: "embedded";
}

export type Candidate = DirectLinkCandidate | EmbeddedCandidate;

export type CaptureStopReason = "timeout" | "watermark" | "top-reached" | "step-limit";

export interface CaptureResult {
  candidates: Candidate[];
  /** Scroll steps taken. */
  steps: number;
  stopReason: CaptureStopReason;
  watermarkFound: boolean;
}
