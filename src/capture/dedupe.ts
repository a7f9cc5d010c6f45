import type { Candidate } from "../types/candidate";
import { createLogger, type Logger } from "../logging/logger";
import { signatureKey } from "./signature";

/**
 * Keep the first candidate per signature key, in discovery order.
 * Candidates without a key (links that are not status-shaped) are always kept.
 */
export function dedupeCandidates(candidates: Candidate[], log: Logger = createLogger("dedupe")): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];

  for (const candidate of candidates) {
    const key = signatureKey(candidate);
    if (key !== null) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(candidate);
  }

  const removed = candidates.length - unique.length;
  if (removed > 0) {
    log.info(`Removed ${removed} duplicate(s), ${unique.length} unique candidate(s) left`);
  }
  return unique;
}
