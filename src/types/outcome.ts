import { z } from "zod";

/**
 * Result of running the repost state machine on one opened post.
 * `attempts` counts the first try, so it is at most `maxRetries + 1`.
 */
export type ActionOutcome =
  | { kind: "amplified"; attempts: number }
  | { kind: "already-amplified"; attempts: number }
  | { kind: "failed"; attempts: number; reason: string };

export const ConversationSummarySchema = z.object({
  index: z.number().int().nonnegative(),
  conversationId: z.string().nullable(),
  opened: z.boolean(),
  found: z.number().int().nonnegative(),
  amplified: z.number().int().nonnegative(),
  alreadyAmplified: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  watermarkPosted: z.boolean(),
});

export type ConversationSummary = z.infer<typeof ConversationSummarySchema>;

export const SessionReportSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  iterations: z.number().int().nonnegative(),
  conversations: z.array(ConversationSummarySchema.extend({ iteration: z.number().int().positive() })),
  totals: z.object({
    found: z.number().int().nonnegative(),
    amplified: z.number().int().nonnegative(),
    alreadyAmplified: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    watermarksPosted: z.number().int().nonnegative(),
  }),
});

export type SessionReport = z.infer<typeof SessionReportSchema>;

export function emptySummary(index: number, conversationId: string | null = null): ConversationSummary {
  return {
    index,
    conversationId,
    opened: false,
    found: 0,
    amplified: 0,
    alreadyAmplified: 0,
    failed: 0,
    watermarkPosted: false,
  };
}

/**
 * Fold one outcome into a summary's counters.
 */
export function tally(summary: ConversationSummary, outcome: ActionOutcome): ConversationSummary {
  switch (outcome.kind) {
    case "amplified":
      return { ...summary, amplified: summary.amplified + 1 };
    case "already-amplified":
      return { ...summary, alreadyAmplified: summary.alreadyAmplified + 1 };
    case "failed":
      return { ...summary, failed: summary.failed + 1 };
  }
}
