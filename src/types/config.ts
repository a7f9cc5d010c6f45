import { z } from "zod";

/**
 * Every wait the engine performs, in milliseconds.
 *
 * Defaults follow what the live site needs on a slow connection. Tests run
 * with {@link ZERO_TIMING} so nothing actually sleeps.
 */
export interface Timing {
  /** Conversation pane must appear within this window or capture gives up. */
  contentTimeoutMs: number;
  /** After opening a conversation, before the first capture. */
  conversationSettleMs: number;
  /** After each upward scroll, for lazy-loaded history to render. */
  scrollSettleMs: number;
  /** After navigating an isolated tab to a post. */
  postLoadMs: number;
  /** Before the idempotence check on a freshly loaded post. */
  preActionMs: number;
  /** After clicking the primary action, for the confirm menu to open. */
  menuOpenMs: number;
  /** After the confirming click. */
  afterConfirmMs: number;
  /** Best-effort wait for the success toast. */
  toastTimeoutMs: number;
  /** Per-selector wait on the first attempt. */
  elementTimeoutMs: number;
  /** Added to the per-selector wait on every retry. */
  elementTimeoutStepMs: number;
  /** Backoff before a retry: base + attempt × step. */
  retryBaseDelayMs: number;
  retryStepDelayMs: number;
  /** Pause between two candidates of the same conversation. */
  betweenCandidatesMs: number;
  /** Inbox conversation list must appear within this window. */
  inboxTimeoutMs: number;
  /** After navigating back to the inbox. */
  navigationSettleMs: number;
}

export const DEFAULT_TIMING: Timing = {
  contentTimeoutMs: 10_000,
  conversationSettleMs: 5_000,
  scrollSettleMs: 1_500,
  postLoadMs: 2_000,
  preActionMs: 3_000,
  menuOpenMs: 1_500,
  afterConfirmMs: 2_000,
  toastTimeoutMs: 4_000,
  elementTimeoutMs: 5_000,
  elementTimeoutStepMs: 2_500,
  retryBaseDelayMs: 2_000,
  retryStepDelayMs: 2_000,
  betweenCandidatesMs: 2_000,
  inboxTimeoutMs: 15_000,
  navigationSettleMs: 3_000,
};

export const ZERO_TIMING: Timing = {
  contentTimeoutMs: 0,
  conversationSettleMs: 0,
  scrollSettleMs: 0,
  postLoadMs: 0,
  preActionMs: 0,
  menuOpenMs: 0,
  afterConfirmMs: 0,
  toastTimeoutMs: 0,
  elementTimeoutMs: 0,
  elementTimeoutStepMs: 0,
  retryBaseDelayMs: 0,
  retryStepDelayMs: 0,
  betweenCandidatesMs: 0,
  inboxTimeoutMs: 0,
  navigationSettleMs: 0,
};

/**
 * Process-wide settings. Built once at startup, frozen, and passed by
 * parameter to every component.
 */
export interface Configuration {
  /** Sentinel message marking already-processed history. */
  readonly watermarkText: string;
  /** Scroll steps between two capture sweeps. */
  readonly scrollBatchSize: number;
  /** Full re-scans per session, to catch posts that arrive mid-run. */
  readonly iterationsPerSession: number;
  /** Extra attempts after the first one, per candidate. */
  readonly maxRetries: number;
  readonly baseUrl: string;
  readonly headless: boolean;
  readonly timing: Readonly<Timing>;
}

export const DEFAULT_CONFIG: Configuration = Object.freeze({
  watermarkText: "Done",
  scrollBatchSize: 2,
  iterationsPerSession: 2,
  maxRetries: 3,
  baseUrl: "https://x.com",
  headless: false,
  timing: Object.freeze({ ...DEFAULT_TIMING }),
});

/**
 * Schema of config.json. Each key falls back to its default on its own when
 * it is missing or invalid; the reason lands in `warnings`.
 */
export function configFileSchema(warnings: string[]) {
  const warn = (key: string, error: z.ZodError) => {
    warnings.push(`${key}: ${error.issues[0]?.message ?? "invalid value"}`);
  };

  const str = (key: string, schema: z.ZodString, fallback: string) =>
    schema.default(fallback).catch(({ error }) => {
      warn(key, error);
      return fallback;
    });

  const num = (key: string, schema: z.ZodNumber, fallback: number) =>
    schema.default(fallback).catch(({ error }) => {
      warn(key, error);
      return fallback;
    });

  const bool = (key: string, fallback: boolean) =>
    z.boolean().default(fallback).catch(({ error }) => {
      warn(key, error);
      return fallback;
    });

  const ms = (key: keyof Timing) =>
    num(`timing.${key}`, z.number().int().nonnegative(), DEFAULT_TIMING[key]);

  const TimingSchema = z.object({
    contentTimeoutMs: ms("contentTimeoutMs"),
    conversationSettleMs: ms("conversationSettleMs"),
    scrollSettleMs: ms("scrollSettleMs"),
    postLoadMs: ms("postLoadMs"),
    preActionMs: ms("preActionMs"),
    menuOpenMs: ms("menuOpenMs"),
    afterConfirmMs: ms("afterConfirmMs"),
    toastTimeoutMs: ms("toastTimeoutMs"),
    elementTimeoutMs: ms("elementTimeoutMs"),
    elementTimeoutStepMs: ms("elementTimeoutStepMs"),
    retryBaseDelayMs: ms("retryBaseDelayMs"),
    retryStepDelayMs: ms("retryStepDelayMs"),
    betweenCandidatesMs: ms("betweenCandidatesMs"),
    inboxTimeoutMs: ms("inboxTimeoutMs"),
    navigationSettleMs: ms("navigationSettleMs"),
  });

  return z.object({
    doneMessageText: str("doneMessageText", z.string().trim().min(1), DEFAULT_CONFIG.watermarkText),
    scrollsCountForEachCapture: num(
      "scrollsCountForEachCapture",
      z.number().int().min(1).max(50),
      DEFAULT_CONFIG.scrollBatchSize,
    ),
    iterationsCount: num("iterationsCount", z.number().int().min(1), DEFAULT_CONFIG.iterationsPerSession),
    maxRetries: num("maxRetries", z.number().int().min(0).max(10), DEFAULT_CONFIG.maxRetries),
    baseUrl: str("baseUrl", z.string().url(), DEFAULT_CONFIG.baseUrl),
    headless: bool("headless", DEFAULT_CONFIG.headless),
    timing: TimingSchema.default({}).catch(({ error }) => {
      warn("timing", error);
      return { ...DEFAULT_TIMING };
    }),
  });
}

export type ConfigFile = z.infer<ReturnType<typeof configFileSchema>>;
