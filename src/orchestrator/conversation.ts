import type { BrowserDriver, ElementRef, PageDriver } from "../browser/driver";
import type { Candidate, Signature } from "../types/candidate";
import type { Configuration } from "../types/config";
import { emptySummary, tally, type ActionOutcome, type ConversationSummary } from "../types/outcome";
import { TransientUiFailure, describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { amplifyPost } from "../actions/amplify";
import { MAX_SCROLL_STEPS, captureCandidates, queryEmbeddedPosts } from "../capture/scroll-capture";
import { dedupeCandidates } from "../capture/dedupe";
import {
  describeSignature,
  embeddedSignature,
  resolveCandidateUrl,
  signatureKey,
  textPrefixOf,
} from "../capture/signature";
import { postWatermark } from "../capture/watermark";
import { CONVERSATION } from "../selectors";
import { sleep } from "../utils/delay";
import { inboxUrl, openConversation } from "./inbox";

export interface AmplifierContext {
  config: Configuration;
  browser: BrowserDriver;
  /** Main view: inbox and conversations are driven here. */
  page: PageDriver;
  log?: Logger;
}

export const OPEN_ATTEMPTS = 2;
export const POST_NAVIGATION_ATTEMPTS = 2;
export const IN_PLACE_ATTEMPTS = 3;

const STATUS_URL_RE = /\/status\/\d+/;

/**
 * Process one conversation end to end: open it, harvest what arrived after
 * the watermark, repost each post once, and leave a new watermark only if
 * something was actually reposted.
 *
 * Expects the main view on the inbox.
 */
export async function processConversation(ctx: AmplifierContext, index: number): Promise<ConversationSummary> {
  const { config, page } = ctx;
  const log = ctx.log ?? createLogger("conversation");
  const { timing } = config;

  log.info(`── Conversation ${index + 1} ──`);

  const opened = await openWithRetry(ctx, index, log);
  if (!opened) {
    log.error(`Could not open conversation ${index + 1}, skipping`);
    return emptySummary(index);
  }

  let summary: ConversationSummary = { ...emptySummary(index, opened.conversationId), opened: true };

  await sleep(timing.conversationSettleMs);
  const conversationUrl = page.url();

  let capture = await captureCandidates(page, config, log);
  if (capture.candidates.length === 0) {
    log.info("Nothing captured, reloading once to be sure");
    await page.reload();
    await sleep(timing.conversationSettleMs);
    capture = await captureCandidates(page, config, log);
  }

  const candidates = dedupeCandidates(capture.candidates, log);
  summary.found = candidates.length;

  for (const [i, candidate] of candidates.entries()) {
    log.info(`Post ${i + 1}/${candidates.length}: ${describeSignature(candidate.signature)}`);
    const outcome = await actOnCandidate(ctx, candidate, conversationUrl, log);
    if (outcome.kind === "failed") log.warn(`Post ${i + 1} failed: ${outcome.reason}`);
    summary = tally(summary, outcome);
    await sleep(timing.betweenCandidatesMs);
  }

  if (summary.amplified > 0) {
    summary.watermarkPosted = await postWatermark(page, config, log);
  } else {
    log.info("Nothing new reposted, leaving the watermark where it is");
  }

  log.info(
    `Conversation ${index + 1}: ${summary.found} found, ${summary.amplified} reposted, ` +
      `${summary.alreadyAmplified} already reposted, ${summary.failed} failed`,
  );
  return summary;
}

async function openWithRetry(
  ctx: AmplifierContext,
  index: number,
  log: Logger,
): Promise<{ conversationId: string | null } | null> {
  const { config, page } = ctx;

  for (let attempt = 1; attempt <= OPEN_ATTEMPTS; attempt++) {
    try {
      if (attempt > 1) {
        log.info(`Back to the inbox for another try (${attempt}/${OPEN_ATTEMPTS})`);
        await page.goto(inboxUrl(config));
        await sleep(config.timing.navigationSettleMs);
      }
      return { conversationId: await openConversation(page, index, config, log) };
    } catch (error) {
      log.warn(`Opening conversation ${index + 1} failed: ${describeError(error)}`);
    }
  }
  return null;
}

/**
 * Route a candidate to the isolated-view path when a URL can be built for
 * it, otherwise click it where it sits.
 */
export async function actOnCandidate(
  ctx: AmplifierContext,
  candidate: Candidate,
  conversationUrl: string,
  log: Logger,
): Promise<ActionOutcome> {
  const url = resolveCandidateUrl(candidate, ctx.config.baseUrl);
  if (url) return amplifyInIsolatedView(ctx, url, log);
  return amplifyInPlace(ctx, candidate, conversationUrl, log);
}

async function amplifyInIsolatedView(ctx: AmplifierContext, url: string, log: Logger): Promise<ActionOutcome> {
  const { config, browser } = ctx;
  let view: PageDriver | null = null;

  try {
    view = await browser.newPage();

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= POST_NAVIGATION_ATTEMPTS; attempt++) {
      try {
        await view.goto(url);
        lastError = null;
        break;
      } catch (error) {
        lastError = error;
        log.warn(`Navigation to ${url} failed (${attempt}/${POST_NAVIGATION_ATTEMPTS}): ${describeError(error)}`);
      }
    }
    if (lastError) {
      return { kind: "failed", attempts: POST_NAVIGATION_ATTEMPTS, reason: describeError(lastError) };
    }

    await sleep(config.timing.postLoadMs);
    return await amplifyPost(view, config, log);
  } catch (error) {
    return { kind: "failed", attempts: 1, reason: describeError(error) };
  } finally {
    if (view) {
      await view.close().catch((error: unknown) => log.warn(`Closing post tab failed: ${describeError(error)}`));
    }
  }
}

async function amplifyInPlace(
  ctx: AmplifierContext,
  candidate: Candidate,
  conversationUrl: string,
  log: Logger,
): Promise<ActionOutcome> {
  const { config, page } = ctx;
  const signature = candidate.signature;
  let lastReason = "no attempt made";

  try {
    for (let attempt = 1; attempt <= IN_PLACE_ATTEMPTS; attempt++) {
      try {
        if (attempt > 1) {
          await page.goto(conversationUrl);
          await sleep(config.timing.conversationSettleMs);
        }

        const element = await relocateCard(page, signature, config);
        if (!element) {
          throw new TransientUiFailure("Embedded post not found in the conversation", {
            signature: describeSignature(signature),
            attempt,
          });
        }

        await element.click();
        await sleep(config.timing.postLoadMs);
        if (!STATUS_URL_RE.test(page.url())) {
          throw new TransientUiFailure("Clicking the embedded post did not open it", { url: page.url(), attempt });
        }

        return await amplifyPost(page, config, log);
      } catch (error) {
        lastReason = describeError(error);
        log.warn(`In-place attempt ${attempt}/${IN_PLACE_ATTEMPTS} failed: ${lastReason}`);
      }
    }
    return { kind: "failed", attempts: IN_PLACE_ATTEMPTS, reason: lastReason };
  } finally {
    if (page.url() !== conversationUrl) {
      try {
        await page.goto(conversationUrl);
        await sleep(config.timing.navigationSettleMs);
      } catch (error) {
        log.warn(`Returning to the conversation failed: ${describeError(error)}`);
      }
    }
  }
}

/**
 * Find an embedded card again after the conversation was reloaded. Element
 * handles go stale across navigations and a reload resets the scroll
 * position, so scroll back up through history until the card is on screen
 * or the top is reached.
 */
export async function relocateCard(
  page: PageDriver,
  signature: Signature,
  config: Configuration,
): Promise<ElementRef | null> {
  for (let step = 0; step <= MAX_SCROLL_STEPS; step++) {
    const element = await findCardOnScreen(page, signature);
    if (element) return element;
    if (step === MAX_SCROLL_STEPS) break;

    const before = await page.scrollOffset(CONVERSATION.viewport);
    await page.scrollByViewport(CONVERSATION.viewport, -1);
    await sleep(config.timing.scrollSettleMs);
    if ((await page.scrollOffset(CONVERSATION.viewport)) === before) {
      return await findCardOnScreen(page, signature);
    }
  }
  return null;
}

/**
 * An exact signature match wins; otherwise the first card with the same
 * text, since the box of a layout signature only holds at the offset it was
 * taken at.
 */
export async function findCardOnScreen(page: PageDriver, signature: Signature): Promise<ElementRef | null> {
  const key = signatureKey({ kind: "embedded", signature });
  const prefix = textPrefixOf(signature);
  let byText: ElementRef | null = null;

  for (const element of await queryEmbeddedPosts(page)) {
    const seen = embeddedSignature(await element.outerHTML(), await element.textContent(), await element.boundingBox());
    if (key && signatureKey({ kind: "embedded", signature: seen }) === key) return element;
    if (!byText && prefix && textPrefixOf(seen) === prefix) byText = element;
  }
  return byText;
}
