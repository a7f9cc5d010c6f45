import type { ElementRef, PageDriver } from "../browser/driver";
import type { Candidate, CaptureResult, CaptureStopReason } from "../types/candidate";
import type { Configuration } from "../types/config";
import { CaptureTimeout, describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { CONVERSATION } from "../selectors";
import { sleep } from "../utils/delay";
import { embeddedSignature, linkSignature } from "./signature";
import { findWatermark, isAfterWatermark, isInViewport } from "./watermark";

/** Ceiling against a feed that keeps changing under us. */
export const MAX_SCROLL_STEPS = 50;

interface SweepState {
  candidates: Candidate[];
  /** Embedded cards already captured, compared by DOM identity. */
  embedded: ElementRef[];
  /** Direct links already captured, compared by raw href. */
  hrefs: Set<string>;
}

/**
 * Harvest the post references that arrived after the watermark in the open
 * conversation.
 *
 * Strategy:
 * 1. Sweep what is on screen (the pane opens at the newest message)
 * 2. Scroll up one viewport at a time; older history lazy-loads at the top
 * 3. Every `scrollBatchSize` steps, sweep again and stop once the watermark
 *    is on screen
 * 4. Stop early when the offset stops moving (top of history) or after
 *    {@link MAX_SCROLL_STEPS}
 * 5. One last sweep for anything that rendered after the last batch
 */
export async function captureCandidates(
  page: PageDriver,
  config: Configuration,
  log: Logger = createLogger("capture"),
): Promise<CaptureResult> {
  const { timing } = config;

  const ready = await page.waitForSelector(CONVERSATION.content, timing.contentTimeoutMs);
  if (!ready) {
    const timeout = new CaptureTimeout("Conversation content never became visible", {
      url: page.url(),
      selector: CONVERSATION.content,
      timeoutMs: timing.contentTimeoutMs,
    });
    log.warn(`${describeError(timeout)}; treating as empty`);
    return { candidates: [], steps: 0, stopReason: "timeout", watermarkFound: false };
  }

  const state: SweepState = { candidates: [], embedded: [], hrefs: new Set() };

  let watermark = await findWatermark(page, config.watermarkText);
  log.info(watermark ? `Watermark "${config.watermarkText}" on screen` : `No watermark loaded yet`);

  await sweep(page, state, watermark, log);

  let steps = 0;
  let stopReason: CaptureStopReason = "step-limit";

  if (watermark && (await isInViewport(page, watermark))) {
    stopReason = "watermark";
  } else {
    while (steps < MAX_SCROLL_STEPS) {
      const before = await page.scrollOffset(CONVERSATION.viewport);
      await page.scrollByViewport(CONVERSATION.viewport, -1);
      steps++;
      await sleep(timing.scrollSettleMs);

      const after = await page.scrollOffset(CONVERSATION.viewport);
      if (after === before) {
        stopReason = "top-reached";
        break;
      }

      if (steps % config.scrollBatchSize === 0) {
        watermark = (await findWatermark(page, config.watermarkText)) ?? watermark;
        await sweep(page, state, watermark, log);
        if (watermark && (await isInViewport(page, watermark))) {
          stopReason = "watermark";
          break;
        }
      }
    }
  }

  watermark = (await findWatermark(page, config.watermarkText)) ?? watermark;
  await sweep(page, state, watermark, log);

  if (stopReason === "step-limit") {
    log.warn(`Hit the ${MAX_SCROLL_STEPS}-step scroll ceiling on ${page.url()}`);
  }
  log.info(`Captured ${state.candidates.length} candidate(s) in ${steps} scroll step(s), stopped: ${stopReason}`);

  return { candidates: state.candidates, steps, stopReason, watermarkFound: watermark !== null };
}

/**
 * Query both candidate shapes and append the ones not captured yet and
 * below the watermark.
 */
async function sweep(page: PageDriver, state: SweepState, watermark: ElementRef | null, log: Logger): Promise<void> {
  const watermarkBox = watermark ? await watermark.boundingBox() : null;
  const before = state.candidates.length;

  for (const element of await queryEmbeddedPosts(page)) {
    try {
      if (await isKnown(state.embedded, element)) continue;

      const box = await element.boundingBox();
      if (!isAfterWatermark(box, watermarkBox)) continue;

      const markup = await element.outerHTML();
      const text = await element.textContent();
      state.embedded.push(element);
      state.candidates.push({ kind: "embedded", signature: embeddedSignature(markup, text, box), handle: element });
    } catch (error) {
      log.warn(`Skipped an embedded post that went stale: ${describeError(error)}`);
    }
  }

  for (const anchor of await page.queryAll(CONVERSATION.statusAnchor)) {
    try {
      const href = await anchor.getAttribute("href");
      if (!href || state.hrefs.has(href)) continue;

      const box = await anchor.boundingBox();
      if (!isAfterWatermark(box, watermarkBox)) continue;

      state.hrefs.add(href);
      state.candidates.push({ kind: "direct-link", href, signature: linkSignature(href), handle: anchor });
    } catch (error) {
      log.warn(`Skipped a link that went stale: ${describeError(error)}`);
    }
  }

  const added = state.candidates.length - before;
  if (added > 0) log.debug(`Sweep added ${added} candidate(s)`);
}

/** Embedded cards on screen, from the first selector in the cascade that finds any. */
export async function queryEmbeddedPosts(page: PageDriver): Promise<ElementRef[]> {
  for (const selector of CONVERSATION.embeddedPostCascade) {
    const found = await page.queryAll(selector);
    if (found.length > 0) return found;
  }
  return [];
}

async function isKnown(known: ElementRef[], element: ElementRef): Promise<boolean> {
  for (const seen of known) {
    if (await seen.isSameElement(element)) return true;
  }
  return false;
}
