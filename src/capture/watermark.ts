import { boxBottom, type Box, type ElementRef, type PageDriver } from "../browser/driver";
import type { Configuration } from "../types/config";
import { describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { CONVERSATION } from "../selectors";
import { sleep } from "../utils/delay";

/**
 * The latest message whose whole text is the watermark (case-insensitive).
 * Document order is chronological, so the last match is the newest.
 */
export async function findWatermark(page: PageDriver, watermarkText: string): Promise<ElementRef | null> {
  const wanted = watermarkText.trim().toLowerCase();
  const spans = await page.queryAll(CONVERSATION.messageText);

  let latest: ElementRef | null = null;
  for (const span of spans) {
    const text = (await span.textContent()).trim().toLowerCase();
    if (text === wanted) latest = span;
  }
  return latest;
}

/**
 * In scope iff strictly below the watermark's bottom edge. Without a
 * watermark, or when either box is unknown, everything is in scope.
 */
export function isAfterWatermark(candidate: Box | null, watermark: Box | null): boolean {
  if (!watermark || !candidate) return true;
  return candidate.y > boxBottom(watermark);
}

export async function isInViewport(page: PageDriver, element: ElementRef): Promise<boolean> {
  const box = await element.boundingBox();
  if (!box) return false;
  const height = await page.viewportHeight();
  return boxBottom(box) > 0 && box.y < height;
}

/**
 * Type the watermark into the DM composer and send it. Returns false when
 * the composer or the send button cannot be found.
 */
export async function postWatermark(
  page: PageDriver,
  config: Configuration,
  log: Logger = createLogger("watermark"),
): Promise<boolean> {
  const { timing } = config;
  await sleep(timing.navigationSettleMs);

  try {
    let composer: ElementRef | null = null;
    for (const selector of CONVERSATION.composerCascade) {
      composer = await page.waitForSelector(selector, timing.elementTimeoutMs);
      if (composer) {
        log.debug(`Composer found with ${selector}`);
        break;
      }
    }
    if (!composer) {
      log.warn(`Could not find the message composer on ${page.url()}`);
      return false;
    }

    await composer.type(config.watermarkText);

    const send = await page.waitForSelector(CONVERSATION.sendButton, timing.elementTimeoutMs);
    if (!send) {
      log.warn(`Typed "${config.watermarkText}" but the send button never appeared`);
      return false;
    }
    await send.click();
    await sleep(timing.menuOpenMs);

    log.info(`Posted watermark "${config.watermarkText}"`);
    return true;
  } catch (error) {
    log.error(`Posting watermark failed: ${describeError(error)}`);
    return false;
  }
}
