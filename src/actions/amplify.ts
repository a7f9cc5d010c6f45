import type { ElementRef, PageDriver } from "../browser/driver";
import type { Configuration } from "../types/config";
import type { ActionOutcome } from "../types/outcome";
import { TransientUiFailure, describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { POST } from "../selectors";
import { sleep } from "../utils/delay";

type AttemptResult = "amplified" | "already-amplified";

/** Labels of the buttons that undo a repost rather than make one. */
const UNDO_LABEL_RE = /undo|reposted|retweeted/i;

/**
 * Repost the post open in `page`, exactly once.
 *
 * Each attempt runs CheckIdempotent → Locate(primary) → Click →
 * Locate(confirm) → Confirm → Verify. A fault anywhere fails the attempt;
 * the next one starts from a reload, after a growing backoff and with longer
 * element waits. After `maxRetries` extra attempts the outcome is `failed`.
 * Never throws.
 */
export async function amplifyPost(
  page: PageDriver,
  config: Configuration,
  log: Logger = createLogger("amplify"),
): Promise<ActionOutcome> {
  const { timing, maxRetries } = config;
  const totalAttempts = maxRetries + 1;
  let lastReason = "no attempt made";

  for (let attempt = 0; attempt < totalAttempts; attempt++) {
    const timeoutMs = timing.elementTimeoutMs + attempt * timing.elementTimeoutStepMs;

    try {
      if (attempt > 0) {
        const backoffMs = timing.retryBaseDelayMs + attempt * timing.retryStepDelayMs;
        log.info(`Retry ${attempt}/${maxRetries}: reloading ${page.url()}, waiting ${backoffMs}ms`);
        await page.reload();
        await sleep(backoffMs);
      }

      const result = await runAttempt(page, config, timeoutMs, log);
      const attempts = attempt + 1;
      return result === "already-amplified"
        ? { kind: "already-amplified", attempts }
        : { kind: "amplified", attempts };
    } catch (error) {
      lastReason = describeError(error);
      log.warn(`Attempt ${attempt + 1}/${totalAttempts} failed: ${lastReason}`);
    }
  }

  log.error(`Giving up on ${page.url()} after ${totalAttempts} attempt(s)`);
  return { kind: "failed", attempts: totalAttempts, reason: lastReason };
}

async function runAttempt(
  page: PageDriver,
  config: Configuration,
  timeoutMs: number,
  log: Logger,
): Promise<AttemptResult> {
  const { timing } = config;
  const url = page.url();

  // Let either action button render before deciding anything
  await page.waitForSelector(`${POST.undoMarker}, ${POST.primaryCascade[0]}`, timeoutMs);
  await sleep(timing.preActionMs);

  if (await isAlreadyAmplified(page)) {
    log.info(`Already reposted, skipping: ${url}`);
    return "already-amplified";
  }

  const primary =
    (await locateFirst(page, POST.primaryCascade, timeoutMs, log)) ?? (await scanButtonsByLabel(page, log));
  if (!primary) {
    throw new TransientUiFailure("Repost button not found", {
      url,
      tried: `${POST.primaryCascade.length} selectors + aria-label scan`,
    });
  }

  // A label scan can land on the undo button of an already-reposted post
  if ((await primary.getAttribute("data-testid")) === "unretweet") {
    log.info(`Repost button is the undo variant, skipping: ${url}`);
    return "already-amplified";
  }

  await primary.click();
  log.debug("Clicked repost button");
  await sleep(timing.menuOpenMs);

  const confirm =
    (await locateFirst(page, POST.confirmCascade, timeoutMs, log)) ?? (await scanMenuItemsByText(page, log));
  if (!confirm) {
    throw new TransientUiFailure("Repost option not found in menu", {
      url,
      tried: `${POST.confirmCascade.length} selectors + menu text scan`,
    });
  }

  await confirm.click();
  await sleep(timing.afterConfirmMs);

  // Best effort: the toast is often gone (or never shown) by the time we look
  const toast = await page.waitForSelector(POST.toast, timing.toastTimeoutMs);
  log.info(toast ? `Reposted (confirmed by toast): ${url}` : `Reposted (no toast seen): ${url}`);
  return "amplified";
}

export async function isAlreadyAmplified(page: PageDriver): Promise<boolean> {
  if (await page.query(POST.undoMarker)) return true;
  for (const text of POST.undoTexts) {
    if ((await page.countText(text)) > 0) return true;
  }
  return false;
}

/**
 * Try each selector in order with the attempt's wait; first hit wins.
 */
export async function locateFirst(
  page: PageDriver,
  selectors: readonly string[],
  timeoutMs: number,
  log: Logger,
): Promise<ElementRef | null> {
  for (const selector of selectors) {
    const element = await page.waitForSelector(selector, timeoutMs);
    if (element) {
      log.debug(`Found with ${selector}`);
      return element;
    }
    log.debug(`No match for ${selector}`);
  }
  return null;
}

function mentionsAction(text: string): boolean {
  const lower = text.toLowerCase();
  return POST.actionTerms.some((term) => lower.includes(term));
}

async function scanButtonsByLabel(page: PageDriver, log: Logger): Promise<ElementRef | null> {
  log.debug("Selector cascade exhausted, scanning buttons by aria-label");
  for (const button of await page.queryAll(POST.buttonLike)) {
    const label = await button.getAttribute("aria-label");
    if (label && mentionsAction(label) && !UNDO_LABEL_RE.test(label)) {
      log.debug(`Found repost button by aria-label "${label}"`);
      return button;
    }
  }
  return null;
}

async function scanMenuItemsByText(page: PageDriver, log: Logger): Promise<ElementRef | null> {
  log.debug("Confirm cascade exhausted, scanning menu items by text");
  for (const item of await page.queryAll(POST.menuItem)) {
    const text = await item.textContent();
    if (mentionsAction(text) && !/undo/i.test(text)) {
      log.debug(`Found repost option by text "${text.trim()}"`);
      return item;
    }
  }
  return null;
}
