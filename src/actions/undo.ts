import type { ElementRef, PageDriver } from "../browser/driver";
import type { Configuration } from "../types/config";
import { describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { PROFILE } from "../selectors";
import { sleep } from "../utils/delay";

export const MAX_UNDO_ROUNDS = 50;

/**
 * Undo every repost reachable on the profile page open in `page`.
 *
 * Each round clicks all visible undo buttons at once (they are independent
 * elements, no index to invalidate), then scrolls a viewport down for more.
 * Stops when a round finds no button or undoes nothing.
 */
export async function undoAllReposts(
  page: PageDriver,
  config: Configuration,
  log: Logger = createLogger("undo"),
): Promise<number> {
  const { timing } = config;

  if (!(await page.waitForSelector(PROFILE.ready, timing.contentTimeoutMs))) {
    log.warn(`Profile timeline never appeared on ${page.url()}`);
  }

  let total = 0;
  for (let round = 1; round <= MAX_UNDO_ROUNDS; round++) {
    const buttons = await page.queryAll(PROFILE.undoButton);
    if (buttons.length === 0) {
      log.info("No more undo buttons");
      break;
    }

    log.info(`Round ${round}: clicking ${buttons.length} undo button(s)`);
    const results = await Promise.all(buttons.map((button, i) => undoOne(page, button, i + 1, config, log)));
    const undone = results.filter(Boolean).length;
    total += undone;

    if (undone === 0) {
      log.warn(`Round ${round} undid nothing, stopping`);
      break;
    }

    await page.scrollByViewport(PROFILE.scrollRoot, 1);
    await sleep(timing.scrollSettleMs);
  }

  log.info(`Finished: ${total} repost(s) undone`);
  return total;
}

async function undoOne(
  page: PageDriver,
  button: ElementRef,
  position: number,
  config: Configuration,
  log: Logger,
): Promise<boolean> {
  try {
    await button.click();
    await sleep(config.timing.menuOpenMs);

    const confirm = await page.query(PROFILE.undoConfirm);
    if (!confirm) {
      log.warn(`No confirm option after undo button ${position}`);
      return false;
    }
    await confirm.click();
    await sleep(config.timing.menuOpenMs);
    return true;
  } catch (error) {
    log.warn(`Undo button ${position} failed: ${describeError(error)}`);
    return false;
  }
}
