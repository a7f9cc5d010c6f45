import { join } from "path";
import type { ElementRef, PageDriver } from "../browser/driver";
import type { Configuration } from "../types/config";
import { TransientUiFailure, describeError } from "../types/errors";
import { createLogger, type Logger } from "../logging/logger";
import { DEBUG_DIR } from "../config/paths";
import { INBOX } from "../selectors";

const CONVERSATION_ID_RE = /\/messages\/(\d+(?:-\d+)?)/;

/** Conversation id from a row's markup, e.g. `123-456` for a 1:1 thread. */
export function extractConversationId(html: string): string | null {
  return html.match(CONVERSATION_ID_RE)?.[1] ?? null;
}

export function inboxUrl(config: Configuration): string {
  return `${config.baseUrl}/messages`;
}

/**
 * Conversation rows on the inbox page, in display order.
 *
 * The first two selectors get the full inbox wait; the general fallbacks are
 * only queried, and a screenshot of the page goes to the debug dir first so
 * a layout change can be looked at afterwards.
 */
export async function findConversationElements(
  page: PageDriver,
  config: Configuration,
  log: Logger = createLogger("inbox"),
  debugDir: string = DEBUG_DIR,
): Promise<ElementRef[]> {
  const [primary, secondary, ...fallbacks] = INBOX.conversationCascade;

  for (const selector of [primary, secondary]) {
    if (await page.waitForSelector(selector, config.timing.inboxTimeoutMs)) {
      const rows = await page.queryAll(selector);
      log.info(`Found ${rows.length} conversation(s) with ${selector}`);
      return rows;
    }
    log.debug(`No conversations with ${selector}`);
  }

  const shot = join(debugDir, `inbox-${Date.now()}.png`);
  try {
    await page.screenshot(shot);
    log.info(`Saved inbox screenshot to ${shot}`);
  } catch (error) {
    log.warn(`Could not save inbox screenshot: ${describeError(error)}`);
  }

  for (const selector of fallbacks) {
    const rows = await page.queryAll(selector);
    if (rows.length > 0) {
      log.warn(`Found ${rows.length} conversation(s) only with fallback ${selector}`);
      return rows;
    }
  }

  log.warn(`No conversations found on ${page.url()}`);
  return [];
}

/**
 * Open the conversation at `index` in the inbox currently shown.
 *
 * Navigates straight to `/messages/<id>` when the row's markup carries the
 * id, otherwise clicks the row. Returns the id when known.
 */
export async function openConversation(
  page: PageDriver,
  index: number,
  config: Configuration,
  log: Logger = createLogger("inbox"),
): Promise<string | null> {
  const rows = await findConversationElements(page, config, log);
  const row = rows[index];
  if (!row) {
    throw new TransientUiFailure("Conversation row not found", { index, rows: rows.length, url: page.url() });
  }

  const id = extractConversationId(await row.outerHTML());
  if (id) {
    log.info(`Opening conversation ${id}`);
    await page.goto(`${config.baseUrl}/messages/${id}`);
    return id;
  }

  log.info(`No id in row ${index + 1}, clicking it`);
  await row.click();
  return null;
}
