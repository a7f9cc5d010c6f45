#!/usr/bin/env tsx

import { loadConfig, headlessFromEnv, CONFIG_PATH, COOKIES_PATH, LOG_DIR } from "../config";
import { createLogger, initRunLog } from "../logging/logger";
import { loadCookieFile } from "../session/cookies";
import { launchBrowser } from "../browser/launch";
import { undoAllReposts } from "../actions/undo";
import { describeError } from "../types/errors";

const log = createLogger("undo");

/**
 * Undo every repost on a profile.
 *
 * Usage: npm run undo -- <handle>
 */
async function main() {
  const handle = process.argv[2]?.replace(/^@/, "");
  if (!handle) {
    console.error("Usage: npm run undo -- <handle>");
    process.exitCode = 1;
    return;
  }

  initRunLog(LOG_DIR);
  const config = loadConfig(CONFIG_PATH, { headless: headlessFromEnv() });
  const browser = await launchBrowser(config, loadCookieFile(COOKIES_PATH));

  try {
    const page = await browser.newPage();
    await page.goto(`${config.baseUrl}/${handle}`);
    const undone = await undoAllReposts(page, config, log);
    console.log(`\n✅ Undid ${undone} repost(s) on @${handle}`);
  } finally {
    await browser.close();
  }
}

main().catch((error) => {
  log.error(`Undo failed: ${describeError(error)}`);
  process.exit(1);
});
