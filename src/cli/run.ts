#!/usr/bin/env tsx

import { loadConfig, headlessFromEnv, CONFIG_PATH, COOKIES_PATH, LOG_DIR, REPORTS_DIR } from "../config";
import { createLogger, initRunLog } from "../logging/logger";
import { loadCookieFile, type SessionCookie } from "../session/cookies";
import { launchBrowser, checkLoginStatus } from "../browser/launch";
import { runSession, saveSessionReport } from "../session/controller";
import { CredentialLoadError, describeError } from "../types/errors";
import { runMenuLoop, terminalAsk } from "./menu";

const log = createLogger("run");

/**
 * Interactive entry point: reposts what was shared in the inbox since the
 * last watermark, once or on a repeating interval.
 *
 * Usage: npm start
 */
async function main() {
  const logPath = initRunLog(LOG_DIR);
  log.info(`Logging to ${logPath}`);

  const config = loadConfig(CONFIG_PATH, { headless: headlessFromEnv() });

  let cookies: SessionCookie[];
  try {
    cookies = loadCookieFile(COOKIES_PATH);
  } catch (error) {
    if (error instanceof CredentialLoadError) {
      log.error(`${describeError(error)}. Run \`npm run auth\` to create it.`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const browser = await launchBrowser(config, cookies);
  try {
    const page = await browser.newPage();
    if (!(await checkLoginStatus(page, config))) {
      log.warn("Session looks logged out; refresh the cookies with `npm run auth` if nothing works");
    }

    await runMenuLoop({
      ask: terminalAsk,
      runSession: async () => {
        const report = await runSession({ config, browser, page });
        log.info(`Report saved to ${saveSessionReport(report, REPORTS_DIR)}`);
        return report;
      },
    });
    log.info("Stopping");
  } finally {
    await browser.close();
  }
}

main().catch((error) => {
  log.error(`Run failed: ${describeError(error)}`);
  process.exit(1);
});
