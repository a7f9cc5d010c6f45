import { chromium } from "playwright";
import type { Configuration } from "../types/config";
import type { SessionCookie } from "../session/cookies";
import { createLogger, type Logger } from "../logging/logger";
import { PlaywrightBrowser } from "./playwright-driver";
import type { PageDriver } from "./driver";

const VIEWPORT = { width: 1550, height: 720 };
const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const LOGGED_IN_SELECTORS = [
  '[data-testid="SideNav_NewTweet_Button"]',
  '[data-testid="primaryColumn"]',
  '[aria-label="Home timeline"]',
];

/**
 * Launch Chromium with a realistic context and the saved session cookies.
 */
export async function launchBrowser(
  config: Configuration,
  cookies: SessionCookie[],
  log: Logger = createLogger("browser"),
): Promise<PlaywrightBrowser> {
  log.info(`Launching Chromium (headless=${config.headless})`);

  const browser = await chromium.launch({
    headless: config.headless,
    args: ["--disable-blink-features=AutomationControlled", "--no-sandbox", "--disable-gpu"],
  });

  try {
    const context = await browser.newContext({
      viewport: VIEWPORT,
      screen: VIEWPORT,
      userAgent: USER_AGENT,
      locale: "en-US",
    });
    await context.addCookies(cookies);
    log.info(`Loaded ${cookies.length} cookies`);

    return new PlaywrightBrowser(context, () => browser.close());
  } catch (error) {
    await browser.close();
    throw error;
  }
}

/**
 * Visit the home timeline and look for chrome only a signed-in user sees.
 */
export async function checkLoginStatus(page: PageDriver, config: Configuration): Promise<boolean> {
  await page.goto(`${config.baseUrl}/home`);
  const found = await page.waitForSelector(LOGGED_IN_SELECTORS.join(", "), config.timing.inboxTimeoutMs);
  return found !== null;
}
