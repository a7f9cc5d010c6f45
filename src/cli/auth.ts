#!/usr/bin/env tsx

import { chromium, type BrowserContext } from "playwright";
import { COOKIES_PATH } from "../config/paths";
import { saveCookieFile, type SessionCookie } from "../session/cookies";
import { terminalAsk } from "./menu";

/**
 * Interactive X authentication.
 *
 * Opens a visible browser for you to log in manually, then writes the
 * session cookies in the tab-separated format `npm start` reads.
 *
 * Usage: npm run auth
 */
async function main() {
  console.log(`
X Authentication Setup
━━━━━━━━━━━━━━━━━━━━━━

This will open a browser window. Please:
1. Log into your X account
2. Complete any 2FA or captcha challenges
3. Once you see your home feed, press Enter in this terminal

Cookies will be saved to: ${COOKIES_PATH}
`);

  const browser = await chromium.launch({
    headless: false,
    args: ["--disable-blink-features=AutomationControlled"],
  });

  try {
    const context = await browser.newContext({
      viewport: { width: 1280, height: 900 },
      userAgent:
        "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    });
    const page = await context.newPage();
    await page.goto("https://x.com/login", { waitUntil: "domcontentloaded" });

    await terminalAsk("Browser opened. Log in, then press Enter here...");

    const loggedIn =
      page.url().includes("/home") ||
      (await page.locator('[data-testid="SideNav_NewTweet_Button"], [data-testid="primaryColumn"]').count()) > 0;
    if (!loggedIn) {
      console.log("\n⚠️  Doesn't look like you're logged in yet.");
      await terminalAsk("Navigate to your home feed and press Enter again...");
    }

    const cookies = (await context.cookies()).map(toSessionCookie);
    saveCookieFile(COOKIES_PATH, cookies);

    console.log(`
✅ Saved ${cookies.length} cookies.

You can now run: npm start
If you get logged out, run this again.
`);
  } finally {
    await browser.close();
  }
}

type ContextCookie = Awaited<ReturnType<BrowserContext["cookies"]>>[number];

function toSessionCookie(cookie: ContextCookie): SessionCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    sameSite: cookie.sameSite,
  };
}

main().catch((error) => {
  console.error("Auth failed:", error);
  process.exit(1);
});
