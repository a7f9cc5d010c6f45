import { describe, it, expect } from "vitest";
import { findCardOnScreen, processConversation, relocateCard, type AmplifierContext } from "./conversation";
import { embeddedSignature } from "../capture/signature";
import { FakeBrowser, FakeElement, FakePage, box, testConfig } from "../testing/fake-browser";
import { silentLogger } from "../logging/logger";
import { CONVERSATION, INBOX, POST } from "../selectors";
import type { Configuration } from "../types/config";

// ── Helpers ──

const CONVERSATION_URL = "https://x.com/messages/111-222";

/** Inbox with one conversation that opens on a watermark at y=500. */
function mainPage() {
  const composer = new FakeElement();
  const send = new FakeElement();
  const page = new FakePage()
    .define(INBOX.conversationCascade[0], [new FakeElement({ html: '<a href="/messages/111-222">Friend</a>' })])
    .define(CONVERSATION.content, [new FakeElement()])
    .define(CONVERSATION.messageText, [new FakeElement({ text: "Done", box: box(500) })])
    .define(CONVERSATION.composerCascade[0], [composer])
    .define(CONVERSATION.sendButton, [send]);
  page.currentUrl = "https://x.com/messages";
  return { page, composer, send };
}

/** A post tab where reposting works, or is already done. */
function postPage(state: "fresh" | "reposted" | "broken"): FakePage {
  const page = new FakePage();
  if (state === "broken") return page;
  page.define(POST.primaryCascade[0], [new FakeElement()]).define(POST.confirmCascade[0], [new FakeElement()]);
  if (state === "reposted") page.define(POST.undoMarker, [new FakeElement()]);
  return page;
}

function anchor(href: string, y: number): FakeElement {
  return new FakeElement({ attrs: { href }, box: box(y) });
}

function repostablePage(page: FakePage): FakePage {
  return page
    .define(POST.primaryCascade[0], (p) => (p.currentUrl.includes("/status/") ? [new FakeElement()] : []))
    .define(POST.confirmCascade[0], [new FakeElement()]);
}

function context(page: FakePage, browser: FakeBrowser, config: Configuration = testConfig()): AmplifierContext {
  return { config, browser, page, log: silentLogger };
}

// ═══════════════════════════════════════════════════════════════
// processConversation
// ═══════════════════════════════════════════════════════════════

describe("processConversation", () => {
  it("reposts new links in their own tab and posts a watermark", async () => {
    const { page, composer, send } = mainPage();
    page.define(CONVERSATION.statusAnchor, [anchor("/abc/status/100", 300), anchor("/xyz/status/200", 700)]);
    const browser = new FakeBrowser(() => postPage("fresh"));

    const summary = await processConversation(context(page, browser), 0);

    expect(summary).toEqual({
      index: 0,
      conversationId: "111-222",
      opened: true,
      found: 1,
      amplified: 1,
      alreadyAmplified: 0,
      failed: 0,
      watermarkPosted: true,
    });
    expect(page.events[0]).toBe(`goto:${CONVERSATION_URL}`);
    expect(browser.pages).toHaveLength(1);
    expect(browser.pages[0].events).toEqual(["goto:https://x.com/xyz/status/200", "close"]);
    expect(composer.typed).toEqual(["Done"]);
    expect(send.clicks).toBe(1);
  });

  it("leaves no watermark when everything was already reposted", async () => {
    const { page, composer, send } = mainPage();
    page.define(CONVERSATION.statusAnchor, [anchor("/abc/status/100", 700)]);
    const browser = new FakeBrowser(() => postPage("reposted"));

    const summary = await processConversation(context(page, browser), 0);

    expect(summary.alreadyAmplified).toBe(1);
    expect(summary.amplified).toBe(0);
    expect(summary.watermarkPosted).toBe(false);
    expect(composer.typed).toEqual([]);
    expect(send.clicks).toBe(0);
  });

  it("leaves no watermark when every repost failed", async () => {
    const { page, composer } = mainPage();
    page.define(CONVERSATION.statusAnchor, [anchor("/abc/status/100", 700)]);
    const browser = new FakeBrowser(() => postPage("broken"));

    const summary = await processConversation(context(page, browser, testConfig({ maxRetries: 1 })), 0);

    expect(summary.failed).toBe(1);
    expect(summary.watermarkPosted).toBe(false);
    expect(composer.typed).toEqual([]);
    expect(browser.pages[0].reloads).toBe(1);
    expect(browser.pages[0].closed).toBe(true);
  });

  it("opens a post shared twice only once", async () => {
    const { page } = mainPage();
    page.define(CONVERSATION.statusAnchor, [anchor("/abc/status/100", 600), anchor("https://x.com/abc/status/100", 700)]);
    const browser = new FakeBrowser(() => postPage("fresh"));

    const summary = await processConversation(context(page, browser), 0);

    expect(summary.found).toBe(1);
    expect(browser.pages).toHaveLength(1);
  });

  it("reloads once when the first capture finds nothing", async () => {
    const { page, composer } = mainPage();
    const browser = new FakeBrowser();

    const summary = await processConversation(context(page, browser), 0);

    expect(page.reloads).toBe(1);
    expect(summary.found).toBe(0);
    expect(summary.opened).toBe(true);
    expect(browser.pages).toHaveLength(0);
    expect(composer.typed).toEqual([]);
  });

  it("gives up after the retry when the conversation cannot be opened", async () => {
    const page = new FakePage();
    const browser = new FakeBrowser();

    const summary = await processConversation(context(page, browser), 3);

    expect(summary).toEqual({
      index: 3,
      conversationId: null,
      opened: false,
      found: 0,
      amplified: 0,
      alreadyAmplified: 0,
      failed: 0,
      watermarkPosted: false,
    });
    expect(page.events).toEqual(["goto:https://x.com/messages"]);
  });

  it("clicks layout-only cards in place and returns to the conversation", async () => {
    const { page } = mainPage();
    const card = new FakeElement({
      text: "shared card",
      box: box(600),
      onClick: () => {
        page.currentUrl = "https://x.com/bob/status/9";
      },
    });
    repostablePage(page).define(CONVERSATION.embeddedPostCascade[0], [card]);
    const browser = new FakeBrowser();

    const summary = await processConversation(context(page, browser), 0);

    expect(summary.amplified).toBe(1);
    expect(summary.watermarkPosted).toBe(true);
    expect(card.clicks).toBe(1);
    expect(browser.pages).toHaveLength(0);
    expect(page.events).toEqual([`goto:${CONVERSATION_URL}`, `goto:${CONVERSATION_URL}`]);
    expect(page.url()).toBe(CONVERSATION_URL);
  });

  it("fails a layout-only card whose click never opens the post", async () => {
    const { page } = mainPage();
    const card = new FakeElement({ text: "shared card", box: box(600) });
    page.define(CONVERSATION.embeddedPostCascade[0], [card]);

    const summary = await processConversation(context(page, new FakeBrowser()), 0);

    expect(summary.failed).toBe(1);
    expect(card.clicks).toBe(3);
    expect(summary.watermarkPosted).toBe(false);
  });

  it("scrolls back to each layout-only card after the reload resets the history", async () => {
    const { page } = mainPage();
    page.define(CONVERSATION.messageText, []);
    page.onGoto = (url, p) => {
      if (url === CONVERSATION_URL) p.offset = 4000;
    };
    page.onScroll = (p) => {
      p.offset = Math.max(0, p.offset - 500);
    };
    const opensPost = (id: number) => () => {
      page.currentUrl = `https://x.com/bob/status/${id}`;
    };
    const first = new FakeElement({ text: "first card", box: box(200), onClick: opensPost(1) });
    const second = new FakeElement({ text: "second card", box: box(400), onClick: opensPost(2) });
    repostablePage(page).define(CONVERSATION.embeddedPostCascade[0], (p) => (p.offset <= 3000 ? [first, second] : []));

    const summary = await processConversation(context(page, new FakeBrowser()), 0);

    expect(summary.found).toBe(2);
    expect(summary.amplified).toBe(2);
    expect(summary.failed).toBe(0);
    expect(first.clicks).toBe(1);
    expect(second.clicks).toBe(1);
    expect(page.url()).toBe(CONVERSATION_URL);
  });

  it("keeps the outcome when the way back to the conversation fails", async () => {
    const { page, composer } = mainPage();
    let visits = 0;
    page.onGoto = (url) => {
      if (url === CONVERSATION_URL && ++visits === 2) throw new Error("net::ERR_TIMED_OUT");
    };
    const card = new FakeElement({
      text: "shared card",
      box: box(600),
      onClick: () => {
        page.currentUrl = "https://x.com/bob/status/9";
      },
    });
    repostablePage(page).define(CONVERSATION.embeddedPostCascade[0], [card]);

    const summary = await processConversation(context(page, new FakeBrowser()), 0);

    expect(summary.amplified).toBe(1);
    expect(summary.failed).toBe(0);
    expect(summary.watermarkPosted).toBe(true);
    expect(composer.typed).toEqual(["Done"]);
    expect(page.url()).toBe("https://x.com/bob/status/9");
  });
});

// ── Card relocation ──

describe("findCardOnScreen", () => {
  const first = new FakeElement({ text: "a", box: box(100) });
  const second = new FakeElement({ text: "b", box: box(600) });
  const page = new FakePage().define(CONVERSATION.embeddedPostCascade[0], [first, second]);

  it("finds the card whose layout matches, not the one at the same index", async () => {
    expect(await findCardOnScreen(page, embeddedSignature("<div></div>", "b", box(600)))).toBe(second);
  });

  it("falls back to the text when the card moved", async () => {
    expect(await findCardOnScreen(page, embeddedSignature("<div></div>", "b", box(900)))).toBe(second);
    expect(await findCardOnScreen(page, embeddedSignature("<div></div>", "b", null))).toBe(second);
  });

  it("returns null when neither layout nor text match", async () => {
    expect(await findCardOnScreen(page, embeddedSignature("<div></div>", "c", box(900)))).toBeNull();
  });
});

describe("relocateCard", () => {
  it("scrolls to the top of history and gives up when the card is gone", async () => {
    const page = new FakePage();
    page.offset = 1000;
    page.onScroll = (p) => {
      p.offset = Math.max(0, p.offset - 500);
    };

    const found = await relocateCard(page, embeddedSignature("<div></div>", "gone", box(300)), testConfig());

    expect(found).toBeNull();
    expect(page.scrollSteps).toBe(3);
  });
});

