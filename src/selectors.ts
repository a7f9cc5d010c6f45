/**
 * DOM selectors for x.com, grouped by screen.
 *
 * The site ships UI variants and renames things ("retweet" became "repost"),
 * so most lookups are ordered cascades: first match wins.
 */

// ─── Inbox ─────────────────────────────────────────────────────────

export const INBOX = {
  /** Tried in order; the last two are desperate fallbacks. */
  conversationCascade: [
    '[data-testid="conversation"]',
    'div[data-testid="cellInnerDiv"]',
    'div[role="none"][data-testid="conversation"], div[tabindex="0"][data-testid="conversation"]',
    'div[role="tablist"] > div',
  ],
  ready: '[data-testid="conversation"], div[role="tablist"]',
} as const;

// ─── Conversation pane ─────────────────────────────────────────────

export const CONVERSATION = {
  /** Anything that proves the message pane rendered. */
  content: 'div[data-testid="DmActivityViewport"], div[data-testid="DMDrawer"], div[data-testid="messageEntry"]',
  /** Scrollable history container. */
  viewport: 'div[data-testid="DmActivityViewport"]',
  /** Embedded post card inside a message; the first selector that matches anything wins. */
  embeddedPostCascade: [
    'div[data-testid="messageEntry"] div[role="link"]',
    'div[data-testid="messageEntry"] div[data-testid="DMCompositeMessage"] div[role="link"]',
    'div[data-testid="messageEntry"] div[data-testid="cellInnerDiv"]',
    'div[data-testid="messageEntry"] div:has(> div[data-testid="tweetText"])',
  ],
  /** Plain anchors that may point at a status. */
  statusAnchor: 'div[data-testid="messageEntry"] a[href*="/status/"]',
  /** Text nodes of messages, scanned for the watermark. */
  messageText: 'div[data-testid="messageEntry"] span',
  composerCascade: [
    'div[data-testid="dmComposerTextInput"]',
    'div[contenteditable="true"][role="textbox"]',
    'div[data-contents="true"][role="textbox"]',
  ],
  sendButton: 'button[data-testid="dmComposerSendButton"]',
} as const;

// ─── Post page ─────────────────────────────────────────────────────

export const POST = {
  undoMarker: '[data-testid="unretweet"]',
  undoTexts: ["Undo repost", "Undo Retweet"],
  primaryCascade: [
    'button[data-testid="retweet"]',
    'button[aria-label*="repost"]',
    'button[aria-label*="Repost"]',
    'button[aria-label*="reposts"]',
    'button[aria-label*="Reposts"]',
    'button[aria-label*="retweet"]',
    'button[aria-label*="Retweet"]',
    'div[role="button"][data-testid="retweet"]',
    'div[aria-label*="repost"][role="button"]',
  ],
  /** Scanned by aria-label when the cascade is exhausted. */
  buttonLike: 'button, div[role="button"]',
  confirmCascade: [
    'div[data-testid="retweetConfirm"]',
    'div[role="menuitem"][data-testid="retweet"]',
    'div[data-testid="repost"]',
    'div[role="menuitem"]:has-text("Repost")',
    'div[role="menuitem"]:has-text("Retweet")',
    'div[role="menu"] span:has-text("Repost")',
    'div[role="menu"] span:has-text("Retweet")',
  ],
  /** Scanned by text when the confirm cascade is exhausted. */
  menuItem: 'div[role="menuitem"]',
  toast: 'div[role="alert"], div[data-testid="toast"]',
  /** Terms matched case-insensitively by the fallback scans. */
  actionTerms: ["retweet", "repost"],
} as const;

// ─── Profile page (undo utility) ───────────────────────────────────

export const PROFILE = {
  ready: 'div[data-testid="primaryColumn"]',
  /** The document itself scrolls on profile pages. */
  scrollRoot: "html",
  undoButton: 'button[data-testid="unretweet"]',
  undoConfirm: 'div[data-testid="unretweetConfirm"]',
} as const;
