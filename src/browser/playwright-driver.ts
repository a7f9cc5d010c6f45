import { errors, type BrowserContext, type ElementHandle, type Page } from "playwright";
import type { Box, BrowserDriver, ElementRef, PageDriver } from "./driver";

type Handle = ElementHandle<SVGElement | HTMLElement>;

const NAVIGATION_TIMEOUT_MS = 30_000;
const CLICK_TIMEOUT_MS = 10_000;
const TYPE_DELAY_MS = 40;

export class PlaywrightElement implements ElementRef {
  constructor(readonly handle: Handle) {}

  async textContent(): Promise<string> {
    return (await this.handle.textContent()) ?? "";
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  outerHTML(): Promise<string> {
    return this.handle.evaluate((node) => node.outerHTML);
  }

  async boundingBox(): Promise<Box | null> {
    // Detached handles throw instead of returning null
    try {
      return await this.handle.boundingBox();
    } catch {
      return null;
    }
  }

  click(): Promise<void> {
    return this.handle.click({ timeout: CLICK_TIMEOUT_MS });
  }

  type(text: string): Promise<void> {
    return this.handle.type(text, { delay: TYPE_DELAY_MS });
  }

  async isSameElement(other: ElementRef): Promise<boolean> {
    if (!(other instanceof PlaywrightElement)) return false;
    return this.handle.evaluate((node, candidate) => node === candidate, other.handle);
  }
}

export class PlaywrightPage implements PageDriver {
  constructor(readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  async reload(): Promise<void> {
    await this.page.reload({ waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  async query(selector: string): Promise<ElementRef | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightElement(handle) : null;
  }

  async queryAll(selector: string): Promise<ElementRef[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<ElementRef | null> {
    try {
      // Playwright treats 0 as "no timeout"
      const handle = await this.page.waitForSelector(selector, {
        state: "visible",
        timeout: Math.max(1, timeoutMs),
      });
      return handle ? new PlaywrightElement(handle) : null;
    } catch (error) {
      if (error instanceof errors.TimeoutError) return null;
      throw error;
    }
  }

  countText(text: string): Promise<number> {
    return this.page.getByText(text, { exact: true }).count();
  }

  async scrollOffset(containerSelector: string): Promise<number> {
    const container = await this.page.$(containerSelector);
    if (container) return container.evaluate((node) => node.scrollTop);
    return this.page.evaluate(() => window.scrollY);
  }

  async scrollByViewport(containerSelector: string, pages: number): Promise<void> {
    const container = await this.page.$(containerSelector);
    if (container) {
      await container.evaluate((node, by) => node.scrollBy(0, by * node.clientHeight), pages);
      return;
    }
    await this.page.evaluate((by) => window.scrollBy(0, by * window.innerHeight), pages);
  }

  async viewportHeight(): Promise<number> {
    const size = this.page.viewportSize();
    if (size) return size.height;
    return this.page.evaluate(() => window.innerHeight);
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path });
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

/**
 * One logged-in browser context. Every `newPage()` is a new tab sharing
 * its cookies, which is what an isolated view needs.
 */
export class PlaywrightBrowser implements BrowserDriver {
  constructor(
    readonly context: BrowserContext,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  async newPage(): Promise<PageDriver> {
    return new PlaywrightPage(await this.context.newPage());
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.onClose();
  }
}
