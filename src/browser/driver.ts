/**
 * Browser capabilities the engine consumes.
 *
 * The engine never touches Playwright directly: everything goes through
 * these three interfaces, which keeps the harvest/act logic testable against
 * an in-process fake.
 */

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ElementRef {
  textContent(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  outerHTML(): Promise<string>;
  /** Viewport-relative box, or null when detached or not rendered. */
  boundingBox(): Promise<Box | null>;
  click(): Promise<void>;
  type(text: string): Promise<void>;
  /** Raw DOM identity, stable across separate queries of the same node. */
  isSameElement(other: ElementRef): Promise<boolean>;
}

export interface PageDriver {
  url(): string;
  goto(url: string): Promise<void>;
  reload(): Promise<void>;
  query(selector: string): Promise<ElementRef | null>;
  queryAll(selector: string): Promise<ElementRef[]>;
  /** First visible match, or null once `timeoutMs` has elapsed. */
  waitForSelector(selector: string, timeoutMs: number): Promise<ElementRef | null>;
  /** Number of elements whose whole text is exactly `text`. */
  countText(text: string): Promise<number>;
  /**
   * Scroll offset of the first element matching `containerSelector`, or of
   * the window when nothing matches.
   */
  scrollOffset(containerSelector: string): Promise<number>;
  /** Scroll the container by `pages` × its own height (negative = up). */
  scrollByViewport(containerSelector: string, pages: number): Promise<void>;
  viewportHeight(): Promise<number>;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  /** Open an isolated view (a new tab in the same session). */
  newPage(): Promise<PageDriver>;
  close(): Promise<void>;
}

export function boxBottom(box: Box): number {
  return box.y + box.height;
}
