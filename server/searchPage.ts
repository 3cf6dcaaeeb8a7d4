// What the flight search needs from a rendering engine. The Puppeteer adapter
// lives in puppeteerSearchPage.ts; tests supply in-memory pages.

export interface PageElement {
  innerText(): Promise<string>;
  fill(value: string): Promise<void>;
  click(): Promise<void>;
}

export interface SearchPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  queryAll(selector: string): Promise<PageElement[]>;
  /** Releases the page and whatever browser backs it. */
  close(): Promise<void>;
}

export type OpenSearchPage = () => Promise<SearchPage>;
