// Puppeteer-backed SearchPage: one stealth browser per search, closed with the page.

import puppeteerCore, { type Browser, type ElementHandle, type Page } from "puppeteer-core";
import { addExtra } from "puppeteer-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";

import { log } from "./logger";
import type { OpenSearchPage, PageElement, SearchPage } from "./searchPage";

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

export interface BrowserOptions {
  executablePath?: string;
  headless: boolean;
}

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const toPageElement = (handle: ElementHandle<Element>): PageElement => ({
  innerText: () =>
    handle.evaluate((el) => (el instanceof HTMLElement ? el.innerText : el.textContent ?? "")),
  async fill(value: string) {
    await handle.evaluate((el, nextValue) => {
      if (!(el instanceof HTMLInputElement)) {
        throw new Error(`Cannot fill <${el.tagName.toLowerCase()}>`);
      }
      el.focus();
      el.value = nextValue;
      el.dispatchEvent(new Event("input", { bubbles: true }));
      el.dispatchEvent(new Event("change", { bubbles: true }));
    }, value);
  },
  async click() {
    await handle.click();
  },
});

const wrapPage = (browser: Browser, page: Page): SearchPage => ({
  async goto(url, timeoutMs) {
    await page.goto(url, { waitUntil: "load", timeout: timeoutMs });
  },
  async queryAll(selector) {
    const handles = await page.$$(selector);
    return handles.map(toPageElement);
  },
  async close() {
    try {
      await page.close();
    } finally {
      await browser.close();
      log("🔒 Browser closed", "browser");
    }
  },
});

export const createPuppeteerPageOpener =
  (options: BrowserOptions): OpenSearchPage =>
  async () => {
    log("🚀 Launching browser with stealth mode...", "browser");

    const browser: Browser = await puppeteer.launch({
      headless: options.headless,
      ...(options.executablePath
        ? { executablePath: options.executablePath }
        : { channel: "chrome" as const }),
      args: [
        "--no-sandbox",
        "--disable-setuid-sandbox",
        "--disable-dev-shm-usage",
        "--disable-blink-features=AutomationControlled",
        "--window-size=1920,1080",
      ],
      defaultViewport: { width: 1920, height: 1080 },
    });

    try {
      const page = await browser.newPage();
      await page.setUserAgent(USER_AGENT);
      return wrapPage(browser, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  };
