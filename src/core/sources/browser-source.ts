/**
 * Headless browser price source
 */

import { performance } from "node:perf_hooks";
import type { Browser, BrowserContext, Page } from "playwright";
import { launchBrowser, newDesktopContext, optimizePage } from "../browser/index";
import { CATALOG_CONSTANTS, NETWORK_CONSTANTS } from "../constants/index";
import { NetworkError, ParseError, toError } from "../errors/index";
import { extractPrices } from "../extraction/index";
import type { PriceSource } from "../types/index";
import { Logger } from "../utils/logger";

export interface BrowserSourceOptions {
  url?: string;
  headless?: boolean;
  userAgent?: string;
  navigationTimeoutMs?: number;
  selectorTimeoutMs?: number;
}

interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

/**
 * Renders the catalog page in headless Chromium so client-side rendered
 * tables are present before extraction. A browser is launched per fetch
 * unless the caller holds a session open through withSession.
 */
export class BrowserFetchSource implements PriceSource {
  readonly name = "Catalog wiki (browser)";
  private session: BrowserSession | null = null;

  constructor(private readonly options: BrowserSourceOptions = {}) {}

  private get url(): string {
    return this.options.url ?? CATALOG_CONSTANTS.URL;
  }

  async fetchMarkup(): Promise<string> {
    if (this.session) return this.render(this.session.page);
    return this.useSession((s) => this.render(s.page));
  }

  async fetchPrices(): Promise<number[]> {
    const t0 = performance.now();
    const prices = extractPrices(await this.fetchMarkup());
    Logger.pricesExtracted(this.name, prices.length, Math.round(performance.now() - t0));
    return prices;
  }

  async resetSession(): Promise<void> {
    if (this.session) await this.session.context.clearCookies();
  }

  async withSession<T>(work: () => Promise<T>): Promise<T> {
    return this.useSession(() => work());
  }

  private async useSession<T>(work: (session: BrowserSession) => Promise<T>): Promise<T> {
    if (this.session) return work(this.session);

    const session = await this.openSession();
    this.session = session;
    try {
      return await work(session);
    } finally {
      this.session = null;
      await this.closeSession(session);
    }
  }

  private async openSession(): Promise<BrowserSession> {
    let browser: Browser;
    try {
      browser = await launchBrowser({ headless: this.options.headless });
    } catch (error) {
      const cause = toError(error);
      throw new NetworkError(`Could not launch browser: ${cause.message}`, this.url, {
        cause,
      });
    }

    try {
      const context = await newDesktopContext(browser, {
        userAgent: this.options.userAgent,
      });
      const page = await context.newPage();
      await optimizePage(page);
      return { browser, context, page };
    } catch (error) {
      await this.closeSession({ browser });
      const cause = toError(error);
      throw new NetworkError(`Could not open browser page: ${cause.message}`, this.url, {
        cause,
      });
    }
  }

  private async closeSession(session: Pick<BrowserSession, "browser">): Promise<void> {
    try {
      await session.browser.close();
    } catch (error) {
      Logger.warn("Could not close browser", {
        source: this.name,
        error: toError(error).message,
      });
    }
  }

  private async render(page: Page): Promise<string> {
    const navigationTimeout =
      this.options.navigationTimeoutMs ?? NETWORK_CONSTANTS.NAVIGATION_TIMEOUT_MS;
    const selectorTimeout =
      this.options.selectorTimeoutMs ?? NETWORK_CONSTANTS.SELECTOR_TIMEOUT_MS;

    Logger.info(`Scraping ${this.url} with Playwright`, { source: this.name, url: this.url });
    try {
      await page.goto(this.url, { waitUntil: "networkidle", timeout: navigationTimeout });
    } catch (error) {
      const cause = toError(error);
      throw new NetworkError(`Navigation to ${this.url} failed: ${cause.message}`, this.url, {
        cause,
      });
    }

    try {
      await page.waitForSelector(CATALOG_CONSTANTS.TABLE_SELECTOR, {
        timeout: selectorTimeout,
      });
    } catch (error) {
      throw new ParseError(
        `Catalog table did not appear within ${selectorTimeout}ms`,
        { cause: error },
      );
    }

    return await page.content();
  }
}
