/**
 * Browser launching and configuration
 */

import { type Browser, type BrowserContext, chromium } from "playwright";
import { BROWSER_CONSTANTS } from "../constants/index";

export interface LaunchOptions {
  headless?: boolean;
  userAgent?: string;
}

/**
 * Launches a Chromium browser instance with optimized settings
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(options: LaunchOptions = {}): Promise<Browser> {
  return await chromium.launch({
    headless: options.headless ?? true,
    args: [...BROWSER_CONSTANTS.LAUNCH_ARGS],
  });
}

/**
 * Opens a browser context that presents itself like a desktop browser
 * @param browser - Browser to open the context in
 * @param options - User agent override
 */
export async function newDesktopContext(
  browser: Browser,
  options: LaunchOptions = {},
): Promise<BrowserContext> {
  return await browser.newContext({
    userAgent: options.userAgent ?? BROWSER_CONSTANTS.USER_AGENT,
    viewport: { ...BROWSER_CONSTANTS.VIEWPORT },
    extraHTTPHeaders: {
      Accept: BROWSER_CONSTANTS.ACCEPT_HEADER,
      "Accept-Language": BROWSER_CONSTANTS.ACCEPT_LANGUAGE,
      DNT: "1",
      "Upgrade-Insecure-Requests": "1",
    },
  });
}
