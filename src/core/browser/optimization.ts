/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";
import { Logger } from "../utils/logger";

const BLOCKED_RESOURCE_TYPES = new Set(["image", "font", "media"]);

/**
 * Optimizes a page by blocking heavy resources (images, fonts, media).
 * Stylesheets stay enabled since the catalog tables are matched by class.
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  try {
    await page.route("**/*", (route) => {
      if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType()))
        return route.abort();
      return route.continue();
    });
  } catch (error) {
    Logger.debug("Resource blocking unavailable, loading page unfiltered", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
