/**
 * Plain HTTP price source
 */

import { performance } from "node:perf_hooks";
import { CATALOG_CONSTANTS, NETWORK_CONSTANTS } from "../constants/index";
import { extractPrices } from "../extraction/index";
import { fetchText } from "../http/index";
import type { PriceSource } from "../types/index";
import { Logger } from "../utils/logger";

export interface HttpSourceOptions {
  url?: string;
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Fetches the catalog page with a single GET and extracts from the raw
 * body. Cheaper than the browser source but sees only server-rendered
 * markup.
 */
export class HttpFetchSource implements PriceSource {
  readonly name = "Catalog wiki (http)";

  constructor(private readonly options: HttpSourceOptions = {}) {}

  async fetchMarkup(): Promise<string> {
    const url = this.options.url ?? CATALOG_CONSTANTS.URL;
    Logger.info(`Fetching ${url}`, { source: this.name, url });
    return await fetchText(url, {
      timeoutMs: this.options.timeoutMs ?? NETWORK_CONSTANTS.REQUEST_TIMEOUT_MS,
      userAgent: this.options.userAgent,
    });
  }

  async fetchPrices(): Promise<number[]> {
    const t0 = performance.now();
    const prices = extractPrices(await this.fetchMarkup());
    Logger.pricesExtracted(this.name, prices.length, Math.round(performance.now() - t0));
    return prices;
  }
}
