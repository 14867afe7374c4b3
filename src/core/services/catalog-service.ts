/**
 * Catalog Price Service - cache-first access to the catalog total
 * Can be used from the CLI or any other caller holding a pricing context
 */

import type { CacheEntry, JsonFileCache } from "../cache/index";
import type { SourceManager } from "../sources/index";
import type { PriceStatistics } from "../types/index";
import { Logger } from "../utils/logger";

export interface CacheStatus {
  capturedAt: Date;
  ageMs: number;
  fresh: boolean;
}

export class CatalogPriceService {
  constructor(
    private readonly sources: SourceManager,
    private readonly cache: JsonFileCache<number>,
  ) {}

  /**
   * Total VP of all catalog skins, served from cache while fresh
   * @throws ExhaustionError when no source delivers prices
   */
  async getTotal(): Promise<number> {
    const cached = await this.cache.read();
    if (cached !== null) return cached;

    const total = await this.sources.getTotal();
    Logger.info(`Successfully fetched total price: ${total} VP`, { total });
    await this.cache.write(total);
    return total;
  }

  /**
   * Statistics always come from a fresh fetch; only the total is cached
   */
  async getStatistics(): Promise<PriceStatistics> {
    return this.sources.getStatistics();
  }

  async refreshCache(): Promise<void> {
    await this.cache.invalidate();
  }

  async cacheStatus(): Promise<CacheStatus | null> {
    const entry: CacheEntry<number> | null = await this.cache.readEntry();
    if (!entry) return null;
    return {
      capturedAt: entry.capturedAt,
      ageMs: this.cache.ageMs(entry),
      fresh: this.cache.isFresh(entry),
    };
  }
}
