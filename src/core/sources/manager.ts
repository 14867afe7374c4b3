/**
 * Ordered fallback chain over price sources
 */

import { ExhaustionError, toError } from "../errors/index";
import type { PriceSource, PriceStatistics } from "../types/index";
import { sum } from "../utils/array";
import { Logger } from "../utils/logger";

/**
 * Computes summary statistics for a set of prices
 */
export function computeStatistics(prices: number[]): PriceStatistics {
  if (prices.length === 0) {
    return { count: 0, total: 0, average: 0, min: 0, max: 0, range: 0 };
  }
  const total = sum(prices);
  const min = Math.min(...prices);
  const max = Math.max(...prices);
  return {
    count: prices.length,
    total,
    average: total / prices.length,
    min,
    max,
    range: max - min,
  };
}

/**
 * Tries each source in priority order and returns the first non-empty
 * result unchanged. Results are never merged across sources.
 */
export class SourceManager {
  constructor(private readonly sources: readonly PriceSource[]) {}

  get sourceNames(): string[] {
    return this.sources.map((s) => s.name);
  }

  /**
   * @throws ExhaustionError when no source returns prices
   */
  async getPrices(): Promise<number[]> {
    return this.firstSuccess(
      "prices",
      (source) => source.fetchPrices(),
      (prices) => prices.length > 0,
    );
  }

  /**
   * Raw catalog markup from the first source able to deliver it
   * @throws ExhaustionError when no source returns markup
   */
  async getMarkup(): Promise<string> {
    return this.firstSuccess(
      "markup",
      (source) => source.fetchMarkup(),
      (html) => html.trim().length > 0,
    );
  }

  async getTotal(): Promise<number> {
    return sum(await this.getPrices());
  }

  async getStatistics(): Promise<PriceStatistics> {
    return computeStatistics(await this.getPrices());
  }

  private async firstSuccess<T>(
    what: string,
    fetch: (source: PriceSource) => Promise<T>,
    isNonEmpty: (result: T) => boolean,
  ): Promise<T> {
    const failures: Error[] = [];

    for (const source of this.sources) {
      Logger.sourceAttempt(source.name);
      try {
        const result = await fetch(source);
        if (isNonEmpty(result)) {
          Logger.info(`Successfully fetched ${what} from ${source.name}`, {
            source: source.name,
          });
          return result;
        }
        Logger.warn(`Source ${source.name} returned no ${what}`, { source: source.name });
      } catch (error) {
        const err = toError(error);
        failures.push(err);
        Logger.sourceFailed(source.name, err);
      }
    }

    throw new ExhaustionError(`All data sources failed to provide ${what}`, failures);
  }
}
