/**
 * Retry wrapper for price sources
 */

import { NETWORK_CONSTANTS } from "../constants/index";
import type { PriceSource } from "../types/index";
import { Logger } from "../utils/logger";
import { withRetry } from "../utils/retry";

export interface RetryingSourceOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Re-runs a source until it produces a non-empty result. Each attempt
 * starts from cleared session state. An attempt that throws backs off for
 * baseDelayMs * 2^attempt; an empty result is retried at once. Once
 * attempts run out the last error propagates.
 */
export class RetryingSource implements PriceSource {
  readonly name: string;
  private readonly maxAttempts: number;

  constructor(
    private readonly inner: PriceSource,
    private readonly options: RetryingSourceOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? NETWORK_CONSTANTS.SCRAPE_MAX_ATTEMPTS);
    this.name = `${inner.name} with retry`;
  }

  fetchMarkup(): Promise<string> {
    return this.run(() => this.inner.fetchMarkup(), (html) => html.length > 0);
  }

  fetchPrices(): Promise<number[]> {
    return this.run(() => this.inner.fetchPrices(), (prices) => prices.length > 0);
  }

  async resetSession(): Promise<void> {
    if (this.inner.resetSession) await this.inner.resetSession();
  }

  withSession<T>(work: () => Promise<T>): Promise<T> {
    return this.inner.withSession ? this.inner.withSession(work) : work();
  }

  private run<T>(operation: () => Promise<T>, isAcceptable: (result: T) => boolean): Promise<T> {
    return this.withSession(() =>
      withRetry(
        (attempt) => {
          Logger.info(`Scraping attempt ${attempt + 1}/${this.maxAttempts}`, {
            source: this.inner.name,
          });
          return operation();
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.options.baseDelayMs ?? NETWORK_CONSTANTS.SCRAPE_BASE_DELAY_MS,
          backoffMultiplier: 2,
          beforeAttempt: () => this.resetSession(),
          isAcceptable,
          sleep: this.options.sleep,
        },
      ),
    );
  }
}

/**
 * Wraps a source so that it is retried up to maxAttempts times
 */
export function scrapeWithRetry(source: PriceSource, maxAttempts?: number): RetryingSource {
  return new RetryingSource(source, { maxAttempts });
}
