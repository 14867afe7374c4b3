/**
 * Price source contract
 */

/**
 * One transport strategy in the source chain: fetch raw catalog markup and
 * reduce it to prices.
 */
export interface PriceSource {
  readonly name: string;
  fetchMarkup(): Promise<string>;
  fetchPrices(): Promise<number[]>;
  /** Clears cookies or other per-session state, where the transport keeps any */
  resetSession?(): Promise<void>;
  /** Keeps one session open across several fetches */
  withSession?<T>(work: () => Promise<T>): Promise<T>;
}
