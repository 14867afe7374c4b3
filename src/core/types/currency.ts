/**
 * Currency types
 */

/** Rates relative to a base currency; the base always maps to 1 */
export type ExchangeRateTable = Record<string, number>;

export interface DisplayFormat {
  prefix: string;
  fractionDigits: number;
}

export interface CurrencyProfile {
  code: string;
  displayFormat: DisplayFormat;
  /** Regional store price of the reference bundle */
  basePrice: number;
  /** VP contained in the reference bundle */
  bundleVp: number;
}

/** Anything able to hand out the current rate table */
export interface RateSource {
  getRates(): Promise<ExchangeRateTable>;
}

/** One stage of the exchange rate fallback chain */
export interface RateStrategy {
  readonly name: string;
  fetchRates(base: string): Promise<ExchangeRateTable>;
}
