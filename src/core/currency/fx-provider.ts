/**
 * Exchange rates behind a fallback chain and a TTL cache
 */

import type { JsonFileCache } from "../cache/index";
import { CURRENCY_CONSTANTS, NETWORK_CONSTANTS } from "../constants/index";
import { ExhaustionError, NetworkError, ValidationError, toError } from "../errors/index";
import { fetchJson } from "../http/index";
import type { ExchangeRateTable, RateSource, RateStrategy } from "../types/index";
import { Logger } from "../utils/logger";
import { validateRatePayload } from "../validation/index";
import { STATIC_USD_RATES } from "./profiles";

export interface LiveRateApiOptions {
  url?: string;
  timeoutMs?: number;
}

/** Live rates from {url}/{base} */
export class LiveRateApi implements RateStrategy {
  readonly name = "Live rate API";

  constructor(private readonly options: LiveRateApiOptions = {}) {}

  async fetchRates(base: string): Promise<ExchangeRateTable> {
    const url = `${this.options.url ?? CURRENCY_CONSTANTS.FX_API_URL}/${encodeURIComponent(base)}`;
    const payload = await fetchJson(url, {
      timeoutMs: this.options.timeoutMs ?? NETWORK_CONSTANTS.REQUEST_TIMEOUT_MS,
    });
    return validateRatePayload(payload);
  }
}

/**
 * Slot for a second rate provider. No provider is wired in, so this stage
 * always fails and the chain moves on to the static table.
 */
export class SecondaryRateApi implements RateStrategy {
  readonly name = "Secondary rate API";

  async fetchRates(base: string): Promise<ExchangeRateTable> {
    throw new NetworkError(`No secondary exchange rate provider configured for ${base}`);
  }
}

/** Hardcoded approximate rates, rebased onto the requested base currency */
export class StaticRateTable implements RateStrategy {
  readonly name = "Static rate table";

  constructor(private readonly usdRates: Readonly<Record<string, number>> = STATIC_USD_RATES) {}

  async fetchRates(base: string): Promise<ExchangeRateTable> {
    const baseRate = this.usdRates[base];
    if (baseRate === undefined) {
      throw new ValidationError(`Static rate table has no rate for ${base}`, "base");
    }
    const rates: ExchangeRateTable = {};
    for (const [code, rate] of Object.entries(this.usdRates)) {
      rates[code] = rate / baseRate;
    }
    return rates;
  }
}

export function defaultRateStrategies(options: LiveRateApiOptions = {}): RateStrategy[] {
  return [new LiveRateApi(options), new SecondaryRateApi(), new StaticRateTable()];
}

/**
 * Serves the cached table while it is fresh, otherwise walks the strategies
 * in order and caches the first non-empty table
 */
export class FxRateProvider implements RateSource {
  constructor(
    private readonly strategies: readonly RateStrategy[],
    private readonly cache: JsonFileCache<ExchangeRateTable>,
    readonly baseCurrency: string = CURRENCY_CONSTANTS.BASE_CURRENCY,
  ) {}

  /**
   * @throws ExhaustionError when every strategy fails
   */
  async getRates(): Promise<ExchangeRateTable> {
    const cached = await this.cache.read();
    if (cached) return cached;

    const failures: Error[] = [];
    for (const strategy of this.strategies) {
      try {
        const rates = await strategy.fetchRates(this.baseCurrency);
        if (Object.keys(rates).length === 0) {
          Logger.warn(`${strategy.name} returned no rates`, { source: strategy.name });
          continue;
        }
        const table: ExchangeRateTable = { ...rates, [this.baseCurrency]: 1 };
        Logger.info(`Fetched exchange rates from ${strategy.name}`, {
          source: strategy.name,
          count: Object.keys(table).length,
        });
        await this.cache.write(table);
        return table;
      } catch (error) {
        const err = toError(error);
        failures.push(err);
        Logger.sourceFailed(strategy.name, err);
      }
    }

    throw new ExhaustionError("All exchange rate sources failed", failures);
  }

  async refresh(): Promise<void> {
    await this.cache.invalidate();
  }
}
