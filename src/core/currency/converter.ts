/**
 * VP to display currency conversion
 */

import { CURRENCY_CONSTANTS } from "../constants/index";
import { ValidationError, toError } from "../errors/index";
import type { CurrencyProfile, RateSource } from "../types/index";
import { Logger } from "../utils/logger";
import { CURRENCY_PROFILES, formatAmount } from "./profiles";

export interface ConverterOptions {
  profiles?: Readonly<Record<string, CurrencyProfile>>;
  vpPerUsd?: number;
}

// The VP anchor is quoted in USD
const ANCHOR_CODE = "USD";

export class CurrencyConverter {
  private readonly profiles: Readonly<Record<string, CurrencyProfile>>;
  private readonly vpPerUsd: number;

  constructor(
    private readonly rates: RateSource,
    options: ConverterOptions = {},
  ) {
    this.profiles = options.profiles ?? CURRENCY_PROFILES;
    this.vpPerUsd = options.vpPerUsd ?? CURRENCY_CONSTANTS.VP_PER_USD;
  }

  listCurrencies(): string[] {
    return Object.keys(this.profiles);
  }

  getProfile(currencyKey: string): CurrencyProfile | undefined {
    return Object.hasOwn(this.profiles, currencyKey) ? this.profiles[currencyKey] : undefined;
  }

  /**
   * Converts a VP amount at live exchange rates. Never throws: any failure
   * comes back as an "Error: ..." string for display.
   * @param amountVP - Amount in VP
   * @param currencyKey - One of listCurrencies()
   */
  async convert(amountVP: number, currencyKey: string): Promise<string> {
    try {
      const profile = this.requireProfile(currencyKey);
      const usd = amountVP / this.vpPerUsd;
      if (profile.code === ANCHOR_CODE) {
        return formatAmount(usd, profile.displayFormat);
      }

      const rates = await this.rates.getRates();
      const rate = rates[profile.code];
      const anchorRate = rates[ANCHOR_CODE];
      if (rate === undefined) {
        throw new ValidationError(`No exchange rate for ${profile.code}`, "rate");
      }
      if (anchorRate === undefined) {
        throw new ValidationError(`No exchange rate for ${ANCHOR_CODE}`, "rate");
      }
      return formatAmount((usd * rate) / anchorRate, profile.displayFormat);
    } catch (error) {
      return this.failure(error, currencyKey);
    }
  }

  /**
   * Converts at the regional store price of the reference VP bundle, with
   * no exchange rates involved. The result is rounded to whole units.
   */
  convertAtStorePrice(amountVP: number, currencyKey: string): string {
    try {
      const profile = this.requireProfile(currencyKey);
      const total = Math.round((amountVP / profile.bundleVp) * profile.basePrice);
      return formatAmount(total, profile.displayFormat);
    } catch (error) {
      return this.failure(error, currencyKey);
    }
  }

  private requireProfile(currencyKey: string): CurrencyProfile {
    const profile = this.getProfile(currencyKey);
    if (!profile) {
      throw new ValidationError(`Unknown currency "${currencyKey}"`, "currency");
    }
    return profile;
  }

  private failure(error: unknown, currencyKey: string): string {
    const err = toError(error);
    Logger.error("Currency conversion failed", err, { currency: currencyKey });
    return `${CURRENCY_CONSTANTS.ERROR_PREFIX}: ${err.message}`;
  }
}
