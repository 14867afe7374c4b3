/**
 * Supported display currencies
 *
 * basePrice is what the reference bundle of bundleVp VP costs in that
 * region's store.
 */

import type { CurrencyProfile, DisplayFormat } from "../types/index";

const fmt = (prefix: string, fractionDigits = 2): DisplayFormat => ({
  prefix,
  fractionDigits,
});

export const CURRENCY_PROFILES: Readonly<Record<string, CurrencyProfile>> = {
  "United States Dollar ($)": { code: "USD", displayFormat: fmt("$"), basePrice: 99.99, bundleVp: 11000 },
  "Australian Dollar (A$)": { code: "AUD", displayFormat: fmt("A$"), basePrice: 129.99, bundleVp: 9750 },
  "Brazilian Real (R$)": { code: "BRL", displayFormat: fmt("R$"), basePrice: 349.9, bundleVp: 11500 },
  "Canadian Dollar (CA$)": { code: "CAD", displayFormat: fmt("CA$"), basePrice: 139.99, bundleVp: 11000 },
  "Euro (€)": { code: "EUR", displayFormat: fmt("€"), basePrice: 100, bundleVp: 11000 },
  "Indian Rupee (₹)": { code: "INR", displayFormat: fmt("₹"), basePrice: 7900, bundleVp: 11000 },
  "Malaysian Ringgit (MYR)": { code: "MYR", displayFormat: fmt("MYR"), basePrice: 199.9, bundleVp: 6750 },
  "Mexican Dollar (MX$)": { code: "MXN", displayFormat: fmt("MX$"), basePrice: 1999, bundleVp: 12400 },
  "New Zealand Dollar (NZ$)": { code: "NZD", displayFormat: fmt("NZ$"), basePrice: 144.99, bundleVp: 9750 },
  "Russian Ruble (₽)": { code: "RUB", displayFormat: fmt("₽"), basePrice: 5990, bundleVp: 11000 },
  "Singapore Dollar (SGD)": { code: "SGD", displayFormat: fmt("SGD"), basePrice: 128.98, bundleVp: 10500 },
  "Turkish Lira (₺)": { code: "TRY", displayFormat: fmt("₺"), basePrice: 700, bundleVp: 8500 },
  "Pound Sterling (£)": { code: "GBP", displayFormat: fmt("£"), basePrice: 90, bundleVp: 11500 },
};

/**
 * Approximate USD-based rates, used when no rate API answers
 */
export const STATIC_USD_RATES: Readonly<Record<string, number>> = {
  USD: 1,
  AUD: 1.52,
  BRL: 5.05,
  CAD: 1.36,
  EUR: 0.92,
  INR: 83.2,
  MYR: 4.7,
  MXN: 17.1,
  NZD: 1.65,
  RUB: 91.5,
  SGD: 1.35,
  TRY: 32.2,
  GBP: 0.79,
};

/**
 * Drops trailing fractional zeros and a dangling decimal point
 * ("100.00" -> "100", "9.50" -> "9.5"); integers are left alone
 */
export function stripTrailingZeros(formatted: string): string {
  if (!formatted.includes(".")) return formatted;
  return formatted.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * Formats an amount with comma grouping and the profile's prefix
 */
export function formatAmount(amount: number, format: DisplayFormat): string {
  const digits = format.fractionDigits;
  const formatted = amount.toLocaleString("en-US", {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
  return `${format.prefix}${stripTrailingZeros(formatted)}`;
}
