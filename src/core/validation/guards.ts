/**
 * Runtime checks for data read from disk or the network
 */

import { ValidationError } from "../errors/index";
import type { ExchangeRateTable } from "../types/index";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/**
 * True for a non-empty mapping of currency code to positive finite rate
 */
export function isRateTable(value: unknown): value is ExchangeRateTable {
  if (!isRecord(value)) return false;
  const entries = Object.entries(value);
  return entries.length > 0 && entries.every(([code, rate]) => isRateEntry(code, rate));
}

const isRateEntry = (code: string, rate: unknown): rate is number =>
  /^[A-Z]{3}$/.test(code) &&
  typeof rate === "number" &&
  Number.isFinite(rate) &&
  rate > 0;

/**
 * Validates an exchange rate API payload of the form { rates: {...} }
 * @returns The rate table
 * @throws ValidationError if the payload has no usable rates
 */
export function validateRatePayload(payload: unknown): ExchangeRateTable {
  if (!isRecord(payload)) {
    throw new ValidationError("Rate payload must be an object");
  }
  if (!isRecord(payload.rates)) {
    throw new ValidationError("Rate payload is missing rates", "rates");
  }

  // Drop malformed entries rather than rejecting the whole table
  const rates: ExchangeRateTable = {};
  for (const [key, rate] of Object.entries(payload.rates)) {
    const code = key.toUpperCase();
    if (isRateEntry(code, rate)) rates[code] = rate;
  }
  if (!isRateTable(rates)) {
    throw new ValidationError("Rate payload contains no valid rates", "rates");
  }
  return rates;
}
