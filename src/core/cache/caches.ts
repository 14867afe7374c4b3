/**
 * The two caches used by the pipeline: catalog total and exchange rates
 */

import path from "node:path";
import { CACHE_CONSTANTS } from "../constants/index";
import type { ExchangeRateTable } from "../types/index";
import { hoursToMs } from "../utils/date";
import { isInteger, isRateTable } from "../validation/index";
import { JsonFileCache } from "./json-file-cache";

export interface CacheOptions {
  dir?: string;
  ttlHours?: number;
  now?: () => number;
}

/** Aggregate catalog total in VP, persisted as { price, timestamp } */
export function createCatalogCache(options: CacheOptions = {}): JsonFileCache<number> {
  return new JsonFileCache<number>({
    file: path.join(options.dir ?? CACHE_CONSTANTS.DIR, CACHE_CONSTANTS.CATALOG_FILE),
    valueKey: "price",
    ttlMs: hoursToMs(options.ttlHours ?? CACHE_CONSTANTS.CATALOG_TTL_HOURS),
    isValue: isInteger,
    label: "skin prices",
    now: options.now,
  });
}

/** Exchange rate table, persisted as { rates, timestamp } */
export function createFxCache(options: CacheOptions = {}): JsonFileCache<ExchangeRateTable> {
  return new JsonFileCache<ExchangeRateTable>({
    file: path.join(options.dir ?? CACHE_CONSTANTS.DIR, CACHE_CONSTANTS.FX_FILE),
    valueKey: "rates",
    ttlMs: hoursToMs(options.ttlHours ?? CACHE_CONSTANTS.FX_TTL_HOURS),
    isValue: isRateTable,
    label: "exchange rates",
    now: options.now,
  });
}
