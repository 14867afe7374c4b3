/**
 * Centralized application configuration
 */

import {
  CACHE_CONSTANTS,
  CATALOG_CONSTANTS,
  CURRENCY_CONSTANTS,
  NETWORK_CONSTANTS,
} from "../constants/index";
import { envBool, envInt, envStr } from "./env";

export class AppConfig {
  // Catalog source configuration
  static readonly CATALOG_URL = envStr("CATALOG_URL", CATALOG_CONSTANTS.URL);
  static readonly HEADLESS = envBool("HEADLESS", true);
  static readonly REQUEST_TIMEOUT_MS = envInt(
    "REQUEST_TIMEOUT_MS",
    NETWORK_CONSTANTS.REQUEST_TIMEOUT_MS,
  );
  static readonly NAVIGATION_TIMEOUT_MS = envInt(
    "NAVIGATION_TIMEOUT_MS",
    NETWORK_CONSTANTS.NAVIGATION_TIMEOUT_MS,
  );
  static readonly SELECTOR_TIMEOUT_MS = envInt(
    "SELECTOR_TIMEOUT_MS",
    NETWORK_CONSTANTS.SELECTOR_TIMEOUT_MS,
  );
  static readonly SCRAPE_WITH_RETRY = envBool("SCRAPE_WITH_RETRY", false);
  static readonly SCRAPE_MAX_ATTEMPTS = envInt(
    "SCRAPE_MAX_ATTEMPTS",
    NETWORK_CONSTANTS.SCRAPE_MAX_ATTEMPTS,
  );

  // Cache configuration
  static readonly CACHE_DIR = envStr("CACHE_DIR", CACHE_CONSTANTS.DIR);
  static readonly CATALOG_CACHE_TTL_HOURS = envInt(
    "CATALOG_CACHE_TTL_HOURS",
    CACHE_CONSTANTS.CATALOG_TTL_HOURS,
  );
  static readonly FX_CACHE_TTL_HOURS = envInt(
    "FX_CACHE_TTL_HOURS",
    CACHE_CONSTANTS.FX_TTL_HOURS,
  );

  // Exchange rate configuration
  static readonly FX_API_URL = envStr(
    "FX_API_URL",
    CURRENCY_CONSTANTS.FX_API_URL,
  );
  static readonly FX_BASE_CURRENCY = envStr(
    "FX_BASE_CURRENCY",
    CURRENCY_CONSTANTS.BASE_CURRENCY,
  ).toUpperCase();

  // Display configuration
  static readonly DEFAULT_CURRENCY = envStr(
    "DEFAULT_CURRENCY",
    CURRENCY_CONSTANTS.DEFAULT_CURRENCY_KEY,
  );
}
