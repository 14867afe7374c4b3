/**
 * Application constants
 */

// Catalog source constants
export const CATALOG_CONSTANTS = {
  URL: "https://valorant.fandom.com/wiki/Weapon_Skins",
  TABLE_SELECTOR: "table.wikitable.sortable",
  MIN_TABLES: 2,
  TARGET_TABLE_INDEXES: [1, 2],
  MARKED_CELL_SELECTOR: "td[data-sort-value]",
  // Marked cells echoed per table by the inspect command
  INSPECT_SAMPLE_SIZE: 5,
} as const;

// Sanity bounds for prices found by scanning unmarked cells
export const PRICE_BOUNDS = {
  MIN_VP: 800,
  MAX_VP: 6000,
} as const;

// Network constants
export const NETWORK_CONSTANTS = {
  REQUEST_TIMEOUT_MS: 10_000,
  NAVIGATION_TIMEOUT_MS: 30_000,
  SELECTOR_TIMEOUT_MS: 10_000,
  SCRAPE_MAX_ATTEMPTS: 3,
  SCRAPE_BASE_DELAY_MS: 1_000,
} as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ACCEPT_HEADER:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  ACCEPT_LANGUAGE: "en-US,en;q=0.5",
  VIEWPORT: { width: 1920, height: 1080 },
  LAUNCH_ARGS: [
    "--no-sandbox",
    "--disable-setuid-sandbox",
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--no-first-run",
    "--disable-background-timer-throttling",
    "--disable-renderer-backgrounding",
  ],
} as const;

// Cache constants
export const CACHE_CONSTANTS = {
  DIR: "cache",
  CATALOG_FILE: "skin_prices.json",
  FX_FILE: "exchange_rates.json",
  CATALOG_TTL_HOURS: 6,
  FX_TTL_HOURS: 24,
} as const;

// Currency constants
export const CURRENCY_CONSTANTS = {
  BASE_CURRENCY: "USD",
  FX_API_URL: "https://api.exchangerate-api.com/v4/latest",
  // 11000 VP sell for 100 USD
  VP_PER_USD: 110,
  DEFAULT_CURRENCY_KEY: "United States Dollar ($)",
  ERROR_PREFIX: "Error",
} as const;

// Verification constants
export const VERIFICATION_CONSTANTS = {
  // Purchasable skins listed on the catalog page as of 2025-08-02
  EXPECTED_TOTAL: 496,
  MAX_LISTED_ISSUES: 10,
  MAX_LISTED_DUPLICATES: 5,
  PLACEHOLDER_NAMES: ["—", "-"],
  UNKNOWN: "Unknown",
} as const;
