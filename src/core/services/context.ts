/**
 * Explicit construction of the pricing pipeline. Callers own the returned
 * instances and pass them where needed; nothing here is a module singleton.
 */

import { createCatalogCache, createFxCache } from "../cache/index";
import { AppConfig } from "../config/index";
import {
  CurrencyConverter,
  FxRateProvider,
  defaultRateStrategies,
} from "../currency/index";
import {
  BrowserFetchSource,
  HttpFetchSource,
  RetryingSource,
  SourceManager,
} from "../sources/index";
import type { PriceSource, RateStrategy } from "../types/index";
import { QualityVerifier } from "../verification/index";
import { CatalogPriceService } from "./catalog-service";

export interface PricingOptions {
  catalogUrl: string;
  headless: boolean;
  requestTimeoutMs: number;
  navigationTimeoutMs: number;
  selectorTimeoutMs: number;
  scrapeWithRetry: boolean;
  scrapeMaxAttempts: number;
  cacheDir: string;
  catalogCacheTtlHours: number;
  fxCacheTtlHours: number;
  fxApiUrl: string;
  fxBaseCurrency: string;
  /** Replaces the default browser-then-http chain */
  sources?: PriceSource[];
  /** Replaces the default live-secondary-static chain */
  rateStrategies?: RateStrategy[];
  now?: () => number;
}

export interface PricingContext {
  sourceManager: SourceManager;
  catalog: CatalogPriceService;
  fxRates: FxRateProvider;
  converter: CurrencyConverter;
  verifier: QualityVerifier;
}

export function defaultPricingOptions(): PricingOptions {
  return {
    catalogUrl: AppConfig.CATALOG_URL,
    headless: AppConfig.HEADLESS,
    requestTimeoutMs: AppConfig.REQUEST_TIMEOUT_MS,
    navigationTimeoutMs: AppConfig.NAVIGATION_TIMEOUT_MS,
    selectorTimeoutMs: AppConfig.SELECTOR_TIMEOUT_MS,
    scrapeWithRetry: AppConfig.SCRAPE_WITH_RETRY,
    scrapeMaxAttempts: AppConfig.SCRAPE_MAX_ATTEMPTS,
    cacheDir: AppConfig.CACHE_DIR,
    catalogCacheTtlHours: AppConfig.CATALOG_CACHE_TTL_HOURS,
    fxCacheTtlHours: AppConfig.FX_CACHE_TTL_HOURS,
    fxApiUrl: AppConfig.FX_API_URL,
    fxBaseCurrency: AppConfig.FX_BASE_CURRENCY,
  };
}

/**
 * Browser first, plain HTTP second. With scrapeWithRetry the browser source
 * is wrapped in the retry variant.
 */
export function defaultSources(options: PricingOptions): PriceSource[] {
  const browser = new BrowserFetchSource({
    url: options.catalogUrl,
    headless: options.headless,
    navigationTimeoutMs: options.navigationTimeoutMs,
    selectorTimeoutMs: options.selectorTimeoutMs,
  });
  const http = new HttpFetchSource({
    url: options.catalogUrl,
    timeoutMs: options.requestTimeoutMs,
  });
  return [
    options.scrapeWithRetry
      ? new RetryingSource(browser, { maxAttempts: options.scrapeMaxAttempts })
      : browser,
    http,
  ];
}

export function createPricingContext(overrides: Partial<PricingOptions> = {}): PricingContext {
  const options: PricingOptions = { ...defaultPricingOptions(), ...overrides };

  const sourceManager = new SourceManager(options.sources ?? defaultSources(options));
  const catalog = new CatalogPriceService(
    sourceManager,
    createCatalogCache({
      dir: options.cacheDir,
      ttlHours: options.catalogCacheTtlHours,
      now: options.now,
    }),
  );
  const fxRates = new FxRateProvider(
    options.rateStrategies ??
      defaultRateStrategies({ url: options.fxApiUrl, timeoutMs: options.requestTimeoutMs }),
    createFxCache({ dir: options.cacheDir, ttlHours: options.fxCacheTtlHours, now: options.now }),
    options.fxBaseCurrency,
  );

  return {
    sourceManager,
    catalog,
    fxRates,
    converter: new CurrencyConverter(fxRates),
    verifier: new QualityVerifier(),
  };
}
