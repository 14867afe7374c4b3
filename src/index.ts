/**
 * Library entry point. Build a context with createPricingContext() and use
 * its catalog, converter and verifier.
 */

export * from "./core/index";
