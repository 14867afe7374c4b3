/**
 * Error taxonomy for the price acquisition pipeline.
 *
 * Only ExhaustionError is meant to reach callers; the others are caught at
 * the source, row or cache boundary they belong to.
 */

export class PricingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PricingError";
  }
}

/** Transport or navigation failure. */
export class NetworkError extends PricingError {
  constructor(
    message: string,
    public url?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/** Expected table or selector is structurally absent. */
export class ParseError extends PricingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** A single value is unparsable or outside its sanity bounds. */
export class ValidationError extends PricingError {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Reading or writing persisted cache state failed. */
export class CacheError extends PricingError {
  constructor(
    message: string,
    public file: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CacheError";
  }
}

/** Every source or rate stage failed. */
export class ExhaustionError extends PricingError {
  constructor(
    message: string,
    public failures: Error[] = [],
  ) {
    super(message);
    this.name = "ExhaustionError";
  }
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}
