/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Errors
export * from "./errors/index";

// Extraction
export * from "./extraction/index";

// Browser
export * from "./browser/index";

// HTTP
export * from "./http/index";

// Sources
export * from "./sources/index";

// Cache
export * from "./cache/index";

// Currency
export * from "./currency/index";

// Verification
export * from "./verification/index";

// Services
export * from "./services/index";

// Utils
export * from "./utils/index";

// Config
export * from "./config/index";

// Validation
export * from "./validation/index";

// Types
export type * from "./types/index";
