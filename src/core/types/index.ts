/**
 * Type exports
 */

export type * from "./catalog";
export type * from "./currency";
export type * from "./verification";
export type * from "./source";
