export * from "./browser-source";
export * from "./http-source";
export * from "./manager";
export * from "./retrying-source";
