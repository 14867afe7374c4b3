export * from "./caches";
export * from "./json-file-cache";
