export * from "./guards";
