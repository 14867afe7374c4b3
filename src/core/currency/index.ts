export * from "./converter";
export * from "./fx-provider";
export * from "./profiles";
