export * from "./analysis";
export * from "./report";
export * from "./verifier";
