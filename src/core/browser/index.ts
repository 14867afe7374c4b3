export * from "./launcher";
export * from "./optimization";
