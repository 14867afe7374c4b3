export * from "./catalog-service";
export * from "./context";
