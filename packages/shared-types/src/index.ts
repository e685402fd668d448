export * from "./domain/webapp-manifest";
export * from "./runtime/ui-schema";
export * from "./issues";
