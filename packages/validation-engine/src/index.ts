export * from "./zod-builder";
export * from "./ajv-builder";
export * from "./checks";
export * from "./errors";
export * from "./validate-manifest";
export * from "./bindings";
