export * from "./define";
export * from "./summary";
export * from "./mappers/raw-to-domain";
export * from "./mappers/domain-to-raw";
export * from "./mappers/domain-to-runtime";
