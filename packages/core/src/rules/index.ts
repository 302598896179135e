export * from "./rule.types";
export * from "./filter";
export * from "./rule-set";
export * from "./rule-engine";
