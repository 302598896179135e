export type * from "./client.types";
export * from "./bindings";
