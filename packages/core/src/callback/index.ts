export * from "./callback-payload";
export * from "./callback-server";
