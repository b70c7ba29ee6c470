export * from "./invariants";
export * from "./logger";
export * from "./platform";
