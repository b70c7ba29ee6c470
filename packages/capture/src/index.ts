export * from "./capture";
export * from "./interpreter";
export * from "./runner";
