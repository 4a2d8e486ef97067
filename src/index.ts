export * from "./token";
export * from "./result";
export * from "./internals";
export * from "./utility";
export * from "./parser";
export * from "./report";
