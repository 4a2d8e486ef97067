export * from "./Report";
