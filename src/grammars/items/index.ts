export * from "./tokens";
export * from "./lexer";
export * from "./grammar";
