export * from "./Span";
export * from "./Token";
