export * from "./types";
export * from "./ParseError";
export * from "./Parse";
export * from "./helpers";
