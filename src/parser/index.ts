export * from "./types";
export * from "./misc";
export * from "./Context";
export * from "./Parser";
export * from "./OfType";
export * from "./Predicate";
export * from "./Sequence";
export * from "./Repeatable";
export * from "./Not";
export * from "./Choice";
export * from "./Flatten";
export * from "./Rule";
export * from "./helpers";
