export * from "./errors";
export * from "./names";
export * from "./option-grammar";
export * from "./types";
export * from "./values";
