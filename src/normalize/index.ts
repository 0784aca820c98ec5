export * from "./amounts";
export * from "./dates";
export * from "./identifiers";
export * from "./scalars";
