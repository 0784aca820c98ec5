export * from "./payload";
export * from "./readers";
