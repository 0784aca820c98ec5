export * from "./rules";
export * from "./validator";
