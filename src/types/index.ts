export * from "./models";
export * from "./scored";
