export * from "./types";
export * from "./loadConfig";
export * from "./documentSchema";
export { DEFAULT_REQUIRED_FIELDS } from "./defaults";
