export * from "./anchors";
export * from "./baseExtractor";
export * from "./capitalCall";
export * from "./distributionNotice";
export * from "./fields";
export * from "./layout";
export * from "./quarterlyUpdate";
export * from "./registry";
export type { ExtractionContext, Extractor } from "./types";
export * from "./valuationReport";
