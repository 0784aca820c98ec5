import type { ExtractionConfig } from "../config";
import type { ClassifiedDocumentType, DocumentLayout, FieldMap, LayoutLine } from "../types";

export interface Extractor {
  readonly documentType: ClassifiedDocumentType;
  readonly fields: readonly string[];
  extract(text: string, layout: DocumentLayout): Promise<FieldMap>;
}

export interface ExtractionContext {
  text: string;
  lines: LayoutLine[];
  config: ExtractionConfig;
  contextCurrency?: string;
}
