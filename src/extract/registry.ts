import type { DocumentSchema, ExtractionConfig } from "../config";
import { RegistryConfigurationError, UnsupportedTypeError } from "../core/errors";
import { CLASSIFIED_DOCUMENT_TYPES } from "../types";
import type { ClassifiedDocumentType, DocumentLayout, DocumentType, FieldMap } from "../types";
import { CapitalCallExtractor } from "./capitalCall";
import { DistributionNoticeExtractor } from "./distributionNotice";
import { emptyField } from "./fields";
import { QuarterlyUpdateExtractor } from "./quarterlyUpdate";
import type { Extractor } from "./types";
import { ValuationReportExtractor } from "./valuationReport";

export class ExtractorRegistry {
  private readonly extractors: ReadonlyMap<ClassifiedDocumentType, Extractor>;
  private readonly schema: DocumentSchema;

  constructor(extractors: readonly Extractor[], schema: DocumentSchema) {
    const byType = new Map<ClassifiedDocumentType, Extractor>();
    for (const extractor of extractors) {
      if (byType.has(extractor.documentType)) {
        throw new RegistryConfigurationError(`duplicate extractor for document type "${extractor.documentType}"`);
      }
      byType.set(extractor.documentType, extractor);
    }
    this.extractors = byType;
    this.schema = schema;
    this.assertComplete();
  }

  getExtractor(documentType: DocumentType): Extractor {
    if (documentType === "unclassified") {
      throw new UnsupportedTypeError(documentType);
    }
    const extractor = this.extractors.get(documentType);
    if (!extractor) {
      throw new UnsupportedTypeError(documentType);
    }
    return extractor;
  }

  async extract(documentType: DocumentType, text: string, layout: DocumentLayout): Promise<FieldMap> {
    const extractor = this.getExtractor(documentType);
    const fields = await extractor.extract(text, layout);
    for (const name of this.schema[extractor.documentType]) {
      fields[name] ??= emptyField(name, "not extracted");
    }
    return fields;
  }

  private assertComplete(): void {
    for (const documentType of CLASSIFIED_DOCUMENT_TYPES) {
      const extractor = this.extractors.get(documentType);
      if (!extractor) {
        throw new RegistryConfigurationError(`no extractor registered for document type "${documentType}"`);
      }
      const missing = this.schema[documentType].filter((field) => !extractor.fields.includes(field));
      if (missing.length > 0) {
        throw new RegistryConfigurationError(
          `extractor for "${documentType}" does not produce required field(s): ${missing.join(", ")}`,
        );
      }
    }
  }
}

export function createExtractorRegistry(config: ExtractionConfig, schema: DocumentSchema): ExtractorRegistry {
  return new ExtractorRegistry(
    [
      new CapitalCallExtractor(config),
      new DistributionNoticeExtractor(config),
      new ValuationReportExtractor(config),
      new QuarterlyUpdateExtractor(config),
    ],
    schema,
  );
}
