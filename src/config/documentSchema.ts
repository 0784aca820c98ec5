import { RegistryConfigurationError } from "../core/errors";
import { CLASSIFIED_DOCUMENT_TYPES } from "../types";
import type { DocumentType } from "../types";
import type { DocumentSchema } from "./types";

export function assertSchemaComplete(schema: Partial<DocumentSchema>): asserts schema is DocumentSchema {
  for (const documentType of CLASSIFIED_DOCUMENT_TYPES) {
    const fields = schema[documentType];
    if (!fields || fields.length === 0) {
      throw new RegistryConfigurationError(`required-field list missing for document type "${documentType}"`);
    }
    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field)) {
        throw new RegistryConfigurationError(`duplicate required field "${field}" for document type "${documentType}"`);
      }
      seen.add(field);
    }
  }
}

export function requiredFieldsFor(schema: DocumentSchema, documentType: DocumentType): readonly string[] {
  if (documentType === "unclassified") {
    return [];
  }
  return schema[documentType];
}
