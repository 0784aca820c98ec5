import crypto from "node:crypto";
import { buildLayoutFromText } from "../extract/layout";
import { isTerminal } from "./stateMachine";
import type { Document, DocumentLayout, DocumentRecord, FieldMap, FieldResult } from "../types";

export interface DocumentInput {
  id?: string;
  text: string;
  layout?: DocumentLayout;
  sourceName?: string;
}

export function contentHashOf(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

export function documentIdFor(text: string, sourceName?: string): string {
  const digest = crypto
    .createHash("sha256")
    .update(`${sourceName ?? ""}\n${text}`)
    .digest("hex");
  return `doc_${digest.slice(0, 16)}`;
}

export function createDocument(input: DocumentInput, now: Date): Document {
  const createdAt = now.toISOString();
  const layout = input.layout && input.layout.lines.length > 0 ? input.layout : buildLayoutFromText(input.text);
  const document: Document = {
    id: input.id ?? documentIdFor(input.text, input.sourceName),
    source: { text: input.text, layout, sourceName: input.sourceName },
    contentHash: contentHashOf(input.text),
    state: "ingested",
    documentType: null,
    classification: null,
    fields: [],
    validationErrors: [],
    retryCount: 0,
    failure: null,
    createdAt,
    lastTransitionedAt: createdAt,
  };
  return Object.freeze(document);
}

export function fieldMapOf(fields: readonly FieldResult[]): FieldMap {
  const map: FieldMap = {};
  for (const field of fields) {
    map[field.name] = field;
  }
  return map;
}

export function toRecord(document: Document): DocumentRecord {
  if (!isTerminal(document)) {
    throw new Error(`document ${document.id} is not terminal (state ${document.state})`);
  }
  return {
    documentId: document.id,
    sourceName: document.source.sourceName,
    contentHash: document.contentHash,
    finalState: document.state,
    documentType: document.documentType,
    classification: document.classification,
    fields: [...document.fields],
    validationErrors: [...document.validationErrors],
    retryCount: document.retryCount,
    errorCode: document.failure?.code,
    errorMessage: document.failure?.message,
    createdAt: document.createdAt,
    completedAt: document.lastTransitionedAt,
  };
}
