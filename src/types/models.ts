import type { Scored } from "./scored";

export const DOCUMENT_TYPES = [
  "capital_call",
  "distribution_notice",
  "valuation_report",
  "quarterly_update",
  "unclassified",
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export type ClassifiedDocumentType = Exclude<DocumentType, "unclassified">;

export const CLASSIFIED_DOCUMENT_TYPES: readonly ClassifiedDocumentType[] = [
  "capital_call",
  "distribution_notice",
  "valuation_report",
  "quarterly_update",
];

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === "string" && (DOCUMENT_TYPES as readonly string[]).includes(value);
}

export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface LayoutWord {
  text: string;
  bbox: BoundingBox;
}

export interface LayoutLine {
  page: number;
  lineNumber: number;
  text: string;
  bbox?: BoundingBox;
  words?: LayoutWord[];
}

export interface DocumentLayout {
  pageCount: number;
  lines: LayoutLine[];
}

export type ClassificationTier = "model" | "rule" | "none";

export interface ClassificationResult {
  documentType: DocumentType;
  confidence: number;
  tier: ClassificationTier;
  evidence: string;
}

export type FieldSource = "anchor" | "section" | "pattern" | "derived" | "none";

export type FieldFlag = "ambiguous_date" | "inferred_currency" | "unrecognized_identifier";

export interface KeyValuePair {
  key: string;
  value: string;
}

export type FieldValue =
  | { kind: "string"; value: string }
  | { kind: "date"; value: string }
  | { kind: "amount"; value: string; currency: string }
  | { kind: "enum"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "pairs"; value: KeyValuePair[] }
  | { kind: "mapping"; value: Record<string, string> }
  | { kind: "segments"; value: string[] };

export interface FieldResult extends Scored<FieldValue | null, FieldSource> {
  name: string;
  rawSpan: string;
  flags: FieldFlag[];
}

export type FieldMap = Record<string, FieldResult>;

export type ValidationSeverity = "warning" | "blocking";

export interface ValidationError {
  field: string;
  ruleId: string;
  message: string;
  severity: ValidationSeverity;
}

export type PipelineState =
  | "ingested"
  | "classifying"
  | "classified"
  | "extracting"
  | "extracted"
  | "validating"
  | "stored"
  | "failed";

export type ErrorCode =
  | "TransientModelError"
  | "ExtractionError"
  | "ExhaustedRetriesError"
  | "UnsupportedTypeError"
  | "ValidationBlockingError"
  | "CancelledError";

export interface FailureInfo {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export interface DocumentSource {
  text: string;
  layout: DocumentLayout;
  sourceName?: string;
}

export interface Document {
  readonly id: string;
  readonly source: DocumentSource;
  readonly contentHash: string;
  readonly state: PipelineState;
  readonly documentType: DocumentType | null;
  readonly classification: ClassificationResult | null;
  readonly fields: readonly FieldResult[];
  readonly validationErrors: readonly ValidationError[];
  readonly retryCount: number;
  readonly failure: FailureInfo | null;
  readonly createdAt: string;
  readonly lastTransitionedAt: string;
}

export interface StatusEvent {
  documentId: string;
  sequence: number;
  fromState: PipelineState;
  toState: PipelineState;
  timestamp: string;
  retryCount: number;
  confidence?: number;
  errorCode?: ErrorCode;
  message?: string;
}

export interface DocumentRecord {
  documentId: string;
  sourceName?: string;
  contentHash: string;
  finalState: "stored" | "failed";
  documentType: DocumentType | null;
  classification: ClassificationResult | null;
  fields: FieldResult[];
  validationErrors: ValidationError[];
  retryCount: number;
  errorCode?: ErrorCode;
  errorMessage?: string;
  createdAt: string;
  completedAt: string;
}
