export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  documentId?: string;
  documentType?: string;
  state?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "documents_ingested"
  | "documents_duplicate"
  | "documents_stored"
  | "documents_failed"
  | "classified_model"
  | "classified_rule"
  | "classified_none"
  | "transient_retries";

export type MetricTimerName = "classify_ms" | "extract_ms" | "validate_ms" | "document_ms";
