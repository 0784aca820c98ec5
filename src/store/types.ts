import type { DocumentRecord, DocumentType, StatusEvent } from "../types";

export interface StoreStats {
  totalDocuments: number;
  stored: number;
  failed: number;
  byType: Record<DocumentType, number>;
  byErrorCode: Record<string, number>;
  events: number;
  runs: number;
}

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  status: "running" | "completed" | "failed";
}

export interface PipelineStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void>;
  /** Latest record with this content hash, if any. */
  findByContentHash(contentHash: string): Promise<DocumentRecord | undefined>;
  /** Replaces any earlier record for the same document id. */
  saveRecord(record: DocumentRecord): Promise<void>;
  appendEvents(events: StatusEvent[]): Promise<void>;
  getRecord(documentId: string): Promise<DocumentRecord | undefined>;
  listEvents(documentId: string): Promise<StatusEvent[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
