import type { DocumentRecord, StatusEvent } from "../types";
import { emptyStats } from "./stats";
import type { PipelineStore, RunRecord, StoreStats } from "./types";

function cloneRecord(record: DocumentRecord): DocumentRecord {
  return structuredClone(record);
}

export class InMemoryStore implements PipelineStore {
  private readonly records = new Map<string, DocumentRecord>();
  private readonly events = new Map<string, StatusEvent[]>();
  private readonly runs = new Map<string, RunRecord>();

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { runId, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) {
      return;
    }
    this.runs.set(runId, { ...run, status, finishedAt });
  }

  async findByContentHash(contentHash: string): Promise<DocumentRecord | undefined> {
    let latest: DocumentRecord | undefined;
    for (const record of this.records.values()) {
      if (record.contentHash !== contentHash) {
        continue;
      }
      if (!latest || record.completedAt > latest.completedAt) {
        latest = record;
      }
    }
    return latest ? cloneRecord(latest) : undefined;
  }

  async saveRecord(record: DocumentRecord): Promise<void> {
    this.records.set(record.documentId, cloneRecord(record));
    this.events.delete(record.documentId);
  }

  async appendEvents(events: StatusEvent[]): Promise<void> {
    for (const event of events) {
      const existing = (this.events.get(event.documentId) ?? []).filter((item) => item.sequence !== event.sequence);
      existing.push({ ...event });
      existing.sort((left, right) => left.sequence - right.sequence);
      this.events.set(event.documentId, existing);
    }
  }

  async getRecord(documentId: string): Promise<DocumentRecord | undefined> {
    const record = this.records.get(documentId);
    return record ? cloneRecord(record) : undefined;
  }

  async listEvents(documentId: string): Promise<StatusEvent[]> {
    return (this.events.get(documentId) ?? []).map((event) => ({ ...event }));
  }

  async getStats(): Promise<StoreStats> {
    const stats = emptyStats();
    for (const record of this.records.values()) {
      stats.totalDocuments += 1;
      if (record.finalState === "stored") {
        stats.stored += 1;
      } else {
        stats.failed += 1;
      }
      if (record.documentType) {
        stats.byType[record.documentType] += 1;
      }
      if (record.errorCode) {
        stats.byErrorCode[record.errorCode] = (stats.byErrorCode[record.errorCode] ?? 0) + 1;
      }
    }
    for (const events of this.events.values()) {
      stats.events += events.length;
    }
    stats.runs = this.runs.size;
    return stats;
  }

  async close(): Promise<void> {
    return;
  }
}
