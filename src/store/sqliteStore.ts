import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DOCUMENT_TYPES } from "../types";
import type { DocumentRecord, DocumentType, ErrorCode, PipelineState, StatusEvent } from "../types";
import { emptyStats } from "./stats";
import type { PipelineStore, StoreStats } from "./types";

type DocumentRow = {
  documentId: string;
  sourceName: string | null;
  contentHash: string;
  finalState: "stored" | "failed";
  documentType: DocumentType | null;
  classificationJson: string | null;
  fieldsJson: string;
  validationErrorsJson: string;
  retryCount: number;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  createdAt: string;
  completedAt: string;
};

type EventRow = {
  documentId: string;
  sequence: number;
  fromState: PipelineState;
  toState: PipelineState;
  timestamp: string;
  retryCount: number;
  confidence: number | null;
  errorCode: ErrorCode | null;
  message: string | null;
};

const IN_MEMORY = ":memory:";

function toDocumentRecord(row: DocumentRow): DocumentRecord {
  const record: DocumentRecord = {
    documentId: row.documentId,
    contentHash: row.contentHash,
    finalState: row.finalState,
    documentType: row.documentType,
    classification: row.classificationJson ? JSON.parse(row.classificationJson) : null,
    fields: JSON.parse(row.fieldsJson),
    validationErrors: JSON.parse(row.validationErrorsJson),
    retryCount: row.retryCount,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
  };
  if (row.sourceName !== null) {
    record.sourceName = row.sourceName;
  }
  if (row.errorCode !== null) {
    record.errorCode = row.errorCode;
  }
  if (row.errorMessage !== null) {
    record.errorMessage = row.errorMessage;
  }
  return record;
}

function toStatusEvent(row: EventRow): StatusEvent {
  const event: StatusEvent = {
    documentId: row.documentId,
    sequence: row.sequence,
    fromState: row.fromState,
    toState: row.toState,
    timestamp: row.timestamp,
    retryCount: row.retryCount,
  };
  if (row.confidence !== null) {
    event.confidence = row.confidence;
  }
  if (row.errorCode !== null) {
    event.errorCode = row.errorCode;
  }
  if (row.message !== null) {
    event.message = row.message;
  }
  return event;
}

export class SqliteStore implements PipelineStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        startedAt,
      });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async findByContentHash(contentHash: string): Promise<DocumentRecord | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT * FROM documents
        WHERE contentHash = ?
        ORDER BY completedAt DESC, documentId ASC
        LIMIT 1
      `,
      )
      .get(contentHash) as DocumentRow | undefined;
    return row ? toDocumentRecord(row) : undefined;
  }

  async saveRecord(record: DocumentRecord): Promise<void> {
    const save = this.db.transaction((next: DocumentRecord) => {
      this.db.prepare("DELETE FROM document_events WHERE documentId = ?").run(next.documentId);
      this.db
        .prepare(
          `
          INSERT INTO documents (
            documentId, sourceName, contentHash, finalState, documentType,
            classificationJson, fieldsJson, validationErrorsJson, retryCount,
            errorCode, errorMessage, createdAt, completedAt, updatedAt
          )
          VALUES (
            @documentId, @sourceName, @contentHash, @finalState, @documentType,
            @classificationJson, @fieldsJson, @validationErrorsJson, @retryCount,
            @errorCode, @errorMessage, @createdAt, @completedAt, @updatedAt
          )
          ON CONFLICT(documentId) DO UPDATE SET
            sourceName = excluded.sourceName,
            contentHash = excluded.contentHash,
            finalState = excluded.finalState,
            documentType = excluded.documentType,
            classificationJson = excluded.classificationJson,
            fieldsJson = excluded.fieldsJson,
            validationErrorsJson = excluded.validationErrorsJson,
            retryCount = excluded.retryCount,
            errorCode = excluded.errorCode,
            errorMessage = excluded.errorMessage,
            createdAt = excluded.createdAt,
            completedAt = excluded.completedAt,
            updatedAt = excluded.updatedAt
        `,
        )
        .run({
          documentId: next.documentId,
          sourceName: next.sourceName ?? null,
          contentHash: next.contentHash,
          finalState: next.finalState,
          documentType: next.documentType,
          classificationJson: next.classification ? JSON.stringify(next.classification) : null,
          fieldsJson: JSON.stringify(next.fields),
          validationErrorsJson: JSON.stringify(next.validationErrors),
          retryCount: next.retryCount,
          errorCode: next.errorCode ?? null,
          errorMessage: next.errorMessage ?? null,
          createdAt: next.createdAt,
          completedAt: next.completedAt,
          updatedAt: new Date().toISOString(),
        });
    });
    save(record);
  }

  async appendEvents(events: StatusEvent[]): Promise<void> {
    const statement = this.db.prepare(`
      INSERT OR REPLACE INTO document_events (
        documentId, sequence, fromState, toState, timestamp, retryCount, confidence, errorCode, message
      )
      VALUES (
        @documentId, @sequence, @fromState, @toState, @timestamp, @retryCount, @confidence, @errorCode, @message
      )
    `);
    const insertAll = this.db.transaction((items: StatusEvent[]) => {
      for (const event of items) {
        statement.run({
          documentId: event.documentId,
          sequence: event.sequence,
          fromState: event.fromState,
          toState: event.toState,
          timestamp: event.timestamp,
          retryCount: event.retryCount,
          confidence: event.confidence ?? null,
          errorCode: event.errorCode ?? null,
          message: event.message ?? null,
        });
      }
    });
    insertAll(events);
  }

  async getRecord(documentId: string): Promise<DocumentRecord | undefined> {
    const row = this.db.prepare("SELECT * FROM documents WHERE documentId = ?").get(documentId) as DocumentRow | undefined;
    return row ? toDocumentRecord(row) : undefined;
  }

  async listEvents(documentId: string): Promise<StatusEvent[]> {
    const rows = this.db
      .prepare("SELECT * FROM document_events WHERE documentId = ? ORDER BY sequence ASC")
      .all(documentId) as EventRow[];
    return rows.map(toStatusEvent);
  }

  async getStats(): Promise<StoreStats> {
    const stats = emptyStats();
    stats.totalDocuments = this.count("SELECT COUNT(*) as count FROM documents");
    stats.stored = this.count("SELECT COUNT(*) as count FROM documents WHERE finalState = 'stored'");
    stats.failed = this.count("SELECT COUNT(*) as count FROM documents WHERE finalState = 'failed'");
    stats.events = this.count("SELECT COUNT(*) as count FROM document_events");
    stats.runs = this.count("SELECT COUNT(*) as count FROM runs");

    const byType = this.db
      .prepare("SELECT documentType as key, COUNT(*) as count FROM documents WHERE documentType IS NOT NULL GROUP BY documentType")
      .all() as Array<{ key: string; count: number }>;
    for (const row of byType) {
      const documentType = DOCUMENT_TYPES.find((candidate) => candidate === row.key);
      if (documentType) {
        stats.byType[documentType] = row.count;
      }
    }

    const byErrorCode = this.db
      .prepare("SELECT errorCode as key, COUNT(*) as count FROM documents WHERE errorCode IS NOT NULL GROUP BY errorCode ORDER BY errorCode")
      .all() as Array<{ key: string; count: number }>;
    for (const row of byErrorCode) {
      stats.byErrorCode[row.key] = row.count;
    }
    return stats;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(sql: string): number {
    const row = this.db.prepare(sql).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        documentId TEXT PRIMARY KEY,
        sourceName TEXT NULL,
        contentHash TEXT NOT NULL,
        finalState TEXT NOT NULL,
        documentType TEXT NULL,
        classificationJson TEXT NULL,
        fieldsJson TEXT NOT NULL,
        validationErrorsJson TEXT NOT NULL,
        retryCount INTEGER NOT NULL DEFAULT 0,
        errorCode TEXT NULL,
        errorMessage TEXT NULL,
        createdAt TEXT NOT NULL,
        completedAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS document_events (
        documentId TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        fromState TEXT NOT NULL,
        toState TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        retryCount INTEGER NOT NULL,
        confidence REAL NULL,
        errorCode TEXT NULL,
        message TEXT NULL,
        PRIMARY KEY (documentId, sequence)
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_documents_content_hash ON documents(contentHash);
      CREATE INDEX IF NOT EXISTS idx_documents_final_state ON documents(finalState);
    `);
  }
}
