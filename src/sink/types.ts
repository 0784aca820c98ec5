import type { DocumentRecord, StatusEvent } from "../types";

export interface Sink {
  publishStatusEvents(events: StatusEvent[]): Promise<void>;
  publishDocumentRecords(records: DocumentRecord[]): Promise<void>;
  close?(): Promise<void>;
}
