import type { Logger } from "../observability";
import type { DocumentRecord, StatusEvent } from "../types";
import type { Sink } from "./types";

export type OutboundMessage =
  | { kind: "status_event"; documentId: string; key: string; topic: string; payload: StatusEvent }
  | { kind: "document_record"; documentId: string; key: string; topic: string; payload: DocumentRecord };

export function statusMessage(event: StatusEvent): OutboundMessage {
  return {
    kind: "status_event",
    documentId: event.documentId,
    key: `${event.documentId}:${event.sequence}`,
    topic: `status.${event.toState}`,
    payload: event,
  };
}

/**
 * Records are keyed on their content and completion time, so reprocessing the same content yields
 * a new version while redelivery of one run does not.
 */
export function recordMessage(record: DocumentRecord): OutboundMessage {
  return {
    kind: "document_record",
    documentId: record.documentId,
    key: `${record.contentHash}:${record.finalState}:${record.completedAt}`,
    topic: `record.${record.finalState}`,
    payload: record,
  };
}

export function groupByDocument(messages: OutboundMessage[]): Map<string, OutboundMessage[]> {
  const groups = new Map<string, OutboundMessage[]>();
  for (const message of messages) {
    const group = groups.get(message.documentId);
    if (group) {
      group.push(message);
    } else {
      groups.set(message.documentId, [message]);
    }
  }
  return groups;
}

export abstract class BaseSink implements Sink {
  protected readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  async publishStatusEvents(events: StatusEvent[]): Promise<void> {
    if (events.length > 0) {
      await this.deliver(events.map(statusMessage));
    }
  }

  async publishDocumentRecords(records: DocumentRecord[]): Promise<void> {
    if (records.length > 0) {
      await this.deliver(records.map(recordMessage));
    }
  }

  protected abstract deliver(messages: OutboundMessage[]): Promise<void>;

  protected ensureConfigured(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }
}
