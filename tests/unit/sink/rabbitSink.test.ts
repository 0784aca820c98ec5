import type { Options } from "amqplib";
import { describe, expect, it, vi } from "vitest";
import { RabbitSink, recordMessage, routingKeyFor, statusMessage } from "../../../src/sink";
import type { DocumentRecord, StatusEvent } from "../../../src/types";

const RECORD: DocumentRecord = {
  documentId: "doc-1",
  contentHash: "hash-a",
  finalState: "stored",
  documentType: "capital_call",
  classification: null,
  fields: [],
  validationErrors: [],
  retryCount: 0,
  createdAt: "2024-01-01T00:00:00.000Z",
  completedAt: "2024-01-01T00:00:00.006Z",
};

const EVENT: StatusEvent = {
  documentId: "doc-1",
  sequence: 1,
  fromState: "ingested",
  toState: "classifying",
  timestamp: "2024-01-01T00:00:00.001Z",
  retryCount: 0,
};

function fakeBroker(options: { confirmError?: Error } = {}) {
  const channel = {
    assertExchange: vi.fn(async (_exchange: string, _type: string, _options?: Options.AssertExchange) => ({})),
    publish: vi.fn((_exchange: string, _routingKey: string, _content: Buffer, _options?: Options.Publish) => true),
    waitForConfirms: vi.fn(async () => {
      if (options.confirmError) {
        throw options.confirmError;
      }
    }),
    close: vi.fn(async () => undefined),
  };
  const connection = {
    createConfirmChannel: vi.fn(async () => channel),
    close: vi.fn(async () => undefined),
  };
  return { channel, connection };
}

describe("routingKeyFor", () => {
  it("routes events by state and records by outcome and type", () => {
    expect(routingKeyFor(statusMessage(EVENT))).toBe("status.classifying");
    expect(routingKeyFor(recordMessage(RECORD))).toBe("record.stored.capital_call");
    expect(routingKeyFor(recordMessage({ ...RECORD, finalState: "failed", documentType: null }))).toBe("record.failed.untyped");
  });
});

describe("RabbitSink", () => {
  it("publishes a record as a persistent message carrying its version key", async () => {
    const { channel, connection } = fakeBroker();
    const connectFn = vi.fn(async (_url: string) => connection);
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", connectFn });

    await sink.publishDocumentRecords([RECORD]);

    expect(connectFn).toHaveBeenCalledWith("amqp://localhost");
    expect(channel.assertExchange).toHaveBeenCalledWith("altdoc.pipeline", "topic", { durable: true });
    const [exchange, routingKey, content, publishOptions] = channel.publish.mock.calls[0];
    expect(exchange).toBe("altdoc.pipeline");
    expect(routingKey).toBe("record.stored.capital_call");
    expect(JSON.parse(content.toString("utf8"))).toEqual(RECORD);
    expect(publishOptions).toEqual({
      persistent: true,
      contentType: "application/json",
      messageId: "hash-a:stored:2024-01-01T00:00:00.006Z",
      correlationId: "doc-1",
      type: "document_record",
    });
    expect(channel.waitForConfirms).toHaveBeenCalledTimes(1);
  });

  it("keeps one channel open across publishes until closed", async () => {
    const { channel, connection } = fakeBroker();
    const connectFn = vi.fn(async (_url: string) => connection);
    const sink = new RabbitSink({ connectionUrl: "amqp://localhost", exchange: "docs", connectFn });

    await sink.publishStatusEvents([EVENT]);
    await sink.publishDocumentRecords([RECORD]);

    expect(connectFn).toHaveBeenCalledTimes(1);
    expect(channel.publish.mock.calls.map(([exchange, routingKey]) => [exchange, routingKey])).toEqual([
      ["docs", "status.classifying"],
      ["docs", "record.stored.capital_call"],
    ]);
    expect(connection.close).not.toHaveBeenCalled();

    await sink.close();

    expect(channel.close).toHaveBeenCalledTimes(1);
    expect(connection.close).toHaveBeenCalledTimes(1);
  });

  it("reconnects after a connection failure", async () => {
    const { connection } = fakeBroker();
    const connectFn = vi.fn(async (_url: string) => connection).mockRejectedValueOnce(new Error("ECONNREFUSED"));
    const sleep = vi.fn(async (_ms: number) => undefined);

    await new RabbitSink({ connectionUrl: "amqp://localhost", connectFn, sleep }).publishDocumentRecords([RECORD]);

    expect(connectFn).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[250]]);
  });

  it("drops the broken channel and rethrows once retries run out", async () => {
    const { channel, connection } = fakeBroker({ confirmError: new Error("nack") });
    const sink = new RabbitSink({
      connectionUrl: "amqp://localhost",
      connectFn: async () => connection,
      maxRetries: 1,
      sleep: async () => undefined,
    });

    await expect(sink.publishDocumentRecords([RECORD])).rejects.toThrow("nack");
    expect(channel.close).toHaveBeenCalledTimes(2);
    expect(connection.close).toHaveBeenCalledTimes(2);
  });

  it("fails when no URL is configured", async () => {
    await expect(new RabbitSink().publishDocumentRecords([RECORD])).rejects.toThrow("RabbitMQ sink is not configured");
  });
});
