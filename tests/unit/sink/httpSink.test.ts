import { describe, expect, it, vi } from "vitest";
import { HttpSink } from "../../../src/sink";
import type { DocumentRecord, StatusEvent } from "../../../src/types";

const EVENTS: StatusEvent[] = [
  { documentId: "doc-1", sequence: 1, fromState: "ingested", toState: "classifying", timestamp: "2024-01-01T00:00:00.001Z", retryCount: 0 },
  { documentId: "doc-1", sequence: 2, fromState: "classifying", toState: "classified", timestamp: "2024-01-01T00:00:00.002Z", retryCount: 0 },
  { documentId: "doc 2", sequence: 1, fromState: "ingested", toState: "classifying", timestamp: "2024-01-01T00:00:00.001Z", retryCount: 0 },
];

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

type Init = { method: string; headers: Record<string, string>; body: string };

function response(status: number, text = "", headers: Record<string, string> = {}) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    text: async () => text,
  };
}

function fakeFetch(...responses: Array<ReturnType<typeof response>>) {
  return vi.fn(async (_url: string, _init: Init) => responses.shift() ?? response(200));
}

describe("HttpSink", () => {
  it("posts each document's events together with auth and idempotency headers", async () => {
    const fetchFn = fakeFetch();
    const sink = new HttpSink({ endpoint: "https://sink.test/api/", token: "test-secret", fetchFn });

    await sink.publishStatusEvents(EVENTS);

    expect(fetchFn.mock.calls.map(([url, init]) => [init.method, url, init.headers["Idempotency-Key"]])).toEqual([
      ["POST", "https://sink.test/api/documents/doc-1/events", "doc-1:1-2"],
      ["POST", "https://sink.test/api/documents/doc%202/events", "doc 2:1-1"],
    ]);
    const [, init] = fetchFn.mock.calls[0];
    expect(init.headers.Authorization).toBe("Bearer test-secret");
    expect(JSON.parse(init.body)).toEqual({ events: EVENTS.slice(0, 2) });
  });

  it("puts a record under its document, keyed by content and version", async () => {
    const fetchFn = fakeFetch();

    await new HttpSink({ endpoint: "https://sink.test/api", fetchFn }).publishDocumentRecords([RECORD]);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://sink.test/api/documents/doc-1");
    expect(init.method).toBe("PUT");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      "Idempotency-Key": "hash-a:stored:2024-01-01T00:00:00.006Z",
    });
    expect(JSON.parse(init.body)).toEqual(RECORD);
  });

  it("treats a conflict on a record as already delivered", async () => {
    const fetchFn = fakeFetch(response(409, "same version"));

    await new HttpSink({ endpoint: "https://sink.test/api", fetchFn }).publishDocumentRecords([RECORD]);

    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("sends nothing for an empty batch", async () => {
    const fetchFn = fakeFetch();
    await new HttpSink({ endpoint: "https://sink.test/api", fetchFn }).publishStatusEvents([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("retries thrown errors and retriable statuses with doubling delays", async () => {
    const fetchFn = fakeFetch(response(503, "busy"), response(502, "bad gateway"));
    fetchFn.mockRejectedValueOnce(new Error("ECONNRESET"));
    const sleep = vi.fn(async (_ms: number) => undefined);

    await new HttpSink({ endpoint: "https://sink.test/api", fetchFn, sleep }).publishDocumentRecords([RECORD]);

    expect(fetchFn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[250], [500], [1000]]);
  });

  it("waits as long as Retry-After asks, up to the cap", async () => {
    const fetchFn = fakeFetch(response(429, "slow down", { "retry-after": "2" }), response(503, "", { "retry-after": "60" }));
    const sleep = vi.fn(async (_ms: number) => undefined);

    await new HttpSink({ endpoint: "https://sink.test/api", fetchFn, sleep, maxRetryDelayMs: 5_000 }).publishDocumentRecords([RECORD]);

    expect(sleep.mock.calls).toEqual([[2000], [5000]]);
  });

  it("gives up after the last retry", async () => {
    const fetchFn = vi.fn(async (_url: string, _init: Init) => response(503, "busy"));
    const sink = new HttpSink({ endpoint: "https://sink.test/api", fetchFn, sleep: async () => undefined });

    await expect(sink.publishDocumentRecords([RECORD])).rejects.toThrow(
      "HTTP sink gave up on PUT https://sink.test/api/documents/doc-1 after status 503: busy",
    );
    expect(fetchFn).toHaveBeenCalledTimes(4);
  });

  it("does not retry client errors", async () => {
    const fetchFn = fakeFetch(response(400, "bad payload"));
    const sink = new HttpSink({ endpoint: "https://sink.test/api", fetchFn, sleep: async () => undefined });

    await expect(sink.publishStatusEvents(EVENTS.slice(0, 1))).rejects.toThrow(
      "HTTP sink permanent error 400 on POST https://sink.test/api/documents/doc-1/events: bad payload",
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("fails when no endpoint is configured", async () => {
    await expect(new HttpSink().publishStatusEvents(EVENTS)).rejects.toThrow("HTTP sink is not configured");
  });
});
