import { fetch as undiciFetch } from "undici";
import type { Agent } from "undici";
import { backoffDelay, sleep as defaultSleep } from "../core/async";
import type { Sleep } from "../core/async";
import { getFetchDispatcher } from "../core/fetch";
import type { Logger } from "../observability";
import { BaseSink, groupByDocument } from "./baseSink";
import type { OutboundMessage } from "./baseSink";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { method: "POST" | "PUT"; headers: Record<string, string>; body: string; signal: AbortSignal; dispatcher?: Agent },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

interface HttpDelivery {
  method: "POST" | "PUT";
  url: string;
  idempotencyKey: string;
  body: string;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function retryAfterMs(response: HttpResponseLike): number | undefined {
  const header = response.headers.get("retry-after");
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

class PermanentHttpSinkError extends Error {}

export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly dispatcher: Agent | undefined;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: HttpSinkOptions = {}) {
    super(options.logger);
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.dispatcher = getFetchDispatcher(options.ignoreHttpsErrors ?? false);
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  protected async deliver(messages: OutboundMessage[]): Promise<void> {
    const baseUrl = this.ensureConfigured("HTTP", this.endpoint).replace(/\/+$/, "");
    for (const delivery of this.plan(baseUrl, messages)) {
      await this.send(delivery);
    }
  }

  private plan(baseUrl: string, messages: OutboundMessage[]): HttpDelivery[] {
    const deliveries: HttpDelivery[] = [];
    for (const [documentId, group] of groupByDocument(messages)) {
      const documentUrl = `${baseUrl}/documents/${encodeURIComponent(documentId)}`;
      const events = group.flatMap((message) => (message.kind === "status_event" ? [message.payload] : []));
      if (events.length > 0) {
        deliveries.push({
          method: "POST",
          url: `${documentUrl}/events`,
          idempotencyKey: `${documentId}:${events[0].sequence}-${events[events.length - 1].sequence}`,
          body: JSON.stringify({ events }),
        });
      }
      for (const message of group) {
        if (message.kind === "document_record") {
          deliveries.push({ method: "PUT", url: documentUrl, idempotencyKey: message.key, body: JSON.stringify(message.payload) });
        }
      }
    }
    return deliveries;
  }

  private async send(delivery: HttpDelivery): Promise<void> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": delivery.idempotencyKey,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    for (let retry = 0; ; retry += 1) {
      let delayMs = backoffDelay(retry + 1, this.retryDelayMs, this.maxRetryDelayMs);
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const response = await this.fetchFn(delivery.url, {
          method: delivery.method,
          headers,
          body: delivery.body,
          signal: controller.signal,
          dispatcher: this.dispatcher,
        });
        if (response.ok || (delivery.method === "PUT" && response.status === 409)) {
          return;
        }

        const responseText = await response.text();
        if (!isRetriableStatus(response.status)) {
          throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status} on ${delivery.method} ${delivery.url}: ${responseText}`);
        }
        if (retry >= this.maxRetries) {
          throw new Error(`HTTP sink gave up on ${delivery.method} ${delivery.url} after status ${response.status}: ${responseText}`);
        }
        delayMs = Math.min(retryAfterMs(response) ?? delayMs, this.maxRetryDelayMs);
      } catch (error) {
        if (error instanceof PermanentHttpSinkError || retry >= this.maxRetries) {
          throw error;
        }
      } finally {
        clearTimeout(timeout);
      }

      this.logger?.warn("sink_retry_scheduled", { sink: "http", url: delivery.url, attempt: retry + 2, delayMs });
      await this.sleep(delayMs);
    }
  }
}
