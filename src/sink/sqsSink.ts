import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import type { MessageAttributeValue, SendMessageBatchRequestEntry } from "@aws-sdk/client-sqs";
import { backoffDelay, sleep as defaultSleep } from "../core/async";
import type { Sleep } from "../core/async";
import type { Logger } from "../observability";
import { BaseSink } from "./baseSink";
import type { OutboundMessage } from "./baseSink";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean; Message?: string }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  failedQueueUrl?: string;
  client?: SqsClientLike;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

const BATCH_LIMIT = 10;

function isFifo(queueUrl: string): boolean {
  return queueUrl.endsWith(".fifo");
}

function stringAttribute(value: string): MessageAttributeValue {
  return { DataType: "String", StringValue: value };
}

function attributesFor(message: OutboundMessage): Record<string, MessageAttributeValue> {
  const attributes: Record<string, MessageAttributeValue> = {
    kind: stringAttribute(message.kind),
    documentId: stringAttribute(message.documentId),
  };
  if (message.kind === "status_event") {
    attributes.state = stringAttribute(message.payload.toState);
  } else {
    attributes.state = stringAttribute(message.payload.finalState);
    attributes.documentType = stringAttribute(message.payload.documentType ?? "untyped");
  }
  return attributes;
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly failedQueueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: SqsSinkOptions = {}) {
    super(options.logger);
    this.queueUrl = options.queueUrl;
    this.failedQueueUrl = options.failedQueueUrl;
    this.client = options.client ?? new SQSClient({});
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.sleep = options.sleep ?? defaultSleep;
  }

  protected async deliver(messages: OutboundMessage[]): Promise<void> {
    const queueUrl = this.ensureConfigured("SQS", this.queueUrl);
    const byQueue = new Map<string, OutboundMessage[]>();
    for (const message of messages) {
      const target = message.kind === "document_record" && message.payload.finalState === "failed" ? (this.failedQueueUrl ?? queueUrl) : queueUrl;
      byQueue.set(target, [...(byQueue.get(target) ?? []), message]);
    }

    for (const [target, queued] of byQueue) {
      for (let start = 0; start < queued.length; start += BATCH_LIMIT) {
        await this.sendBatch(target, queued.slice(start, start + BATCH_LIMIT));
      }
    }
  }

  private async sendBatch(queueUrl: string, messages: OutboundMessage[]): Promise<void> {
    const fifo = isFifo(queueUrl);
    let pending: SendMessageBatchRequestEntry[] = messages.map((message, index) => {
      const entry: SendMessageBatchRequestEntry = {
        Id: String(index),
        MessageBody: JSON.stringify(message.payload),
        MessageAttributes: attributesFor(message),
      };
      if (fifo) {
        entry.MessageGroupId = message.documentId;
        entry.MessageDeduplicationId = message.key.replace(/[^A-Za-z0-9_-]/g, "-").slice(0, 128);
      }
      return entry;
    });

    for (let retry = 0; pending.length > 0; retry += 1) {
      const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
      const failed = response.Failed ?? [];
      if (failed.length === 0) {
        return;
      }

      const rejected = failed.filter((entry) => entry.SenderFault === true);
      if (rejected.length > 0) {
        throw new Error(`SQS rejected ${rejected.length} message(s): ${rejected.map((entry) => entry.Message ?? entry.Id).join("; ")}`);
      }
      if (retry >= this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failed.length} entries still failed)`);
      }

      const failedIds = new Set(failed.map((entry) => entry.Id));
      pending = pending.filter((entry) => failedIds.has(entry.Id));
      const delayMs = backoffDelay(retry + 1, this.retryDelayMs, this.retryDelayMs * 8);
      this.logger?.warn("sink_retry_scheduled", { sink: "sqs", attempt: retry + 2, delayMs, pending: pending.length });
      await this.sleep(delayMs);
    }
  }
}
