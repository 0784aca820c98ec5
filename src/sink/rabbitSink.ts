import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { backoffDelay, sleep as defaultSleep } from "../core/async";
import type { Sleep } from "../core/async";
import { errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import { BaseSink } from "./baseSink";
import type { OutboundMessage } from "./baseSink";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
  sleep?: Sleep;
  logger?: Logger;
}

interface OpenChannel {
  connection: ConnectionLike;
  channel: ChannelLike;
}

export function routingKeyFor(message: OutboundMessage): string {
  if (message.kind === "status_event") {
    return message.topic;
  }
  return `${message.topic}.${message.payload.documentType ?? "untyped"}`;
}

export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;
  private readonly sleep: Sleep;
  private open?: OpenChannel;

  constructor(options: RabbitSinkOptions = {}) {
    super(options.logger);
    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "altdoc.pipeline";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
    this.sleep = options.sleep ?? defaultSleep;
  }

  async close(): Promise<void> {
    const open = this.open;
    this.open = undefined;
    if (open) {
      try {
        await open.channel.close();
      } finally {
        await open.connection.close();
      }
    }
  }

  protected async deliver(messages: OutboundMessage[]): Promise<void> {
    const url = this.ensureConfigured("RabbitMQ", this.connectionUrl);

    for (let retry = 0; ; retry += 1) {
      try {
        const { channel } = await this.channelFor(url);
        for (const message of messages) {
          channel.publish(this.exchange, routingKeyFor(message), Buffer.from(JSON.stringify(message.payload)), {
            persistent: true,
            contentType: "application/json",
            messageId: message.key,
            correlationId: message.documentId,
            type: message.kind,
          });
        }
        await channel.waitForConfirms();
        return;
      } catch (error) {
        await this.discard();
        if (retry >= this.maxRetries) {
          throw error;
        }
        const delayMs = backoffDelay(retry + 1, this.retryDelayMs, this.retryDelayMs * 8);
        this.logger?.warn("sink_retry_scheduled", { sink: "rabbit", attempt: retry + 2, delayMs, error: errorMessage(error) });
        await this.sleep(delayMs);
      }
    }
  }

  private async channelFor(url: string): Promise<OpenChannel> {
    if (this.open) {
      return this.open;
    }
    const connection = await this.connectFn(url);
    try {
      const channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.exchange, "topic", { durable: true });
      this.open = { connection, channel };
      return this.open;
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        this.logger?.warn("sink_close_error", { sink: "rabbit", error: errorMessage(closeError) });
      });
      throw error;
    }
  }

  private async discard(): Promise<void> {
    try {
      await this.close();
    } catch (error) {
      this.logger?.warn("sink_close_error", { sink: "rabbit", error: errorMessage(error) });
    }
  }
}
