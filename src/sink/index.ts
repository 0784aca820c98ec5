import type { AppConfig } from "../config";
import type { Logger } from "../observability";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, env: NodeJS.ProcessEnv = process.env, logger?: Logger): Sink {
  const sinkType = (env.SINK_TYPE ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "sqs":
      return new SqsSink({ queueUrl: env.SQS_QUEUE_URL, failedQueueUrl: env.SQS_FAILED_QUEUE_URL, logger });
    case "rabbit":
      return new RabbitSink({ connectionUrl: env.RABBIT_URL, exchange: env.RABBIT_EXCHANGE, logger });
    case "http":
      return new HttpSink({
        endpoint: env.HTTP_SINK_ENDPOINT,
        token: env.HTTP_SINK_TOKEN,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
        logger,
      });
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export { BaseSink, groupByDocument, recordMessage, statusMessage } from "./baseSink";
export type { OutboundMessage } from "./baseSink";
export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { RabbitSink, routingKeyFor } from "./rabbitSink";
export { SqsSink } from "./sqsSink";
export * from "./types";
