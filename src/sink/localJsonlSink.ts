import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { BaseSink } from "./baseSink";
import type { OutboundMessage } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  private readonly eventsPath: string;
  private readonly recordsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    super();
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.eventsPath = path.join(manifestsDir, "status_events.jsonl");
    this.recordsPath = path.join(manifestsDir, "documents.jsonl");
    this.runId = runId;
  }

  protected async deliver(messages: OutboundMessage[]): Promise<void> {
    const events: string[] = [];
    const records: string[] = [];
    for (const message of messages) {
      const line = JSON.stringify({ runId: this.runId, ...message.payload });
      (message.kind === "status_event" ? events : records).push(line);
    }
    if (events.length > 0) {
      await fs.promises.appendFile(this.eventsPath, `${events.join("\n")}\n`, "utf-8");
    }
    if (records.length > 0) {
      await fs.promises.appendFile(this.recordsPath, `${records.join("\n")}\n`, "utf-8");
    }
  }
}
