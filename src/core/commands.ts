import type { AppConfig } from "../config";
import { DocumentFileReader } from "../ingest";
import type { Logger, MetricsRegistry } from "../observability";
import { createPipeline } from "../pipeline";
import type { BatchSummary, DocumentInput, PipelineDeps } from "../pipeline";
import type { Sink } from "../sink";
import type { PipelineStore } from "../store";
import { errorMessage } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store?: PipelineStore;
  sink?: Sink;
  reader?: DocumentFileReader;
  model?: PipelineDeps["model"];
  print?: (line: string) => void;
}

export interface ProcessCommandOptions {
  force: boolean;
  dryRun: boolean;
}

export interface ProcessCommandResult {
  unreadable: string[];
  summary: BatchSummary;
}

function printer(ctx: CommandContext): (line: string) => void {
  return ctx.print ?? ((line) => console.log(line));
}

function requireStore(ctx: CommandContext): PipelineStore {
  if (!ctx.store) {
    throw new Error("this command needs a store");
  }
  return ctx.store;
}

export async function runProcess(ctx: CommandContext, files: string[], options: ProcessCommandOptions): Promise<ProcessCommandResult> {
  const reader = ctx.reader ?? new DocumentFileReader();
  const store = options.dryRun ? undefined : ctx.store;
  const sink = options.dryRun ? undefined : ctx.sink;
  ctx.logger.info("process_start", { files: files.length, force: options.force, dryRun: options.dryRun });

  const inputs: DocumentInput[] = [];
  const unreadable: string[] = [];
  for (const filePath of files) {
    try {
      inputs.push(await reader.read(filePath));
    } catch (error) {
      unreadable.push(filePath);
      ctx.logger.error("file_unreadable", { filePath, error: errorMessage(error) });
    }
  }

  const pipeline = createPipeline(ctx.config, {
    logger: ctx.logger,
    metrics: ctx.metrics,
    store,
    sink,
    model: ctx.model,
  });

  if (store) {
    await store.startRun(ctx.runId, new Date().toISOString());
  }
  let summary: BatchSummary;
  try {
    summary = await pipeline.processBatch(inputs, { force: options.force });
  } catch (error) {
    if (store) {
      await store.finishRun(ctx.runId, "failed", new Date().toISOString());
    }
    throw error;
  }
  if (store) {
    await store.finishRun(ctx.runId, summary.errored > 0 ? "failed" : "completed", new Date().toISOString());
  }

  if (options.dryRun) {
    const print = printer(ctx);
    for (const outcome of summary.outcomes) {
      if (outcome.status === "processed") {
        print(JSON.stringify(outcome.record));
      }
    }
  }

  ctx.logger.info("process_complete", {
    processed: summary.processed,
    stored: summary.stored,
    failed: summary.failed,
    duplicates: summary.duplicates,
    errored: summary.errored,
    unreadable: unreadable.length,
  });
  return { unreadable, summary };
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await requireStore(ctx).getStats();
  printer(ctx)(JSON.stringify(stats, null, 2));
  ctx.logger.info("status_complete", { totalDocuments: stats.totalDocuments });
}

export async function runShow(ctx: CommandContext, documentId: string): Promise<boolean> {
  const store = requireStore(ctx);
  const record = await store.getRecord(documentId);
  if (!record) {
    ctx.logger.warn("document_not_found", { documentId });
    return false;
  }
  const events = await store.listEvents(documentId);
  printer(ctx)(JSON.stringify({ record, events }, null, 2));
  return true;
}
