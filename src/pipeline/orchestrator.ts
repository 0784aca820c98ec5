import type { DetailedClassification } from "../classify";
import type { PipelineConfig } from "../config";
import { backoffDelay, processWithConcurrency, sleep as defaultSleep } from "../core/async";
import type { Sleep } from "../core/async";
import {
  CancelledError,
  ExhaustedRetriesError,
  ExtractionError,
  PipelineError,
  TransientModelError,
  errorMessage,
} from "../core/errors";
import type { ExtractorRegistry } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import type { PipelineStore } from "../store";
import type { ClassificationResult, Document, DocumentLayout, DocumentRecord, PipelineState, StatusEvent } from "../types";
import { hasBlockingErrors } from "../validate";
import type { Validator } from "../validate";
import { contentHashOf, createDocument, documentIdFor, fieldMapOf, toRecord } from "./document";
import type { DocumentInput } from "./document";
import { transition } from "./stateMachine";
import type { TransitionUpdate } from "./stateMachine";

export interface DocumentClassifier {
  classifyDetailed(text: string, layout: DocumentLayout): Promise<DetailedClassification>;
}

export type StatusListener = (event: StatusEvent) => void;

export interface OrchestratorDeps {
  config: PipelineConfig;
  classifier: DocumentClassifier;
  extractors: ExtractorRegistry;
  validator: Validator;
  store?: PipelineStore;
  sink?: Sink;
  logger?: Logger;
  metrics?: MetricsRegistry;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  force?: boolean;
}

export type ProcessOutcome =
  | { status: "processed"; documentId: string; document: Document; record: DocumentRecord; events: StatusEvent[] }
  | { status: "duplicate"; documentId: string; sourceName?: string; contentHash: string; existing: DocumentRecord };

export interface BatchSummary {
  processed: number;
  stored: number;
  failed: number;
  duplicates: number;
  errored: number;
  outcomes: ProcessOutcome[];
}

class DocumentRun {
  document: Document;
  readonly events: StatusEvent[] = [];
  private readonly clock: () => Date;
  private readonly emit: StatusListener;
  private readonly signal?: AbortSignal;
  private lastTimestamp: number;

  constructor(initial: Document, clock: () => Date, emit: StatusListener, signal?: AbortSignal) {
    this.document = initial;
    this.clock = clock;
    this.emit = emit;
    this.signal = signal;
    this.lastTimestamp = Date.parse(initial.lastTransitionedAt);
  }

  enter(to: PipelineState, update: TransitionUpdate = {}, confidence?: number): void {
    this.move(to, update, confidence);
    if (to !== "failed" && to !== "stored" && this.signal?.aborted) {
      throw new CancelledError(`cancelled on entering ${to}`);
    }
  }

  fail(error: PipelineError): void {
    this.move("failed", { failure: { code: error.code, message: error.message, retryable: false } });
  }

  private move(to: PipelineState, update: TransitionUpdate, confidence?: number): void {
    const from = this.document.state;
    // Strictly increasing timestamps per document, even within one clock tick.
    const millis = Math.max(this.clock().getTime(), this.lastTimestamp + 1);
    this.lastTimestamp = millis;
    const timestamp = new Date(millis).toISOString();

    this.document = transition(this.document, to, update, timestamp);
    const event: StatusEvent = {
      documentId: this.document.id,
      sequence: this.events.length + 1,
      fromState: from,
      toState: to,
      timestamp,
      retryCount: this.document.retryCount,
    };
    if (confidence !== undefined) {
      event.confidence = confidence;
    }
    if (this.document.failure) {
      event.errorCode = this.document.failure.code;
      event.message = this.document.failure.message;
    }
    this.events.push(event);
    this.emit(event);
  }
}

export class PipelineOrchestrator {
  private readonly config: PipelineConfig;
  private readonly classifier: DocumentClassifier;
  private readonly extractors: ExtractorRegistry;
  private readonly validator: Validator;
  private readonly store?: PipelineStore;
  private readonly sink?: Sink;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;
  private readonly listeners = new Set<StatusListener>();
  private readonly inFlight = new Map<string, Promise<ProcessOutcome>>();
  private readonly inFlightContent = new Map<string, Promise<ProcessOutcome>>();

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.classifier = deps.classifier;
    this.extractors = deps.extractors;
    this.validator = deps.validator;
    this.store = deps.store;
    this.sink = deps.sink;
    this.logger = deps.logger ?? Logger.silent("orchestrator");
    this.metrics = deps.metrics ?? new MetricsRegistry();
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? (() => new Date());
  }

  onStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  ingest(input: DocumentInput): Document {
    const document = createDocument(input, this.clock());
    this.metrics.incrementCounter("documents_ingested");
    this.logger.debug("document_ingested", { documentId: document.id, state: document.state, sourceName: input.sourceName });
    return document;
  }

  /**
   * A second call for a document id already in flight returns the same promise. A call whose
   * content is already in flight waits for that run and is skipped if it stored the content.
   */
  process(input: DocumentInput, options: ProcessOptions = {}): Promise<ProcessOutcome> {
    const documentId = input.id ?? documentIdFor(input.text, input.sourceName);
    const existing = this.inFlight.get(documentId);
    if (existing) {
      return existing;
    }

    const contentHash = contentHashOf(input.text);
    const earlier = this.inFlightContent.get(contentHash);
    const pending = this.processAfter(earlier, { ...input, id: documentId }, contentHash, options).finally(() => {
      this.inFlight.delete(documentId);
      if (this.inFlightContent.get(contentHash) === pending) {
        this.inFlightContent.delete(contentHash);
      }
    });
    this.inFlight.set(documentId, pending);
    this.inFlightContent.set(contentHash, pending);
    return pending;
  }

  async processBatch(inputs: DocumentInput[], options: ProcessOptions = {}): Promise<BatchSummary> {
    const summary: BatchSummary = { processed: 0, stored: 0, failed: 0, duplicates: 0, errored: 0, outcomes: [] };
    const outcomes: Array<ProcessOutcome | undefined> = inputs.map(() => undefined);
    await processWithConcurrency(inputs, this.config.workerConcurrency, async (input, index) => {
      try {
        const outcome = await this.process(input, options);
        outcomes[index] = outcome;
        if (outcome.status === "duplicate") {
          summary.duplicates += 1;
          return;
        }
        summary.processed += 1;
        if (outcome.record.finalState === "stored") {
          summary.stored += 1;
        } else {
          summary.failed += 1;
        }
      } catch (error) {
        summary.errored += 1;
        this.logger.error("document_process_error", { sourceName: input.sourceName, error: errorMessage(error) });
      }
    });
    summary.outcomes = outcomes.filter((outcome): outcome is ProcessOutcome => outcome !== undefined);
    return summary;
  }

  private async processAfter(
    earlier: Promise<ProcessOutcome> | undefined,
    input: DocumentInput & { id: string },
    contentHash: string,
    options: ProcessOptions,
  ): Promise<ProcessOutcome> {
    if (earlier) {
      const previous = await earlier.catch(() => undefined);
      if (!options.force && previous?.status === "processed" && previous.record.finalState === "stored") {
        return this.skipDuplicate(input, contentHash, previous.record);
      }
    }
    if (this.store && !options.force) {
      const stored = await this.store.findByContentHash(contentHash);
      if (stored && stored.finalState === "stored") {
        return this.skipDuplicate(input, contentHash, stored);
      }
    }
    return this.processDocument(this.ingest(input), options);
  }

  private skipDuplicate(input: DocumentInput & { id: string }, contentHash: string, existing: DocumentRecord): ProcessOutcome {
    this.metrics.incrementCounter("documents_duplicate");
    this.logger.info("document_duplicate_skipped", { documentId: input.id, existingId: existing.documentId });
    return { status: "duplicate", documentId: input.id, sourceName: input.sourceName, contentHash, existing };
  }

  private async processDocument(document: Document, options: ProcessOptions): Promise<ProcessOutcome> {
    const stopTimer = this.metrics.startTimer("document_ms");
    const run = new DocumentRun(document, this.clock, (event) => this.emit(event), options.signal);
    try {
      await this.drive(run);
    } catch (error) {
      if (!(error instanceof PipelineError)) {
        throw error;
      }
      run.fail(error);
    }
    const durationMs = stopTimer();

    const record = toRecord(run.document);
    this.metrics.incrementCounter(record.finalState === "stored" ? "documents_stored" : "documents_failed");
    this.logger.info("document_completed", {
      documentId: record.documentId,
      documentType: record.documentType ?? undefined,
      state: record.finalState,
      attempt: record.retryCount + 1,
      errorCode: record.errorCode,
      durationMs,
    });

    await this.persist(record, run.events);
    return { status: "processed", documentId: run.document.id, document: run.document, record, events: run.events };
  }

  private async drive(run: DocumentRun): Promise<void> {
    run.enter("classifying");
    const classification = await this.classifyStage(run);
    if (classification.documentType !== "unclassified") {
      await this.extractStage(run);
    }
    this.validateStage(run);
  }

  private async classifyStage(run: DocumentRun): Promise<ClassificationResult> {
    const { text, layout } = run.document.source;
    while (true) {
      const stopTimer = this.metrics.startTimer("classify_ms");
      const detailed = await this.classifier.classifyDetailed(text, layout);
      stopTimer();
      const result = detailed.result;

      if (detailed.transientFailure) {
        const transientMessage = detailed.attempts
          .filter((attempt) => attempt.transient === true)
          .map((attempt) => attempt.evidence)
          .join("; ");
        if (this.canRetry(run)) {
          await this.retry(run, new TransientModelError(transientMessage), "classifying");
          continue;
        }
        if (result.tier === "none") {
          throw new ExhaustedRetriesError(run.document.retryCount + 1, transientMessage);
        }
        this.logger.warn("classification_degraded", {
          documentId: run.document.id,
          documentType: result.documentType,
          tier: result.tier,
          error: transientMessage,
        });
      }

      run.enter("classified", { documentType: result.documentType, classification: result }, result.confidence);
      this.metrics.incrementCounter(
        result.tier === "model" ? "classified_model" : result.tier === "rule" ? "classified_rule" : "classified_none",
      );
      this.logger.debug("document_classified", {
        documentId: run.document.id,
        documentType: result.documentType,
        tier: result.tier,
        confidence: result.confidence,
      });
      return result;
    }
  }

  private async extractStage(run: DocumentRun): Promise<void> {
    const { text, layout } = run.document.source;
    const documentType = run.document.documentType ?? "unclassified";
    run.enter("extracting");

    while (true) {
      const stopTimer = this.metrics.startTimer("extract_ms");
      try {
        const fields = await this.extractors.extract(documentType, text, layout);
        const results = Object.values(fields);
        const mean = results.length > 0 ? results.reduce((total, field) => total + field.confidence, 0) / results.length : 0;
        run.enter("extracted", { fields: results }, Number(mean.toFixed(4)));
        return;
      } catch (error) {
        if (error instanceof PipelineError && !(error instanceof ExtractionError)) {
          throw error;
        }
        const failure = error instanceof ExtractionError ? error : new ExtractionError(`extractor failed: ${errorMessage(error)}`);
        if (!this.canRetry(run)) {
          throw new ExhaustedRetriesError(run.document.retryCount + 1, failure.message);
        }
        await this.retry(run, failure, "extracting");
      } finally {
        stopTimer();
      }
    }
  }

  private validateStage(run: DocumentRun): void {
    run.enter("validating");
    const stopTimer = this.metrics.startTimer("validate_ms");
    const documentType = run.document.documentType ?? "unclassified";
    const errors = this.validator.validate(documentType, fieldMapOf(run.document.fields));
    stopTimer();

    if (hasBlockingErrors(errors)) {
      const blocking = errors.filter((error) => error.severity === "blocking");
      run.enter("failed", {
        validationErrors: errors,
        failure: {
          code: "ValidationBlockingError",
          message: `${blocking.length} blocking validation error(s): ${blocking.map((error) => `${error.ruleId}(${error.field})`).join(", ")}`,
          retryable: false,
        },
      });
      return;
    }
    run.enter("stored", { validationErrors: errors });
  }

  private canRetry(run: DocumentRun): boolean {
    return run.document.retryCount < this.config.retry.maxAttempts - 1;
  }

  private async retry(run: DocumentRun, error: TransientModelError | ExtractionError, reentry: "classifying" | "extracting"): Promise<void> {
    run.enter("failed", { failure: { code: error.code, message: error.message, retryable: true } });
    const retryCount = run.document.retryCount + 1;
    const delayMs = backoffDelay(retryCount, this.config.retry.baseDelayMs, this.config.retry.maxDelayMs);
    this.metrics.incrementCounter("transient_retries");
    this.logger.warn("document_retry_scheduled", {
      documentId: run.document.id,
      state: reentry,
      attempt: retryCount + 1,
      delayMs,
      errorCode: error.code,
      error: error.message,
    });
    await this.sleep(delayMs);
    run.enter(reentry, { retryCount });
  }

  private async persist(record: DocumentRecord, events: StatusEvent[]): Promise<void> {
    if (this.store) {
      await this.store.saveRecord(record);
      await this.store.appendEvents(events);
    }
    if (this.sink) {
      await this.sink.publishStatusEvents(events);
      await this.sink.publishDocumentRecords([record]);
    }
  }

  private emit(event: StatusEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("status_listener_error", { documentId: event.documentId, error: errorMessage(error) });
      }
    }
  }
}
