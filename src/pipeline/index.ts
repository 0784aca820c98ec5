import { createClassificationModel, createClassifier } from "../classify";
import type { ClassificationModel } from "../classify";
import { assertSchemaComplete } from "../config";
import type { AppConfig } from "../config";
import type { Sleep } from "../core/async";
import { createExtractorRegistry } from "../extract";
import { MetricsRegistry } from "../observability";
import type { Logger } from "../observability";
import type { Sink } from "../sink";
import type { PipelineStore } from "../store";
import { Validator } from "../validate";
import { PipelineOrchestrator } from "./orchestrator";

export interface PipelineDeps {
  logger: Logger;
  metrics?: MetricsRegistry;
  store?: PipelineStore;
  sink?: Sink;
  model?: ClassificationModel;
  sleep?: Sleep;
  clock?: () => Date;
}

export function createPipeline(config: AppConfig, deps: PipelineDeps): PipelineOrchestrator {
  assertSchemaComplete(config.requiredFields);
  const model = deps.model ?? createClassificationModel(config);

  return new PipelineOrchestrator({
    config,
    classifier: createClassifier(config, model, deps.logger.child("classifier")),
    extractors: createExtractorRegistry(config.extraction, config.requiredFields),
    validator: new Validator({
      schema: config.requiredFields,
      confidenceFloor: config.validation.confidenceFloor,
      clock: deps.clock,
    }),
    store: deps.store,
    sink: deps.sink,
    logger: deps.logger.child("orchestrator"),
    metrics: deps.metrics ?? new MetricsRegistry(),
    sleep: deps.sleep,
    clock: deps.clock,
  });
}

export * from "./document";
export * from "./orchestrator";
export * from "./stateMachine";
