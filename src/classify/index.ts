import type { AppConfig, PipelineConfig } from "../config";
import type { Logger } from "../observability";
import { MultiTierClassifier } from "./classifier";
import { HttpClassificationModel } from "./httpModel";
import { ModelTier } from "./modelTier";
import type { ClassificationModel } from "./modelTier";
import { RuleTier } from "./ruleTier";
import type { ClassifierTier } from "./types";

export function buildClassifierTiers(config: PipelineConfig, model?: ClassificationModel): ClassifierTier[] {
  const tiers: ClassifierTier[] = [];
  if (model) {
    tiers.push(
      new ModelTier(model, {
        threshold: config.classifier.modelThreshold,
        timeoutMs: config.modelTimeoutMs,
        labelAliases: config.classifier.modelLabelAliases,
      }),
    );
  }
  tiers.push(new RuleTier(config.classifier));
  return tiers;
}

export function createClassificationModel(config: AppConfig): ClassificationModel | undefined {
  if (config.model.mode === "http") {
    return new HttpClassificationModel({
      baseUrl: config.model.httpBaseUrl,
      token: config.model.httpToken,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
    });
  }
  return undefined;
}

export function createClassifier(config: PipelineConfig, model?: ClassificationModel, logger?: Logger): MultiTierClassifier {
  return new MultiTierClassifier(buildClassifierTiers(config, model), logger);
}

export * from "./types";
export { MultiTierClassifier } from "./classifier";
export { HttpClassificationModel } from "./httpModel";
export type { HttpClassificationModelOptions } from "./httpModel";
export { ModelTier } from "./modelTier";
export type { ClassificationModel, ModelPrediction, ModelTierOptions } from "./modelTier";
export { RuleTier } from "./ruleTier";
export type { RuleScore } from "./ruleTier";
