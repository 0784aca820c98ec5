import { withTimeout } from "../core/async";
import { ModelError, TransientModelError, errorMessage } from "../core/errors";
import { clampConfidence, compareLexically, scored } from "../types";
import type { ClassifiedDocumentType } from "../types";
import type { ClassifierInput, ClassifierTier, TierOpinion } from "./types";

export interface ModelPrediction {
  label: string;
  score: number;
}

export interface ClassificationModel {
  readonly name: string;
  predict(input: ClassifierInput, signal: AbortSignal): Promise<ModelPrediction[]>;
}

export interface ModelTierOptions {
  threshold: number;
  timeoutMs: number;
  labelAliases: Record<string, ClassifiedDocumentType>;
}

interface MappedPrediction {
  documentType: ClassifiedDocumentType;
  label: string;
  score: number;
}

export class ModelTier implements ClassifierTier {
  readonly kind = "model";
  readonly threshold: number;
  private readonly model: ClassificationModel;
  private readonly timeoutMs: number;
  private readonly labelAliases: Record<string, ClassifiedDocumentType>;

  constructor(model: ClassificationModel, options: ModelTierOptions) {
    this.model = model;
    this.threshold = options.threshold;
    this.timeoutMs = options.timeoutMs;
    this.labelAliases = {};
    for (const [label, documentType] of Object.entries(options.labelAliases)) {
      this.labelAliases[label.trim().toLowerCase()] = documentType;
    }
  }

  async attempt(input: ClassifierInput): Promise<TierOpinion> {
    let predictions: ModelPrediction[];
    try {
      predictions = await withTimeout(
        (signal) => this.model.predict(input, signal),
        this.timeoutMs,
        () => new TransientModelError(`model "${this.model.name}" timed out after ${this.timeoutMs}ms`),
      );
    } catch (error) {
      if (error instanceof TransientModelError || error instanceof ModelError) {
        throw error;
      }
      throw new TransientModelError(`model "${this.model.name}" call failed: ${errorMessage(error)}`);
    }

    const mapped = this.mapPredictions(predictions);
    const best = mapped[0];
    if (!best) {
      return { kind: "no_opinion", evidence: `model "${this.model.name}" returned no known label` };
    }

    let evidence = `model "${this.model.name}" label "${best.label}" (${best.score})`;
    const tied = mapped.filter((candidate) => candidate !== best && candidate.score === best.score);
    if (tied.some((candidate) => candidate.documentType !== best.documentType)) {
      const others = [...new Set(tied.map((candidate) => candidate.documentType))].filter(
        (documentType) => documentType !== best.documentType,
      );
      evidence += `; tie with ${others.join(", ")} resolved lexically`;
    }

    return { kind: "opinion", ...scored(best.documentType, best.score, this.kind, evidence) };
  }

  private mapPredictions(predictions: ModelPrediction[]): MappedPrediction[] {
    const mapped: MappedPrediction[] = [];
    for (const prediction of predictions) {
      const documentType = this.labelAliases[prediction.label.trim().toLowerCase()];
      if (documentType === undefined || !Number.isFinite(prediction.score)) {
        continue;
      }
      mapped.push({ documentType, label: prediction.label, score: clampConfidence(prediction.score) });
    }
    return mapped.sort((a, b) => b.score - a.score || compareLexically(a.documentType, b.documentType));
  }
}
