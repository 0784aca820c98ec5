import type { ClassifiedDocumentType } from "../types";

export interface VocabularyEntry {
  phrase: string;
  weight: number;
}

export interface ClassifierConfig {
  modelThreshold: number;
  ruleThreshold: number;
  ruleSaturation: number;
  vocabulary: Record<ClassifiedDocumentType, VocabularyEntry[]>;
  modelLabelAliases: Record<string, ClassifiedDocumentType>;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface IdentifierPatterns {
  fund_id: string;
  lp_id: string;
}

export interface ExtractionConfig {
  maxAnchorLineDistance: number;
  anchorDecayPerLine: number;
  patternFallbackConfidence: number;
  defaultCurrency: string;
  maxSectionLines: number;
  identifierPatterns: IdentifierPatterns;
}

export interface ValidationConfig {
  confidenceFloor: number;
}

export type DocumentSchema = Record<ClassifiedDocumentType, string[]>;

export interface PipelineConfig {
  classifier: ClassifierConfig;
  retry: RetryConfig;
  extraction: ExtractionConfig;
  validation: ValidationConfig;
  requiredFields: DocumentSchema;
  modelTimeoutMs: number;
  workerConcurrency: number;
}

export interface ModelConfig {
  mode: "none" | "http";
  httpBaseUrl: string;
  httpToken?: string;
}

export interface OutputDirs {
  manifests: string;
}

export interface AppConfig extends PipelineConfig {
  model: ModelConfig;
  ignoreHttpsErrors: boolean;
  storePath: string;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<
  Omit<AppConfig, "classifier" | "retry" | "extraction" | "validation" | "requiredFields" | "model" | "outputDirs">
> & {
  classifier?: Partial<ClassifierConfig>;
  retry?: Partial<RetryConfig>;
  extraction?: Partial<Omit<ExtractionConfig, "identifierPatterns">> & { identifierPatterns?: Partial<IdentifierPatterns> };
  validation?: Partial<ValidationConfig>;
  requiredFields?: Partial<DocumentSchema>;
  model?: Partial<ModelConfig>;
  outputDirs?: Partial<OutputDirs>;
};
