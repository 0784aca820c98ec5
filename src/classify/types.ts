import type { ClassificationResult, ClassifiedDocumentType, DocumentLayout, Scored } from "../types";

export interface ClassifierInput {
  text: string;
  layout: DocumentLayout;
}

export type TierKind = "model" | "rule";

export type TierOpinion =
  | ({ kind: "opinion" } & Scored<ClassifiedDocumentType, TierKind>)
  | { kind: "no_opinion"; evidence: string };

export interface ClassifierTier {
  readonly kind: TierKind;
  readonly threshold: number;
  attempt(input: ClassifierInput): Promise<TierOpinion>;
}

export interface TierAttempt {
  tier: TierKind;
  outcome: "opinion" | "no_opinion" | "error";
  documentType?: ClassifiedDocumentType;
  confidence: number;
  evidence: string;
  transient?: boolean;
}

export interface DetailedClassification {
  result: ClassificationResult;
  attempts: TierAttempt[];
  transientFailure: boolean;
}
