import { TransientModelError, errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import { pickHighest, scored } from "../types";
import type { ClassificationResult, ClassifiedDocumentType, DocumentLayout, Scored } from "../types";
import type { ClassifierTier, DetailedClassification, TierAttempt, TierKind, TierOpinion } from "./types";

function toClassification(opinion: Scored<ClassifiedDocumentType, TierKind>): ClassificationResult {
  return { documentType: opinion.value, confidence: opinion.confidence, tier: opinion.tier, evidence: opinion.evidence };
}

function describeAttempts(attempts: TierAttempt[]): string {
  if (attempts.length === 0) {
    return "no tiers configured";
  }
  return attempts
    .map((attempt) => {
      if (attempt.outcome === "opinion") {
        return `${attempt.tier}: ${attempt.documentType} ${attempt.confidence} below threshold (${attempt.evidence})`;
      }
      return `${attempt.tier}: ${attempt.evidence}`;
    })
    .join("; ");
}

export class MultiTierClassifier {
  private readonly tiers: readonly ClassifierTier[];
  private readonly logger?: Logger;

  constructor(tiers: readonly ClassifierTier[], logger?: Logger) {
    this.tiers = tiers;
    this.logger = logger;
  }

  async classify(text: string, layout: DocumentLayout): Promise<ClassificationResult> {
    const detailed = await this.classifyDetailed(text, layout);
    return detailed.result;
  }

  async classifyDetailed(text: string, layout: DocumentLayout): Promise<DetailedClassification> {
    const attempts: TierAttempt[] = [];
    const opinions: Array<Scored<ClassifiedDocumentType, TierKind>> = [];

    for (const tier of this.tiers) {
      let opinion: TierOpinion;
      try {
        opinion = await tier.attempt({ text, layout });
      } catch (error) {
        const transient = error instanceof TransientModelError;
        attempts.push({ tier: tier.kind, outcome: "error", confidence: 0, evidence: errorMessage(error), transient });
        this.logger?.warn("classifier_tier_error", { tier: tier.kind, transient, error: errorMessage(error) });
        continue;
      }

      if (opinion.kind === "no_opinion") {
        attempts.push({ tier: tier.kind, outcome: "no_opinion", confidence: 0, evidence: opinion.evidence });
        continue;
      }

      const candidate = scored(opinion.value, opinion.confidence, tier.kind, opinion.evidence);
      opinions.push(candidate);
      attempts.push({
        tier: tier.kind,
        outcome: "opinion",
        documentType: candidate.value,
        confidence: candidate.confidence,
        evidence: candidate.evidence,
      });

      if (candidate.confidence >= tier.threshold) {
        return {
          result: toClassification(candidate),
          attempts,
          transientFailure: attempts.some((attempt) => attempt.transient === true),
        };
      }
    }

    return {
      result: {
        documentType: "unclassified",
        confidence: pickHighest(opinions)?.confidence ?? 0,
        tier: "none",
        evidence: describeAttempts(attempts),
      },
      attempts,
      transientFailure: attempts.some((attempt) => attempt.transient === true),
    };
  }
}
