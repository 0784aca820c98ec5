import type { ClassifierConfig } from "../config";
import { escapeRegExp } from "../normalize";
import { CLASSIFIED_DOCUMENT_TYPES, clampConfidence, compareLexically, scored } from "../types";
import type { ClassifiedDocumentType } from "../types";
import type { ClassifierInput, ClassifierTier, TierOpinion } from "./types";

interface CompiledPhrase {
  phrase: string;
  weight: number;
  pattern: RegExp;
}

export interface RuleScore {
  documentType: ClassifiedDocumentType;
  score: number;
  hits: string[];
}

function compilePhrase(phrase: string): RegExp {
  const words = phrase.trim().toLowerCase().split(/\s+/).map(escapeRegExp);
  return new RegExp(`\\b${words.join("\\s+")}\\b`, "g");
}

/**
 * Weighted keyword tier. Score per type is `min(1, sum(weight * occurrences) / saturation)`.
 * Equal top scores go to the lexically smaller type; the tie is written into the evidence.
 */
export class RuleTier implements ClassifierTier {
  readonly kind = "rule";
  readonly threshold: number;
  private readonly saturation: number;
  private readonly vocabulary: Array<{ documentType: ClassifiedDocumentType; phrases: CompiledPhrase[] }>;

  constructor(config: Pick<ClassifierConfig, "ruleThreshold" | "ruleSaturation" | "vocabulary">) {
    this.threshold = config.ruleThreshold;
    this.saturation = config.ruleSaturation > 0 ? config.ruleSaturation : 1;
    this.vocabulary = CLASSIFIED_DOCUMENT_TYPES.map((documentType) => ({
      documentType,
      phrases: (config.vocabulary[documentType] ?? []).map((entry) => ({
        phrase: entry.phrase,
        weight: entry.weight,
        pattern: compilePhrase(entry.phrase),
      })),
    }));
  }

  score(text: string): RuleScore[] {
    const lowered = text.toLowerCase();
    return this.vocabulary.map(({ documentType, phrases }) => {
      let total = 0;
      const hits: string[] = [];
      for (const entry of phrases) {
        const count = lowered.match(entry.pattern)?.length ?? 0;
        if (count > 0) {
          total += entry.weight * count;
          hits.push(count > 1 ? `"${entry.phrase}" x${count}` : `"${entry.phrase}"`);
        }
      }
      return { documentType, score: clampConfidence(total / this.saturation), hits };
    });
  }

  async attempt(input: ClassifierInput): Promise<TierOpinion> {
    const ranked = this.score(input.text).sort(
      (a, b) => b.score - a.score || compareLexically(a.documentType, b.documentType),
    );
    const best = ranked[0];
    if (!best || best.score === 0) {
      return { kind: "no_opinion", evidence: "no vocabulary matched" };
    }

    let evidence = `matched ${best.hits.join(", ")}`;
    const tied = ranked.filter((candidate) => candidate !== best && candidate.score === best.score);
    if (tied.length > 0) {
      evidence += `; tie with ${tied.map((candidate) => candidate.documentType).join(", ")} resolved lexically`;
    }

    return { kind: "opinion", ...scored(best.documentType, best.score, this.kind, evidence) };
  }
}
