import { describe, expect, it } from "vitest";
import { MultiTierClassifier, createClassifier } from "../../../src/classify";
import type { ClassificationModel, ClassifierTier, TierOpinion } from "../../../src/classify";
import { DEFAULT_CONFIG } from "../../../src/config";
import { TransientModelError } from "../../../src/core/errors";
import { buildLayoutFromText } from "../../../src/extract";

const TEXT = "CAPITAL CALL NOTICE\nCall Amount: $10,000";
const LAYOUT = buildLayoutFromText(TEXT);

function stubTier(kind: "model" | "rule", threshold: number, attempt: () => Promise<TierOpinion>): ClassifierTier {
  return { kind, threshold, attempt };
}

describe("MultiTierClassifier", () => {
  it("returns the first tier that clears its threshold", async () => {
    const classifier = new MultiTierClassifier([
      stubTier("model", 0.75, async () => ({ kind: "opinion", value: "valuation_report", confidence: 0.8, tier: "model", evidence: "model says so" })),
      stubTier("rule", 0.55, async () => ({ kind: "opinion", value: "capital_call", confidence: 1, tier: "rule", evidence: "rules" })),
    ]);
    expect(await classifier.classify(TEXT, LAYOUT)).toEqual({
      documentType: "valuation_report",
      confidence: 0.8,
      tier: "model",
      evidence: "model says so",
    });
  });

  it("falls through a failing tier and reports the transient failure", async () => {
    const classifier = new MultiTierClassifier([
      stubTier("model", 0.75, async () => {
        throw new TransientModelError("model timed out");
      }),
      stubTier("rule", 0.55, async () => ({ kind: "opinion", value: "capital_call", confidence: 0.9, tier: "rule", evidence: "rules" })),
    ]);
    const detailed = await classifier.classifyDetailed(TEXT, LAYOUT);
    expect(detailed.result.tier).toBe("rule");
    expect(detailed.transientFailure).toBe(true);
    expect(detailed.attempts[0]).toEqual({
      tier: "model",
      outcome: "error",
      confidence: 0,
      evidence: "model timed out",
      transient: true,
    });
  });

  it("returns unclassified with the highest sub-threshold confidence", async () => {
    const classifier = new MultiTierClassifier([
      stubTier("model", 0.75, async () => ({ kind: "opinion", value: "valuation_report", confidence: 0.6, tier: "model", evidence: "weak" })),
      stubTier("rule", 0.55, async () => ({ kind: "no_opinion", evidence: "nothing matched" })),
    ]);
    const detailed = await classifier.classifyDetailed(TEXT, LAYOUT);
    expect(detailed.result).toEqual({
      documentType: "unclassified",
      confidence: 0.6,
      tier: "none",
      evidence: "model: valuation_report 0.6 below threshold (weak); rule: nothing matched",
    });
    expect(detailed.transientFailure).toBe(false);
  });

  it("never throws, even when every tier fails", async () => {
    const classifier = new MultiTierClassifier([
      stubTier("rule", 0.55, async () => {
        throw new Error("broken vocabulary");
      }),
    ]);
    expect(await classifier.classify(TEXT, LAYOUT)).toEqual({
      documentType: "unclassified",
      confidence: 0,
      tier: "none",
      evidence: "rule: broken vocabulary",
    });
  });
});

describe("createClassifier", () => {
  it("orders the model tier before the rule tier", async () => {
    const model: ClassificationModel = {
      name: "fake",
      predict: async () => [{ label: "quarterly", score: 0.95 }],
    };
    const result = await createClassifier(DEFAULT_CONFIG, model).classify(TEXT, LAYOUT);
    expect(result.tier).toBe("model");
    expect(result.documentType).toBe("quarterly_update");
  });

  it("uses only the rule tier without a model", async () => {
    const result = await createClassifier(DEFAULT_CONFIG).classify(TEXT, LAYOUT);
    expect(result).toEqual({
      documentType: "capital_call",
      confidence: 1,
      tier: "rule",
      evidence: 'matched "capital call", "call notice", "call amount"',
    });
  });
});
