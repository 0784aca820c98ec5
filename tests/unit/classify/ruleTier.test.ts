import { describe, expect, it } from "vitest";
import { RuleTier } from "../../../src/classify";
import { DEFAULT_CONFIG } from "../../../src/config";
import { buildLayoutFromText } from "../../../src/extract";

const CAPITAL_CALL_TEXT = [
  "CAPITAL CALL NOTICE",
  "Fund ABC-III",
  "Call Date: 03/15/2023",
  "LP ID: LP-0042",
  "Call Amount: $1,250,000.00",
  "Call Number: 3",
].join("\n");

function input(text: string) {
  return { text, layout: buildLayoutFromText(text) };
}

describe("RuleTier", () => {
  const tier = new RuleTier(DEFAULT_CONFIG.classifier);

  it("scores a capital call notice past the threshold", async () => {
    const opinion = await tier.attempt(input(CAPITAL_CALL_TEXT));
    expect(opinion).toEqual({
      kind: "opinion",
      value: "capital_call",
      confidence: 1,
      tier: "rule",
      evidence: 'matched "capital call", "call notice", "call amount"',
    });
    expect(tier.threshold).toBe(0.55);
  });

  it("counts repeated phrases", () => {
    const scores = tier.score("Quarterly update. See the quarterly update appendix.");
    const quarterly = scores.find((score) => score.documentType === "quarterly_update");
    expect(quarterly).toEqual({ documentType: "quarterly_update", score: 1, hits: ['"quarterly update" x2'] });
  });

  it("has no opinion when nothing matches", async () => {
    expect(await tier.attempt(input("Lorem ipsum dolor sit amet"))).toEqual({
      kind: "no_opinion",
      evidence: "no vocabulary matched",
    });
  });

  it("resolves equal scores lexically and says so", async () => {
    const tied = new RuleTier({
      ruleThreshold: 0.5,
      ruleSaturation: 1,
      vocabulary: {
        capital_call: [],
        distribution_notice: [{ phrase: "notice", weight: 0.6 }],
        valuation_report: [],
        quarterly_update: [{ phrase: "notice", weight: 0.6 }],
      },
    });
    expect(await tied.attempt(input("Notice to investors"))).toEqual({
      kind: "opinion",
      value: "distribution_notice",
      confidence: 0.6,
      tier: "rule",
      evidence: 'matched "notice"; tie with quarterly_update resolved lexically',
    });
  });

  it("is deterministic for the same text", async () => {
    const first = await tier.attempt(input(CAPITAL_CALL_TEXT));
    const second = await tier.attempt(input(CAPITAL_CALL_TEXT));
    expect(second).toEqual(first);
  });
});
