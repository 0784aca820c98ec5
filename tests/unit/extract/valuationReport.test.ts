import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/config";
import { buildLayoutFromText, ValuationReportExtractor } from "../../../src/extract";
import { VALUATION_REPORT_TEXT } from "../../fixtures/documents";

describe("ValuationReportExtractor", () => {
  const extractor = new ValuationReportExtractor(DEFAULT_CONFIG.extraction);

  it("extracts methodology, the inputs section and the final valuation", async () => {
    const fields = await extractor.extract(VALUATION_REPORT_TEXT, buildLayoutFromText(VALUATION_REPORT_TEXT));

    expect(fields.valuation_date).toMatchObject({ value: { kind: "date", value: "2023-12-31" }, confidence: 1 });
    expect(fields.methodology).toMatchObject({
      value: { kind: "string", value: "Discounted Cash Flow" },
      confidence: 1,
      evidence: 'label "methodology" same line (page 1, line 3)',
    });
    expect(fields.inputs).toMatchObject({
      value: {
        kind: "pairs",
        value: [
          { key: "Discount Rate", value: "12.5%" },
          { key: "Terminal Growth", value: "2.0%" },
          { key: "EV/EBITDA", value: "9.5x" },
        ],
      },
      confidence: 0.9,
      tier: "section",
      evidence: 'section "key inputs" (page 1, line 5)',
    });
    expect(fields.final_valuation).toMatchObject({
      value: { kind: "amount", value: "48200000.00", currency: "USD" },
      confidence: 1,
    });
    expect(fields.currency).toMatchObject({ value: { kind: "enum", value: "USD" }, confidence: 1 });
    expect(fields.discount_rate).toMatchObject({ value: { kind: "string", value: "0.125" }, confidence: 1 });
  });
});
