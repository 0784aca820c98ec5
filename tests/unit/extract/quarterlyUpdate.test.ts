import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/config";
import { buildLayoutFromText, QuarterlyUpdateExtractor } from "../../../src/extract";
import { QUARTERLY_UPDATE_TEXT } from "../../fixtures/documents";

describe("QuarterlyUpdateExtractor", () => {
  const extractor = new QuarterlyUpdateExtractor(DEFAULT_CONFIG.extraction);

  it("reads KPIs and highlights from their sections", async () => {
    const fields = await extractor.extract(QUARTERLY_UPDATE_TEXT, buildLayoutFromText(QUARTERLY_UPDATE_TEXT));

    expect(fields.kpis).toMatchObject({
      value: { kind: "mapping", value: { Revenue: "$12.4M", "EBITDA Margin": "18%", "Net Debt": "$3.1M" } },
      confidence: 0.9,
      tier: "section",
      evidence: 'section "key performance indicators" (page 1, line 4)',
    });
    expect(fields.narrative_highlights).toMatchObject({
      value: { kind: "segments", value: ["Closed acquisition of Beta Corp", "Expanded into two new markets"] },
      confidence: 0.9,
      evidence: 'section "highlights" (page 1, line 9)',
    });
    expect(fields.reporting_period).toMatchObject({
      value: { kind: "string", value: "Q3 2023" },
      confidence: 1,
      evidence: 'label "reporting period" same line (page 1, line 2)',
    });
  });

  it("leaves both sections empty when the headings are missing", async () => {
    const text = "Portfolio company letter\nThings went fine.";
    const fields = await extractor.extract(text, buildLayoutFromText(text));

    expect(fields.kpis.value).toBeNull();
    expect(fields.narrative_highlights.value).toBeNull();
  });
});
