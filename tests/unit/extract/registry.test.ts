import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, DEFAULT_REQUIRED_FIELDS } from "../../../src/config";
import { RegistryConfigurationError, UnsupportedTypeError } from "../../../src/core/errors";
import {
  buildLayoutFromText,
  CapitalCallExtractor,
  createExtractorRegistry,
  DistributionNoticeExtractor,
  ExtractorRegistry,
  QuarterlyUpdateExtractor,
  ValuationReportExtractor,
} from "../../../src/extract";
import type { Extractor } from "../../../src/extract";
import type { FieldMap } from "../../../src/types";

const config = DEFAULT_CONFIG.extraction;

function realExtractors(): Extractor[] {
  return [
    new CapitalCallExtractor(config),
    new DistributionNoticeExtractor(config),
    new ValuationReportExtractor(config),
    new QuarterlyUpdateExtractor(config),
  ];
}

describe("ExtractorRegistry", () => {
  it("resolves an extractor for every classified type", () => {
    const registry = createExtractorRegistry(config, DEFAULT_REQUIRED_FIELDS);
    expect(registry.getExtractor("valuation_report").documentType).toBe("valuation_report");
  });

  it("refuses unclassified documents", () => {
    const registry = createExtractorRegistry(config, DEFAULT_REQUIRED_FIELDS);
    expect(() => registry.getExtractor("unclassified")).toThrow(UnsupportedTypeError);
    expect(() => registry.getExtractor("unclassified")).toThrow('no extractor registered for document type "unclassified"');
  });

  it("rejects duplicate and missing extractors at construction", () => {
    expect(() => new ExtractorRegistry([...realExtractors(), new CapitalCallExtractor(config)], DEFAULT_REQUIRED_FIELDS)).toThrow(
      new RegistryConfigurationError('duplicate extractor for document type "capital_call"'),
    );
    expect(() => new ExtractorRegistry(realExtractors().slice(0, 3), DEFAULT_REQUIRED_FIELDS)).toThrow(
      new RegistryConfigurationError('no extractor registered for document type "quarterly_update"'),
    );
  });

  it("rejects a schema field no extractor produces", () => {
    const schema = { ...DEFAULT_REQUIRED_FIELDS, capital_call: [...DEFAULT_REQUIRED_FIELDS.capital_call, "wire_instructions"] };
    expect(() => new ExtractorRegistry(realExtractors(), schema)).toThrow(
      'extractor for "capital_call" does not produce required field(s): wire_instructions',
    );
  });

  it.each(["capital_call", "distribution_notice", "valuation_report", "quarterly_update"] as const)(
    "returns an empty result for every required %s field on empty text",
    async (documentType) => {
      const registry = createExtractorRegistry(config, DEFAULT_REQUIRED_FIELDS);

      const fields = await registry.extract(documentType, "", buildLayoutFromText(""));

      for (const name of DEFAULT_REQUIRED_FIELDS[documentType]) {
        expect(fields[name]).toMatchObject({ name, value: null, confidence: 0, tier: "none" });
      }
      expect(Object.values(fields).filter((field) => field.value !== null)).toEqual([]);
    },
  );

  it("fills required fields the extractor left out", async () => {
    const silent: Extractor = {
      documentType: "capital_call",
      fields: DEFAULT_REQUIRED_FIELDS.capital_call,
      extract: async (): Promise<FieldMap> => ({}),
    };
    const registry = new ExtractorRegistry([silent, ...realExtractors().slice(1)], DEFAULT_REQUIRED_FIELDS);

    const fields = await registry.extract("capital_call", "", buildLayoutFromText(""));

    expect(Object.keys(fields)).toEqual(DEFAULT_REQUIRED_FIELDS.capital_call);
    expect(fields.call_number).toEqual({
      name: "call_number",
      value: null,
      confidence: 0,
      tier: "none",
      rawSpan: "",
      flags: [],
      evidence: "not extracted",
    });
  });
});
