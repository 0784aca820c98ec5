import { AMOUNT_PATTERN_SOURCE, DATE_PATTERN_SOURCE, detectCurrency, normalizeEnum, PERCENT_PATTERN_SOURCE } from "../normalize";
import type { FieldResult, KeyValuePair } from "../types";
import { findSection, splitKeyValue } from "./anchors";
import { AnchorExtractor } from "./baseExtractor";
import { amountParser, emptyField, foundField, parseDate, parsePercent, resolveField } from "./fields";
import type { SpanParser } from "./fields";
import type { ExtractionContext } from "./types";

export const METHODOLOGY_SYNONYMS: Record<string, string> = {
  "discounted cash flow": "Discounted Cash Flow",
  "discounted cash flows": "Discounted Cash Flow",
  dcf: "Discounted Cash Flow",
  "income approach": "Discounted Cash Flow",
  "market multiples": "Market Multiples",
  "market approach": "Market Multiples",
  "comparable companies": "Market Multiples",
  "trading comparables": "Market Multiples",
  "comparable company analysis": "Market Multiples",
  multiples: "Market Multiples",
  "precedent transactions": "Precedent Transactions",
  "transaction comparables": "Precedent Transactions",
  "net asset value": "Net Asset Value",
  nav: "Net Asset Value",
  "adjusted net assets": "Net Asset Value",
  "recent financing": "Recent Financing",
  "price of recent investment": "Recent Financing",
  "cost approach": "Cost",
  "at cost": "Cost",
};

const VALUATION_DATE_LABELS = ["valuation date", "as of date", "as at date", "as of", "as at", "report date", "date"];
const METHODOLOGY_LABELS = ["valuation methodology", "methodology", "valuation method", "valuation approach", "approach", "method"];
const FINAL_VALUATION_LABELS = [
  "final valuation",
  "concluded value",
  "concluded fair value",
  "total fair value",
  "fair value",
  "total valuation",
  "enterprise value",
  "net asset value",
  "valuation",
];
const DISCOUNT_RATE_LABELS = ["discount rate", "wacc", "weighted average cost of capital"];

export const INPUT_HEADINGS = ["valuation inputs", "key inputs", "inputs", "key assumptions", "assumptions", "valuation assumptions"];
const KNOWN_HEADINGS = [
  ...INPUT_HEADINGS,
  "valuation summary",
  "valuation conclusion",
  "conclusion",
  "executive summary",
  "methodology",
  "valuation methodology",
  "notes",
];
const INPUT_KEYS = [
  "discount rate",
  "wacc",
  "terminal growth rate",
  "terminal growth",
  "growth rate",
  "ev/ebitda",
  "ev / ebitda",
  "revenue multiple",
  "ebitda multiple",
  "p/e",
  "exit multiple",
  "cost of equity",
  "cost of debt",
];

const methodologyKeywords = Object.keys(METHODOLOGY_SYNONYMS)
  .filter((synonym) => synonym.includes(" "))
  .map((synonym) => synonym.split(" ").join("\\s+"))
  .join("|");

const parseMethodology: SpanParser = (span) => {
  const methodology = normalizeEnum(span, METHODOLOGY_SYNONYMS);
  return { value: { kind: "string", value: methodology.value }, confidence: methodology.confidence, flags: [] };
};

function toPairs(lines: ExtractionContext["lines"], accept?: (key: string) => boolean): KeyValuePair[] {
  const pairs: KeyValuePair[] = [];
  for (const line of lines) {
    const pair = splitKeyValue(line.text);
    if (pair && (!accept || accept(pair.key))) {
      pairs.push(pair);
    }
  }
  return pairs;
}

export class ValuationReportExtractor extends AnchorExtractor {
  readonly documentType = "valuation_report";
  readonly fields = ["valuation_date", "methodology", "inputs", "final_valuation", "currency", "discount_rate"];

  protected extractFields(context: ExtractionContext): FieldResult[] {
    const finalValuation = resolveField(
      "final_valuation",
      [
        ...this.anchored(context, FINAL_VALUATION_LABELS, AMOUNT_PATTERN_SOURCE),
        ...this.fallback(context, AMOUNT_PATTERN_SOURCE, { accept: (span) => detectCurrency(span) !== undefined }),
      ],
      amountParser({ contextCurrency: context.contextCurrency, defaultCurrency: context.config.defaultCurrency }),
    );

    return [
      resolveField("valuation_date", this.anchored(context, VALUATION_DATE_LABELS, DATE_PATTERN_SOURCE), parseDate),
      resolveField(
        "methodology",
        [
          ...this.anchored(context, METHODOLOGY_LABELS, "[A-Za-z][A-Za-z ()/&-]*"),
          ...this.fallback(context, `(?<![A-Za-z])(?:${methodologyKeywords})(?![A-Za-z])`, { ignoreCase: true }),
        ],
        parseMethodology,
      ),
      this.inputs(context),
      finalValuation,
      this.currencyFor(context, finalValuation),
      resolveField("discount_rate", this.anchored(context, DISCOUNT_RATE_LABELS, PERCENT_PATTERN_SOURCE), parsePercent),
    ];
  }

  private inputs(context: ExtractionContext): FieldResult {
    const section = findSection(context.lines, INPUT_HEADINGS, {
      maxLines: context.config.maxSectionLines,
      knownHeadings: KNOWN_HEADINGS,
    });
    if (section) {
      const pairs = toPairs(section.lines);
      if (pairs.length > 0) {
        return foundField(
          "inputs",
          { kind: "pairs", value: pairs },
          0.9,
          "section",
          section.lines.map((line) => line.text).join("\n"),
          `section "${section.heading}" (page ${section.page}, line ${section.lineNumber})`,
        );
      }
    }

    const loose = toPairs(context.lines, (key) => INPUT_KEYS.some((known) => key.toLowerCase().startsWith(known)));
    if (loose.length > 0) {
      return foundField(
        "inputs",
        { kind: "pairs", value: loose },
        context.config.patternFallbackConfidence,
        "pattern",
        loose.map((pair) => `${pair.key}: ${pair.value}`).join("\n"),
        "known input labels outside a section",
      );
    }
    return emptyField("inputs", section ? `section "${section.heading}" has no key/value lines` : "not found");
  }
}
