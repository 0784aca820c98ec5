import type { ExtractionConfig } from "../config";
import { detectCurrency, IDENTIFIER_PATTERN_SOURCE, isCurrencyCode } from "../normalize";
import type { ClassifiedDocumentType, DocumentLayout, FieldMap, FieldResult } from "../types";
import { findAnchoredValues, findPatternValues } from "./anchors";
import type { FieldCandidate, PatternOptions } from "./anchors";
import { emptyField, foundField, identifierParser, isLabelFiller, resolveField } from "./fields";
import { readingOrder } from "./layout";
import type { ExtractionContext, Extractor } from "./types";

export const FUND_ID_LABELS = ["fund id", "fund identifier", "fund code", "fund number", "fund no", "fund"];
export const LP_ID_LABELS = [
  "lp id",
  "lp number",
  "lp no",
  "investor id",
  "investor number",
  "limited partner id",
  "partner id",
  "limited partner",
  "investor",
  "lp",
];

export abstract class AnchorExtractor implements Extractor {
  abstract readonly documentType: ClassifiedDocumentType;
  abstract readonly fields: readonly string[];
  protected readonly config: ExtractionConfig;
  private readonly fundIdFormat: RegExp;
  private readonly lpIdFormat: RegExp;

  constructor(config: ExtractionConfig) {
    this.config = config;
    this.fundIdFormat = new RegExp(config.identifierPatterns.fund_id);
    this.lpIdFormat = new RegExp(config.identifierPatterns.lp_id);
  }

  async extract(text: string, layout: DocumentLayout): Promise<FieldMap> {
    const lines = readingOrder(text, layout);
    const context: ExtractionContext = {
      text,
      lines,
      config: this.config,
      contextCurrency: detectCurrency(lines.map((line) => line.text).join("\n")),
    };

    const fields: FieldMap = {};
    for (const result of this.extractFields(context)) {
      fields[result.name] = result;
    }
    for (const name of this.fields) {
      fields[name] ??= emptyField(name, "not extracted");
    }
    return fields;
  }

  protected abstract extractFields(context: ExtractionContext): FieldResult[];

  protected anchored(context: ExtractionContext, labels: readonly string[], valuePattern: string, skipFillers = false): FieldCandidate[] {
    return findAnchoredValues(context.lines, labels, valuePattern, {
      maxLineDistance: context.config.maxAnchorLineDistance,
      decayPerLine: context.config.anchorDecayPerLine,
      skip: skipFillers ? isLabelFiller : undefined,
    });
  }

  protected fallback(context: ExtractionContext, valuePattern: string, options?: PatternOptions): FieldCandidate[] {
    return findPatternValues(context.lines, valuePattern, context.config.patternFallbackConfidence, options);
  }

  protected fundId(context: ExtractionContext): FieldResult {
    const candidates = [
      ...this.anchored(context, FUND_ID_LABELS, IDENTIFIER_PATTERN_SOURCE, true),
      ...this.fallback(context, "\\b[A-Z]{2,6}[- ]?(?:[IVX]{1,5}|\\d{1,3})\\b", { accept: (span) => this.fundIdFormat.test(span) }),
    ];
    return resolveField("fund_id", candidates, identifierParser(this.fundIdFormat));
  }

  protected lpId(context: ExtractionContext): FieldResult {
    const candidates = [
      ...this.anchored(context, LP_ID_LABELS, IDENTIFIER_PATTERN_SOURCE, true),
      ...this.fallback(context, "\\b(?:LP|INV)[-/]?[A-Z0-9]{2,12}\\b"),
    ];
    return resolveField("lp_id", candidates, identifierParser(this.lpIdFormat));
  }

  protected currencyFor(context: ExtractionContext, amount: FieldResult): FieldResult {
    const stated = this.anchored(context, ["currency", "denomination"], "\\b[A-Za-z]{3}\\b");
    for (const candidate of stated) {
      const code = candidate.span.toUpperCase();
      if (isCurrencyCode(code)) {
        return foundField("currency", { kind: "enum", value: code }, candidate.proximity, "anchor", candidate.span, candidate.evidence);
      }
    }

    if (amount.value?.kind === "amount") {
      const inferred = amount.flags.includes("inferred_currency");
      const confidence = inferred ? (context.contextCurrency ? 0.8 : 0.6) : 1;
      return foundField(
        "currency",
        { kind: "enum", value: amount.value.currency },
        confidence,
        "derived",
        amount.rawSpan,
        `from ${amount.name}`,
        inferred ? ["inferred_currency"] : [],
      );
    }

    if (context.contextCurrency) {
      return foundField("currency", { kind: "enum", value: context.contextCurrency }, 0.8, "pattern", context.contextCurrency, "currency mentioned in document");
    }
    return emptyField("currency", "no amount or currency mention");
  }
}
