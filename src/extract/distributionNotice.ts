import { AMOUNT_PATTERN_SOURCE, DATE_PATTERN_SOURCE, detectCurrency } from "../normalize";
import type { FieldResult } from "../types";
import { AnchorExtractor } from "./baseExtractor";
import { amountParser, enumParser, parseDate, resolveField } from "./fields";
import type { ExtractionContext } from "./types";

export type DistributionType = "ROC" | "CI";

export const DISTRIBUTION_TYPE_SYNONYMS: Record<string, DistributionType> = {
  roc: "ROC",
  "return of capital": "ROC",
  "capital return": "ROC",
  "return of contributed capital": "ROC",
  ci: "CI",
  "capital income": "CI",
  income: "CI",
  "income distribution": "CI",
  dividend: "CI",
  "dividend distribution": "CI",
};

const DISTRIBUTION_DATE_LABELS = ["distribution date", "payment date", "payable date", "value date", "record date", "date"];
const AMOUNT_LABELS = [
  "distribution amount",
  "total distribution",
  "net distribution",
  "gross distribution",
  "amount distributed",
  "amount",
];
const TYPE_LABELS = ["distribution type", "type of distribution", "nature of distribution", "character", "type"];
const TYPE_KEYWORDS = "\\b(?:return\\s+of\\s+capital|capital\\s+income|dividend|income\\s+distribution)\\b";

export class DistributionNoticeExtractor extends AnchorExtractor {
  readonly documentType = "distribution_notice";
  readonly fields = ["fund_id", "distribution_date", "lp_id", "amount", "distribution_type", "currency"];

  protected extractFields(context: ExtractionContext): FieldResult[] {
    const amount = resolveField(
      "amount",
      [
        ...this.anchored(context, AMOUNT_LABELS, AMOUNT_PATTERN_SOURCE),
        ...this.fallback(context, AMOUNT_PATTERN_SOURCE, { accept: (span) => detectCurrency(span) !== undefined }),
      ],
      amountParser({ contextCurrency: context.contextCurrency, defaultCurrency: context.config.defaultCurrency }),
    );

    return [
      this.fundId(context),
      resolveField("distribution_date", this.anchored(context, DISTRIBUTION_DATE_LABELS, DATE_PATTERN_SOURCE), parseDate),
      this.lpId(context),
      amount,
      resolveField(
        "distribution_type",
        [...this.anchored(context, TYPE_LABELS, "[A-Za-z][A-Za-z ()/-]*"), ...this.fallback(context, TYPE_KEYWORDS, { ignoreCase: true })],
        enumParser(DISTRIBUTION_TYPE_SYNONYMS),
      ),
      this.currencyFor(context, amount),
    ];
  }
}
