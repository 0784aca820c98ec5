import { AMOUNT_PATTERN_SOURCE, DATE_PATTERN_SOURCE, detectCurrency, INTEGER_PATTERN_SOURCE } from "../normalize";
import type { FieldResult } from "../types";
import { AnchorExtractor } from "./baseExtractor";
import { amountParser, parseDate, parseInteger, resolveField } from "./fields";
import type { ExtractionContext } from "./types";

const CALL_DATE_LABELS = ["call date", "notice date", "date of notice", "date of call", "dated", "date"];
const CALL_AMOUNT_LABELS = [
  "call amount",
  "capital call amount",
  "amount called",
  "drawdown amount",
  "total amount due",
  "amount due",
  "amount",
];
const CALL_NUMBER_LABELS = [
  "call number",
  "call no",
  "call #",
  "capital call no",
  "drawdown number",
  "drawdown no",
  "notice number",
  "notice no",
];

export class CapitalCallExtractor extends AnchorExtractor {
  readonly documentType = "capital_call";
  readonly fields = ["fund_id", "call_date", "lp_id", "call_amount", "currency", "call_number"];

  protected extractFields(context: ExtractionContext): FieldResult[] {
    const callAmount = resolveField(
      "call_amount",
      [
        ...this.anchored(context, CALL_AMOUNT_LABELS, AMOUNT_PATTERN_SOURCE),
        ...this.fallback(context, AMOUNT_PATTERN_SOURCE, { accept: (span) => detectCurrency(span) !== undefined }),
      ],
      amountParser({ contextCurrency: context.contextCurrency, defaultCurrency: context.config.defaultCurrency }),
    );

    return [
      this.fundId(context),
      resolveField("call_date", this.anchored(context, CALL_DATE_LABELS, DATE_PATTERN_SOURCE), parseDate),
      this.lpId(context),
      callAmount,
      this.currencyFor(context, callAmount),
      resolveField(
        "call_number",
        [
          ...this.anchored(context, CALL_NUMBER_LABELS, INTEGER_PATTERN_SOURCE),
          ...this.fallback(context, "\\b(?:[Cc]all|[Dd]rawdown)\\s+#?(\\d{1,6})\\b"),
        ],
        parseInteger,
      ),
    ];
  }
}
