import type { AppConfig, ClassifierConfig, DocumentSchema } from "./types";

export const DEFAULT_REQUIRED_FIELDS: DocumentSchema = {
  capital_call: ["fund_id", "call_date", "lp_id", "call_amount", "currency", "call_number"],
  distribution_notice: ["fund_id", "distribution_date", "lp_id", "amount", "distribution_type"],
  valuation_report: ["valuation_date", "methodology", "inputs", "final_valuation"],
  quarterly_update: ["kpis", "narrative_highlights"],
};

const DEFAULT_CLASSIFIER: ClassifierConfig = {
  modelThreshold: 0.75,
  ruleThreshold: 0.55,
  ruleSaturation: 1,
  vocabulary: {
    capital_call: [
      { phrase: "capital call", weight: 0.5 },
      { phrase: "drawdown notice", weight: 0.5 },
      { phrase: "call notice", weight: 0.35 },
      { phrase: "contribution request", weight: 0.4 },
      { phrase: "capital contribution", weight: 0.3 },
      { phrase: "call amount", weight: 0.3 },
      { phrase: "unfunded commitment", weight: 0.2 },
    ],
    distribution_notice: [
      { phrase: "distribution notice", weight: 0.5 },
      { phrase: "return of capital", weight: 0.35 },
      { phrase: "cash distribution", weight: 0.35 },
      { phrase: "dividend distribution", weight: 0.35 },
      { phrase: "distribution amount", weight: 0.3 },
      { phrase: "distribution date", weight: 0.25 },
    ],
    valuation_report: [
      { phrase: "valuation report", weight: 0.5 },
      { phrase: "portfolio valuation", weight: 0.4 },
      { phrase: "asset valuation", weight: 0.35 },
      { phrase: "valuation methodology", weight: 0.35 },
      { phrase: "fair value", weight: 0.3 },
      { phrase: "discounted cash flow", weight: 0.25 },
    ],
    quarterly_update: [
      { phrase: "quarterly report", weight: 0.5 },
      { phrase: "quarterly update", weight: 0.5 },
      { phrase: "quarterly statement", weight: 0.45 },
      { phrase: "q1 report", weight: 0.4 },
      { phrase: "q2 report", weight: 0.4 },
      { phrase: "q3 report", weight: 0.4 },
      { phrase: "q4 report", weight: 0.4 },
      { phrase: "key performance indicators", weight: 0.3 },
      { phrase: "portfolio highlights", weight: 0.25 },
    ],
  },
  modelLabelAliases: {
    capital_call: "capital_call",
    "capital call": "capital_call",
    drawdown: "capital_call",
    distribution: "distribution_notice",
    distribution_notice: "distribution_notice",
    valuation: "valuation_report",
    valuation_report: "valuation_report",
    quarterly: "quarterly_update",
    quarterly_update: "quarterly_update",
    quarterly_report: "quarterly_update",
  },
};

export const DEFAULT_CONFIG: AppConfig = {
  classifier: DEFAULT_CLASSIFIER,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 10_000,
  },
  extraction: {
    maxAnchorLineDistance: 3,
    anchorDecayPerLine: 0.15,
    patternFallbackConfidence: 0.5,
    defaultCurrency: "USD",
    maxSectionLines: 40,
    identifierPatterns: {
      fund_id: "^[A-Z0-9]{2,12}(?:[-/][A-Z0-9]{1,12}){0,3}$",
      lp_id: "^(?:LP|INV)[-/]?[A-Z0-9]{1,12}(?:-[A-Z0-9]{1,12})*$",
    },
  },
  validation: {
    confidenceFloor: 0.4,
  },
  requiredFields: DEFAULT_REQUIRED_FIELDS,
  modelTimeoutMs: 30_000,
  workerConcurrency: 4,
  model: {
    mode: "none",
    httpBaseUrl: "http://127.0.0.1:8090",
    httpToken: undefined,
  },
  ignoreHttpsErrors: false,
  storePath: "data/pipeline.sqlite",
  outputDirs: {
    manifests: "data/manifests",
  },
};
