import { ParseError } from "../core/errors";
import { clampConfidence } from "../types";

export interface NormalizedAmount {
  value: string;
  currency: string;
  confidence: number;
  currencyInferred: boolean;
}

export interface AmountContext {
  contextCurrency?: string;
  defaultCurrency?: string;
}

export const CURRENCY_CODES = [
  "USD",
  "EUR",
  "GBP",
  "JPY",
  "CHF",
  "CAD",
  "AUD",
  "HKD",
  "SGD",
  "SEK",
  "NOK",
  "DKK",
  "CNY",
] as const;

const CURRENCY_SYMBOLS: Record<string, string> = {
  $: "USD",
  "€": "EUR",
  "£": "GBP",
  "¥": "JPY",
};

const MAGNITUDES: Record<string, number> = {
  thousand: 3,
  k: 3,
  million: 6,
  mm: 6,
  m: 6,
  billion: 9,
  bn: 9,
};

const EXPLICIT_CONFIDENCE = 1;
const CONTEXT_CONFIDENCE = 0.8;
const DEFAULT_CONFIDENCE = 0.6;
// "1.250" reads as 1.25 or 1250 depending on locale.
const AMBIGUOUS_GROUP_FACTOR = 0.6;
const SUB_CENT_FACTOR = 0.9;

const CODE_ALTERNATION = CURRENCY_CODES.join("|");
const CODE_PATTERN = new RegExp(`\\b(${CODE_ALTERNATION})\\b`);
const SYMBOL_PATTERN = /[$€£¥]/;
const NUMBER_SOURCE = "\\d{1,3}(?:[,.' ]\\d{3})+(?:[.,]\\d+)?|\\d+(?:[.,]\\d+)?";
const MAGNITUDE_SOURCE = "(?:million|billion|thousand|Million|Billion|Thousand|MM|mm|bn|BN|m|M|k|K)\\b";

export const AMOUNT_PATTERN_SOURCE =
  `(?<![\\w.,/-])\\(?-?(?:(?:${CODE_ALTERNATION})\\s?)?[$€£¥]?\\s?(?:${NUMBER_SOURCE})` +
  `(?:\\s?${MAGNITUDE_SOURCE})?(?:\\s?(?:${CODE_ALTERNATION})\\b)?\\)?(?![\\d%]|[-/.,]\\d)`;

export function isCurrencyCode(value: string): boolean {
  return (CURRENCY_CODES as readonly string[]).includes(value);
}

export function detectCurrency(text: string): string | undefined {
  const code = CODE_PATTERN.exec(text);
  const symbol = SYMBOL_PATTERN.exec(text);
  if (code && (!symbol || code.index <= symbol.index)) {
    return code[1];
  }
  if (symbol) {
    return CURRENCY_SYMBOLS[symbol[0]];
  }
  return undefined;
}

interface DecimalDigits {
  digits: string;
  scale: number;
  ambiguous: boolean;
}

function parseDecimal(numberText: string, raw: string): DecimalDigits {
  let text = numberText.replace(/[\s']/g, "");
  let ambiguous = false;
  const lastComma = text.lastIndexOf(",");
  const lastDot = text.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    text = lastComma > lastDot ? text.replace(/\./g, "").replace(",", ".") : text.replace(/,/g, "");
  } else if (lastComma >= 0) {
    if (/^\d{1,3}(,\d{3})+$/.test(text)) {
      text = text.replace(/,/g, "");
    } else if (/^\d+,\d{1,2}$/.test(text)) {
      text = text.replace(",", ".");
    } else {
      throw new ParseError(`ambiguous separators in "${raw}"`, raw);
    }
  } else if (/^\d{1,3}(\.\d{3}){2,}$/.test(text)) {
    text = text.replace(/\./g, "");
  } else if (/^[1-9]\d{0,2}\.\d{3}$/.test(text)) {
    ambiguous = true;
  }

  const match = /^(\d+)(?:\.(\d+))?$/.exec(text);
  if (!match) {
    throw new ParseError(`not a number: "${raw}"`, raw);
  }
  const fraction = match[2] ?? "";
  return { digits: `${match[1]}${fraction}`, scale: fraction.length, ambiguous };
}

function toCents(value: DecimalDigits, exponent: number): { cents: bigint; rounded: boolean } {
  const scale = value.scale - exponent;
  const units = BigInt(value.digits);
  if (scale <= 2) {
    return { cents: units * 10n ** BigInt(2 - scale), rounded: false };
  }
  const divisor = 10n ** BigInt(scale - 2);
  const remainder = units % divisor;
  return { cents: units / divisor + (remainder * 2n >= divisor ? 1n : 0n), rounded: remainder !== 0n };
}

function formatCents(cents: bigint, negative: boolean): string {
  const digits = cents.toString().padStart(3, "0");
  const sign = negative && cents !== 0n ? "-" : "";
  return `${sign}${digits.slice(0, -2)}.${digits.slice(-2)}`;
}

export function normalizeAmount(rawSpan: string, context: AmountContext = {}): NormalizedAmount {
  const raw = rawSpan.trim();
  if (raw.length === 0) {
    throw new ParseError("empty amount", rawSpan);
  }

  const negative = /^\(.*\)$/.test(raw) || /^-|\s-\s?[$€£¥\d]|^[A-Z]{3}\s?-/.test(raw);
  const codeMatch = CODE_PATTERN.exec(raw);
  const symbolMatch = SYMBOL_PATTERN.exec(raw);

  let currency: string;
  let confidence: number;
  let currencyInferred = false;
  if (codeMatch) {
    currency = codeMatch[1];
    confidence = EXPLICIT_CONFIDENCE;
  } else if (symbolMatch) {
    currency = CURRENCY_SYMBOLS[symbolMatch[0]];
    confidence = EXPLICIT_CONFIDENCE;
  } else if (context.contextCurrency) {
    currency = context.contextCurrency;
    confidence = CONTEXT_CONFIDENCE;
    currencyInferred = true;
  } else {
    currency = context.defaultCurrency ?? "USD";
    confidence = DEFAULT_CONFIDENCE;
    currencyInferred = true;
  }

  const stripped = raw
    .replace(CODE_PATTERN, " ")
    .replace(/[$€£¥()]/g, " ")
    .replace(/-/g, " ")
    .trim();
  const match = new RegExp(`^(${NUMBER_SOURCE})\\s*(${MAGNITUDE_SOURCE})?$`).exec(stripped);
  if (!match) {
    throw new ParseError(`unrecognized amount "${raw}"`, rawSpan);
  }

  const magnitudeKey = match[2] ? match[2].toLowerCase() : undefined;
  const exponent = magnitudeKey ? (MAGNITUDES[magnitudeKey] ?? 0) : 0;
  const decimal = parseDecimal(match[1], raw);
  const { cents, rounded } = toCents(decimal, exponent);
  if (decimal.ambiguous) {
    confidence *= AMBIGUOUS_GROUP_FACTOR;
  }
  if (rounded) {
    confidence *= SUB_CENT_FACTOR;
  }

  return {
    value: formatCents(cents, negative),
    currency,
    confidence: clampConfidence(confidence),
    currencyInferred,
  };
}
