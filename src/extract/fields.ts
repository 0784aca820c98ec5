import { ParseError } from "../core/errors";
import { normalizeAmount, normalizeDate, normalizeEnum, normalizeIdentifier, normalizeInteger, normalizePercent } from "../normalize";
import type { AmountContext } from "../normalize";
import { clampConfidence, pickHighest } from "../types";
import type { FieldFlag, FieldResult, FieldSource, FieldValue } from "../types";
import type { FieldCandidate } from "./anchors";

export interface ParsedValue {
  value: FieldValue;
  confidence: number;
  flags: FieldFlag[];
}

export type SpanParser = (span: string) => ParsedValue;

export function emptyField(name: string, evidence: string, rawSpan = ""): FieldResult {
  return { name, value: null, confidence: 0, tier: "none", rawSpan, flags: [], evidence };
}

export function foundField(
  name: string,
  value: FieldValue,
  confidence: number,
  tier: FieldSource,
  rawSpan: string,
  evidence: string,
  flags: FieldFlag[] = [],
): FieldResult {
  const clamped = clampConfidence(confidence);
  if (clamped === 0) {
    return emptyField(name, `${evidence}; confidence too low`, rawSpan);
  }
  return { name, value, confidence: clamped, tier, rawSpan, flags, evidence };
}

export function resolveField(name: string, candidates: FieldCandidate[], parse: SpanParser): FieldResult {
  const found: FieldResult[] = [];
  let firstFailure: ParseError | undefined;
  for (const candidate of candidates) {
    let parsed: ParsedValue;
    try {
      parsed = parse(candidate.span);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      firstFailure ??= error;
      continue;
    }
    const result = foundField(
      name,
      parsed.value,
      candidate.proximity * parsed.confidence,
      candidate.source,
      candidate.span,
      candidate.evidence,
      parsed.flags,
    );
    if (result.value !== null) {
      found.push(result);
    }
  }
  const best = pickHighest(found);
  if (best) {
    return best;
  }
  if (firstFailure) {
    return emptyField(name, `unparseable: ${firstFailure.message}`, firstFailure.rawSpan);
  }
  return emptyField(name, "not found");
}

export const parseDate: SpanParser = (span) => {
  const date = normalizeDate(span);
  return {
    value: { kind: "date", value: date.value },
    confidence: date.confidence,
    flags: date.ambiguous ? ["ambiguous_date"] : [],
  };
};

export function amountParser(context: AmountContext): SpanParser {
  return (span) => {
    const amount = normalizeAmount(span, context);
    return {
      value: { kind: "amount", value: amount.value, currency: amount.currency },
      confidence: amount.confidence,
      flags: amount.currencyInferred ? ["inferred_currency"] : [],
    };
  };
}

export function identifierParser(knownFormat: RegExp): SpanParser {
  return (span) => {
    const identifier = normalizeIdentifier(span, knownFormat);
    return {
      value: { kind: "string", value: identifier.value },
      confidence: identifier.confidence,
      flags: identifier.recognized ? [] : ["unrecognized_identifier"],
    };
  };
}

export const parseInteger: SpanParser = (span) => {
  const integer = normalizeInteger(span);
  return { value: { kind: "integer", value: integer.value }, confidence: integer.confidence, flags: [] };
};

export const parsePercent: SpanParser = (span) => {
  const percent = normalizePercent(span);
  return { value: { kind: "string", value: percent.value }, confidence: percent.confidence, flags: [] };
};

export function enumParser<T extends string>(synonyms: Record<string, T>): SpanParser {
  return (span) => {
    const member = normalizeEnum(span, synonyms);
    return { value: { kind: "enum", value: member.value }, confidence: member.confidence, flags: [] };
  };
}

const LABEL_FILLERS = new Set(["ID", "NO", "NUMBER", "NAME", "CODE", "IDENTIFIER", "REF", "REFERENCE", "OF", "THE"]);

export function isLabelFiller(token: string): boolean {
  return LABEL_FILLERS.has(token.replace(/[.:#]+$/, "").toUpperCase());
}
