import { ParseError } from "../core/errors";

export interface NormalizedIdentifier {
  value: string;
  confidence: number;
  recognized: boolean;
}

const KNOWN_FORMAT_CONFIDENCE = 1;
const UNKNOWN_FORMAT_CONFIDENCE = 0.5;

export const IDENTIFIER_PATTERN_SOURCE = "[A-Za-z0-9](?:[A-Za-z0-9]|[-/](?=[A-Za-z0-9]))*";

export function normalizeIdentifier(rawSpan: string, knownFormat?: RegExp): NormalizedIdentifier {
  const value = rawSpan
    .trim()
    .replace(/[.,;:]+$/, "")
    .replace(/\s+/g, " ")
    .toUpperCase();
  if (value.length === 0) {
    throw new ParseError("empty identifier", rawSpan);
  }

  const recognized = knownFormat ? knownFormat.test(value) : false;
  return {
    value,
    confidence: recognized ? KNOWN_FORMAT_CONFIDENCE : UNKNOWN_FORMAT_CONFIDENCE,
    recognized,
  };
}
