import { ParseError } from "../core/errors";
import { compareLexically } from "../types";

export interface Normalized<T> {
  value: T;
  confidence: number;
}

export const INTEGER_PATTERN_SOURCE = "#?\\s?\\d{1,6}\\b";
export const PERCENT_PATTERN_SOURCE = "-?\\d+(?:\\.\\d+)?\\s?%?";

export function normalizeInteger(rawSpan: string): Normalized<number> {
  const match = /^(?:no\.?|number|#)?\s*(\d{1,6})$/i.exec(rawSpan.trim());
  if (!match) {
    throw new ParseError(`not an integer: "${rawSpan.trim()}"`, rawSpan);
  }
  return { value: Number(match[1]), confidence: 1 };
}

export function normalizePercent(rawSpan: string): Normalized<string> {
  const match = /^(-?\d+(?:\.\d+)?)\s?(%)?$/.exec(rawSpan.trim());
  if (!match) {
    throw new ParseError(`not a percentage: "${rawSpan.trim()}"`, rawSpan);
  }
  const fraction = Number(match[1]) / 100;
  return {
    value: String(Number(fraction.toFixed(6))),
    confidence: match[2] ? 1 : 0.8,
  };
}

export function normalizeEnum<T extends string>(rawSpan: string, synonyms: Record<string, T>): Normalized<T> {
  const key = rawSpan.trim().replace(/\s+/g, " ").toLowerCase();
  if (key.length === 0) {
    throw new ParseError("empty enum value", rawSpan);
  }

  const exact = synonyms[key];
  if (exact !== undefined) {
    return { value: exact, confidence: 1 };
  }

  const contained = Object.keys(synonyms)
    .sort((a, b) => b.length - a.length || compareLexically(a, b))
    .find((synonym) => new RegExp(`\\b${escapeRegExp(synonym)}\\b`).test(key));
  if (contained !== undefined) {
    return { value: synonyms[contained], confidence: 0.8 };
  }

  throw new ParseError(`"${rawSpan.trim()}" is not one of ${[...new Set(Object.values(synonyms))].join(", ")}`, rawSpan);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
