import { ParseError } from "../core/errors";
import { clampConfidence } from "../types";

export interface NormalizedDate {
  value: string;
  confidence: number;
  ambiguous: boolean;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

const ISO_LIKE = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const NUMERIC = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4}|\d{2})$/;
const MONTH_NAME_FIRST = /^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST_NAME = /^(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/;

const UNAMBIGUOUS_NUMERIC_CONFIDENCE = 0.9;
const AMBIGUOUS_NUMERIC_CONFIDENCE = 0.7;
const TWO_DIGIT_YEAR_PENALTY = 0.1;

export const DATE_PATTERN_SOURCE =
  "\\d{4}[-/.]\\d{1,2}[-/.]\\d{1,2}" +
  "|\\d{1,2}[-/.]\\d{1,2}[-/.](?:\\d{4}|\\d{2})" +
  "|\\d{8}" +
  "|[A-Za-z]{3,9}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}" +
  "|\\d{1,2}(?:st|nd|rd|th)?\\s+[A-Za-z]{3,9}\\.?,?\\s+\\d{4}";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function toIsoDate(year: number, month: number, day: number, raw: string): string {
  if (month < 1 || month > 12) {
    throw new ParseError(`month out of range in "${raw}"`, raw);
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) {
    throw new ParseError(`day out of range in "${raw}"`, raw);
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

function monthFromName(name: string, raw: string): number {
  const month = MONTHS[name.toLowerCase()];
  if (month === undefined) {
    throw new ParseError(`unknown month "${name}"`, raw);
  }
  return month;
}

/**
 * Numeric dates whose day/month order cannot be told apart (03/04/2023) are read month-first
 * and reported as ambiguous.
 */
export function normalizeDate(rawSpan: string): NormalizedDate {
  const raw = rawSpan.trim().replace(/\s+/g, " ");
  if (raw.length === 0) {
    throw new ParseError("empty date", rawSpan);
  }

  const iso = ISO_LIKE.exec(raw) ?? COMPACT.exec(raw);
  if (iso) {
    return {
      value: toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]), raw),
      confidence: 1,
      ambiguous: false,
    };
  }

  const numeric = NUMERIC.exec(raw);
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[2]);
    const shortYear = numeric[3].length === 2;
    const year = shortYear ? 2000 + Number(numeric[3]) : Number(numeric[3]);
    const penalty = shortYear ? TWO_DIGIT_YEAR_PENALTY : 0;

    if (first > 12 && second > 12) {
      throw new ParseError(`neither part of "${raw}" is a month`, raw);
    }
    const resolved = clampConfidence(UNAMBIGUOUS_NUMERIC_CONFIDENCE - penalty);
    if (first > 12) {
      return { value: toIsoDate(year, second, first, raw), confidence: resolved, ambiguous: false };
    }
    if (second > 12 || first === second) {
      return { value: toIsoDate(year, first, second, raw), confidence: resolved, ambiguous: false };
    }
    const monthFirstGuess = clampConfidence(AMBIGUOUS_NUMERIC_CONFIDENCE - penalty);
    return { value: toIsoDate(year, first, second, raw), confidence: monthFirstGuess, ambiguous: true };
  }

  const monthFirst = MONTH_NAME_FIRST.exec(raw);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1], raw);
    return { value: toIsoDate(Number(monthFirst[3]), month, Number(monthFirst[2]), raw), confidence: 1, ambiguous: false };
  }

  const dayFirst = DAY_FIRST_NAME.exec(raw);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2], raw);
    return { value: toIsoDate(Number(dayFirst[3]), month, Number(dayFirst[1]), raw), confidence: 1, ambiguous: false };
  }

  throw new ParseError(`unrecognized date "${raw}"`, rawSpan);
}
