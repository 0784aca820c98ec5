import { escapeRegExp } from "../normalize";
import type { FieldSource, LayoutLine } from "../types";
import { sameRowToTheRight } from "./layout";

export interface FieldCandidate {
  span: string;
  proximity: number;
  source: FieldSource;
  evidence: string;
}

export interface AnchorOptions {
  maxLineDistance: number;
  decayPerLine: number;
  skip?: (token: string) => boolean;
}

interface RankedCandidate extends FieldCandidate {
  distance: number;
  labelRank: number;
  lineIndex: number;
}

function labelPattern(label: string): RegExp {
  const words = label.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(`(?<![A-Za-z0-9])${words}(?![A-Za-z0-9])`, "i");
}

function firstValue(text: string, valuePattern: string, skip?: (token: string) => boolean): string | undefined {
  const pattern = new RegExp(valuePattern, "g");
  for (const match of text.matchAll(pattern)) {
    const span = (match[1] ?? match[0]).trim();
    if (span.length === 0 || skip?.(span)) {
      continue;
    }
    return span;
  }
  return undefined;
}

export function anchorConfidence(distance: number, decayPerLine: number): number {
  return Math.max(0, 1 - decayPerLine * distance);
}

/**
 * Looks for each label and takes the first value after it: on the same line, in a cell to its
 * right on the same row, or on the first non-blank line below within `maxLineDistance`.
 * Earlier labels rank higher; closer values rank higher still.
 */
export function findAnchoredValues(
  lines: LayoutLine[],
  labels: readonly string[],
  valuePattern: string,
  options: AnchorOptions,
): FieldCandidate[] {
  const patterns = labels.map((label) => ({ label, pattern: labelPattern(label) }));
  const ranked: RankedCandidate[] = [];

  lines.forEach((line, lineIndex) => {
    const labelRank = patterns.findIndex(({ pattern }) => pattern.test(line.text));
    if (labelRank < 0) {
      return;
    }
    const { label, pattern } = patterns[labelRank];
    const match = pattern.exec(line.text);
    if (!match) {
      return;
    }

    const push = (span: string, distance: number, where: string) => {
      ranked.push({
        span,
        proximity: anchorConfidence(distance, options.decayPerLine),
        source: "anchor",
        evidence: `label "${label}" ${where} (page ${line.page}, line ${line.lineNumber})`,
        distance,
        labelRank,
        lineIndex,
      });
    };

    const rest = line.text.slice(match.index + match[0].length);
    const inline = firstValue(rest, valuePattern, options.skip);
    if (inline !== undefined) {
      push(inline, 0, "same line");
      return;
    }

    for (const cell of sameRowToTheRight(lines, line)) {
      const value = firstValue(cell.text, valuePattern, options.skip);
      if (value !== undefined) {
        push(value, 0, "same row");
        return;
      }
    }

    for (let distance = 1; distance <= options.maxLineDistance; distance += 1) {
      const below = lines[lineIndex + distance];
      if (!below || below.page !== line.page) {
        return;
      }
      if (below.text.trim().length === 0) {
        continue;
      }
      const value = firstValue(below.text, valuePattern, options.skip);
      if (value !== undefined) {
        push(value, distance, `${distance} line(s) above value`);
      }
      return;
    }
  });

  return ranked
    .filter((candidate) => candidate.proximity > 0)
    .sort((a, b) => a.distance - b.distance || a.labelRank - b.labelRank || a.lineIndex - b.lineIndex)
    .map(({ span, proximity, source, evidence }) => ({ span, proximity, source, evidence }));
}

export interface PatternOptions {
  accept?: (span: string) => boolean;
  ignoreCase?: boolean;
}

export function findPatternValues(
  lines: LayoutLine[],
  valuePattern: string,
  confidence: number,
  options: PatternOptions = {},
): FieldCandidate[] {
  const candidates: FieldCandidate[] = [];
  const flags = options.ignoreCase ? "gi" : "g";
  for (const line of lines) {
    for (const match of line.text.matchAll(new RegExp(valuePattern, flags))) {
      const span = (match[1] ?? match[0]).trim();
      if (span.length === 0 || (options.accept && !options.accept(span))) {
        continue;
      }
      candidates.push({
        span,
        proximity: confidence,
        source: "pattern",
        evidence: `pattern match (page ${line.page}, line ${line.lineNumber})`,
      });
    }
  }
  return candidates;
}

export interface Section {
  heading: string;
  page: number;
  lineNumber: number;
  lines: LayoutLine[];
}

export interface SectionOptions {
  maxLines: number;
  knownHeadings: readonly string[];
}

function headingKey(text: string): string {
  return text
    .trim()
    .replace(/[:\s]+$/, "")
    .replace(/\s+/g, " ")
    .toLowerCase();
}

export function isHeading(text: string, headings: readonly string[]): boolean {
  const key = headingKey(text);
  return key.length > 0 && headings.some((heading) => heading.toLowerCase() === key);
}

/**
 * Finds the first line equal to one of `headings` (case-insensitive, trailing colon allowed) and
 * reads the lines after it until a blank line, another known heading, a page change or `maxLines`.
 * Blank lines directly after the heading are skipped.
 */
export function findSection(lines: LayoutLine[], headings: readonly string[], options: SectionOptions): Section | undefined {
  const start = lines.findIndex((line) => isHeading(line.text, headings));
  if (start < 0) {
    return undefined;
  }
  const headingLine = lines[start];
  const body: LayoutLine[] = [];

  for (let index = start + 1; index < lines.length && body.length < options.maxLines; index += 1) {
    const line = lines[index];
    if (line.page !== headingLine.page || isHeading(line.text, options.knownHeadings)) {
      break;
    }
    if (line.text.trim().length === 0) {
      if (body.length === 0) {
        continue;
      }
      break;
    }
    body.push(line);
  }

  return { heading: headingKey(headingLine.text), page: headingLine.page, lineNumber: headingLine.lineNumber, lines: body };
}

const BULLET = /^\s*(?:[-*•·▪–]|\d{1,2}[.)])\s+/;

export function isBullet(text: string): boolean {
  return BULLET.test(text);
}

export function stripBullet(text: string): string {
  return text.replace(BULLET, "").trim();
}

export function splitKeyValue(text: string): { key: string; value: string } | undefined {
  const line = stripBullet(text);
  const match = /^(.+?)(?:\s*:\s*|\s+[-–]\s+|\t+|\s{2,})(\S.*)$/.exec(line);
  if (!match) {
    return undefined;
  }
  const key = match[1].trim();
  const value = match[2].trim();
  if (key.length === 0 || value.length === 0) {
    return undefined;
  }
  return { key, value };
}
