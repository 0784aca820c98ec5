import { DATE_PATTERN_SOURCE } from "../normalize";
import type { FieldResult, LayoutLine } from "../types";
import { findSection, isBullet, splitKeyValue, stripBullet } from "./anchors";
import type { Section } from "./anchors";
import { AnchorExtractor } from "./baseExtractor";
import { emptyField, foundField, parseDate, resolveField } from "./fields";
import type { SpanParser } from "./fields";
import type { ExtractionContext } from "./types";

export const KPI_HEADINGS = [
  "key performance indicators",
  "kpis",
  "key metrics",
  "performance metrics",
  "financial highlights",
  "portfolio metrics",
];
export const HIGHLIGHT_HEADINGS = [
  "highlights",
  "portfolio highlights",
  "quarter highlights",
  "quarterly highlights",
  "key highlights",
  "narrative",
  "commentary",
  "manager commentary",
];
const KNOWN_HEADINGS = [...KPI_HEADINGS, ...HIGHLIGHT_HEADINGS, "outlook", "portfolio activity", "notes", "disclaimer"];
const PERIOD_LABELS = [
  "reporting period",
  "quarter ended",
  "quarter ending",
  "period ended",
  "period ending",
  "for the quarter",
  "period",
  "quarter",
];
const QUARTER_SOURCE = "Q[1-4]\\s?(?:\\d{4}|'\\d{2})";
const SECTION_CONFIDENCE = 0.9;

const parsePeriod: SpanParser = (span) => {
  const quarter = /^Q([1-4])\s?(?:(\d{4})|'(\d{2}))$/i.exec(span.trim());
  if (quarter) {
    const year = quarter[2] ?? `20${quarter[3]}`;
    return { value: { kind: "string", value: `Q${quarter[1]} ${year}` }, confidence: quarter[2] ? 1 : 0.9, flags: [] };
  }
  return parseDate(span);
};

function isMetricLine(text: string): boolean {
  const pair = splitKeyValue(text);
  return pair !== undefined && /\d/.test(pair.value) && pair.key.length <= 60;
}

function sectionEvidence(section: Section): string {
  return `section "${section.heading}" (page ${section.page}, line ${section.lineNumber})`;
}

function joinLines(lines: LayoutLine[]): string {
  return lines.map((line) => line.text).join("\n");
}

export class QuarterlyUpdateExtractor extends AnchorExtractor {
  readonly documentType = "quarterly_update";
  readonly fields = ["kpis", "narrative_highlights", "reporting_period"];

  protected extractFields(context: ExtractionContext): FieldResult[] {
    const sectionOptions = { maxLines: context.config.maxSectionLines, knownHeadings: KNOWN_HEADINGS };
    const kpiSection = findSection(context.lines, KPI_HEADINGS, sectionOptions);
    const highlightSection = findSection(context.lines, HIGHLIGHT_HEADINGS, sectionOptions);

    return [
      this.kpis(context, kpiSection),
      this.highlights(context, highlightSection, kpiSection),
      resolveField(
        "reporting_period",
        [
          ...this.anchored(context, PERIOD_LABELS, `${QUARTER_SOURCE}|${DATE_PATTERN_SOURCE}`),
          ...this.fallback(context, `\\b${QUARTER_SOURCE}\\b`),
        ],
        parsePeriod,
      ),
    ];
  }

  private kpis(context: ExtractionContext, section: Section | undefined): FieldResult {
    if (section) {
      const mapping = toMapping(section.lines);
      if (Object.keys(mapping).length > 0) {
        return foundField("kpis", { kind: "mapping", value: mapping }, SECTION_CONFIDENCE, "section", joinLines(section.lines), sectionEvidence(section));
      }
    }

    const metricLines = context.lines.filter((line) => isMetricLine(line.text));
    const mapping = toMapping(metricLines);
    if (Object.keys(mapping).length > 0) {
      return foundField(
        "kpis",
        { kind: "mapping", value: mapping },
        context.config.patternFallbackConfidence,
        "pattern",
        joinLines(metricLines),
        "metric lines outside a section",
      );
    }
    return emptyField("kpis", "not found");
  }

  private highlights(context: ExtractionContext, section: Section | undefined, kpiSection: Section | undefined): FieldResult {
    if (section && section.lines.length > 0) {
      const segments = section.lines.map((line) => stripBullet(line.text)).filter((segment) => segment.length > 0);
      return foundField(
        "narrative_highlights",
        { kind: "segments", value: segments },
        SECTION_CONFIDENCE,
        "section",
        joinLines(section.lines),
        sectionEvidence(section),
      );
    }

    const excluded = new Set(kpiSection?.lines ?? []);
    const bullets = context.lines.filter((line) => !excluded.has(line) && isBullet(line.text) && !isMetricLine(line.text));
    if (bullets.length > 0) {
      return foundField(
        "narrative_highlights",
        { kind: "segments", value: bullets.map((line) => stripBullet(line.text)) },
        context.config.patternFallbackConfidence,
        "pattern",
        joinLines(bullets),
        "bullet lines outside a section",
      );
    }
    return emptyField("narrative_highlights", "not found");
  }
}

function toMapping(lines: LayoutLine[]): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const line of lines) {
    const pair = splitKeyValue(line.text);
    if (pair && !Object.prototype.hasOwnProperty.call(mapping, pair.key)) {
      mapping[pair.key] = pair.value;
    }
  }
  return mapping;
}
