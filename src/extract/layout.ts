import { ExtractionError } from "../core/errors";
import type { BoundingBox, DocumentLayout, LayoutLine } from "../types";

export function buildLayoutFromText(text: string): DocumentLayout {
  const pages = text.split("\f");
  const lines: LayoutLine[] = [];
  pages.forEach((pageText, pageIndex) => {
    pageText.split(/\r?\n/).forEach((lineText, lineIndex) => {
      lines.push({ page: pageIndex + 1, lineNumber: lineIndex + 1, text: lineText });
    });
  });
  return { pageCount: pages.length, lines };
}

function isReadableBox(bbox: BoundingBox): boolean {
  const values = [bbox.x0, bbox.y0, bbox.x1, bbox.y1];
  return values.every((value) => Number.isFinite(value)) && bbox.x1 >= bbox.x0 && bbox.y1 >= bbox.y0;
}

export function assertReadableLayout(layout: DocumentLayout): void {
  if (!Array.isArray(layout.lines)) {
    throw new ExtractionError("unreadable layout: lines missing");
  }
  for (const line of layout.lines) {
    if (typeof line.text !== "string") {
      throw new ExtractionError("unreadable layout: line without text");
    }
    if (!Number.isInteger(line.page) || line.page < 1) {
      throw new ExtractionError(`unreadable layout: invalid page ${String(line.page)}`);
    }
    if (!Number.isInteger(line.lineNumber) || line.lineNumber < 1) {
      throw new ExtractionError(`unreadable layout: invalid line number ${String(line.lineNumber)} on page ${line.page}`);
    }
    if (line.bbox && !isReadableBox(line.bbox)) {
      throw new ExtractionError(`unreadable layout: invalid bounding box on page ${line.page} line ${line.lineNumber}`);
    }
  }
}

export function readingOrder(text: string, layout: DocumentLayout): LayoutLine[] {
  assertReadableLayout(layout);
  if (layout.lines.length === 0) {
    return buildLayoutFromText(text).lines;
  }
  return [...layout.lines].sort((a, b) => a.page - b.page || a.lineNumber - b.lineNumber || compareX(a, b));
}

function compareX(a: LayoutLine, b: LayoutLine): number {
  return (a.bbox?.x0 ?? 0) - (b.bbox?.x0 ?? 0);
}

export function sameRowToTheRight(lines: LayoutLine[], line: LayoutLine): LayoutLine[] {
  const box = line.bbox;
  if (!box) {
    return [];
  }
  return lines
    .filter((candidate) => {
      const other = candidate.bbox;
      return (
        candidate !== line &&
        other !== undefined &&
        candidate.page === line.page &&
        other.x0 >= box.x1 &&
        other.y0 < box.y1 &&
        other.y1 > box.y0
      );
    })
    .sort(compareX);
}
