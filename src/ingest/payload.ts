import type { BoundingBox, DocumentLayout, LayoutLine, LayoutWord } from "../types";

export interface DocumentPayload {
  id?: string;
  text: string;
  layout?: DocumentLayout;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBoundingBox(value: unknown): value is BoundingBox {
  return (
    isRecord(value) &&
    typeof value.x0 === "number" &&
    typeof value.y0 === "number" &&
    typeof value.x1 === "number" &&
    typeof value.y1 === "number"
  );
}

function isLayoutWord(value: unknown): value is LayoutWord {
  return isRecord(value) && typeof value.text === "string" && isBoundingBox(value.bbox);
}

function isLayoutLine(value: unknown): value is LayoutLine {
  return (
    isRecord(value) &&
    typeof value.page === "number" &&
    typeof value.lineNumber === "number" &&
    typeof value.text === "string" &&
    (value.bbox === undefined || isBoundingBox(value.bbox)) &&
    (value.words === undefined || (Array.isArray(value.words) && value.words.every(isLayoutWord)))
  );
}

export function isDocumentLayout(value: unknown): value is DocumentLayout {
  return (
    isRecord(value) &&
    typeof value.pageCount === "number" &&
    Array.isArray(value.lines) &&
    value.lines.every(isLayoutLine)
  );
}

export function isDocumentPayload(value: unknown): value is DocumentPayload {
  return (
    isRecord(value) &&
    typeof value.text === "string" &&
    (value.id === undefined || typeof value.id === "string") &&
    (value.layout === undefined || isDocumentLayout(value.layout))
  );
}
