import { describe, expect, it } from "vitest";
import { ExtractionError } from "../../../src/core/errors";
import { assertReadableLayout, buildLayoutFromText, readingOrder, sameRowToTheRight } from "../../../src/extract";
import type { LayoutLine } from "../../../src/types";

describe("buildLayoutFromText", () => {
  it("numbers lines per page and splits pages on form feeds", () => {
    expect(buildLayoutFromText("a\r\nb\fc")).toEqual({
      pageCount: 2,
      lines: [
        { page: 1, lineNumber: 1, text: "a" },
        { page: 1, lineNumber: 2, text: "b" },
        { page: 2, lineNumber: 1, text: "c" },
      ],
    });
  });
});

describe("assertReadableLayout", () => {
  it("rejects impossible page and line numbers", () => {
    expect(() => assertReadableLayout({ pageCount: 1, lines: [{ page: 0, lineNumber: 1, text: "x" }] })).toThrow(
      new ExtractionError("unreadable layout: invalid page 0"),
    );
    expect(() => assertReadableLayout({ pageCount: 1, lines: [{ page: 1, lineNumber: 1.5, text: "x" }] })).toThrow(
      "unreadable layout: invalid line number 1.5 on page 1",
    );
  });

  it("rejects inverted bounding boxes", () => {
    const line: LayoutLine = { page: 1, lineNumber: 1, text: "x", bbox: { x0: 50, y0: 0, x1: 10, y1: 10 } };
    expect(() => assertReadableLayout({ pageCount: 1, lines: [line] })).toThrow(ExtractionError);
  });
});

describe("readingOrder", () => {
  it("sorts by page, line and horizontal position", () => {
    const lines: LayoutLine[] = [
      { page: 2, lineNumber: 1, text: "page two" },
      { page: 1, lineNumber: 3, text: "right", bbox: { x0: 200, y0: 0, x1: 260, y1: 10 } },
      { page: 1, lineNumber: 3, text: "left", bbox: { x0: 10, y0: 0, x1: 80, y1: 10 } },
      { page: 1, lineNumber: 1, text: "first" },
    ];
    expect(readingOrder("", { pageCount: 2, lines }).map((line) => line.text)).toEqual(["first", "left", "right", "page two"]);
  });

  it("derives lines from the text when the layout has none", () => {
    expect(readingOrder("one\ntwo", { pageCount: 1, lines: [] }).map((line) => line.text)).toEqual(["one", "two"]);
  });
});

describe("sameRowToTheRight", () => {
  it("returns overlapping cells to the right on the same page", () => {
    const label: LayoutLine = { page: 1, lineNumber: 1, text: "Amount", bbox: { x0: 10, y0: 100, x1: 80, y1: 112 } };
    const value: LayoutLine = { page: 1, lineNumber: 1, text: "$5", bbox: { x0: 200, y0: 101, x1: 240, y1: 113 } };
    const below: LayoutLine = { page: 1, lineNumber: 2, text: "$9", bbox: { x0: 200, y0: 120, x1: 240, y1: 132 } };
    const otherPage: LayoutLine = { page: 2, lineNumber: 1, text: "$7", bbox: { x0: 200, y0: 100, x1: 240, y1: 112 } };
    expect(sameRowToTheRight([label, value, below, otherPage], label)).toEqual([value]);
    expect(sameRowToTheRight([label, value], { page: 1, lineNumber: 3, text: "no box" })).toEqual([]);
  });
});
