import { describe, expect, it, vi } from "vitest";
import { UnsupportedFileError } from "../../../src/core/errors";
import { DocumentFileReader, isDocumentPayload } from "../../../src/ingest";
import type { ReaderDeps } from "../../../src/ingest";

function readerFor(files: Record<string, string>, parserFactory?: ReaderDeps["parserFactory"]) {
  return new DocumentFileReader({
    parserFactory,
    readFile: async (filePath) => Buffer.from(files[filePath] ?? "", "utf8"),
  });
}

describe("DocumentFileReader", () => {
  it("reads plain text into lines", async () => {
    const input = await readerFor({ "/in/a.txt": "Title\nBody" }).read("/in/a.txt");
    expect(input).toEqual({
      text: "Title\nBody",
      layout: {
        pageCount: 1,
        lines: [
          { page: 1, lineNumber: 1, text: "Title" },
          { page: 1, lineNumber: 2, text: "Body" },
        ],
      },
      sourceName: "a.txt",
    });
  });

  it("keeps the upstream layout and id of a JSON payload", async () => {
    const layout = { pageCount: 1, lines: [{ page: 1, lineNumber: 1, text: "Call Amount", bbox: { x0: 1, y0: 2, x1: 3, y1: 4 } }] };
    const input = await readerFor({ "/in/doc.json": JSON.stringify({ id: "up-7", text: "Call Amount", layout }) }).read("/in/doc.json");
    expect(input).toEqual({ id: "up-7", text: "Call Amount", layout, sourceName: "doc.json" });
  });

  it("rejects malformed payloads", async () => {
    const reader = readerFor({ "/in/bad.json": "{", "/in/shape.json": JSON.stringify({ body: "x" }) });
    await expect(reader.read("/in/bad.json")).rejects.toThrow(UnsupportedFileError);
    await expect(reader.read("/in/shape.json")).rejects.toThrow(
      "cannot ingest /in/shape.json: expected { text, layout? } with layout lines of { page, lineNumber, text }",
    );
  });

  it("joins PDF pages with form feeds and always releases the parser", async () => {
    const destroy = vi.fn(async () => undefined);
    const reader = readerFor({ "/in/scan.pdf": "%PDF" }, () => ({
      getText: async () => ({ text: "ignored", total: 3, pages: [{ num: 1, text: "Page one" }, { num: 2, text: "Page two" }] }),
      destroy,
    }));

    const input = await reader.read("/in/scan.pdf");

    expect(input.text).toBe("Page one\fPage two");
    expect(input.layout?.pageCount).toBe(3);
    expect(input.layout?.lines.map((line) => [line.page, line.text])).toEqual([
      [1, "Page one"],
      [2, "Page two"],
    ]);
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("releases the parser when text extraction fails", async () => {
    const destroy = vi.fn(async () => undefined);
    const reader = readerFor({ "/in/scan.pdf": "%PDF" }, () => ({
      getText: async () => {
        throw new Error("bad xref");
      },
      destroy,
    }));

    await expect(reader.read("/in/scan.pdf")).rejects.toThrow("bad xref");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("refuses unknown extensions", async () => {
    await expect(readerFor({}).read("/in/notes.docx")).rejects.toThrow(
      'cannot ingest /in/notes.docx: extension ".docx" is not one of .txt, .text, .json, .pdf',
    );
  });
});

describe("isDocumentPayload", () => {
  it("checks layout line shapes", () => {
    expect(isDocumentPayload({ text: "x" })).toBe(true);
    expect(isDocumentPayload({ text: "x", layout: { pageCount: 1, lines: [{ page: "1", lineNumber: 1, text: "x" }] } })).toBe(false);
    expect(isDocumentPayload({ text: "x", id: 7 })).toBe(false);
  });
});
