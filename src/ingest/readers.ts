import fs from "node:fs";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { UnsupportedFileError } from "../core/errors";
import { buildLayoutFromText } from "../extract/layout";
import type { DocumentInput } from "../pipeline/document";
import { isDocumentPayload } from "./payload";

interface ParserLike {
  getText(): Promise<{
    text: string;
    total: number;
    pages?: Array<{ num: number; text: string }>;
  }>;
  destroy(): Promise<void>;
}

export interface ReaderDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export const SUPPORTED_EXTENSIONS = [".txt", ".text", ".json", ".pdf"];

export class DocumentFileReader {
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: ReaderDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async read(filePath: string): Promise<DocumentInput> {
    const extension = path.extname(filePath).toLowerCase();
    const sourceName = path.basename(filePath);

    switch (extension) {
      case ".txt":
      case ".text": {
        const text = (await this.readFile(filePath)).toString("utf8");
        return { text, layout: buildLayoutFromText(text), sourceName };
      }
      case ".json":
        return this.readPayload(filePath, sourceName);
      case ".pdf":
        return this.readPdf(filePath, sourceName);
      default:
        throw new UnsupportedFileError(filePath, `extension "${extension || "(none)"}" is not one of ${SUPPORTED_EXTENSIONS.join(", ")}`);
    }
  }

  private async readPayload(filePath: string, sourceName: string): Promise<DocumentInput> {
    const raw = (await this.readFile(filePath)).toString("utf8");
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UnsupportedFileError(filePath, `invalid JSON (${message})`);
    }
    if (!isDocumentPayload(payload)) {
      throw new UnsupportedFileError(filePath, "expected { text, layout? } with layout lines of { page, lineNumber, text }");
    }
    return {
      id: payload.id,
      text: payload.text,
      layout: payload.layout ?? buildLayoutFromText(payload.text),
      sourceName,
    };
  }

  private async readPdf(filePath: string, sourceName: string): Promise<DocumentInput> {
    const parser = this.parserFactory(await this.readFile(filePath));
    let parsed: Awaited<ReturnType<ParserLike["getText"]>>;
    try {
      parsed = await parser.getText();
    } finally {
      await parser.destroy();
    }

    const text = parsed.pages && parsed.pages.length > 0 ? parsed.pages.map((page) => page.text).join("\f") : parsed.text;
    const layout = buildLayoutFromText(text);
    return { text, layout: { pageCount: Math.max(layout.pageCount, parsed.total), lines: layout.lines }, sourceName };
  }
}
