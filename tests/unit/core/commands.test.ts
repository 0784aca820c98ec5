import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/config";
import { runProcess, runShow, runStatus } from "../../../src/core/commands";
import type { CommandContext } from "../../../src/core/commands";
import { DocumentFileReader } from "../../../src/ingest";
import { Logger, MetricsRegistry } from "../../../src/observability";
import { InMemoryStore } from "../../../src/store";
import { CAPITAL_CALL_TEXT, UNRECOGNIZABLE_TEXT } from "../../fixtures/documents";

const FILES: Record<string, string> = {
  "/in/call.txt": CAPITAL_CALL_TEXT,
  "/in/junk.txt": UNRECOGNIZABLE_TEXT,
};

function context(overrides: Partial<CommandContext> = {}) {
  const printed: string[] = [];
  const reader = new DocumentFileReader({
    readFile: async (filePath) => {
      const content = FILES[filePath];
      if (content === undefined) {
        throw new Error(`ENOENT: ${filePath}`);
      }
      return Buffer.from(content, "utf8");
    },
  });
  const ctx: CommandContext = {
    runId: "run-test",
    config: DEFAULT_CONFIG,
    logger: Logger.silent("test"),
    metrics: new MetricsRegistry(),
    reader,
    print: (line) => printed.push(line),
    ...overrides,
  };
  return { ctx, printed };
}

describe("runProcess", () => {
  it("processes readable files and reports the rest", async () => {
    const store = new InMemoryStore();
    const { ctx } = context({ store });

    const result = await runProcess(ctx, ["/in/call.txt", "/in/junk.txt", "/in/missing.txt", "/in/notes.docx"], {
      force: false,
      dryRun: false,
    });

    expect(result.unreadable).toEqual(["/in/missing.txt", "/in/notes.docx"]);
    expect(result.summary).toMatchObject({ processed: 2, stored: 1, failed: 1, duplicates: 0, errored: 0 });
    expect(await store.getStats()).toMatchObject({ totalDocuments: 2, stored: 1, failed: 1, runs: 1 });
  });

  it("prints records instead of persisting them on a dry run", async () => {
    const store = new InMemoryStore();
    const { ctx, printed } = context({ store });

    await runProcess(ctx, ["/in/call.txt", "/in/junk.txt"], { force: false, dryRun: true });

    expect(printed).toHaveLength(2);
    expect(JSON.parse(printed[0])).toMatchObject({ sourceName: "call.txt", finalState: "stored", documentType: "capital_call" });
    expect(JSON.parse(printed[1])).toMatchObject({ sourceName: "junk.txt", finalState: "failed" });
    expect((await store.getStats()).totalDocuments).toBe(0);
  });
});

describe("runShow and runStatus", () => {
  it("prints a stored document with its history", async () => {
    const store = new InMemoryStore();
    const { ctx, printed } = context({ store });
    const { summary } = await runProcess(ctx, ["/in/call.txt"], { force: false, dryRun: false });
    const documentId = summary.outcomes[0].documentId;

    expect(await runShow(ctx, documentId)).toBe(true);
    const shown = JSON.parse(printed[0]);
    expect(shown.record.documentId).toBe(documentId);
    expect(shown.events).toHaveLength(6);

    expect(await runShow(ctx, "doc-missing")).toBe(false);
    expect(printed).toHaveLength(1);
  });

  it("prints stats and needs a store", async () => {
    const store = new InMemoryStore();
    const { ctx, printed } = context({ store });
    await runStatus(ctx);
    expect(JSON.parse(printed[0])).toMatchObject({ totalDocuments: 0, runs: 0 });

    const { ctx: storeless } = context();
    await expect(runStatus(storeless)).rejects.toThrow("this command needs a store");
  });
});
