import { describe, expect, it, vi } from "vitest";
import { getHelpText, parseCliArgs, runCli } from "../../../src/cli";
import { emptyStats } from "../../../src/store";

describe("parseCliArgs", () => {
  it("asks for help on missing or malformed commands", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["status", "--help"])).toBe("help");
    expect(parseCliArgs(["reprocess"])).toBe("help");
    expect(parseCliArgs(["process"])).toBe("help");
    expect(parseCliArgs(["show"])).toBe("help");
    expect(parseCliArgs(["show", "doc-1", "doc-2"])).toBe("help");
  });

  it("separates flags and their values from positional arguments", () => {
    expect(
      parseCliArgs(["process", "a.txt", "--config", "cfg.json", "--dry-run", "b.pdf", "--concurrency", "2", "--force"]),
    ).toEqual({
      command: "process",
      args: ["a.txt", "b.pdf"],
      dryRun: true,
      force: true,
      ignoreHttpsErrors: false,
      concurrency: 2,
      configPath: "cfg.json",
    });
  });

  it("drops a non-positive concurrency", () => {
    const parsed = parseCliArgs(["status", "--concurrency", "0"]);
    expect(parsed).not.toBe("help");
    expect(parsed === "help" ? undefined : parsed.concurrency).toBeUndefined();
  });
});

describe("runCli", () => {
  it("prints help and succeeds", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(await runCli(["--help"], {})).toBe(0);
    expect(log).toHaveBeenCalledWith(getHelpText());
  });

  it("prints store statistics", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(await runCli(["status"], { STORE_TYPE: "memory", LOG_LEVEL: "error" })).toBe(0);
    expect(log.mock.calls).toEqual([[JSON.stringify(emptyStats(), null, 2)]]);
  });

  it("exits non-zero for an unknown document", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(await runCli(["show", "doc-missing"], { STORE_TYPE: "memory", LOG_LEVEL: "error" })).toBe(1);
  });
});
