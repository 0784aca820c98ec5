import { loadConfig } from "../config";
import { runProcess, runShow, runStatus } from "../core/commands";
import type { CommandContext } from "../core/commands";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "process" | "status" | "show";

export interface ParsedCliArgs {
  command: CommandName;
  args: string[];
  dryRun: boolean;
  force: boolean;
  ignoreHttpsErrors: boolean;
  concurrency?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  altdoc <command> [options]

Commands:
  process <file...>   Classify, extract and validate .txt, .json or .pdf files
  status              Print store statistics
  show <documentId>   Print a stored document and its status history

Options:
  --config <path>        Optional path to JSON config file
  --force                Reprocess documents whose content is already stored
  --dry-run              Process without the store or sink; print records to stdout
  --concurrency <n>      Override worker concurrency
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

const VALUE_FLAGS = new Set(["--config", "--concurrency"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "process" || raw === "status" || raw === "show") {
    return raw;
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  const concurrencyIndex = argv.indexOf("--concurrency");
  const concurrencyRaw = concurrencyIndex >= 0 ? argv[concurrencyIndex + 1] : undefined;
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;

  const args: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];
    if (VALUE_FLAGS.has(token)) {
      index += 1;
      continue;
    }
    if (token.startsWith("--")) {
      continue;
    }
    args.push(token);
  }

  if ((command === "process" && args.length === 0) || (command === "show" && args.length !== 1)) {
    return "help";
  }

  return {
    command,
    args,
    dryRun: argv.includes("--dry-run"),
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    concurrency: concurrencyParsed !== undefined && Number.isFinite(concurrencyParsed) && concurrencyParsed > 0 ? concurrencyParsed : undefined,
    configPath,
  };
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(getHelpText());
    return 0;
  }

  let config = loadConfig(parsed.configPath, env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.concurrency !== undefined) {
    config = {
      ...config,
      workerConcurrency: parsed.concurrency,
    };
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(env.LOG_LEVEL) });
  const offline = parsed.command === "process" && parsed.dryRun;
  const store = offline ? undefined : createStore(config, env);
  const sink = parsed.command === "process" && !offline ? createSink(config, runId, env, logger.child("sink")) : undefined;
  const context: CommandContext = { runId, config, store, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    force: parsed.force,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    workerConcurrency: config.workerConcurrency,
  });

  try {
    switch (parsed.command) {
      case "process": {
        const result = await runProcess({ ...context, logger: logger.child("process") }, parsed.args, {
          force: parsed.force,
          dryRun: parsed.dryRun,
        });
        logger.info("command_complete", { command: parsed.command });
        return result.unreadable.length > 0 || result.summary.errored > 0 ? 1 : 0;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        logger.info("command_complete", { command: parsed.command });
        return 0;
      case "show": {
        const found = await runShow({ ...context, logger: logger.child("show") }, parsed.args[0]);
        logger.info("command_complete", { command: parsed.command });
        return found ? 0 : 1;
      }
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }
  } finally {
    await sink?.close?.();
    await store?.close();
    if (parsed.command === "process") {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
