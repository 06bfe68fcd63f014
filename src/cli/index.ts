import { loadConfig, mergeConfig, validateConfig } from "../config";
import { AppConfig, ConfigOverrides } from "../config/types";
import { CommandContext, runBuildCommand, runServeCommand, runStatsCommand } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { ConfigurationError } from "../types/errors";
import { Profile } from "../types/models";

export type CommandName = "build" | "serve" | "stats";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  sourceDir?: string;
  repo?: string;
  ref: string;
  topics: string[];
  profile?: Profile;
  outputDir?: string;
  concurrency?: number;
  detailed: boolean;
  prune: boolean;
}

const HELP_TEXT = `
Usage:
  docforge <command> [options]

Commands:
  build --src <dir> --repo <id>   Normalize a source tree and publish artifacts
  serve                           Serve the published store over MCP (stdio)
  stats                           Print document and byte totals as JSON

Options:
  --config <path>       Optional path to JSON config file
  --src <dir>           Source directory to load (build)
  --repo <id>           Origin identity, e.g. owner/name or a URL (build)
  --ref <ref>           Branch, tag or commit of the origin (default: main)
  --topics <a,b>        Topics declared for every document (build)
  --profile <name>      lossless | balanced | compact
  --out <dir>           Output directory for artifacts and index.jsonl
  --concurrency <n>     Documents processed at once (build)
  --prune               Delete artifacts not listed in the new manifest (build)
  --detailed            Include the per-origin breakdown (stats)
  -h, --help            Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "build" || raw === "serve" || raw === "stats") {
    return raw;
  }
  return undefined;
}

function parseProfile(raw: string | undefined): Profile | undefined {
  if (raw === "lossless" || raw === "balanced" || raw === "compact") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const concurrencyRaw = readOption(argv, "--concurrency");
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;
  const topics = (readOption(argv, "--topics") ?? "")
    .split(",")
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);

  return {
    command,
    configPath: readOption(argv, "--config"),
    sourceDir: readOption(argv, "--src"),
    repo: readOption(argv, "--repo"),
    ref: readOption(argv, "--ref") ?? "main",
    topics,
    profile: parseProfile(readOption(argv, "--profile")),
    outputDir: readOption(argv, "--out"),
    concurrency: Number.isFinite(concurrencyParsed) ? concurrencyParsed : undefined,
    detailed: argv.includes("--detailed"),
    prune: argv.includes("--prune"),
  };
}

export function resolveConfig(parsed: ParsedCliArgs, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const overrides: ConfigOverrides = {};
  if (parsed.outputDir !== undefined) {
    overrides.outputDir = parsed.outputDir;
  }
  if (parsed.profile !== undefined) {
    overrides.profile = parsed.profile;
  }
  if (parsed.concurrency !== undefined) {
    overrides.concurrency = parsed.concurrency;
  }
  if (parsed.prune) {
    overrides.pruneStale = true;
  }
  return validateConfig(mergeConfig(loadConfig(parsed.configPath, env), overrides));
}

async function runBuildWithSignals(ctx: CommandContext, parsed: ParsedCliArgs): Promise<number> {
  if (!parsed.sourceDir || !parsed.repo) {
    console.error("build requires --src <dir> and --repo <id>");
    return 2;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    ctx.logger.warn("interrupt_received", { signal: "SIGINT" });
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const report = await runBuildCommand(ctx, {
      sourceDir: parsed.sourceDir,
      origin: { repo: parsed.repo, ref: parsed.ref },
      topics: parsed.topics,
      signal: controller.signal,
    });
    console.log(JSON.stringify(report, null, 2));
    return report.errors.length > 0 || report.aborted ? 1 : 0;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    ctx.metrics.printSummary();
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config: AppConfig;
  try {
    config = resolveConfig(parsed);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`configuration error: ${error.message}`);
      return 2;
    }
    throw error;
  }

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  // stdout carries command output, and the MCP protocol under `serve`.
  const logger = new Logger({ component: "cli", runId, level: config.logLevel, stream: "stderr" });
  const context: CommandContext = { runId, config, logger, metrics };

  logger.info("command_start", { command: parsed.command, profile: config.profile, outputDir: config.outputDir });

  try {
    switch (parsed.command) {
      case "build":
        return await runBuildWithSignals({ ...context, logger: logger.child("build") }, parsed);
      case "serve":
        await runServeCommand({ ...context, logger: logger.child("serve") });
        return 0;
      case "stats": {
        const stats = await runStatsCommand({ ...context, logger: logger.child("stats") }, parsed.detailed);
        if (!stats) {
          return 1;
        }
        console.log(JSON.stringify(stats, null, 2));
        return 0;
      }
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("configuration_error", { error: error.message });
      return 2;
    }
    throw error;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
