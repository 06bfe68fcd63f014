import { AppConfig } from "../config";
import { loadSourceTree } from "../loader";
import { Logger, MetricsRegistry } from "../observability";
import { QueryService, StoreStats } from "../query";
import { serveStdio } from "../server";
import { RunReport, SourceOrigin } from "../types/models";
import { runBuild, sortFailures } from "./coordinator";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface BuildOptions {
  sourceDir: string;
  origin: SourceOrigin;
  topics: string[];
  signal?: AbortSignal;
}

export async function runBuildCommand(ctx: CommandContext, options: BuildOptions): Promise<RunReport> {
  ctx.logger.info("build_start", {
    sourceDir: options.sourceDir,
    origin: options.origin.repo,
    ref: options.origin.ref,
    outputDir: ctx.config.outputDir,
  });

  const tree = await loadSourceTree({
    root: options.sourceDir,
    origin: options.origin,
    declaredTopics: options.topics,
    includeExtensions: ctx.config.includeExtensions,
    excludeDirs: ctx.config.excludeDirs,
    logger: ctx.logger.child("loader"),
  });
  for (const failure of tree.failures) {
    ctx.metrics.incrementCounter("docs_failed", 1);
    ctx.logger.error("source_unreadable", { path: failure.path, error: failure.message });
  }

  const { report } = await runBuild(tree.documents, {
    config: ctx.config,
    logger: ctx.logger.child("coordinator"),
    metrics: ctx.metrics,
    signal: options.signal,
    retain: tree.unreadableDirs.map((prefix) => ({ origin: options.origin.repo, prefix })),
  });

  const merged: RunReport = { ...report, errors: sortFailures([...tree.failures, ...report.errors]) };
  ctx.logger.info("build_complete", {
    processed: merged.processed,
    written: merged.written,
    skipped: merged.skipped,
    warnings: merged.warnings,
    errors: merged.errors.length,
    aborted: merged.aborted,
  });
  return merged;
}

export function createQueryService(ctx: CommandContext): QueryService {
  return new QueryService({
    outputDir: ctx.config.outputDir,
    search: ctx.config.search,
    timeoutMs: ctx.config.queryTimeoutMs,
    logger: ctx.logger.child("query"),
  });
}

export async function runServeCommand(ctx: CommandContext): Promise<void> {
  ctx.logger.info("serve_start", { outputDir: ctx.config.outputDir });
  await serveStdio(createQueryService(ctx), ctx.logger.child("mcp"));
}

export async function runStatsCommand(ctx: CommandContext, detailed: boolean): Promise<StoreStats | undefined> {
  const result = await createQueryService(ctx).stats({ detailed });
  if (result.status !== "ok") {
    ctx.logger.error("stats_unavailable", { status: result.status, error: result.message });
    return undefined;
  }
  ctx.logger.info("stats_complete", { documents: result.value.documents, sources: result.value.sources });
  return result.value;
}
