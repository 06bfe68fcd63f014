import fs from "node:fs";
import path from "node:path";
import { buildArtifact, slug } from "../artifact";
import { AppConfig } from "../config";
import { normalizeDocument, NormalizeSettings } from "../normalize";
import { Logger, MetricsRegistry } from "../observability";
import { ArtifactPublisher, FinalizeSummary, ManifestAccumulator } from "../publish";
import {
  ConfigurationError,
  DocumentError,
  DocumentFailure,
  errorMessage,
  RetainedPrefix,
  RunReport,
  SourceDocument,
  SourceInput,
  SourceLocation,
} from "../types";
import { processWithConcurrency } from "./concurrency";

export interface RunDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  now?: () => Date;
  publisher?: ArtifactPublisher;
  /** Subtrees the loader could not read; their published artifacts survive pruning. */
  retain?: readonly RetainedPrefix[];
}

export interface RunResult {
  report: RunReport;
  finalized?: FinalizeSummary;
}

export function normalizeSettingsFor(config: AppConfig): NormalizeSettings {
  return {
    profile: config.profile,
    recognizedWrappers: config.recognizedWrappers,
    boilerplateDenylist: config.boilerplateDenylist,
    sizeControl: config.profile === "lossless" ? undefined : config.sizeControl[config.profile],
  };
}

export async function ensureOutputRoot(outputDir: string): Promise<string> {
  const resolved = path.resolve(outputDir);
  try {
    await fs.promises.mkdir(resolved, { recursive: true });
    await fs.promises.access(resolved, fs.constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(`Output directory is not writable: ${resolved}`, { cause: error });
  }
  return resolved;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Dispatch order: origin repo, ref, then path, by code unit. */
export function compareSources(a: SourceLocation, b: SourceLocation): number {
  return compareText(a.origin.repo, b.origin.repo) || compareText(a.origin.ref, b.origin.ref) || compareText(a.path, b.path);
}

async function materialize(input: SourceInput): Promise<SourceDocument> {
  if ("rawText" in input) {
    return input;
  }
  return { origin: input.origin, path: input.path, declaredTopics: input.declaredTopics, rawText: await input.read() };
}

export async function runBuild(inputs: readonly SourceInput[], deps: RunDeps): Promise<RunResult> {
  const { config, logger, metrics } = deps;
  const outputDir = await ensureOutputRoot(config.outputDir);
  const publisher = deps.publisher ?? new ArtifactPublisher(outputDir, logger.child("publisher"), metrics);
  const settings = normalizeSettingsFor(config);
  const fetchedAt = (deps.now ?? (() => new Date()))().toISOString();

  const documents = [...inputs].sort(compareSources);
  const manifest = new ManifestAccumulator();
  for (const retained of deps.retain ?? []) {
    manifest.retainPrefix(retained);
  }
  const claimedSlugs = new Map<string, string>();
  const errors: DocumentFailure[] = [];
  let processed = 0;
  let written = 0;
  let skipped = 0;
  let warnings = 0;

  logger.info("run_start", { documents: documents.length, profile: config.profile, concurrency: config.concurrency });

  const recordError = (failure: DocumentFailure): void => {
    errors.push(failure);
    metrics.incrementCounter("docs_failed", 1);
  };

  const dispatch = await processWithConcurrency(
    documents,
    config.concurrency,
    async (input) => {
      let artifactSlug: string | undefined;
      try {
        artifactSlug = slug(input.origin, input.path);
        const claimedBy = claimedSlugs.get(artifactSlug);
        if (claimedBy !== undefined) {
          throw new DocumentError(input.path, `slug ${artifactSlug} already produced by ${claimedBy} in this run`);
        }
        claimedSlugs.set(artifactSlug, `${input.origin.repo}:${input.path}`);

        const source = await materialize(input);

        const stopNormalize = metrics.startTimer("normalize_ms");
        const normalized = normalizeDocument(source, settings);
        stopNormalize();
        for (const warning of normalized.warnings) {
          logger.warn("transform_warning", { path: source.path, pass: warning.pass, warning: warning.message });
        }
        warnings += normalized.warnings.length;
        metrics.incrementCounter("transform_warnings", normalized.warnings.length);

        const outcome = await publisher.publish(buildArtifact(source, normalized, fetchedAt));
        if (outcome.status === "errored") {
          manifest.retain(artifactSlug);
          recordError({ path: source.path, message: outcome.message });
        } else {
          manifest.add(outcome.entry);
          if (outcome.status === "written") {
            written += 1;
            metrics.incrementCounter("artifacts_written", 1);
          } else {
            skipped += 1;
            metrics.incrementCounter("artifacts_skipped", 1);
          }
        }
      } catch (error) {
        if (artifactSlug !== undefined) {
          manifest.retain(artifactSlug);
        }
        logger.error("document_failed", { path: input.path, origin: input.origin.repo, error: errorMessage(error) });
        recordError({ path: input.path, message: errorMessage(error) });
      } finally {
        processed += 1;
        metrics.incrementCounter("docs_processed", 1);
      }
    },
    deps.signal,
  );

  const report: RunReport = {
    processed,
    written,
    skipped,
    warnings,
    aborted: dispatch.aborted,
    errors: sortFailures(errors),
  };

  if (dispatch.aborted) {
    logger.warn("run_aborted", { dispatched: dispatch.dispatched, remaining: documents.length - dispatch.dispatched });
    return { report };
  }

  const finalized = await publisher.finalize(manifest, { prune: config.pruneStale });
  logger.info("run_complete", { ...report, errors: report.errors.length });
  return { report, finalized };
}

export function sortFailures(failures: readonly DocumentFailure[]): DocumentFailure[] {
  return [...failures].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : a.message < b.message ? -1 : a.message > b.message ? 1 : 0,
  );
}
