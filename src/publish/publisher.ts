import fs from "node:fs";
import path from "node:path";
import { ARTIFACT_EXTENSION, artifactFileName, readRecordedHash, renderArtifact } from "../artifact/artifactFile";
import { Logger, MetricsRegistry } from "../observability";
import { Artifact, ManifestEntry, PublishOutcome } from "../types/models";
import { errorMessage, isNotFound } from "../types/errors";
import { writeFileAtomic } from "./atomicWrite";
import { MANIFEST_FILE, ManifestAccumulator, parseManifest, serializeManifest } from "./manifest";

export interface FinalizeOptions {
  prune?: boolean;
}

export interface FinalizeSummary {
  entries: number;
  manifestPath: string;
  pruned: string[];
  carried: number;
}

export class ArtifactPublisher {
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(outputDir: string, logger: Logger, metrics?: MetricsRegistry) {
    this.outputDir = path.resolve(outputDir);
    this.logger = logger;
    this.metrics = metrics;
  }

  get manifestPath(): string {
    return path.join(this.outputDir, MANIFEST_FILE);
  }

  artifactPath(slug: string): string {
    return path.join(this.outputDir, artifactFileName(slug));
  }

  async publish(artifact: Artifact): Promise<PublishOutcome> {
    const targetPath = this.artifactPath(artifact.slug);
    const sourcePath = artifact.frontMatter.source.path;
    const stopTimer = this.metrics?.startTimer("publish_ms");

    try {
      const existing = await this.readExisting(targetPath);
      if (existing !== undefined && readRecordedHash(existing) === artifact.contentHash) {
        this.logger.debug("artifact_unchanged", { slug: artifact.slug, path: sourcePath });
        return { status: "skipped", entry: this.toEntry(artifact, Buffer.byteLength(existing, "utf-8")) };
      }

      const content = renderArtifact(artifact);
      await writeFileAtomic(targetPath, content);
      this.logger.info("artifact_written", { slug: artifact.slug, path: sourcePath, replaced: existing !== undefined });
      return { status: "written", entry: this.toEntry(artifact, Buffer.byteLength(content, "utf-8")) };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error("artifact_publish_failed", { slug: artifact.slug, path: sourcePath, error: message });
      return { status: "errored", slug: artifact.slug, path: sourcePath, message };
    } finally {
      stopTimer?.();
    }
  }

  async finalize(manifest: ManifestAccumulator, options: FinalizeOptions = {}): Promise<FinalizeSummary> {
    const carried = manifest.carryForward(await this.readPreviousEntries());
    const entries = manifest.sorted();
    await writeFileAtomic(this.manifestPath, serializeManifest(entries));

    let pruned: string[] = [];
    if (options.prune) {
      const keep = new Set(entries.map((entry) => entry.file));
      for (const slug of manifest.retained()) {
        keep.add(artifactFileName(slug));
      }
      pruned = await this.pruneStale(keep);
    }
    this.logger.info("manifest_finalized", { entries: entries.length, carried: carried.length, pruned: pruned.length });
    return { entries: entries.length, manifestPath: this.manifestPath, pruned, carried: carried.length };
  }

  private async readPreviousEntries(): Promise<ManifestEntry[]> {
    const previous = await this.readExisting(this.manifestPath);
    return previous === undefined ? [] : parseManifest(previous).entries;
  }

  private async readExisting(targetPath: string): Promise<string | undefined> {
    try {
      return await fs.promises.readFile(targetPath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async pruneStale(keep: Set<string>): Promise<string[]> {
    const names = await fs.promises.readdir(this.outputDir);
    const stale = names.filter((name) => name.endsWith(ARTIFACT_EXTENSION) && !keep.has(name)).sort();
    for (const name of stale) {
      await fs.promises.rm(path.join(this.outputDir, name), { force: true });
      this.logger.info("artifact_pruned", { file: name });
    }
    return stale;
  }

  private toEntry(artifact: Artifact, size: number): ManifestEntry {
    return {
      slug: artifact.slug,
      origin: artifact.frontMatter.source.repo,
      ref: artifact.frontMatter.source.ref,
      path: artifact.frontMatter.source.path,
      file: artifactFileName(artifact.slug),
      contentHash: artifact.contentHash,
      topics: artifact.frontMatter.topics,
      size,
      title: artifact.frontMatter.title,
    };
  }
}
