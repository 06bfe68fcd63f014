import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parseArtifact } from "../artifact/artifactFile";
import { SearchSettings } from "../config";
import { Logger } from "../observability";
import { errorMessage, isNotFound } from "../types/errors";
import { ManifestEntry } from "../types/models";
import { ManifestReader, ManifestSnapshot } from "./manifestReader";
import {
  describeIssues,
  GetFileParams,
  getFileParamsSchema,
  ListSourcesParams,
  listSourcesParamsSchema,
  SearchParams,
  searchParamsSchema,
  StatsParams,
  statsParamsSchema,
} from "./params";
import { buildPreview, scoreText } from "./search";
import { FileContent, OriginStats, QueryResult, SearchHit, SourceListing, StoreStats } from "./types";

export interface QueryServiceOptions {
  outputDir: string;
  search: SearchSettings;
  timeoutMs: number;
  logger: Logger;
}

type ReadOutcome =
  | { status: "ok"; text: string }
  | { status: "missing" }
  | { status: "timeout" }
  | { status: "failed"; message: string };

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

function invalid<T>(error: z.ZodError): QueryResult<T> {
  return { status: "invalid_argument", message: describeIssues(error) };
}

export function summarizeOrigins(entries: readonly ManifestEntry[]): OriginStats[] {
  const byOrigin = new Map<string, { documents: number; bytes: number; refs: Set<string> }>();
  for (const entry of entries) {
    const current = byOrigin.get(entry.origin) ?? { documents: 0, bytes: 0, refs: new Set<string>() };
    current.documents += 1;
    current.bytes += entry.size;
    current.refs.add(entry.ref);
    byOrigin.set(entry.origin, current);
  }

  return [...byOrigin.entries()]
    .map(([origin, value]) => ({
      origin,
      documents: value.documents,
      bytes: value.bytes,
      refs: [...value.refs].sort(),
    }))
    .sort((a, b) => (a.origin < b.origin ? -1 : a.origin > b.origin ? 1 : 0));
}

/**
 * Read-only lookups over a published output directory. Every operation returns
 * a QueryResult; missing data is a `not_found` or `unavailable` result.
 */
export class QueryService {
  private readonly outputDir: string;
  private readonly settings: SearchSettings;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly reader: ManifestReader;

  constructor(options: QueryServiceOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.settings = options.search;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.reader = new ManifestReader(this.outputDir, options.logger);
  }

  async listSources(params: ListSourcesParams = {}): Promise<QueryResult<SourceListing>> {
    const parsed = listSourcesParamsSchema.safeParse(params);
    if (!parsed.success) {
      return invalid(parsed.error);
    }

    return this.withManifest<SourceListing>((manifest) => {
      const needle = parsed.data.filter?.toLowerCase() ?? "";
      const entries = manifest.entries.filter((entry) => entry.origin.toLowerCase().includes(needle));
      const stats = summarizeOrigins(entries);
      const listing: SourceListing = { sources: stats.map((item) => item.origin) };
      if (parsed.data.includeStats) {
        listing.stats = stats;
      }
      return { status: "ok", value: listing };
    });
  }

  async getFile(params: GetFileParams): Promise<QueryResult<FileContent>> {
    const parsed = getFileParamsSchema.safeParse(params);
    if (!parsed.success) {
      return invalid(parsed.error);
    }

    return this.withManifest<FileContent>(async (manifest) => {
      const resolved = this.resolveEntry(manifest, parsed.data);
      if (resolved.status !== "ok") {
        return resolved;
      }

      const entry = resolved.value;
      const signal = AbortSignal.timeout(this.timeoutMs);
      const read = await this.readArtifact(entry, signal);
      if (read.status === "missing") {
        return { status: "not_found", message: `artifact file missing for slug ${entry.slug}` };
      }
      if (read.status === "timeout") {
        return { status: "unavailable", message: `reading ${entry.file} timed out after ${this.timeoutMs}ms` };
      }
      if (read.status === "failed") {
        return { status: "unavailable", message: `reading ${entry.file} failed: ${read.message}` };
      }

      return {
        status: "ok",
        value: {
          slug: entry.slug,
          origin: entry.origin,
          ref: entry.ref,
          path: entry.path,
          file: entry.file,
          title: entry.title,
          topics: entry.topics,
          contentHash: entry.contentHash,
          content: read.text,
        },
      };
    });
  }

  async search(params: SearchParams): Promise<QueryResult<SearchHit[]>> {
    const parsed = searchParamsSchema.safeParse(params);
    if (!parsed.success) {
      return invalid(parsed.error);
    }
    const { query, source } = parsed.data;
    const limit = Math.min(parsed.data.limit ?? this.settings.defaultLimit, this.settings.maxLimit);

    return this.withManifest<SearchHit[]>(async (manifest) => {
      const sourceNeedle = source?.toLowerCase();
      const candidates = manifest.entries.filter(
        (entry) => sourceNeedle === undefined || entry.origin.toLowerCase().includes(sourceNeedle),
      );

      const signal = AbortSignal.timeout(this.timeoutMs);
      const hits: SearchHit[] = [];
      for (const entry of candidates) {
        const read = await this.readArtifact(entry, signal);
        if (read.status === "timeout") {
          return { status: "unavailable", message: `search timed out after ${this.timeoutMs}ms` };
        }
        if (read.status !== "ok") {
          this.logger.debug("search_artifact_skipped", { slug: entry.slug, reason: read.status });
          continue;
        }

        const body = parseArtifact(read.text)?.body ?? read.text;
        const scored = scoreText(entry.title, body, query, this.settings.titleWeight);
        if (scored.score <= 0) {
          continue;
        }
        hits.push({
          slug: entry.slug,
          title: entry.title,
          origin: entry.origin,
          path: entry.path,
          score: scored.score,
          preview: buildPreview(body, query, this.settings.previewRadius),
        });
      }

      hits.sort((a, b) => b.score - a.score || (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
      return { status: "ok", value: hits.slice(0, limit) };
    });
  }

  async stats(params: StatsParams = {}): Promise<QueryResult<StoreStats>> {
    const parsed = statsParamsSchema.safeParse(params);
    if (!parsed.success) {
      return invalid(parsed.error);
    }

    return this.withManifest<StoreStats>((manifest) => {
      const perOrigin = summarizeOrigins(manifest.entries);
      const result: StoreStats = {
        documents: manifest.entries.length,
        bytes: manifest.entries.reduce((total, entry) => total + entry.size, 0),
        sources: perOrigin.length,
      };
      if (parsed.data.detailed) {
        result.perOrigin = perOrigin;
      }
      return { status: "ok", value: result };
    });
  }

  private async withManifest<T>(
    handler: (manifest: ManifestSnapshot) => QueryResult<T> | Promise<QueryResult<T>>,
  ): Promise<QueryResult<T>> {
    let manifest: ManifestSnapshot | undefined;
    try {
      manifest = await this.reader.load();
    } catch (error) {
      this.logger.error("manifest_read_failed", { path: this.reader.location, error: errorMessage(error) });
      return { status: "unavailable", message: `manifest could not be read: ${errorMessage(error)}` };
    }
    if (!manifest) {
      return { status: "unavailable", message: `no manifest at ${this.reader.location}` };
    }
    return handler(manifest);
  }

  private resolveEntry(manifest: ManifestSnapshot, params: GetFileParams): QueryResult<ManifestEntry> {
    if (params.slug !== undefined) {
      const entry = manifest.bySlug.get(params.slug);
      return entry ? { status: "ok", value: entry } : { status: "not_found", message: `no artifact with slug ${params.slug}` };
    }

    const target = params.path ?? "";
    const direct = manifest.bySlug.get(target) ?? manifest.byFile.get(target);
    if (direct) {
      return { status: "ok", value: direct };
    }

    const bySource = manifest.bySourcePath.get(target.replace(/\\/g, "/")) ?? [];
    if (bySource.length === 1) {
      return { status: "ok", value: bySource[0] };
    }
    if (bySource.length > 1) {
      const origins = bySource.map((entry) => entry.origin).join(", ");
      return { status: "invalid_argument", message: `path ${target} is ambiguous across origins: ${origins}; use slug` };
    }
    return { status: "not_found", message: `no artifact for path ${target}` };
  }

  private async readArtifact(entry: ManifestEntry, signal: AbortSignal): Promise<ReadOutcome> {
    const filePath = path.resolve(this.outputDir, entry.file);
    if (path.dirname(filePath) !== this.outputDir) {
      return { status: "missing" };
    }

    try {
      const text = await fs.promises.readFile(filePath, { encoding: "utf-8", signal });
      return { status: "ok", text };
    } catch (error) {
      if (isNotFound(error)) {
        return { status: "missing" };
      }
      if (isAbort(error)) {
        return { status: "timeout" };
      }
      this.logger.error("artifact_read_failed", { slug: entry.slug, error: errorMessage(error) });
      return { status: "failed", message: errorMessage(error) };
    }
  }
}
