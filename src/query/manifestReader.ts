import fs from "node:fs";
import path from "node:path";
import { Logger } from "../observability";
import { compareSlugs, MANIFEST_FILE, parseManifest } from "../publish/manifest";
import { isNotFound } from "../types/errors";
import { ManifestEntry } from "../types/models";

export interface ManifestSnapshot {
  entries: ManifestEntry[];
  bySlug: Map<string, ManifestEntry>;
  byFile: Map<string, ManifestEntry>;
  bySourcePath: Map<string, ManifestEntry[]>;
}

interface CachedSnapshot {
  mtimeMs: number;
  size: number;
  snapshot: ManifestSnapshot;
}

export function indexManifest(entries: readonly ManifestEntry[]): ManifestSnapshot {
  const sorted = [...entries].sort((a, b) => compareSlugs(a.slug, b.slug));
  const bySlug = new Map<string, ManifestEntry>();
  const byFile = new Map<string, ManifestEntry>();
  const bySourcePath = new Map<string, ManifestEntry[]>();

  for (const entry of sorted) {
    bySlug.set(entry.slug, entry);
    byFile.set(entry.file, entry);
    const samePath = bySourcePath.get(entry.path) ?? [];
    samePath.push(entry);
    bySourcePath.set(entry.path, samePath);
  }
  return { entries: sorted, bySlug, byFile, bySourcePath };
}

/**
 * Reads `index.jsonl` lazily and keeps the parsed snapshot until the file's
 * mtime or size changes. Never writes.
 */
export class ManifestReader {
  private readonly manifestPath: string;
  private readonly logger: Logger;
  private cached?: CachedSnapshot;

  constructor(outputDir: string, logger: Logger) {
    this.manifestPath = path.join(path.resolve(outputDir), MANIFEST_FILE);
    this.logger = logger;
  }

  get location(): string {
    return this.manifestPath;
  }

  async load(): Promise<ManifestSnapshot | undefined> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(this.manifestPath);
    } catch (error) {
      if (isNotFound(error)) {
        this.cached = undefined;
        return undefined;
      }
      throw error;
    }
    if (!stat.isFile()) {
      this.cached = undefined;
      return undefined;
    }

    if (this.cached && this.cached.mtimeMs === stat.mtimeMs && this.cached.size === stat.size) {
      return this.cached.snapshot;
    }

    const text = await fs.promises.readFile(this.manifestPath, "utf-8");
    const parsed = parseManifest(text);
    if (parsed.invalidLines.length > 0) {
      this.logger.warn("manifest_invalid_lines", { path: this.manifestPath, lines: parsed.invalidLines });
    }

    const snapshot = indexManifest(parsed.entries);
    this.cached = { mtimeMs: stat.mtimeMs, size: stat.size, snapshot };
    this.logger.debug("manifest_loaded", { path: this.manifestPath, entries: snapshot.entries.length });
    return snapshot;
  }
}
