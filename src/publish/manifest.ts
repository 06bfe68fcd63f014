import { z } from "zod";
import { ManifestEntry, RetainedPrefix } from "../types/models";

export const MANIFEST_FILE = "index.jsonl";

const manifestEntrySchema: z.ZodType<ManifestEntry> = z.object({
  slug: z.string().min(1),
  origin: z.string(),
  ref: z.string(),
  path: z.string(),
  file: z.string().min(1),
  contentHash: z.string(),
  topics: z.array(z.string()),
  size: z.number().int().nonnegative(),
  title: z.string(),
});

export function compareSlugs(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Run-scoped collection of manifest entries. One instance per run, handed to
 * `ArtifactPublisher.finalize` once every document has a terminal outcome.
 * Slugs and prefixes marked retained keep their previously published entry.
 */
export class ManifestAccumulator {
  private readonly entries = new Map<string, ManifestEntry>();
  private readonly retainedSlugs = new Set<string>();
  private readonly retainedPrefixes: RetainedPrefix[] = [];

  add(entry: ManifestEntry): void {
    this.entries.set(entry.slug, entry);
  }

  retain(slug: string): void {
    this.retainedSlugs.add(slug);
  }

  retainPrefix(retained: RetainedPrefix): void {
    this.retainedPrefixes.push(retained);
  }

  retained(): string[] {
    return [...this.retainedSlugs].filter((slug) => !this.entries.has(slug)).sort(compareSlugs);
  }

  isRetained(entry: ManifestEntry): boolean {
    if (this.entries.has(entry.slug)) {
      return false;
    }
    if (this.retainedSlugs.has(entry.slug)) {
      return true;
    }
    return this.retainedPrefixes.some(
      ({ origin, prefix }) => entry.origin === origin && (prefix === "" || entry.path.startsWith(`${prefix}/`)),
    );
  }

  /** Adds previously published entries that this run must not drop. */
  carryForward(previous: readonly ManifestEntry[]): ManifestEntry[] {
    const carried = previous.filter((entry) => this.isRetained(entry));
    for (const entry of carried) {
      this.entries.set(entry.slug, entry);
    }
    return carried;
  }

  has(slug: string): boolean {
    return this.entries.has(slug);
  }

  get size(): number {
    return this.entries.size;
  }

  sorted(): ManifestEntry[] {
    return [...this.entries.values()].sort((a, b) => compareSlugs(a.slug, b.slug));
  }
}

export function serializeManifestEntry(entry: ManifestEntry): string {
  return JSON.stringify({
    slug: entry.slug,
    origin: entry.origin,
    ref: entry.ref,
    path: entry.path,
    file: entry.file,
    contentHash: entry.contentHash,
    topics: entry.topics,
    size: entry.size,
    title: entry.title,
  });
}

export function serializeManifest(entries: readonly ManifestEntry[]): string {
  return entries.map((entry) => `${serializeManifestEntry(entry)}\n`).join("");
}

export interface ParsedManifest {
  entries: ManifestEntry[];
  invalidLines: number[];
}

export function parseManifest(text: string): ParsedManifest {
  const entries: ManifestEntry[] = [];
  const invalidLines: number[] = [];

  text.split("\n").forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      invalidLines.push(index + 1);
      return;
    }
    const result = manifestEntrySchema.safeParse(raw);
    if (result.success) {
      entries.push(result.data);
    } else {
      invalidLines.push(index + 1);
    }
  });

  return { entries, invalidLines };
}
