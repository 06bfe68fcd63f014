import crypto from "node:crypto";
import { ArtifactFrontMatter } from "../types/models";

type Volatile = "fetchedAt" | "contentHash";

export type HashedFrontMatter = Omit<ArtifactFrontMatter, Volatile>;

export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function contentHash(body: string, frontMatter: HashedFrontMatter): string {
  const stable: HashedFrontMatter = {
    schema: frontMatter.schema,
    slug: frontMatter.slug,
    title: frontMatter.title,
    source: frontMatter.source,
    topics: frontMatter.topics,
    stats: frontMatter.stats,
  };
  return crypto
    .createHash("sha256")
    .update(body, "utf-8")
    .update("\n\0\n", "utf-8")
    .update(canonicalJson(stable), "utf-8")
    .digest("hex");
}
