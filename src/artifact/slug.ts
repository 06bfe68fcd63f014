import crypto from "node:crypto";
import { SourceOrigin } from "../types/models";

export const SLUG_SEPARATOR = "__";
const MAX_SLUG_LENGTH = 160;
const DOC_EXTENSION = /\.(md|mdx|markdown)$/i;

function shortHash(value: string): string {
  return crypto.createHash("sha256").update(value, "utf-8").digest("hex").slice(0, 8);
}

export function slugifyOrigin(repo: string): string {
  const slug = repo
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "unknown";
}

function slugifySegment(segment: string): string {
  return segment
    .replace(/[^A-Za-z0-9_-]+/g, "-")
    .replace(/_{2,}/g, "_")
    .replace(/^-+|-+$/g, "");
}

export function slugifyPath(filePath: string): string {
  const suffixAt = filePath.search(/[?#]/);
  const pathPart = suffixAt >= 0 ? filePath.slice(0, suffixAt) : filePath;
  const suffix = suffixAt >= 0 ? filePath.slice(suffixAt) : "";

  const segments = pathPart
    .replace(/\\/g, "/")
    .replace(DOC_EXTENSION, "")
    .split("/")
    .map(slugifySegment)
    .filter(Boolean);

  const base = segments.length > 0 ? segments.join(SLUG_SEPARATOR) : "index";
  return suffix ? `${base}${SLUG_SEPARATOR}q${shortHash(suffix)}` : base;
}

export function slug(origin: SourceOrigin, filePath: string): string {
  const full = `${slugifyOrigin(origin.repo)}${SLUG_SEPARATOR}${slugifyPath(filePath)}`;
  if (full.length <= MAX_SLUG_LENGTH) {
    return full;
  }
  return `${full.slice(0, MAX_SLUG_LENGTH - 9).replace(/[-_]+$/, "")}-${shortHash(full)}`;
}
