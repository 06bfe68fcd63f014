import path from "node:path";
import { NormalizedDocument, SourceDocument, TransformWarning } from "../types/models";
import { splitSourceFrontMatter } from "./frontMatter";
import { rewriteLinks } from "./links";
import { unwrapMarkup } from "./markup";
import { splitSegments } from "./segments";
import { elideLargeBlocks } from "./size";
import { normalizeStructure } from "./structure";
import { NamedPass, NormalizeSettings, PassContext, PassResult } from "./types";

// Later passes rely on the output shape of earlier ones.
export const PASSES: readonly NamedPass[] = [
  { name: "markup", run: unwrapMarkup },
  { name: "structure", run: normalizeStructure },
  { name: "links", run: rewriteLinks },
  { name: "size", run: elideLargeBlocks },
];

export function runPasses(text: string, context: PassContext, passes: readonly NamedPass[] = PASSES): PassResult {
  let current = text;
  const warnings: TransformWarning[] = [];

  for (const pass of passes) {
    try {
      const result = pass.run(current, context);
      current = result.text;
      warnings.push(...result.warnings);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push({ pass: pass.name, message: `pass failed and was skipped: ${message}` });
    }
  }

  return { text: current, warnings };
}

export function firstHeading(body: string): string | undefined {
  for (const segment of splitSegments(body)) {
    if (segment.kind !== "prose") {
      continue;
    }
    for (const line of segment.lines) {
      const match = /^# (.+)$/.exec(line);
      if (match) {
        return match[1].trim();
      }
    }
  }
  return undefined;
}

export function titleFromPath(filePath: string): string {
  const base = path.posix.basename(filePath).replace(/\.[^.]+$/, "");
  const stem = base === "index" || base === "README" ? path.posix.basename(path.posix.dirname(filePath)) : base;
  const words = (stem === "." || stem === "" ? base : stem).split(/[-_\s]+/).filter(Boolean);
  return words.map((word) => word[0].toUpperCase() + word.slice(1)).join(" ");
}

export function fenceLanguages(body: string): string[] {
  const languages = new Set<string>();
  for (const segment of splitSegments(body)) {
    if (segment.kind === "fence") {
      const language = segment.info.trim().split(/\s+/)[0]?.toLowerCase();
      if (language && /^[a-z][\w+#-]*$/.test(language)) {
        languages.add(language);
      }
    }
  }
  return [...languages];
}

export function mergeTopics(...groups: readonly (readonly string[])[]): string[] {
  const topics = new Set<string>();
  for (const group of groups) {
    for (const topic of group) {
      const normalized = topic.trim().toLowerCase();
      if (normalized) {
        topics.add(normalized);
      }
    }
  }
  return [...topics].sort();
}

export function normalizeDocument(source: SourceDocument, settings: NormalizeSettings): NormalizedDocument {
  const frontMatter = splitSourceFrontMatter(source.rawText);
  const context: PassContext = { origin: source.origin, path: source.path, settings };
  const result = runPasses(frontMatter.body, context);

  return {
    body: result.text,
    title: frontMatter.data.title ?? firstHeading(result.text) ?? titleFromPath(source.path),
    topics: mergeTopics(source.declaredTopics, frontMatter.data.topics, fenceLanguages(result.text)),
    warnings: [...frontMatter.warnings, ...result.warnings],
  };
}
