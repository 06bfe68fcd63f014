import path from "node:path";
import { SourceOrigin, TransformWarning } from "../types/models";
import { joinSegments, mapOutsideInlineCode, splitSegments } from "./segments";
import { PassContext, PassResult } from "./types";

const INLINE_LINK = /(!?\[[^\]]*\]\(\s*)(<[^>]*>|[^)\s]+)([^)]*\))/g;
const REFERENCE_DEFINITION = /^( {0,3}\[[^\]]+\]:\s*)(\S+)(.*)$/;
const SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const GITHUB_SHORTHAND = /^[\w.-]+\/[\w.-]+$/;
const LIST_MARKER_ONLY = /^\s*(?:[-*+]|\d+[.)])?\s*$/;

function encodePath(filePath: string): string {
  return filePath.split("/").map(encodeURIComponent).join("/");
}

export function canonicalUrl(origin: SourceOrigin, filePath: string): string {
  const encoded = encodePath(filePath);
  if (/^https?:\/\//i.test(origin.repo)) {
    return `${origin.repo.replace(/\/+$/, "")}/blob/${encodeURIComponent(origin.ref)}/${encoded}`;
  }
  if (GITHUB_SHORTHAND.test(origin.repo)) {
    return `https://github.com/${origin.repo}/blob/${encodeURIComponent(origin.ref)}/${encoded}`;
  }
  return `${origin.repo}/${encodeURIComponent(origin.ref)}/${encoded}`;
}

type ResolvedTarget = { kind: "unchanged" } | { kind: "rewritten"; url: string } | { kind: "escapes" };

export function resolveTarget(target: string, context: PassContext): ResolvedTarget {
  if (target === "" || SCHEME.test(target) || target.startsWith("#") || target.startsWith("/")) {
    return { kind: "unchanged" };
  }

  const suffixAt = target.search(/[?#]/);
  const pathPart = suffixAt >= 0 ? target.slice(0, suffixAt) : target;
  const suffix = suffixAt >= 0 ? target.slice(suffixAt) : "";
  if (pathPart === "") {
    return { kind: "unchanged" };
  }

  let decoded = pathPart;
  try {
    decoded = decodeURI(pathPart);
  } catch {
    decoded = pathPart;
  }

  const resolved = path.posix.normalize(path.posix.join(path.posix.dirname(context.path), decoded));
  if (resolved === ".." || resolved.startsWith("../")) {
    return { kind: "escapes" };
  }
  return { kind: "rewritten", url: canonicalUrl(context.origin, resolved) + suffix };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildDenylist(phrases: readonly string[]): { links: RegExp; lines: RegExp } | undefined {
  if (phrases.length === 0) {
    return undefined;
  }
  const alternation = phrases.map(escapeRegExp).join("|");
  return {
    links: new RegExp(`!?\\[\\s*(?:${alternation})[^\\]]*\\]\\([^)]*\\)`, "gi"),
    lines: new RegExp(`^\\s*(?:[-*+]\\s+)?(?:${alternation})\\s*[.!]?\\s*$`, "i"),
  };
}

export function rewriteLinks(text: string, context: PassContext): PassResult {
  const warnings: TransformWarning[] = [];
  const escaped = new Set<string>();
  const denylist = buildDenylist(context.settings.boilerplateDenylist);

  const rewrite = (target: string): string => {
    const bare = target.startsWith("<") && target.endsWith(">") ? target.slice(1, -1) : target;
    const resolved = resolveTarget(bare, context);
    if (resolved.kind === "escapes") {
      escaped.add(bare);
      return target;
    }
    return resolved.kind === "rewritten" ? resolved.url : target;
  };

  const segments = splitSegments(text).map((segment) => {
    if (segment.kind === "fence") {
      return segment;
    }

    const lines: string[] = [];
    let removed = false;
    for (const line of segment.lines) {
      if (denylist?.lines.test(line)) {
        removed = true;
        continue;
      }

      const definition = REFERENCE_DEFINITION.exec(line);
      if (definition) {
        lines.push(`${definition[1]}${rewrite(definition[2])}${definition[3]}`);
        continue;
      }

      const hits = { boilerplate: 0 };
      const cleaned = mapOutsideInlineCode(line, (part) => {
        const withoutBoilerplate = denylist
          ? part.replace(denylist.links, () => {
              hits.boilerplate += 1;
              return "";
            })
          : part;
        return withoutBoilerplate.replace(
          INLINE_LINK,
          (_match, head: string, target: string, tail: string) => `${head}${rewrite(target)}${tail}`,
        );
      });

      if (hits.boilerplate === 0) {
        lines.push(cleaned);
        continue;
      }
      removed = true;
      if (!LIST_MARKER_ONLY.test(cleaned)) {
        lines.push(cleaned.replace(/(\S) {2,}/g, "$1 ").trimEnd());
      }
    }

    if (!removed) {
      return { ...segment, lines };
    }
    const collapsed = lines.filter((line, index) => !(line.trim() === "" && lines[index - 1]?.trim() === ""));
    return { ...segment, lines: collapsed };
  });

  for (const target of [...escaped].sort()) {
    warnings.push({ pass: "links", message: `link target ${target} resolves outside the source tree; left unchanged` });
  }

  const output = joinSegments(segments);
  return { text: output === text ? text : output, warnings };
}
