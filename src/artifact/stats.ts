import { ContentStats } from "../types/models";
import { splitSegments } from "../normalize/segments";

export function computeContentStats(body: string): ContentStats {
  const segments = splitSegments(body);
  let headings = 0;
  let inlineCode = 0;
  let links = 0;
  let codeBlocks = 0;

  for (const segment of segments) {
    if (segment.kind === "fence") {
      codeBlocks += 1;
      continue;
    }
    for (const line of segment.lines) {
      if (/^#{1,6}(?:\s|$)/.test(line)) {
        headings += 1;
      }
      inlineCode += line.match(/`[^`]+`/g)?.length ?? 0;
      links += line.match(/\[[^\]]*\]\([^)]+\)/g)?.length ?? 0;
    }
  }

  const characters = body.length;
  return {
    lines: body === "" ? 0 : body.replace(/\n$/, "").split("\n").length,
    words: body.split(/\s+/).filter(Boolean).length,
    characters,
    estimatedTokens: Math.ceil(characters / 4),
    codeBlocks,
    inlineCode,
    links,
    headings,
  };
}
