export interface ProseSegment {
  kind: "prose";
  lines: string[];
}

export interface FenceSegment {
  kind: "fence";
  openLine: string;
  indent: string;
  marker: string;
  info: string;
  lines: string[];
  closeLine?: string;
}

export type Segment = ProseSegment | FenceSegment;

const FENCE_OPEN = /^( {0,3})(`{3,}|~{3,})(.*)$/;

function isFenceClose(line: string, marker: string): boolean {
  const trimmed = line.trim();
  return /^(`+|~+)$/.test(trimmed) && trimmed[0] === marker[0] && trimmed.length >= marker.length;
}

export function splitSegments(text: string): Segment[] {
  const lines = text.split("\n");
  const segments: Segment[] = [];
  let prose: string[] = [];
  let fence: FenceSegment | undefined;

  for (const line of lines) {
    if (fence) {
      if (isFenceClose(line, fence.marker)) {
        fence.closeLine = line;
        segments.push(fence);
        fence = undefined;
      } else {
        fence.lines.push(line);
      }
      continue;
    }

    const open = FENCE_OPEN.exec(line);
    // backtick fences may not carry backticks in their info string
    if (open && !(open[2][0] === "`" && open[3].includes("`"))) {
      if (prose.length > 0) {
        segments.push({ kind: "prose", lines: prose });
        prose = [];
      }
      fence = { kind: "fence", openLine: line, indent: open[1], marker: open[2], info: open[3], lines: [] };
      continue;
    }

    prose.push(line);
  }

  if (fence) {
    segments.push(fence);
  }
  if (prose.length > 0) {
    segments.push({ kind: "prose", lines: prose });
  }
  return segments;
}

export function joinSegments(segments: Segment[]): string {
  const lines: string[] = [];
  for (const segment of segments) {
    if (segment.kind === "prose") {
      lines.push(...segment.lines);
      continue;
    }
    lines.push(segment.openLine, ...segment.lines);
    if (segment.closeLine !== undefined) {
      lines.push(segment.closeLine);
    }
  }
  return lines.join("\n");
}

const INLINE_CODE = /(`+)(?:(?!\n[ \t]*\n)[\s\S])*?\1/g;

/**
 * Applies `transform` to the parts of a line that sit outside inline code spans.
 */
export function mapOutsideInlineCode(line: string, transform: (part: string) => string): string {
  if (!line.includes("`")) {
    return transform(line);
  }

  let result = "";
  let cursor = 0;
  for (const match of line.matchAll(INLINE_CODE)) {
    const start = match.index ?? 0;
    result += transform(line.slice(cursor, start)) + match[0];
    cursor = start + match[0].length;
  }
  return result + transform(line.slice(cursor));
}
