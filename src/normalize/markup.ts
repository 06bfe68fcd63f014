import { TransformWarning } from "../types/models";
import { joinSegments, mapOutsideInlineCode, splitSegments } from "./segments";
import { PassContext, PassResult } from "./types";

const IMPORT_STATEMENT = /^import\s+(?:["'{*]|[\w$]+\s*(?:,|from\b))/;
const EXPORT_STATEMENT = /^export\s+(?:default|const|let|var|function|class|async)\b|^export\s+[{*]/;
const COMPONENT_TAG = /<(\/?)([A-Z][\w.]*)((?:\s[^<>]*?)?)\s*(\/?)>/g;

function bracketDelta(line: string): number {
  let delta = 0;
  for (const char of line) {
    if (char === "{" || char === "(" || char === "[") {
      delta += 1;
    } else if (char === "}" || char === ")" || char === "]") {
      delta -= 1;
    }
  }
  return delta;
}

function stripEsmStatements(lines: string[]): string[] {
  const kept: string[] = [];
  let depth = 0;
  let skipping = false;

  for (const line of lines) {
    if (skipping) {
      if (line.trim() === "") {
        skipping = false;
        depth = 0;
        kept.push(line);
        continue;
      }
      depth += bracketDelta(line);
      skipping = depth > 0;
      continue;
    }

    if (IMPORT_STATEMENT.test(line) || EXPORT_STATEMENT.test(line)) {
      depth = bracketDelta(line);
      skipping = depth > 0;
      continue;
    }
    kept.push(line);
  }
  return kept;
}

const REMOVED = "\u0000";
const REMOVED_GAP = /[ \t]*(?:\u0000[ \t]*)+/g;

/** Collapses the whitespace around removed tags to what the surrounding prose needs. */
function closeGaps(line: string): string {
  if (!line.includes(REMOVED)) {
    return line;
  }
  const closed = line.replace(REMOVED_GAP, (gap: string, offset: number) => {
    const left = gap.slice(0, gap.indexOf(REMOVED));
    const right = gap.slice(gap.lastIndexOf(REMOVED) + 1);
    if (offset === 0) {
      return left;
    }
    if (offset + gap.length === line.length) {
      return "";
    }
    return left && right ? " " : left + right;
  });
  return closed.trim() === "" ? "" : closed;
}

function tagNames(prose: string): { opened: Set<string>; closed: Set<string> } {
  const opened = new Set<string>();
  const closed = new Set<string>();
  mapOutsideInlineCode(prose, (part) => {
    for (const match of part.matchAll(COMPONENT_TAG)) {
      if (match[1]) {
        closed.add(match[2]);
      } else if (!match[4]) {
        opened.add(match[2]);
      }
    }
    return part;
  });
  return { opened, closed };
}

export function unwrapMarkup(text: string, context: PassContext): PassResult {
  const recognized = new Set(context.settings.recognizedWrappers);
  const unknownWrappers = new Set<string>();
  const droppedElements = new Set<string>();

  const segments = splitSegments(text).map((segment) => {
    if (segment.kind === "fence") {
      return segment;
    }

    const prose = stripEsmStatements(segment.lines).join("\n");
    const { opened, closed } = tagNames(prose);
    const unwrapped = mapOutsideInlineCode(prose, (part) =>
      part.replace(COMPONENT_TAG, (match: string, closing: string, name: string, _attrs: string, selfClosing: string) => {
        if (selfClosing) {
          if (!recognized.has(name)) {
            droppedElements.add(name);
          }
          return REMOVED;
        }
        // an opener without its closer, or the reverse, is prose such as `List<Item>`
        if (!(closing ? opened : closed).has(name)) {
          return match;
        }
        if (!recognized.has(name)) {
          unknownWrappers.add(name);
        }
        return REMOVED;
      }),
    );
    return { ...segment, lines: unwrapped.split("\n").map(closeGaps) };
  });

  const output = joinSegments(segments);
  if (output === text) {
    return { text, warnings: [] };
  }

  const warnings: TransformWarning[] = [
    ...[...unknownWrappers].sort().map((name) => ({
      pass: "markup" as const,
      message: `unrecognized wrapper <${name}> stripped, inner text kept`,
    })),
    ...[...droppedElements].sort().map((name) => ({
      pass: "markup" as const,
      message: `self-closing element <${name} /> removed`,
    })),
  ];
  return { text: output, warnings };
}
