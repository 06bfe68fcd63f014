import { TransformWarning } from "../types/models";
import { FenceSegment, joinSegments, Segment, splitSegments } from "./segments";
import { PassContext, PassResult } from "./types";

const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)[ \t]*$/;
const NON_PARAGRAPH = /^(?: {4}|\t| {0,3}(?:#{1,6}(?:\s|$)|>|[-*+](?:\s|$)|\d+[.)](?:\s|$)|\||<))/;
const DELIMITER_CELL = /^(:?)-+(:?)$/;

function isParagraphLine(line: string | undefined): line is string {
  return line !== undefined && line.trim() !== "" && !NON_PARAGRAPH.test(line) && !SETEXT_UNDERLINE.test(line);
}

function normalizeHeading(line: string): string {
  const match = ATX_HEADING.exec(line);
  if (!match) {
    return line;
  }
  const title = (match[2] ?? "").trim();
  return title ? `${match[1]} ${title}` : match[1];
}

function splitCells(row: string): string[] {
  let inner = row.trim();
  if (inner.startsWith("|")) {
    inner = inner.slice(1);
  }
  if (inner.endsWith("|") && !inner.endsWith("\\|")) {
    inner = inner.slice(0, -1);
  }
  return inner.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

function isDelimiterRow(row: string): boolean {
  const cells = splitCells(row);
  return cells.length > 0 && cells.every((cell) => DELIMITER_CELL.test(cell));
}

function normalizeTable(rows: string[]): string[] {
  if (rows.length < 2 || !isDelimiterRow(rows[1])) {
    return rows;
  }
  return rows.map((row, index) => {
    const indent = /^\s*/.exec(row)?.[0] ?? "";
    const cells = splitCells(row).map((cell) =>
      index === 1 ? cell.replace(DELIMITER_CELL, (_match, left: string, right: string) => `${left}---${right}`) : cell,
    );
    return `${indent}| ${cells.join(" | ")} |`;
  });
}

function normalizeProse(lines: string[]): string[] {
  const out: string[] = [];
  let tableRows: string[] = [];

  const flushTable = (): void => {
    out.push(...normalizeTable(tableRows));
    tableRows = [];
  };

  for (const raw of lines) {
    const line = raw.trimEnd();

    if (line.trimStart().startsWith("|")) {
      tableRows.push(line);
      continue;
    }
    flushTable();

    const setext = SETEXT_UNDERLINE.exec(line);
    const previous = out[out.length - 1];
    const beforePrevious = out[out.length - 2];
    if (setext && isParagraphLine(previous) && (beforePrevious === undefined || beforePrevious === "")) {
      out[out.length - 1] = `${setext[1].startsWith("=") ? "#" : "##"} ${previous.trim()}`;
      continue;
    }

    if (line === "" && previous === "") {
      continue;
    }
    out.push(normalizeHeading(line));
  }
  flushTable();
  return out;
}

function normalizeFence(segment: FenceSegment, warnings: TransformWarning[]): FenceSegment {
  const lines = segment.lines.map((line) => line.trimEnd());
  const containsBackticks = lines.some((line) => line.trimStart().startsWith("```"));
  const marker = segment.marker.startsWith("~") && !containsBackticks ? "```" : segment.marker;

  const [language = "", ...rest] = segment.info.trim().split(/\s+/).filter(Boolean);
  const info = language.toLowerCase() + (rest.length > 0 ? ` ${rest.join(" ")}` : "");

  if (segment.closeLine === undefined) {
    while (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    warnings.push({ pass: "structure", message: "unterminated code fence closed at end of document" });
  }

  return {
    ...segment,
    marker,
    info,
    lines,
    openLine: `${segment.indent}${marker}${info}`,
    closeLine: `${segment.indent}${marker}`,
  };
}

export function normalizeStructure(text: string, _context: PassContext): PassResult {
  const warnings: TransformWarning[] = [];
  const unified = text.replace(/\r\n?/g, "\n");

  const segments: Segment[] = splitSegments(unified).map((segment) =>
    segment.kind === "fence" ? normalizeFence(segment, warnings) : { ...segment, lines: normalizeProse(segment.lines) },
  );

  const joined = joinSegments(segments).replace(/^\n+/, "").replace(/\n*$/, "\n");
  const output = joined.trim() === "" ? "" : joined;
  if (output === text) {
    return { text, warnings: [] };
  }
  return { text: output, warnings };
}
