import { joinSegments, splitSegments } from "./segments";
import { PassContext, PassResult } from "./types";

export function elisionMarker(indent: string, elided: number): string {
  return `${indent}... (${elided} lines elided) ...`;
}

export function elideLargeBlocks(text: string, context: PassContext): PassResult {
  const { profile, sizeControl } = context.settings;
  if (profile === "lossless" || !sizeControl) {
    return { text, warnings: [] };
  }

  const { maxBlockLines, keepLines } = sizeControl;
  let elidedBlocks = 0;
  const segments = splitSegments(text).map((segment) => {
    if (segment.kind === "prose" || segment.lines.length <= maxBlockLines) {
      return segment;
    }

    const total = segment.lines.length;
    elidedBlocks += 1;
    return {
      ...segment,
      lines: [
        ...segment.lines.slice(0, keepLines),
        elisionMarker(segment.indent, total - keepLines * 2),
        ...segment.lines.slice(total - keepLines),
      ],
    };
  });

  if (elidedBlocks === 0) {
    return { text, warnings: [] };
  }
  return { text: joinSegments(segments), warnings: [] };
}
