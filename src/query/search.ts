export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export interface ScoredText {
  titleHits: number;
  bodyHits: number;
  score: number;
}

export function scoreText(title: string, body: string, query: string, titleWeight: number): ScoredText {
  const needle = query.toLowerCase();
  const titleHits = countOccurrences(title.toLowerCase(), needle);
  const bodyHits = countOccurrences(body.toLowerCase(), needle);
  return { titleHits, bodyHits, score: titleHits * titleWeight + bodyHits };
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// Snippet of `radius` characters either side of the first match, or the
// opening of the body when the match is only in the title.
export function buildPreview(body: string, query: string, radius: number): string {
  const index = body.toLowerCase().indexOf(query.toLowerCase());
  const start = index === -1 ? 0 : Math.max(0, index - radius);
  const end = index === -1 ? Math.min(body.length, radius * 2) : Math.min(body.length, index + query.length + radius);

  const snippet = collapseWhitespace(body.slice(start, end));
  const prefix = start > 0 ? "..." : "";
  const suffix = end < body.length ? "..." : "";
  return `${prefix}${snippet}${suffix}`;
}
